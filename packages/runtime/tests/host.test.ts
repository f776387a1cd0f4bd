/**
 * Tests for the execution host.
 *
 * Covers immediate execution of the first receipt, rollback of failed
 * receipts, callbacks, deposits, gas, views, sub-account creation and
 * delayed delivery.
 */

import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { Host } from "../src/host.js";
import { derivePublicKey } from "../src/receipt-id.js";
import { HostError, ONE_UNIT, TGAS } from "../src/types.js";
import { Counter } from "./counter.js";

function hostErrorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof HostError) return err.code;
    throw err;
  }
  return undefined;
}

describe("Host", () => {
  let host: Host;

  beforeEach(() => {
    host = new Host();
    host.registerCode("counter", () => new Counter());
    host.createAccount("alice", 100n * ONE_UNIT);
    host.createAccount("counter", 10n * ONE_UNIT);
    host.createAccount("other", ONE_UNIT);
    host.genesisDeploy("counter", "counter");
    host.genesisDeploy("other", "counter");
  });

  const counter = () => host.componentAt("counter", Counter);
  const other = () => host.componentAt("other", Counter);

  describe("genesis", () => {
    it("gives each account a deterministic key", () => {
      expect(host.keysOf("alice")).toEqual([derivePublicKey("alice")]);
      expect(derivePublicKey("alice")).toMatch(/^ed25519:[0-9a-f]{64}$/);
    });

    it("rejects invalid and duplicate account ids", () => {
      expect(hostErrorCode(() => host.createAccount("Alice", 0n))).toBe("INVALID_ACCOUNT_ID");
      expect(hostErrorCode(() => host.createAccount("alice", 0n))).toBe("ACCOUNT_EXISTS");
    });

    it("rejects deploying unknown code", () => {
      expect(hostErrorCode(() => host.genesisDeploy("alice", "missing"))).toBe("CODE_NOT_FOUND");
    });
  });

  describe("transact", () => {
    it("executes the first receipt immediately", () => {
      const { transactionId, result } = host.transact("alice", "counter", "increment", {});

      expect(result).toEqual({ status: "success", value: 1 });
      expect(transactionId).toMatch(/^[0-9a-f]{64}$/);

      const outcome = host.outcome(transactionId);
      expect(outcome.status).toBe("success");
      expect(outcome.value).toBe(1);
      expect(outcome.receipts).toHaveLength(1);
      expect(outcome.receipts[0]?.logs).toEqual(["count=1"]);
      expect(outcome.receipts[0]?.gasBurnt).toBe(TGAS);
    });

    it("rolls back a failed receipt and refunds its deposit", () => {
      const { result } = host.transact("alice", "counter", "fail", {}, { deposit: 5n });

      expect(result).toEqual({ status: "failed", reason: "boom" });
      expect(counter().count).toBe(0);
      expect(host.balanceOf("alice")).toBe(100n * ONE_UNIT);
      expect(host.balanceOf("counter")).toBe(10n * ONE_UNIT);
    });

    it("credits the attached deposit on success", () => {
      host.transact("alice", "counter", "increment", {}, { deposit: 5n });
      expect(host.balanceOf("alice")).toBe(100n * ONE_UNIT - 5n);
      expect(host.balanceOf("counter")).toBe(10n * ONE_UNIT + 5n);
    });

    it("fails unknown methods with METHOD_NOT_FOUND", () => {
      const { result } = host.transact("alice", "counter", "nope", {});
      expect(result).toMatchObject({ status: "failed", code: "METHOD_NOT_FOUND" });
    });

    it("fails receipts to missing accounts and refunds the deposit", () => {
      const { result } = host.transact("alice", "ghost", "increment", {}, { deposit: 7n });
      expect(result).toMatchObject({ status: "failed", code: "ACCOUNT_NOT_FOUND" });
      expect(host.balanceOf("alice")).toBe(100n * ONE_UNIT);
    });

    it("fails receipts with less gas than one receipt burns", () => {
      const { result } = host.transact("alice", "counter", "increment", {}, { gas: TGAS / 2n });
      expect(result).toMatchObject({ status: "failed", code: "GAS_EXCEEDED" });
      expect(counter().count).toBe(0);
    });

    it("rejects a signer that cannot cover the deposit", () => {
      expect(
        hostErrorCode(() =>
          host.transact("alice", "counter", "increment", {}, { deposit: 101n * ONE_UNIT }),
        ),
      ).toBe("INSUFFICIENT_FUNDS");
    });

    it("reports unknown transactions", () => {
      expect(hostErrorCode(() => host.outcome("0".repeat(64)))).toBe("TRANSACTION_NOT_FOUND");
    });

    it("forwards component logs to the logger", () => {
      const lines: string[] = [];
      const logged = new Host({
        logger: pino({ level: "debug" }, { write: (msg: string) => void lines.push(msg) }),
      });
      logged.registerCode("counter", () => new Counter());
      logged.createAccount("alice", ONE_UNIT);
      logged.createAccount("counter", ONE_UNIT);
      logged.genesisDeploy("counter", "counter");

      const { transactionId } = logged.transact("alice", "counter", "increment", {});

      const entries = lines.map((line) => JSON.parse(line) as Record<string, unknown>);
      expect(entries).toContainEqual(
        expect.objectContaining({ msg: "count=1", receiptId: transactionId, accountId: "counter" }),
      );
    });
  });

  describe("callbacks", () => {
    it("queues requests until settle and resumes with the result", () => {
      const { transactionId, result } = host.transact("alice", "counter", "forward", {
        target: "other",
      });
      expect(result).toEqual({ status: "success", value: "issued" });
      expect(host.queuedReceipts).toBe(2);
      expect(host.outcome(transactionId).status).toBe("pending");

      const report = host.settle();
      expect(report).toEqual({ rounds: 3, executed: 2, blockHeight: 3, remaining: 0 });

      expect(other().count).toBe(1);
      expect(counter().results).toEqual([{ status: "success", value: 1 }]);

      const outcome = host.outcome(transactionId);
      expect(outcome.status).toBe("success");
      expect(outcome.value).toBe("issued");
      expect(outcome.receipts.map((r) => r.method)).toEqual(["forward", "increment", "onResult"]);
      expect(outcome.receipts.map((r) => r.receiver)).toEqual(["counter", "other", "counter"]);
    });

    it("delivers a remote failure to the callback as a value", () => {
      host.transact("alice", "counter", "forward", { target: "other", method: "fail" });
      host.settle();

      expect(counter().results).toEqual([{ status: "failed", reason: "boom" }]);
      expect(other().count).toBe(0);
    });

    it("discards requests issued by an execution that throws", () => {
      const { result } = host.transact("alice", "counter", "forwardThenFail", { target: "other" });

      expect(result).toEqual({ status: "failed", reason: "after call" });
      expect(host.queuedReceipts).toBe(0);
      expect(counter().count).toBe(0);
    });

    it("fails a callback invoked without a promise result", () => {
      const { result } = host.transact("alice", "counter", "onResult", {});
      expect(result).toMatchObject({ status: "failed", code: "NOT_A_CALLBACK" });
    });

    it("holds delayed requests until their block", () => {
      host.transact("alice", "counter", "forward", { target: "other", delayBlocks: 3 });

      const partial = host.settle(2);
      expect(partial.remaining).toBe(2);
      expect(other().count).toBe(0);

      host.settle();
      expect(other().count).toBe(1);
      expect(counter().results).toHaveLength(1);
    });
  });

  describe("deposits and gas", () => {
    it("moves the deposit when the request is issued and credits it on success", () => {
      host.transact("alice", "counter", "forward", { target: "other", deposit: "1000" });
      expect(host.balanceOf("counter")).toBe(10n * ONE_UNIT - 1000n);

      host.settle();
      expect(host.balanceOf("other")).toBe(ONE_UNIT + 1000n);
    });

    it("refunds the deposit when the remote step fails", () => {
      host.transact("alice", "counter", "forward", {
        target: "other",
        method: "fail",
        deposit: "1000",
      });
      host.settle();

      expect(host.balanceOf("counter")).toBe(10n * ONE_UNIT);
      expect(host.balanceOf("other")).toBe(ONE_UNIT);
    });

    it("fails the issuing receipt when the deposit exceeds its balance", () => {
      const { result } = host.transact("alice", "counter", "forward", {
        target: "other",
        deposit: (11n * ONE_UNIT).toString(),
      });
      expect(result).toMatchObject({ status: "failed", code: "INSUFFICIENT_FUNDS" });
      expect(host.queuedReceipts).toBe(0);
    });

    it("fails the issuing receipt when attached gas exceeds what remains", () => {
      const { result } = host.transact("alice", "counter", "forward", {
        target: "other",
        gas: (400n * TGAS).toString(),
      });
      expect(result).toMatchObject({ status: "failed", code: "GAS_EXCEEDED" });
      expect(counter().count).toBe(0);
    });
  });

  describe("view", () => {
    it("returns the value and rolls back state changes", () => {
      expect(host.view("counter", "increment")).toBe(1);
      expect(counter().count).toBe(0);
    });

    it("prohibits requests", () => {
      expect(hostErrorCode(() => host.view("counter", "forward", { target: "other" }))).toBe(
        "CALL_PROHIBITED",
      );
    });
  });

  describe("sub-accounts", () => {
    it("lets an account create, fund and deploy its sub-account in one receipt", () => {
      host.transact("alice", "counter", "spawn", { name: "kid.counter", amount: "1000" });
      host.settle();

      expect(host.accountExists("kid.counter")).toBe(true);
      expect(host.balanceOf("kid.counter")).toBe(1000n);
      expect(host.keysOf("kid.counter")).toEqual([derivePublicKey("alice")]);
      expect(host.codeIdOf("kid.counter")).toBe("counter");
      expect(host.componentAt("kid.counter", Counter).count).toBe(1);
      expect(host.balanceOf("counter")).toBe(10n * ONE_UNIT - 1000n);
    });

    it("rejects creating an account outside the predecessor's namespace", () => {
      const { transactionId } = host.transact("alice", "counter", "spawn", {
        name: "kid.other",
        amount: "1000",
      });
      host.settle();

      expect(host.accountExists("kid.other")).toBe(false);
      expect(host.balanceOf("counter")).toBe(10n * ONE_UNIT);
      const failedReceipt = host.outcome(transactionId).receipts[1];
      expect(failedReceipt?.status).toBe("failed");
      expect(failedReceipt?.result).toMatchObject({ code: "UNAUTHORIZED" });
    });
  });
});
