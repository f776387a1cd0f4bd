/**
 * Property-Based Tests for @shardvault/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid
 * sequence of operations:
 *
 * 1. totalSupply == Σ balances + reserved after every operation
 * 2. Once every reserve is burned or released, totalSupply == Σ balances
 * 3. Rejected operations leave the ledger unchanged
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ShareLedger } from "../src/share-ledger.js";
import { LedgerError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS = ["alice", "bob", "carol"] as const;

const arbAccount = fc.constantFrom(...ACCOUNTS);
const arbAmount = fc.bigInt({ min: 1n, max: 1_000n });

type Op =
  | { readonly kind: "deposit"; readonly account: string; readonly amount: bigint }
  | { readonly kind: "burn"; readonly account: string; readonly amount: bigint }
  | {
      readonly kind: "transfer";
      readonly from: string;
      readonly to: string;
      readonly amount: bigint;
    }
  | { readonly kind: "reserve"; readonly account: string; readonly amount: bigint };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("deposit" as const), account: arbAccount, amount: arbAmount }),
  fc.record({ kind: fc.constant("burn" as const), account: arbAccount, amount: arbAmount }),
  fc.record({
    kind: fc.constant("transfer" as const),
    from: arbAccount,
    to: arbAccount,
    amount: arbAmount,
  }),
  fc.record({ kind: fc.constant("reserve" as const), account: arbAccount, amount: arbAmount }),
);

function apply(ledger: ShareLedger, op: Op, held: Map<string, bigint>): void {
  switch (op.kind) {
    case "deposit":
      ledger.deposit(op.account, op.amount);
      return;
    case "burn":
      ledger.burn(op.account, op.amount);
      return;
    case "transfer":
      ledger.transfer(op.from, op.to, op.amount);
      return;
    case "reserve":
      ledger.reserve(op.account, op.amount);
      held.set(op.account, (held.get(op.account) ?? 0n) + op.amount);
      return;
  }
}

function freshLedger(): ShareLedger {
  const ledger = new ShareLedger();
  for (const account of ACCOUNTS) ledger.registerAccount(account);
  return ledger;
}

// =============================================================================
// Properties
// =============================================================================

describe("property: supply invariant", () => {
  it("holds after any sequence of operations, including rejected ones", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { minLength: 1, maxLength: 40 }), (ops) => {
        const ledger = freshLedger();
        const held = new Map<string, bigint>();

        for (const op of ops) {
          const before = ledger.snapshot();
          try {
            apply(ledger, op, held);
          } catch (err) {
            expect(err).toBeInstanceOf(LedgerError);
            expect(ledger.snapshot()).toEqual(before);
          }
          expect(ledger.checkSupply().consistent).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("settles to totalSupply == Σ balances once reserves are resolved", () => {
    fc.assert(
      fc.property(
        fc.array(arbOp, { minLength: 1, maxLength: 40 }),
        fc.boolean(),
        (ops, burnHeld) => {
          const ledger = freshLedger();
          const held = new Map<string, bigint>();

          for (const op of ops) {
            try {
              apply(ledger, op, held);
            } catch {
              // rejected operations are covered above
            }
          }

          for (const [account, amount] of held) {
            if (burnHeld) {
              ledger.burnReserved(account, amount);
            } else {
              ledger.releaseReserved(account, amount);
            }
          }

          const check = ledger.checkSupply();
          expect(check.settled).toBe(true);
          expect(check.totalSupply).toBe(check.sumOfBalances);
        },
      ),
      { numRuns: 200 },
    );
  });
});
