/**
 * @shardvault/ledger: Share Ledger.
 *
 * Per-vault mapping of account → share balance plus a total-supply
 * counter. Shares taken out of a balance while a remote step is in
 * flight sit in a reserve until they are burned or released.
 *
 * API surface:
 * - registerAccount() / unregister(): open and close balances
 * - deposit(): mint shares to an account
 * - burn(): destroy shares from an account
 * - transfer(): move shares between registered accounts
 * - reserve() / burnReserved() / releaseReserved(): hold shares
 *   across a pending remote step
 * - checkSupply(): totalSupply == Σ balances + reserved
 * - snapshot() / fromSnapshot(): persistence
 */

import type { AccountId } from "@shardvault/types";
import { checkedAdd, checkedSub, parseU128 } from "./share-math.js";
import type { LedgerHooks, LedgerSnapshot, SupplyCheck } from "./types.js";
import { LedgerError } from "./types.js";

export class ShareLedger {
  private readonly _balances: Map<AccountId, bigint> = new Map();
  private _totalSupply = 0n;
  private _reserved = 0n;
  private readonly _hooks: LedgerHooks;

  constructor(hooks: LedgerHooks = {}) {
    this._hooks = hooks;
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  registerAccount(accountId: AccountId): void {
    if (this._balances.has(accountId)) {
      throw new LedgerError(
        "ACCOUNT_ALREADY_REGISTERED",
        `Account "${accountId}" is already registered`,
      );
    }
    this._balances.set(accountId, 0n);
  }

  isRegistered(accountId: AccountId): boolean {
    return this._balances.has(accountId);
  }

  /**
   * Close an account. A non-zero balance is burned only when `force`
   * is set. Returns the balance the account held when it was closed.
   */
  unregister(accountId: AccountId, force: boolean): bigint {
    const balance = this.requireBalance(accountId);
    if (balance > 0n && !force) {
      throw new LedgerError(
        "NON_ZERO_BALANCE",
        `Account "${accountId}" holds ${balance.toString()} shares; close it with force to burn them`,
      );
    }

    const nextSupply = checkedSub(this._totalSupply, balance);
    this._balances.delete(accountId);
    this._totalSupply = nextSupply;
    this._hooks.onAccountClosed?.(accountId, balance);
    return balance;
  }

  accounts(): readonly AccountId[] {
    return [...this._balances.keys()];
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Balance of an account; unregistered accounts hold nothing.
   */
  balanceOf(accountId: AccountId): bigint {
    return this._balances.get(accountId) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  get reserved(): bigint {
    return this._reserved;
  }

  // ─── Mint / Burn / Transfer ──────────────────────────────────────────

  deposit(accountId: AccountId, amount: bigint): void {
    this.assertPositive(amount);
    const balance = this.requireBalance(accountId);
    const nextBalance = checkedAdd(balance, amount);
    const nextSupply = checkedAdd(this._totalSupply, amount);

    this._balances.set(accountId, nextBalance);
    this._totalSupply = nextSupply;
  }

  burn(accountId: AccountId, amount: bigint): void {
    this.assertPositive(amount);
    const balance = this.requireBalance(accountId);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${accountId}" holds ${balance.toString()} shares, cannot burn ${amount.toString()}`,
      );
    }
    const nextSupply = checkedSub(this._totalSupply, amount);

    this._balances.set(accountId, balance - amount);
    this._totalSupply = nextSupply;
    this._hooks.onTokensBurned?.(accountId, amount);
  }

  transfer(senderId: AccountId, receiverId: AccountId, amount: bigint): void {
    if (senderId === receiverId) {
      throw new LedgerError("SELF_TRANSFER", "Sender and receiver should be different");
    }
    this.assertPositive(amount);
    const senderBalance = this.requireBalance(senderId);
    const receiverBalance = this.requireBalance(receiverId);
    if (senderBalance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${senderId}" holds ${senderBalance.toString()} shares, cannot transfer ${amount.toString()}`,
      );
    }
    const nextReceiver = checkedAdd(receiverBalance, amount);

    this._balances.set(senderId, senderBalance - amount);
    this._balances.set(receiverId, nextReceiver);
  }

  // ─── Reserve ─────────────────────────────────────────────────────────

  /**
   * Take shares out of an account's balance without changing the total
   * supply. They stay reserved until burned or released.
   */
  reserve(accountId: AccountId, amount: bigint): void {
    this.assertPositive(amount);
    const balance = this.requireBalance(accountId);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${accountId}" holds ${balance.toString()} shares, cannot reserve ${amount.toString()}`,
      );
    }
    const nextReserved = checkedAdd(this._reserved, amount);

    this._balances.set(accountId, balance - amount);
    this._reserved = nextReserved;
  }

  /**
   * Destroy reserved shares that were held for `accountId`.
   */
  burnReserved(accountId: AccountId, amount: bigint): void {
    this.assertPositive(amount);
    this.assertReserve(amount);
    const nextSupply = checkedSub(this._totalSupply, amount);

    this._reserved -= amount;
    this._totalSupply = nextSupply;
    this._hooks.onTokensBurned?.(accountId, amount);
  }

  /**
   * Return reserved shares to an account, re-opening it if it was
   * closed while the shares were held.
   */
  releaseReserved(accountId: AccountId, amount: bigint): void {
    this.assertPositive(amount);
    this.assertReserve(amount);
    const nextBalance = checkedAdd(this.balanceOf(accountId), amount);

    this._reserved -= amount;
    this._balances.set(accountId, nextBalance);
  }

  // ─── Invariant ───────────────────────────────────────────────────────

  checkSupply(): SupplyCheck {
    let sumOfBalances = 0n;
    for (const balance of this._balances.values()) {
      sumOfBalances += balance;
    }
    const consistent = this._totalSupply === sumOfBalances + this._reserved;
    return {
      totalSupply: this._totalSupply,
      sumOfBalances,
      reserved: this._reserved,
      consistent,
      settled: consistent && this._reserved === 0n,
    };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      balances: [...this._balances].map(([accountId, balance]) => ({
        accountId,
        balance: balance.toString(),
      })),
      totalSupply: this._totalSupply.toString(),
      reserved: this._reserved.toString(),
    };
  }

  /**
   * Restore a ledger from a snapshot. The snapshot must satisfy the
   * supply invariant.
   */
  static fromSnapshot(snapshot: LedgerSnapshot, hooks: LedgerHooks = {}): ShareLedger {
    const ledger = new ShareLedger(hooks);
    ledger.restore(snapshot);
    return ledger;
  }

  /**
   * Replace this ledger's state with the snapshot's.
   */
  restore(snapshot: LedgerSnapshot): void {
    const balances = new Map<AccountId, bigint>();
    for (const entry of snapshot.balances) {
      balances.set(entry.accountId, parseU128(entry.balance));
    }
    const totalSupply = parseU128(snapshot.totalSupply);
    const reserved = parseU128(snapshot.reserved);

    let sum = 0n;
    for (const balance of balances.values()) sum += balance;
    if (sum + reserved !== totalSupply) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Snapshot total supply ${totalSupply.toString()} does not match balances ${sum.toString()} + reserved ${reserved.toString()}`,
      );
    }

    this._balances.clear();
    for (const [accountId, balance] of balances) {
      this._balances.set(accountId, balance);
    }
    this._totalSupply = totalSupply;
    this._reserved = reserved;
  }

  // ─── Private helpers ─────────────────────────────────────────────────

  private requireBalance(accountId: AccountId): bigint {
    const balance = this._balances.get(accountId);
    if (balance === undefined) {
      throw new LedgerError(
        "ACCOUNT_NOT_REGISTERED",
        `Account "${accountId}" is not registered`,
      );
    }
    return balance;
  }

  private assertPositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Share amounts must be positive, got ${amount.toString()}`,
      );
    }
  }

  private assertReserve(amount: bigint): void {
    if (this._reserved < amount) {
      throw new LedgerError(
        "INSUFFICIENT_RESERVE",
        `Only ${this._reserved.toString()} shares are reserved, cannot settle ${amount.toString()}`,
      );
    }
  }
}
