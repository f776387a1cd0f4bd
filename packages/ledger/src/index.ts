/**
 * @shardvault/ledger: Share ledger engine.
 *
 * A pure TypeScript share ledger with zero runtime dependencies.
 * Enforces the supply invariant of a vault's claim units:
 * - totalSupply equals the sum of balances plus the reserve
 * - All arithmetic uses bigint bounded to u128 (no wrapping)
 * - Burns and account closures are reported through hooks
 */

// Core engine
export { ShareLedger } from "./share-ledger.js";

// Share arithmetic
export {
  U128_MAX,
  SHARE_DECIMALS,
  ONE_SHARE,
  checkedAdd,
  checkedSub,
  checkedMul,
  checkedDiv,
  parseU128,
  parseShares,
  formatShares,
} from "./share-math.js";

// Types
export type {
  LedgerErrorCode,
  LedgerHooks,
  SupplyCheck,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
