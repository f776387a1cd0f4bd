/**
 * Account Types
 *
 * Identities of the principals that hold balances, sign requests
 * and host deployed components.
 *
 * Rules:
 * - Account ids are plain strings validated by isValidAccountId
 * - An asset-origin class is identified by the account of the
 *   asset registry that issues it
 */

/**
 * Human-readable account identifier (e.g. "alice.sandbox",
 * "yti.registry.sandbox").
 */
export type AccountId = string;

/**
 * Identity of an asset-origin class: the account of the asset
 * registry that owns and transfers the unique assets of that class.
 */
export type AssetOriginId = AccountId;

/**
 * Identifier of a single unique asset within its origin class.
 */
export type AssetId = string;

/** Shortest account id the host accepts. */
export const MIN_ACCOUNT_ID_LENGTH = 2;

/** Longest account id the host accepts. */
export const MAX_ACCOUNT_ID_LENGTH = 64;

/**
 * Lowercase alphanumeric parts joined by single '-' or '_',
 * with optional '.'-separated parents.
 */
const ACCOUNT_ID_PATTERN = /^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/;

/**
 * Check an account id against the host's naming rule.
 */
export function isValidAccountId(value: unknown): value is AccountId {
  return (
    typeof value === "string" &&
    value.length >= MIN_ACCOUNT_ID_LENGTH &&
    value.length <= MAX_ACCOUNT_ID_LENGTH &&
    ACCOUNT_ID_PATTERN.test(value)
  );
}

/**
 * True when `accountId` is a direct sub-account of `parentId`
 * ("vault.registry" is a sub-account of "registry").
 */
export function isSubAccountOf(accountId: AccountId, parentId: AccountId): boolean {
  if (!accountId.endsWith(`.${parentId}`)) return false;
  const prefix = accountId.slice(0, accountId.length - parentId.length - 1);
  return prefix.length > 0 && !prefix.includes(".");
}
