/**
 * @shardvault/vault: Share metadata.
 *
 * Fungible-token metadata of a vault's shares. Icon and media are
 * passed through verbatim.
 */

import { SHARE_DECIMALS } from "@shardvault/ledger";
import { VaultError } from "./types.js";

/** Metadata standard the shares follow. */
export const FT_METADATA_SPEC = "vault-share-ft-1.0.0";

export interface ShareMetadata {
  readonly spec: string;
  readonly name: string;
  readonly symbol: string;
  readonly icon: string | null;
  readonly reference: string | null;
  /** Base64 SHA-256 of the reference document */
  readonly referenceHash: string | null;
  readonly decimals: number;
}

export function buildMetadata(name: string, symbol: string, media: string): ShareMetadata {
  return {
    spec: FT_METADATA_SPEC,
    name,
    symbol,
    icon: media,
    reference: null,
    referenceHash: null,
    decimals: SHARE_DECIMALS,
  };
}

/**
 * Reject metadata with the wrong spec, or with a reference and hash
 * that are not both set, or a hash that is not 32 bytes.
 */
export function assertValidMetadata(metadata: ShareMetadata): void {
  if (metadata.spec !== FT_METADATA_SPEC) {
    throw new VaultError("INVALID_METADATA", `Metadata spec must be "${FT_METADATA_SPEC}"`);
  }
  if ((metadata.reference === null) !== (metadata.referenceHash === null)) {
    throw new VaultError(
      "INVALID_METADATA",
      "Reference and reference hash must be present together",
    );
  }
  if (metadata.referenceHash !== null) {
    const bytes = Buffer.from(metadata.referenceHash, "base64");
    if (bytes.length !== 32) {
      throw new VaultError("INVALID_METADATA", "Reference hash has to be 32 bytes");
    }
  }
}
