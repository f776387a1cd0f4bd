/**
 * Settlement Book: saga intents for asset transfers.
 *
 * Every confirmed-mode deposit, withdrawal and swap opens an intent
 * with one leg per asset transfer. Callbacks resolve the legs; the
 * intent's status follows from its legs.
 *
 * Rules:
 * - Intents are append-only (state transitions, never deletion)
 * - A leg moves pending → confirmed or pending → failed, once
 * - An intent is pending while any leg is pending, then settled,
 *   failed or partially_failed
 */

import type { AccountId, AssetId } from "@shardvault/types";
import type {
  LegStatus,
  SettlementIntent,
  SettlementKind,
  SettlementLeg,
  SettlementStatus,
} from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<LegStatus, readonly LegStatus[]> = {
  pending: ["confirmed", "failed"],
  confirmed: [],
  failed: [],
};

export interface OpenSettlement {
  readonly kind: SettlementKind;
  readonly accountId: AccountId;
  readonly legs: readonly { readonly assetId: AssetId; readonly receiverId: AccountId }[];
  readonly unitValue: bigint;
  readonly blockHeight: number;
}

export interface SettlementBookSnapshot {
  readonly sequence: number;
  readonly intents: readonly SettlementIntent[];
}

// =============================================================================
// Settlement Book
// =============================================================================

export class SettlementBook {
  private readonly intents: Map<string, SettlementIntent> = new Map();
  private sequence = 0;

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  open(params: OpenSettlement): SettlementIntent {
    const id = `${params.kind}-${String(this.sequence)}`;
    this.sequence++;

    const intent: SettlementIntent = {
      id,
      kind: params.kind,
      accountId: params.accountId,
      status: "pending",
      legs: params.legs.map((leg): SettlementLeg => ({ ...leg, status: "pending" })),
      unitValue: params.unitValue.toString(),
      openedAtBlock: params.blockHeight,
    };
    this.intents.set(id, intent);
    return intent;
  }

  confirmLeg(intentId: string, assetId: AssetId, blockHeight: number): SettlementIntent {
    return this.resolveLeg(intentId, assetId, { status: "confirmed", resolvedAtBlock: blockHeight });
  }

  failLeg(
    intentId: string,
    assetId: AssetId,
    reason: string,
    blockHeight: number,
  ): SettlementIntent {
    return this.resolveLeg(intentId, assetId, {
      status: "failed",
      reason,
      resolvedAtBlock: blockHeight,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(id: string): SettlementIntent | undefined {
    return this.intents.get(id);
  }

  require(id: string): SettlementIntent {
    const intent = this.intents.get(id);
    if (!intent) {
      throw new VaultError("SETTLEMENT_NOT_FOUND", `Settlement '${id}' not found`);
    }
    return intent;
  }

  /**
   * List all intents in opening order, optionally filtered by status.
   */
  list(status?: SettlementStatus): readonly SettlementIntent[] {
    const all = [...this.intents.values()];
    return status ? all.filter((i) => i.status === status) : all;
  }

  get count(): number {
    return this.intents.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): SettlementBookSnapshot {
    return { sequence: this.sequence, intents: [...this.intents.values()] };
  }

  restore(snapshot: SettlementBookSnapshot): void {
    this.intents.clear();
    for (const intent of snapshot.intents) {
      this.intents.set(intent.id, intent);
    }
    this.sequence = snapshot.sequence;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private resolveLeg(
    intentId: string,
    assetId: AssetId,
    resolution: Pick<SettlementLeg, "status" | "reason" | "resolvedAtBlock">,
  ): SettlementIntent {
    const intent = this.require(intentId);
    const index = intent.legs.findIndex((leg) => leg.assetId === assetId);
    const leg = intent.legs[index];
    if (leg === undefined) {
      throw new VaultError(
        "SETTLEMENT_NOT_FOUND",
        `Settlement '${intentId}' has no leg for asset '${assetId}'`,
      );
    }
    if (!VALID_TRANSITIONS[leg.status].includes(resolution.status)) {
      throw new VaultError(
        "INVALID_TRANSITION",
        `Cannot move leg '${assetId}' of '${intentId}' from '${leg.status}' to '${resolution.status}'`,
      );
    }

    const legs = intent.legs.map((l, i) => (i === index ? { ...l, ...resolution } : l));
    const status = statusOf(legs);
    const updated: SettlementIntent =
      status === "pending"
        ? { ...intent, legs }
        : { ...intent, legs, status, resolvedAtBlock: resolution.resolvedAtBlock };

    this.intents.set(intentId, updated);
    return updated;
  }
}

function statusOf(legs: readonly SettlementLeg[]): SettlementStatus {
  if (legs.some((leg) => leg.status === "pending")) return "pending";
  const confirmed = legs.filter((leg) => leg.status === "confirmed").length;
  if (confirmed === legs.length) return "settled";
  if (confirmed === 0) return "failed";
  return "partially_failed";
}
