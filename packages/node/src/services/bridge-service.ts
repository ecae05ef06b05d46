/**
 * BridgeService — Composition root over a local deployment.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns the LocalNetwork, answers
 * custody queries, forwards administration to the roles, drives the
 * in-memory transport, and runs custody audits.
 *
 * Every value leaving the service is JSON-safe (bigints as strings).
 */

import type { Logger } from "pino";
import type { Address, AssetId, LedgerId } from "@relaymint/types";
import { BridgeError, OriginCustodian, createLocalNetwork } from "@relaymint/bridge";
import type {
  BridgeRole,
  LedgerNode,
  LocalNetwork,
  NetworkConfigInput,
  RoleStatus,
} from "@relaymint/bridge";
import type { DeliveryResult } from "@relaymint/transport";
import {
  auditCustodyInvariants,
  computeNetworkStateHash,
  observeNetwork,
} from "@relaymint/verify";
import type { InvariantAuditResult, NetworkStateHash } from "@relaymint/verify";
import type { AssetView, DeliveryView, EnvelopeView, QuoteView } from "../types/dto.js";

// =============================================================================
// Types
// =============================================================================

export interface BridgeServiceOptions {
  readonly network: NetworkConfigInput;
  readonly logger?: Logger | undefined;
}

export interface AuditReport {
  readonly audit: InvariantAuditResult;
  readonly stateHash: NetworkStateHash;
}

// =============================================================================
// Service
// =============================================================================

export class BridgeService {
  readonly network: LocalNetwork;

  constructor(options: BridgeServiceOptions) {
    this.network = createLocalNetwork(options.network, { logger: options.logger });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  ledgerIds(): readonly LedgerId[] {
    return this.network.ledgers.map((node) => node.ledgerId);
  }

  roles(): readonly RoleStatus[] {
    return this.network.ledgers.map((node) => node.role.status());
  }

  role(ledgerId: LedgerId): BridgeRole | undefined {
    return this._node(ledgerId)?.role;
  }

  status(ledgerId: LedgerId): RoleStatus | undefined {
    return this._node(ledgerId)?.role.status();
  }

  /**
   * Custody of one asset on one ledger. Undefined for an unknown ledger.
   */
  asset(ledgerId: LedgerId, assetId: AssetId): AssetView | undefined {
    const node = this._node(ledgerId);
    if (node === undefined) return undefined;

    const exists = node.registry.exists(assetId);
    const lock =
      node.role instanceof OriginCustodian ? node.role.lockOf(assetId) : undefined;

    return {
      ledgerId,
      assetId: assetId.toString(),
      exists,
      owner: exists ? node.registry.ownerOf(assetId) : null,
      custodied: node.role.holds(assetId),
      lock:
        lock === undefined
          ? null
          : {
              originalHolder: lock.originalHolder,
              destination: lock.destination,
              messageId: lock.messageId,
              lockedAt: lock.lockedAt,
            },
    };
  }

  /**
   * @throws {BridgeError} UNSUPPORTED_DESTINATION
   */
  quote(ledgerId: LedgerId, destination: LedgerId, assetId: AssetId): QuoteView | undefined {
    const role = this.role(ledgerId);
    if (role === undefined) return undefined;

    const quote = role.quoteBridge(destination, assetId);
    return {
      destination,
      fee: quote.fee.toString(),
      deliveryCost: quote.deliveryCost.toString(),
      total: quote.total.toString(),
    };
  }

  // ─── Administration ──────────────────────────────────────────────────

  pause(ledgerId: LedgerId, caller: Address): RoleStatus | undefined {
    const role = this.role(ledgerId);
    if (role === undefined) return undefined;
    role.pause(caller);
    return role.status();
  }

  unpause(ledgerId: LedgerId, caller: Address): RoleStatus | undefined {
    const role = this.role(ledgerId);
    if (role === undefined) return undefined;
    role.unpause(caller);
    return role.status();
  }

  /**
   * @returns The amount paid out, as a decimal string
   */
  withdrawFees(ledgerId: LedgerId, caller: Address, recipient: Address): string | undefined {
    const role = this.role(ledgerId);
    if (role === undefined) return undefined;
    return role.withdrawFees(caller, recipient).toString();
  }

  // ─── Transport ───────────────────────────────────────────────────────

  pending(): readonly EnvelopeView[] {
    return this.network.transport.pending().map((envelope) => ({
      messageId: envelope.messageId,
      sourceLedger: envelope.sourceLedger,
      destinationLedger: envelope.destinationLedger,
      sender: envelope.sender,
      nonce: envelope.nonce,
      deliveryCost: envelope.deliveryCost.toString(),
    }));
  }

  /**
   * Deliver one pending message, the oldest when no id is given.
   * Undefined when nothing is pending.
   *
   * @throws {TransportError} UNKNOWN_MESSAGE for an unknown or already delivered id
   */
  deliver(messageId?: string): DeliveryView | undefined {
    const transport = this.network.transport;
    const result = messageId === undefined ? transport.deliverNext() : transport.deliver(messageId);
    return result === undefined ? undefined : toDeliveryView(result);
  }

  // ─── Audit ───────────────────────────────────────────────────────────

  audit(): AuditReport {
    const observation = observeNetwork(this.network);
    return {
      audit: auditCustodyInvariants(observation),
      stateHash: computeNetworkStateHash(observation),
    };
  }

  private _node(ledgerId: LedgerId): LedgerNode<BridgeRole> | undefined {
    return this.network.ledgers.find((node) => node.ledgerId === ledgerId);
  }
}

function toDeliveryView(result: DeliveryResult): DeliveryView {
  if (result.status === "delivered") {
    return { messageId: result.messageId, status: "delivered", attempt: result.attempt };
  }

  const error =
    result.error instanceof BridgeError
      ? { code: result.error.code, message: result.error.message }
      : {
          code: "INTERNAL_ERROR",
          message: result.error instanceof Error ? result.error.message : String(result.error),
        };
  return { messageId: result.messageId, status: "failed", attempt: result.attempt, error };
}
