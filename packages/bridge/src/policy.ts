/**
 * Bridge Policy — the state and rules both roles share.
 *
 * Composes:
 * - FeeSchedule: required fee per destination
 * - FeeEscrow: collected fees awaiting withdrawal
 * - Payments: the native value a bridge-out takes from its caller
 * - ReentrancyGuard: one operation at a time per role
 * - EventLog: committed events
 * - Pause state and trusted remotes
 *
 * Every mutating operation of a role runs through `execute`, which
 * holds the guard, gives the operation an undo journal and a place to
 * stage events, rolls back on any throw and publishes on commit.
 *
 * Pause gates debit and credit only. Administration, fee withdrawal and
 * emergency recovery stay available while paused.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { Address, AssetId, DomainEvent, EventSource, LedgerId } from "@relaymint/types";
import { NULL_ADDRESS } from "@relaymint/types";
import type { PaymentChannel, PayoutChannel } from "@relaymint/registry";
import { BridgeError, toBridgeError } from "./errors.js";
import { EventLog } from "./event-log.js";
import type { StagedEvent } from "./event-log.js";
import { FeeEscrow } from "./fee-escrow.js";
import { FeeSchedule } from "./fee-schedule.js";
import type { FeeScheduleUpdate } from "./fee-schedule.js";
import { ReentrancyGuard } from "./guard.js";
import { UndoJournal } from "./journal.js";
import type { RoleStatus } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type PauseState = "active" | "paused";

export interface BridgePolicyOptions {
  readonly source: EventSource;
  readonly ledgerId: LedgerId;
  /** Address of the role this policy belongs to */
  readonly address: Address;
  readonly admin: Address;
  readonly payouts: PayoutChannel;
  /** Debited by bridge-out payments */
  readonly payments: PaymentChannel;
  readonly feeSchedule?: FeeScheduleUpdate | undefined;
  /** counterpart ledger → counterpart role address */
  readonly trustedRemotes?: Readonly<Record<LedgerId, Address>> | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Names an operation for the guard and the logs.
 */
export interface OperationScope {
  readonly operation: string;
  readonly actor: Address;
  readonly assetId?: AssetId | undefined;
}

/**
 * Handed to an operation while it runs.
 */
export interface OperationContext {
  readonly journal: UndoJournal;
  stage(
    type: StagedEvent["type"],
    correlationId: string,
    payload: DomainEvent["payload"],
  ): void;
}

// =============================================================================
// Policy
// =============================================================================

export class BridgePolicy {
  readonly source: EventSource;
  readonly ledgerId: LedgerId;
  readonly address: Address;
  readonly admin: Address;
  readonly fees: FeeSchedule;
  readonly escrow: FeeEscrow = new FeeEscrow();
  readonly events: EventLog;
  readonly logger: Logger;
  private readonly _guard = new ReentrancyGuard();
  private readonly _payouts: PayoutChannel;
  private readonly _payments: PaymentChannel;
  private readonly _trusted = new Map<LedgerId, Address>();
  private _state: PauseState = "active";

  constructor(options: BridgePolicyOptions) {
    if (options.admin === NULL_ADDRESS) {
      throw new BridgeError("NOT_ADMIN", "The administrator cannot be the null address");
    }

    this.source = options.source;
    this.ledgerId = options.ledgerId;
    this.address = options.address;
    this.admin = options.admin;
    this._payouts = options.payouts;
    this._payments = options.payments;
    this.fees = new FeeSchedule(options.feeSchedule);
    this.logger = (options.logger ?? pino({ level: "silent" })).child({
      role: options.source,
      ledgerId: options.ledgerId,
    });
    this.events = new EventLog(options.source, options.ledgerId, this.logger);

    for (const [ledgerId, remote] of Object.entries(options.trustedRemotes ?? {})) {
      this._trusted.set(ledgerId, remote);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // State
  // ───────────────────────────────────────────────────────────────────────

  get state(): PauseState {
    return this._state;
  }

  get paused(): boolean {
    return this._state === "paused";
  }

  /** True while an operation holds the reentrancy guard. */
  get busy(): boolean {
    return this._guard.held;
  }

  trustedRemote(ledgerId: LedgerId): Address | undefined {
    return this._trusted.get(ledgerId);
  }

  trustedRemotes(): Readonly<Record<LedgerId, Address>> {
    return Object.fromEntries(this._trusted);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checks
  // ───────────────────────────────────────────────────────────────────────

  assertAdmin(caller: Address): void {
    if (caller !== this.admin) {
      throw new BridgeError("NOT_ADMIN", `${caller} is not the administrator`);
    }
  }

  assertActive(): void {
    if (this._state === "paused") {
      throw new BridgeError("PAUSED", `Bridge on "${this.ledgerId}" is paused`);
    }
  }

  assertRecipient(recipient: Address): void {
    if (recipient === NULL_ADDRESS || recipient.trim() === "") {
      throw new BridgeError("NULL_RECIPIENT", "Recipient must not be the null address");
    }
  }

  /**
   * The transport attests where a message came from; only the
   * registered counterpart on that ledger is believed.
   */
  assertTrustedSource(sourceLedger: LedgerId, sender: Address): void {
    const trusted = this._trusted.get(sourceLedger);
    if (trusted === undefined || trusted !== sender) {
      throw new BridgeError(
        "UNTRUSTED_SOURCE",
        `Message from ${sender} on "${sourceLedger}" is not from a trusted counterpart`,
      );
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` as one indivisible operation: guarded against reentry,
   * rolled back in full on any throw, events published only on commit.
   */
  execute<T>(scope: OperationScope, fn: (ctx: OperationContext) => T): T {
    const { operation, actor } = scope;
    const fields = {
      operation,
      actor,
      ...(scope.assetId !== undefined ? { assetId: scope.assetId.toString() } : {}),
    };

    return this._guard.run(operation, () => {
      const journal = new UndoJournal();
      const staged: StagedEvent[] = [];
      const ctx: OperationContext = {
        journal,
        stage: (type, correlationId, payload) => {
          staged.push({ type, actor, correlationId, payload });
        },
      };

      try {
        const result = fn(ctx);
        this.events.publish(staged);
        this.logger.info({ ...fields, events: staged.length }, `${operation} committed`);
        return result;
      } catch (err) {
        const error = toBridgeError(err);
        try {
          journal.rollback(error);
        } catch (rollbackError) {
          this.logger.fatal(
            { ...fields, code: error.code, reason: error.message, err: rollbackError },
            `${operation} rollback failed after ${error.code}`,
          );
          throw rollbackError;
        }
        this.logger.warn(
          { ...fields, code: error.code, kind: error.kind },
          `${operation} rejected: ${error.message}`,
        );
        throw error;
      }
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  pause(caller: Address): void {
    this.execute({ operation: "pause", actor: caller }, (ctx) => {
      this.assertAdmin(caller);
      this._transition("active", "paused", ctx);
      ctx.stage("bridge.paused", `pause:${this.ledgerId}`, {});
    });
  }

  unpause(caller: Address): void {
    this.execute({ operation: "unpause", actor: caller }, (ctx) => {
      this.assertAdmin(caller);
      this._transition("paused", "active", ctx);
      ctx.stage("bridge.unpaused", `unpause:${this.ledgerId}`, {});
    });
  }

  setFeeSchedule(caller: Address, update: FeeScheduleUpdate): void {
    this.execute({ operation: "setFeeSchedule", actor: caller }, (ctx) => {
      this.assertAdmin(caller);
      const before = this.fees.toJSON();
      this.fees.update(update);
      ctx.journal.record(() => {
        this.fees.restore(before);
      });
      ctx.stage("fee-schedule.updated", `fees:${this.ledgerId}`, {
        classes: JSON.stringify(this.fees.toJSON().classes),
        fees: JSON.stringify(this.fees.toJSON().fees),
      });
    });
  }

  setTrustedRemote(caller: Address, ledgerId: LedgerId, remote: Address | undefined): void {
    this.execute({ operation: "setTrustedRemote", actor: caller }, (ctx) => {
      this.assertAdmin(caller);
      const previous = this._trusted.get(ledgerId);
      if (remote === undefined) {
        this._trusted.delete(ledgerId);
      } else {
        this.assertRecipient(remote);
        this._trusted.set(ledgerId, remote);
      }
      ctx.journal.record(() => {
        if (previous === undefined) {
          this._trusted.delete(ledgerId);
        } else {
          this._trusted.set(ledgerId, previous);
        }
      });
      ctx.stage("remote.trusted", `remote:${ledgerId}`, {
        ledgerId,
        remote: remote ?? null,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Payments
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Take `amount` from `payer` for the running operation. Rolling the
   * operation back returns it.
   *
   * @throws {BridgeError} INSUFFICIENT_PAYMENT if `payer` holds less
   */
  collectPayment(payer: Address, amount: bigint, journal: UndoJournal): void {
    if (amount === 0n) return;
    try {
      this._payments.charge(payer, amount);
    } catch (err) {
      throw toBridgeError(err);
    }
    journal.record(() => {
      this._payments.deposit(payer, amount);
    });
  }

  /**
   * Sweep the whole escrow to `recipient`.
   *
   * @returns the amount paid out
   */
  withdrawFees(caller: Address, recipient: Address): bigint {
    return this.execute({ operation: "withdrawFees", actor: caller }, (ctx) => {
      this.assertAdmin(caller);
      this.assertRecipient(recipient);
      if (this.escrow.balance === 0n) {
        throw new BridgeError("NO_FEES", "There are no fees to withdraw");
      }

      const amount = this.escrow.sweep(ctx.journal);
      try {
        this._payouts.send(recipient, amount);
      } catch (err) {
        if (err instanceof BridgeError) throw err;
        throw new BridgeError(
          "WITHDRAWAL_FAILED",
          `Paying ${amount.toString()} to ${recipient} failed`,
          { cause: err },
        );
      }

      ctx.stage("fees.withdrawn", `withdraw:${this.ledgerId}`, {
        recipient,
        amount: amount.toString(),
      });
      return amount;
    });
  }

  /**
   * JSON-safe view of the shared state.
   */
  snapshot(): RoleStatus {
    return {
      kind: this.source,
      ledgerId: this.ledgerId,
      address: this.address,
      admin: this.admin,
      state: this._state,
      escrow: this.escrow.toJSON(),
      feeSchedule: this.fees.toJSON(),
      trustedRemotes: this.trustedRemotes(),
    };
  }

  private _transition(from: PauseState, to: PauseState, ctx: OperationContext): void {
    if (this._state !== from) {
      throw new BridgeError(
        "INVALID_PAUSE_TRANSITION",
        `Cannot move from "${this._state}" to "${to}"`,
      );
    }
    this._state = to;
    ctx.journal.record(() => {
      this._state = from;
    });
  }
}
