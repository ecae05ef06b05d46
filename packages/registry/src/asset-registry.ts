/**
 * @relaymint/registry — In-memory asset registry.
 *
 * A standard non-fungible registry for one ledger: ownership,
 * single-asset approvals, operator approvals, privileged mint/burn,
 * privileged custody moves, a transfer hook and safe-transfer
 * receiver callbacks.
 *
 * API surface:
 * - exists() / ownerOf() / assetsOf() — Ownership queries
 * - approve() / setApprovalForAll() — Delegation
 * - transferCustody() — Move an asset (caller must be authorized)
 * - mint() / burn() — Privileged supply changes
 * - revert() — Undo the caller's latest move of an asset
 * - setTransferHook() — Veto point run before every ownership change
 * - registerReceiver() — Notification run after an asset arrives
 */

import type { Address, AssetId, LedgerId } from "@relaymint/types";
import { NULL_ADDRESS } from "@relaymint/types";
import type {
  AssetReceiver,
  TransferContext,
  TransferHook,
  WrappedAssetRegistry,
} from "./types.js";
import { RegistryError } from "./types.js";

interface RecordedMove {
  readonly ctx: TransferContext;
  readonly previousApproval: Address | undefined;
}

export interface InMemoryAssetRegistryOptions {
  readonly ledgerId: LedgerId;
  /** May mint and burn */
  readonly minters?: readonly Address[] | undefined;
  /** May move any asset without an approval */
  readonly custodians?: readonly Address[] | undefined;
}

/**
 * Asset registry backed by plain maps. All changes are synchronous and
 * either complete or leave the registry untouched.
 */
export class InMemoryAssetRegistry implements WrappedAssetRegistry {
  readonly ledgerId: LedgerId;
  private readonly _owners = new Map<AssetId, Address>();
  private readonly _approvals = new Map<AssetId, Address>();
  private readonly _operators = new Map<Address, Set<Address>>();
  private readonly _minters: Set<Address>;
  private readonly _custodians: Set<Address>;
  private readonly _receivers = new Map<Address, AssetReceiver>();
  private readonly _lastMoves = new Map<AssetId, RecordedMove>();
  private _hook: TransferHook | undefined;

  constructor(options: InMemoryAssetRegistryOptions) {
    this.ledgerId = options.ledgerId;
    this._minters = new Set(options.minters ?? []);
    this._custodians = new Set(options.custodians ?? []);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  exists(assetId: AssetId): boolean {
    return this._owners.has(assetId);
  }

  ownerOf(assetId: AssetId): Address {
    const owner = this._owners.get(assetId);
    if (owner === undefined) {
      throw new RegistryError(
        "NONEXISTENT_ASSET",
        `Asset ${assetId.toString()} does not exist on ${this.ledgerId}`,
      );
    }
    return owner;
  }

  assetsOf(owner: Address): readonly AssetId[] {
    const result: AssetId[] = [];
    for (const [assetId, holder] of this._owners) {
      if (holder === owner) result.push(assetId);
    }
    return result;
  }

  allAssets(): readonly AssetId[] {
    return [...this._owners.keys()];
  }

  get totalSupply(): number {
    return this._owners.size;
  }

  getApproved(assetId: AssetId): Address | undefined {
    return this._approvals.get(assetId);
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this._operators.get(owner)?.has(operator) ?? false;
  }

  isAuthorized(spender: Address, assetId: AssetId): boolean {
    const owner = this._owners.get(assetId);
    if (owner === undefined) return false;
    return (
      owner === spender ||
      this._approvals.get(assetId) === spender ||
      this.isApprovedForAll(owner, spender)
    );
  }

  isMinter(address: Address): boolean {
    return this._minters.has(address);
  }

  isCustodian(address: Address): boolean {
    return this._custodians.has(address);
  }

  // ─── Delegation ──────────────────────────────────────────────────────

  approve(caller: Address, spender: Address, assetId: AssetId): void {
    const owner = this.ownerOf(assetId);
    if (caller !== owner && !this.isApprovedForAll(owner, caller)) {
      throw new RegistryError(
        "NOT_AUTHORIZED",
        `${caller} may not approve spenders for asset ${assetId.toString()}`,
      );
    }
    this._approvals.set(assetId, spender);
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    let operators = this._operators.get(caller);
    if (operators === undefined) {
      operators = new Set();
      this._operators.set(caller, operators);
    }
    if (approved) {
      operators.add(operator);
    } else {
      operators.delete(operator);
    }
  }

  // ─── Administration ──────────────────────────────────────────────────

  addMinter(address: Address): void {
    this._minters.add(address);
  }

  setTransferHook(hook: TransferHook | undefined): void {
    this._hook = hook;
  }

  registerReceiver(address: Address, receiver: AssetReceiver): void {
    this._receivers.set(address, receiver);
  }

  unregisterReceiver(address: Address): void {
    this._receivers.delete(address);
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  transferCustody(caller: Address, from: Address, to: Address, assetId: AssetId): void {
    const owner = this.ownerOf(assetId);
    if (owner !== from) {
      throw new RegistryError(
        "OWNER_MISMATCH",
        `Asset ${assetId.toString()} is owned by ${owner}, not ${from}`,
      );
    }
    this._assertRecipient(to);
    if (!this.isAuthorized(caller, assetId) && !this._custodians.has(caller)) {
      throw new RegistryError(
        "NOT_AUTHORIZED",
        `${caller} is not authorized to move asset ${assetId.toString()}`,
      );
    }

    this._move({ operator: caller, from, to, assetId });
  }

  mint(caller: Address, to: Address, assetId: AssetId): void {
    this._assertMinter(caller);
    this._assertRecipient(to);
    if (this._owners.has(assetId)) {
      throw new RegistryError(
        "ASSET_EXISTS",
        `Asset ${assetId.toString()} already exists on ${this.ledgerId}`,
      );
    }

    this._move({ operator: caller, from: NULL_ADDRESS, to, assetId });
  }

  burn(caller: Address, assetId: AssetId): void {
    this._assertMinter(caller);
    const owner = this.ownerOf(assetId);

    this._move({ operator: caller, from: owner, to: NULL_ADDRESS, assetId });
  }

  revert(caller: Address, assetId: AssetId): void {
    const last = this._lastMoves.get(assetId);
    if (last === undefined || last.ctx.operator !== caller) {
      throw new RegistryError(
        "NOT_AUTHORIZED",
        `${caller} has no move of asset ${assetId.toString()} to revert`,
      );
    }

    this._lastMoves.delete(assetId);
    this._setOwner(assetId, last.ctx.from);
    if (last.previousApproval !== undefined) {
      this._approvals.set(assetId, last.previousApproval);
    } else {
      this._approvals.delete(assetId);
    }
  }

  // ─── Internals ───────────────────────────────────────────────────────

  /**
   * Apply one ownership change: hook first, then state, then receiver.
   * A throwing receiver restores the previous owner and approval.
   */
  private _move(ctx: TransferContext): void {
    this._hook?.(ctx);

    const previousApproval = this._approvals.get(ctx.assetId);
    const previousMove = this._lastMoves.get(ctx.assetId);
    this._approvals.delete(ctx.assetId);
    this._setOwner(ctx.assetId, ctx.to);
    this._lastMoves.set(ctx.assetId, { ctx, previousApproval });

    const receiver = this._receivers.get(ctx.to);
    if (receiver === undefined) return;

    try {
      receiver.onAssetReceived(ctx);
    } catch (err) {
      this._setOwner(ctx.assetId, ctx.from);
      if (previousApproval !== undefined) {
        this._approvals.set(ctx.assetId, previousApproval);
      }
      if (previousMove !== undefined) {
        this._lastMoves.set(ctx.assetId, previousMove);
      } else {
        this._lastMoves.delete(ctx.assetId);
      }
      throw err;
    }
  }

  private _setOwner(assetId: AssetId, owner: Address): void {
    if (owner === NULL_ADDRESS) {
      this._owners.delete(assetId);
    } else {
      this._owners.set(assetId, owner);
    }
  }

  private _assertMinter(caller: Address): void {
    if (!this._minters.has(caller)) {
      throw new RegistryError(
        "NOT_MINTER",
        `${caller} is not a minter on ${this.ledgerId}`,
      );
    }
  }

  private _assertRecipient(to: Address): void {
    if (to === NULL_ADDRESS) {
      throw new RegistryError("INVALID_RECIPIENT", "Cannot transfer to the null address");
    }
  }
}
