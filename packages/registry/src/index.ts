/**
 * @relaymint/registry — Ledger-side collaborators of the bridge.
 *
 * In-process stand-ins for the pieces a real deployment gets from the
 * ledger itself:
 * - A non-fungible asset registry with approvals and privileged mint/burn
 * - A native value book that pays for bridge-outs and receives fee
 *   payouts and transport refunds
 *
 * The bridge depends only on the interfaces exported here.
 */

export { InMemoryAssetRegistry } from "./asset-registry.js";
export type { InMemoryAssetRegistryOptions } from "./asset-registry.js";

export { NativeBalances } from "./native-balances.js";

export type {
  TransferContext,
  TransferHook,
  AssetReceiver,
  AssetRegistry,
  WrappedAssetRegistry,
  PayoutChannel,
  PaymentChannel,
  PayoutHook,
  RegistryErrorCode,
} from "./types.js";

export { RegistryError } from "./types.js";
