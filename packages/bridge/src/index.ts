/**
 * @relaymint/bridge — Lock–mint–burn–unlock roles for cross-ledger assets.
 *
 * Core exports:
 * - OriginCustodian — lock on debit, unlock on credit
 * - DestinationIssuer — burn on debit, mint on credit, transfer validation, royalties
 * - BridgePolicy — fees, escrow, pause, reentrancy guard, trusted remotes
 * - createLocalNetwork — a whole deployment on simulated collaborators
 */

// Roles
export { OriginCustodian } from "./custodian.js";
export type { CustodianStatus, LockEntry, OriginCustodianOptions } from "./custodian.js";

export { DestinationIssuer, MAX_BASIS_POINTS } from "./issuer.js";
export type {
  DestinationIssuerOptions,
  IssuerStatus,
  RoyaltyConfig,
  RoyaltyQuote,
} from "./issuer.js";

export { BridgeRole } from "./role.js";
export type { RoleOptions } from "./role.js";

export { AllowlistTransferValidator } from "./validators.js";
export type { TransferValidator } from "./validators.js";

// Policy
export { BridgePolicy } from "./policy.js";
export type {
  BridgePolicyOptions,
  OperationContext,
  OperationScope,
  PauseState,
} from "./policy.js";

export { FeeSchedule } from "./fee-schedule.js";
export type { FeeScheduleUpdate, FeeScheduleView } from "./fee-schedule.js";

export { FeeEscrow } from "./fee-escrow.js";
export type { FeeEscrowView } from "./fee-escrow.js";

export { EventLog } from "./event-log.js";
export type { EventListener, StagedEvent } from "./event-log.js";

export { ReentrancyGuard } from "./guard.js";
export { UndoJournal } from "./journal.js";

export { MessageDispatcher } from "./dispatch.js";
export type { PreparedMessage } from "./dispatch.js";

// Errors
export { BridgeError, ERROR_KINDS, toBridgeError } from "./errors.js";
export type { BridgeErrorCode, BridgeErrorKind } from "./errors.js";

// Configuration & wiring
export { AmountSchema, NetworkConfigSchema, parseNetworkConfig } from "./config.js";
export type { NetworkConfig, NetworkConfigInput } from "./config.js";

export { createLocalNetwork } from "./local-network.js";
export type { LedgerNode, LocalNetwork, LocalNetworkOptions } from "./local-network.js";

// Types
export type {
  BridgeOutOptions,
  BridgeQuote,
  BridgeReceipt,
  BridgeableRole,
  RoleStatus,
} from "./types.js";
