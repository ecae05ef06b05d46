/**
 * Type barrel — re-exports all public types from @relaymint/node.
 */

// DTOs
export {
  AssetIdSchema,
  QuoteQuerySchema,
  WithdrawFeesSchema,
  DeliverSchema,
} from "./dto.js";
export type {
  QuoteQuery,
  WithdrawFeesDto,
  DeliverDto,
  QuoteView,
  LockView,
  AssetView,
  EnvelopeView,
  DeliveryView,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope, ErrorStatus } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
