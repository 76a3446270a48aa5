export type {
  Hex,
  Address,
  Currency,
  CurrencyValue,
  ClaimCondition,
  ClaimerProofs,
  MintPayload,
  SignedPayloadOutput,
  SignedPayload,
  TransactionState,
  TransactionReceiptSummary,
  TransactionResult,
} from "./types.js";

export {
  ErrorCode,
  TokenError,
  ParseError,
  UnsupportedOperationError,
  SignatureMismatchError,
  MetadataUnavailableError,
  TransactionFailedError,
  RouteNotFoundError,
  isErrorCode,
  errorFromCode,
} from "./errors.js";

export { type BridgeTransport, type BridgeInvocation, toJsonArgs } from "./bridge.js";

export { ZERO_ADDRESS, NATIVE_TOKEN_ADDRESS, DEFAULTS, ROUTES, HEADERS } from "./constants.js";
