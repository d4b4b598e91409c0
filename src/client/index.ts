export { DaemonClient, DEFAULT_SOCKET_PATH } from "./client.js";
export type { DaemonClientOptions } from "./client.js";
export { parseChange, parseEnvelope, toApiError } from "./envelope.js";
export {
  ApiError,
  ChangeError,
  ClientError,
  DecodeError,
  RequestError,
  isWrapper,
  rootCause,
} from "./errors.js";
export type { ApiErrorDetails } from "./errors.js";
export { HttpTransport } from "./transport.js";
export type { HttpTransportOptions } from "./transport.js";
export type {
  AsyncEnvelope,
  Change,
  Envelope,
  ErrorEnvelope,
  ErrorResult,
  HttpMethod,
  SyncEnvelope,
  Transport,
  TransportRequest,
  TransportResponse,
  WaitOptions,
} from "./types.js";
