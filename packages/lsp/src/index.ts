export {
  BootstrapConfigSchema,
  LspClientConfigSchema,
  MAX_TIMER_MS,
  ServerLaunchConfigSchema,
  defaultLspClientConfig,
  loadBootstrapConfig,
  resolveClientConfig,
  type BootstrapConfig,
  type LspClientConfig,
  type LspClientConfigInput,
  type ServerLaunchConfig,
} from './config.js';
export { DebugLogger, type LogLevel } from './debug/DebugLogger.js';
export {
  ClientClosedError,
  ConfigError,
  DecodeError,
  ProtocolViolationError,
  RequestCancelledError,
  RequestTimeoutError,
  ResponseError,
  TransportError,
  type ProtocolViolationCode,
  type TransportErrorCode,
} from './errors.js';
export {
  parseMessage,
  serializeNotification,
  serializeRequest,
  serializeResponse,
  type InboundMessage,
  type NotificationMessage,
  type RequestId,
  type ResponseErrorPayload,
  type ResponseMessage,
  type ServerRequestMessage,
} from './protocol/messages.js';
export {
  InitializeResultSchema,
  defaultInitializeParams,
  initializeServer,
  shutdownServer,
  type InitializeResultSummary,
} from './service/handshake.js';
export {
  CANCEL_REQUEST_METHOD,
  LspClient,
  createLspClient,
  unwrapResult,
  type ClientState,
  type LspClientOptions,
  type RequestOptions,
  type RequestResult,
  type ResultSchema,
  type ServerRequestHandler,
} from './service/lsp-client.js';
export {
  NotificationQueue,
  type NotificationHandler,
} from './service/notification-queue.js';
export {
  spawnLanguageServer,
  type LanguageServerProcess,
  type ServerExit,
} from './service/server-process.js';
export { encodeFrame, FrameDecoder } from './transport/framing.js';
