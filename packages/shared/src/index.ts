// Types
export type {
  HopAddress,
  TlsOptions,
  ResourceThresholds,
  ServerProfile,
  Command,
  CommandInput,
  BatchMode,
  CommandResult,
  BatchKey,
  BatchEntry,
  Alert,
  AlertSeverity,
  AlertCode,
  FrameType,
  Frame,
  AuthRejectReason,
  HelloPayload,
  ChallengePayload,
  ProofPayload,
  AcceptPayload,
  RejectPayload,
  AuthPayload,
  CommandRequestPayload,
  BatchRequestPayload,
  CommandResponsePayload,
  PingRequestPayload,
  DiskStatus,
  HostStatus,
  PingResponsePayload,
} from './types/index.js';

// Constants
export {
  PROTOCOL_VERSION,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  DEFAULT_RESTART_MAX_WAIT,
  DEFAULT_MONITORING_INTERVAL,
  DEFAULT_HANDSHAKE_TIMEOUT,
  DEFAULT_CONNECT_TIMEOUT,
  RESTART_POLL_INTERVAL,
  DEFAULT_RECONNECT_ATTEMPTS,
  DEFAULT_RECONNECT_BASE_DELAY,
  DEFAULT_RECONNECT_MAX_DELAY,
  DEFAULT_PING_TIMEOUT,
  DEFAULT_PING_FAILURE_THRESHOLD,
  NONCE_WINDOW,
  NONCE_BYTES,
  MAX_FRAME_SIZE,
  FRAME_HEADER_SIZE,
  DEFAULT_ALERT_CAPACITY,
  DEFAULT_LOAD_THRESHOLD,
  DEFAULT_MEMORY_THRESHOLD,
  DEFAULT_DISK_THRESHOLD,
} from './constants.js';

// Schemas
export {
  hopSchema,
  tlsConfigSchema,
  thresholdsSchema,
  serverEntrySchema,
  clientConfigSchema,
} from './schemas/config.schema.js';

export type {
  ServerEntry,
  ClientConfigInput,
  ValidatedClientConfig,
} from './schemas/config.schema.js';

export {
  frameTypeSchema,
  frameSchema,
  authRejectReasonSchema,
  helloPayloadSchema,
  challengePayloadSchema,
  proofPayloadSchema,
  acceptPayloadSchema,
  rejectPayloadSchema,
  hostReplySchema,
  commandRequestSchema,
  batchRequestSchema,
  commandResponseSchema,
  hostStatusSchema,
  pingRequestSchema,
  pingResponseSchema,
} from './schemas/protocol.schema.js';

// Profiles
export { createServerProfile, loadProfiles } from './profile/profile.js';
export type { ServerProfileInput, LoadedConfig } from './profile/profile.js';

// Utilities
export { parseDuration, formatDuration, formatBytes, formatPercent } from './utils/parser.js';

export { createLogger } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export { systemClock } from './utils/clock.js';
export type { Clock } from './utils/clock.js';

export {
  RexecError,
  ConnectError,
  AuthError,
  TimeoutError,
  ProtocolError,
  DisconnectedError,
  SessionClosedError,
  RestartTimeoutError,
  ConfigValidationError,
  ProfileNotFoundError,
  AbortedError,
  toError,
} from './utils/errors.js';

export type { ConnectErrorKind, TimeoutPhase, ProtocolErrorReason } from './utils/errors.js';
