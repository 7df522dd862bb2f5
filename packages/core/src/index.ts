// Client
export { RexecClient } from './client/RexecClient.js';
export type {
  RexecClientOptions,
  ClientOverrides,
  ExecuteBatchOptions,
  ExecuteAsyncOptions,
  GetAlertsOptions,
  AddAlertOptions,
  SessionInfo,
  ServerInfo,
} from './client/RexecClient.js';

// Sessions
export { Session, defaultDisguise } from './session/Session.js';
export type {
  SessionState,
  SessionOptions,
  PingOptions,
  PingResult,
  DegradedEvent,
  BatchItem,
} from './session/Session.js';
export { SessionRegistry } from './session/SessionRegistry.js';
export type {
  SessionRegistryOptions,
  AcquireOverrides,
  ShutdownHookOptions,
} from './session/SessionRegistry.js';
export { backoffDelay, resolvePolicy, DEFAULT_RECONNECT_POLICY } from './session/backoff.js';
export type { ReconnectPolicy } from './session/backoff.js';

// Dispatch
export {
  CommandDispatcher,
  normalizeCommand,
  toResult,
  failedResult,
} from './dispatch/CommandDispatcher.js';
export type { BatchOptions, AsyncOptions, AsyncBatch } from './dispatch/CommandDispatcher.js';
export { BatchResult, isSuccess } from './dispatch/BatchResult.js';
export { RestartCoordinator } from './restart/RestartCoordinator.js';
export type { RestartCoordinatorOptions } from './restart/RestartCoordinator.js';

// Monitoring
export { Monitor } from './monitor/Monitor.js';
export { AlertQueue } from './monitor/AlertQueue.js';
export { evaluateThresholds } from './monitor/thresholds.js';
export type { ThresholdBreach } from './monitor/thresholds.js';

// Events
export { EventBus } from './events/EventBus.js';
export type {
  EventName,
  EventBusMessage,
  SessionStateEvent,
  SessionClosedEvent,
  MonitorSample,
} from './events/EventBus.js';

// Authentication
export { KeyAuthenticator } from './auth/KeyAuthenticator.js';
export type { AuthenticatedSession, KeyAuthenticatorOptions } from './auth/KeyAuthenticator.js';
export { HandshakeResponder } from './auth/HandshakeResponder.js';
export type { HandshakeResponderOptions, AcceptedClient } from './auth/HandshakeResponder.js';
export { StaticCredentialSource } from './auth/credentials.js';
export type { CredentialSource, StaticCredentialOptions } from './auth/credentials.js';
export { NonceRegistry } from './auth/NonceRegistry.js';
export { SecureChannel } from './auth/SecureChannel.js';
export type { KeyLike } from './auth/SecureChannel.js';

// Wire protocol
export { FrameConnection } from './protocol/FrameConnection.js';
export type { FrameConnectionOptions } from './protocol/FrameConnection.js';
export { encodeFrame, FrameDecoder } from './protocol/framing.js';
export { plainFraming, createHttpDisguise } from './protocol/disguise.js';
export type { DisguiseStrategy, DisguiseDecoder, HttpDisguiseOptions } from './protocol/disguise.js';
export {
  createFrame,
  createCommandFrame,
  createBatchFrame,
  createPingFrame,
  createResponse,
} from './protocol/messages.js';

// Transport
export { connectTransport } from './transport/TransportChannel.js';
export type { TransportFactory, TransportOptions } from './transport/TransportChannel.js';
