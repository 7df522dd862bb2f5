export type {
  HopAddress,
  TlsOptions,
  ResourceThresholds,
  ServerProfile,
} from './profile.js';

export type {
  Command,
  CommandInput,
  BatchMode,
  CommandResult,
  BatchKey,
  BatchEntry,
} from './command.js';

export type { Alert, AlertSeverity, AlertCode } from './alert.js';

export type {
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
} from './protocol.js';
