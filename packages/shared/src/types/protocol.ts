export type FrameType = 'auth' | 'command' | 'batch' | 'ping' | 'response';

export interface Frame<T = unknown> {
  type: FrameType;
  id: string;
  /** Per-direction sequence number, present once the integrity layer is active. */
  seq?: number;
  payload: T;
  mac?: string;
}

export type AuthRejectReason = 'unknown_host' | 'bad_signature' | 'expired' | 'replay';

export interface HelloPayload {
  step: 'hello';
  version: number;
  clientId: string;
  clientKey: string;
  nonce: string;
  timestamp: number;
  ephemeralKey: string;
}

export interface ChallengePayload {
  step: 'challenge';
  hostKey: string;
  nonce: string;
  timestamp: number;
  ephemeralKey: string;
  signature: string;
}

export interface ProofPayload {
  step: 'proof';
  signature: string;
}

export interface AcceptPayload {
  step: 'accept';
  sessionId: string;
}

export interface RejectPayload {
  step: 'reject';
  reason: AuthRejectReason;
}

export type AuthPayload =
  | HelloPayload
  | ChallengePayload
  | ProofPayload
  | AcceptPayload
  | RejectPayload;

export interface CommandRequestPayload {
  text: string;
  timeout: number;
}

export interface BatchRequestPayload {
  items: Array<CommandRequestPayload & { id: string }>;
}

export interface CommandResponsePayload {
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

export interface PingRequestPayload {
  probe: boolean;
}

export interface DiskStatus {
  mount: string;
  usedPercent: number;
}

export interface HostStatus {
  loadAverage: [number, number, number];
  cpuCount: number;
  memory: {
    total: number;
    used: number;
  };
  disks: DiskStatus[];
  uptime?: number;
}

export interface PingResponsePayload {
  pong: true;
  status?: HostStatus;
}
