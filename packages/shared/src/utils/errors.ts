import type { AuthRejectReason } from '../types/protocol.js';

export class RexecError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'RexecError';
    this.code = code;
  }
}

export type ConnectErrorKind = 'dns' | 'refused' | 'timeout' | 'tls' | 'hop';

export class ConnectError extends RexecError {
  public readonly kind: ConnectErrorKind;
  /** 1-based index into the proxy chain, set when kind is 'hop'. */
  public readonly hop?: number;

  constructor(kind: ConnectErrorKind, message: string, hop?: number) {
    super(message, 'CONNECT_ERROR');
    this.name = 'ConnectError';
    this.kind = kind;
    this.hop = hop;
  }
}

export class AuthError extends RexecError {
  public readonly reason: AuthRejectReason;

  constructor(reason: AuthRejectReason, message?: string) {
    super(message ?? `Authentication failed: ${reason}`, 'AUTH_ERROR');
    this.name = 'AuthError';
    this.reason = reason;
  }
}

export type TimeoutPhase = 'command' | 'handshake';

export class TimeoutError extends RexecError {
  public readonly phase: TimeoutPhase;
  public readonly timeout: number;

  constructor(phase: TimeoutPhase, timeout: number, detail?: string) {
    const subject = detail ? `${phase} "${detail}"` : phase;
    super(`Timed out after ${timeout}ms waiting for ${subject}`, 'TIMEOUT');
    this.name = 'TimeoutError';
    this.phase = phase;
    this.timeout = timeout;
  }
}

export type ProtocolErrorReason = 'malformed' | 'decode' | 'correlation_mismatch' | 'integrity';

export class ProtocolError extends RexecError {
  public readonly reason: ProtocolErrorReason;

  constructor(reason: ProtocolErrorReason, message: string) {
    super(message, 'PROTOCOL_ERROR');
    this.name = 'ProtocolError';
    this.reason = reason;
  }
}

export class DisconnectedError extends RexecError {
  constructor(message: string = 'Connection lost while a request was in flight') {
    super(message, 'DISCONNECTED');
    this.name = 'DisconnectedError';
  }
}

export class SessionClosedError extends RexecError {
  constructor(serverName: string) {
    super(`Session for "${serverName}" is closed`, 'SESSION_CLOSED');
    this.name = 'SessionClosedError';
  }
}

export class RestartTimeoutError extends RexecError {
  public readonly elapsed: number;

  constructor(elapsed: number, maxWait: number) {
    super(
      `Host did not come back within ${maxWait}ms (waited ${elapsed}ms)`,
      'RESTART_TIMEOUT',
    );
    this.name = 'RestartTimeoutError';
    this.elapsed = elapsed;
  }
}

export class ConfigValidationError extends RexecError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class ProfileNotFoundError extends RexecError {
  constructor(name: string) {
    super(`Server profile not found: ${name}`, 'PROFILE_NOT_FOUND');
    this.name = 'ProfileNotFoundError';
  }
}

export class AbortedError extends RexecError {
  constructor(message: string = 'The operation was aborted') {
    super(message, 'ABORTED');
    this.name = 'AbortError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
