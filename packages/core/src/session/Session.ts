import { EventEmitter } from 'node:events';
import type { Duplex } from 'node:stream';
import { nanoid } from 'nanoid';
import {
  commandResponseSchema,
  ConnectError,
  createLogger,
  DEFAULT_PING_FAILURE_THRESHOLD,
  DEFAULT_PING_TIMEOUT,
  DisconnectedError,
  pingResponseSchema,
  ProtocolError,
  RexecError,
  SessionClosedError,
  systemClock,
  TimeoutError,
  toError,
} from '@rexec/shared';
import type {
  Clock,
  CommandResponsePayload,
  Frame,
  HostStatus,
  ServerProfile,
} from '@rexec/shared';
import type { KeyAuthenticator } from '../auth/KeyAuthenticator.js';
import { createHttpDisguise, plainFraming, type DisguiseStrategy } from '../protocol/disguise.js';
import { FrameConnection } from '../protocol/FrameConnection.js';
import { createBatchFrame, createCommandFrame, createPingFrame } from '../protocol/messages.js';
import { connectTransport, type TransportFactory } from '../transport/TransportChannel.js';
import { abortError } from '../util/promises.js';
import { backoffDelay, resolvePolicy, type ReconnectPolicy } from './backoff.js';

const logger = createLogger({ name: 'session' });

export type SessionState =
  | 'disconnected'
  | 'connecting'
  | 'authenticating'
  | 'ready'
  | 'closing'
  | 'closed';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  disconnected: ['connecting', 'closing'],
  connecting: ['authenticating', 'closing', 'closed'],
  authenticating: ['ready', 'closing', 'closed'],
  ready: ['connecting', 'closing'],
  closing: ['closed'],
  closed: [],
};

/** Ids of timed-out requests remembered so their late responses are ignored. */
const ABANDONED_LIMIT = 1024;

export interface SessionOptions {
  authenticator: KeyAuthenticator;
  transport?: TransportFactory;
  disguise?: (profile: ServerProfile) => DisguiseStrategy;
  reconnect?: Partial<ReconnectPolicy>;
  pingTimeout?: number;
  pingFailureThreshold?: number;
  clock?: Clock;
}

export interface PingOptions {
  /** Ask the host for its load, memory and disk status. */
  probe?: boolean;
  timeout?: number;
  /** Abandon the ping. An aborted ping does not count as a failure. */
  signal?: AbortSignal;
}

/** A batch item: the command text, optionally with its own timeout in ms. */
export type BatchItem = string | { text: string; timeout?: number };

export interface PingResult {
  latency: number;
  status?: HostStatus;
}

export interface DegradedEvent {
  serverName: string;
  failures: number;
  reason: string;
}

interface PendingRequest {
  settle(payload: unknown): void;
  fail(err: Error): void;
}

export function defaultDisguise(profile: ServerProfile): DisguiseStrategy {
  if (!profile.useHttpsDisguise) {
    return plainFraming;
  }
  return createHttpDisguise({ role: 'client', host: profile.tls.servername ?? profile.host });
}

/**
 * A live, authenticated connection to one host.
 *
 * Transport loss while `ready` moves the session back to `connecting` and
 * re-establishes it in the background with the same retry policy. Requests in
 * flight at the time of the loss are rejected with `DisconnectedError`.
 *
 * Events:
 * - `state` (next, previous)
 * - `degraded` (DegradedEvent)
 * - `protocol-error` (ProtocolError)
 * - `closed` (reason | undefined)
 */
export class Session extends EventEmitter {
  readonly profile: ServerProfile;
  readonly id: string = nanoid(10);

  private state: SessionState = 'disconnected';
  private readonly authenticator: KeyAuthenticator;
  private readonly transport: TransportFactory;
  private readonly disguise: (profile: ServerProfile) => DisguiseStrategy;
  private readonly policy: ReconnectPolicy;
  private readonly pingTimeout: number;
  private readonly pingFailureThreshold: number;
  private readonly clock: Clock;

  private connection: FrameConnection | null = null;
  private readonly pending: Map<string, PendingRequest> = new Map();
  private readonly abandoned: Set<string> = new Set();
  private opening: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private establishAbort: AbortController | null = null;
  private pingFailures: number = 0;

  constructor(profile: ServerProfile, options: SessionOptions) {
    super();
    this.profile = profile;
    this.authenticator = options.authenticator;
    this.transport = options.transport ?? ((target) => connectTransport(target));
    this.disguise = options.disguise ?? defaultDisguise;
    this.policy = resolvePolicy(options.reconnect);
    this.pingTimeout = options.pingTimeout ?? Math.min(profile.timeout, DEFAULT_PING_TIMEOUT);
    this.pingFailureThreshold = options.pingFailureThreshold ?? DEFAULT_PING_FAILURE_THRESHOLD;
    this.clock = options.clock ?? systemClock;
  }

  getState(): SessionState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  isLive(): boolean {
    return this.state !== 'closing' && this.state !== 'closed';
  }

  /**
   * Connect and authenticate. Concurrent callers share one attempt; a
   * session that is already ready resolves immediately.
   */
  open(): Promise<void> {
    if (this.state === 'ready') {
      return Promise.resolve();
    }
    if (!this.isLive()) {
      return Promise.reject(new SessionClosedError(this.profile.name));
    }
    if (this.opening) {
      return this.opening;
    }

    this.transition('connecting');
    return this.startEstablish();
  }

  whenReady(timeout: number = this.profile.timeout): Promise<void> {
    return this.awaitReady(timeout);
  }

  /**
   * Run one command and resolve with the host's response. A non-zero exit
   * status is part of the response, not an error.
   */
  async execute(text: string, timeout: number = this.profile.timeout): Promise<CommandResponsePayload> {
    const started = this.clock.now();
    await this.awaitReady(timeout, text);

    const remaining = Math.max(timeout - (this.clock.now() - started), 1);
    const frame = createCommandFrame(text, remaining);
    const response = this.request(frame.id, remaining, text, (payload) => parseResponse(payload, text));
    this.transmit(frame, [frame.id]);
    return response;
  }

  /**
   * Submit every command in one `batch` frame. Each returned promise settles
   * with its own command's response, in whatever order the host answers.
   * Items without a timeout of their own use `timeout`.
   */
  executeMany(
    items: readonly BatchItem[],
    timeout: number = this.profile.timeout,
  ): Array<Promise<CommandResponsePayload>> {
    if (items.length === 0) {
      return [];
    }

    const commands = items.map((item) =>
      typeof item === 'string' ? { text: item, timeout } : { text: item.text, timeout: item.timeout ?? timeout },
    );
    const started = this.clock.now();
    const longest = Math.max(...commands.map((command) => command.timeout));

    const submitted = this.awaitReady(longest, commands[0].text).then(() => {
      const elapsed = this.clock.now() - started;
      const frame = createBatchFrame(
        commands.map((command) => ({
          id: nanoid(),
          text: command.text,
          timeout: Math.max(command.timeout - elapsed, 1),
        })),
      );
      const responses = frame.payload.items.map((item) =>
        this.request(item.id, item.timeout, item.text, (payload) => parseResponse(payload, item.text)),
      );
      this.transmit(
        frame,
        frame.payload.items.map((item) => item.id),
      );
      return responses;
    });

    return commands.map((_, index) => submitted.then((responses) => responses[index]));
  }

  /**
   * Round trip to the host. Consecutive failures past the configured
   * threshold force a reconnect and emit `degraded`.
   */
  async ping(options: PingOptions = {}): Promise<PingResult> {
    const { signal } = options;
    const timeout = options.timeout ?? this.pingTimeout;
    const started = this.clock.now();

    try {
      await this.awaitReady(timeout, 'ping', signal);
      const frame = createPingFrame(options.probe ?? false);
      const reply = this.request(frame.id, timeout, 'ping', parsePing, signal);
      this.transmit(frame, [frame.id]);
      const payload = await reply;

      this.pingFailures = 0;
      return payload.status
        ? { latency: this.clock.now() - started, status: payload.status }
        : { latency: this.clock.now() - started };
    } catch (err) {
      if (!signal?.aborted) {
        this.recordPingFailure(toError(err));
      }
      throw err;
    }
  }

  /**
   * Stop any reconnect in progress, reject pending requests and release the
   * stream. Safe to call more than once.
   */
  close(): Promise<void> {
    if (this.state === 'closed') {
      return Promise.resolve();
    }
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.transition('closing');
    this.establishAbort?.abort();
    this.rejectPending(new SessionClosedError(this.profile.name));

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await connection.close();
    }
    if (this.opening) {
      await Promise.allSettled([this.opening]);
    }

    this.transition('closed');
    logger.info({ server: this.profile.name, session: this.id }, 'Session closed');
    this.emit('closed');
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (!TRANSITIONS[previous].includes(next)) {
      if (!this.isLive()) {
        throw new SessionClosedError(this.profile.name);
      }
      throw new RexecError(`Invalid session transition ${previous} -> ${next}`, 'INVALID_TRANSITION');
    }

    this.state = next;
    logger.debug({ server: this.profile.name, session: this.id, from: previous, to: next }, 'State change');
    this.emit('state', next, previous);
  }

  private startEstablish(): Promise<void> {
    const opening = this.establish().finally(() => {
      this.opening = null;
    });
    this.opening = opening;
    return opening;
  }

  private async establish(): Promise<void> {
    const controller = new AbortController();
    this.establishAbort = controller;

    try {
      const stream = await this.connectWithRetry(controller.signal);
      if (controller.signal.aborted) {
        stream.destroy();
        throw new SessionClosedError(this.profile.name);
      }

      this.transition('authenticating');
      const connection = new FrameConnection(stream, {
        disguise: this.disguise(this.profile),
        label: this.profile.name,
      });
      this.connection = connection;

      let sessionKey: Buffer;
      try {
        ({ sessionKey } = await this.authenticator.authenticate(connection, this.profile));
      } catch (err) {
        connection.destroy();
        throw err;
      }

      if (this.state !== 'authenticating' || !connection.isOpen()) {
        connection.destroy();
        throw this.isLive()
          ? new DisconnectedError('Connection lost during the handshake')
          : new SessionClosedError(this.profile.name);
      }

      connection.enableIntegrity(sessionKey);
      this.attach(connection);
      this.transition('ready');
      logger.info({ server: this.profile.name, session: this.id }, 'Session ready');
    } catch (err) {
      const error = toError(err);
      if (!this.isLive()) {
        throw new SessionClosedError(this.profile.name);
      }

      this.connection = null;
      this.rejectPending(error);
      this.transition('closed');
      logger.error({ server: this.profile.name, err: error.message }, 'Session could not be established');
      this.emit('closed', error);
      throw error;
    } finally {
      this.establishAbort = null;
    }
  }

  private async connectWithRetry(signal: AbortSignal): Promise<Duplex> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.transport(this.profile);
      } catch (err) {
        const error = toError(err);
        if (!(error instanceof ConnectError) || attempt >= this.policy.maxAttempts) {
          throw error;
        }

        const delay = backoffDelay(attempt, this.policy);
        logger.warn(
          { server: this.profile.name, attempt, delay: Math.round(delay), err: error.message },
          'Connect failed, retrying',
        );

        if (!(await this.clock.sleep(delay, signal))) {
          throw new SessionClosedError(this.profile.name);
        }
      }
    }
  }

  private attach(connection: FrameConnection): void {
    connection.on('frame', (frame: Frame) => this.handleFrame(frame));
    connection.on('protocol-error', (err: ProtocolError) => this.emit('protocol-error', err));
    connection.once('close', (reason?: Error) => this.handleConnectionLost(connection, reason));
  }

  private handleConnectionLost(connection: FrameConnection, reason?: Error): void {
    if (this.connection !== connection) {
      return;
    }
    this.connection = null;

    const detail = reason ? `: ${reason.message}` : '';
    this.rejectPending(new DisconnectedError(`Connection to "${this.profile.name}" lost${detail}`));

    if (this.state !== 'ready') {
      return;
    }

    logger.warn({ server: this.profile.name, err: reason?.message }, 'Connection lost, reconnecting');
    this.transition('connecting');
    this.startEstablish().catch((err: unknown) => {
      logger.error({ server: this.profile.name, err: toError(err).message }, 'Reconnect failed');
    });
  }

  private handleFrame(frame: Frame): void {
    if (frame.type !== 'response') {
      this.reportProtocolError(
        new ProtocolError('malformed', `Unexpected ${frame.type} frame from host`),
      );
      return;
    }

    const pending = this.pending.get(frame.id);
    if (!pending) {
      if (this.abandoned.delete(frame.id)) {
        logger.debug({ server: this.profile.name, id: frame.id }, 'Discarding late response');
        return;
      }
      this.reportProtocolError(
        new ProtocolError('correlation_mismatch', `Response for unknown request ${frame.id}`),
      );
      return;
    }

    this.pending.delete(frame.id);
    pending.settle(frame.payload);
  }

  private reportProtocolError(error: ProtocolError): void {
    logger.warn({ server: this.profile.name, reason: error.reason, err: error.message }, 'Protocol error');
    this.emit('protocol-error', error);
  }

  private request<T>(
    id: string,
    timeout: number,
    detail: string,
    parse: (payload: unknown) => T,
    signal?: AbortSignal,
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const abandon = (err: Error) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.pending.delete(id);
        this.abandon(id);
        reject(err);
      };
      const onAbort = () => {
        if (signal) abandon(abortError(signal));
      };
      const timer = setTimeout(() => {
        abandon(new TimeoutError('command', timeout, detail));
      }, timeout);
      const release = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      this.pending.set(id, {
        settle: (payload) => {
          release();
          try {
            resolve(parse(payload));
          } catch (err) {
            reject(toError(err));
          }
        },
        fail: (err) => {
          release();
          reject(err);
        },
      });

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  /** Send a frame whose ids are already pending; failures reject those ids. */
  private transmit(frame: Frame, ids: readonly string[]): void {
    try {
      const connection = this.connection;
      if (!connection) {
        throw new DisconnectedError(`No connection to "${this.profile.name}"`);
      }
      connection.send(frame);
    } catch (err) {
      const error = toError(err);
      for (const id of ids) {
        const pending = this.pending.get(id);
        this.pending.delete(id);
        pending?.fail(error);
      }
    }
  }

  private abandon(id: string): void {
    this.abandoned.add(id);
    if (this.abandoned.size > ABANDONED_LIMIT) {
      const oldest = this.abandoned.values().next();
      if (!oldest.done) {
        this.abandoned.delete(oldest.value);
      }
    }
  }

  private rejectPending(error: Error): void {
    const pending = [...this.pending.values()];
    this.pending.clear();
    for (const request of pending) {
      request.fail(error);
    }
  }

  private recordPingFailure(error: Error): void {
    if (error instanceof SessionClosedError) {
      return;
    }

    this.pingFailures++;
    logger.debug(
      { server: this.profile.name, failures: this.pingFailures, err: error.message },
      'Ping failed',
    );
    if (this.pingFailures < this.pingFailureThreshold) {
      return;
    }

    const event: DegradedEvent = {
      serverName: this.profile.name,
      failures: this.pingFailures,
      reason: error.message,
    };
    this.pingFailures = 0;
    logger.warn({ server: this.profile.name, failures: event.failures }, 'Session degraded, forcing reconnect');
    this.emit('degraded', event);
    this.connection?.destroy(new DisconnectedError(`${event.failures} consecutive ping failures`));
  }

  private awaitReady(timeout: number, detail?: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }
    if (this.state === 'ready') {
      return Promise.resolve();
    }
    if (!this.isLive()) {
      return Promise.reject(new SessionClosedError(this.profile.name));
    }

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        this.off('state', onState);
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = () => {
        if (!signal) return;
        cleanup();
        reject(abortError(signal));
      };

      const onState = (state: SessionState) => {
        if (state === 'ready') {
          cleanup();
          resolve();
        } else if (state === 'closing' || state === 'closed') {
          cleanup();
          reject(new SessionClosedError(this.profile.name));
        }
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError('command', timeout, detail));
      }, timeout);

      this.on('state', onState);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

function parseResponse(payload: unknown, expected: string): CommandResponsePayload {
  const parsed = commandResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ProtocolError('malformed', `Invalid response to "${expected}"`);
  }
  if (parsed.data.command !== expected) {
    throw new ProtocolError(
      'correlation_mismatch',
      `Response echoed "${parsed.data.command}" for request "${expected}"`,
    );
  }
  return parsed.data;
}

function parsePing(payload: unknown): { pong: true; status?: HostStatus } {
  const parsed = pingResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ProtocolError('malformed', 'Invalid ping response');
  }
  return parsed.data;
}
