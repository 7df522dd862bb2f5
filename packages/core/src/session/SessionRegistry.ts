import { createLogger, systemClock, toError } from '@rexec/shared';
import type { Alert, Clock, ServerProfile } from '@rexec/shared';
import type { KeyAuthenticator } from '../auth/KeyAuthenticator.js';
import { EventBus } from '../events/EventBus.js';
import { AlertQueue } from '../monitor/AlertQueue.js';
import type { DisguiseStrategy } from '../protocol/disguise.js';
import type { TransportFactory } from '../transport/TransportChannel.js';
import { abortError, raceAbort } from '../util/promises.js';
import type { ReconnectPolicy } from './backoff.js';
import { Session, type DegradedEvent, type SessionState } from './Session.js';

const logger = createLogger({ name: 'registry' });

export interface SessionRegistryOptions {
  authenticator: KeyAuthenticator;
  transport?: TransportFactory;
  disguise?: (profile: ServerProfile) => DisguiseStrategy;
  reconnect?: Partial<ReconnectPolicy>;
  pingTimeout?: number;
  pingFailureThreshold?: number;
  clock?: Clock;
  alerts?: AlertQueue;
  events?: EventBus;
}

export interface AcquireOverrides {
  reconnect?: Partial<ReconnectPolicy>;
  /**
   * Stop waiting when aborted. A session this call started is closed, which
   * ends its connect retries; a creation shared with other callers goes on.
   */
  signal?: AbortSignal;
}

export interface ShutdownHookOptions {
  /** Exit the process once every session is closed. Defaults to true. */
  exit?: boolean;
  signals?: NodeJS.Signals[];
}

/**
 * Holds at most one live session per profile name. Sessions are added after
 * their first successful open and drop out when they close.
 */
export class SessionRegistry {
  readonly alerts: AlertQueue;
  readonly events: EventBus;
  readonly clock: Clock;

  private readonly options: SessionRegistryOptions;
  private readonly sessions: Map<string, Session> = new Map();
  private readonly creating: Map<string, Promise<Session>> = new Map();

  constructor(options: SessionRegistryOptions) {
    this.options = options;
    this.alerts = options.alerts ?? new AlertQueue();
    this.events = options.events ?? new EventBus();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Return the live session for `profile.name`, opening a new one if there
   * is none. Concurrent calls for the same name share one creation.
   */
  acquire(profile: ServerProfile, overrides: AcquireOverrides = {}): Promise<Session> {
    const { signal } = overrides;
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }

    const live = this.sessions.get(profile.name);
    if (live?.isLive()) {
      return Promise.resolve(live);
    }

    const inFlight = this.creating.get(profile.name);
    if (inFlight) {
      return raceAbort(inFlight, signal);
    }

    const creation = this.create(profile, overrides).finally(() => {
      this.creating.delete(profile.name);
    });
    this.creating.set(profile.name, creation);
    return creation;
  }

  get(name: string): Session | undefined {
    const session = this.sessions.get(name);
    return session?.isLive() ? session : undefined;
  }

  list(): Session[] {
    return [...this.sessions.values()].filter((session) => session.isLive());
  }

  /** Forget the session for `name` and close it. */
  async discard(name: string): Promise<void> {
    const session = this.sessions.get(name);
    if (!session) {
      return;
    }
    this.sessions.delete(name);
    await session.close();
  }

  async closeAll(): Promise<void> {
    await Promise.allSettled([...this.creating.values()]);

    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map((session) => session.close()));

    if (sessions.length > 0) {
      logger.info({ count: sessions.length }, 'All sessions closed');
    }
  }

  raiseAlert(alert: Alert): void {
    const displaced = this.alerts.push(alert);
    this.events.emit('alert:raised', alert);
    if (displaced) {
      this.events.emit('alert:dropped', displaced);
    }
  }

  /**
   * Close every session when the process receives SIGINT or SIGTERM.
   * Returns a function that removes the handlers again.
   */
  installShutdownHooks(options: ShutdownHookOptions = {}): () => void {
    const { exit = true, signals = ['SIGINT', 'SIGTERM'] } = options;

    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Shutting down sessions');
      this.closeAll().then(
        () => {
          if (exit) process.exit(0);
        },
        (err: unknown) => {
          logger.error({ err: toError(err).message }, 'Failed to close sessions on shutdown');
          if (exit) process.exit(1);
        },
      );
    };

    for (const signal of signals) {
      process.once(signal, shutdown);
    }

    return () => {
      for (const signal of signals) {
        process.off(signal, shutdown);
      }
    };
  }

  private async create(profile: ServerProfile, overrides: AcquireOverrides): Promise<Session> {
    const { authenticator, transport, disguise, pingTimeout, pingFailureThreshold } = this.options;
    const session = new Session(profile, {
      authenticator,
      transport,
      disguise,
      pingTimeout,
      pingFailureThreshold,
      clock: this.clock,
      reconnect: { ...this.options.reconnect, ...overrides.reconnect },
    });
    this.wire(session);

    const { signal } = overrides;
    const onAbort = () => {
      logger.debug({ server: profile.name }, 'Acquire aborted, closing the new session');
      session.close().catch((err: unknown) => {
        logger.error({ server: profile.name, err: toError(err).message }, 'Failed to close aborted session');
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await session.open();
    } catch (err) {
      throw signal?.aborted ? abortError(signal) : err;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    this.sessions.set(profile.name, session);
    return session;
  }

  private wire(session: Session): void {
    const serverName = session.profile.name;

    session.on('state', (state: SessionState, previous: SessionState) => {
      this.events.emit('session:state', { serverName, sessionId: session.id, state, previous });
    });

    session.on('degraded', (event: DegradedEvent) => {
      this.events.emit('session:degraded', event);
      this.raiseAlert({
        timestamp: new Date(this.clock.now()),
        severity: 'warning',
        code: 'degraded',
        message: `Session degraded after ${event.failures} failed pings: ${event.reason}`,
        serverName,
      });
    });

    session.once('closed', (error?: Error) => {
      if (this.sessions.get(serverName) === session) {
        this.sessions.delete(serverName);
      }
      this.events.emit('session:closed', { serverName, sessionId: session.id, error });
    });
  }
}
