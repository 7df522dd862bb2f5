import { loadProfiles, ProfileNotFoundError, toError } from '@rexec/shared';
import type {
  Alert,
  AlertSeverity,
  BatchMode,
  Clock,
  CommandInput,
  CommandResult,
  HostStatus,
  ServerProfile,
} from '@rexec/shared';
import type { CredentialSource } from '../auth/credentials.js';
import { KeyAuthenticator } from '../auth/KeyAuthenticator.js';
import { BatchResult } from '../dispatch/BatchResult.js';
import {
  CommandDispatcher,
  failedResult,
  normalizeCommand,
  type AsyncBatch,
} from '../dispatch/CommandDispatcher.js';
import type { EventBus } from '../events/EventBus.js';
import { AlertQueue } from '../monitor/AlertQueue.js';
import { Monitor } from '../monitor/Monitor.js';
import type { DisguiseStrategy } from '../protocol/disguise.js';
import { RestartCoordinator } from '../restart/RestartCoordinator.js';
import type { ReconnectPolicy } from '../session/backoff.js';
import type { Session, SessionState } from '../session/Session.js';
import { SessionRegistry } from '../session/SessionRegistry.js';
import type { TransportFactory } from '../transport/TransportChannel.js';

export interface RexecClientOptions {
  profiles: Map<string, ServerProfile> | readonly ServerProfile[];
  credentials: CredentialSource;
  defaultServer?: string;
  alertCapacity?: number;
  handshakeTimeout?: number;
  transport?: TransportFactory;
  disguise?: (profile: ServerProfile) => DisguiseStrategy;
  reconnect?: Partial<ReconnectPolicy>;
  pingTimeout?: number;
  pingFailureThreshold?: number;
  restartPollInterval?: number;
  clock?: Clock;
}

export type ClientOverrides = Omit<RexecClientOptions, 'profiles' | 'credentials' | 'defaultServer'>;

export interface ExecuteBatchOptions {
  server?: string;
  mode?: BatchMode;
}

export interface ExecuteAsyncOptions {
  server?: string;
  signal?: AbortSignal;
}

export interface GetAlertsOptions {
  /** Remove the returned alerts from the queue. */
  drain?: boolean;
}

export interface AddAlertOptions {
  server?: string;
  severity?: AlertSeverity;
}

export interface SessionInfo {
  serverName: string;
  sessionId: string;
  state: SessionState;
}

export interface ServerInfo extends SessionInfo {
  host: string;
  port: number;
  useHttpsDisguise: boolean;
  hops: number;
  latency: number;
  status?: HostStatus;
}

/**
 * Entry point for callers: resolves profiles by name and wires the registry,
 * dispatcher, restart coordinator and monitor together.
 */
export class RexecClient {
  readonly registry: SessionRegistry;
  readonly dispatcher: CommandDispatcher;
  readonly monitor: Monitor;

  private readonly profiles: Map<string, ServerProfile>;
  private readonly defaultServer?: string;

  constructor(options: RexecClientOptions) {
    this.profiles =
      options.profiles instanceof Map
        ? new Map(options.profiles)
        : new Map(options.profiles.map((profile): [string, ServerProfile] => [profile.name, profile]));
    this.defaultServer = options.defaultServer;

    this.registry = new SessionRegistry({
      authenticator: new KeyAuthenticator(options.credentials, {
        handshakeTimeout: options.handshakeTimeout,
      }),
      transport: options.transport,
      disguise: options.disguise,
      reconnect: options.reconnect,
      pingTimeout: options.pingTimeout,
      pingFailureThreshold: options.pingFailureThreshold,
      clock: options.clock,
      alerts: new AlertQueue(options.alertCapacity),
    });
    const restart = new RestartCoordinator(this.registry, { pollInterval: options.restartPollInterval });
    this.dispatcher = new CommandDispatcher(this.registry, restart);
    this.monitor = new Monitor(this.registry);
  }

  /**
   * Build a client from a parsed configuration object. Throws
   * `ConfigValidationError` listing every problem found.
   */
  static fromConfig(config: unknown, credentials: CredentialSource, overrides: ClientOverrides = {}): RexecClient {
    const loaded = loadProfiles(config);
    return new RexecClient({
      alertCapacity: loaded.alertCapacity,
      ...overrides,
      profiles: loaded.profiles,
      defaultServer: loaded.defaultServer,
      credentials,
    });
  }

  get events(): EventBus {
    return this.registry.events;
  }

  get alertsDropped(): number {
    return this.registry.alerts.dropped;
  }

  serverNames(): string[] {
    return [...this.profiles.keys()];
  }

  /** Resolve a profile by name, falling back to the default server. */
  profile(name?: string): ServerProfile {
    const key = name ?? this.defaultServer;
    const profile = key === undefined ? undefined : this.profiles.get(key);
    if (!profile) {
      throw new ProfileNotFoundError(key ?? '(default)');
    }
    return profile;
  }

  acquireSession(server?: string): Promise<Session> {
    return this.registry.acquire(this.profile(server));
  }

  /** Open (or reuse) the session for `server` and describe it. */
  async connect(server?: string): Promise<SessionInfo> {
    return describe(await this.acquireSession(server));
  }

  /** Close the session for `server`. Monitoring, if running, reconnects on its next check. */
  disconnect(server?: string): Promise<void> {
    return this.registry.discard(this.profile(server).name);
  }

  listSessions(): SessionInfo[] {
    return this.registry.list().map(describe);
  }

  /**
   * Connection details for `server` plus a status probe: load, memory and
   * disk usage as reported by the host.
   */
  async getServerInfo(server?: string): Promise<ServerInfo> {
    const profile = this.profile(server);
    const session = await this.registry.acquire(profile);
    const { latency, status } = await session.ping({ probe: true });

    return {
      ...describe(session),
      host: profile.host,
      port: profile.port,
      useHttpsDisguise: profile.useHttpsDisguise,
      hops: profile.proxyChain.length,
      latency,
      ...(status ? { status } : {}),
    };
  }

  execute(command: CommandInput, server?: string): Promise<CommandResult> {
    return this.dispatcher.execute(this.profile(server), command);
  }

  executeBatch(commands: readonly CommandInput[], options: ExecuteBatchOptions = {}): Promise<BatchResult> {
    return this.dispatcher.executeBatch(this.profile(options.server), commands, { mode: options.mode });
  }

  /** Never throws; an unknown server rejects the returned promise. */
  executeAsync(command: CommandInput, options: ExecuteAsyncOptions = {}): Promise<CommandResult> {
    let profile: ServerProfile;
    try {
      profile = this.profile(options.server);
    } catch (err) {
      return Promise.reject(toError(err));
    }
    return this.dispatcher.executeAsync(profile, command, { signal: options.signal });
  }

  /** Never throws; an unknown server turns every item into a failed result. */
  executeBatchAsync(commands: readonly CommandInput[], options: ExecuteAsyncOptions = {}): AsyncBatch {
    let profile: ServerProfile;
    try {
      profile = this.profile(options.server);
    } catch (err) {
      const error = toError(err);
      const results = commands.map((command) => failedResult(normalizeCommand(command).text, error, 0));
      return {
        items: results.map((result) => Promise.resolve(result)),
        gather: () =>
          Promise.resolve(
            new BatchResult(
              results.map((result, ordinal) => ({ key: { command: result.command, ordinal }, result })),
              0,
            ),
          ),
      };
    }
    return this.dispatcher.executeBatchAsync(profile, commands, { signal: options.signal });
  }

  startMonitoring(server?: string, interval?: number): void {
    this.monitor.start(this.profile(server), interval);
  }

  /** Stop one server's monitor, or every monitor when no name is given. */
  stopMonitoring(server?: string): Promise<void> {
    return server === undefined ? this.monitor.stopAll() : this.monitor.stop(server);
  }

  /**
   * Raise a user-defined alert when `condition()` holds. Returns whether the
   * alert was raised.
   */
  addAlert(condition: () => boolean, message: string, options: AddAlertOptions = {}): boolean {
    const serverName = this.profile(options.server).name;
    if (!condition()) {
      return false;
    }

    this.registry.raiseAlert({
      timestamp: new Date(this.registry.clock.now()),
      severity: options.severity ?? 'warning',
      code: 'custom',
      message,
      serverName,
    });
    return true;
  }

  getAlerts(options: GetAlertsOptions = {}): Alert[] {
    return options.drain ? this.registry.alerts.drain() : this.registry.alerts.snapshot();
  }

  async closeAll(): Promise<void> {
    await this.monitor.stopAll();
    await this.registry.closeAll();
  }
}

function describe(session: Session): SessionInfo {
  return { serverName: session.profile.name, sessionId: session.id, state: session.getState() };
}
