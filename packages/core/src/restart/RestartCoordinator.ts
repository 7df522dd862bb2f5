import {
  createLogger,
  DEFAULT_PING_TIMEOUT,
  DisconnectedError,
  formatDuration,
  RESTART_POLL_INTERVAL,
  RestartTimeoutError,
  TimeoutError,
  toError,
} from '@rexec/shared';
import type { Command, CommandResult, ServerProfile } from '@rexec/shared';
import type { SessionRegistry } from '../session/SessionRegistry.js';

const logger = createLogger({ name: 'restart' });

export interface RestartCoordinatorOptions {
  /** Delay between reconnect probes; never shorter than two seconds. */
  pollInterval?: number;
}

/**
 * Runs a command that is expected to restart the host (or the service
 * answering for it) and waits until a fresh session can be established.
 */
export class RestartCoordinator {
  private readonly registry: SessionRegistry;
  private readonly pollInterval: number;

  constructor(registry: SessionRegistry, options: RestartCoordinatorOptions = {}) {
    this.registry = registry;
    this.pollInterval = Math.max(RESTART_POLL_INTERVAL, options.pollInterval ?? RESTART_POLL_INTERVAL);
  }

  async execute(profile: ServerProfile, command: Command): Promise<CommandResult> {
    const clock = this.registry.clock;
    const session = await this.registry.acquire(profile);
    const started = clock.now();

    let exitCode: number | null = null;
    try {
      const response = await session.execute(command.text, command.timeout ?? profile.timeout);
      exitCode = response.exitCode;
    } catch (err) {
      const error = toError(err);
      if (!(error instanceof DisconnectedError) && !(error instanceof TimeoutError)) {
        throw error;
      }
      logger.info({ server: profile.name, err: error.message }, 'Connection dropped after restart command');
    }

    await this.registry.discard(profile.name);

    const downSince = clock.now();
    const maxWait = profile.restartMaxWait;
    const probeTimeout = Math.min(profile.timeout, DEFAULT_PING_TIMEOUT);

    for (let attempt = 1; ; attempt++) {
      const elapsed = clock.now() - downSince;
      if (elapsed >= maxWait) {
        logger.error({ server: profile.name, elapsed, maxWait }, 'Host did not come back');
        throw new RestartTimeoutError(elapsed, maxWait);
      }

      await clock.sleep(Math.min(this.pollInterval, maxWait - elapsed));

      try {
        const fresh = await this.registry.acquire(profile, { reconnect: { maxAttempts: 1 } });
        await fresh.ping({ timeout: probeTimeout });
      } catch (err) {
        logger.debug(
          { server: profile.name, attempt, err: toError(err).message },
          'Host not back yet',
        );
        await this.registry.discard(profile.name);
        continue;
      }

      const downtime = clock.now() - downSince;
      logger.info({ server: profile.name, downtime, attempts: attempt }, 'Host is back');
      return {
        command: command.text,
        stdout: `restart completed after ${formatDuration(downtime)}`,
        stderr: '',
        exitCode: exitCode ?? 0,
        duration: clock.now() - started,
        downtime,
      };
    }
  }
}
