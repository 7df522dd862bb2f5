import { createLogger, toError } from '@rexec/shared';
import type {
  BatchEntry,
  BatchMode,
  Command,
  CommandInput,
  CommandResponsePayload,
  CommandResult,
  ServerProfile,
} from '@rexec/shared';
import type { RestartCoordinator } from '../restart/RestartCoordinator.js';
import type { Session } from '../session/Session.js';
import type { SessionRegistry } from '../session/SessionRegistry.js';
import { raceAbort } from '../util/promises.js';
import { BatchResult } from './BatchResult.js';

const logger = createLogger({ name: 'dispatcher' });

export interface BatchOptions {
  mode?: BatchMode;
}

export interface AsyncOptions {
  /** Aborting stops the local wait only; the host still runs the command. */
  signal?: AbortSignal;
}

export interface AsyncBatch {
  /** One promise per command, in submission order. These never reject. */
  items: Array<Promise<CommandResult>>;
  gather(): Promise<BatchResult>;
}

export function normalizeCommand(input: CommandInput): Command {
  return typeof input === 'string' ? { text: input } : input;
}

export function toResult(
  command: string,
  response: CommandResponsePayload,
  duration: number,
): CommandResult {
  return {
    command,
    stdout: response.stdout,
    stderr: response.stderr,
    exitCode: response.exitCode,
    duration,
  };
}

export function failedResult(command: string, error: Error, duration: number): CommandResult {
  return { command, stdout: '', stderr: '', exitCode: null, duration, protocolError: error };
}

export class CommandDispatcher {
  private readonly registry: SessionRegistry;
  private readonly restart: RestartCoordinator;

  constructor(registry: SessionRegistry, restart: RestartCoordinator) {
    this.registry = registry;
    this.restart = restart;
  }

  /**
   * Run one command. Protocol failures are thrown; a non-zero exit status is
   * returned as part of the result.
   */
  async execute(profile: ServerProfile, input: CommandInput): Promise<CommandResult> {
    const command = normalizeCommand(input);
    if (command.waitForRestart) {
      return this.restart.execute(profile, command);
    }

    const session = await this.registry.acquire(profile);
    return this.run(session, command);
  }

  /**
   * Run every command and collect one result per input. Failures are
   * recorded on their own entry and never stop the batch.
   */
  async executeBatch(
    profile: ServerProfile,
    inputs: readonly CommandInput[],
    options: BatchOptions = {},
  ): Promise<BatchResult> {
    const commands = inputs.map(normalizeCommand);
    const mode = options.mode ?? 'sequential';
    const started = this.registry.clock.now();

    let entries: BatchEntry[];
    if (mode === 'pipelined' && !commands.some((command) => command.waitForRestart)) {
      entries = await this.runPipelined(profile, commands);
    } else {
      if (mode === 'pipelined') {
        logger.debug({ server: profile.name }, 'Batch contains restart commands, running sequentially');
      }
      entries = [];
      for (const [ordinal, command] of commands.entries()) {
        entries.push({ key: { command: command.text, ordinal }, result: await this.capture(profile, command) });
      }
    }

    const batch = new BatchResult(entries, this.registry.clock.now() - started);
    logger.debug(
      { server: profile.name, mode, total: batch.size, failed: batch.failureCount },
      'Batch finished',
    );
    return batch;
  }

  executeAsync(
    profile: ServerProfile,
    input: CommandInput,
    options: AsyncOptions = {},
  ): Promise<CommandResult> {
    return raceAbort(this.execute(profile, input), options.signal);
  }

  /**
   * Submit every command at once. Each item settles independently; `gather`
   * waits for all of them.
   */
  executeBatchAsync(
    profile: ServerProfile,
    inputs: readonly CommandInput[],
    options: AsyncOptions = {},
  ): AsyncBatch {
    const commands = inputs.map(normalizeCommand);
    const started = this.registry.clock.now();

    const items = commands.map((command) => {
      const begin = this.registry.clock.now();
      return this.executeAsync(profile, command, options).catch((err: unknown) =>
        failedResult(command.text, toError(err), this.registry.clock.now() - begin),
      );
    });

    return {
      items,
      gather: async () => {
        const results = await Promise.all(items);
        return new BatchResult(
          results.map((result, ordinal) => ({ key: { command: result.command, ordinal }, result })),
          this.registry.clock.now() - started,
        );
      },
    };
  }

  private async run(session: Session, command: Command): Promise<CommandResult> {
    const started = this.registry.clock.now();
    const response = await session.execute(command.text, command.timeout ?? session.profile.timeout);
    return toResult(command.text, response, this.registry.clock.now() - started);
  }

  private async capture(profile: ServerProfile, command: Command): Promise<CommandResult> {
    const started = this.registry.clock.now();
    try {
      return await this.execute(profile, command);
    } catch (err) {
      const error = toError(err);
      logger.debug({ server: profile.name, command: command.text, err: error.message }, 'Command failed');
      return failedResult(command.text, error, this.registry.clock.now() - started);
    }
  }

  private async runPipelined(profile: ServerProfile, commands: Command[]): Promise<BatchEntry[]> {
    if (commands.length === 0) {
      return [];
    }

    const started = this.registry.clock.now();
    const keyed = (result: CommandResult, ordinal: number): BatchEntry => ({
      key: { command: result.command, ordinal },
      result,
    });

    let session: Session;
    try {
      session = await this.registry.acquire(profile);
    } catch (err) {
      const error = toError(err);
      const duration = this.registry.clock.now() - started;
      return commands.map((command, ordinal) => keyed(failedResult(command.text, error, duration), ordinal));
    }

    const pending = session.executeMany(
      commands.map((command) => ({ text: command.text, timeout: command.timeout })),
      profile.timeout,
    );

    const results = await Promise.all(
      pending.map((response, ordinal) => {
        const text = commands[ordinal].text;
        return response.then(
          (payload) => toResult(text, payload, this.registry.clock.now() - started),
          (err: unknown) => failedResult(text, toError(err), this.registry.clock.now() - started),
        );
      }),
    );
    return results.map(keyed);
  }
}
