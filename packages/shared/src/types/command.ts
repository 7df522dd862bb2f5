export interface Command {
  text: string;
  /** Per-command timeout in ms; falls back to the profile timeout. */
  timeout?: number;
  waitForRestart?: boolean;
}

export type CommandInput = string | Command;

export type BatchMode = 'sequential' | 'pipelined';

export interface CommandResult {
  command: string;
  stdout: string;
  stderr: string;
  /** Remote exit status. Null when no status was received. */
  exitCode: number | null;
  /** Wall time in ms, measured locally. */
  duration: number;
  /** Set when the command failed at the protocol level instead of producing a result. */
  protocolError?: Error;
  /** Only set by restart-aware execution. */
  downtime?: number;
}

export interface BatchKey {
  command: string;
  ordinal: number;
}

export interface BatchEntry {
  key: BatchKey;
  result: CommandResult;
}
