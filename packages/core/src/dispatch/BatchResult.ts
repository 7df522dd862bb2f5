import type { BatchEntry, BatchKey, CommandResult } from '@rexec/shared';

/**
 * Results of a batch in submission order. Entries are keyed by command and
 * ordinal, so repeating a command in one batch keeps every result.
 */
export class BatchResult implements Iterable<BatchEntry> {
  /** Wall time for the whole batch, in ms. */
  readonly totalTime: number;
  private readonly items: readonly BatchEntry[];

  constructor(entries: readonly BatchEntry[], totalTime: number) {
    this.items = [...entries].sort((a, b) => a.key.ordinal - b.key.ordinal);
    this.totalTime = totalTime;
  }

  get size(): number {
    return this.items.length;
  }

  /** Results that completed with exit status 0 and no protocol error. */
  get successCount(): number {
    return this.items.filter(({ result }) => isSuccess(result)).length;
  }

  get failureCount(): number {
    return this.size - this.successCount;
  }

  get(ordinal: number): CommandResult | undefined {
    return this.items[ordinal]?.result;
  }

  /** Every result for `command`, in submission order. */
  find(command: string): CommandResult[] {
    return this.items.filter(({ key }) => key.command === command).map(({ result }) => result);
  }

  keys(): BatchKey[] {
    return this.items.map(({ key }) => key);
  }

  results(): CommandResult[] {
    return this.items.map(({ result }) => result);
  }

  entries(): BatchEntry[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<BatchEntry> {
    return this.items[Symbol.iterator]();
  }
}

export function isSuccess(result: CommandResult): boolean {
  return result.protocolError === undefined && result.exitCode === 0;
}
