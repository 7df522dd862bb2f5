import { AuthError, NONCE_WINDOW, systemClock } from '@rexec/shared';
import type { Clock } from '@rexec/shared';

/**
 * Remembers nonces seen within the validity window so each one is accepted
 * at most once. Entries older than the window are pruned on every check,
 * since their timestamps would be rejected as expired anyway.
 */
export class NonceRegistry {
  private readonly window: number;
  private readonly clock: Clock;
  private readonly seen: Map<string, number> = new Map();

  constructor(window: number = NONCE_WINDOW, clock: Clock = systemClock) {
    this.window = window;
    this.clock = clock;
  }

  /**
   * Accept `nonce` issued at `timestamp`, or throw `AuthError` with reason
   * `expired` (outside ±window) or `replay` (already used).
   */
  check(nonce: string, timestamp: number): void {
    const now = this.clock.now();
    this.prune(now);

    if (Math.abs(now - timestamp) > this.window) {
      throw new AuthError('expired', `Handshake timestamp is ${now - timestamp}ms off`);
    }

    if (this.seen.has(nonce)) {
      throw new AuthError('replay', 'Handshake nonce was already used');
    }

    this.seen.set(nonce, now);
  }

  get size(): number {
    return this.seen.size;
  }

  private prune(now: number): void {
    for (const [nonce, seenAt] of this.seen) {
      // Kept twice the window: a timestamp up to +window ahead stays valid that long.
      if (now - seenAt > this.window * 2) {
        this.seen.delete(nonce);
      }
    }
  }
}
