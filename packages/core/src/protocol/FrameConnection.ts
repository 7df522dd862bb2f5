import { EventEmitter } from 'node:events';
import type { Duplex } from 'node:stream';
import {
  createLogger,
  frameSchema,
  DisconnectedError,
  ProtocolError,
  RexecError,
  TimeoutError,
  toError,
} from '@rexec/shared';
import type { Frame, TimeoutPhase } from '@rexec/shared';
import { SecureChannel } from '../auth/SecureChannel.js';
import { plainFraming, type DisguiseDecoder, type DisguiseStrategy } from './disguise.js';
import { FrameDecoder, encodeFrame } from './framing.js';

const logger = createLogger({ name: 'frame-connection' });

export interface FrameConnectionOptions {
  disguise?: DisguiseStrategy;
  label?: string;
}

/**
 * Frame-level view of a byte stream: disguise envelopes, length prefixes,
 * envelope validation and, once a session key is installed, per-frame MACs
 * with strictly increasing sequence numbers.
 *
 * Events:
 * - `frame` (frame)
 * - `protocol-error` (error), followed by `close`
 * - `close` (error | undefined), emitted exactly once
 */
export class FrameConnection extends EventEmitter {
  private readonly stream: Duplex;
  private readonly disguise: DisguiseStrategy;
  private readonly envelopes: DisguiseDecoder;
  private readonly frames: FrameDecoder = new FrameDecoder();
  private readonly label: string;
  private integrityKey: Buffer | null = null;
  private sendSeq: number = 0;
  private lastReceivedSeq: number = -1;
  private closed: boolean = false;
  private closeReason: Error | undefined;

  constructor(stream: Duplex, options: FrameConnectionOptions = {}) {
    super();
    this.stream = stream;
    this.disguise = options.disguise ?? plainFraming;
    this.envelopes = this.disguise.createDecoder();
    this.label = options.label ?? 'connection';

    stream.on('data', (chunk: Buffer | string) => {
      this.handleData(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    });
    stream.on('end', () => {
      stream.destroy();
    });
    stream.on('error', (err: Error) => {
      logger.debug({ label: this.label, err: err.message }, 'Stream error');
      this.closeReason ??= err;
    });
    stream.on('close', () => {
      this.handleClose();
    });
    stream.resume();
  }

  /**
   * Install the session key; every frame from here on is sequenced and MAC'd.
   */
  enableIntegrity(key: Buffer): void {
    this.integrityKey = key;
    this.sendSeq = 0;
    this.lastReceivedSeq = -1;
  }

  isOpen(): boolean {
    return !this.closed && !this.stream.destroyed;
  }

  send(frame: Frame): void {
    if (!this.isOpen()) {
      throw new DisconnectedError(`Cannot send ${frame.type} frame: connection is closed`);
    }

    let outgoing = frame;
    if (this.integrityKey) {
      const sequenced: Frame = { ...frame, seq: this.sendSeq++ };
      outgoing = { ...sequenced, mac: SecureChannel.computeMac(this.integrityKey, sequenced) };
    }

    this.stream.write(this.disguise.wrap(encodeFrame(outgoing)));
  }

  /**
   * Wait for the next frame accepted by `predicate`. Rejects on close or
   * after `timeout` ms.
   */
  waitForFrame(
    predicate: (frame: Frame) => boolean,
    timeout: number,
    phase: TimeoutPhase,
  ): Promise<Frame> {
    if (!this.isOpen()) {
      return Promise.reject(this.closeError());
    }

    return new Promise<Frame>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        this.off('frame', onFrame);
        this.off('close', onClose);
      };

      const onFrame = (frame: Frame) => {
        if (predicate(frame)) {
          cleanup();
          resolve(frame);
        }
      };

      const onClose = () => {
        cleanup();
        reject(this.closeError());
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(phase, timeout));
      }, timeout);

      this.on('frame', onFrame);
      this.on('close', onClose);
    });
  }

  destroy(reason?: Error): void {
    if (reason) {
      this.closeReason ??= reason;
    }
    this.stream.destroy();
  }

  /**
   * Tear the stream down and resolve once it has closed.
   */
  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.once('close', () => resolve());
      this.stream.destroy();
    });
  }

  private closeError(): Error {
    if (this.closeReason instanceof RexecError) {
      return this.closeReason;
    }
    return new DisconnectedError(
      this.closeReason ? `Connection closed: ${this.closeReason.message}` : 'Connection closed',
    );
  }

  private handleData(chunk: Buffer): void {
    if (this.closed) return;

    try {
      for (const payload of this.envelopes.push(chunk)) {
        for (const body of this.frames.push(payload)) {
          this.dispatch(body);
        }
      }
    } catch (err) {
      const error =
        err instanceof ProtocolError ? err : new ProtocolError('decode', toError(err).message);
      logger.warn({ label: this.label, reason: error.reason, err: error.message }, 'Protocol error');
      this.emit('protocol-error', error);
      this.destroy(error);
    }
  }

  private dispatch(body: unknown): void {
    const parsed = frameSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError('malformed', `Invalid frame envelope: ${parsed.error.issues[0]?.message}`);
    }

    const { type, id, seq, payload, mac } = parsed.data;
    const frame: Frame = { type, id, seq, payload, mac };

    if (this.integrityKey) {
      if (frame.seq === undefined || frame.seq <= this.lastReceivedSeq) {
        throw new ProtocolError('integrity', `Out-of-order or replayed frame (seq ${frame.seq})`);
      }
      if (!SecureChannel.verifyMac(this.integrityKey, frame)) {
        throw new ProtocolError('integrity', `Frame ${frame.id} failed integrity check`);
      }
      this.lastReceivedSeq = frame.seq;
    }

    this.emit('frame', frame);
  }

  private handleClose(): void {
    if (this.closed) return;
    this.closed = true;
    logger.debug({ label: this.label, reason: this.closeReason?.message }, 'Connection closed');
    this.emit('close', this.closeReason);
  }
}
