import { FRAME_HEADER_SIZE, MAX_FRAME_SIZE, ProtocolError } from '@rexec/shared';
import type { Frame } from '@rexec/shared';

/**
 * Encode a frame as a 4-byte big-endian length prefix followed by UTF-8 JSON.
 */
export function encodeFrame(frame: Frame): Buffer {
  const body = Buffer.from(JSON.stringify(frame), 'utf-8');
  if (body.length > MAX_FRAME_SIZE) {
    throw new ProtocolError('malformed', `Frame of ${body.length} bytes exceeds ${MAX_FRAME_SIZE}`);
  }

  const header = Buffer.alloc(FRAME_HEADER_SIZE);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * Incremental decoder for length-prefixed frames. Returns the parsed JSON
 * bodies of every frame completed by a chunk; envelope validation is left to
 * the caller.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): unknown[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const bodies: unknown[] = [];

    while (this.buffer.length >= FRAME_HEADER_SIZE) {
      const length = this.buffer.readUInt32BE(0);
      if (length > MAX_FRAME_SIZE) {
        throw new ProtocolError('decode', `Frame length ${length} exceeds ${MAX_FRAME_SIZE}`);
      }

      const end = FRAME_HEADER_SIZE + length;
      if (this.buffer.length < end) break;

      const raw = this.buffer.subarray(FRAME_HEADER_SIZE, end).toString('utf-8');
      this.buffer = this.buffer.subarray(end);

      try {
        bodies.push(JSON.parse(raw));
      } catch {
        throw new ProtocolError('decode', 'Frame body is not valid JSON');
      }
    }

    return bodies;
  }

  get pending(): number {
    return this.buffer.length;
  }
}
