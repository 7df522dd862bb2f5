import { describe, it, expect } from 'vitest';
import { ProtocolError } from '@rexec/shared';
import type { Frame } from '@rexec/shared';
import { encodeFrame, FrameDecoder } from '../protocol/framing.js';

const frame: Frame = { type: 'ping', id: 'req-1', payload: { probe: false } };

describe('encodeFrame', () => {
  it('should prefix the JSON body with its big-endian length', () => {
    const encoded = encodeFrame(frame);
    const body = JSON.stringify(frame);

    expect(encoded.readUInt32BE(0)).toBe(Buffer.byteLength(body));
    expect(encoded.subarray(4).toString('utf-8')).toBe(body);
  });
});

describe('FrameDecoder', () => {
  it('should wait for the rest of a split frame', () => {
    const encoded = encodeFrame(frame);
    const decoder = new FrameDecoder();

    expect(decoder.push(encoded.subarray(0, 3))).toEqual([]);
    expect(decoder.pending).toBe(3);
    expect(decoder.push(encoded.subarray(3, 10))).toEqual([]);
    expect(decoder.push(encoded.subarray(10))).toEqual([frame]);
    expect(decoder.pending).toBe(0);
  });

  it('should return every frame contained in one chunk', () => {
    const second: Frame = { type: 'command', id: 'req-2', payload: { text: 'uptime', timeout: 100 } };
    const decoder = new FrameDecoder();

    expect(decoder.push(Buffer.concat([encodeFrame(frame), encodeFrame(second)]))).toEqual([frame, second]);
  });

  it('should keep multi-byte characters intact across chunks', () => {
    const unicode: Frame = { type: 'response', id: 'r', payload: { stdout: 'héllo ✓' } };
    const encoded = encodeFrame(unicode);
    const decoder = new FrameDecoder();
    const results: unknown[] = [];

    for (const byte of encoded) {
      results.push(...decoder.push(Buffer.from([byte])));
    }
    expect(results).toEqual([unicode]);
  });

  it('should reject lengths above the frame size limit', () => {
    const header = Buffer.alloc(4);
    header.writeUInt32BE(0xffffffff, 0);

    expect(() => new FrameDecoder().push(header)).toThrow(ProtocolError);
  });

  it('should reject bodies that are not JSON', () => {
    const header = Buffer.alloc(4);
    header.writeUInt32BE(3, 0);

    let caught: unknown;
    try {
      new FrameDecoder().push(Buffer.concat([header, Buffer.from('abc')]));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ProtocolError);
    if (caught instanceof ProtocolError) {
      expect(caught.reason).toBe('decode');
      expect(caught.message).toBe('Frame body is not valid JSON');
    }
  });
});
