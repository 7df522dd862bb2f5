import { randomBytes } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { ProtocolError } from '@rexec/shared';
import { createHttpDisguise, plainFraming } from '../protocol/disguise.js';

const client = createHttpDisguise({ role: 'client', host: 'web.example.test' });
const server = createHttpDisguise({ role: 'server', host: 'web.example.test' });

describe('plainFraming', () => {
  it('should pass bytes through unchanged', () => {
    const data = Buffer.from('payload');
    expect(plainFraming.wrap(data)).toBe(data);
    expect(plainFraming.createDecoder().push(data)).toEqual([data]);
  });
});

describe('createHttpDisguise', () => {
  it('should wrap client chunks as POST requests', () => {
    const head = client.wrap(Buffer.from('abc')).toString('latin1');

    expect(head.startsWith('POST /api/v1/sync HTTP/1.1\r\nHost: web.example.test\r\n')).toBe(true);
    expect(head).toContain('\r\nContent-Length: 3\r\n');
    expect(head.endsWith('\r\n\r\nabc')).toBe(true);
  });

  it('should wrap server chunks as 200 responses', () => {
    const head = server.wrap(Buffer.from('abc')).toString('latin1');

    expect(head.startsWith('HTTP/1.1 200 OK\r\nServer: nginx\r\n')).toBe(true);
    expect(head.endsWith('\r\n\r\nabc')).toBe(true);
  });

  it('should unwrap what it wraps', () => {
    for (const size of [0, 1, 1500, 70000]) {
      const payload = randomBytes(size);
      expect(client.unwrap(client.wrap(payload)).equals(payload)).toBe(true);
      expect(server.unwrap(server.wrap(payload)).equals(payload)).toBe(true);
    }
  });

  it('should decode envelopes split across chunks', () => {
    const wrapped = client.wrap(Buffer.from('hello world'));
    const decoder = server.createDecoder();

    expect(decoder.push(wrapped.subarray(0, 20))).toEqual([]);
    expect(decoder.push(wrapped.subarray(20, wrapped.length - 3))).toEqual([]);
    expect(decoder.push(wrapped.subarray(wrapped.length - 3))).toEqual([Buffer.from('hello world')]);
  });

  it('should decode several envelopes from one chunk', () => {
    const decoder = client.createDecoder();
    const chunk = Buffer.concat([server.wrap(Buffer.from('one')), server.wrap(Buffer.from('two'))]);

    expect(decoder.push(chunk)).toEqual([Buffer.from('one'), Buffer.from('two')]);
  });

  it('should reject an envelope without Content-Length', () => {
    const decoder = client.createDecoder();
    expect(() => decoder.push(Buffer.from('HTTP/1.1 200 OK\r\nServer: nginx\r\n\r\n'))).toThrow(
      'Envelope is missing Content-Length',
    );
  });

  it('should reject traffic that does not look like HTTP', () => {
    const decoder = client.createDecoder();
    expect(() => decoder.push(Buffer.from('SSH-2.0-OpenSSH\r\n\r\n'))).toThrow(ProtocolError);
  });

  it('should reject an oversized head', () => {
    const decoder = client.createDecoder();
    expect(() => decoder.push(Buffer.alloc(9000, 'a'))).toThrow('Envelope head exceeds size limit');
  });

  it('should require exactly one envelope when unwrapping', () => {
    const two = Buffer.concat([client.wrap(Buffer.from('a')), client.wrap(Buffer.from('b'))]);
    expect(() => client.unwrap(two)).toThrow('Expected one complete envelope, found 2');
  });
});
