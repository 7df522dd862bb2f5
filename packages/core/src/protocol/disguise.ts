import { ProtocolError } from '@rexec/shared';

export interface DisguiseDecoder {
  /** Feed raw bytes; returns the payloads of every envelope completed so far. */
  push(chunk: Buffer): Buffer[];
}

/**
 * Cosmetic wrapping applied to every outgoing chunk. Strategies only change
 * the shape of the traffic; confidentiality comes from TLS underneath.
 */
export interface DisguiseStrategy {
  readonly name: string;
  wrap(payload: Buffer): Buffer;
  /** Unwrap one complete envelope. */
  unwrap(data: Buffer): Buffer;
  createDecoder(): DisguiseDecoder;
}

export const plainFraming: DisguiseStrategy = {
  name: 'plain',
  wrap: (payload) => payload,
  unwrap: (data) => data,
  createDecoder: () => ({
    push: (chunk) => [chunk],
  }),
};

export interface HttpDisguiseOptions {
  /** Clients emit requests, servers emit responses. */
  role: 'client' | 'server';
  host: string;
  path?: string;
  userAgent?: string;
  serverName?: string;
}

const HEAD_TERMINATOR = Buffer.from('\r\n\r\n');
const MAX_HEAD_SIZE = 8 * 1024;
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const REQUEST_LINE = /^[A-Z]+ \S+ HTTP\/1\.1$/;
const STATUS_LINE = /^HTTP\/1\.1 \d{3}( .*)?$/;

function buildHead(options: HttpDisguiseOptions, length: number): string {
  const lines =
    options.role === 'client'
      ? [
          `POST ${options.path ?? '/api/v1/sync'} HTTP/1.1`,
          `Host: ${options.host}`,
          `User-Agent: ${options.userAgent ?? DEFAULT_USER_AGENT}`,
          'Accept: */*',
          'Accept-Encoding: gzip, deflate, br',
          'Content-Type: application/octet-stream',
          `Content-Length: ${length}`,
          'Connection: keep-alive',
        ]
      : [
          'HTTP/1.1 200 OK',
          `Server: ${options.serverName ?? 'nginx'}`,
          'Content-Type: application/octet-stream',
          `Content-Length: ${length}`,
          'Cache-Control: no-store',
          'Connection: keep-alive',
        ];

  return `${lines.join('\r\n')}\r\n\r\n`;
}

function parseContentLength(head: string): number {
  const [startLine, ...headers] = head.split('\r\n');
  if (!REQUEST_LINE.test(startLine) && !STATUS_LINE.test(startLine)) {
    throw new ProtocolError('decode', `Unexpected envelope start line: ${startLine.slice(0, 64)}`);
  }

  for (const header of headers) {
    const separator = header.indexOf(':');
    if (separator === -1) continue;
    if (header.slice(0, separator).trim().toLowerCase() !== 'content-length') continue;

    const value = Number(header.slice(separator + 1).trim());
    if (!Number.isInteger(value) || value < 0) {
      throw new ProtocolError('decode', `Invalid Content-Length: ${header}`);
    }
    return value;
  }

  throw new ProtocolError('decode', 'Envelope is missing Content-Length');
}

class HttpEnvelopeDecoder implements DisguiseDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private bodyLength: number | null = null;

  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const payloads: Buffer[] = [];

    for (;;) {
      if (this.bodyLength === null) {
        const headEnd = this.buffer.indexOf(HEAD_TERMINATOR);
        if (headEnd === -1) {
          if (this.buffer.length > MAX_HEAD_SIZE) {
            throw new ProtocolError('decode', 'Envelope head exceeds size limit');
          }
          break;
        }

        this.bodyLength = parseContentLength(this.buffer.subarray(0, headEnd).toString('latin1'));
        this.buffer = this.buffer.subarray(headEnd + HEAD_TERMINATOR.length);
      }

      if (this.buffer.length < this.bodyLength) break;

      payloads.push(Buffer.from(this.buffer.subarray(0, this.bodyLength)));
      this.buffer = this.buffer.subarray(this.bodyLength);
      this.bodyLength = null;
    }

    return payloads;
  }
}

/**
 * Wrap each chunk in an HTTP/1.1 message whose Content-Length carries the
 * chunk size, so the stream reads like a keep-alive API exchange.
 */
export function createHttpDisguise(options: HttpDisguiseOptions): DisguiseStrategy {
  return {
    name: 'http',
    wrap(payload) {
      return Buffer.concat([Buffer.from(buildHead(options, payload.length), 'latin1'), payload]);
    },
    unwrap(data) {
      const payloads = new HttpEnvelopeDecoder().push(data);
      if (payloads.length !== 1) {
        throw new ProtocolError('decode', `Expected one complete envelope, found ${payloads.length}`);
      }
      return payloads[0];
    },
    createDecoder: () => new HttpEnvelopeDecoder(),
  };
}
