import { createConnection, isIP, type Socket } from 'node:net';
import { connect as tlsConnect, type TLSSocket } from 'node:tls';
import type { Duplex } from 'node:stream';
import { ConnectError, createLogger, DEFAULT_CONNECT_TIMEOUT } from '@rexec/shared';
import type { HopAddress, ServerProfile } from '@rexec/shared';

const logger = createLogger({ name: 'transport' });

/** Opens the raw byte stream a session runs over. */
export type TransportFactory = (profile: ServerProfile) => Promise<Duplex>;

export interface TransportOptions {
  /** Per-step timeout for connect, each relay request and the TLS handshake. */
  connectTimeout?: number;
}

const RELAY_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';
const MAX_RELAY_RESPONSE = 8 * 1024;

/**
 * Open a stream to the profile's target: directly or through every relay in
 * `proxyChain`, then wrapped in TLS unless disabled. Failures while reaching
 * relay k are reported as `ConnectError{kind: 'hop', hop: k}`.
 */
export async function connectTransport(
  profile: ServerProfile,
  options: TransportOptions = {},
): Promise<Duplex> {
  const timeout = options.connectTimeout ?? Math.min(profile.timeout, DEFAULT_CONNECT_TIMEOUT);
  const target: HopAddress = { host: profile.host, port: profile.port };
  const hops = profile.proxyChain;

  let socket: Socket | null = null;
  try {
    if (hops.length === 0) {
      socket = await openSocket(target, timeout);
    } else {
      socket = await openSocket(hops[0], timeout).catch((err: unknown) => {
        throw hopError(err, 1, hops[0]);
      });

      for (let index = 1; index < hops.length; index++) {
        await requestRelay(socket, hops[index], timeout).catch((err: unknown) => {
          throw hopError(err, index + 1, hops[index]);
        });
      }

      const last = hops.length;
      await requestRelay(socket, target, timeout).catch((err: unknown) => {
        const cause = err instanceof Error ? err.message : String(err);
        throw new ConnectError(
          err instanceof ConnectError && err.kind === 'timeout' ? 'timeout' : 'refused',
          `Relay hop ${last} could not reach ${target.host}:${target.port}: ${cause}`,
        );
      });
    }

    logger.debug(
      { server: profile.name, hops: hops.length, tls: profile.tls.enabled },
      'Transport established',
    );

    if (!profile.tls.enabled) {
      return socket;
    }
    return await upgradeToTls(socket, profile, timeout);
  } catch (err) {
    socket?.destroy();
    throw err;
  }
}

function hopError(err: unknown, hop: number, address: HopAddress): ConnectError {
  const cause = err instanceof Error ? err.message : String(err);
  return new ConnectError('hop', `Proxy hop ${hop} (${address.host}:${address.port}) failed: ${cause}`, hop);
}

function mapSocketError(err: NodeJS.ErrnoException, address: HopAddress): ConnectError {
  const where = `${address.host}:${address.port}`;
  switch (err.code) {
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
    case 'EAI_NONAME':
      return new ConnectError('dns', `Could not resolve ${address.host}: ${err.code}`);
    case 'ETIMEDOUT':
      return new ConnectError('timeout', `Timed out connecting to ${where}`);
    case 'ECONNREFUSED':
      return new ConnectError('refused', `Connection refused by ${where}`);
    default:
      return new ConnectError('refused', `Could not connect to ${where}: ${err.message}`);
  }
}

function openSocket(address: HopAddress, timeout: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = createConnection({ host: address.host, port: address.port });

    const cleanup = () => {
      clearTimeout(timer);
      socket.off('connect', onConnect);
      socket.off('error', onError);
    };

    const onConnect = () => {
      cleanup();
      // Later errors surface through 'close' on whoever owns the stream next.
      socket.on('error', (err: Error) => {
        logger.debug({ host: address.host, port: address.port, err: err.message }, 'Socket error');
      });
      resolve(socket);
    };

    const onError = (err: NodeJS.ErrnoException) => {
      cleanup();
      socket.destroy();
      reject(mapSocketError(err, address));
    };

    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(new ConnectError('timeout', `Timed out connecting to ${address.host}:${address.port}`));
    }, timeout);

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}

/**
 * Ask the relay at the other end of `socket` to open a tunnel to `next`
 * using an HTTP CONNECT exchange. Resolves once the relay answers 200.
 */
function requestRelay(socket: Socket, next: HopAddress, timeout: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let buffer = Buffer.alloc(0);
    const authority = `${next.host}:${next.port}`;

    const cleanup = () => {
      clearTimeout(timer);
      socket.off('data', onData);
      socket.off('close', onClose);
      socket.pause();
    };

    const onData = (chunk: Buffer) => {
      buffer = Buffer.concat([buffer, chunk]);
      const headEnd = buffer.indexOf('\r\n\r\n');
      if (headEnd === -1) {
        if (buffer.length > MAX_RELAY_RESPONSE) {
          cleanup();
          reject(new ConnectError('refused', `Relay sent an oversized response for ${authority}`));
        }
        return;
      }

      cleanup();
      const statusLine = buffer.subarray(0, headEnd).toString('latin1').split('\r\n')[0];
      const rest = buffer.subarray(headEnd + 4);
      if (rest.length > 0) {
        socket.unshift(rest);
      }

      if (/^HTTP\/1\.[01] 200\b/.test(statusLine)) {
        resolve();
      } else {
        reject(new ConnectError('refused', `Relay refused ${authority}: ${statusLine}`));
      }
    };

    const onClose = () => {
      cleanup();
      reject(new ConnectError('refused', `Relay closed the connection while opening ${authority}`));
    };

    const timer = setTimeout(() => {
      cleanup();
      reject(new ConnectError('timeout', `Relay did not answer for ${authority} within ${timeout}ms`));
    }, timeout);

    socket.on('data', onData);
    socket.once('close', onClose);
    socket.resume();

    socket.write(
      [
        `CONNECT ${authority} HTTP/1.1`,
        `Host: ${authority}`,
        `User-Agent: ${RELAY_USER_AGENT}`,
        'Proxy-Connection: keep-alive',
        '',
        '',
      ].join('\r\n'),
    );
  });
}

function upgradeToTls(socket: Socket, profile: ServerProfile, timeout: number): Promise<TLSSocket> {
  return new Promise<TLSSocket>((resolve, reject) => {
    const servername = profile.tls.servername ?? (isIP(profile.host) === 0 ? profile.host : undefined);
    const tlsSocket = tlsConnect({
      socket,
      servername,
      rejectUnauthorized: profile.tls.rejectUnauthorized,
      minVersion: 'TLSv1.2',
      ALPNProtocols: profile.useHttpsDisguise ? ['http/1.1'] : undefined,
    });

    const cleanup = () => {
      clearTimeout(timer);
      tlsSocket.off('secureConnect', onSecure);
      tlsSocket.off('error', onError);
    };

    const onSecure = () => {
      cleanup();
      tlsSocket.on('error', (err: Error) => {
        logger.debug({ server: profile.name, err: err.message }, 'TLS socket error');
      });
      resolve(tlsSocket);
    };

    const onError = (err: Error) => {
      cleanup();
      tlsSocket.destroy();
      reject(new ConnectError('tls', `TLS handshake with ${profile.host} failed: ${err.message}`));
    };

    const timer = setTimeout(() => {
      cleanup();
      tlsSocket.destroy();
      reject(new ConnectError('tls', `TLS handshake with ${profile.host} timed out after ${timeout}ms`));
    }, timeout);

    tlsSocket.once('secureConnect', onSecure);
    tlsSocket.once('error', onError);
  });
}
