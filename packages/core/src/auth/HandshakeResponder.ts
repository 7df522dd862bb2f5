import type { KeyObject } from 'node:crypto';
import { nanoid } from 'nanoid';
import {
  AuthError,
  createLogger,
  helloPayloadSchema,
  proofPayloadSchema,
  DEFAULT_HANDSHAKE_TIMEOUT,
  ProtocolError,
  systemClock,
} from '@rexec/shared';
import type { AuthRejectReason, ChallengePayload, Clock } from '@rexec/shared';
import type { FrameConnection } from '../protocol/FrameConnection.js';
import { createFrame } from '../protocol/messages.js';
import type { AuthenticatedSession } from './KeyAuthenticator.js';
import { NonceRegistry } from './NonceRegistry.js';
import { SecureChannel, type KeyLike } from './SecureChannel.js';
import { clientTranscript, hostTranscript } from './transcript.js';

const logger = createLogger({ name: 'handshake-responder' });

export interface HandshakeResponderOptions {
  hostKey: KeyLike;
  authorizedKeys: readonly KeyLike[];
  handshakeTimeout?: number;
  clock?: Clock;
  nonces?: NonceRegistry;
}

export interface AcceptedClient extends AuthenticatedSession {
  clientId: string;
}

/**
 * Host half of the handshake, for remote endpoints that accept sessions.
 * The client's proof must verify against one of the authorized keys.
 */
export class HandshakeResponder {
  private readonly hostKey: KeyObject;
  private readonly hostPublicKey: string;
  private readonly authorized: string[];
  private readonly handshakeTimeout: number;
  private readonly clock: Clock;
  private readonly nonces: NonceRegistry;

  constructor(options: HandshakeResponderOptions) {
    this.hostKey = SecureChannel.toPrivateKey(options.hostKey);
    this.hostPublicKey = SecureChannel.exportPublicKey(this.hostKey);
    this.authorized = options.authorizedKeys.map((key) => SecureChannel.fingerprint(key));
    this.handshakeTimeout = options.handshakeTimeout ?? DEFAULT_HANDSHAKE_TIMEOUT;
    this.clock = options.clock ?? systemClock;
    this.nonces = options.nonces ?? new NonceRegistry(undefined, this.clock);
  }

  async respond(connection: FrameConnection): Promise<AcceptedClient> {
    const opening = await connection.waitForFrame(
      (frame) => frame.type === 'auth',
      this.handshakeTimeout,
      'handshake',
    );

    const parsedHello = helloPayloadSchema.safeParse(opening.payload);
    if (!parsedHello.success) {
      throw new ProtocolError('malformed', 'Invalid hello');
    }
    const hello = parsedHello.data;

    try {
      this.nonces.check(hello.nonce, hello.timestamp);
    } catch (err) {
      if (err instanceof AuthError) {
        this.reject(connection, opening.id, err.reason);
      }
      throw err;
    }

    const ephemeral = SecureChannel.createEphemeral();
    const fields = {
      hostKey: this.hostPublicKey,
      nonce: SecureChannel.generateNonce(),
      timestamp: this.clock.now(),
      ephemeralKey: ephemeral.publicKey,
    };
    const challenge: ChallengePayload = {
      step: 'challenge',
      ...fields,
      signature: SecureChannel.sign(this.hostKey, hostTranscript(hello, fields)),
    };

    const proofFrame = connection.waitForFrame(
      (frame) => frame.type === 'auth' && frame.id === opening.id,
      this.handshakeTimeout,
      'handshake',
    );
    connection.send(createFrame('auth', challenge, opening.id));

    const parsedProof = proofPayloadSchema.safeParse((await proofFrame).payload);
    if (!parsedProof.success) {
      throw new ProtocolError('malformed', 'Invalid proof');
    }

    const clientFingerprint = this.verifyClient(
      hello.clientKey,
      clientTranscript(hello, challenge),
      parsedProof.data.signature,
    );
    if (clientFingerprint === null) {
      logger.warn({ clientId: hello.clientId }, 'Rejected client proof');
      this.reject(connection, opening.id, 'bad_signature');
      throw new AuthError('bad_signature', `Client "${hello.clientId}" is not authorized`);
    }

    const sessionId = nanoid();
    connection.send(createFrame('auth', { step: 'accept', sessionId }, opening.id));
    logger.info({ clientId: hello.clientId, sessionId }, 'Client authenticated');

    return {
      clientId: hello.clientId,
      sessionId,
      sessionKey: SecureChannel.deriveSessionKey(
        ephemeral.privateKey,
        hello.ephemeralKey,
        hello.nonce,
        challenge.nonce,
      ),
      peerFingerprint: clientFingerprint,
    };
  }

  /** Returns the client's fingerprint when authorized and the proof verifies. */
  private verifyClient(clientKey: string, transcript: string, signature: string): string | null {
    let fingerprint: string;
    let publicKey: KeyObject;
    try {
      fingerprint = SecureChannel.fingerprint(clientKey);
      publicKey = SecureChannel.toPublicKey(clientKey);
    } catch {
      return null;
    }

    if (!SecureChannel.verifyFingerprint(fingerprint, this.authorized)) {
      return null;
    }
    return SecureChannel.verify(publicKey, transcript, signature) ? fingerprint : null;
  }

  private reject(connection: FrameConnection, id: string, reason: AuthRejectReason): void {
    if (connection.isOpen()) {
      connection.send(createFrame('auth', { step: 'reject', reason }, id));
    }
  }
}
