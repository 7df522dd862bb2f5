import {
  AuthError,
  createLogger,
  hostReplySchema,
  DEFAULT_HANDSHAKE_TIMEOUT,
  PROTOCOL_VERSION,
  ProtocolError,
  systemClock,
} from '@rexec/shared';
import type { Clock, Frame, HelloPayload, ServerProfile } from '@rexec/shared';
import type { z } from 'zod';
import type { FrameConnection } from '../protocol/FrameConnection.js';
import { createFrame } from '../protocol/messages.js';
import type { CredentialSource } from './credentials.js';
import { NonceRegistry } from './NonceRegistry.js';
import { SecureChannel } from './SecureChannel.js';
import { clientTranscript, hostTranscript } from './transcript.js';

const logger = createLogger({ name: 'authenticator' });

type HostReply = z.infer<typeof hostReplySchema>;

export interface AuthenticatedSession {
  sessionId: string;
  sessionKey: Buffer;
  peerFingerprint: string;
}

export interface KeyAuthenticatorOptions {
  handshakeTimeout?: number;
  clock?: Clock;
  nonces?: NonceRegistry;
}

/**
 * Client half of the mutual key handshake. The host must prove possession of
 * a pinned key before the client signs anything; an unpinned host key always
 * aborts the attempt.
 */
export class KeyAuthenticator {
  private readonly credentials: CredentialSource;
  private readonly handshakeTimeout: number;
  private readonly clock: Clock;
  private readonly nonces: NonceRegistry;

  constructor(credentials: CredentialSource, options: KeyAuthenticatorOptions = {}) {
    this.credentials = credentials;
    this.handshakeTimeout = options.handshakeTimeout ?? DEFAULT_HANDSHAKE_TIMEOUT;
    this.clock = options.clock ?? systemClock;
    this.nonces = options.nonces ?? new NonceRegistry(undefined, this.clock);
  }

  async authenticate(
    connection: FrameConnection,
    profile: ServerProfile,
  ): Promise<AuthenticatedSession> {
    const ephemeral = SecureChannel.createEphemeral();
    const hello: HelloPayload = {
      step: 'hello',
      version: PROTOCOL_VERSION,
      clientId: this.credentials.clientId,
      clientKey: SecureChannel.exportPublicKey(this.credentials.getPublicKey()),
      nonce: SecureChannel.generateNonce(),
      timestamp: this.clock.now(),
      ephemeralKey: ephemeral.publicKey,
    };

    const opening = createFrame('auth', hello);
    const challenge = this.expect(await this.exchange(connection, opening), 'challenge');

    let hostFingerprint: string;
    try {
      hostFingerprint = SecureChannel.fingerprint(challenge.hostKey);
    } catch {
      throw new ProtocolError('malformed', 'Host key in challenge could not be parsed');
    }

    const pinned = this.credentials.getTrustedHostFingerprints(profile.name);
    if (!SecureChannel.verifyFingerprint(hostFingerprint, pinned)) {
      logger.error({ server: profile.name, fingerprint: hostFingerprint }, 'Unknown host key');
      throw new AuthError(
        'unknown_host',
        `Host key ${hostFingerprint.slice(0, 16)} for "${profile.name}" is not pinned`,
      );
    }

    const hostKey = SecureChannel.toPublicKey(challenge.hostKey);
    if (!SecureChannel.verify(hostKey, hostTranscript(hello, challenge), challenge.signature)) {
      throw new AuthError('bad_signature', `Host signature from "${profile.name}" did not verify`);
    }

    this.nonces.check(challenge.nonce, challenge.timestamp);

    const proof = createFrame(
      'auth',
      {
        step: 'proof',
        signature: SecureChannel.sign(
          this.credentials.getPrivateKey(),
          clientTranscript(hello, challenge),
        ),
      },
      opening.id,
    );
    const accepted = this.expect(await this.exchange(connection, proof), 'accept');

    logger.debug({ server: profile.name, sessionId: accepted.sessionId }, 'Handshake complete');

    return {
      sessionId: accepted.sessionId,
      sessionKey: SecureChannel.deriveSessionKey(
        ephemeral.privateKey,
        challenge.ephemeralKey,
        hello.nonce,
        challenge.nonce,
      ),
      peerFingerprint: hostFingerprint,
    };
  }

  private async exchange(connection: FrameConnection, frame: Frame): Promise<Frame> {
    const reply = connection.waitForFrame(
      (candidate) => candidate.type === 'auth' && candidate.id === frame.id,
      this.handshakeTimeout,
      'handshake',
    );
    connection.send(frame);
    return reply;
  }

  private expect<S extends 'challenge' | 'accept'>(
    frame: Frame,
    step: S,
  ): Extract<HostReply, { step: S }> {
    const parsed = hostReplySchema.safeParse(frame.payload);
    if (!parsed.success) {
      throw new ProtocolError('malformed', `Invalid handshake reply while expecting ${step}`);
    }

    const reply = parsed.data;
    if (reply.step === 'reject') {
      throw new AuthError(reply.reason, `Host rejected the handshake: ${reply.reason}`);
    }
    if (!isStep(reply, step)) {
      throw new ProtocolError('malformed', `Expected ${step}, received ${reply.step}`);
    }
    return reply;
  }
}

function isStep<S extends HostReply['step']>(
  reply: HostReply,
  step: S,
): reply is Extract<HostReply, { step: S }> {
  return reply.step === step;
}
