import { generateKeyPairSync } from 'node:crypto';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { AuthError, PROTOCOL_VERSION, TimeoutError } from '@rexec/shared';
import type { Frame } from '@rexec/shared';
import { HandshakeResponder } from '../auth/HandshakeResponder.js';
import { KeyAuthenticator } from '../auth/KeyAuthenticator.js';
import { StaticCredentialSource } from '../auth/credentials.js';
import { SecureChannel } from '../auth/SecureChannel.js';
import { FrameConnection } from '../protocol/FrameConnection.js';
import { createFrame } from '../protocol/messages.js';
import { FakeClock } from './helpers/clock.js';
import { createEndpointPair, type Endpoint } from './helpers/endpoint.js';
import { testProfile } from './helpers/fakeHost.js';

const hostKeys = generateKeyPairSync('ed25519');
const clientKeys = generateKeyPairSync('ed25519');
const profile = testProfile();

function credentials(trusted = hostKeys.publicKey): StaticCredentialSource {
  return new StaticCredentialSource({
    clientId: 'test-client',
    privateKey: clientKeys.privateKey,
    trustedHostKeys: { web: [trusted] },
  });
}

function responder(authorized = [clientKeys.publicKey]): HandshakeResponder {
  return new HandshakeResponder({ hostKey: hostKeys.privateKey, authorizedKeys: authorized });
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('handshake', () => {
  let endpoints: Endpoint[] = [];

  function connect(): [FrameConnection, FrameConnection] {
    const [left, right] = createEndpointPair();
    endpoints.push(left, right);
    return [new FrameConnection(left), new FrameConnection(right)];
  }

  afterEach(() => {
    vi.restoreAllMocks();
    for (const endpoint of endpoints) endpoint.destroy();
    endpoints = [];
  });

  it('should authenticate both sides and agree on a session key', async () => {
    const [client, host] = connect();

    const [session, accepted] = await Promise.all([
      new KeyAuthenticator(credentials()).authenticate(client, profile),
      responder().respond(host),
    ]);

    expect(session.sessionId).toBe(accepted.sessionId);
    expect(session.sessionKey.equals(accepted.sessionKey)).toBe(true);
    expect(session.peerFingerprint).toBe(SecureChannel.fingerprint(hostKeys.publicKey));
    expect(accepted.peerFingerprint).toBe(SecureChannel.fingerprint(clientKeys.publicKey));
    expect(accepted.clientId).toBe('test-client');
  });

  it('should let the integrity layer run on the derived key', async () => {
    const [client, host] = connect();
    const [session, accepted] = await Promise.all([
      new KeyAuthenticator(credentials()).authenticate(client, profile),
      responder().respond(host),
    ]);
    client.enableIntegrity(session.sessionKey);
    host.enableIntegrity(accepted.sessionKey);

    const received = host.waitForFrame((frame) => frame.type === 'ping', 1000, 'command');
    client.send(createFrame('ping', { probe: false }, 'p1'));

    expect((await received).seq).toBe(0);
  });

  it('should refuse a host whose key is not pinned', async () => {
    const [client, host] = connect();
    const hostSide = failure(responder().respond(host));

    const error = await failure(
      new KeyAuthenticator(credentials(generateKeyPairSync('ed25519').publicKey)).authenticate(client, profile),
    );

    expect(error).toBeInstanceOf(AuthError);
    expect(error instanceof AuthError && error.reason).toBe('unknown_host');

    client.destroy();
    await hostSide;
  });

  it('should use the per-server pin list', async () => {
    const [client, host] = connect();
    const hostSide = failure(responder().respond(host));

    const error = await failure(
      new KeyAuthenticator(credentials()).authenticate(client, testProfile({ name: 'db' })),
    );

    expect(error instanceof AuthError && error.reason).toBe('unknown_host');
    client.destroy();
    await hostSide;
  });

  it('should be rejected by a host that does not authorize the client', async () => {
    const [client, host] = connect();

    const [clientError, hostError] = await Promise.all([
      failure(new KeyAuthenticator(credentials()).authenticate(client, profile)),
      failure(responder([]).respond(host)),
    ]);

    expect(clientError instanceof AuthError && clientError.reason).toBe('bad_signature');
    expect(hostError instanceof AuthError && hostError.reason).toBe('bad_signature');
  });

  it('should be rejected when the client clock is far off', async () => {
    const [client, host] = connect();
    const skewed = new FakeClock(Date.now() - 60_000);

    const [clientError, hostError] = await Promise.all([
      failure(new KeyAuthenticator(credentials(), { clock: skewed }).authenticate(client, profile)),
      failure(responder().respond(host)),
    ]);

    expect(clientError instanceof AuthError && clientError.reason).toBe('expired');
    expect(hostError instanceof AuthError && hostError.reason).toBe('expired');
  });

  it('should reject a replayed hello', async () => {
    const host = responder();
    const hello = {
      step: 'hello',
      version: PROTOCOL_VERSION,
      clientId: 'test-client',
      clientKey: SecureChannel.exportPublicKey(clientKeys.publicKey),
      nonce: 'ab'.repeat(32),
      timestamp: Date.now(),
      ephemeralKey: SecureChannel.createEphemeral().publicKey,
    };

    const [firstClient, firstHost] = connect();
    const firstHostSide = failure(host.respond(firstHost));
    const challenge = firstClient.waitForFrame(() => true, 1000, 'handshake');
    firstClient.send(createFrame('auth', hello, 'h1'));
    expect((await challenge).payload).toMatchObject({ step: 'challenge' });
    firstClient.destroy();
    await firstHostSide;

    const [secondClient, secondHost] = connect();
    const secondHostSide = failure(host.respond(secondHost));
    const reply = secondClient.waitForFrame(() => true, 1000, 'handshake');
    secondClient.send(createFrame('auth', hello, 'h2'));

    const frame: Frame = await reply;
    expect(frame.payload).toEqual({ step: 'reject', reason: 'replay' });
    const hostError = await secondHostSide;
    expect(hostError instanceof AuthError && hostError.reason).toBe('replay');
  });

  it('should detect a host nonce it has already accepted', async () => {
    vi.spyOn(SecureChannel, 'generateNonce').mockReturnValue('cd'.repeat(32));
    const authenticator = new KeyAuthenticator(credentials());

    const [firstClient, firstHost] = connect();
    await Promise.all([authenticator.authenticate(firstClient, profile), responder().respond(firstHost)]);

    const [secondClient, secondHost] = connect();
    const hostSide = failure(responder().respond(secondHost));
    const error = await failure(authenticator.authenticate(secondClient, profile));

    expect(error instanceof AuthError && error.reason).toBe('replay');
    secondClient.destroy();
    await hostSide;
  });

  it('should time out when the host never answers', async () => {
    const [client] = connect();

    const error = await failure(
      new KeyAuthenticator(credentials(), { handshakeTimeout: 30 }).authenticate(client, profile),
    );

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error instanceof TimeoutError && error.phase).toBe('handshake');
  });
});
