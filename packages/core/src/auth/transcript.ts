import type { ChallengePayload, HelloPayload } from '@rexec/shared';

type ChallengeFields = Pick<ChallengePayload, 'nonce' | 'timestamp' | 'ephemeralKey' | 'hostKey'>;

/** What the host signs: both nonces, both ephemeral keys, its own key and timestamp. */
export function hostTranscript(hello: HelloPayload, challenge: ChallengeFields): string {
  return [
    'rexec-host',
    hello.version,
    hello.nonce,
    challenge.nonce,
    hello.ephemeralKey,
    challenge.ephemeralKey,
    challenge.hostKey,
    challenge.timestamp,
  ].join('|');
}

/** What the client signs in its proof. */
export function clientTranscript(hello: HelloPayload, challenge: ChallengeFields): string {
  return [
    'rexec-client',
    hello.clientId,
    hello.clientKey,
    challenge.nonce,
    hello.nonce,
    hello.ephemeralKey,
    challenge.ephemeralKey,
  ].join('|');
}
