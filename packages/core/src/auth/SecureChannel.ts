import {
  createHash,
  createHmac,
  createPrivateKey,
  createPublicKey,
  diffieHellman,
  generateKeyPairSync,
  hkdfSync,
  randomBytes,
  sign,
  timingSafeEqual,
  verify,
  type KeyObject,
} from 'node:crypto';
import { NONCE_BYTES } from '@rexec/shared';
import type { Frame } from '@rexec/shared';

/** A key as PEM text or an already-parsed key object. */
export type KeyLike = string | KeyObject;

export interface EphemeralKeyPair {
  privateKey: KeyObject;
  /** SPKI DER, base64. */
  publicKey: string;
}

const SESSION_KEY_BYTES = 32;
const SESSION_KEY_INFO = 'rexec session key v1';

/**
 * Cryptographic primitives behind the handshake and the per-frame
 * integrity layer.
 */
export class SecureChannel {
  /**
   * Generate a single-use nonce. Returns a 64-character hex string.
   */
  static generateNonce(): string {
    return randomBytes(NONCE_BYTES).toString('hex');
  }

  static toPublicKey(key: KeyLike): KeyObject {
    if (typeof key !== 'string') {
      return key.type === 'private' ? createPublicKey(key) : key;
    }
    return key.includes('PRIVATE KEY') ? createPublicKey(createPrivateKey(key)) : createPublicKey(key);
  }

  static toPrivateKey(key: KeyLike): KeyObject {
    return typeof key === 'string' ? createPrivateKey(key) : key;
  }

  static exportPublicKey(key: KeyLike): string {
    return SecureChannel.toPublicKey(key).export({ type: 'spki', format: 'pem' }).toString();
  }

  /**
   * SHA-256 over the SPKI DER encoding, hex-encoded.
   */
  static fingerprint(key: KeyLike): string {
    const der = SecureChannel.toPublicKey(key).export({ type: 'spki', format: 'der' });
    return createHash('sha256').update(der).digest('hex');
  }

  /**
   * Check a fingerprint against a list using constant-time comparison.
   * Always compares against every entry.
   */
  static verifyFingerprint(fingerprint: string, trusted: readonly string[]): boolean {
    if (trusted.length === 0) {
      return false;
    }

    const candidate = Buffer.from(fingerprint);
    let isTrusted = false;

    for (const entry of trusted) {
      const expected = Buffer.from(entry);

      // Only do constant-time comparison if lengths match
      if (candidate.length === expected.length) {
        if (timingSafeEqual(candidate, expected)) {
          isTrusted = true;
        }
      }
    }

    return isTrusted;
  }

  static sign(privateKey: KeyObject, data: string): string {
    return sign(digestFor(privateKey), Buffer.from(data, 'utf-8'), privateKey).toString('base64');
  }

  static verify(publicKey: KeyObject, data: string, signature: string): boolean {
    return verify(
      digestFor(publicKey),
      Buffer.from(data, 'utf-8'),
      publicKey,
      Buffer.from(signature, 'base64'),
    );
  }

  static createEphemeral(): EphemeralKeyPair {
    const { privateKey, publicKey } = generateKeyPairSync('x25519');
    return {
      privateKey,
      publicKey: publicKey.export({ type: 'spki', format: 'der' }).toString('base64'),
    };
  }

  /**
   * X25519 agreement followed by HKDF-SHA256, salted with both nonces in
   * client-then-host order so both sides derive the same key.
   */
  static deriveSessionKey(
    ephemeral: KeyObject,
    peerPublicKey: string,
    clientNonce: string,
    hostNonce: string,
  ): Buffer {
    const peer = createPublicKey({
      key: Buffer.from(peerPublicKey, 'base64'),
      format: 'der',
      type: 'spki',
    });
    const secret = diffieHellman({ privateKey: ephemeral, publicKey: peer });
    const salt = Buffer.concat([Buffer.from(clientNonce, 'hex'), Buffer.from(hostNonce, 'hex')]);
    return Buffer.from(hkdfSync('sha256', secret, salt, SESSION_KEY_INFO, SESSION_KEY_BYTES));
  }

  static computeMac(key: Buffer, frame: Frame): string {
    return createHmac('sha256', key).update(macInput(frame)).digest('hex');
  }

  static verifyMac(key: Buffer, frame: Frame): boolean {
    if (frame.mac === undefined) {
      return false;
    }

    const expected = Buffer.from(SecureChannel.computeMac(key, frame), 'hex');
    const actual = Buffer.from(frame.mac, 'hex');
    return actual.length === expected.length && timingSafeEqual(actual, expected);
  }
}

function macInput(frame: Frame): string {
  return [frame.type, frame.id, String(frame.seq ?? ''), JSON.stringify(frame.payload ?? null)].join(
    '|',
  );
}

// Ed25519/Ed448 sign the message directly; RSA and EC keys need a digest.
function digestFor(key: KeyObject): string | null {
  const type = key.asymmetricKeyType;
  return type === 'ed25519' || type === 'ed448' ? null : 'sha256';
}
