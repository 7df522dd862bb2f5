import type { KeyObject } from 'node:crypto';
import { SecureChannel, type KeyLike } from './SecureChannel.js';

/**
 * Supplies local key material and the pinned host keys. Loading and storing
 * keys is the caller's business; the engine only reads through this.
 */
export interface CredentialSource {
  readonly clientId: string;
  getPrivateKey(): KeyObject;
  getPublicKey(): KeyObject;
  /** Fingerprints of the host keys trusted for `serverName`. */
  getTrustedHostFingerprints(serverName: string): readonly string[];
}

export interface StaticCredentialOptions {
  clientId: string;
  privateKey: KeyLike;
  /** Either one list for every server or a list per server name. */
  trustedHostKeys: readonly KeyLike[] | Readonly<Record<string, readonly KeyLike[]>>;
}

function isKeyList(
  value: StaticCredentialOptions['trustedHostKeys'],
): value is readonly KeyLike[] {
  return Array.isArray(value);
}

/**
 * In-memory credential source built from keys the caller already holds.
 */
export class StaticCredentialSource implements CredentialSource {
  readonly clientId: string;
  private readonly privateKey: KeyObject;
  private readonly publicKey: KeyObject;
  private readonly shared: readonly string[] | null;
  private readonly perServer: Map<string, readonly string[]> = new Map();

  constructor(options: StaticCredentialOptions) {
    this.clientId = options.clientId;
    this.privateKey = SecureChannel.toPrivateKey(options.privateKey);
    this.publicKey = SecureChannel.toPublicKey(this.privateKey);

    const trusted = options.trustedHostKeys;
    if (isKeyList(trusted)) {
      this.shared = trusted.map((key) => SecureChannel.fingerprint(key));
    } else {
      this.shared = null;
      for (const [server, keys] of Object.entries(trusted)) {
        this.perServer.set(
          server,
          keys.map((key) => SecureChannel.fingerprint(key)),
        );
      }
    }
  }

  getPrivateKey(): KeyObject {
    return this.privateKey;
  }

  getPublicKey(): KeyObject {
    return this.publicKey;
  }

  getTrustedHostFingerprints(serverName: string): readonly string[] {
    return this.shared ?? this.perServer.get(serverName) ?? [];
  }
}
