/**
 * Envelope and attachment encryption on top of node:crypto.
 *
 * Envelope layout: version(1) | ephemeral X25519 public(32) | sender X25519 public(32) | iv(12) | tag(16) | ciphertext.
 * The AES-256-GCM key is HKDF-SHA256 over two X25519 agreements (ephemeral-recipient and
 * sender-recipient), so only the holder of the sender's static key can produce a valid envelope.
 * The header bytes are bound as additional authenticated data.
 */
import {
  createCipheriv,
  createDecipheriv,
  createHash,
  createPrivateKey,
  createPublicKey,
  diffieHellman,
  generateKeyPairSync,
  hkdfSync,
  randomBytes,
  sign as signData,
  type KeyObject,
} from 'node:crypto';
import type { IdentityKeys, KeyPairMaterial } from './key-store.js';

const VERSION = 1;
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const HEADER_LENGTH = 1 + KEY_LENGTH + KEY_LENGTH;
const ENVELOPE_INFO = 'relaypost-envelope-v1';
const ID_PREFIX = '05';

export class DecryptionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecryptionError';
  }
}

export interface DecryptedEnvelope {
  plaintext: Uint8Array;
  senderId: string;
}

export interface EncryptedAttachment {
  ciphertext: Uint8Array;
  /** base64 AES-256 key */
  key: string;
  /** hex SHA-256 of the ciphertext */
  digest: string;
}

export interface Crypto {
  /** Public identity of the local user */
  readonly identityId: string;
  /** base64url ed25519 public key used by `sign` */
  readonly signingPublicKey: string;
  encrypt(plaintext: Uint8Array, recipientId: string): Uint8Array;
  decrypt(envelope: Uint8Array): DecryptedEnvelope;
  sign(data: Uint8Array): Uint8Array;
  encryptAttachment(data: Uint8Array): EncryptedAttachment;
  decryptAttachment(ciphertext: Uint8Array, key: string, digest?: string): Uint8Array;
}

// ---------------------------------------------------------------------------
// Key helpers
// ---------------------------------------------------------------------------

function publicKeyObject(crv: 'X25519' | 'Ed25519', x: string): KeyObject {
  return createPublicKey({ key: { kty: 'OKP', crv, x }, format: 'jwk' });
}

function privateKeyObject(crv: 'X25519' | 'Ed25519', material: KeyPairMaterial): KeyObject {
  return createPrivateKey({ key: { kty: 'OKP', crv, x: material.publicKey, d: material.privateKey }, format: 'jwk' });
}

function rawPublicKey(key: KeyObject): Buffer {
  const { x } = key.export({ format: 'jwk' });
  if (!x) throw new Error('public key has no x component');
  return Buffer.from(x, 'base64url');
}

export function identityIdFromPublicKey(raw: Uint8Array): string {
  return ID_PREFIX + Buffer.from(raw).toString('hex');
}

function publicKeyFromIdentityId(id: string): KeyObject {
  if (!/^05[0-9a-f]{64}$/.test(id)) throw new Error(`invalid identity id '${id}'`);
  return publicKeyObject('X25519', Buffer.from(id.slice(ID_PREFIX.length), 'hex').toString('base64url'));
}

function deriveKey(shared: Buffer, salt: Uint8Array): Buffer {
  return Buffer.from(hkdfSync('sha256', shared, salt, ENVELOPE_INFO, KEY_LENGTH));
}

function seal(key: Uint8Array, plaintext: Uint8Array, aad?: Uint8Array): Buffer {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv('aes-256-gcm', key, iv);
  if (aad) cipher.setAAD(aad);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]);
}

function open(key: Uint8Array, sealed: Uint8Array, aad?: Uint8Array): Buffer {
  if (sealed.byteLength < IV_LENGTH + TAG_LENGTH) throw new DecryptionError('ciphertext too short');
  const iv = sealed.subarray(0, IV_LENGTH);
  const tag = sealed.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
  const decipher = createDecipheriv('aes-256-gcm', key, iv);
  decipher.setAuthTag(tag);
  if (aad) decipher.setAAD(aad);
  try {
    return Buffer.concat([decipher.update(sealed.subarray(IV_LENGTH + TAG_LENGTH)), decipher.final()]);
  } catch (err) {
    throw new DecryptionError('authentication failed', { cause: err });
  }
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createCrypto(keys: IdentityKeys): Crypto {
  const agreementKey = privateKeyObject('X25519', keys.x25519);
  const signingKey = privateKeyObject('Ed25519', keys.ed25519);
  const ownPublic = Buffer.from(keys.x25519.publicKey, 'base64url');
  const identityId = identityIdFromPublicKey(ownPublic);

  return {
    identityId,
    signingPublicKey: keys.ed25519.publicKey,

    encrypt(plaintext, recipientId) {
      const recipient = publicKeyFromIdentityId(recipientId);
      const ephemeral = generateKeyPairSync('x25519');
      const ephemeralPublic = rawPublicKey(ephemeral.publicKey);
      const header = Buffer.concat([Buffer.from([VERSION]), ephemeralPublic, ownPublic]);
      const shared = Buffer.concat([
        diffieHellman({ privateKey: ephemeral.privateKey, publicKey: recipient }),
        diffieHellman({ privateKey: agreementKey, publicKey: recipient }),
      ]);
      return Buffer.concat([header, seal(deriveKey(shared, ephemeralPublic), plaintext, header)]);
    },

    decrypt(envelope) {
      if (envelope.byteLength < HEADER_LENGTH + IV_LENGTH + TAG_LENGTH) {
        throw new DecryptionError('envelope too short');
      }
      if (envelope[0] !== VERSION) throw new DecryptionError(`unsupported envelope version ${envelope[0]}`);

      const header = envelope.subarray(0, HEADER_LENGTH);
      const ephemeralPublic = envelope.subarray(1, 1 + KEY_LENGTH);
      const senderPublic = envelope.subarray(1 + KEY_LENGTH, HEADER_LENGTH);

      let shared: Buffer;
      try {
        shared = Buffer.concat([
          diffieHellman({
            privateKey: agreementKey,
            publicKey: publicKeyObject('X25519', Buffer.from(ephemeralPublic).toString('base64url')),
          }),
          diffieHellman({
            privateKey: agreementKey,
            publicKey: publicKeyObject('X25519', Buffer.from(senderPublic).toString('base64url')),
          }),
        ]);
      } catch (err) {
        throw new DecryptionError('invalid envelope keys', { cause: err });
      }

      const plaintext = open(deriveKey(shared, ephemeralPublic), envelope.subarray(HEADER_LENGTH), header);
      return { plaintext: new Uint8Array(plaintext), senderId: identityIdFromPublicKey(senderPublic) };
    },

    sign(data) {
      return new Uint8Array(signData(null, data, signingKey));
    },

    encryptAttachment(data) {
      const key = randomBytes(KEY_LENGTH);
      const ciphertext = seal(key, data);
      return {
        ciphertext: new Uint8Array(ciphertext),
        key: key.toString('base64'),
        digest: createHash('sha256').update(ciphertext).digest('hex'),
      };
    },

    decryptAttachment(ciphertext, key, digest) {
      if (digest !== undefined && createHash('sha256').update(ciphertext).digest('hex') !== digest) {
        throw new DecryptionError('attachment digest mismatch');
      }
      const keyBytes = Buffer.from(key, 'base64');
      if (keyBytes.byteLength !== KEY_LENGTH) throw new DecryptionError('invalid attachment key');
      return new Uint8Array(open(keyBytes, ciphertext));
    },
  };
}
