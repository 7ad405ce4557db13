import { createPublicKey, verify } from 'node:crypto';
import { vi } from 'vitest';
import { createCrypto, type Crypto } from '../crypto.js';
import { openDatabase, type Db } from '../db.js';
import { createKeyStore, type KeyStore } from '../key-store.js';
import { createMessageStore, type MessageStore } from '../message-store.js';
import type { MessagingApi } from '../server-client.js';

export function createFakeApi() {
  return {
    sendMessage: vi.fn<MessagingApi['sendMessage']>().mockResolvedValue({ hash: 'server-hash-1' }),
    fetchMessages: vi.fn<MessagingApi['fetchMessages']>().mockResolvedValue([]),
    uploadFile: vi.fn<MessagingApi['uploadFile']>().mockResolvedValue({ id: 'file-1', url: 'https://files.test/file-1' }),
    downloadFile: vi.fn<MessagingApi['downloadFile']>().mockResolvedValue(new Uint8Array()),
    registerPushToken: vi.fn<MessagingApi['registerPushToken']>().mockResolvedValue(undefined),
    batch: vi.fn<MessagingApi['batch']>().mockResolvedValue([{ code: 200, headers: {} }, undefined]),
  } satisfies MessagingApi;
}

export type FakeApi = ReturnType<typeof createFakeApi>;

export interface TestEnvironment {
  db: Db;
  api: FakeApi;
  storage: MessageStore;
  keys: KeyStore;
  crypto: Crypto;
}

export function createTestEnvironment(): TestEnvironment {
  const db = openDatabase(':memory:');
  const keys = createKeyStore(db);
  return {
    db,
    api: createFakeApi(),
    storage: createMessageStore(db),
    keys,
    crypto: createCrypto(keys.generate()),
  };
}

/** A second party with its own keys, for encrypting to or from the local user. */
export function createPeer(): Crypto {
  const db = openDatabase(':memory:');
  const crypto = createCrypto(createKeyStore(db).generate());
  db.close();
  return crypto;
}

/** Check an Ed25519 signature against a base64url public key, the way a peer or the push server would. */
export function verifySignature(data: Uint8Array, signature: Uint8Array, signingPublicKey: string): boolean {
  const key = createPublicKey({ key: { kty: 'OKP', crv: 'Ed25519', x: signingPublicKey }, format: 'jwk' });
  return verify(null, data, key, signature);
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
