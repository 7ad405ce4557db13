import { generateKeyPairSync } from 'node:crypto';
import { z } from 'zod';
import { logger } from '@relaypost/shared';
import type { Db } from './db.js';

const log = logger.child({ module: 'key-store' });

/** Raw OKP key material, base64url as in a JWK (`x` public, `d` private). */
export interface KeyPairMaterial {
  publicKey: string;
  privateKey: string;
}

export interface IdentityKeys {
  /** Key agreement */
  x25519: KeyPairMaterial;
  /** Signatures */
  ed25519: KeyPairMaterial;
}

export interface KeyStore {
  generate(): IdentityKeys;
  fetch(): IdentityKeys | undefined;
  /** Existing keys, or freshly generated ones on first run */
  ensure(): IdentityKeys;
  clear(): void;
}

const materialSchema = z.object({ publicKey: z.string().min(1), privateKey: z.string().min(1) });

function generatePair(curve: 'x25519' | 'ed25519'): KeyPairMaterial {
  const { privateKey } =
    curve === 'x25519' ? generateKeyPairSync('x25519') : generateKeyPairSync('ed25519');
  const jwk = privateKey.export({ format: 'jwk' });
  if (!jwk.x || !jwk.d) throw new Error(`exported ${curve} key is missing its components`);
  return { publicKey: jwk.x, privateKey: jwk.d };
}

export function createKeyStore(db: Db): KeyStore {
  const selectStmt = db.prepare<[string], { data: string }>('SELECT data FROM identity WHERE variant = ?');
  const upsertStmt = db.prepare<[string, string]>('INSERT OR REPLACE INTO identity (variant, data) VALUES (?, ?)');
  const clearStmt = db.prepare<[]>('DELETE FROM identity');

  function read(variant: keyof IdentityKeys): KeyPairMaterial | undefined {
    const row = selectStmt.get(variant);
    if (!row) return undefined;
    const parsed = materialSchema.safeParse(JSON.parse(row.data));
    if (!parsed.success) {
      log.error({ variant, issues: parsed.error.issues }, 'stored identity key is malformed');
      return undefined;
    }
    return parsed.data;
  }

  const store: KeyStore = {
    generate() {
      const keys: IdentityKeys = { x25519: generatePair('x25519'), ed25519: generatePair('ed25519') };
      db.transaction(() => {
        upsertStmt.run('x25519', JSON.stringify(keys.x25519));
        upsertStmt.run('ed25519', JSON.stringify(keys.ed25519));
      })();
      log.info('generated identity keys');
      return keys;
    },

    fetch() {
      const x25519 = read('x25519');
      const ed25519 = read('ed25519');
      return x25519 && ed25519 ? { x25519, ed25519 } : undefined;
    },

    ensure() {
      return store.fetch() ?? store.generate();
    },

    clear() {
      clearStmt.run();
      log.warn('cleared identity keys');
    },
  };
  return store;
}
