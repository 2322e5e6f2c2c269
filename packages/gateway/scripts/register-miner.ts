#!/usr/bin/env -S npx tsx
/**
 * Register a miner key
 *
 * Generates an Ed25519 keypair (or reuses MINER_SK_FILE if it exists),
 * writes the private key as hex, and upserts the public key into `miners`.
 *
 * Usage:
 *   cd packages/gateway && npx tsx scripts/register-miner.ts
 *
 * Environment:
 *   DATABASE_URL   — Postgres holding the miners table
 *   MINER_ID       — default 1
 *   MINER_SK_FILE  — default ./miner1_sk.hex
 */

import 'dotenv/config';
import * as fs from 'node:fs';
import { Pool } from 'pg';
import { generateMinerKeypair, keypairFromPrivateKey } from '../src/submission/index.js';
import { registerMiner } from '../src/persistence/postgres/index.js';
import { decodeHex } from '../src/utils/index.js';

const DATABASE_URL = process.env.DATABASE_URL ?? 'postgresql://localhost:5432/intake';
const MINER_ID = Number(process.env.MINER_ID ?? '1');
const SK_FILE = process.env.MINER_SK_FILE ?? './miner1_sk.hex';

async function loadOrCreateKeypair() {
  if (fs.existsSync(SK_FILE)) {
    const secret = decodeHex(fs.readFileSync(SK_FILE, 'utf8').trim());
    if (!secret) {
      throw new Error(`${SK_FILE} does not contain hex`);
    }
    return keypairFromPrivateKey(secret);
  }
  const keypair = await generateMinerKeypair();
  fs.writeFileSync(SK_FILE, Buffer.from(keypair.privateKey).toString('hex') + '\n', { mode: 0o600 });
  console.log(`Wrote new private key to ${SK_FILE}`);
  return keypair;
}

async function main() {
  if (!Number.isInteger(MINER_ID)) {
    throw new Error(`MINER_ID must be an integer, got ${process.env.MINER_ID}`);
  }

  const keypair = await loadOrCreateKeypair();
  const pool = new Pool({ connectionString: DATABASE_URL });
  try {
    await registerMiner(pool, MINER_ID, keypair.publicKeyHex);
    console.log(`Registered miner ${MINER_ID}`);
    console.log(`public key: ${keypair.publicKeyHex}`);
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('\n✗ Registration failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
