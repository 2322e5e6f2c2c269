#!/usr/bin/env -S npx tsx
/**
 * Example miner submission
 *
 * Builds a reproducibility artifact, signs the payload and posts it to
 * /submit. The signature covers the exact payload text that is sent.
 *
 * Usage:
 *   cd packages/gateway && npx tsx scripts/submit-example.ts
 *
 * Environment:
 *   GATEWAY_URL    — default http://localhost:8080
 *   MINER_ID       — default 1
 *   MINER_SK_FILE  — default ./miner1_sk.hex (see register-miner.ts)
 */

import * as fs from 'node:fs';
import { randomBytes } from 'node:crypto';
import {
  computeArtifactDigest,
  keypairFromPrivateKey,
  signPayload,
  SubmissionPayload,
} from '../src/submission/index.js';
import { decodeHex } from '../src/utils/index.js';

const GATEWAY_URL = process.env.GATEWAY_URL ?? 'http://localhost:8080';
const MINER_ID = Number(process.env.MINER_ID ?? '1');
const SK_FILE = process.env.MINER_SK_FILE ?? './miner1_sk.hex';

function log(step: string, message: string): void {
  console.log(`[${step}] ${message}`);
}

async function main() {
  const secret = decodeHex(fs.readFileSync(SK_FILE, 'utf8').trim());
  if (!secret) {
    throw new Error(`${SK_FILE} does not contain hex`);
  }
  const keypair = await keypairFromPrivateKey(secret);
  log('KEY', `public key: ${keypair.publicKeyHex}`);

  const taskRes = await fetch(`${GATEWAY_URL}/get_task`);
  if (!taskRes.ok) {
    throw new Error(`GET /get_task failed with HTTP ${taskRes.status}`);
  }
  const task: unknown = await taskRes.json();
  const taskId =
    typeof task === 'object' && task !== null && 'task_id' in task && typeof task.task_id === 'string'
      ? task.task_id
      : 'task-prod-001';
  log('TASK', taskId);

  const hyperparameters = { layers: [128, 64], activation: 'relu', lr: 0.001 };
  const artifact = Buffer.from(
    JSON.stringify({ 'hyperparameters.json': hyperparameters, 'train.py': '# training entry point\n' })
  );

  const payload: SubmissionPayload = {
    task_id: taskId,
    miner_id: MINER_ID,
    performance: 0.92,
    artifact_hash: computeArtifactDigest(artifact),
    hyperparameters,
    timestamp: Math.floor(Date.now() / 1000),
    // 48 random bits keeps the nonce a safe JSON integer
    nonce: randomBytes(6).readUIntBE(0, 6),
  };

  // Sign exactly what goes on the wire
  const payloadText = JSON.stringify(payload);
  const signature = await signPayload(Buffer.from(payloadText, 'utf8'), keypair.privateKey);

  const form = new FormData();
  form.append('payload', payloadText);
  form.append('signature', signature);
  form.append('artifact', new Blob([new Uint8Array(artifact)], { type: 'application/zip' }), 'repro.zip');

  const res = await fetch(`${GATEWAY_URL}/submit`, { method: 'POST', body: form });
  log('SUBMIT', `${res.status} ${await res.text()}`);
}

main().catch((err) => {
  console.error('\n✗ Submission failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
