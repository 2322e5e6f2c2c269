/**
 * SubmissionPipeline — Unit Tests
 *
 * Tests for:
 *   - Acceptance and ledger contents
 *   - Every rejection reason, with no ledger row written
 *   - Stage precedence (replay first, signature before commit)
 *   - Infrastructure failures as rejections
 *   - Event ordering and listener isolation
 */

import { describe, it, expect, beforeEach, beforeAll } from 'vitest';
import {
  createPipelineContext,
  DEFAULT_VERIFICATION_WINDOWS,
  InMemoryLedgerStore,
  InMemoryReplayStore,
  PipelineEvent,
  SubmissionPipeline,
  generateMinerKeypair,
  MinerKeypair,
} from '../../src/submission/index.js';
import { createNoopLogger } from '../../src/utils/index.js';
import {
  buildSignedSubmission,
  createPipelineHarness,
  createTestMiner,
  NOW,
  PipelineHarness,
  TestMiner,
  ToggleableReplayStore,
} from '../helpers/submission-fixtures.js';

describe('SubmissionPipeline', () => {
  let miner: TestMiner;
  let stranger: MinerKeypair;
  let h: PipelineHarness;

  beforeAll(async () => {
    miner = await createTestMiner(1);
    stranger = await generateMinerKeypair();
  });

  beforeEach(() => {
    let counter = 0;
    h = createPipelineHarness({ ledgerIds: () => `rec-${++counter}` });
    h.minerKeys.register({ miner_id: 1, public_key: miner.publicKeyHex });
  });

  // ===========================================================================
  // ACCEPTANCE
  // ===========================================================================

  describe('acceptance', () => {
    it('accepts a valid submission and writes one ledger row', async () => {
      const { envelope, payload } = await buildSignedSubmission(miner);

      expect(await h.pipeline.process(envelope)).toEqual({ status: 'accepted', recordId: 'rec-1' });
      expect(h.ledger.all()).toEqual([
        {
          id: 'rec-1',
          task_id: 't1',
          miner_id: 1,
          performance: 0.95,
          hyperparameters: { layers: [128, 64], activation: 'relu', lr: 0.001 },
          artifact_hash: payload.artifact_hash,
          timestamp: NOW,
        },
      ]);
    });

    it('verifies the received bytes, not a canonical re-encoding', async () => {
      const payloadText =
        '{ "nonce": 42,\n  "miner_id": 1, "task_id": "t1", "performance": 0.95,' +
        ' "artifact_hash": "HASH", "hyperparameters": {"lr": 0.001}, "timestamp": 1700000000 }';
      const base = await buildSignedSubmission(miner);
      const text = payloadText.replace('HASH', base.payload.artifact_hash);
      const { envelope } = await buildSignedSubmission(miner, { payloadText: text });

      expect((await h.pipeline.process(envelope)).status).toBe('accepted');
      expect(h.ledger.get('rec-1')?.hyperparameters).toEqual({ lr: 0.001 });
    });

    it('stores performance exactly as submitted', async () => {
      const { envelope } = await buildSignedSubmission(miner, { overrides: { performance: 0.123456789 } });
      await h.pipeline.process(envelope);
      expect(h.ledger.get('rec-1')?.performance).toBe(0.123456789);
    });

    it('accepts the same miner twice with different signatures', async () => {
      const first = await buildSignedSubmission(miner, { overrides: { nonce: 1 } });
      const second = await buildSignedSubmission(miner, { overrides: { nonce: 2 } });

      expect((await h.pipeline.process(first.envelope)).status).toBe('accepted');
      expect((await h.pipeline.process(second.envelope)).status).toBe('accepted');
      expect(h.ledger.count()).toBe(2);
    });
  });

  // ===========================================================================
  // REJECTIONS
  // ===========================================================================

  describe('rejections', () => {
    it('rejects an exact resubmission as replay', async () => {
      const { envelope } = await buildSignedSubmission(miner);
      await h.pipeline.process(envelope);

      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'replay' });
      expect(h.ledger.count()).toBe(1);
    });

    it('rejects a resubmission whose signature differs only in hex case', async () => {
      const { envelope } = await buildSignedSubmission(miner);
      await h.pipeline.process(envelope);

      const shouted = { ...envelope, signature: envelope.signature.toUpperCase() };
      expect(await h.pipeline.process(shouted)).toEqual({ status: 'rejected', reason: 'replay' });
    });

    it('rejects missing parts before anything else', async () => {
      const { envelope } = await buildSignedSubmission(miner);

      expect(await h.pipeline.process({ payload: envelope.payload, artifact: envelope.artifact })).toEqual({
        status: 'rejected',
        reason: 'missing_fields',
      });
      expect(await h.pipeline.process({})).toEqual({ status: 'rejected', reason: 'missing_fields' });
      // Token was not consumed
      expect(h.replayStore.ttl(`nonce:${envelope.signature}`)).toBe(-2);
    });

    it('rejects an undecodable payload', async () => {
      const { envelope } = await buildSignedSubmission(miner, { payloadText: '{"task_id": "t1"' });
      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'invalid_payload' });
    });

    it('rejects deeply nested hyperparameters with one logged decision', async () => {
      const events: PipelineEvent[] = [];
      h.pipeline.onEvent((e) => events.push(e));
      const base = await buildSignedSubmission(miner);
      const deep = '['.repeat(100_000) + ']'.repeat(100_000);
      const text = base.payloadText.replace(JSON.stringify(base.payload.hyperparameters), deep);
      const { envelope } = await buildSignedSubmission(miner, { payloadText: text });

      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'invalid_payload' });
      expect(events.map((e) => e.type)).toEqual(['SUBMISSION_RECEIVED', 'SUBMISSION_REJECTED']);
      expect(h.ledger.count()).toBe(0);
    });

    it('rejects a miner id beyond exact integer range', async () => {
      const base = await buildSignedSubmission(miner);
      const text = base.payloadText.replace('"miner_id":1,', '"miner_id":9007199254740993,');
      const { envelope } = await buildSignedSubmission(miner, { payloadText: text });

      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'invalid_payload' });
    });

    it('rejects stale and future timestamps', async () => {
      const stale = await buildSignedSubmission(miner, { overrides: { timestamp: NOW - 301 } });
      const future = await buildSignedSubmission(miner, { overrides: { timestamp: NOW + 61 } });

      expect(await h.pipeline.process(stale.envelope)).toEqual({ status: 'rejected', reason: 'stale_timestamp' });
      expect(await h.pipeline.process(future.envelope)).toEqual({ status: 'rejected', reason: 'stale_timestamp' });
    });

    it('rejects an artifact that does not match the claimed digest', async () => {
      const { envelope } = await buildSignedSubmission(miner);
      const swapped = { ...envelope, artifact: Buffer.from('different weights') };

      expect(await h.pipeline.process(swapped)).toEqual({ status: 'rejected', reason: 'artifact_hash_mismatch' });
    });

    it('rejects an unregistered miner', async () => {
      const unknown = await createTestMiner(404);
      const { envelope } = await buildSignedSubmission(unknown);

      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'unknown_miner' });
    });

    it('rejects stored keys that are not hex, or not a valid key', async () => {
      h.minerKeys.register({ miner_id: 2, public_key: 'xyz' });
      h.minerKeys.register({ miner_id: 3, public_key: 'ab'.repeat(31) });
      const two = await buildSignedSubmission(await createTestMiner(2));
      const three = await buildSignedSubmission(await createTestMiner(3));

      expect(await h.pipeline.process(two.envelope)).toEqual({ status: 'rejected', reason: 'invalid_pubkey' });
      expect(await h.pipeline.process(three.envelope)).toEqual({ status: 'rejected', reason: 'bad_pubkey' });
    });

    it('rejects a signature from another key', async () => {
      const { envelope } = await buildSignedSubmission(miner, { signer: stranger });
      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'bad_signature' });
    });

    it('classifies malformed signatures', async () => {
      const { envelope } = await buildSignedSubmission(miner);

      expect(await h.pipeline.process({ ...envelope, signature: 'zz'.repeat(64) })).toEqual({
        status: 'rejected',
        reason: 'bad_signature',
      });
      expect(await h.pipeline.process({ ...envelope, signature: '00'.repeat(63) })).toEqual({
        status: 'rejected',
        reason: 'signature_parse_error',
      });
    });

    it('writes no ledger row for any rejection', async () => {
      const { envelope } = await buildSignedSubmission(miner, { signer: stranger });
      await h.pipeline.process(envelope);
      await h.pipeline.process({ ...envelope, artifact: Buffer.alloc(0) });
      await h.pipeline.process({});

      expect(h.ledger.count()).toBe(0);
    });
  });

  // ===========================================================================
  // PRECEDENCE
  // ===========================================================================

  describe('stage precedence', () => {
    it('consumes the token even when a later stage rejects', async () => {
      const { envelope } = await buildSignedSubmission(miner, { overrides: { timestamp: NOW - 1000 } });

      expect((await h.pipeline.process(envelope)).status).toBe('rejected');
      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'replay' });
    });

    it('reports replay ahead of a bad signature', async () => {
      const { envelope } = await buildSignedSubmission(miner, { signer: stranger });

      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'bad_signature' });
      expect(await h.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'replay' });
    });

    it('reports staleness ahead of an artifact mismatch', async () => {
      const { envelope } = await buildSignedSubmission(miner, { overrides: { timestamp: NOW - 301 } });
      const swapped = { ...envelope, artifact: Buffer.from('x') };

      expect(await h.pipeline.process(swapped)).toEqual({ status: 'rejected', reason: 'stale_timestamp' });
    });

    it('reports an artifact mismatch ahead of an unknown miner', async () => {
      const { envelope } = await buildSignedSubmission(await createTestMiner(77));
      const swapped = { ...envelope, artifact: Buffer.from('x') };

      expect(await h.pipeline.process(swapped)).toEqual({
        status: 'rejected',
        reason: 'artifact_hash_mismatch',
      });
    });

    it('accepts exactly one of several concurrent identical envelopes', async () => {
      const { envelope } = await buildSignedSubmission(miner);
      const decisions = await Promise.all(Array.from({ length: 5 }, () => h.pipeline.process(envelope)));

      expect(decisions.filter((d) => d.status === 'accepted')).toHaveLength(1);
      expect(decisions.filter((d) => d.status === 'rejected' && d.reason === 'replay')).toHaveLength(4);
      expect(h.ledger.count()).toBe(1);
    });
  });

  // ===========================================================================
  // INFRASTRUCTURE FAILURES
  // ===========================================================================

  describe('infrastructure failures', () => {
    it('rejects with redis_error and accepts the same envelope once the cache is back', async () => {
      const replay = new ToggleableReplayStore();
      const harness = createPipelineHarness({ replayStore: replay });
      harness.minerKeys.register({ miner_id: 1, public_key: miner.publicKeyHex });
      const { envelope } = await buildSignedSubmission(miner);

      replay.down = true;
      expect(await harness.pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'redis_error' });
      expect(harness.ledger.count()).toBe(0);

      replay.down = false;
      expect((await harness.pipeline.process(envelope)).status).toBe('accepted');
    });

    it('rejects with db_error when the key store is down', async () => {
      const pipeline = new SubmissionPipeline(
        createPipelineContext({
          replayStore: new InMemoryReplayStore(() => NOW),
          minerKeys: {
            findPublicKey: async () => {
              throw new Error('connection terminated unexpectedly');
            },
          },
          ledger: new InMemoryLedgerStore(),
          windows: DEFAULT_VERIFICATION_WINDOWS,
          clock: () => NOW,
          logger: createNoopLogger(),
        })
      );
      const { envelope } = await buildSignedSubmission(miner);

      expect(await pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'db_error' });
    });

    it('rejects with db_error when the ledger insert fails, leaving the token consumed', async () => {
      const pipeline = new SubmissionPipeline(
        createPipelineContext({
          replayStore: new InMemoryReplayStore(() => NOW),
          minerKeys: { findPublicKey: async () => miner.publicKeyHex },
          ledger: {
            insert: async () => {
              throw new Error('relation "ledger" does not exist');
            },
          },
          windows: DEFAULT_VERIFICATION_WINDOWS,
          clock: () => NOW,
          logger: createNoopLogger(),
        })
      );
      const { envelope } = await buildSignedSubmission(miner);

      expect(await pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'db_error' });
      expect(await pipeline.process(envelope)).toEqual({ status: 'rejected', reason: 'replay' });
    });

    it('still accepts when only the token expiry fails', async () => {
      const replay = new ToggleableReplayStore();
      replay.failExpire = true;
      const harness = createPipelineHarness({ replayStore: replay });
      harness.minerKeys.register({ miner_id: 1, public_key: miner.publicKeyHex });
      const { envelope } = await buildSignedSubmission(miner);

      expect((await harness.pipeline.process(envelope)).status).toBe('accepted');
    });
  });

  // ===========================================================================
  // EVENTS & CONTEXT
  // ===========================================================================

  describe('events', () => {
    it('emits received, each passed stage, then accepted', async () => {
      const events: PipelineEvent[] = [];
      h.pipeline.onEvent((e) => events.push(e));
      const { envelope } = await buildSignedSubmission(miner);

      await h.pipeline.process(envelope);

      expect(events.map((e) => (e.type === 'STAGE_PASSED' ? e.stage : e.type))).toEqual([
        'SUBMISSION_RECEIVED',
        'REPLAY',
        'FRESHNESS',
        'INTEGRITY',
        'KEY_LOOKUP',
        'SIGNATURE',
        'COMMIT',
        'SUBMISSION_ACCEPTED',
      ]);
      const ids = new Set(events.map((e) => e.submissionId));
      expect(ids.size).toBe(1);
    });

    it('names the failing stage on rejection', async () => {
      const events: PipelineEvent[] = [];
      h.pipeline.onEvent((e) => events.push(e));
      const { envelope } = await buildSignedSubmission(miner, { signer: stranger });

      await h.pipeline.process(envelope);

      const last = events[events.length - 1];
      expect(last?.type).toBe('SUBMISSION_REJECTED');
      if (last?.type === 'SUBMISSION_REJECTED') {
        expect(last.reason).toBe('bad_signature');
        expect(last.stage).toBe('SIGNATURE');
      }
    });

    it('emits a rejection for transport-level failures', () => {
      const events: PipelineEvent[] = [];
      h.pipeline.onEvent((e) => events.push(e));

      expect(h.pipeline.rejectEnvelope('artifact_too_large')).toEqual({
        status: 'rejected',
        reason: 'artifact_too_large',
      });
      expect(events.map((e) => e.type)).toEqual(['SUBMISSION_RECEIVED', 'SUBMISSION_REJECTED']);
    });

    it('is not affected by a throwing listener', async () => {
      h.pipeline.onEvent(() => {
        throw new Error('listener exploded');
      });
      const { envelope } = await buildSignedSubmission(miner);

      expect((await h.pipeline.process(envelope)).status).toBe('accepted');
    });
  });

  describe('context', () => {
    it('is frozen, windows included', () => {
      const ctx = createPipelineContext({
        replayStore: new InMemoryReplayStore(),
        minerKeys: { findPublicKey: async () => null },
        ledger: new InMemoryLedgerStore(),
        windows: { ...DEFAULT_VERIFICATION_WINDOWS },
        clock: () => NOW,
        logger: createNoopLogger(),
      });

      expect(Object.isFrozen(ctx)).toBe(true);
      expect(Object.isFrozen(ctx.windows)).toBe(true);
    });
  });
});
