import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { Logger } from '../../src/core/logger.js';
import { appendHumanSignal, generateSignalId, runIngestion } from '../../src/intel/pipeline.js';
import { StaticSignalSource, type SignalSource } from '../../src/intel/sources.js';
import { SignalStore } from '../../src/intel/store.js';
import { tempDir } from '../support/fixtures.js';

const quiet = new Logger('error');
const now = () => new Date('2026-03-01T12:00:00.000Z');

function store(): SignalStore {
  return new SignalStore(join(tempDir('ingest'), 'alpha.jsonl'));
}

const validRecord = {
  id: 'alpha_000000000001',
  source: 'alice',
  source_type: 'twitter',
  timestamp: '2026-03-01T00:00:00.000Z',
  raw_content: 'BTC looks strong',
  extracted_signal: { asset: 'btc', direction: 'long', confidence: 0.7 },
};

describe('runIngestion', () => {
  it('stores valid records and reports malformed and duplicate ones', async () => {
    const target = store();
    const source = new StaticSignalSource('feed', [
      validRecord,
      { id: 'bad', source: 'bob', source_type: 'fax' },
      validRecord,
      'not json',
    ]);

    const result = await runIngestion([source], target, { timeoutMs: 50, retries: 0, logger: quiet, now });

    expect(result.stored).toBe(1);
    expect(result.duplicates).toBe(1);
    expect(result.malformed.map((error) => error.signalId)).toEqual(['bad', null]);
    expect(result.gaps).toEqual([]);

    const [stored] = target.readFrom(0).signals;
    expect(stored?.extracted_signal?.asset).toBe('BTC');
    expect(stored?.added_by).toBe('machine');
    expect(stored?.ingested_at).toBe('2026-03-01T12:00:00.000Z');
  });

  it('records a gap for a failing or empty source and keeps going', async () => {
    const target = store();
    const broken: SignalSource = {
      name: 'broken',
      fetchSignals: async () => {
        throw new Error('boom');
      },
    };

    const result = await runIngestion(
      [broken, new StaticSignalSource('quiet', []), new StaticSignalSource('feed', [validRecord])],
      target,
      { timeoutMs: 50, retries: 0, logger: quiet, now }
    );

    expect(result.gaps.map((gap) => gap.message)).toEqual([
      'Source broken failed: boom',
      'Source quiet returned no records',
    ]);
    expect(result.stored).toBe(1);
  });

  it('retries transient source errors', async () => {
    let calls = 0;
    const flaky: SignalSource = {
      name: 'flaky',
      fetchSignals: async () => {
        calls += 1;
        if (calls === 1) throw new Error('ECONNRESET');
        return [validRecord];
      },
    };

    const result = await runIngestion([flaky], store(), {
      timeoutMs: 50,
      retries: 2,
      retryBaseDelayMs: 0,
      logger: quiet,
      now,
    });

    expect(calls).toBe(2);
    expect(result.stored).toBe(1);
    expect(result.gaps).toEqual([]);
  });
});

describe('appendHumanSignal', () => {
  it('appends an operator override through validation', () => {
    const target = store();
    const signal = appendHumanSignal(
      target,
      { source: 'operator', sourceType: 'website', asset: 'eth', direction: 'short', confidence: 0.9 },
      now()
    );

    expect(signal.added_by).toBe('human');
    expect(signal.extracted_signal).toEqual({ asset: 'ETH', direction: 'short', confidence: 0.9 });
    expect(signal.raw_content).toBe('SHORT ETH (operator override)');
    expect(signal.id).toBe(generateSignalId('operator', 'SHORT ETH (operator override)', '2026-03-01T12:00:00.000Z'));
    expect(target.count()).toBe(1);
  });

  it('rejects an out-of-range confidence', () => {
    expect(() =>
      appendHumanSignal(
        store(),
        { source: 'operator', sourceType: 'website', asset: 'ETH', direction: 'long', confidence: 1.5 },
        now()
      )
    ).toThrow(/extracted_signal\.confidence/);
  });
});

describe('generateSignalId', () => {
  it('derives a stable alpha_ id', () => {
    const id = generateSignalId('alice', 'content', '2026-03-01T00:00:00.000Z');
    expect(id).toMatch(/^alpha_[0-9a-f]{12}$/);
    expect(generateSignalId('alice', 'content', '2026-03-01T00:00:00.000Z')).toBe(id);
  });
});
