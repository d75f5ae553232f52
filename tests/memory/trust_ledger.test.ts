import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { TrustLedgerStore, listSources, trustLookup } from '../../src/memory/trust_ledger.js';
import { tempDir } from '../support/fixtures.js';

describe('TrustLedgerStore', () => {
  it('loads a grouped ledger and fills statistics defaults', () => {
    const path = join(tempDir('ledger'), 'source_weights.json');
    writeFileSync(
      path,
      JSON.stringify({
        sources: {
          twitter: [{ id: 'alice', handle: '@alice', trust: 0.8 }],
          substack: [{ id: 'macro-letter', trust: 0.6, sample_count: 4, wins: 3, accuracy: 0.75 }],
        },
      }),
      'utf-8'
    );

    const ledger = new TrustLedgerStore(path).load();

    expect(ledger.version).toBe(1);
    expect(ledger.sources.telegram).toEqual([]);
    expect(ledger.processed_trade_ids).toEqual([]);
    expect(listSources(ledger).map((entry) => [entry.sourceType, entry.weight.id])).toEqual([
      ['twitter', 'alice'],
      ['substack', 'macro-letter'],
    ]);

    const lookup = trustLookup(ledger);
    expect(lookup.trustOf('alice')).toBe(0.8);
    expect(lookup.trustOf('@alice')).toBe(0.8);
    expect(lookup.trustOf('nobody')).toBeUndefined();
  });

  it('rejects trust outside [0, 1]', () => {
    const path = join(tempDir('ledger'), 'source_weights.json');
    writeFileSync(path, JSON.stringify({ sources: { twitter: [{ id: 'alice', trust: 1.4 }] } }), 'utf-8');

    expect(() => new TrustLedgerStore(path).load()).toThrow(/sources\.twitter\.0\.trust/);
  });
});
