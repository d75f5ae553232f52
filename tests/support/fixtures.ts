import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { AlphaSignal, SignalDirection, SourceType } from '../../src/intel/schema.js';
import type { Thesis } from '../../src/worldview/types.js';

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `worldview-${prefix}-`));
}

let signalCounter = 0;

export function makeSignal(params: {
  source: string;
  asset?: string;
  direction?: SignalDirection;
  confidence?: number;
  sourceType?: SourceType;
  timestamp?: string;
  addedBy?: 'machine' | 'human';
  extracted?: boolean;
}): AlphaSignal {
  signalCounter += 1;
  const extracted = params.extracted ?? true;
  return {
    id: `alpha_test_${signalCounter}`,
    source: params.source,
    source_type: params.sourceType ?? 'twitter',
    timestamp: params.timestamp ?? '2026-03-01T00:00:00.000Z',
    raw_content: `${params.direction ?? 'long'} ${params.asset ?? 'BTC'}`,
    extracted_signal: extracted
      ? {
          asset: params.asset ?? 'BTC',
          direction: params.direction ?? 'long',
          confidence: params.confidence ?? 0.7,
        }
      : null,
    added_by: params.addedBy ?? 'machine',
  };
}

export function makeThesis(overrides: Partial<Thesis> = {}): Thesis {
  return {
    id: 'thesis_btc_1',
    asset: 'BTC',
    direction: 'long',
    thesis: 'LONG BTC on alpha from alice, bob',
    confidence: 0.6,
    status: 'active',
    sources: ['alice', 'bob'],
    contributions: {
      alice: { source_type: 'twitter', weight: 0.5 },
      bob: { source_type: 'substack', weight: 0.4 },
    },
    dissent: {},
    evidence_mass: 2,
    created_state_id: 1,
    last_evidence_state_id: 1,
    updated_at: '2026-03-01T00:00:00.000Z',
    ...overrides,
  };
}

export function trustMap(entries: Record<string, number>): { trustOf: (source: string) => number | undefined } {
  return { trustOf: (source) => entries[source] };
}
