import { describe, expect, it } from 'vitest';

import { closeTheses, synthesize } from '../../src/worldview/synthesizer.js';
import { createSectorTaxonomy } from '../../src/worldview/taxonomy.js';
import { emptyWorldview, type WorldviewState } from '../../src/worldview/types.js';
import { makeSignal, makeThesis, trustMap } from '../support/fixtures.js';

const taxonomy = createSectorTaxonomy({
  sectors: { crypto_ai: ['BTC', 'ETH'], defi: ['UNI'] },
  defaultSector: 'other',
});
const options = { sectorOf: taxonomy.sectorOf };

function priorWith(overrides: Partial<WorldviewState>): WorldviewState {
  return { ...emptyWorldview(), ...overrides };
}

describe('synthesize', () => {
  it('keeps a single average-trust signal at neutral confidence in a proposed thesis', () => {
    const { worldview, report } = synthesize(
      [makeSignal({ source: 'alice', confidence: 0.5 })],
      trustMap({}),
      emptyWorldview(),
      options
    );

    expect(worldview.state_id).toBe(1);
    expect(worldview.signal_cursor).toBe(1);
    expect(worldview.active_theses).toHaveLength(1);
    expect(worldview.active_theses[0]?.status).toBe('proposed');
    expect(worldview.active_theses[0]?.confidence).toBe(0.5);
    expect(report.formed).toEqual(['thesis_btc_1']);
    expect(report.activated).toEqual([]);
    expect(worldview.sector_views).toEqual({});
  });

  it('activates a thesis corroborated by two trusted sources', () => {
    const { worldview, report } = synthesize(
      [makeSignal({ source: 'A', confidence: 0.7 }), makeSignal({ source: 'B', confidence: 0.7 })],
      trustMap({ A: 0.8, B: 0.7 }),
      emptyWorldview(),
      options
    );

    const thesis = worldview.active_theses[0];
    expect(thesis?.id).toBe('thesis_btc_1');
    expect(thesis?.status).toBe('active');
    expect(thesis?.direction).toBe('long');
    expect(thesis?.confidence).toBeCloseTo(1.235 / 2.05, 10);
    expect(thesis?.evidence_mass).toBeCloseTo(2.05, 10);
    expect(thesis?.sources).toEqual(['A', 'B']);
    expect(thesis?.contributions.A?.weight).toBeCloseTo(0.56, 10);
    expect(report.activated).toEqual(['thesis_btc_1']);

    expect(worldview.sector_views.crypto_ai?.stance).toBe('bullish');
    expect(worldview.sector_views.crypto_ai?.theses).toEqual(['thesis_btc_1']);
    expect(worldview.macro_thesis.current_regime).toBe('risk_on');
    expect(worldview.macro_thesis.key_beliefs.map((belief) => belief.id)).toEqual(['crypto_ai:bullish']);
    expect(worldview.macro_thesis.key_beliefs[0]?.sources).toEqual(['A', 'B']);
    expect(worldview.as_of).toBe('2026-03-01T00:00:00.000Z');
  });

  it('is deterministic for identical inputs', () => {
    const signals = [
      makeSignal({ source: 'A', confidence: 0.7 }),
      makeSignal({ source: 'B', asset: 'UNI', direction: 'short', confidence: 0.8 }),
      makeSignal({ source: 'C', confidence: 0.9 }),
    ];
    const trust = trustMap({ A: 0.6, B: 0.9, C: 0.4 });

    const first = synthesize(signals, trust, emptyWorldview(), options);
    const second = synthesize(signals, trust, emptyWorldview(), options);

    expect(second).toEqual(first);
  });

  it('ignores signals without an extracted signal but still advances the cursor', () => {
    const { worldview, report } = synthesize(
      [makeSignal({ source: 'alice', extracted: false })],
      trustMap({}),
      emptyWorldview(),
      options
    );

    expect(report.ignored).toBe(1);
    expect(report.usable).toBe(0);
    expect(worldview.active_theses).toEqual([]);
    expect(worldview.signal_cursor).toBe(1);
  });

  it('uses the supplied store cursor when given', () => {
    const { worldview } = synthesize([], trustMap({}), emptyWorldview(), { ...options, signalCursor: 7 });
    expect(worldview.signal_cursor).toBe(7);
  });

  it('weights human overrides with human trust regardless of the ledger', () => {
    const { worldview } = synthesize(
      [makeSignal({ source: 'operator', asset: 'ETH', confidence: 0.9, addedBy: 'human' })],
      trustMap({ operator: 0.1 }),
      emptyWorldview(),
      options
    );

    expect(worldview.active_theses[0]?.confidence).toBeCloseTo(1.31 / 1.9, 10);
    expect(worldview.active_theses[0]?.status).toBe('proposed');
  });

  it('forms no thesis when long and short evidence are balanced', () => {
    const { worldview, report } = synthesize(
      [
        makeSignal({ source: 'P', direction: 'long', confidence: 0.6 }),
        makeSignal({ source: 'Q', direction: 'short', confidence: 0.6 }),
      ],
      trustMap({ P: 0.5, Q: 0.5 }),
      emptyWorldview(),
      options
    );

    expect(report.formed).toEqual([]);
    expect(worldview.active_theses).toEqual([]);
  });

  it('invalidates an active thesis on strong contrary evidence and drops dependent beliefs', () => {
    const prior = priorWith({
      state_id: 1,
      signal_cursor: 2,
      macro_thesis: {
        current_regime: 'risk_on',
        key_beliefs: [
          {
            id: 'crypto_ai:bullish',
            text: 'crypto_ai sector is bullish',
            confidence: 0.6,
            sources: ['alice', 'bob'],
            theses: ['thesis_btc_1'],
            reinforced_state_id: 1,
          },
        ],
      },
      active_theses: [makeThesis({ confidence: 0.6, evidence_mass: 2 })],
    });

    const { worldview, report } = synthesize(
      [
        makeSignal({ source: 'C', direction: 'short', confidence: 1 }),
        makeSignal({ source: 'D', direction: 'short', confidence: 1 }),
      ],
      trustMap({ C: 1, D: 1 }),
      prior,
      options
    );

    expect(report.invalidated).toEqual(['thesis_btc_1']);
    expect(worldview.active_theses[0]?.status).toBe('invalidated');
    expect(worldview.active_theses[0]?.confidence).toBeCloseTo(0.3, 10);
    expect(Object.keys(worldview.active_theses[0]?.dissent ?? {})).toEqual(['C', 'D']);
    expect(worldview.macro_thesis.key_beliefs).toEqual([]);
    expect(worldview.sector_views).toEqual({});
    expect(worldview.macro_thesis.current_regime).toBe('risk_on');

    const next = synthesize([], trustMap({}), worldview, options);
    expect(next.worldview.active_theses).toEqual([]);
    expect(next.worldview.state_id).toBe(3);
  });

  it('does not let a single contrary signal overturn an established thesis', () => {
    const prior = priorWith({
      state_id: 5,
      active_theses: [makeThesis({ confidence: 0.8, evidence_mass: 10 })],
    });

    const { worldview } = synthesize(
      [makeSignal({ source: 'E', direction: 'short', confidence: 1 })],
      trustMap({ E: 1 }),
      prior,
      options
    );

    expect(worldview.active_theses[0]?.status).toBe('active');
    expect(worldview.active_theses[0]?.confidence).toBeCloseTo(8 / 11, 10);
    expect(worldview.active_theses[0]?.evidence_mass).toBe(10);
  });

  it('flips a proposed thesis when the evidence turns against it', () => {
    const prior = priorWith({
      state_id: 1,
      active_theses: [
        makeThesis({
          status: 'proposed',
          confidence: 0.5,
          evidence_mass: 1,
          sources: ['alice'],
          contributions: { alice: { source_type: 'twitter', weight: 0.25 } },
        }),
      ],
    });

    const { worldview, report } = synthesize(
      [makeSignal({ source: 'X', direction: 'short', confidence: 0.8 })],
      trustMap({ X: 0.5 }),
      prior,
      options
    );

    const thesis = worldview.active_theses[0];
    expect(report.flipped).toEqual(['thesis_btc_1']);
    expect(thesis?.direction).toBe('short');
    expect(thesis?.confidence).toBeCloseTo(1 - 0.58 / 1.4, 10);
    expect(thesis?.sources).toEqual(['X']);
    expect(Object.keys(thesis?.dissent ?? {})).toEqual(['alice']);
    expect(thesis?.status).toBe('proposed');
  });

  it('decays unreinforced beliefs toward neutral', () => {
    const prior = priorWith({
      state_id: 3,
      macro_thesis: {
        current_regime: 'neutral',
        key_beliefs: [
          {
            id: 'defi:bullish',
            text: 'defi sector is bullish',
            confidence: 0.9,
            sources: ['alice'],
            theses: ['thesis_uni_1'],
            reinforced_state_id: 2,
          },
        ],
      },
    });

    const { worldview } = synthesize([], trustMap({}), prior, options);

    expect(worldview.macro_thesis.key_beliefs[0]?.confidence).toBeCloseTo(0.892, 10);
  });

  it('expires proposed theses that went unreinforced past their ttl', () => {
    const stale = makeThesis({ status: 'proposed', last_evidence_state_id: 1 });

    const kept = synthesize([], trustMap({}), priorWith({ state_id: 24, active_theses: [stale] }), options);
    expect(kept.worldview.active_theses).toHaveLength(1);

    const expired = synthesize([], trustMap({}), priorWith({ state_id: 25, active_theses: [stale] }), options);
    expect(expired.report.expired).toEqual(['thesis_btc_1']);
    expect(expired.worldview.active_theses).toEqual([]);
  });
});

describe('closeTheses', () => {
  it('marks theses closed and rebuilds sector views', () => {
    const worldview = priorWith({
      state_id: 4,
      sector_views: { crypto_ai: { stance: 'bullish', confidence: 0.6, theses: ['thesis_btc_1'] } },
      active_theses: [makeThesis()],
    });

    const closed = closeTheses(worldview, ['thesis_btc_1'], taxonomy.sectorOf);

    expect(closed.active_theses[0]?.status).toBe('closed');
    expect(closed.sector_views).toEqual({});
    expect(closed.state_id).toBe(4);
  });
});
