import type { SourceType } from '../intel/schema.js';
import { isOpenAction, type Trade } from '../execution/types.js';
import {
  findSource,
  newSourceWeight,
  type SourceWeight,
  type TrustLedgerDocument,
} from '../memory/trust_ledger.js';

export type AttributionPolicy = 'equal' | 'weighted';

export interface ReflectionSettings {
  learningRate: number;
  pnlCap: number;
  attribution: AttributionPolicy;
  defaultTrust: number;
}

export const DEFAULT_REFLECTION_SETTINGS: ReflectionSettings = {
  learningRate: 0.05,
  pnlCap: 1,
  attribution: 'equal',
  defaultTrust: 0.5,
};

export interface TrustUpdate {
  tradeId: string;
  source: string;
  sourceType: SourceType;
  before: number;
  after: number;
  pnl: number;
}

export interface ReflectionResult {
  ledger: TrustLedgerDocument;
  applied: string[];
  skipped: Array<{ tradeId: string; reason: string }>;
  updates: TrustUpdate[];
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Bounded step: sign of the outcome scaled by its capped magnitude. */
export function trustDelta(pnl: number, settings: ReflectionSettings): number {
  const magnitude = Math.min(Math.abs(pnl), settings.pnlCap);
  return settings.learningRate * Math.sign(pnl) * magnitude;
}

function upsertSource(
  ledger: TrustLedgerDocument,
  source: string,
  sourceType: SourceType,
  defaultTrust: number
): { sourceType: SourceType; weight: SourceWeight } {
  const existing = findSource(ledger, source);
  if (existing) {
    return existing;
  }
  const weight = newSourceWeight(source, clampUnit(defaultTrust));
  ledger.sources[sourceType].push(weight);
  return { sourceType, weight };
}

/**
 * Apply matured trade outcomes to source trust. Trades already in
 * `processed_trade_ids` are skipped, so replaying the same batch is a no-op.
 * The input ledger is not mutated.
 */
export function reflect(
  matured: Trade[],
  ledger: TrustLedgerDocument,
  settings: ReflectionSettings,
  now: Date
): ReflectionResult {
  const next = structuredClone(ledger);
  const processed = new Set(next.processed_trade_ids);
  const applied: string[] = [];
  const skipped: ReflectionResult['skipped'] = [];
  const updates: TrustUpdate[] = [];
  const stamp = now.toISOString();

  const ordered = [...matured].sort((a, b) => a.seq - b.seq);
  for (const trade of ordered) {
    if (processed.has(trade.id)) {
      skipped.push({ tradeId: trade.id, reason: 'already reflected' });
      continue;
    }
    if (!isOpenAction(trade.action)) {
      skipped.push({ tradeId: trade.id, reason: 'not an opening trade' });
      continue;
    }
    const pnl = trade.pnl;
    if (pnl === null) {
      skipped.push({ tradeId: trade.id, reason: 'not settled' });
      continue;
    }

    const delta = trustDelta(pnl, settings);
    const maxWeight = Math.max(0, ...trade.attribution.map((item) => item.weight));
    for (const item of trade.attribution) {
      const entry = upsertSource(next, item.source, item.source_type, settings.defaultTrust);
      const share = settings.attribution === 'weighted' && maxWeight > 0 ? item.weight / maxWeight : 1;
      const weight = entry.weight;
      const before = weight.trust;
      weight.trust = clampUnit(before + delta * share);
      weight.sample_count += 1;
      if (pnl > 0) weight.wins += 1;
      if (pnl < 0) weight.losses += 1;
      weight.cumulative_pnl += pnl;
      weight.accuracy = weight.sample_count > 0 ? weight.wins / weight.sample_count : 0;
      weight.updated_at = stamp;
      updates.push({
        tradeId: trade.id,
        source: item.source,
        sourceType: entry.sourceType,
        before,
        after: weight.trust,
        pnl,
      });
    }

    processed.add(trade.id);
    next.processed_trade_ids.push(trade.id);
    applied.push(trade.id);
  }

  if (applied.length > 0) {
    next.updated_at = stamp;
  }
  return { ledger: next, applied, skipped, updates };
}
