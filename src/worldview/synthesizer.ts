/**
 * Worldview Synthesizer
 *
 * Folds a batch of new signals into the prior worldview:
 * - trust-discounted evidence is blended into per-asset theses
 * - theses move proposed -> active -> invalidated on thresholds
 * - sector stances and the macro regime are re-derived from active theses
 * - key beliefs are reinforced, contradicted or decayed toward neutral
 *
 * Pure function of its inputs. Nothing here reads the clock.
 */

import type { AlphaSignal, SignalDirection, SourceType, TradeDirection } from '../intel/schema.js';
import { isTradeDirection, oppositeDirection } from '../intel/schema.js';
import type {
  Belief,
  Contribution,
  MacroRegime,
  SectorStance,
  SectorView,
  Thesis,
  WorldviewState,
} from './types.js';
import { isLiveThesis } from './types.js';

export interface SynthesisSettings {
  formationThreshold: number;
  invalidationThreshold: number;
  minCorroboratingSources: number;
  priorMass: number;
  maxEvidenceMass: number;
  beliefDecayRate: number;
  defaultTrust: number;
  humanTrust: number;
  proposedTtlCycles: number;
}

export const DEFAULT_SYNTHESIS_SETTINGS: SynthesisSettings = {
  formationThreshold: 0.55,
  invalidationThreshold: 0.35,
  minCorroboratingSources: 2,
  priorMass: 1,
  maxEvidenceMass: 10,
  beliefDecayRate: 0.02,
  defaultTrust: 0.5,
  humanTrust: 1,
  proposedTtlCycles: 24,
};

export interface TrustLookup {
  trustOf(source: string): number | undefined;
}

export type SectorOf = (asset: string) => string;

export interface SynthesisOptions {
  sectorOf: SectorOf;
  settings?: Partial<SynthesisSettings>;
  /** Signal Store cursor after this batch. Defaults to prior cursor + batch size. */
  signalCursor?: number;
}

export interface SynthesisReport {
  stateId: number;
  consumed: number;
  usable: number;
  ignored: number;
  formed: string[];
  activated: string[];
  invalidated: string[];
  flipped: string[];
  expired: string[];
}

export interface SynthesisResult {
  worldview: WorldviewState;
  report: SynthesisReport;
}

interface Evidence {
  source: string;
  sourceType: SourceType;
  direction: SignalDirection;
  confidence: number;
  weight: number;
  timestamp: string;
}

const STATUS_RANK: Record<Thesis['status'], number> = {
  active: 0,
  proposed: 1,
  invalidated: 2,
  closed: 3,
};

function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function laterTimestamp(a: string | null, b: string | null): string | null {
  if (!a) return b;
  if (!b) return a;
  return Date.parse(b) > Date.parse(a) ? b : a;
}

function resolveTrust(signal: AlphaSignal, trust: TrustLookup, settings: SynthesisSettings): number {
  if (signal.added_by === 'human') {
    return clampUnit(settings.humanTrust);
  }
  const known = trust.trustOf(signal.source);
  return clampUnit(known ?? settings.defaultTrust);
}

function collectEvidence(
  signals: AlphaSignal[],
  trust: TrustLookup,
  settings: SynthesisSettings
): { byAsset: Map<string, Evidence[]>; usable: number } {
  const byAsset = new Map<string, Evidence[]>();
  let usable = 0;
  for (const signal of signals) {
    const extracted = signal.extracted_signal;
    if (!extracted) continue;
    usable += 1;
    const sourceTrust = resolveTrust(signal, trust, settings);
    const evidence: Evidence = {
      source: signal.source,
      sourceType: signal.source_type,
      direction: extracted.direction,
      confidence: extracted.confidence,
      weight: extracted.confidence * sourceTrust,
      timestamp: signal.timestamp,
    };
    const list = byAsset.get(extracted.asset) ?? [];
    list.push(evidence);
    byAsset.set(extracted.asset, list);
  }
  return { byAsset, usable };
}

function describeThesis(asset: string, direction: TradeDirection, sources: string[]): string {
  const backers = sources.length > 0 ? sources.join(', ') : 'no corroborating sources yet';
  return `${direction.toUpperCase()} ${asset} on alpha from ${backers}`;
}

function dominantDirection(evidence: Evidence[]): TradeDirection | null {
  let longWeight = 0;
  let shortWeight = 0;
  for (const item of evidence) {
    if (item.direction === 'long') longWeight += item.weight;
    if (item.direction === 'short') shortWeight += item.weight;
  }
  if (longWeight === shortWeight) return null;
  return longWeight > shortWeight ? 'long' : 'short';
}

function addContribution(
  record: Record<string, Contribution>,
  source: string,
  sourceType: SourceType,
  weight: number
): Record<string, Contribution> {
  const current = record[source];
  return {
    ...record,
    [source]: {
      source_type: current?.source_type ?? sourceType,
      weight: (current?.weight ?? 0) + weight,
    },
  };
}

function openThesis(asset: string, direction: TradeDirection, stateId: number, settings: SynthesisSettings): Thesis {
  return {
    id: `thesis_${asset.toLowerCase()}_${stateId}`,
    asset,
    direction,
    thesis: describeThesis(asset, direction, []),
    confidence: 0.5,
    status: 'proposed',
    sources: [],
    contributions: {},
    dissent: {},
    evidence_mass: settings.priorMass,
    created_state_id: stateId,
    last_evidence_state_id: stateId,
    updated_at: null,
  };
}

/**
 * Recency-weighted evidence accumulation. The prior confidence is weighted by
 * the thesis's accumulated mass, each new observation by trust x confidence.
 */
function blendEvidence(thesis: Thesis, evidence: Evidence[], stateId: number, settings: SynthesisSettings): Thesis {
  let numerator = thesis.evidence_mass * thesis.confidence;
  let denominator = thesis.evidence_mass;
  let contributions = thesis.contributions;
  let dissent = thesis.dissent;
  let updatedAt = thesis.updated_at;

  for (const item of evidence) {
    let value = 0.5;
    if (item.direction === thesis.direction) {
      value = item.confidence;
      contributions = addContribution(contributions, item.source, item.sourceType, item.weight);
    } else if (isTradeDirection(item.direction)) {
      value = 1 - item.confidence;
      dissent = addContribution(dissent, item.source, item.sourceType, item.weight);
    }
    numerator += item.weight * value;
    denominator += item.weight;
    updatedAt = laterTimestamp(updatedAt, item.timestamp);
  }

  const confidence = denominator > 0 ? clampUnit(numerator / denominator) : thesis.confidence;
  const sources = Object.keys(contributions);
  return {
    ...thesis,
    confidence,
    contributions,
    dissent,
    sources,
    thesis: describeThesis(thesis.asset, thesis.direction, sources),
    evidence_mass: Math.min(denominator, settings.maxEvidenceMass),
    last_evidence_state_id: stateId,
    updated_at: updatedAt,
  };
}

function flipThesis(thesis: Thesis): Thesis {
  const direction = oppositeDirection(thesis.direction);
  const sources = Object.keys(thesis.dissent);
  return {
    ...thesis,
    direction,
    confidence: 1 - thesis.confidence,
    contributions: thesis.dissent,
    dissent: thesis.contributions,
    sources,
    thesis: describeThesis(thesis.asset, direction, sources),
  };
}

function compareTheses(a: Thesis, b: Thesis): number {
  const rank = STATUS_RANK[a.status] - STATUS_RANK[b.status];
  if (rank !== 0) return rank;
  if (b.confidence !== a.confidence) return b.confidence - a.confidence;
  if (a.asset !== b.asset) return a.asset < b.asset ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function deriveSectorViews(theses: Thesis[], sectorOf: SectorOf): Record<string, SectorView> {
  const grouped = new Map<string, Thesis[]>();
  for (const thesis of theses) {
    if (thesis.status !== 'active') continue;
    const sector = sectorOf(thesis.asset);
    const list = grouped.get(sector) ?? [];
    list.push(thesis);
    grouped.set(sector, list);
  }

  const views: Record<string, SectorView> = {};
  for (const sector of [...grouped.keys()].sort()) {
    const members = grouped.get(sector) ?? [];
    let longWeight = 0;
    let shortWeight = 0;
    for (const thesis of members) {
      if (thesis.direction === 'long') longWeight += thesis.confidence;
      else shortWeight += thesis.confidence;
    }
    const stance: SectorStance =
      longWeight > shortWeight ? 'bullish' : shortWeight > longWeight ? 'bearish' : 'neutral';
    const confidence = members.reduce((acc, thesis) => acc + thesis.confidence, 0) / members.length;
    views[sector] = {
      stance,
      confidence: clampUnit(confidence),
      theses: members.map((thesis) => thesis.id).sort(),
    };
  }
  return views;
}

export function deriveRegime(theses: Thesis[], prior: MacroRegime): MacroRegime {
  let longMass = 0;
  let shortMass = 0;
  for (const thesis of theses) {
    if (thesis.status !== 'active') continue;
    if (thesis.direction === 'long') longMass += thesis.confidence;
    else shortMass += thesis.confidence;
  }
  const total = longMass + shortMass;
  if (total <= 0) return prior;
  const longShare = longMass / total;
  if (longShare >= 0.6) return 'risk_on';
  if (longShare <= 0.4) return 'risk_off';
  return 'neutral';
}

function updateBeliefs(params: {
  prior: Belief[];
  theses: Thesis[];
  sectorViews: Record<string, SectorView>;
  invalidatedIds: Set<string>;
  stateId: number;
  decayRate: number;
}): Belief[] {
  const beliefs = new Map<string, Belief>();
  for (const belief of params.prior) {
    if (belief.theses.some((id) => params.invalidatedIds.has(id))) continue;
    beliefs.set(belief.id, belief);
  }

  const reinforcedIds = new Set<string>();
  const thesisById = new Map(params.theses.map((thesis) => [thesis.id, thesis]));
  for (const [sector, view] of Object.entries(params.sectorViews)) {
    if (view.stance === 'neutral') continue;
    const members = view.theses
      .map((id) => thesisById.get(id))
      .filter((thesis): thesis is Thesis => thesis !== undefined);
    const freshEvidence = members.some((thesis) => thesis.last_evidence_state_id === params.stateId);
    if (!freshEvidence) continue;

    const opposite = view.stance === 'bullish' ? 'bearish' : 'bullish';
    beliefs.delete(`${sector}:${opposite}`);
    const id = `${sector}:${view.stance}`;
    const sources = [...new Set(members.flatMap((thesis) => thesis.sources))].sort();
    beliefs.set(id, {
      id,
      text: `${sector} sector is ${view.stance}`,
      confidence: view.confidence,
      sources,
      theses: [...view.theses],
      reinforced_state_id: params.stateId,
    });
    reinforcedIds.add(id);
  }

  const decayed = [...beliefs.values()].map((belief) => {
    if (reinforcedIds.has(belief.id)) return belief;
    const confidence = 0.5 + (belief.confidence - 0.5) * (1 - params.decayRate);
    return { ...belief, confidence: clampUnit(confidence) };
  });

  return decayed.sort((a, b) => {
    if (b.confidence !== a.confidence) return b.confidence - a.confidence;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

export function synthesize(
  newSignals: AlphaSignal[],
  trust: TrustLookup,
  prior: WorldviewState,
  options: SynthesisOptions
): SynthesisResult {
  const settings: SynthesisSettings = { ...DEFAULT_SYNTHESIS_SETTINGS, ...options.settings };
  const stateId = prior.state_id + 1;
  const report: SynthesisReport = {
    stateId,
    consumed: newSignals.length,
    usable: 0,
    ignored: 0,
    formed: [],
    activated: [],
    invalidated: [],
    flipped: [],
    expired: [],
  };

  // Terminal theses were visible for one full cycle; the history log keeps them.
  const carried: Thesis[] = [];
  for (const thesis of prior.active_theses) {
    if (!isLiveThesis(thesis)) continue;
    if (
      thesis.status === 'proposed' &&
      stateId - thesis.last_evidence_state_id > settings.proposedTtlCycles
    ) {
      report.expired.push(thesis.id);
      continue;
    }
    carried.push(thesis);
  }

  const { byAsset, usable } = collectEvidence(newSignals, trust, settings);
  report.usable = usable;
  report.ignored = newSignals.length - usable;

  const byAssetThesis = new Map<string, Thesis>();
  for (const thesis of carried) {
    const existing = byAssetThesis.get(thesis.asset);
    if (!existing || thesis.confidence > existing.confidence) {
      byAssetThesis.set(thesis.asset, thesis);
    }
  }

  const updated = new Map<string, Thesis>();
  let asOf = prior.as_of;

  for (const asset of [...byAsset.keys()].sort()) {
    const evidence = byAsset.get(asset) ?? [];
    for (const item of evidence) {
      asOf = laterTimestamp(asOf, item.timestamp);
    }
    const totalWeight = evidence.reduce((acc, item) => acc + item.weight, 0);
    if (totalWeight <= 0) continue;

    let thesis = byAssetThesis.get(asset);
    if (!thesis) {
      const direction = dominantDirection(evidence);
      if (!direction) continue;
      thesis = openThesis(asset, direction, stateId, settings);
      report.formed.push(thesis.id);
    }

    let next = blendEvidence(thesis, evidence, stateId, settings);
    if (next.status === 'proposed') {
      if (next.confidence < 0.5) {
        next = flipThesis(next);
        report.flipped.push(next.id);
      }
      if (
        next.confidence >= settings.formationThreshold &&
        next.sources.length >= settings.minCorroboratingSources
      ) {
        next = { ...next, status: 'active' };
        report.activated.push(next.id);
      }
    } else if (next.status === 'active' && next.confidence < settings.invalidationThreshold) {
      next = { ...next, status: 'invalidated' };
      report.invalidated.push(next.id);
    }
    updated.set(next.id, next);
  }

  const theses = [
    ...carried.filter((thesis) => !updated.has(thesis.id)),
    ...updated.values(),
  ].sort(compareTheses);

  const sectorViews = deriveSectorViews(theses, options.sectorOf);
  const keyBeliefs = updateBeliefs({
    prior: prior.macro_thesis.key_beliefs,
    theses,
    sectorViews,
    invalidatedIds: new Set(report.invalidated),
    stateId,
    decayRate: settings.beliefDecayRate,
  });

  const worldview: WorldviewState = {
    state_id: stateId,
    as_of: asOf,
    signal_cursor: options.signalCursor ?? prior.signal_cursor + newSignals.length,
    macro_thesis: {
      current_regime: deriveRegime(theses, prior.macro_thesis.current_regime),
      key_beliefs: keyBeliefs,
    },
    sector_views: sectorViews,
    active_theses: theses,
  };

  return { worldview, report };
}

/**
 * Close the theses whose positions the engine exited. Derived sector views and
 * regime follow; the state id does not change because this is part of the
 * same cycle's snapshot.
 */
export function closeTheses(worldview: WorldviewState, thesisIds: string[], sectorOf: SectorOf): WorldviewState {
  if (thesisIds.length === 0) return worldview;
  const closing = new Set(thesisIds);
  const theses = worldview.active_theses
    .map((thesis) => (closing.has(thesis.id) ? { ...thesis, status: 'closed' as const } : thesis))
    .sort(compareTheses);
  return {
    ...worldview,
    macro_thesis: {
      ...worldview.macro_thesis,
      current_regime: deriveRegime(theses, worldview.macro_thesis.current_regime),
    },
    sector_views: deriveSectorViews(theses, sectorOf),
    active_theses: theses,
  };
}
