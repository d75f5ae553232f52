import type { Attribution, TradeDecision } from '../execution/types.js';
import type { ProxyResolver } from '../execution/proxy.js';
import type { PortfolioState, Position } from '../memory/portfolio.js';
import type { Thesis, WorldviewState } from '../worldview/types.js';

export interface RiskLimits {
  maxDrawdown: number;
  maxPositionSize: number;
  confidenceThreshold: number;
}

export const DEFAULT_RISK_LIMITS: RiskLimits = {
  maxDrawdown: 0.15,
  maxPositionSize: 1,
  confidenceThreshold: 0.65,
};

export interface SkippedAsset {
  asset: string;
  reason: string;
}

export interface DecisionBatch {
  decisions: TradeDecision[];
  /** True when the drawdown circuit breaker suppressed new exposure. */
  halted: boolean;
  drawdown: number;
  skipped: SkippedAsset[];
}

type Winner = { kind: 'thesis'; thesis: Thesis } | { kind: 'tie'; confidence: number };

function pickWinners(theses: Thesis[]): Map<string, Winner> {
  const grouped = new Map<string, Thesis[]>();
  for (const thesis of theses) {
    if (thesis.status !== 'active') continue;
    const list = grouped.get(thesis.asset) ?? [];
    list.push(thesis);
    grouped.set(thesis.asset, list);
  }

  const winners = new Map<string, Winner>();
  for (const [asset, list] of grouped) {
    const ranked = [...list].sort((a, b) => b.confidence - a.confidence || (a.id < b.id ? -1 : 1));
    const [top, runnerUp] = ranked;
    if (!top) continue;
    if (runnerUp && runnerUp.confidence === top.confidence && runnerUp.direction !== top.direction) {
      winners.set(asset, { kind: 'tie', confidence: top.confidence });
    } else {
      winners.set(asset, { kind: 'thesis', thesis: top });
    }
  }
  return winners;
}

function attributionOf(thesis: Thesis): Attribution[] {
  return Object.entries(thesis.contributions)
    .map(([source, contribution]) => ({
      source,
      source_type: contribution.source_type,
      weight: contribution.weight,
    }))
    .sort((a, b) => b.weight - a.weight || (a.source < b.source ? -1 : a.source > b.source ? 1 : 0));
}

function decisionId(stateId: number, asset: string, action: TradeDecision['action']): string {
  return `dec_${stateId}_${asset.toLowerCase()}_${action}`;
}

/** Linear in the confidence margin above the threshold, capped per asset. */
export function positionSize(confidence: number, limits: RiskLimits): number {
  const headroom = 1 - limits.confidenceThreshold;
  const raw = headroom > 0 ? (confidence - limits.confidenceThreshold) / headroom : 1;
  return Math.max(0, Math.min(raw, limits.maxPositionSize, 1));
}

function closeDecision(stateId: number, position: Position, reason: string, confidence: number): TradeDecision {
  return {
    id: decisionId(stateId, position.asset, 'close'),
    asset: position.asset,
    tradable_asset: position.tradable_asset,
    proxied: position.tradable_asset !== position.asset,
    action: 'close',
    size: position.size,
    confidence,
    thesis_id: position.thesis_id,
    reason,
    attribution: [],
  };
}

function holdDecision(stateId: number, asset: string, tradable: string, confidence: number): TradeDecision {
  return {
    id: decisionId(stateId, asset, 'hold'),
    asset,
    tradable_asset: tradable,
    proxied: tradable !== asset,
    action: 'hold',
    size: 0,
    confidence,
    thesis_id: null,
    reason: 'Opposing active theses are tied; holding.',
    attribution: [],
  };
}

/**
 * Translate the worldview into gated trade decisions. Pure: the same
 * worldview, portfolio and limits always yield the same batch.
 */
export function decide(
  worldview: WorldviewState,
  portfolio: PortfolioState,
  limits: RiskLimits,
  proxies: ProxyResolver
): DecisionBatch {
  const halted = portfolio.drawdown >= limits.maxDrawdown;
  const winners = pickWinners(worldview.active_theses);
  const stateId = worldview.state_id;

  const closes: TradeDecision[] = [];
  const opens: TradeDecision[] = [];
  const holds: TradeDecision[] = [];
  const skipped: SkippedAsset[] = [];

  const tryOpen = (thesis: Thesis): void => {
    if (thesis.confidence < limits.confidenceThreshold) return;
    if (halted) {
      skipped.push({
        asset: thesis.asset,
        reason: `trading halted at drawdown ${(portfolio.drawdown * 100).toFixed(1)}%`,
      });
      return;
    }
    const proxy = proxies.resolve(thesis.asset);
    if (!proxy) {
      skipped.push({ asset: thesis.asset, reason: 'no tradable proxy' });
      return;
    }
    const size = positionSize(thesis.confidence, limits);
    if (size <= 0) {
      skipped.push({ asset: thesis.asset, reason: 'position size is zero' });
      return;
    }
    const action = thesis.direction === 'long' ? 'open_long' : 'open_short';
    opens.push({
      id: decisionId(stateId, thesis.asset, action),
      asset: thesis.asset,
      tradable_asset: proxy.tradableAsset,
      proxied: proxy.proxied,
      action,
      size,
      confidence: thesis.confidence,
      thesis_id: thesis.id,
      reason:
        `${thesis.thesis} (confidence ${thesis.confidence.toFixed(3)} >= ${limits.confidenceThreshold})` +
        (proxy.proxied ? ` via ${proxy.tradableAsset}` : ''),
      attribution: attributionOf(thesis),
    });
  };

  const assets = [...new Set([...winners.keys(), ...Object.keys(portfolio.positions)])].sort();
  for (const asset of assets) {
    const winner = winners.get(asset);
    const position = portfolio.positions[asset];

    if (winner?.kind === 'tie') {
      const tradable = position?.tradable_asset ?? proxies.resolve(asset)?.tradableAsset ?? asset;
      holds.push(holdDecision(stateId, asset, tradable, winner.confidence));
      continue;
    }

    if (!position) {
      if (winner) tryOpen(winner.thesis);
      continue;
    }

    if (winner && winner.thesis.direction === position.side) {
      continue;
    }

    if (winner) {
      closes.push(
        closeDecision(
          stateId,
          position,
          `Active ${winner.thesis.direction} thesis ${winner.thesis.id} opposes the ${position.side} position.`,
          winner.thesis.confidence
        )
      );
      tryOpen(winner.thesis);
    } else {
      closes.push(closeDecision(stateId, position, `No active thesis supports the ${position.side} position.`, 0));
    }
  }

  const byAsset = (a: TradeDecision, b: TradeDecision): number =>
    a.asset < b.asset ? -1 : a.asset > b.asset ? 1 : 0;
  closes.sort(byAsset);
  opens.sort((a, b) => b.confidence - a.confidence || byAsset(a, b));
  holds.sort(byAsset);

  return {
    decisions: [...closes, ...opens, ...holds],
    halted,
    drawdown: portfolio.drawdown,
    skipped,
  };
}
