import type { PortfolioState } from '../memory/portfolio.js';
import type { WorldviewState } from '../worldview/types.js';

const MAX_STATUS_MESSAGE_CHARS = 2000;
const MAX_LISTED_POSITIONS = 5;
const MAX_LISTED_THESES = 5;

export interface StatusSnapshot {
  asOf: string;
  worldview: WorldviewState;
  portfolio: PortfolioState;
  maxDrawdown: number;
  unprocessedSignals: number;
}

function formatSignedUsd(value: number): string {
  if (!Number.isFinite(value)) return 'n/a';
  const sign = value >= 0 ? '+' : '-';
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

function formatUsd(value: number): string {
  if (!Number.isFinite(value)) return 'n/a';
  return `$${value.toFixed(2)}`;
}

function formatPct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function formatPositions(portfolio: PortfolioState): string {
  const positions = Object.values(portfolio.positions).sort((a, b) => (a.asset < b.asset ? -1 : 1));
  if (positions.length === 0) {
    return 'none';
  }
  const rendered = positions.slice(0, MAX_LISTED_POSITIONS).map((position) => {
    const via = position.tradable_asset !== position.asset ? ` via ${position.tradable_asset}` : '';
    return `${position.asset}${via} ${position.side} ${formatUsd(position.notional)} @${position.entry_price}`;
  });
  const extraCount = positions.length - rendered.length;
  if (extraCount > 0) {
    rendered.push(`+${extraCount} more`);
  }
  return rendered.join(' | ');
}

function formatTheses(worldview: WorldviewState): string {
  const live = worldview.active_theses.filter(
    (thesis) => thesis.status === 'active' || thesis.status === 'proposed'
  );
  if (live.length === 0) {
    return 'none';
  }
  const rendered = live
    .slice(0, MAX_LISTED_THESES)
    .map((thesis) => `${thesis.asset} ${thesis.direction} ${formatPct(thesis.confidence)} (${thesis.status})`);
  const extraCount = live.length - rendered.length;
  if (extraCount > 0) {
    rendered.push(`+${extraCount} more`);
  }
  return rendered.join(' | ');
}

function trimToMaxChars(message: string): string {
  if (message.length <= MAX_STATUS_MESSAGE_CHARS) {
    return message;
  }
  return `${message.slice(0, MAX_STATUS_MESSAGE_CHARS - 3)}...`;
}

export function formatStatusSnapshot(snapshot: StatusSnapshot): string {
  const { worldview, portfolio } = snapshot;
  const halted = portfolio.drawdown >= snapshot.maxDrawdown;
  const sectors = Object.entries(worldview.sector_views)
    .map(([sector, view]) => `${sector}=${view.stance}`)
    .join(', ');

  const lines = [
    `Status snapshot (${snapshot.asOf})`,
    `Worldview: state ${worldview.state_id}, regime ${worldview.macro_thesis.current_regime}, as of ${worldview.as_of ?? 'never'}`,
    `Equity: ${formatUsd(portfolio.equity)} (peak ${formatUsd(portfolio.peak_equity)}, drawdown ${formatPct(portfolio.drawdown)})`,
    `P&L: realized ${formatSignedUsd(portfolio.realized_pnl)}, unrealized ${formatSignedUsd(portfolio.unrealized_pnl)}`,
    `Trading: ${halted ? `HALTED (drawdown >= ${formatPct(snapshot.maxDrawdown)})` : 'enabled'}`,
    `Open positions: ${formatPositions(portfolio)}`,
    `Theses: ${formatTheses(worldview)}`,
    `Sectors: ${sectors || 'none'}`,
    `Pending signals: ${snapshot.unprocessedSignals}`,
  ];

  return trimToMaxChars(lines.join('\n'));
}
