import { ExecutionFailure, errorMessage } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { withTimeout } from '../core/retry.js';
import type { PortfolioState, PortfolioStore, Position } from '../memory/portfolio.js';
import type { TradeLog } from '../memory/trades.js';
import type { ExecutionAdapter, SubmitResult } from './executor.js';
import { markFor, type MarkBook } from './marks.js';
import { isOpenAction, positionPnl, sideOf, type Trade, type TradeDecision } from './types.js';

export interface RecorderOptions {
  tradeLog: TradeLog;
  portfolioStore: PortfolioStore;
  executor: ExecutionAdapter;
  timeoutMs: number;
  now?: () => Date;
  logger?: Logger;
}

export interface RecordResult {
  trades: Trade[];
  failures: ExecutionFailure[];
  portfolio: PortfolioState;
}

function settleBalances(portfolio: PortfolioState, positions: Record<string, Position>): PortfolioState {
  const unrealized = Object.values(positions).reduce(
    (acc, position) =>
      acc + positionPnl(position.side, position.notional, position.entry_price, position.mark_price),
    0
  );
  const equity = portfolio.starting_equity + portfolio.realized_pnl + unrealized;
  const peak = Math.max(portfolio.peak_equity, equity);
  const drawdown = peak > 0 ? Math.min(1, Math.max(0, (peak - equity) / peak)) : 0;
  return {
    ...portfolio,
    positions,
    unrealized_pnl: unrealized,
    equity,
    peak_equity: peak,
    drawdown,
  };
}

/** Pure state transition for one recorded trade. */
export function applyTrade(portfolio: PortfolioState, trade: Trade): PortfolioState {
  const positions = { ...portfolio.positions };
  let realized = portfolio.realized_pnl;

  if (isOpenAction(trade.action)) {
    positions[trade.asset] = {
      asset: trade.asset,
      tradable_asset: trade.tradable_asset,
      side: trade.side,
      size: trade.size,
      notional: trade.notional,
      entry_price: trade.entry_price,
      mark_price: trade.entry_price,
      thesis_id: trade.thesis_id,
      trade_id: trade.id,
      opened_at: trade.executed_at,
    };
  } else if (trade.action === 'close') {
    delete positions[trade.asset];
    realized += trade.realized_pnl ?? 0;
  }

  return settleBalances(
    {
      ...portfolio,
      realized_pnl: realized,
      applied_trades: portfolio.applied_trades + 1,
      updated_at: trade.executed_at,
    },
    positions
  );
}

/** Mark-to-market against the latest prices. Positions without a mark keep their last one. */
export function revalue(portfolio: PortfolioState, marks: MarkBook, at?: Date): PortfolioState {
  const positions: Record<string, Position> = {};
  for (const [asset, position] of Object.entries(portfolio.positions)) {
    const mark = markFor(marks, position.tradable_asset);
    positions[asset] = mark === null ? position : { ...position, mark_price: mark };
  }
  return settleBalances(
    { ...portfolio, updated_at: at ? at.toISOString() : portfolio.updated_at },
    positions
  );
}

/**
 * Replay trades appended after the portfolio was last written. Covers a crash
 * between the trade append and the portfolio replace.
 */
export function reconcilePortfolio(
  portfolio: PortfolioState,
  tradeLog: TradeLog
): { portfolio: PortfolioState; replayed: number } {
  const pending = tradeLog.list(portfolio.applied_trades);
  const reconciled = pending.reduce((acc, trade) => applyTrade(acc, trade), portfolio);
  return { portfolio: reconciled, replayed: pending.length };
}

function precheck(decision: TradeDecision, portfolio: PortfolioState): string | null {
  const position = portfolio.positions[decision.asset];
  if (isOpenAction(decision.action) && position) {
    return `a ${position.side} position in ${decision.asset} is already open`;
  }
  if (decision.action === 'close' && !position) {
    return `no open position in ${decision.asset} to close`;
  }
  if (isOpenAction(decision.action) && portfolio.equity <= 0) {
    return 'no equity available to size the position';
  }
  return null;
}

function buildTrade(params: {
  decision: TradeDecision;
  fill: { txRef: string; fillPrice: number };
  portfolio: PortfolioState;
  seq: number;
  executedAt: string;
}): Trade {
  const { decision, fill, portfolio, seq, executedAt } = params;
  const base = {
    ...decision,
    id: `trade_${String(seq).padStart(6, '0')}`,
    seq,
    decision_id: decision.id,
    entry_price: fill.fillPrice,
    tx_ref: fill.txRef,
    executed_at: executedAt,
    pnl: null,
  };

  const position = portfolio.positions[decision.asset];
  if (decision.action === 'close' && position) {
    return {
      ...base,
      tradable_asset: position.tradable_asset,
      side: position.side,
      notional: position.notional,
      closes_trade_id: position.trade_id,
      realized_pnl: positionPnl(position.side, position.notional, position.entry_price, fill.fillPrice),
    };
  }

  const side = isOpenAction(decision.action) ? sideOf(decision.action) : 'long';
  return {
    ...base,
    side,
    notional: decision.size * portfolio.equity,
    closes_trade_id: null,
    realized_pnl: null,
  };
}

/**
 * Submit each decision independently. A failed decision is reported and
 * leaves the portfolio untouched; the rest of the batch proceeds.
 */
export async function recordDecisions(
  decisions: TradeDecision[],
  portfolio: PortfolioState,
  options: RecorderOptions
): Promise<RecordResult> {
  const logger = options.logger ?? new Logger('info');
  const now = options.now ?? (() => new Date());
  const trades: Trade[] = [];
  const failures: ExecutionFailure[] = [];
  let current = portfolio;

  for (const decision of decisions) {
    if (decision.action === 'hold') continue;

    const rejection = precheck(decision, current);
    if (rejection) {
      const failure = new ExecutionFailure(decision.id, decision.asset, `Rejected ${decision.action}: ${rejection}`);
      logger.warn(failure.message);
      failures.push(failure);
      continue;
    }

    let result: SubmitResult;
    try {
      result = await withTimeout(
        options.executor.submitTrade(decision),
        options.timeoutMs,
        `submit_trade(${decision.id})`
      );
    } catch (error) {
      const failure = new ExecutionFailure(
        decision.id,
        decision.asset,
        `Submission of ${decision.action} ${decision.asset} failed: ${errorMessage(error)}`,
        { cause: error }
      );
      logger.warn(failure.message);
      failures.push(failure);
      continue;
    }

    if (!result.accepted) {
      const failure = new ExecutionFailure(
        decision.id,
        decision.asset,
        `Executor ${options.executor.name} rejected ${decision.action} ${decision.asset}: ${result.reason}`
      );
      logger.warn(failure.message);
      failures.push(failure);
      continue;
    }

    const trade = buildTrade({
      decision,
      fill: result,
      portfolio: current,
      seq: options.tradeLog.nextSeq(),
      executedAt: now().toISOString(),
    });
    options.tradeLog.append(trade);
    current = applyTrade(current, trade);
    options.portfolioStore.save(current);
    trades.push(trade);
    logger.info(
      `Recorded ${trade.id}: ${trade.action} ${trade.asset}` +
        (trade.proxied ? ` via ${trade.tradable_asset}` : '') +
        ` @ ${trade.entry_price}` +
        (trade.realized_pnl !== null ? ` pnl=${trade.realized_pnl.toFixed(2)}` : '')
    );
  }

  return { trades, failures, portfolio: current };
}
