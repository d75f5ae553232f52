import { errorMessage } from './errors.js';
import { Logger } from './logger.js';
import { withTimeout } from './retry.js';
import { isOpenAction, type Settlement, type Trade } from '../execution/types.js';
import type { TradeLog } from '../memory/trades.js';

/**
 * Valuation boundary. Returns the realized pnl of an opening trade, or null
 * while the outcome is still unknown.
 */
export interface OutcomeProvider {
  readonly name: string;
  getOutcome(trade: Trade): Promise<number | null>;
}

/** An opening trade matures when a later close references it. */
export class TradeLogOutcomeProvider implements OutcomeProvider {
  readonly name = 'trade-log';

  constructor(private readonly tradeLog: TradeLog) {}

  async getOutcome(trade: Trade): Promise<number | null> {
    const close = this.tradeLog.list().find((candidate) => candidate.closes_trade_id === trade.id);
    return close?.realized_pnl ?? null;
  }
}

export interface SettleOptions {
  timeoutMs: number;
  limit?: number;
  now?: () => Date;
  logger?: Logger;
}

export interface SettleResult {
  settled: Settlement[];
  pending: number;
  errors: Array<{ tradeId: string; error: string }>;
}

export function unsettledOpenings(tradeLog: TradeLog): Trade[] {
  return tradeLog.list().filter((trade) => isOpenAction(trade.action) && trade.pnl === null);
}

/**
 * Ask the provider for every unsettled opening trade and record the realized
 * pnl once. A failed lookup leaves the trade pending for the next pass.
 */
export async function settleOutcomes(
  tradeLog: TradeLog,
  provider: OutcomeProvider,
  options: SettleOptions
): Promise<SettleResult> {
  const logger = options.logger ?? new Logger('info');
  const now = options.now ?? (() => new Date());
  const due = unsettledOpenings(tradeLog).slice(0, options.limit ?? Number.POSITIVE_INFINITY);
  const result: SettleResult = { settled: [], pending: 0, errors: [] };

  for (const trade of due) {
    try {
      const pnl = await withTimeout(provider.getOutcome(trade), options.timeoutMs, `get_outcome(${trade.id})`);
      if (pnl === null) {
        result.pending += 1;
        continue;
      }
      result.settled.push(tradeLog.settle(trade.id, pnl, now().toISOString()));
    } catch (error) {
      logger.warn(`Outcome lookup for ${trade.id} via ${provider.name} failed: ${errorMessage(error)}`);
      result.errors.push({ tradeId: trade.id, error: errorMessage(error) });
    }
  }

  if (result.settled.length > 0) {
    logger.info(`Settled ${result.settled.length} trade(s); ${result.pending} still open.`);
  }
  return result;
}
