import { StateCorruption } from '../core/errors.js';
import { settlementSchema, tradeSchema, type Settlement, type Trade } from '../execution/types.js';
import { appendJsonLine, readJsonLines, type JsonLine } from './files.js';

export class SettlementConflict extends Error {
  constructor(readonly tradeId: string, reason: string) {
    super(`Cannot settle ${tradeId}: ${reason}`);
    this.name = 'SettlementConflict';
  }
}

/**
 * A line that is not JSON is an append that was interrupted before it was
 * acknowledged, so no trade or settlement exists for it. A line that is JSON
 * but fails its schema is corruption.
 */
function completedRecords(path: string): Array<Extract<JsonLine, { ok: true }>> {
  return readJsonLines(path).filter((line): line is Extract<JsonLine, { ok: true }> => line.ok);
}

/**
 * Append-only trade log. Trade lines are immutable; realized outcomes are
 * appended once to a separate settlement log and merged in on read.
 */
export class TradeLog {
  constructor(readonly tradesPath: string, readonly settlementsPath: string) {}

  count(): number {
    return this.readTrades().length;
  }

  nextSeq(): number {
    return this.count() + 1;
  }

  append(trade: Trade): void {
    appendJsonLine(this.tradesPath, tradeSchema.parse(trade));
  }

  /** Trades from a zero-based trade index, with settled pnl merged in. */
  list(fromIndex = 0): Trade[] {
    const settlements = this.settlements();
    return this.readTrades().slice(Math.max(0, fromIndex)).map((trade) => {
      const settlement = settlements.get(trade.id);
      return settlement ? { ...trade, pnl: settlement.pnl } : trade;
    });
  }

  get(tradeId: string): Trade | undefined {
    return this.list().find((trade) => trade.id === tradeId);
  }

  settlements(): Map<string, Settlement> {
    const out = new Map<string, Settlement>();
    for (const line of completedRecords(this.settlementsPath)) {
      const parsed = settlementSchema.safeParse(line.value);
      if (!parsed.success) {
        throw new StateCorruption(this.settlementsPath, `Invalid settlement at line ${line.line + 1}`);
      }
      // The first settlement is authoritative.
      if (!out.has(parsed.data.trade_id)) {
        out.set(parsed.data.trade_id, parsed.data);
      }
    }
    return out;
  }

  /** Records the realized pnl of a trade. A trade is settled at most once. */
  settle(tradeId: string, pnl: number, settledAt: string): Settlement {
    if (!Number.isFinite(pnl)) {
      throw new SettlementConflict(tradeId, 'pnl must be a finite number');
    }
    if (!this.readTrades().some((trade) => trade.id === tradeId)) {
      throw new SettlementConflict(tradeId, 'unknown trade');
    }
    if (this.settlements().has(tradeId)) {
      throw new SettlementConflict(tradeId, 'already settled');
    }
    const settlement: Settlement = { trade_id: tradeId, pnl, settled_at: settledAt };
    appendJsonLine(this.settlementsPath, settlement);
    return settlement;
  }

  private readTrades(): Trade[] {
    return completedRecords(this.tradesPath).map((line) => {
      const parsed = tradeSchema.safeParse(line.value);
      if (!parsed.success) {
        throw new StateCorruption(this.tradesPath, `Invalid trade at line ${line.line + 1}`);
      }
      return parsed.data;
    });
  }
}
