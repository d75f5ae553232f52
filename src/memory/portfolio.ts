import { z } from 'zod';

import { positionSideSchema } from '../execution/types.js';
import { readJsonDocument, writeJsonAtomic } from './files.js';

export const positionSchema = z.object({
  asset: z.string().min(1),
  tradable_asset: z.string().min(1),
  side: positionSideSchema,
  size: z.number().finite().min(0).max(1),
  notional: z.number().finite().min(0),
  entry_price: z.number().finite().positive(),
  mark_price: z.number().finite().positive(),
  thesis_id: z.string().nullable(),
  trade_id: z.string().min(1),
  opened_at: z.string(),
});

export const portfolioStateSchema = z.object({
  version: z.number().int().min(1).default(1),
  starting_equity: z.number().finite().positive(),
  equity: z.number().finite(),
  peak_equity: z.number().finite(),
  drawdown: z.number().finite().min(0).max(1),
  realized_pnl: z.number().finite().default(0),
  unrealized_pnl: z.number().finite().default(0),
  positions: z.record(positionSchema).default({}),
  applied_trades: z.number().int().min(0).default(0),
  updated_at: z.string().nullable().default(null),
});

export type Position = z.infer<typeof positionSchema>;
export type PortfolioState = z.infer<typeof portfolioStateSchema>;

export function initialPortfolio(startingEquity: number): PortfolioState {
  return {
    version: 1,
    starting_equity: startingEquity,
    equity: startingEquity,
    peak_equity: startingEquity,
    drawdown: 0,
    realized_pnl: 0,
    unrealized_pnl: 0,
    positions: {},
    applied_trades: 0,
    updated_at: null,
  };
}

/** Single JSON document, replaced atomically on every write. */
export class PortfolioStore {
  constructor(readonly path: string, private readonly startingEquity: number) {}

  load(): PortfolioState {
    return readJsonDocument(this.path, portfolioStateSchema) ?? initialPortfolio(this.startingEquity);
  }

  save(portfolio: PortfolioState): void {
    writeJsonAtomic(this.path, portfolio);
  }
}
