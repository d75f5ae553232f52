import { z } from 'zod';

import { sourceTypeSchema } from '../intel/schema.js';

const unitInterval = z.number().finite().min(0).max(1);

export const DECISION_ACTIONS = ['open_long', 'open_short', 'close', 'hold'] as const;
export type DecisionAction = (typeof DECISION_ACTIONS)[number];

export const attributionSchema = z.object({
  source: z.string().min(1),
  source_type: sourceTypeSchema,
  weight: z.number().finite().min(0),
});

export const tradeDecisionSchema = z.object({
  id: z.string().min(1),
  asset: z.string().min(1),
  tradable_asset: z.string().min(1),
  proxied: z.boolean(),
  action: z.enum(DECISION_ACTIONS),
  size: unitInterval,
  confidence: unitInterval,
  thesis_id: z.string().nullable(),
  reason: z.string(),
  attribution: z.array(attributionSchema),
});

export const positionSideSchema = z.enum(['long', 'short']);

export const tradeSchema = tradeDecisionSchema.extend({
  seq: z.number().int().min(1),
  decision_id: z.string().min(1),
  side: positionSideSchema,
  entry_price: z.number().finite().positive(),
  notional: z.number().finite().min(0),
  tx_ref: z.string(),
  executed_at: z.string(),
  closes_trade_id: z.string().nullable().default(null),
  realized_pnl: z.number().finite().nullable().default(null),
  pnl: z.number().finite().nullable().default(null),
});

export const settlementSchema = z.object({
  trade_id: z.string().min(1),
  pnl: z.number().finite(),
  settled_at: z.string(),
});

export type Attribution = z.infer<typeof attributionSchema>;
export type TradeDecision = z.infer<typeof tradeDecisionSchema>;
export type PositionSide = z.infer<typeof positionSideSchema>;
export type Trade = z.infer<typeof tradeSchema>;
export type Settlement = z.infer<typeof settlementSchema>;

export function isOpenAction(action: DecisionAction): action is 'open_long' | 'open_short' {
  return action === 'open_long' || action === 'open_short';
}

export function sideOf(action: 'open_long' | 'open_short'): PositionSide {
  return action === 'open_long' ? 'long' : 'short';
}

/** Signed pnl of a position of `notional` opened at `entry` and valued at `price`. */
export function positionPnl(side: PositionSide, notional: number, entry: number, price: number): number {
  if (entry <= 0) return 0;
  const move = notional * (price / entry - 1);
  return side === 'long' ? move : -move;
}
