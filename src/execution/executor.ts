import type { TradeDecision } from './types.js';

export type SubmitResult =
  | { accepted: true; txRef: string; fillPrice: number }
  | { accepted: false; reason: string };

/**
 * Venue boundary. Implementations submit a single decision and report the
 * fill; they never touch the trade log or portfolio.
 */
export interface ExecutionAdapter {
  readonly name: string;
  submitTrade(decision: TradeDecision): Promise<SubmitResult>;
}
