import type { ExecutionAdapter, SubmitResult } from '../executor.js';
import { markFor, type MarkSource } from '../marks.js';
import type { TradeDecision } from '../types.js';

/**
 * Simulated venue. Fills every order at the current mark of the tradable
 * asset and rejects when no mark is known.
 */
export class PaperExecutor implements ExecutionAdapter {
  readonly name = 'paper';

  constructor(private readonly marks: MarkSource) {}

  async submitTrade(decision: TradeDecision): Promise<SubmitResult> {
    if (decision.action === 'hold') {
      return { accepted: false, reason: 'Hold decision; no trade executed.' };
    }
    if (decision.action !== 'close' && decision.size <= 0) {
      return { accepted: false, reason: 'Invalid decision: size must be positive.' };
    }
    const price = markFor(this.marks.getMarks(), decision.tradable_asset);
    if (price === null) {
      return { accepted: false, reason: `Invalid decision: missing mark price for ${decision.tradable_asset}.` };
    }
    return { accepted: true, txRef: `paper:${decision.id}`, fillPrice: price };
  }
}
