import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { TradeLogOutcomeProvider, settleOutcomes, type OutcomeProvider } from '../../src/core/resolver.js';
import type { Trade } from '../../src/execution/types.js';
import { TradeLog } from '../../src/memory/trades.js';
import { tempDir } from '../support/fixtures.js';

const now = () => new Date('2026-03-04T00:00:00.000Z');

function trade(overrides: Partial<Trade>): Trade {
  return {
    id: 'trade_000001',
    seq: 1,
    decision_id: 'dec_1_btc_open_long',
    asset: 'BTC',
    tradable_asset: 'WBTC',
    proxied: true,
    action: 'open_long',
    size: 0.5,
    confidence: 0.8,
    thesis_id: 'thesis_btc_1',
    reason: 'test',
    attribution: [{ source: 'A', source_type: 'twitter', weight: 0.5 }],
    side: 'long',
    entry_price: 100,
    notional: 5000,
    tx_ref: 'paper:1',
    executed_at: '2026-03-01T00:00:00.000Z',
    closes_trade_id: null,
    realized_pnl: null,
    pnl: null,
    ...overrides,
  };
}

function tradeLog(): TradeLog {
  const dir = tempDir('resolver');
  return new TradeLog(join(dir, 'trades.jsonl'), join(dir, 'settlements.jsonl'));
}

describe('settleOutcomes', () => {
  it('settles an opening trade once its close is recorded', async () => {
    const log = tradeLog();
    log.append(trade({}));
    const provider = new TradeLogOutcomeProvider(log);

    const before = await settleOutcomes(log, provider, { timeoutMs: 50, now });
    expect(before.settled).toEqual([]);
    expect(before.pending).toBe(1);

    log.append(
      trade({
        id: 'trade_000002',
        seq: 2,
        decision_id: 'dec_2_btc_close',
        action: 'close',
        attribution: [],
        entry_price: 110,
        closes_trade_id: 'trade_000001',
        realized_pnl: 500,
      })
    );

    const after = await settleOutcomes(log, provider, { timeoutMs: 50, now });
    expect(after.settled).toEqual([
      { trade_id: 'trade_000001', pnl: 500, settled_at: '2026-03-04T00:00:00.000Z' },
    ]);
    expect(log.get('trade_000001')?.pnl).toBe(500);

    const again = await settleOutcomes(log, provider, { timeoutMs: 50, now });
    expect(again.settled).toEqual([]);
    expect(again.pending).toBe(0);
  });

  it('rejects a second settlement for the same trade', () => {
    const log = tradeLog();
    log.append(trade({}));
    log.settle('trade_000001', 1, '2026-03-04T00:00:00.000Z');

    expect(() => log.settle('trade_000001', 2, '2026-03-05T00:00:00.000Z')).toThrow(
      'Cannot settle trade_000001: already settled'
    );
    expect(log.get('trade_000001')?.pnl).toBe(1);
  });

  it('leaves trades pending when the provider fails or times out', async () => {
    const log = tradeLog();
    log.append(trade({}));
    log.append(trade({ id: 'trade_000002', seq: 2, asset: 'ETH' }));
    const provider: OutcomeProvider = {
      name: 'flaky',
      getOutcome: (item) =>
        item.asset === 'BTC' ? Promise.reject(new Error('valuation offline')) : new Promise<number | null>(() => undefined),
    };

    const result = await settleOutcomes(log, provider, { timeoutMs: 20, now });

    expect(result.settled).toEqual([]);
    expect(result.errors).toEqual([
      { tradeId: 'trade_000001', error: 'valuation offline' },
      { tradeId: 'trade_000002', error: 'get_outcome(trade_000002) timed out after 20ms' },
    ]);
  });
});
