import { appendFileSync } from 'node:fs';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { AlertLog } from '../../src/memory/alerts.js';
import { tempDir } from '../support/fixtures.js';

describe('AlertLog', () => {
  it('appends alerts with a timestamp and reads back the most recent ones', () => {
    const log = new AlertLog(join(tempDir('alerts'), 'alerts.jsonl'), () => new Date('2026-03-01T00:00:00.000Z'));

    const recorded = log.record({
      kind: 'risk_breach',
      severity: 'high',
      summary: 'Drawdown 20.0% >= 15.0%; new positions halted.',
      stateId: 4,
      metadata: { drawdown: 0.2 },
    });
    log.record({ kind: 'ingestion_gap', severity: 'warning', summary: 'twitter returned nothing' });
    log.record({ kind: 'execution_failure', severity: 'warning', summary: 'venue rejected' });

    expect(recorded).toEqual({
      kind: 'risk_breach',
      severity: 'high',
      summary: 'Drawdown 20.0% >= 15.0%; new positions halted.',
      state_id: 4,
      metadata: { drawdown: 0.2 },
      occurred_at: '2026-03-01T00:00:00.000Z',
    });
    expect(log.listRecent(2).map((alert) => alert.kind)).toEqual(['ingestion_gap', 'execution_failure']);
    expect(log.listRecent()[1]?.state_id).toBeNull();
  });

  it('skips lines that do not parse as alerts', () => {
    const path = join(tempDir('alerts'), 'alerts.jsonl');
    const log = new AlertLog(path);
    appendFileSync(path, 'garbage\n{"kind":"unknown"}\n', 'utf-8');
    log.record({ kind: 'state_corruption', severity: 'critical', summary: 'bad worldview' });

    expect(log.listRecent().map((alert) => alert.summary)).toEqual(['bad worldview']);
  });
});
