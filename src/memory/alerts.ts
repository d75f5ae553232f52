import { z } from 'zod';

import { appendJsonLine, readJsonLines } from './files.js';

export const ALERT_KINDS = [
  'risk_breach',
  'execution_failure',
  'ingestion_gap',
  'malformed_signal',
  'state_corruption',
] as const;
export type AlertKind = (typeof ALERT_KINDS)[number];

export type AlertSeverity = 'info' | 'warning' | 'high' | 'critical';

export const alertRecordSchema = z.object({
  kind: z.enum(ALERT_KINDS),
  severity: z.enum(['info', 'warning', 'high', 'critical']),
  summary: z.string(),
  state_id: z.number().int().nullable(),
  metadata: z.record(z.unknown()).nullable(),
  occurred_at: z.string(),
});

export type AlertRecord = z.infer<typeof alertRecordSchema>;

export interface AlertInput {
  kind: AlertKind;
  severity: AlertSeverity;
  summary: string;
  stateId?: number | null;
  metadata?: Record<string, unknown> | null;
}

/** Operational alerts, one NDJSON line each. Never read on the decision path. */
export class AlertLog {
  constructor(readonly path: string, private readonly now: () => Date = () => new Date()) {}

  record(input: AlertInput): AlertRecord {
    const record: AlertRecord = {
      kind: input.kind,
      severity: input.severity,
      summary: input.summary,
      state_id: input.stateId ?? null,
      metadata: input.metadata ?? null,
      occurred_at: this.now().toISOString(),
    };
    appendJsonLine(this.path, record);
    return record;
  }

  listRecent(limit = 20): AlertRecord[] {
    const records: AlertRecord[] = [];
    for (const line of readJsonLines(this.path)) {
      if (!line.ok) continue;
      const parsed = alertRecordSchema.safeParse(line.value);
      if (parsed.success) {
        records.push(parsed.data);
      }
    }
    return records.slice(-Math.max(1, limit));
  }
}
