import { z } from 'zod';

import { MalformedSignal } from '../core/errors.js';

export const SOURCE_TYPES = ['twitter', 'substack', 'telegram', 'website'] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export const SIGNAL_DIRECTIONS = ['long', 'short', 'neutral'] as const;
export type SignalDirection = (typeof SIGNAL_DIRECTIONS)[number];

/** Thesis and position directions; neutral evidence never forms one. */
export type TradeDirection = Exclude<SignalDirection, 'neutral'>;

export const sourceTypeSchema = z.enum(SOURCE_TYPES);

export const extractedSignalSchema = z.object({
  asset: z
    .string()
    .trim()
    .min(1)
    .max(32)
    .transform((asset) => asset.toUpperCase()),
  direction: z.enum(SIGNAL_DIRECTIONS),
  confidence: z.number().finite().min(0).max(1),
});

export const alphaSignalSchema = z.object({
  id: z.string().trim().min(1),
  source: z.string().trim().min(1),
  source_type: sourceTypeSchema,
  timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'timestamp must be an ISO-8601 date',
  }),
  raw_content: z.string(),
  extracted_signal: extractedSignalSchema.nullish(),
  added_by: z.enum(['machine', 'human']).default('machine'),
  title: z.string().optional(),
  url: z.string().optional(),
  ingested_at: z.string().optional(),
});

export type ExtractedSignal = z.infer<typeof extractedSignalSchema>;
export type AlphaSignal = z.infer<typeof alphaSignalSchema>;
export type AlphaSignalInput = z.input<typeof alphaSignalSchema>;

export type SignalParseResult =
  | { ok: true; signal: AlphaSignal }
  | { ok: false; error: MalformedSignal };

function extractId(raw: unknown): string | null {
  if (raw && typeof raw === 'object' && 'id' in raw) {
    const id = raw.id;
    return typeof id === 'string' && id.trim().length > 0 ? id : null;
  }
  return null;
}

/**
 * Validate one record at the ingestion boundary. Invalid input never leaves
 * this function as an AlphaSignal.
 */
export function parseAlphaSignal(raw: unknown): SignalParseResult {
  const parsed = alphaSignalSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, signal: parsed.data };
  }
  const issues = parsed.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  return { ok: false, error: new MalformedSignal(extractId(raw), issues) };
}

export function isTradeDirection(direction: SignalDirection): direction is TradeDirection {
  return direction === 'long' || direction === 'short';
}

export function oppositeDirection(direction: TradeDirection): TradeDirection {
  return direction === 'long' ? 'short' : 'long';
}
