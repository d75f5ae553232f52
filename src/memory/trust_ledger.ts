import { z } from 'zod';

import { SOURCE_TYPES, type SourceType } from '../intel/schema.js';
import type { TrustLookup } from '../worldview/synthesizer.js';
import { readJsonDocument, writeJsonAtomic } from './files.js';

export const sourceWeightSchema = z.object({
  id: z.string().min(1),
  handle: z.string().optional(),
  name: z.string().optional(),
  trust: z.number().finite().min(0).max(1),
  sample_count: z.number().int().min(0).default(0),
  wins: z.number().int().min(0).default(0),
  losses: z.number().int().min(0).default(0),
  cumulative_pnl: z.number().finite().default(0),
  accuracy: z.number().finite().min(0).max(1).default(0),
  updated_at: z.string().nullable().default(null),
});

const sourceGroupSchema = z.array(sourceWeightSchema).default([]);

export const trustLedgerSchema = z.object({
  version: z.number().int().min(1).default(1),
  updated_at: z.string().nullable().default(null),
  sources: z
    .object({
      twitter: sourceGroupSchema,
      substack: sourceGroupSchema,
      telegram: sourceGroupSchema,
      website: sourceGroupSchema,
    })
    .default({}),
  processed_trade_ids: z.array(z.string()).default([]),
});

export type SourceWeight = z.infer<typeof sourceWeightSchema>;
export type TrustLedgerDocument = z.infer<typeof trustLedgerSchema>;

export interface LedgerEntry {
  sourceType: SourceType;
  weight: SourceWeight;
}

export function emptyTrustLedger(): TrustLedgerDocument {
  return {
    version: 1,
    updated_at: null,
    sources: { twitter: [], substack: [], telegram: [], website: [] },
    processed_trade_ids: [],
  };
}

export function findSource(ledger: TrustLedgerDocument, source: string): LedgerEntry | null {
  for (const sourceType of SOURCE_TYPES) {
    const weight = ledger.sources[sourceType].find(
      (entry) => entry.id === source || entry.handle === source
    );
    if (weight) {
      return { sourceType, weight };
    }
  }
  return null;
}

export function listSources(ledger: TrustLedgerDocument): LedgerEntry[] {
  return SOURCE_TYPES.flatMap((sourceType) =>
    ledger.sources[sourceType].map((weight) => ({ sourceType, weight }))
  );
}

/** Read-only view handed to the synthesizer. Misses return undefined. */
export function trustLookup(ledger: TrustLedgerDocument): TrustLookup {
  return {
    trustOf: (source) => findSource(ledger, source)?.weight.trust,
  };
}

export function newSourceWeight(id: string, trust: number): SourceWeight {
  return {
    id,
    trust,
    sample_count: 0,
    wins: 0,
    losses: 0,
    cumulative_pnl: 0,
    accuracy: 0,
    updated_at: null,
  };
}

/**
 * Persistent form of the ledger. Only the Reflection Updater saves it; every
 * other reader treats it as read-only.
 */
export class TrustLedgerStore {
  constructor(readonly path: string) {}

  load(): TrustLedgerDocument {
    return readJsonDocument(this.path, trustLedgerSchema) ?? emptyTrustLedger();
  }

  save(ledger: TrustLedgerDocument): void {
    writeJsonAtomic(this.path, ledger);
  }
}
