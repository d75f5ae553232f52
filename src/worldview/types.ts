import { z } from 'zod';

import { sourceTypeSchema } from '../intel/schema.js';

const unitInterval = z.number().finite().min(0).max(1);

export const THESIS_STATUSES = ['proposed', 'active', 'invalidated', 'closed'] as const;
export type ThesisStatus = (typeof THESIS_STATUSES)[number];

export const contributionSchema = z.object({
  source_type: sourceTypeSchema,
  weight: z.number().finite().min(0),
});

export const thesisSchema = z.object({
  id: z.string().min(1),
  asset: z.string().min(1),
  direction: z.enum(['long', 'short']),
  thesis: z.string(),
  confidence: unitInterval,
  status: z.enum(THESIS_STATUSES),
  sources: z.array(z.string()),
  contributions: z.record(contributionSchema),
  dissent: z.record(contributionSchema),
  evidence_mass: z.number().finite().min(0),
  created_state_id: z.number().int().min(0),
  last_evidence_state_id: z.number().int().min(0),
  updated_at: z.string().nullable(),
});

export const beliefSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  confidence: unitInterval,
  sources: z.array(z.string()),
  theses: z.array(z.string()),
  reinforced_state_id: z.number().int().min(0),
});

export const sectorViewSchema = z.object({
  stance: z.enum(['bullish', 'bearish', 'neutral']),
  confidence: unitInterval,
  theses: z.array(z.string()),
});

export const MACRO_REGIMES = ['risk_on', 'risk_off', 'neutral'] as const;
export type MacroRegime = (typeof MACRO_REGIMES)[number];

export const worldviewStateSchema = z.object({
  state_id: z.number().int().min(0),
  as_of: z.string().nullable(),
  signal_cursor: z.number().int().min(0),
  macro_thesis: z.object({
    current_regime: z.enum(MACRO_REGIMES),
    key_beliefs: z.array(beliefSchema),
  }),
  sector_views: z.record(sectorViewSchema),
  active_theses: z.array(thesisSchema),
});

export type Contribution = z.infer<typeof contributionSchema>;
export type Thesis = z.infer<typeof thesisSchema>;
export type Belief = z.infer<typeof beliefSchema>;
export type SectorView = z.infer<typeof sectorViewSchema>;
export type SectorStance = SectorView['stance'];
export type WorldviewState = z.infer<typeof worldviewStateSchema>;

export function emptyWorldview(): WorldviewState {
  return {
    state_id: 0,
    as_of: null,
    signal_cursor: 0,
    macro_thesis: {
      current_regime: 'neutral',
      key_beliefs: [],
    },
    sector_views: {},
    active_theses: [],
  };
}

export function isLiveThesis(thesis: Thesis): boolean {
  return thesis.status === 'proposed' || thesis.status === 'active';
}
