import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import yaml from 'yaml';
import { z } from 'zod';

import { expandHome } from '../memory/files.js';

const unitInterval = z.number().finite().min(0).max(1);

const DEFAULT_SECTORS: Record<string, string[]> = {
  crypto_ai: ['BTC', 'ETH', 'SOL', 'AVAX', 'MATIC', 'LINK'],
  defi: ['UNI', 'AAVE', 'SNX', 'SUSHI', 'CRV', 'MKR', 'COMP'],
  social_media: ['SNAP', 'META', 'TWTR', 'PINS', 'RDDT'],
  trad_equities: ['GOOGL', 'MSFT', 'AAPL', 'NVDA'],
};

const DEFAULT_PROXIES: Record<string, string | null> = {
  BTC: 'WBTC',
  ETH: 'WETH',
  SOL: null,
  AVAX: null,
  LINK: 'LINK',
  UNI: 'UNI',
  AAVE: 'AAVE',
  SNAP: 'WETH',
  META: 'WETH',
  GOOGL: 'WETH',
  MSFT: 'WETH',
  AAPL: 'WETH',
  NVDA: 'WETH',
};

const configSchema = z
  .object({
    data: z
      .object({
        dir: z.string().min(1).default('~/.worldview/data'),
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        file: z.string().optional(),
      })
      .default({}),
    synthesis: z
      .object({
        formationThreshold: unitInterval.default(0.55),
        invalidationThreshold: unitInterval.default(0.35),
        minCorroboratingSources: z.number().int().min(1).default(2),
        priorMass: z.number().positive().default(1),
        maxEvidenceMass: z.number().positive().default(10),
        beliefDecayRate: unitInterval.default(0.02),
        defaultTrust: unitInterval.default(0.5),
        humanTrust: unitInterval.default(1),
        proposedTtlCycles: z.number().int().min(1).default(24),
      })
      .default({}),
    risk: z
      .object({
        maxDrawdown: unitInterval.default(0.15),
        maxPositionSize: unitInterval.default(1),
        confidenceThreshold: unitInterval.default(0.65),
      })
      .default({}),
    reflection: z
      .object({
        learningRate: unitInterval.default(0.05),
        pnlCap: z.number().positive().default(1),
        attribution: z.enum(['equal', 'weighted']).default('equal'),
        runWithCycle: z.boolean().default(true),
      })
      .default({}),
    execution: z
      .object({
        timeoutMs: z.number().int().positive().default(10_000),
        initialEquity: z.number().positive().default(10_000),
      })
      .default({}),
    settlement: z
      .object({
        timeoutMs: z.number().int().positive().default(10_000),
      })
      .default({}),
    ingestion: z
      .object({
        timeoutMs: z.number().int().positive().default(15_000),
        retries: z.number().int().min(0).default(2),
        inbox: z.string().optional(),
      })
      .default({}),
    cycle: z
      .object({
        lockTtlMs: z.number().int().positive().default(10 * 60_000),
      })
      .default({}),
    taxonomy: z
      .object({
        sectors: z.record(z.array(z.string())).default(DEFAULT_SECTORS),
        defaultSector: z.string().min(1).default('trad_equities'),
      })
      .default({}),
    proxies: z
      .object({
        map: z.record(z.string().nullable()).default(DEFAULT_PROXIES),
        fallback: z.string().nullable().default('WETH'),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.synthesis.invalidationThreshold >= config.synthesis.formationThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['synthesis', 'invalidationThreshold'],
        message: 'invalidationThreshold must be below formationThreshold',
      });
    }
    if (config.risk.confidenceThreshold >= 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['risk', 'confidenceThreshold'],
        message: 'confidenceThreshold must be below 1',
      });
    }
  });

export type WorldviewConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_PATH = join(homedir(), '.worldview', 'config.yaml');

function applyEnvOverrides(raw: Record<string, unknown>): Record<string, unknown> {
  const dataDir = process.env.WORLDVIEW_DATA_DIR?.trim();
  const logLevel = process.env.WORLDVIEW_LOG_LEVEL?.trim();
  const next = { ...raw };
  if (dataDir) {
    next.data = { ...asRecord(raw.data), dir: dataDir };
  }
  if (logLevel) {
    next.logging = { ...asRecord(raw.logging), level: logLevel };
  }
  return next;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/**
 * Load the YAML config, fill defaults and validate. A missing file yields the
 * defaults; an invalid value throws with every offending path listed.
 */
export function loadConfig(configPath?: string): WorldviewConfig {
  const path = expandHome(configPath ?? process.env.WORLDVIEW_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);
  const raw: unknown = existsSync(path) ? yaml.parse(readFileSync(path, 'utf-8')) : {};
  const parsed = configSchema.safeParse(applyEnvOverrides(asRecord(raw)));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config at ${path}: ${details}`);
  }
  return parsed.data;
}

export interface DataPaths {
  dir: string;
  signals: string;
  worldview: string;
  history: string;
  trustLedger: string;
  trades: string;
  settlements: string;
  portfolio: string;
  marks: string;
  alerts: string;
  lock: string;
}

export function resolveDataPaths(config: WorldviewConfig): DataPaths {
  const dir = expandHome(config.data.dir);
  return {
    dir,
    signals: join(dir, 'alpha.jsonl'),
    worldview: join(dir, 'worldview.json'),
    history: join(dir, 'state_history.jsonl'),
    trustLedger: join(dir, 'source_weights.json'),
    trades: join(dir, 'trades.jsonl'),
    settlements: join(dir, 'settlements.jsonl'),
    portfolio: join(dir, 'portfolio.json'),
    marks: join(dir, 'marks.json'),
    alerts: join(dir, 'alerts.jsonl'),
    lock: join(dir, 'cycle.lock'),
  };
}
