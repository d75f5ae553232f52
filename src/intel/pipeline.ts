import { createHash } from 'node:crypto';

import { IngestionGap, MalformedSignal, errorMessage } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { isTransientError, retryWithBackoff, withTimeout } from '../core/retry.js';
import { parseAlphaSignal, type AlphaSignal, type SignalDirection, type SourceType } from './schema.js';
import type { SignalSource } from './sources.js';
import type { SignalStore } from './store.js';

export interface IngestionOptions {
  timeoutMs: number;
  retries: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface IngestionResult {
  stored: number;
  duplicates: number;
  malformed: MalformedSignal[];
  gaps: IngestionGap[];
}

export function generateSignalId(source: string, content: string, timestamp: string): string {
  const digest = createHash('sha256')
    .update(`${source}:${content.slice(0, 100)}:${timestamp}`)
    .digest('hex');
  return `alpha_${digest.slice(0, 12)}`;
}

async function fetchFromSource(
  source: SignalSource,
  options: IngestionOptions,
  logger: Logger
): Promise<unknown[] | IngestionGap> {
  const result = await retryWithBackoff(
    () => withTimeout(source.fetchSignals(), options.timeoutMs, `fetch_signals(${source.name})`),
    {
      retries: options.retries,
      baseDelayMs: options.retryBaseDelayMs ?? 500,
      maxDelayMs: 5_000,
      isRetryable: isTransientError,
      onRetry: ({ attempt, delayMs, error }) => {
        logger.debug(`Retrying ${source.name} (attempt ${attempt}, ${delayMs}ms): ${errorMessage(error)}`);
      },
    }
  );
  if (!result.ok) {
    return new IngestionGap(source.name, `Source ${source.name} failed: ${errorMessage(result.error)}`, {
      cause: result.error,
    });
  }
  if (result.value.length === 0) {
    return new IngestionGap(source.name, `Source ${source.name} returned no records`);
  }
  return result.value;
}

/**
 * Pull every source once and append the valid, unseen records to the store.
 * A failing source is skipped for this run; a bad record is dropped. Neither
 * stops the rest of the batch.
 */
export async function runIngestion(
  sources: SignalSource[],
  store: SignalStore,
  options: IngestionOptions
): Promise<IngestionResult> {
  const logger = options.logger ?? new Logger('info');
  const now = options.now ?? (() => new Date());
  const result: IngestionResult = { stored: 0, duplicates: 0, malformed: [], gaps: [] };

  for (const source of sources) {
    const fetched = await fetchFromSource(source, options, logger);
    if (fetched instanceof IngestionGap) {
      logger.warn(fetched.message);
      result.gaps.push(fetched);
      continue;
    }

    for (const raw of fetched) {
      const parsed = parseAlphaSignal(raw);
      if (!parsed.ok) {
        logger.warn(parsed.error.message);
        result.malformed.push(parsed.error);
        continue;
      }
      const signal: AlphaSignal = {
        ...parsed.signal,
        ingested_at: parsed.signal.ingested_at ?? now().toISOString(),
      };
      if (store.append(signal)) {
        result.stored += 1;
      } else {
        result.duplicates += 1;
      }
    }
  }

  logger.info(
    `Ingestion stored ${result.stored} signal(s); ${result.duplicates} duplicate(s), ` +
      `${result.malformed.length} malformed, ${result.gaps.length} source gap(s).`
  );
  return result;
}

export interface HumanSignalInput {
  source: string;
  sourceType: SourceType;
  asset: string;
  direction: SignalDirection;
  confidence: number;
  note?: string;
}

/**
 * Operator override. It enters through the same validation and store as
 * machine signals and is only distinguished by `added_by`.
 */
export function appendHumanSignal(
  store: SignalStore,
  input: HumanSignalInput,
  now: Date = new Date()
): AlphaSignal {
  const timestamp = now.toISOString();
  const content =
    input.note?.trim() ||
    `${input.direction.toUpperCase()} ${input.asset.toUpperCase()} (operator override)`;
  const parsed = parseAlphaSignal({
    id: generateSignalId(input.source, content, timestamp),
    source: input.source,
    source_type: input.sourceType,
    timestamp,
    raw_content: content,
    extracted_signal: {
      asset: input.asset,
      direction: input.direction,
      confidence: input.confidence,
    },
    added_by: 'human',
    ingested_at: timestamp,
  });
  if (!parsed.ok) {
    throw parsed.error;
  }
  store.append(parsed.signal);
  return parsed.signal;
}
