import { MalformedSignal } from '../core/errors.js';
import { appendJsonLine, countJsonLines, readJsonLines } from '../memory/files.js';
import { parseAlphaSignal, type AlphaSignal } from './schema.js';

export interface SignalBatch {
  signals: AlphaSignal[];
  malformed: MalformedSignal[];
  /** Record index after the last consumed line; becomes the next cycle's cursor. */
  nextCursor: number;
}

/**
 * Append-only NDJSON log of alpha signals. Lines are never rewritten; append
 * order is arrival order.
 */
export class SignalStore {
  private knownIds: Set<string> | null = null;

  constructor(readonly path: string) {}

  has(id: string): boolean {
    return this.ids().has(id);
  }

  /** Returns false when a signal with the same id is already stored. */
  append(signal: AlphaSignal): boolean {
    const ids = this.ids();
    if (ids.has(signal.id)) {
      return false;
    }
    appendJsonLine(this.path, signal);
    ids.add(signal.id);
    return true;
  }

  count(): number {
    return countJsonLines(this.path);
  }

  readFrom(cursor: number): SignalBatch {
    const lines = readJsonLines(this.path, cursor);
    const signals: AlphaSignal[] = [];
    const malformed: MalformedSignal[] = [];
    let nextCursor = Math.max(0, cursor);
    for (const line of lines) {
      nextCursor = line.line + 1;
      if (!line.ok) {
        malformed.push(new MalformedSignal(null, [`line ${line.line + 1}: ${line.error}`]));
        continue;
      }
      const parsed = parseAlphaSignal(line.value);
      if (parsed.ok) {
        signals.push(parsed.signal);
      } else {
        malformed.push(parsed.error);
      }
    }
    return { signals, malformed, nextCursor };
  }

  listRecent(limit = 20): AlphaSignal[] {
    const total = this.count();
    const start = Math.max(0, total - Math.max(1, limit));
    return this.readFrom(start).signals;
  }

  private ids(): Set<string> {
    if (this.knownIds) {
      return this.knownIds;
    }
    const ids = new Set<string>();
    for (const line of readJsonLines(this.path)) {
      if (!line.ok) continue;
      const value = line.value;
      if (value && typeof value === 'object' && 'id' in value && typeof value.id === 'string') {
        ids.add(value.id);
      }
    }
    this.knownIds = ids;
    return ids;
  }
}
