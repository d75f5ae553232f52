import { z } from 'zod';

import { worldviewStateSchema, emptyWorldview, type WorldviewState } from '../worldview/types.js';
import { appendJsonLine, readJsonDocument, readJsonLines, writeJsonAtomic } from './files.js';

export const historyEntrySchema = z.object({
  state_id: z.number().int().min(0),
  committed_at: z.string(),
  snapshot: worldviewStateSchema,
});

export type HistoryEntry = z.infer<typeof historyEntrySchema>;

/**
 * The current snapshot is authoritative. Each commit replaces it atomically
 * and then appends it to the history log.
 */
export class WorldviewStore {
  constructor(readonly snapshotPath: string, readonly historyPath: string) {}

  load(): WorldviewState {
    return readJsonDocument(this.snapshotPath, worldviewStateSchema) ?? emptyWorldview();
  }

  commit(worldview: WorldviewState, committedAt: Date): HistoryEntry {
    const snapshot = worldviewStateSchema.parse(worldview);
    writeJsonAtomic(this.snapshotPath, snapshot);
    const entry: HistoryEntry = {
      state_id: snapshot.state_id,
      committed_at: committedAt.toISOString(),
      snapshot,
    };
    appendJsonLine(this.historyPath, entry);
    return entry;
  }

  history(limit?: number): HistoryEntry[] {
    const entries: HistoryEntry[] = [];
    for (const line of readJsonLines(this.historyPath)) {
      if (!line.ok) continue;
      const parsed = historyEntrySchema.safeParse(line.value);
      if (parsed.success) {
        entries.push(parsed.data);
      }
    }
    return limit === undefined ? entries : entries.slice(-Math.max(1, limit));
  }

  getState(stateId: number): WorldviewState | null {
    const entry = this.history().find((item) => item.state_id === stateId);
    return entry?.snapshot ?? null;
  }
}
