import { existsSync, readFileSync } from 'node:fs';

/**
 * Collaborator that yields raw signal records. Fetching and text extraction
 * happen outside the engine; records are validated on the way in.
 */
export interface SignalSource {
  readonly name: string;
  fetchSignals(): Promise<unknown[]>;
}

/**
 * Reads an NDJSON inbox written by an external extractor. The inbox is a
 * finished file, so a last line without a newline is still a record. Lines
 * that are not JSON are passed through as text so validation reports them as
 * malformed.
 */
export class FileSignalSource implements SignalSource {
  readonly name: string;

  constructor(private readonly path: string, name?: string) {
    this.name = name ?? `file:${path}`;
  }

  async fetchSignals(): Promise<unknown[]> {
    if (!existsSync(this.path)) {
      throw new Error(`Signal inbox not found: ${this.path}`);
    }
    return readFileSync(this.path, 'utf-8')
      .split('\n')
      .map((text) => text.trim())
      .filter((text) => text.length > 0)
      .map(parseInboxLine);
  }
}

function parseInboxLine(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return text;
  }
}

/** In-memory source, used for operator input and tests. */
export class StaticSignalSource implements SignalSource {
  constructor(readonly name: string, private readonly records: unknown[]) {}

  async fetchSignals(): Promise<unknown[]> {
    return [...this.records];
  }
}
