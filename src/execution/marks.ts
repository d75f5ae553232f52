import { z } from 'zod';

import { readJsonDocument } from '../memory/files.js';

export const markBookSchema = z.record(z.number().finite().positive());

export type MarkBook = z.infer<typeof markBookSchema>;

/** Latest price per tradable asset, keyed by upper-case symbol. */
export interface MarkSource {
  getMarks(): MarkBook;
}

/** Reads the marks document the valuation side keeps current. */
export class FileMarkSource implements MarkSource {
  constructor(readonly path: string) {}

  getMarks(): MarkBook {
    const marks = readJsonDocument(this.path, markBookSchema) ?? {};
    return Object.fromEntries(
      Object.entries(marks).map(([symbol, price]) => [symbol.trim().toUpperCase(), price])
    );
  }
}

export class StaticMarkSource implements MarkSource {
  constructor(private marks: MarkBook) {}

  getMarks(): MarkBook {
    return { ...this.marks };
  }

  set(symbol: string, price: number): void {
    this.marks = { ...this.marks, [symbol.toUpperCase()]: price };
  }
}

export function markFor(marks: MarkBook, symbol: string): number | null {
  const price = marks[symbol.toUpperCase()];
  return typeof price === 'number' && Number.isFinite(price) && price > 0 ? price : null;
}
