import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  renameSync,
  rmSync,
  statSync,
  writeSync,
} from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import type { z } from 'zod';

import { StateCorruption } from '../core/errors.js';

export function expandHome(path: string): string {
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

/**
 * Read and validate a JSON document. A missing file yields null; a file that
 * exists but cannot be parsed or validated is StateCorruption.
 */
export function readJsonDocument<S extends z.ZodTypeAny>(path: string, schema: S): z.output<S> | null {
  if (!existsSync(path)) {
    return null;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new StateCorruption(path, 'Document is not valid JSON', { cause: error });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StateCorruption(path, `Document failed validation: ${detail}`);
  }
  return parsed.data;
}

/**
 * Write-new-then-rename. Readers observe either the previous document or the
 * new one, never a torn write.
 */
export function writeJsonAtomic(path: string, value: unknown): void {
  ensureDirectory(path);
  const tmpPath = `${path}.${process.pid}.tmp`;
  const fd = openSync(tmpPath, 'w');
  try {
    writeSync(fd, `${JSON.stringify(value, null, 2)}\n`);
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
  try {
    renameSync(tmpPath, path);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
}

function endsMidLine(path: string): boolean {
  if (!existsSync(path)) return false;
  const { size } = statSync(path);
  if (size === 0) return false;
  const fd = openSync(path, 'r');
  try {
    const last = Buffer.alloc(1);
    readSync(fd, last, 0, 1, size - 1);
    return last[0] !== 0x0a;
  } finally {
    closeSync(fd);
  }
}

/**
 * Append one record. A fragment left by an interrupted append is closed off
 * first so it stays on its own line instead of swallowing this record.
 */
export function appendJsonLine(path: string, value: unknown): void {
  ensureDirectory(path);
  const prefix = endsMidLine(path) ? '\n' : '';
  appendFileSync(path, `${prefix}${JSON.stringify(value)}\n`, 'utf-8');
}

export type JsonLine =
  | { line: number; ok: true; value: unknown }
  | { line: number; ok: false; error: string; text: string };

/**
 * Read complete NDJSON lines starting at a zero-based record index. A trailing
 * fragment without a newline is a write still in progress and is left for the
 * next reader. Blank lines are not records.
 */
export function readJsonLines(path: string, fromLine = 0): JsonLine[] {
  if (!existsSync(path)) {
    return [];
  }
  const content = readFileSync(path, 'utf-8');
  const lastNewline = content.lastIndexOf('\n');
  if (lastNewline < 0) {
    return [];
  }
  const complete = content.slice(0, lastNewline);
  const records = complete.split('\n').filter((text) => text.trim().length > 0);
  const out: JsonLine[] = [];
  for (let index = Math.max(0, fromLine); index < records.length; index += 1) {
    const text = records[index] ?? '';
    try {
      out.push({ line: index, ok: true, value: JSON.parse(text) });
    } catch (error) {
      out.push({
        line: index,
        ok: false,
        error: error instanceof Error ? error.message : String(error),
        text: text.slice(0, 200),
      });
    }
  }
  return out;
}

export function countJsonLines(path: string): number {
  if (!existsSync(path)) {
    return 0;
  }
  const content = readFileSync(path, 'utf-8');
  const lastNewline = content.lastIndexOf('\n');
  if (lastNewline < 0) {
    return 0;
  }
  return content
    .slice(0, lastNewline)
    .split('\n')
    .filter((text) => text.trim().length > 0).length;
}
