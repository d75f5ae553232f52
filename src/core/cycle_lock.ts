import { linkSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { hostname } from 'node:os';
import { z } from 'zod';

import { ensureDirectory } from '../memory/files.js';

const leaseSchema = z.object({
  pid: z.number().int().positive(),
  host: z.string(),
  acquired_at: z.string(),
  expires_at: z.string(),
});

export type CycleLease = z.infer<typeof leaseSchema>;

export interface CycleLockOptions {
  path: string;
  /** A lease older than this is considered abandoned and may be taken over. */
  ttlMs: number;
  now?: () => Date;
}

export type LockAttempt =
  | { acquired: true; lease: CycleLease; release: () => void }
  | { acquired: false; holderPid: number | null };

export type LockedRun<T> = { status: 'ok'; value: T } | { status: 'busy'; holderPid: number | null };

const heldInProcess = new Set<string>();

function readLease(path: string): CycleLease | null {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    return null;
  }
  const parsed = leaseSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * The lease is written to a private file and hard-linked into place, so the
 * lock path never exists with partial contents.
 */
function tryCreate(path: string, lease: CycleLease): boolean {
  const staging = `${path}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2)}.tmp`;
  writeFileSync(staging, JSON.stringify(lease, null, 2), { flag: 'wx' });
  try {
    linkSync(staging, path);
    return true;
  } catch (error) {
    if (isErrnoCode(error, 'EEXIST')) return false;
    throw error;
  } finally {
    rmSync(staging, { force: true });
  }
}

function leaseAgeMs(path: string, now: Date): number | null {
  try {
    return now.getTime() - statSync(path).mtimeMs;
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) return null;
    throw error;
  }
}

function isStale(path: string, lease: CycleLease | null, now: Date, ttlMs: number): boolean {
  if (!lease) {
    // Unreadable leases come from another lock implementation or a damaged
    // disk; they are honoured until they are older than a full lease.
    const age = leaseAgeMs(path, now);
    return age === null || age >= ttlMs;
  }
  if (Date.parse(lease.expires_at) <= now.getTime()) return true;
  return lease.host === hostname() && lease.pid !== process.pid && !isProcessAlive(lease.pid);
}

export function busyMessage(holderPid: number | null): string {
  return `Another cycle holds the lock${holderPid ? ` (pid ${holderPid})` : ''}.`;
}

export function acquireCycleLock(options: CycleLockOptions): LockAttempt {
  const now = (options.now ?? (() => new Date()))();
  if (heldInProcess.has(options.path)) {
    return { acquired: false, holderPid: process.pid };
  }
  ensureDirectory(options.path);

  const lease: CycleLease = {
    pid: process.pid,
    host: hostname(),
    acquired_at: now.toISOString(),
    expires_at: new Date(now.getTime() + options.ttlMs).toISOString(),
  };

  let created = tryCreate(options.path, lease);
  if (!created) {
    const existing = readLease(options.path);
    if (!isStale(options.path, existing, now, options.ttlMs)) {
      return { acquired: false, holderPid: existing?.pid ?? null };
    }
    rmSync(options.path, { force: true });
    created = tryCreate(options.path, lease);
    if (!created) {
      return { acquired: false, holderPid: readLease(options.path)?.pid ?? null };
    }
  }

  heldInProcess.add(options.path);
  let released = false;
  const release = (): void => {
    if (released) return;
    released = true;
    heldInProcess.delete(options.path);
    const owner = readLease(options.path);
    if (owner && owner.pid === lease.pid && owner.acquired_at === lease.acquired_at) {
      rmSync(options.path, { force: true });
    }
  };
  return { acquired: true, lease, release };
}

/**
 * Run `fn` while holding the cycle lease. An overlapping caller, in this
 * process or another, gets `busy` instead of waiting.
 */
export async function withCycleLock<T>(options: CycleLockOptions, fn: () => Promise<T>): Promise<LockedRun<T>> {
  const attempt = acquireCycleLock(options);
  if (!attempt.acquired) {
    return { status: 'busy', holderPid: attempt.holderPid };
  }
  try {
    return { status: 'ok', value: await fn() };
  } finally {
    attempt.release();
  }
}
