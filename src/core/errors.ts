/**
 * Failure taxonomy for the pipeline.
 *
 * Per-signal and per-decision failures (IngestionGap, MalformedSignal,
 * ExecutionFailure) are collected and the batch continues. StateCorruption
 * aborts the cycle before anything is written.
 */

export type WorldviewErrorKind =
  | 'ingestion_gap'
  | 'malformed_signal'
  | 'execution_failure'
  | 'state_corruption';

export class WorldviewError extends Error {
  readonly kind: WorldviewErrorKind;

  constructor(kind: WorldviewErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = 'WorldviewError';
  }
}

export class IngestionGap extends WorldviewError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('ingestion_gap', message, options);
    this.name = 'IngestionGap';
    this.source = source;
  }
}

export class MalformedSignal extends WorldviewError {
  readonly signalId: string | null;
  readonly issues: string[];

  constructor(signalId: string | null, issues: string[]) {
    super('malformed_signal', `Malformed signal${signalId ? ` ${signalId}` : ''}: ${issues.join('; ')}`);
    this.name = 'MalformedSignal';
    this.signalId = signalId;
    this.issues = issues;
  }
}

export class ExecutionFailure extends WorldviewError {
  readonly decisionId: string;
  readonly asset: string;

  constructor(decisionId: string, asset: string, message: string, options?: { cause?: unknown }) {
    super('execution_failure', message, options);
    this.name = 'ExecutionFailure';
    this.decisionId = decisionId;
    this.asset = asset;
  }
}

export class StateCorruption extends WorldviewError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('state_corruption', `${message} (${path})`, options);
    this.name = 'StateCorruption';
    this.path = path;
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
