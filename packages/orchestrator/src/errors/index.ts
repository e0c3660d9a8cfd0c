import type { ZodError, ZodTypeAny, z } from 'zod';
import type { ErrorKind, StageError } from '../contracts/index.js';

export type { ErrorKind } from '../contracts/index.js';

/**
 * Base error for everything the engine reports with a kind attached.
 * Stage boundaries convert these into `StageError` entries instead of throwing.
 */
export class OrchestratorError extends Error {
  readonly kind: ErrorKind;
  readonly details: string[];

  constructor(kind: ErrorKind, message: string, details: string[] = []) {
    super(message);
    this.name = 'OrchestratorError';
    this.kind = kind;
    this.details = details;
  }
}

export class ValidationError extends OrchestratorError {
  constructor(message: string, details: string[] = []) {
    super('validation', message, details);
    this.name = 'ValidationError';
  }
}

export class ExternalServiceError extends OrchestratorError {
  constructor(message: string, details: string[] = []) {
    super('external_service', message, details);
    this.name = 'ExternalServiceError';
  }
}

export class TimeoutError extends OrchestratorError {
  constructor(message: string) {
    super('timeout', message);
    this.name = 'TimeoutError';
  }
}

/** Bootstrap failures and broken invariants. Never persisted into a conversation. */
export class FatalError extends OrchestratorError {
  constructor(message: string, details: string[] = []) {
    super('fatal', message, details);
    this.name = 'FatalError';
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: OrchestratorError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T>(error: OrchestratorError): Result<T> {
  return { ok: false, error };
}

export function formatZodIssues(error: ZodError): string[] {
  return error.errors.map((e) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`);
}

/**
 * The `code` of a Node system error such as ENOENT. Checked structurally:
 * errors raised by `fs` under a test sandbox fail `instanceof Error`.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Normalise anything thrown by a collaborator into an OrchestratorError.
 */
export function toOrchestratorError(error: unknown, fallbackKind: ErrorKind = 'external_service'): OrchestratorError {
  if (error instanceof OrchestratorError) {
    return error;
  }
  const message =
    typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
      ? error.message
      : String(error);
  return new OrchestratorError(fallbackKind, message);
}

/**
 * Run a collaborator call and capture its rejection as a Result.
 */
export async function attempt<T>(operation: string, fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    const cause = toOrchestratorError(error);
    return err(new OrchestratorError(cause.kind, `${operation} failed: ${cause.message}`, cause.details));
  }
}

/**
 * Validate a collaborator's payload. Schema failures are external-service errors:
 * the payload came from outside the engine.
 */
export function parseExternal<S extends ZodTypeAny>(schema: S, raw: unknown, label: string): Result<z.infer<S>> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = formatZodIssues(result.error);
    return err(new ExternalServiceError(`${label} returned a malformed payload`, details));
  }
  return ok(result.data);
}

export function toStageError(stage: string, error: OrchestratorError, epoch: number, at: Date): StageError {
  const suffix = error.details.length > 0 ? ` (${error.details.join('; ')})` : '';
  return {
    stage,
    kind: error.kind,
    message: `${error.message}${suffix}`,
    epoch,
    at: at.toISOString(),
  };
}
