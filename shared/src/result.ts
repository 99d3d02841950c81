/**
 * Result type for upstream calls
 *
 * Plugins keep a "best effort, never throw" contract towards the host, but the
 * layers underneath report which of the three failure modes happened.
 */

export type ErrorKind = 'upstream_unavailable' | 'malformed_response' | 'item_skipped';

export interface PluginError {
  kind: ErrorKind;
  message: string;
  /** HTTP status when the upstream answered with one */
  status?: number;
}

export type Result<T, E = PluginError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = PluginError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function pluginError(kind: ErrorKind, message: string, status?: number): PluginError {
  return status === undefined ? { kind, message } : { kind, message, status };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
