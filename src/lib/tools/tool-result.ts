/**
 * Tool Result
 * Success/failure union returned by every tool operation
 */

export interface ToolFailure {
  error: string;
  context?: object;
}

export type ToolResult<T> =
  | { ok: true; data: T }
  | { ok: false; failure: ToolFailure };

export type WireFailure = { error: string } & Record<string, unknown>;

export function succeed<T>(data: T): ToolResult<T> {
  return { ok: true, data };
}

export function fail<T = never>(error: string, context?: object): ToolResult<T> {
  return { ok: false, failure: context ? { error, context } : { error } };
}

/**
 * Extract a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Serialize a result for the tool-calling transport:
 * the bare record on success, `{ error, ...context }` on failure
 */
export function toWire<T>(result: ToolResult<T>): T | WireFailure {
  if (result.ok) {
    return result.data;
  }
  return { ...result.failure.context, error: result.failure.error };
}
