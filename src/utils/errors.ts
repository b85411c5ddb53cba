import { isProtocolError } from '../util/errors.js';

export type NormalizedError = {
  name: string;
  message: string;
  code?: string;
  category?: string;
  details?: Record<string, unknown>;
  cause?: NormalizedError;
};

export function normalizeError(err: unknown): NormalizedError {
  if (isProtocolError(err)) {
    return {
      name: err.name,
      message: err.message,
      code: err.code,
      category: err.category,
      details: err.details,
      cause: err.cause === undefined ? undefined : normalizeError(err.cause),
    };
  }
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
    };
  }
  return {
    name: typeof err,
    message: String(err),
  };
}

export function shortStack(err: unknown, lines = 3): string {
  const st = err instanceof Error && err.stack ? err.stack : '';
  if (!st) return '';
  return st.split('\n').slice(0, lines + 1).join('\n');
}
