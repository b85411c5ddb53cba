import { resolveRuntime } from '../config/runtime.js';
import { withScope } from '../log.js';

export const VERBOSE: boolean = resolveRuntime().verbose;

const sqlLog = withScope('db');

export function vlog(payload: string | Record<string, unknown>, enabled = VERBOSE): void {
  if (!enabled) return;
  if (typeof payload === 'string') sqlLog.info('debug', { text: payload, pid: process.pid });
  else sqlLog.info('debug', { ...payload, pid: process.pid });
}

/** better-sqlite3 `verbose` callback, or undefined when tracing is off. */
export function sqlTracer(enabled = VERBOSE): ((sql?: unknown) => void) | undefined {
  if (!enabled) return undefined;
  return (sql?: unknown) => vlog({ msg: 'sql', sql: String(sql).trim().slice(0, 240) }, true);
}
