import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_PARAMS, ParameterSet, paramsSchema } from './params.js';

export { DEFAULT_PARAMS, makeParams, paramsSchema } from './params.js';
export type { ParameterSet, TierConfig } from './params.js';

const FILE = path.resolve(process.cwd(), 'config', 'params.json');
let cached: ParameterSet | null = null;

// For testing: reset the cache
export function resetParamsCache() {
  cached = null;
}

function stripComments(jsonText: string): string {
  // Allow // and /* */ comments in params.json for convenience
  return jsonText
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/^\s*\/\/.*$/gm, '');
}

function readFileOverrides(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) return {};
  const raw = fs.readFileSync(file, 'utf8');
  const parsed: unknown = JSON.parse(stripComments(raw) || '{}');
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${file}: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * LENDING_<KEY> overrides any scalar key, e.g. LENDING_BASE_INTEREST_RATE=120000000.
 * LENDING_TIERS takes the whole tier list as JSON.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, def] of Object.entries(DEFAULT_PARAMS)) {
    const raw = env[`LENDING_${key.toUpperCase()}`];
    if (raw === undefined || raw === '') continue;
    if (key === 'tiers') out[key] = JSON.parse(raw);
    else if (typeof def === 'number') out[key] = Number(raw);
    else out[key] = raw.trim();
  }
  return out;
}

/** Defaults, then config/params.json, then environment. Throws a ZodError on invalid values. */
export function loadParams(opts: { file?: string; env?: NodeJS.ProcessEnv } = {}): ParameterSet {
  const merged = {
    ...DEFAULT_PARAMS,
    ...readFileOverrides(opts.file ?? FILE),
    ...readEnvOverrides(opts.env),
  };
  return Object.freeze(paramsSchema.parse(merged));
}

export function getParams(): ParameterSet {
  if (!cached) cached = loadParams();
  return cached;
}
