/** Deep copy with every bigint replaced by its decimal string, for structured log payloads. */
export function bigintsToStrings(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (typeof v === 'bigint') out[k] = v.toString();
    else if (Array.isArray(v)) out[k] = v.map((x) => (typeof x === 'bigint' ? x.toString() : x));
    else if (v && typeof v === 'object' && !(v instanceof Error)) out[k] = bigintsToStrings(Object.fromEntries(Object.entries(v)));
    else out[k] = v;
  }
  return out;
}
