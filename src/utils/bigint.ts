export function toBigInt(value: unknown): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) throw new TypeError(`Cannot convert non-integer ${value} to bigint`);
    return BigInt(value);
  }
  if (typeof value === 'string') {
    const s = value.trim();
    if (!s) throw new TypeError('Empty string cannot be converted to bigint');
    if (!/^-?\d+$/.test(s)) throw new TypeError(`Not an integer string: ${s}`);
    return BigInt(s);
  }
  throw new TypeError(`Cannot convert type ${typeof value} to BigInt`);
}

export function dbToBigint(v: unknown): bigint {
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'bigint') return toBigInt(v);
  throw new TypeError(`Unexpected DB bigint type: ${typeof v}`);
}
