export function parseNumber(v: unknown): number | undefined {
  if (v === undefined) return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

/** Positive integer id from a path/query value, else undefined. */
export function parseId(v: unknown): number | undefined {
  const n = parseNumber(v);
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : undefined;
}
