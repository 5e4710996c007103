export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const toNumber = (value: unknown): number => {
  const n = Number(value);
  return Number.isFinite(n) ? n : 0;
};

export const toText = (value: unknown): string =>
  value === undefined || value === null ? '' : String(value);

/**
 * The array answers some single-object queries as a one-element list.
 */
export const singleRecord = (raw: unknown): JsonRecord | null => {
  if (isRecord(raw)) return raw;
  if (Array.isArray(raw) && isRecord(raw[0])) return raw[0];
  return null;
};

export const recordList = (raw: unknown): JsonRecord[] | null => {
  if (!Array.isArray(raw)) return null;
  return raw.filter(isRecord);
};
