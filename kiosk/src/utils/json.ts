export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const recordsOf = (value: unknown): JsonRecord[] =>
  Array.isArray(value) ? value.filter(isRecord) : [];

export const readNumber = (record: JsonRecord, key: string): number | null => {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
};

export const readString = (record: JsonRecord, key: string): string | null => {
  const value = record[key];
  return typeof value === "string" ? value : null;
};

export const readBoolean = (record: JsonRecord, key: string): boolean | null => {
  const value = record[key];
  return typeof value === "boolean" ? value : null;
};
