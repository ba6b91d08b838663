import { LocalDate } from "./local-date.js";

export type DataRecord = Record<string, unknown>;

/** Plain objects only: arrays, dates and class instances are not records. */
export function isRecord(value: unknown): value is DataRecord {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function mapEntries(
  record: DataRecord,
  fn: (key: string, value: unknown) => readonly [string, unknown],
): DataRecord {
  const out: DataRecord = {};
  for (const [key, value] of Object.entries(record)) {
    const [nextKey, nextValue] = fn(key, value);
    out[nextKey] = nextValue;
  }
  return out;
}

/** A short name for the shape of a value, used in validation reports. */
export function describeKind(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof LocalDate) return "date";
  if (value instanceof Date) return "datetime";
  if (typeof value === "symbol") return "keyword";
  if (typeof value === "number") return Number.isInteger(value) ? "int" : "float";
  if (typeof value === "boolean") return "bool";
  if (isRecord(value)) return "structure";
  return typeof value;
}

/** The text behind a keyword token, or the string itself. */
export function tokenText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "symbol") return value.description;
  return undefined;
}
