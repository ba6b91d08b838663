import { isRecord, mapEntries } from "./data.js";
import { LocalDate } from "./local-date.js";

/** Dates and datetimes become ISO strings, keyword symbols their text. */
export function prepareForJson(data: unknown): unknown {
  if (data instanceof LocalDate) return data.toString();
  if (data instanceof Date) return data.toISOString();
  if (typeof data === "symbol") return data.description ?? "";
  if (Array.isArray(data)) return data.map(prepareForJson);
  if (isRecord(data)) return mapEntries(data, (key, value) => [key, prepareForJson(value)]);
  return data;
}

export function serialize(data: unknown, indent?: number): string {
  return JSON.stringify(prepareForJson(data), null, indent) ?? "null";
}
