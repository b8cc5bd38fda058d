/**
 * Shared record and row types
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** One record as returned by the API */
export type RawRecord = JsonObject;

/** Values that survive into an output row */
export type CellValue = JsonValue;

/** Flat output row; always carries `id` */
export type TransformedRow = Record<string, CellValue> & { id: string };

export interface Page {
  records: RawRecord[];
  /** Reported total; only trustworthy on the first request of a sequence */
  total: number;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
