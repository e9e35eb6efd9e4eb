export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Recursively convert a value into plain JSON.
 * - Converts Date to ISO string
 * - Drops functions and undefined values
 * - Replaces circular references with "[Circular]"
 * - Non-finite numbers become null
 */
export function toJsonValue(value: unknown, seen = new WeakSet<object>()): JsonValue | undefined {
  if (value === null) return null;
  if (value === undefined || typeof value === "function" || typeof value === "symbol") {
    return undefined;
  }
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (typeof value !== "object") return undefined;

  if (seen.has(value)) return "[Circular]";
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item, seen) ?? null);
  }

  const result: { [key: string]: JsonValue } = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toJsonValue(entry, seen);
    if (converted !== undefined) result[key] = converted;
  }
  return result;
}

/** Action result payloads must survive JSON round-trips through the runtime. */
export function safeSerialize(obj: Record<string, unknown>): Record<string, JsonValue> {
  const result: Record<string, JsonValue> = {};
  const seen = new WeakSet<object>([obj]);
  for (const [key, value] of Object.entries(obj)) {
    const converted = toJsonValue(value, seen);
    if (converted !== undefined) result[key] = converted;
  }
  return result;
}
