import { FeedItem, FeedRecord } from "../domain/types";

export type ScalarKey = string | number | boolean | bigint | null;

/**
 * A value usable for seen-set membership. Scalars compare by value,
 * structures (arrays, plain objects, dates) by their canonical encoding.
 */
export type SeenKey =
  | { kind: "scalar"; value: ScalarKey }
  | { kind: "structure"; value: string };

export type KeyResult = { ok: true; key: SeenKey } | { ok: false; reason: string };

/** Key of every item whose field is absent, null or undefined. */
export const MISSING: SeenKey = { kind: "scalar", value: null };

export function isFeedItem(value: unknown): value is FeedItem {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isFeedRecord(value: unknown): value is FeedRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const proto: { constructor?: unknown } | null = Object.getPrototypeOf(value);
    const ctor = proto?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof value;
}

function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

type Lookup = { found: true; value: unknown } | { found: false };

// Maps are read with get; other records by own property only, never the prototype chain
function readOwn(record: FeedRecord, key: string): Lookup {
  if (record instanceof Map) {
    return record.has(key) ? { found: true, value: record.get(key) } : { found: false };
  }
  if (!hasOwn(record, key)) return { found: false };
  return { found: true, value: Reflect.get(record, key) };
}

/**
 * Reads `field` from a record. Dot paths walk nested records (objects or
 * Maps, never arrays), but a field literally named `a.b` wins over the walk.
 * Returns undefined when any segment is absent.
 */
export function getField(item: FeedRecord, field: string): unknown {
  const direct = readOwn(item, field);
  if (direct.found) return direct.value;
  if (!field.includes(".")) return undefined;

  let current: unknown = item;
  for (const segment of field.split(".")) {
    if (!isFeedRecord(current)) return undefined;
    const next = readOwn(current, segment);
    if (!next.found) return undefined;
    current = next.value;
  }
  return current;
}

export function toSeenKey(value: unknown): KeyResult {
  switch (typeof value) {
    case "undefined":
      return { ok: true, key: MISSING };
    case "string":
    case "number": // Set membership already treats NaN as NaN and -0 as 0
    case "boolean":
    case "bigint":
      return { ok: true, key: { kind: "scalar", value } };
    case "function":
    case "symbol":
      return { ok: false, reason: `is a ${typeof value}` };
    default:
      break;
  }
  if (value === null) return { ok: true, key: MISSING };

  try {
    return { ok: true, key: { kind: "structure", value: encode(value, []) } };
  } catch (err) {
    if (err instanceof UnencodableValue) return { ok: false, reason: err.message };
    throw err;
  }
}

class UnencodableValue extends Error {}

// Tagged so that structures never collide across types: 1 vs "1", [] vs {}.
function encode(value: unknown, stack: object[]): string {
  if (value === null) return "z";
  switch (typeof value) {
    case "undefined":
      return "u";
    case "string":
      return `s${JSON.stringify(value)}`;
    case "number":
      return `n${Object.is(value, -0) ? "0" : String(value)}`;
    case "boolean":
      return value ? "t" : "f";
    case "bigint":
      return `i${value.toString()}`;
    case "function":
    case "symbol":
      throw new UnencodableValue(`contains a ${typeof value}`);
    default:
      break;
  }

  if (typeof value !== "object" || value === null) throw new UnencodableValue(`contains a ${typeof value}`);
  if (value instanceof Date) return `d${value.getTime()}`;
  if (stack.includes(value)) throw new UnencodableValue("contains a circular reference");

  if (Array.isArray(value)) {
    stack.push(value);
    // Array.from visits holes, so [] and new Array(1) stay distinct
    const parts = Array.from(value, (entry) => encode(entry, stack));
    stack.pop();
    return `[${parts.join(",")}]`;
  }

  if (isFeedItem(value)) {
    stack.push(value);
    const parts = Object.keys(value)
      .sort()
      .map((k) => `${JSON.stringify(k)}:${encode(value[k], stack)}`);
    stack.pop();
    return `{${parts.join(",")}}`;
  }

  const label = describeType(value);
  throw new UnencodableValue(stack.length === 0 ? `is a ${label}` : `contains a ${label}`);
}

/** Seen-set of one filtering run. Grows only. */
export class SeenSet {
  private readonly scalars = new Set<ScalarKey>();
  private readonly structures = new Set<string>();

  /** Records the key and reports whether it was new. */
  remember(key: SeenKey): boolean {
    if (key.kind === "scalar") {
      if (this.scalars.has(key.value)) return false;
      this.scalars.add(key.value);
      return true;
    }
    if (this.structures.has(key.value)) return false;
    this.structures.add(key.value);
    return true;
  }

  get size(): number {
    return this.scalars.size + this.structures.size;
  }
}
