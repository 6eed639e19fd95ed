/**
 * Value Model
 * Recursive, dynamically-typed container for front matter and derived fields
 */

// ============================================================================
// Types
// ============================================================================

export type NumberValue =
  | { readonly kind: "integer"; readonly value: bigint }
  | { readonly kind: "float"; readonly value: number };

export type Value =
  | { readonly kind: "null" }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "number"; readonly value: NumberValue }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "array"; readonly items: readonly Value[] }
  | { readonly kind: "map"; readonly entries: ValueMap };

/**
 * Plain JavaScript shape of a Value, as handed to templates
 */
export type PlainValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ============================================================================
// ValueMap
// ============================================================================

/**
 * String-keyed map whose iteration order is always lexicographic by key,
 * independent of insertion order
 */
export class ValueMap {
  private readonly items = new Map<string, Value>();

  constructor(entries: Iterable<readonly [string, Value]> = []) {
    for (const [key, value] of entries) {
      this.items.set(key, value);
    }
  }

  get size(): number {
    return this.items.size;
  }

  get(key: string): Value | undefined {
    return this.items.get(key);
  }

  has(key: string): boolean {
    return this.items.has(key);
  }

  /**
   * Insert or overwrite a field
   */
  insert(key: string, value: Value): void {
    this.items.set(key, value);
  }

  keys(): string[] {
    return [...this.items.keys()].sort(compareKeys);
  }

  entries(): Array<[string, Value]> {
    return [...this.items].sort(([a], [b]) => compareKeys(a, b));
  }

  [Symbol.iterator](): Iterator<[string, Value]> {
    return this.entries()[Symbol.iterator]();
  }
}

// ============================================================================
// Constructors
// ============================================================================

export const NULL: Value = { kind: "null" };

export function booleanValue(value: boolean): Value {
  return { kind: "boolean", value };
}

export function integerValue(value: bigint | number): Value {
  const int = BigInt(value);
  if (int < INT64_MIN || int > INT64_MAX) {
    throw new RangeError(`Integer ${int} is outside the 64-bit range`);
  }
  return { kind: "number", value: { kind: "integer", value: int } };
}

export function floatValue(value: number): Value {
  return { kind: "number", value: { kind: "float", value } };
}

export function stringValue(value: string): Value {
  return { kind: "string", value };
}

export function arrayValue(items: readonly Value[]): Value {
  return { kind: "array", items };
}

export function mapValue(entries: ValueMap | Iterable<readonly [string, Value]> = []): Value {
  return {
    kind: "map",
    entries: entries instanceof ValueMap ? entries : new ValueMap(entries),
  };
}

// ============================================================================
// Accessors
// ============================================================================

/**
 * Return the wrapped string, or undefined for any other variant
 *
 * @example
 * asString(stringValue("a string")) // "a string"
 * asString(booleanValue(true)) // undefined
 */
export function asString(value: Value | undefined): string | undefined {
  return value?.kind === "string" ? value.value : undefined;
}

export function asArray(value: Value | undefined): readonly Value[] | undefined {
  return value?.kind === "array" ? value.items : undefined;
}

/**
 * Structural equality. Numbers compare by subkind and value; NaN equals NaN.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "boolean":
      return b.kind === "boolean" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "number": {
      if (b.kind !== "number" || b.value.kind !== a.value.kind) return false;
      const left = a.value.value;
      const right = b.value.value;
      if (typeof left === "number" && typeof right === "number") {
        return Object.is(left, right) || left === right;
      }
      return left === right;
    }
    case "array":
      return (
        b.kind === "array" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => valueEquals(item, b.items[i]))
      );
    case "map": {
      if (b.kind !== "map" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valueEquals(value, other)) return false;
      }
      return true;
    }
  }
}

// ============================================================================
// Plain conversion
// ============================================================================

/**
 * Convert to plain JavaScript for template contexts. Integers outside the
 * safe range stay bigint so no digits are lost.
 */
export function toPlain(value: Value): PlainValue {
  switch (value.kind) {
    case "null":
      return null;
    case "boolean":
    case "string":
      return value.value;
    case "number": {
      const number = value.value;
      if (number.kind === "float") return number.value;
      const asNumber = Number(number.value);
      return Number.isSafeInteger(asNumber) ? asNumber : number.value;
    }
    case "array":
      return value.items.map(toPlain);
    case "map":
      // fromEntries defines own properties, so a `__proto__` key stays a key
      return Object.fromEntries(
        [...value.entries].map(([key, item]) => [key, toPlain(item)]),
      );
  }
}
