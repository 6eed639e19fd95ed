/**
 * YAML <-> Value conversion
 */

import {
  Document,
  Pair,
  Scalar,
  YAMLMap,
  YAMLSeq,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  parseDocument,
} from "yaml";
import type { Alias, Node } from "yaml";
import { DeserializationError, UnrepresentableNumberError } from "../errors";
import {
  INT64_MAX,
  INT64_MIN,
  NULL,
  arrayValue,
  booleanValue,
  floatValue,
  integerValue,
  mapValue,
  stringValue,
  type Value,
} from "./value";

// ============================================================================
// Decoding
// ============================================================================

function fromBigInt(int: bigint): Value {
  if (int >= INT64_MIN && int <= INT64_MAX) {
    return integerValue(int);
  }
  const float = Number(int);
  if (Number.isFinite(float)) {
    return floatValue(float);
  }
  throw new UnrepresentableNumberError(int.toString());
}

function fromNumber(number: number): Value {
  if (Number.isInteger(number)) {
    const int = BigInt(number);
    if (int >= INT64_MIN && int <= INT64_MAX) {
      return integerValue(int);
    }
  }
  return floatValue(number);
}

/**
 * Convert a decoded YAML tree into a Value
 *
 * Expects the output of `Document.toJS({ mapAsMap: true })` or a scalar's
 * value, parsed with `intAsBigInt`, so integer literals arrive as bigint and
 * floats as number.
 * Any number that fits a signed 64-bit integer becomes an integer, including
 * integral floats such as `1.0`. Map entries whose key is not a string are
 * dropped.
 */
export function fromYaml(data: unknown): Value {
  if (data === null || data === undefined) return NULL;

  switch (typeof data) {
    case "boolean":
      return booleanValue(data);
    case "bigint":
      return fromBigInt(data);
    case "number":
      return fromNumber(data);
    case "string":
      return stringValue(data);
  }

  if (Array.isArray(data)) {
    return arrayValue(data.map(fromYaml));
  }

  if (data instanceof Map) {
    const entries: Array<[string, Value]> = [];
    for (const [key, value] of data) {
      if (typeof key === "string") {
        entries.push([key, fromYaml(value)]);
      }
    }
    return mapValue(entries);
  }

  if (typeof data === "object") {
    return mapValue(
      Object.entries(data).map(([key, value]): [string, Value] => [
        key,
        fromYaml(value),
      ]),
    );
  }

  return stringValue(String(data));
}

const PARSE_OPTIONS = { intAsBigInt: true } as const;

// Tags the core schema resolves scalars with
const CORE_SCALAR_TAGS = new Set(
  ["str", "int", "float", "bool", "null"].map((name) => `tag:yaml.org,2002:${name}`),
);

/**
 * Value of a scalar with its tag discarded. A plain scalar carrying a tag the
 * schema does not know was read as a string; resolve its text again untagged.
 */
function untaggedScalar(scalar: Scalar): unknown {
  if (
    scalar.tag === undefined ||
    CORE_SCALAR_TAGS.has(scalar.tag) ||
    scalar.type !== Scalar.PLAIN ||
    typeof scalar.value !== "string"
  ) {
    return scalar.value;
  }

  const { contents } = parseDocument(scalar.value, PARSE_OPTIONS);
  return isScalar(contents) ? contents.value : scalar.value;
}

/**
 * Convert a document node into a Value, following aliases
 */
function fromNode(node: unknown, resolveAlias: (alias: Alias) => unknown): Value {
  if (isAlias(node)) return fromNode(resolveAlias(node), resolveAlias);
  if (isScalar(node)) return fromYaml(untaggedScalar(node));
  if (isSeq(node)) {
    return arrayValue(node.items.map((item) => fromNode(item, resolveAlias)));
  }
  if (isMap(node)) {
    const entries: Array<[string, Value]> = [];
    for (const pair of node.items) {
      const keyNode = isAlias(pair.key) ? resolveAlias(pair.key) : pair.key;
      const key = isScalar(keyNode) ? untaggedScalar(keyNode) : undefined;
      if (typeof key === "string") {
        entries.push([key, fromNode(pair.value, resolveAlias)]);
      }
    }
    return mapValue(entries);
  }
  return NULL;
}

/**
 * Decode YAML text into a Value. Tags are discarded and the tagged node's own
 * value is kept.
 */
export function parseYaml(text: string): Value {
  const doc = parseDocument(text, PARSE_OPTIONS);

  if (doc.errors.length > 0) {
    const [first] = doc.errors;
    throw new DeserializationError(first.message, first);
  }

  return fromNode(doc.contents, (alias) => alias.resolve(doc));
}

// ============================================================================
// Encoding
// ============================================================================

function toNode(value: Value): Node {
  switch (value.kind) {
    case "null":
      return new Scalar(null);
    case "boolean":
    case "string":
      return new Scalar(value.value);
    case "number":
      return new Scalar(value.value.value);
    case "array": {
      const seq = new YAMLSeq<Node>();
      seq.items = value.items.map(toNode);
      return seq;
    }
    case "map": {
      const map = new YAMLMap<Scalar, Node>();
      for (const [key, item] of value.entries) {
        map.items.push(new Pair(new Scalar(key), toNode(item)));
      }
      return map;
    }
  }
}

/**
 * Serialize a Value as YAML. Null is written as the `~` none marker rather
 * than a `null` token. A float with an integral value decodes back as an
 * integer.
 */
export function stringifyYaml(value: Value): string {
  const doc = new Document();
  doc.contents = toNode(value);
  return doc.toString({ nullStr: "~", lineWidth: 0 });
}
