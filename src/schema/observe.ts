import type { ScalarKind, TypeSpec } from "../types/schema.js";
import { diagnose } from "./compat.js";
import { boolean, datetime, float, integer, isScalarKind, isTypeSpec, mapping, opaque, record, sequence, shapedArray, string } from "./types.js";

/** Tensor-like values (numeric libraries, dataframes' value arrays) describe themselves this way. */
export interface ShapedArrayLike {
  readonly dtype: string;
  readonly shape: readonly number[];
}

const DTYPE_KINDS: Readonly<Record<string, ScalarKind>> = {
  float16: "float",
  float32: "float",
  float64: "float",
  int8: "integer",
  int16: "integer",
  int32: "integer",
  int64: "integer",
  uint8: "integer",
  uint16: "integer",
  uint32: "integer",
  bool: "boolean",
  string: "string"
};

function isShapedArrayLike(value: object): value is ShapedArrayLike {
  if (!("dtype" in value) || !("shape" in value)) return false;
  const { dtype, shape } = value;
  return typeof dtype === "string" && Array.isArray(shape) && shape.every(d => typeof d === "number");
}

function dtypeKind(dtype: string): ScalarKind | undefined {
  if (isScalarKind(dtype)) return dtype;
  return DTYPE_KINDS[dtype.toLowerCase()];
}

function typedArrayKind(value: ArrayBufferView): ScalarKind | undefined {
  if (value instanceof Float32Array || value instanceof Float64Array) return "float";
  if (value instanceof DataView) return undefined;
  return "integer";
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function labelOf(value: object): string {
  const ctor: unknown = value.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "object";
}

/**
 * Picks the element type reported for a container: the first element that the
 * expected element type rejects, else the first element's type. Empty
 * containers take the expected element type.
 */
function elementType(values: Iterable<unknown>, expected: TypeSpec | undefined, visiting: WeakSet<object>): TypeSpec | undefined {
  let first: TypeSpec | undefined;
  for (const v of values) {
    const t = observe(v, expected, visiting);
    if (expected && diagnose(expected, t)) return t;
    first ??= t;
    if (!expected) return first;
  }
  return first ?? expected;
}

/**
 * Maps a runtime value to the TypeSpec it exhibits. TypeSpecs pass through
 * unchanged. `expected` only steers container inference (element types,
 * record vs. mapping); it never changes what a scalar is.
 * Every JS number observes as `float`; pass a bigint (or the `integer` type itself) where `integer` is declared.
 * A container met again inside itself observes as `opaque` of its constructor name.
 */
export function observeType(value: unknown, expected?: TypeSpec): TypeSpec {
  return observe(value, expected, new WeakSet());
}

function observe(value: unknown, expected: TypeSpec | undefined, visiting: WeakSet<object>): TypeSpec {
  if (isTypeSpec(value)) return value;
  switch (typeof value) {
    case "string":
      return string;
    case "number":
      return float;
    case "bigint":
      return integer;
    case "boolean":
      return boolean;
  }
  if (value === null) return opaque("null");
  if (typeof value !== "object") return opaque(typeof value);
  if (value instanceof Date) return datetime;
  if (visiting.has(value)) return opaque(labelOf(value));
  visiting.add(value);
  try {
    return observeObject(value, expected, visiting);
  } finally {
    visiting.delete(value);
  }
}

function observeObject(value: object, expected: TypeSpec | undefined, visiting: WeakSet<object>): TypeSpec {
  if (ArrayBuffer.isView(value)) {
    const kind = typedArrayKind(value);
    const length = "length" in value && typeof value.length === "number" ? value.length : undefined;
    if (kind && length !== undefined) return shapedArray(kind, length > 0 ? [length] : [null]);
    return opaque(labelOf(value));
  }
  if (isShapedArrayLike(value)) {
    const kind = dtypeKind(value.dtype);
    if (kind) return shapedArray(kind, value.shape.map(d => (d > 0 ? d : null)));
    return opaque(labelOf(value));
  }

  if (Array.isArray(value)) {
    const hint = expected?.kind === "sequence" ? expected.element : undefined;
    return sequence(elementType(value, hint, visiting) ?? opaque("unknown"));
  }

  if (value instanceof Map) {
    const hint = expected?.kind === "mapping" ? expected.value : undefined;
    const keyKind = mapKeyKind([...value.keys()], expected);
    return mapping(keyKind, elementType(value.values(), hint, visiting) ?? opaque("unknown"));
  }

  if (isPlainObject(value)) {
    if (expected?.kind === "record") {
      const fields: Record<string, TypeSpec> = {};
      for (const [k, v] of Object.entries(value)) {
        if (v !== undefined) fields[k] = observe(v, expected.fields[k], visiting);
      }
      return record(fields);
    }
    const hint = expected?.kind === "mapping" ? expected.value : undefined;
    return mapping("string", elementType(Object.values(value), hint, visiting) ?? opaque("unknown"));
  }

  return opaque(labelOf(value));
}

function mapKeyKind(keys: unknown[], expected: TypeSpec | undefined): ScalarKind {
  const kinds = new Set<ScalarKind>();
  for (const k of keys) {
    const t = observeType(k);
    if (t.kind === "scalar") kinds.add(t.scalar);
  }
  if (kinds.size === 1) return [...kinds][0];
  if (expected?.kind === "mapping") return expected.key;
  return "string";
}
