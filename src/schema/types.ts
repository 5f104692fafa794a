import type {
  Dimension,
  MappingType,
  OpaqueType,
  RecordType,
  ScalarKind,
  ScalarType,
  Schema,
  SequenceType,
  ShapedArrayType,
  TypeSpec
} from "../types/schema.js";
import { SCALAR_KINDS } from "../types/schema.js";
import { MalformedContractError } from "../errors.js";

// Every descriptor handed out by the constructors below; payload values found here are declared types, not data.
const constructed = new WeakSet<object>();

function seal<T extends TypeSpec>(spec: T): T {
  Object.freeze(spec);
  constructed.add(spec);
  return spec;
}

export function isTypeSpec(value: unknown): value is TypeSpec {
  return typeof value === "object" && value !== null && constructed.has(value);
}

export function isScalarKind(value: unknown): value is ScalarKind {
  const kinds: readonly string[] = SCALAR_KINDS;
  return typeof value === "string" && kinds.includes(value);
}

function requireScalarKind(kind: unknown, what: string): ScalarKind {
  if (!isScalarKind(kind)) {
    throw new MalformedContractError(`unknown scalar kind ${JSON.stringify(kind)} for ${what} (expected one of ${SCALAR_KINDS.join(", ")})`);
  }
  return kind;
}

function requireTypeSpec(value: unknown, what: string): TypeSpec {
  if (!isTypeSpec(value)) throw new MalformedContractError(`${what} is not a type descriptor`);
  return value;
}

export function scalar(kind: ScalarKind): ScalarType {
  return seal({ kind: "scalar", scalar: requireScalarKind(kind, "scalar") });
}

export const float = scalar("float");
export const integer = scalar("integer");
export const string = scalar("string");
export const boolean = scalar("boolean");
export const datetime = scalar("datetime");

export function sequence(element: TypeSpec): SequenceType {
  return seal({ kind: "sequence", element: requireTypeSpec(element, "sequence element") });
}

export function shapedArray(element: ScalarKind, dimensions: readonly Dimension[]): ShapedArrayType {
  const kind = requireScalarKind(element, "array element");
  if (!Array.isArray(dimensions)) throw new MalformedContractError("array dimensions must be a list");
  const dims: Dimension[] = [];
  dimensions.forEach((d, i) => {
    if (d !== null && !(Number.isInteger(d) && d > 0)) {
      throw new MalformedContractError(`dimension ${i} must be a positive integer or unconstrained, got ${String(d)}`);
    }
    dims.push(d);
  });
  return seal({ kind: "shapedArray", element: kind, dimensions: Object.freeze(dims) });
}

export function mapping(key: ScalarKind, value: TypeSpec): MappingType {
  return seal({
    kind: "mapping",
    key: requireScalarKind(key, "mapping key"),
    value: requireTypeSpec(value, "mapping value")
  });
}

export function opaque(label: string): OpaqueType {
  if (typeof label !== "string" || label.trim() === "") {
    throw new MalformedContractError("opaque label must be a non-empty string");
  }
  return seal({ kind: "opaque", label });
}

export function record(fields: Schema): RecordType {
  return seal({ kind: "record", fields: validateSchema(fields, "record") });
}

/** Copies and freezes a schema, rejecting entries that are not type descriptors. */
export function validateSchema(schema: unknown, path: string): Schema {
  if (typeof schema !== "object" || schema === null || Array.isArray(schema)) {
    throw new MalformedContractError("expected an object of key → type", path);
  }
  const out: Record<string, TypeSpec> = {};
  for (const [key, value] of Object.entries(schema)) {
    if (key === "") throw new MalformedContractError("empty key", path);
    out[key] = requireTypeSpec(value, `${path}.${key}`);
  }
  return Object.freeze(out);
}
