import type { TypeSpec } from "../types/schema.js";
import type { DropOperation, ModifyOperation, ProducedSchema, Production, SchemaOperation, SetOperation } from "../types/contracts.js";
import { MalformedContractError } from "../errors.js";
import { observeType } from "./observe.js";
import { isTypeSpec, record } from "./types.js";

const EMPTY_RECORD = record({});

export function set(type: TypeSpec): SetOperation {
  if (!isTypeSpec(type)) throw new MalformedContractError("set() needs a type descriptor");
  return Object.freeze({ op: "set", type });
}

const DROP: DropOperation = Object.freeze({ op: "drop" });

export function drop(): DropOperation {
  return DROP;
}

export function modify(fields: ProducedSchema): ModifyOperation {
  return Object.freeze({ op: "modify", fields: validateProduced(fields, "modify") });
}

export function isSchemaOperation(value: unknown): value is SchemaOperation {
  if (typeof value !== "object" || value === null || !("op" in value)) return false;
  switch (value.op) {
    case "set":
      return "type" in value && isTypeSpec(value.type);
    case "drop":
      return true;
    case "modify":
      return "fields" in value && typeof value.fields === "object" && value.fields !== null;
    default:
      return false;
  }
}

export function toOperation(production: Production): SchemaOperation {
  return isTypeSpec(production) ? set(production) : production;
}

/** Copies and freezes a produced schema, rejecting values that are neither types nor operations. */
export function validateProduced(produced: unknown, path: string): ProducedSchema {
  if (typeof produced !== "object" || produced === null || Array.isArray(produced)) {
    throw new MalformedContractError("expected an object of key → type or operation", path);
  }
  const out: Record<string, Production> = {};
  for (const [key, value] of Object.entries(produced)) {
    if (key === "") throw new MalformedContractError("empty key", path);
    if (isTypeSpec(value)) out[key] = value;
    else if (isSchemaOperation(value)) {
      out[key] = value.op === "modify" ? Object.freeze({ op: "modify", fields: validateProduced(value.fields, `${path}.${key}`) }) : value;
    } else throw new MalformedContractError("not a type descriptor or schema operation", `${path}.${key}`);
  }
  return Object.freeze(out);
}

// Field types of the record a `modify` edits; anything that is not a record starts empty.
function recordFields(current: unknown) {
  if (current === undefined) return EMPTY_RECORD.fields;
  const type = observeType(current, EMPTY_RECORD);
  return type.kind === "record" ? type.fields : EMPTY_RECORD.fields;
}

/** Resulting type of one key after an operation; `undefined` when the key is removed. */
export function applyOperation(current: unknown, production: Production): TypeSpec | undefined {
  const op = toOperation(production);
  switch (op.op) {
    case "set":
      return op.type;
    case "drop":
      return undefined;
    case "modify": {
      const fields = new Map(Object.entries(recordFields(current)));
      for (const [name, inner] of Object.entries(op.fields)) {
        const next = applyOperation(fields.get(name), inner);
        if (next === undefined) fields.delete(name);
        else fields.set(name, next);
      }
      return record(Object.fromEntries(fields));
    }
  }
}

/**
 * One production with the same effect as applying `earlier` and then `later`.
 * A `modify` after a `modify` stays a field-wise `modify`, so fields the
 * productions never mention are left as the payload had them.
 */
export function composeProduction(earlier: Production | undefined, later: Production): Production {
  const next = toOperation(later);
  if (earlier === undefined || next.op !== "modify") return later;
  const prev = toOperation(earlier);
  if (prev.op === "modify") {
    const fields = new Map<string, Production>(Object.entries(prev.fields));
    for (const [name, inner] of Object.entries(next.fields)) fields.set(name, composeProduction(fields.get(name), inner));
    return modify(Object.fromEntries(fields));
  }
  const result = applyOperation(prev.op === "set" ? prev.type : undefined, next);
  return result === undefined ? DROP : set(result);
}

/**
 * Folds produced/modified declarations into a working schema in place.
 * A later write to the same key replaces the earlier one; dropping an absent
 * key leaves the schema unchanged.
 */
export function applyOperations(working: Map<string, unknown>, produced: ProducedSchema): void {
  for (const [key, production] of Object.entries(produced)) {
    const next = applyOperation(working.get(key), production);
    if (next === undefined) working.delete(key);
    else working.set(key, next);
  }
}
