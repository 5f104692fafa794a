import type { Schema, TypeSpec } from "../types/schema.js";
import type { ProducedSchema, Production, Violation } from "../types/contracts.js";
import { isTypeSpec } from "./types.js";

export function formatType(type: TypeSpec): string {
  switch (type.kind) {
    case "scalar":
      return type.scalar;
    case "sequence":
      return `sequence<${formatType(type.element)}>`;
    case "shapedArray":
      return `array<${type.element}>[${type.dimensions.map(d => (d === null ? "*" : String(d))).join(", ")}]`;
    case "mapping":
      return `mapping<${type.key}, ${formatType(type.value)}>`;
    case "opaque":
      return `opaque<${type.label}>`;
    case "record":
      return `record{${formatEntries(type.fields)}}`;
  }
}

export function formatSchema(schema: Schema): string {
  return `{${formatEntries(schema)}}`;
}

function formatEntries(schema: Schema): string {
  return Object.entries(schema).map(([k, t]) => `${k}: ${formatType(t)}`).join(", ");
}

export function formatProduction(production: Production): string {
  if (isTypeSpec(production)) return formatType(production);
  switch (production.op) {
    case "set":
      return formatType(production.type);
    case "drop":
      return "drop";
    case "modify":
      return `modify${formatProduced(production.fields)}`;
  }
}

export function formatProduced(produced: ProducedSchema): string {
  return `{${Object.entries(produced).map(([k, p]) => `${k}: ${formatProduction(p)}`).join(", ")}}`;
}

export function formatViolation(v: Violation): string {
  const where = [v.location.stage, v.location.slot, v.location.key].filter(Boolean).join(" › ");
  return `[${v.kind}] ${where}: ${v.message}`;
}
