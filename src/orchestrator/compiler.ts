// Compiles a JSON chain declaration into a Chain.
//
// {
//   "input": { "x": "array<float>[*, *]" },
//   "stages": [
//     { "name": "scale", "transformRequires": { "x": "array<float>[*, *]" }, "fittedState": { "mean": "float" } },
//     { "name": "model", "fitParameters": { "alpha": "float" }, "producedOrModified": { "x": "drop", "y": "float[]" } }
//   ]
// }
//
// Also accepted wrapped as { "chain": { ... } }. Produced entries take a type, "drop", or { "modify": { field: type | "drop" } }.
import type { Schema, TypeSpec } from "../types/schema.js";
import type { ContractDeclaration, ContractSlot, ProducedSchema, Production } from "../types/contracts.js";
import { CONTRACT_SLOTS } from "../types/contracts.js";
import { MalformedContractError } from "../errors.js";
import { parseType } from "../schema/parse.js";
import { drop, modify } from "../schema/ops.js";
import { isPlainObject } from "../schema/observe.js";
import { defineContract } from "../contracts/define.js";
import { Chain } from "./chain.js";

export interface CompiledChain {
  chain: Chain;
  /** Declared initial input; empty when the declaration names none. */
  input: Schema;
}

function parseAt(notation: unknown, path: string): TypeSpec {
  if (typeof notation !== "string") throw new MalformedContractError("expected a type string", path);
  try {
    return parseType(notation);
  } catch (e) {
    if (e instanceof MalformedContractError) throw new MalformedContractError(e.message, path);
    throw e;
  }
}

function compileSchema(raw: unknown, path: string): Schema {
  if (raw === undefined) return {};
  if (!isPlainObject(raw)) throw new MalformedContractError("expected an object of key → type", path);
  const out: Record<string, TypeSpec> = {};
  for (const [key, notation] of Object.entries(raw)) out[key] = parseAt(notation, `${path}.${key}`);
  return out;
}

function compileProduction(raw: unknown, path: string): Production {
  if (raw === "drop") return drop();
  if (isPlainObject(raw)) {
    if (!Object.hasOwn(raw, "modify") || Object.keys(raw).length !== 1) {
      throw new MalformedContractError(`expected a type, "drop" or { "modify": {...} }`, path);
    }
    return modify(compileProduced(raw.modify, `${path}.modify`));
  }
  return parseAt(raw, path);
}

function compileProduced(raw: unknown, path: string): ProducedSchema {
  if (raw === undefined) return {};
  if (!isPlainObject(raw)) throw new MalformedContractError("expected an object of key → type or operation", path);
  const out: Record<string, Production> = {};
  for (const [key, value] of Object.entries(raw)) out[key] = compileProduction(value, `${path}.${key}`);
  return out;
}

function compileStage(raw: unknown, path: string): [string, ContractDeclaration] {
  if (!isPlainObject(raw)) throw new MalformedContractError("stage must be an object", path);
  const { name, ...slots } = raw;
  if (typeof name !== "string") throw new MalformedContractError("stage needs a string 'name'", path);
  const declaration: { -readonly [K in ContractSlot]?: ContractDeclaration[K] } = {};
  for (const [key, value] of Object.entries(slots)) {
    const at = `${path}(${name}).${key}`;
    switch (key) {
      case "fitRequires":
      case "transformRequires":
      case "fitParameters":
      case "fittedState":
        declaration[key] = compileSchema(value, at);
        break;
      case "producedOrModified":
        declaration[key] = compileProduced(value, at);
        break;
      default:
        throw new MalformedContractError(`unknown field '${key}' (expected name, ${CONTRACT_SLOTS.join(", ")})`, `${path}(${name})`);
    }
  }
  return [name, declaration];
}

function unwrap(raw: unknown): Record<string, unknown> {
  if (!isPlainObject(raw)) throw new MalformedContractError("chain declaration must be an object");
  if (Array.isArray(raw.stages)) return raw;
  if (isPlainObject(raw.chain)) return raw.chain;
  throw new MalformedContractError(`no chain found: expected { "stages": [...] } or { "chain": { "stages": [...] } }`);
}

export function compileChain(raw: unknown): CompiledChain {
  const decl = unwrap(raw);
  const stages = decl.stages;
  if (!Array.isArray(stages)) throw new MalformedContractError("'stages' must be a list", "chain");
  const links = stages.map((s: unknown, i) => {
    const [name, declaration] = compileStage(s, `stages[${i}]`);
    return [name, defineContract(declaration, name)] as const;
  });
  return { chain: new Chain(links), input: compileSchema(decl.input, "input") };
}

/** Parses JSON text first; syntax errors surface as MalformedContractError. */
export function compileChainText(text: string): CompiledChain {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new MalformedContractError(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return compileChain(parsed);
}
