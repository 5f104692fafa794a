// src/orchestrator/run.ts
// Guarded execution: every fit/transform is checked against the stage contracts before any stage logic runs.
// Logs one line per stage with timing, and the payload schema around it when LOG_SCHEMAS=1.

import type { Schema, TypeSpec } from "../types/schema.js";
import type { Payload, StageParameters, Violation } from "../types/contracts.js";
import { ContractViolationError } from "../errors.js";
import { checkFit, checkTransform, toMap } from "../contracts/check.js";
import { observeType } from "../schema/observe.js";
import { formatSchema } from "../schema/format.js";
import { COLOR, LOG_SCHEMAS, LOG_STAGES, fmtMs, logViolations } from "../log.js";
import { Chain } from "./chain.js";
import type { Data, Stage } from "./stage.js";

export interface RunOptions {
  /** Throw ContractViolationError on violations (default). When false, violations are logged and execution continues. */
  enforce?: boolean;
}

export type NamedStage = readonly [name: string, stage: Stage];

function schemaOf(data: Readonly<Data>): Schema {
  const out: Record<string, TypeSpec> = {};
  for (const [k, v] of Object.entries(data)) if (v !== undefined) out[k] = observeType(v);
  return out;
}

function toData(payload: Payload | undefined): Data {
  return payload === undefined ? {} : Object.fromEntries(toMap(payload));
}

function guard(phase: string, violations: readonly Violation[], opts: RunOptions) {
  if (violations.length === 0) return;
  if (opts.enforce ?? true) throw new ContractViolationError(phase, violations);
  logViolations(violations, `${phase} (not enforced)`);
}

export function chainOf(stages: readonly NamedStage[]): Chain {
  return new Chain(stages.map(([name, stage]) => [name, stage.contract] as const));
}

export async function runFit(stage: Stage, data: Readonly<Data>, parameters: Readonly<Data> = {}, opts: RunOptions = {}, name = stage.label) {
  guard(`fit ${name}`, checkFit(stage.contract, data, parameters, { stage: name }), opts);
  const t0 = Date.now();
  if (LOG_STAGES) console.log(`${COLOR.cyan("▶ fit")} ${name}`);
  await stage.fit(data, parameters);
  if (LOG_STAGES) console.log(`${COLOR.green("✓ fit")} ${name} ${COLOR.gray("(" + fmtMs(Date.now() - t0) + ")")}`);
  if (LOG_SCHEMAS) console.log(COLOR.gray(`  state ${formatSchema(stage.stateSchema())}`));
}

export async function runTransform(stage: Stage, data: Readonly<Data>, opts: RunOptions = {}, name = stage.label): Promise<Data> {
  guard(`transform ${name}`, checkTransform(stage.contract, data, stage.isFitted(), { stage: name }), opts);
  return transformLogged(stage, data, name);
}

async function transformLogged(stage: Stage, data: Readonly<Data>, name: string): Promise<Data> {
  const t0 = Date.now();
  if (LOG_SCHEMAS) console.log(COLOR.gray(`  in  ${formatSchema(schemaOf(data))}`));
  const out = await stage.transform({ ...data });
  if (LOG_STAGES) console.log(`${COLOR.green("✓ transform")} ${name} ${COLOR.gray("(" + fmtMs(Date.now() - t0) + ")")}`);
  if (LOG_SCHEMAS) console.log(COLOR.gray(`  out ${formatSchema(schemaOf(out))}`));
  return out;
}

/**
 * Fits every stage in order, transforming the payload through each one so the
 * next stage fits on what it will see at transform time. The whole chain is
 * checked before the first stage runs. Returns the transformed payload.
 */
export async function fitChain(stages: readonly NamedStage[], data: Readonly<Data>, parameters: StageParameters = {}, opts: RunOptions = {}): Promise<Data> {
  guard("fit", chainOf(stages).checkFit(data, parameters), opts);
  let current: Data = { ...data };
  let idx = 0;
  for (const [name, stage] of stages) {
    const stageStart = Date.now();
    if (LOG_STAGES) console.log(`\n${COLOR.cyan("▶ stage")} ${++idx}/${stages.length} ${name} ${COLOR.gray("— fit")}`);
    await stage.fit(current, toData(parameters[name]));
    current = await transformLogged(stage, current, name);
    if (LOG_STAGES) console.log(`${COLOR.green("✓ done")} ${name} ${COLOR.gray("(" + fmtMs(Date.now() - stageStart) + ")")}`);
  }
  return current;
}

/** Transforms through every stage after checking the whole chain, including that stateful stages were fit. */
export async function transformChain(stages: readonly NamedStage[], data: Readonly<Data>, opts: RunOptions = {}): Promise<Data> {
  const fitted = stages.filter(([, stage]) => stage.isFitted()).map(([name]) => name);
  guard("transform", chainOf(stages).checkTransform(data, fitted), opts);
  let current: Data = { ...data };
  let idx = 0;
  for (const [name, stage] of stages) {
    if (LOG_STAGES) console.log(`\n${COLOR.cyan("▶ stage")} ${++idx}/${stages.length} ${name} ${COLOR.gray("— transform")}`);
    current = await transformLogged(stage, current, name);
  }
  return current;
}
