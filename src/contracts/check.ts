import type { Schema } from "../types/schema.js";
import type { ContractSlot, Payload, Phase, StageContract, Violation, ViolationLocation } from "../types/contracts.js";
import { diagnose } from "../schema/compat.js";
import { observeType } from "../schema/observe.js";
import { formatType } from "../schema/format.js";
import { needsFit } from "./define.js";

export interface CheckOptions {
  /** Stage name recorded in each violation's location. */
  stage?: string;
}

const SLOT_LABEL: Record<ContractSlot, string> = {
  fitRequires: "fit input",
  transformRequires: "transform input",
  fitParameters: "fit parameter",
  fittedState: "fitted state",
  producedOrModified: "output"
};

function isMapPayload(payload: Payload): payload is ReadonlyMap<string, unknown> {
  return payload instanceof Map;
}

export function toMap(payload: Payload): ReadonlyMap<string, unknown> {
  return isMapPayload(payload) ? payload : new Map(Object.entries(payload));
}

function at(slot: ContractSlot, key: string | undefined, opts: CheckOptions): ViolationLocation {
  const location: ViolationLocation = { slot };
  if (opts.stage !== undefined) location.stage = opts.stage;
  if (key !== undefined) location.key = key;
  return location;
}

function prefix(opts: CheckOptions): string {
  return opts.stage !== undefined ? `${opts.stage}: ` : "";
}

/** Checks every declared key against what is available; collects all problems. */
export function checkSchema(declared: Schema, available: Payload, slot: ContractSlot, opts: CheckOptions = {}): Violation[] {
  const values = toMap(available);
  const violations: Violation[] = [];
  for (const [key, expected] of Object.entries(declared)) {
    const value = values.get(key);
    if (value === undefined) {
      violations.push({
        kind: "MissingKey",
        location: at(slot, key, opts),
        expected,
        message: `${prefix(opts)}${SLOT_LABEL[slot]} '${key}' (${formatType(expected)}) is missing`
      });
      continue;
    }
    const observed = observeType(value, expected);
    const mismatch = diagnose(expected, observed);
    if (mismatch) {
      violations.push({
        kind: mismatch,
        location: at(slot, key, opts),
        expected,
        observed,
        message: `${prefix(opts)}${SLOT_LABEL[slot]} '${key}' expects ${formatType(expected)} but got ${formatType(observed)}`
      });
    }
  }
  return violations;
}

function unexpectedParameters(contract: StageContract, parameters: Payload, opts: CheckOptions): Violation[] {
  const violations: Violation[] = [];
  for (const [key, value] of toMap(parameters)) {
    if (value === undefined || Object.hasOwn(contract.fitParameters, key)) continue;
    const declared = Object.keys(contract.fitParameters);
    violations.push({
      kind: "UnexpectedParameter",
      location: at("fitParameters", key, opts),
      observed: observeType(value),
      message: `${prefix(opts)}fit parameter '${key}' is not declared (declared: ${declared.length ? declared.join(", ") : "none"})`
    });
  }
  return violations;
}

/** Violations for fitting a stage on `data` with `parameters`. */
export function checkFit(contract: StageContract, data: Payload, parameters: Payload = {}, opts: CheckOptions = {}): Violation[] {
  return [
    ...checkSchema(contract.fitRequires, data, "fitRequires", opts),
    ...checkSchema(contract.fitParameters, parameters, "fitParameters", opts),
    ...unexpectedParameters(contract, parameters, opts)
  ];
}

/**
 * Violations for transforming `data`. A stage that keeps fitted state and has
 * not been fit yields one NotFitted regardless of the payload.
 */
export function checkTransform(contract: StageContract, data: Payload, hasBeenFit: boolean, opts: CheckOptions = {}): Violation[] {
  const violations = checkSchema(contract.transformRequires, data, "transformRequires", opts);
  if (!hasBeenFit && needsFit(contract)) {
    violations.push({
      kind: "NotFitted",
      location: at("fittedState", undefined, opts),
      message: `${prefix(opts)}transform needs fitted state (${Object.keys(contract.fittedState).join(", ")}) but the stage has not been fit`
    });
  }
  return violations;
}

/** Data-free check of a declared upstream schema against the phase's requirements. */
export function checkContractStatic(
  contract: StageContract,
  incomingSchema: Schema | ReadonlyMap<string, unknown>,
  phase: Phase,
  opts: CheckOptions = {}
): Violation[] {
  return phase === "fit"
    ? checkSchema(contract.fitRequires, incomingSchema, "fitRequires", opts)
    : checkSchema(contract.transformRequires, incomingSchema, "transformRequires", opts);
}
