import type { Schema, TypeSpec } from "../types/schema.js";
import type {
  ChainLink,
  Payload,
  Phase,
  ProducedSchema,
  Production,
  StageContract,
  StageParameters,
  Violation
} from "../types/contracts.js";
import { MalformedContractError } from "../errors.js";
import { defineContract } from "../contracts/define.js";
import { checkContractStatic, checkFit, checkTransform, toMap } from "../contracts/check.js";
import { applyOperations, composeProduction } from "../schema/ops.js";
import { record } from "../schema/types.js";
import { isPlainObject } from "../schema/observe.js";

export type LinkInput = ChainLink | readonly [name: string, stage: StageContract | Chain];

export interface ChainReport {
  readonly fit: readonly Violation[];
  readonly transform: readonly Violation[];
  /** Stages whose fit-phase check came back clean; nested stages as "outer/inner". */
  readonly fitted: readonly string[];
}

interface PassOptions {
  prefix: string;
  /** Absent for declared-schema passes, which do not check parameters. */
  parameters?: StageParameters;
  /** Absent for declared-schema passes, which assume every stage is fit. */
  fitted?: ReadonlySet<string>;
}

interface Pass {
  violations: Violation[];
  fitted: Set<string>;
}

const SEPARATOR = "/";

function isPayload(value: unknown): value is Payload {
  return value instanceof Map || isPlainObject(value);
}

function netRequirements(links: readonly ChainLink[], pick: (c: StageContract) => Schema): Schema {
  const required: Record<string, TypeSpec> = {};
  const produced = new Map<string, unknown>();
  for (const { contract } of links) {
    for (const [key, type] of Object.entries(pick(contract))) {
      if (!produced.has(key) && !Object.hasOwn(required, key)) required[key] = type;
    }
    applyOperations(produced, contract.producedOrModified);
  }
  return Object.freeze(required);
}

/**
 * An ordered sequence of named stage contracts whose schemas are checked end
 * to end. Every check folds the chain left to right over a fresh working
 * schema and returns all violations found; nothing is thrown for an
 * inconsistent chain.
 */
export class Chain {
  readonly links: readonly ChainLink[];
  /** Keys the transform pass needs from outside the chain, typed at first use. */
  readonly requiredInput: Schema;
  /** Keys the fit pass needs from outside the chain. */
  readonly requiredFitInput: Schema;
  /** Net effect of the chain on a payload, one production per key; record edits stay `modify`. */
  readonly producedOutput: ProducedSchema;
  /** The chain seen as a single stage, for nesting inside a larger chain. */
  readonly contract: StageContract;
  private readonly nested = new Map<string, Chain>();

  constructor(links: Iterable<LinkInput>) {
    const out: ChainLink[] = [];
    const seen = new Set<string>();
    let index = 0;
    for (const item of links) {
      const [name, target] = "name" in item ? ([item.name, item.contract] as const) : item;
      const path = `links[${index++}]`;
      if (typeof name !== "string" || name === "") throw new MalformedContractError("stage name must be a non-empty string", path);
      if (name.includes(SEPARATOR)) throw new MalformedContractError(`stage name '${name}' must not contain '${SEPARATOR}'`, path);
      if (seen.has(name)) throw new MalformedContractError(`duplicate stage name '${name}'`, path);
      seen.add(name);
      if (target instanceof Chain) {
        this.nested.set(name, target);
        out.push(Object.freeze({ name, contract: target.contract }));
      } else {
        out.push(Object.freeze({ name, contract: target }));
      }
    }
    if (out.length === 0) throw new MalformedContractError("a chain needs at least one stage");

    this.links = Object.freeze(out);
    this.requiredInput = netRequirements(out, c => c.transformRequires);
    // Fitting a chain transforms through every stage, so a stage without fit inputs still reads its transform inputs.
    this.requiredFitInput = netRequirements(out, c => (Object.keys(c.fitRequires).length ? c.fitRequires : c.transformRequires));
    this.producedOutput = this.delta();
    this.contract = this.derive();
  }

  get names(): string[] {
    return this.links.map(l => l.name);
  }

  /** Fit-phase fold over a concrete payload, checking each stage's parameters from `perStageParameters[name]`. */
  checkFit(initialData: Payload, perStageParameters: StageParameters = {}): Violation[] {
    return this.pass(new Map(toMap(initialData)), "fit", { prefix: "", parameters: perStageParameters }).violations;
  }

  /** Transform-phase fold; stages with fitted state that are not listed in `fitted` yield NotFitted. */
  checkTransform(initialData: Payload, fitted: Iterable<string> = []): Violation[] {
    return this.pass(new Map(toMap(initialData)), "transform", { prefix: "", fitted: new Set(fitted) }).violations;
  }

  /** Fit pass then transform pass in one invocation; a stage counts as fit when its fit check was clean. */
  check(initialData: Payload, perStageParameters: StageParameters = {}): ChainReport {
    const fit = this.pass(new Map(toMap(initialData)), "fit", { prefix: "", parameters: perStageParameters });
    const transform = this.pass(new Map(toMap(initialData)), "transform", { prefix: "", fitted: fit.fitted });
    return { fit: fit.violations, transform: transform.violations, fitted: [...fit.fitted] };
  }

  /** Declared-schema fold: no payload, no parameters, every stage assumed fit. */
  checkStatic(initialSchema: Schema, phase: Phase): Violation[] {
    return this.pass(new Map(Object.entries(initialSchema)), phase, { prefix: "" }).violations;
  }

  private pass(working: Map<string, unknown>, phase: Phase, opts: PassOptions): Pass {
    const violations: Violation[] = [];
    const fitted = new Set<string>();
    if (opts.parameters) violations.push(...this.unknownStages(opts.parameters, opts.prefix));

    for (const link of this.links) {
      const stage = opts.prefix + link.name;
      const inner = this.nested.get(link.name);
      if (inner) {
        const parameters = opts.parameters && this.nestedParameters(opts.parameters[link.name], stage, violations);
        const sub = inner.pass(working, phase, { prefix: stage + SEPARATOR, parameters, fitted: opts.fitted });
        violations.push(...sub.violations);
        sub.fitted.forEach(n => fitted.add(n));
        continue;
      }

      let found: Violation[];
      if (phase === "fit") {
        found = opts.parameters
          ? checkFit(link.contract, working, opts.parameters[link.name] ?? {}, { stage })
          : checkContractStatic(link.contract, working, "fit", { stage });
        if (found.length === 0) fitted.add(stage);
      } else {
        found = checkTransform(link.contract, working, opts.fitted ? opts.fitted.has(stage) : true, { stage });
      }
      violations.push(...found);
      applyOperations(working, link.contract.producedOrModified);
    }
    return { violations, fitted };
  }

  private unknownStages(parameters: StageParameters, prefix: string): Violation[] {
    const known = new Set(this.names);
    return Object.keys(parameters)
      .filter(name => !known.has(name))
      .map(name => ({
        kind: "UnexpectedParameter" as const,
        location: { stage: prefix + name, slot: "fitParameters" as const },
        message: `parameters given for unknown stage '${prefix + name}' (stages: ${[...known].join(", ")})`
      }));
  }

  private nestedParameters(value: Payload | undefined, stage: string, violations: Violation[]): StageParameters {
    const out: Record<string, Payload> = {};
    if (value === undefined) return out;
    for (const [name, params] of toMap(value)) {
      if (isPayload(params)) out[name] = params;
      else {
        violations.push({
          kind: "TypeMismatch",
          location: { stage: stage + SEPARATOR + name, slot: "fitParameters" },
          message: `parameters for '${stage + SEPARATOR + name}' must be an object of name → value`
        });
      }
    }
    return out;
  }

  // Net production per key, composed in stage order; a key keeps the position of its first producer.
  private delta(): ProducedSchema {
    const out = new Map<string, Production>();
    for (const link of this.links) {
      for (const [key, production] of Object.entries(link.contract.producedOrModified)) {
        out.set(key, composeProduction(out.get(key), production));
      }
    }
    return Object.freeze(Object.fromEntries(out));
  }

  private derive(): StageContract {
    const fitParameters: Record<string, TypeSpec> = {};
    const fittedState: Record<string, TypeSpec> = {};
    for (const { name, contract } of this.links) {
      if (Object.keys(contract.fitParameters).length) fitParameters[name] = record(contract.fitParameters);
      if (Object.keys(contract.fittedState).length) fittedState[name] = record(contract.fittedState);
    }
    return defineContract({
      fitRequires: this.requiredFitInput,
      transformRequires: this.requiredInput,
      fitParameters,
      fittedState,
      producedOrModified: this.producedOutput
    }, "chain");
  }
}

export function defineChain(links: Iterable<LinkInput>): Chain {
  return new Chain(links);
}
