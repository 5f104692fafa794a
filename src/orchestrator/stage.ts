import type { Schema, TypeSpec } from "../types/schema.js";
import type { StageContract } from "../types/contracts.js";
import { NotFittedError } from "../errors.js";
import { observeType } from "../schema/observe.js";

export type Data = Record<string, unknown>;

/**
 * A stateful transformation with a declared contract. `fit` computes the
 * state named in `contract.fittedState`; `transform` returns the payload with
 * the keys in `contract.producedOrModified` written.
 */
export abstract class Stage {
  abstract readonly contract: StageContract;
  private readonly state = new Map<string, unknown>();

  get label(): string {
    return this.constructor.name;
  }

  isFitted(): boolean {
    return Object.keys(this.contract.fittedState).every(k => this.state.has(k));
  }

  protected setState(key: string, value: unknown): void {
    if (!Object.hasOwn(this.contract.fittedState, key)) {
      throw new Error(`${this.label}: state '${key}' is not declared in fittedState`);
    }
    this.state.set(key, value);
  }

  protected getState(key: string): unknown {
    if (!this.state.has(key)) throw new NotFittedError(this.label, key);
    return this.state.get(key);
  }

  /** Observed types of the current state, for diagnostics. */
  stateSchema(): Schema {
    const out: Record<string, TypeSpec> = {};
    for (const [k, v] of this.state) out[k] = observeType(v, this.contract.fittedState[k]);
    return out;
  }

  fit(_data: Readonly<Data>, _parameters: Readonly<Data>): void | Promise<void> {}

  abstract transform(data: Data): Data | Promise<Data>;
}
