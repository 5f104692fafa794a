import type { Violation } from "./types/contracts.js";

/** Thrown while building a contract, chain or type that cannot be checked against anything. */
export class MalformedContractError extends Error {
  readonly code = "MalformedContract";

  constructor(message: string, readonly path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "MalformedContractError";
  }
}

export class NotFittedError extends Error {
  constructor(readonly stage: string, readonly key: string) {
    super(`${stage} has not been fit: state '${key}' is unset`);
    this.name = "NotFittedError";
  }
}

export class ContractViolationError extends Error {
  constructor(readonly phase: string, readonly violations: readonly Violation[]) {
    super(`${phase} refused: ${violations.length} contract violation(s)\n` + violations.map(v => `- ${v.message}`).join("\n"));
    this.name = "ContractViolationError";
  }
}
