import type { ContractDeclaration, ContractSlot, StageContract } from "../types/contracts.js";
import { CONTRACT_SLOTS } from "../types/contracts.js";
import { MalformedContractError } from "../errors.js";
import { validateSchema } from "../schema/types.js";
import { validateProduced } from "../schema/ops.js";

function isContractSlot(key: string): key is ContractSlot {
  const slots: readonly string[] = CONTRACT_SLOTS;
  return slots.includes(key);
}

/**
 * Builds an immutable stage contract. Omitted slots are empty; unknown
 * fields and entries that are not type descriptors throw MalformedContractError.
 */
export function defineContract(declaration: ContractDeclaration = {}, name = "contract"): StageContract {
  if (typeof declaration !== "object" || declaration === null) {
    throw new MalformedContractError("declaration must be an object", name);
  }
  for (const key of Object.keys(declaration)) {
    if (!isContractSlot(key)) {
      throw new MalformedContractError(`unknown field '${key}' (expected ${CONTRACT_SLOTS.join(", ")})`, name);
    }
  }
  return Object.freeze({
    fitRequires: validateSchema(declaration.fitRequires ?? {}, `${name}.fitRequires`),
    transformRequires: validateSchema(declaration.transformRequires ?? {}, `${name}.transformRequires`),
    fitParameters: validateSchema(declaration.fitParameters ?? {}, `${name}.fitParameters`),
    fittedState: validateSchema(declaration.fittedState ?? {}, `${name}.fittedState`),
    producedOrModified: validateProduced(declaration.producedOrModified ?? {}, `${name}.producedOrModified`)
  });
}

/** A stage with no fitted state never needs a fit before its transform. */
export function needsFit(contract: StageContract): boolean {
  return Object.keys(contract.fittedState).length > 0;
}
