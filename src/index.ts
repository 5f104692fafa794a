export type * from './types/schema.js';
export type * from './types/contracts.js';
export { SCALAR_KINDS } from './types/schema.js';
export { CONTRACT_SLOTS } from './types/contracts.js';
export { MalformedContractError, NotFittedError, ContractViolationError } from './errors.js';

export {
  scalar, float, integer, string, boolean, datetime,
  sequence, shapedArray, mapping, opaque, record,
  isTypeSpec, isScalarKind, validateSchema
} from './schema/types.js';
export { diagnose, isCompatible, type Mismatch } from './schema/compat.js';
export { observeType, type ShapedArrayLike } from './schema/observe.js';
export { set, drop, modify, applyOperations, composeProduction } from './schema/ops.js';
export { formatType, formatSchema, formatProduced, formatViolation } from './schema/format.js';
export { parseType } from './schema/parse.js';

export { defineContract, needsFit } from './contracts/define.js';
export { checkFit, checkTransform, checkContractStatic, checkSchema, type CheckOptions } from './contracts/check.js';

export { Chain, defineChain, type ChainReport, type LinkInput } from './orchestrator/chain.js';
export { compileChain, compileChainText, type CompiledChain } from './orchestrator/compiler.js';
export { Stage, type Data } from './orchestrator/stage.js';
export { runFit, runTransform, fitChain, transformChain, chainOf, type NamedStage, type RunOptions } from './orchestrator/run.js';
