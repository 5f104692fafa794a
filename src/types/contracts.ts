import type { Schema, TypeSpec } from "./schema.js";

export type Phase = "fit" | "transform";

export type ContractSlot =
  | "fitRequires"
  | "transformRequires"
  | "fitParameters"
  | "fittedState"
  | "producedOrModified";

export const CONTRACT_SLOTS: readonly ContractSlot[] = [
  "fitRequires",
  "transformRequires",
  "fitParameters",
  "fittedState",
  "producedOrModified"
];

export interface SetOperation {
  readonly op: "set";
  readonly type: TypeSpec;
}

export interface DropOperation {
  readonly op: "drop";
}

/** Edits the fields of a record-typed key. */
export interface ModifyOperation {
  readonly op: "modify";
  readonly fields: ProducedSchema;
}

export type SchemaOperation = SetOperation | DropOperation | ModifyOperation;

/** A bare TypeSpec is shorthand for `set(type)`. */
export type Production = TypeSpec | SchemaOperation;

export type ProducedSchema = Readonly<Record<string, Production>>;

export interface StageContract {
  readonly fitRequires: Schema;
  readonly transformRequires: Schema;
  readonly fitParameters: Schema;
  readonly fittedState: Schema;
  readonly producedOrModified: ProducedSchema;
}

export type ContractDeclaration = Partial<StageContract>;

export interface ChainLink {
  readonly name: string;
  readonly contract: StageContract;
}

export type ViolationKind =
  | "MissingKey"
  | "TypeMismatch"
  | "ShapeMismatch"
  | "NotFitted"
  | "UnexpectedParameter";

export interface ViolationLocation {
  /** Stage name; nested stages are joined with "/". */
  stage?: string;
  slot: ContractSlot;
  key?: string;
}

export interface Violation {
  kind: ViolationKind;
  location: ViolationLocation;
  expected?: TypeSpec;
  observed?: TypeSpec;
  message: string;
}

/** Concrete values keyed by name; a TypeSpec value stands for a declared, absent datum. */
export type Payload = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

export type StageParameters = Readonly<Record<string, Payload>>;
