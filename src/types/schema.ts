export type ScalarKind = "float" | "integer" | "string" | "boolean" | "datetime";

export const SCALAR_KINDS: readonly ScalarKind[] = ["float", "integer", "string", "boolean", "datetime"];

/** A fixed positive size, or `null` when the dimension is unconstrained. */
export type Dimension = number | null;

export interface ScalarType {
  readonly kind: "scalar";
  readonly scalar: ScalarKind;
}

export interface SequenceType {
  readonly kind: "sequence";
  readonly element: TypeSpec;
}

export interface ShapedArrayType {
  readonly kind: "shapedArray";
  readonly element: ScalarKind;
  readonly dimensions: readonly Dimension[];
}

export interface MappingType {
  readonly kind: "mapping";
  readonly key: ScalarKind;
  readonly value: TypeSpec;
}

/** A handle whose layout is not modelled; compared by label only. */
export interface OpaqueType {
  readonly kind: "opaque";
  readonly label: string;
}

export interface RecordType {
  readonly kind: "record";
  readonly fields: Schema;
}

export type TypeSpec =
  | ScalarType
  | SequenceType
  | ShapedArrayType
  | MappingType
  | OpaqueType
  | RecordType;

export type Schema = Readonly<Record<string, TypeSpec>>;
