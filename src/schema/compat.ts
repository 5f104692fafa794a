import type { Dimension, TypeSpec } from "../types/schema.js";

export type Mismatch = "TypeMismatch" | "ShapeMismatch";

/**
 * Compares a declared type with an observed (or upstream-declared) one.
 * Returns `undefined` when compatible, otherwise the kind of disagreement.
 * A shape mismatch means both sides are arrays of the same element kind whose
 * rank or a fixed dimension disagree; it is reported through containers.
 */
export function diagnose(declared: TypeSpec, observed: TypeSpec): Mismatch | undefined {
  switch (declared.kind) {
    case "scalar":
      return observed.kind === "scalar" && observed.scalar === declared.scalar ? undefined : "TypeMismatch";
    case "sequence":
      if (observed.kind !== "sequence") return "TypeMismatch";
      return diagnose(declared.element, observed.element);
    case "shapedArray":
      if (observed.kind !== "shapedArray" || observed.element !== declared.element) return "TypeMismatch";
      return dimensionsFit(declared.dimensions, observed.dimensions) ? undefined : "ShapeMismatch";
    case "mapping":
      if (observed.kind !== "mapping" || observed.key !== declared.key) return "TypeMismatch";
      return diagnose(declared.value, observed.value);
    case "opaque":
      return observed.kind === "opaque" && observed.label === declared.label ? undefined : "TypeMismatch";
    case "record": {
      if (observed.kind !== "record") return "TypeMismatch";
      for (const [field, type] of Object.entries(declared.fields)) {
        if (!Object.hasOwn(observed.fields, field)) return "TypeMismatch";
        const inner = diagnose(type, observed.fields[field]);
        if (inner) return inner;
      }
      return undefined;
    }
  }
}

export function isCompatible(declared: TypeSpec, observed: TypeSpec): boolean {
  return diagnose(declared, observed) === undefined;
}

// An unconstrained observed dimension never satisfies a fixed declared one.
function dimensionsFit(declared: readonly Dimension[], observed: readonly Dimension[]): boolean {
  if (declared.length !== observed.length) return false;
  return declared.every((d, i) => d === null || d === observed[i]);
}
