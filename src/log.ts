// Console output shared by the runtime and the runner.
// QUIET=1 silences everything; LOG_STAGES=0 hides per-stage lines; LOG_SCHEMAS=1 prints payload schemas around each stage.
import type { Violation } from "./types/contracts.js";
import { formatViolation } from "./schema/format.js";

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
};

export const QUIET = process.env.QUIET === "1";
export const LOG_STAGES = !QUIET && (process.env.LOG_STAGES ?? "1") !== "0";
export const LOG_SCHEMAS = !QUIET && (process.env.LOG_SCHEMAS ?? "0") === "1";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function logViolations(violations: readonly Violation[], heading: string) {
  if (QUIET || violations.length === 0) return;
  console.warn(COLOR.yellow(`  ${heading}: ${violations.length} violation(s)`));
  for (const v of violations) console.warn(COLOR.yellow(`    ✗ ${formatViolation(v)}`));
}
