// src/runner.ts
// Checks a chain declaration file without running any stage:
// - --chain path/to/chain.json (or CHAIN_FILE)
// - --phase fit|transform|all (or CHECK_PHASE; default all)
// Prints the chain's derived contract and every violation; exits 1 when the chain is inconsistent.
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { compileChainText, type CompiledChain } from './orchestrator/compiler.js';
import { formatProduced, formatSchema, formatViolation } from './schema/format.js';
import { COLOR, QUIET } from './log.js';
import type { Phase, Violation } from './types/contracts.js';

export type PhaseArg = Phase | 'all';

const PHASES: readonly PhaseArg[] = ['fit', 'transform', 'all'];

function isPhaseArg(value: string): value is PhaseArg {
  const phases: readonly string[] = PHASES;
  return phases.includes(value);
}

function arg(argv: string[], name: string, fallback?: string): string | undefined {
  const ix = argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = argv[ix];
  if (val.includes('=')) return val.slice(val.indexOf('=') + 1);
  return argv[ix + 1] ?? fallback;
}

export interface ChainCheckResult {
  compiled: CompiledChain;
  violations: Violation[];
}

/** Static check of a compiled declaration against its own declared input. */
export function checkCompiled(compiled: CompiledChain, phase: PhaseArg): Violation[] {
  const { chain, input } = compiled;
  const phases: Phase[] = phase === 'all' ? ['fit', 'transform'] : [phase];
  return phases.flatMap(p => chain.checkStatic(input, p));
}

export function checkChainFile(file: string, phase: PhaseArg = 'all'): ChainCheckResult {
  const compiled = compileChainText(fs.readFileSync(file, 'utf8'));
  return { compiled, violations: checkCompiled(compiled, phase) };
}

function printReport(file: string, { compiled, violations }: ChainCheckResult) {
  if (QUIET) return;
  const { chain } = compiled;
  console.log(`${COLOR.cyan('▶ chain')} ${path.basename(file)} ${COLOR.gray('— ' + chain.names.join(' → '))}`);
  console.log(COLOR.gray(`  requires (fit)       ${formatSchema(chain.requiredFitInput)}`));
  console.log(COLOR.gray(`  requires (transform) ${formatSchema(chain.requiredInput)}`));
  console.log(COLOR.gray(`  produces             ${formatProduced(chain.producedOutput)}`));
  if (violations.length === 0) {
    console.log(COLOR.green('✓ consistent'));
    return;
  }
  for (const v of violations) console.log(COLOR.red(`✗ ${formatViolation(v)}`));
  console.log(COLOR.red(`${violations.length} violation(s)`));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const file = arg(process.argv, '--chain', process.env.CHAIN_FILE);
  const phase = arg(process.argv, '--phase', process.env.CHECK_PHASE || 'all') ?? 'all';
  if (!file || !isPhaseArg(phase)) {
    console.error('Usage: node dist/src/runner.js --chain path/to/chain.json [--phase fit|transform|all]');
    process.exit(2);
  }
  try {
    const result = checkChainFile(file, phase);
    printReport(file, result);
    process.exitCode = result.violations.length ? 1 : 0;
  } catch (e) {
    console.error('[fatal]', e instanceof Error ? e.message : e);
    process.exitCode = 2;
  }
}
