import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { compileChain, compileChainText } from '../orchestrator/compiler.js';
import { checkChainFile, checkCompiled } from '../runner.js';
import { formatProduced, formatSchema, formatViolation } from '../schema/format.js';
import { MalformedContractError } from '../errors.js';

const churnFile = fileURLToPath(new URL('../examples/churn/chain.json', import.meta.url));

describe('compileChain', () => {
  it('compiles the churn example into a consistent chain', () => {
    const { compiled, violations } = checkChainFile(churnFile);
    expect(violations).toEqual([]);
    expect(compiled.chain.names).toEqual(['parse', 'standardize', 'score']);
    expect(formatSchema(compiled.input)).toBe('{amounts: sequence<string>, customer: record{id: string, plan: string}}');
    expect(formatSchema(compiled.chain.requiredInput)).toBe('{amounts: sequence<string>, customer: record{plan: string}}');
    expect(formatSchema(compiled.chain.requiredFitInput)).toBe('{amounts: sequence<string>}');
    expect(formatProduced(compiled.chain.producedOutput)).toBe(
      '{amounts: drop, churn: boolean, customer: modify{risk: float}}'
    );
  });

  it('accepts an unwrapped declaration without input', () => {
    const { chain, input } = compileChain({ stages: [{ name: 'only', transformRequires: { x: 'float' } }] });
    expect(input).toEqual({});
    expect(formatSchema(chain.requiredInput)).toBe('{x: float}');
  });

  it('reads drop and modify productions', () => {
    const { chain } = compileChain({
      stages: [
        {
          name: 'enrich',
          transformRequires: { customer: 'record{id: string}', tmp: 'string' },
          producedOrModified: { customer: { modify: { risk: 'float', id: 'drop' } }, tmp: 'drop' }
        }
      ]
    });
    expect(formatProduced(chain.producedOutput)).toBe('{customer: modify{risk: float, id: drop}, tmp: drop}');
  });

  it('finds inconsistencies between the declared input and the stages', () => {
    const compiled = compileChain({
      input: { x: 'array<float>[*, 4]' },
      stages: [{ name: 'model', transformRequires: { x: 'array<float>[*, 3]' } }]
    });
    expect(checkCompiled(compiled, 'fit')).toEqual([]);
    expect(checkCompiled(compiled, 'all').map(formatViolation)).toEqual([
      '[ShapeMismatch] model › transformRequires › x: model: transform input \'x\' expects array<float>[*, 3] but got array<float>[*, 4]'
    ]);
  });

  it('locates malformed declarations', () => {
    expect(() => compileChain({ stages: [{ name: 'a', fitRequires: { x: 'flaot' } }] })).toThrow(
      /^stages\[0\]\(a\)\.fitRequires\.x: cannot parse type "flaot" at offset 0/
    );
    expect(() => compileChain({ stages: [{ name: 'a', fitrequires: {} }] })).toThrow("stages[0](a): unknown field 'fitrequires'");
    expect(() => compileChain({ stages: [{ fitRequires: {} }] })).toThrow("stages[0]: stage needs a string 'name'");
    expect(() => compileChain({ stages: [{ name: 'a', producedOrModified: { c: { modfy: {} } } }] })).toThrow(
      'stages[0](a).producedOrModified.c: expected a type, "drop" or { "modify": {...} }'
    );
    expect(() => compileChain({ stages: [{ name: 'a' }, { name: 'a' }] })).toThrow("links[1]: duplicate stage name 'a'");
    expect(() => compileChain({})).toThrow('no chain found');
  });

  it('reports invalid JSON as a malformed declaration', () => {
    expect(() => compileChainText('{')).toThrow(MalformedContractError);
    expect(() => compileChainText('{')).toThrow(/^invalid JSON: /);
  });
});
