import { describe, it, expect } from 'vitest';
import { Chain, defineChain } from '../orchestrator/chain.js';
import { defineContract } from '../contracts/define.js';
import { formatProduced, formatSchema } from '../schema/format.js';
import { drop, modify } from '../schema/ops.js';
import { float, integer, mapping, record, sequence, shapedArray, string } from '../schema/types.js';

const features = shapedArray('float', [null, 3]);

const prep = defineContract({
  transformRequires: { raw: sequence(string) },
  producedOrModified: { x: features }
});

const model = defineContract({
  fitRequires: { x: features, y: sequence(float) },
  transformRequires: { x: features },
  fitParameters: { alpha: float },
  fittedState: { coef: shapedArray('float', [3]) },
  producedOrModified: { y_hat: sequence(float) }
});

describe('Chain', () => {
  it('depends on stage order', () => {
    const producer = defineContract({ producedOrModified: { y: sequence(float) } });
    const consumer = defineContract({ transformRequires: { y: sequence(float) } });

    const backwards = defineChain([['consumer', consumer], ['producer', producer]]).checkTransform({});
    expect(backwards.map(v => [v.kind, v.location.stage])).toEqual([['MissingKey', 'consumer']]);
    expect(defineChain([['producer', producer], ['consumer', consumer]]).checkTransform({})).toEqual([]);
  });

  it('checks per-stage parameters during the fit pass', () => {
    const chain = defineChain([['prep', prep], ['model', model]]);
    expect(chain.checkFit({ raw: ['1,2,3'], y: [1] }, { model: {} })).toEqual([
      {
        kind: 'MissingKey',
        location: { stage: 'model', slot: 'fitParameters', key: 'alpha' },
        expected: float,
        message: "model: fit parameter 'alpha' (float) is missing"
      }
    ]);
    expect(chain.checkFit({ raw: ['1,2,3'], y: [1] }, { model: { alpha: 0.5 } })).toEqual([]);
  });

  it('flags parameters addressed to a stage that does not exist', () => {
    const chain = defineChain([['prep', prep], ['model', model]]);
    const violations = chain.checkFit({ raw: ['1'], y: [1] }, { modle: { alpha: 0.5 } });
    expect(violations.map(v => v.kind)).toEqual(['UnexpectedParameter', 'MissingKey']);
    expect(violations[0].message).toBe("parameters given for unknown stage 'modle' (stages: prep, model)");
  });

  it('gates stateful stages on having been fit', () => {
    const chain = defineChain([['prep', prep], ['model', model]]);
    const unfit = chain.checkTransform({ raw: ['1'] });
    expect(unfit.map(v => [v.kind, v.location.stage])).toEqual([['NotFitted', 'model']]);
    expect(chain.checkTransform({ raw: ['1'] }, ['model'])).toEqual([]);
  });

  it('lets a later stage overwrite what an earlier one produced', () => {
    const chain = defineChain([
      ['first', defineContract({ producedOrModified: { y: string } })],
      ['second', defineContract({ producedOrModified: { y: float } })],
      ['reader', defineContract({ transformRequires: { y: float } })]
    ]);
    expect(chain.checkTransform({})).toEqual([]);
  });

  it('derives what the chain needs and produces', () => {
    const chain = defineChain([['prep', prep], ['model', model]]);
    expect(formatSchema(chain.requiredInput)).toBe('{raw: sequence<string>}');
    expect(formatSchema(chain.requiredFitInput)).toBe('{raw: sequence<string>, y: sequence<float>}');
    expect(formatProduced(chain.producedOutput)).toBe('{x: array<float>[*, 3], y_hat: sequence<float>}');
    expect(formatSchema(chain.contract.fitParameters)).toBe('{model: record{alpha: float}}');
    expect(formatSchema(chain.contract.fittedState)).toBe('{model: record{coef: array<float>[3]}}');
  });

  it('reports dropped inputs in its produced output', () => {
    const chain = defineChain([
      ['use', defineContract({ transformRequires: { tmp: string }, producedOrModified: { tmp: drop() } })]
    ]);
    expect(formatProduced(chain.producedOutput)).toBe('{tmp: drop}');
  });

  it('gives the same report every time it is asked', () => {
    const chain = defineChain([['prep', prep], ['model', model]]);
    const fit = chain.checkFit({ raw: 'oops' }, { model: {} });
    expect(fit.map(v => [v.kind, v.location.key])).toEqual([
      ['MissingKey', 'y'],
      ['MissingKey', 'alpha']
    ]);
    expect(chain.checkFit({ raw: 'oops' }, { model: {} })).toEqual(fit);

    const transform = chain.checkTransform({ raw: 'oops' });
    expect(transform.map(v => v.kind)).toEqual(['TypeMismatch', 'NotFitted']);
    expect(chain.checkTransform({ raw: 'oops' })).toEqual(transform);
    expect(chain.check({ raw: 'oops' })).toEqual(chain.check({ raw: 'oops' }));
  });

  it('keeps record fields it does not touch when nested by its contract', () => {
    const score = defineContract({
      transformRequires: { customer: record({ plan: string }) },
      producedOrModified: { customer: modify({ risk: float }) }
    });
    const reader = defineContract({ transformRequires: { customer: record({ id: string, risk: float }) } });
    const sub = defineChain([['score', score]]);
    const input = { customer: record({ id: string, plan: string }) };

    expect(formatProduced(sub.producedOutput)).toBe('{customer: modify{risk: float}}');
    expect(defineChain([['score', score], ['reader', reader]]).checkStatic(input, 'transform')).toEqual([]);
    expect(defineChain([['sub', sub], ['reader', reader]]).checkStatic(input, 'transform')).toEqual([]);
    expect(defineChain([['sub', sub.contract], ['reader', reader]]).checkStatic(input, 'transform')).toEqual([]);

    const payload = { customer: { id: 'c-1', plan: 'pro' } };
    expect(defineChain([['sub', sub.contract], ['reader', reader]]).checkTransform(payload)).toEqual([]);
  });

  it('composes repeated writes to one key into a single production', () => {
    const chain = defineChain([
      ['a', defineContract({ producedOrModified: { c: modify({ risk: float }) } })],
      ['b', defineContract({ producedOrModified: { c: modify({ band: string, risk: drop() }) } })],
      ['c', defineContract({ producedOrModified: { t: string } })],
      ['d', defineContract({ producedOrModified: { t: drop(), u: modify({ n: float }) } })],
      ['e', defineContract({ producedOrModified: { t: modify({ k: string }) } })]
    ]);
    expect(formatProduced(chain.producedOutput)).toBe('{c: modify{risk: drop, band: string}, t: record{k: string}, u: modify{n: float}}');
  });

  it('checks a declared input schema without data', () => {
    const chain = defineChain([['prep', prep], ['model', model]]);
    expect(chain.checkStatic({ raw: sequence(string) }, 'transform')).toEqual([]);
    expect(chain.checkStatic({}, 'transform').map(v => [v.kind, v.location.stage, v.location.key])).toEqual([
      ['MissingKey', 'prep', 'raw']
    ]);
    expect(chain.checkStatic({ raw: sequence(string) }, 'fit').map(v => v.location.key)).toEqual(['y']);
  });

  it('rejects malformed chains at construction', () => {
    expect(() => new Chain([])).toThrow('a chain needs at least one stage');
    expect(() => new Chain([['a', prep], ['a', model]])).toThrow("links[1]: duplicate stage name 'a'");
    expect(() => new Chain([['x/y', prep]])).toThrow("links[0]: stage name 'x/y' must not contain '/'");
  });

  describe('nested chains', () => {
    const tokenize = defineContract({
      transformRequires: { raw: sequence(string) },
      producedOrModified: { tokens: sequence(string) }
    });
    const count = defineContract({
      fitRequires: { tokens: sequence(string) },
      transformRequires: { tokens: sequence(string) },
      fittedState: { vocab: mapping('string', integer) },
      producedOrModified: { counts: mapping('string', integer) }
    });
    const use = defineContract({ transformRequires: { counts: mapping('string', integer) } });
    const inner = defineChain([['p1', tokenize], ['p2', count]]);
    const outer = defineChain([['prep', inner], ['use', use]]);

    it('behaves like a single stage from outside', () => {
      expect(formatSchema(outer.requiredInput)).toBe('{raw: sequence<string>}');
      expect(formatSchema(inner.contract.fittedState)).toBe('{p2: record{vocab: mapping<string, integer>}}');
    });

    it('reports violations under outer/inner stage names', () => {
      const violations = outer.checkTransform({ raw: ['a b'] });
      expect(violations.map(v => [v.kind, v.location.stage])).toEqual([['NotFitted', 'prep/p2']]);
      expect(outer.checkTransform({ raw: ['a b'] }, ['prep/p2'])).toEqual([]);
    });

    it('runs both passes in one call', () => {
      expect(outer.check({ raw: ['a b'] })).toEqual({ fit: [], transform: [], fitted: ['prep/p1', 'prep/p2', 'use'] });
    });

    it('validates parameters passed to a nested chain', () => {
      const violations = outer.checkFit({ raw: ['a'] }, { prep: { p2: 5 } });
      expect(violations).toEqual([
        {
          kind: 'TypeMismatch',
          location: { stage: 'prep/p2', slot: 'fitParameters' },
          message: "parameters for 'prep/p2' must be an object of name → value"
        }
      ]);
    });
  });
});
