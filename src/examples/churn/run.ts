import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { compileChainText } from '../../orchestrator/compiler.js';
import { fitChain, transformChain, type NamedStage } from '../../orchestrator/run.js';
import { Stage, type Data } from '../../orchestrator/stage.js';
import type { StageContract } from '../../types/contracts.js';

const chainFile = process.env.CHAIN_FILE ?? fileURLToPath(new URL('./chain.json', import.meta.url));
const declaration = compileChainText(readFileSync(chainFile, 'utf8'));

function contractOf(name: string): StageContract {
  const link = declaration.chain.links.find(l => l.name === name);
  if (!link) throw new Error(`chain.json has no stage '${name}'`);
  return link.contract;
}

function numbers(value: unknown): number[] {
  if (!Array.isArray(value)) throw new Error('expected a list');
  return value.map(Number);
}

class ThresholdModel {
  constructor(readonly threshold: number) {}
  risk(amounts: number[]): number {
    return amounts.length ? amounts.filter(a => a < 0).length / amounts.length : 0;
  }
}

class ParseAmounts extends Stage {
  readonly contract = contractOf('parse');
  transform(data: Data): Data {
    return { ...data, amounts: numbers(data.amounts) };
  }
}

class Standardize extends Stage {
  readonly contract = contractOf('standardize');
  fit(data: Readonly<Data>) {
    const xs = numbers(data.amounts);
    const mean = xs.reduce((a, b) => a + b, 0) / xs.length;
    const variance = xs.reduce((a, b) => a + (b - mean) ** 2, 0) / xs.length;
    this.setState('mean', mean);
    this.setState('std', Math.sqrt(variance) || 1);
  }
  transform(data: Data): Data {
    const mean = Number(this.getState('mean'));
    const std = Number(this.getState('std'));
    return { ...data, amounts: numbers(data.amounts).map(x => (x - mean) / std) };
  }
}

class Score extends Stage {
  readonly contract = contractOf('score');
  fit(_data: Readonly<Data>, parameters: Readonly<Data>) {
    this.setState('model', new ThresholdModel(Number(parameters.threshold)));
  }
  transform(data: Data): Data {
    const model = this.getState('model');
    if (!(model instanceof ThresholdModel)) throw new Error('score: model state has the wrong type');
    const risk = model.risk(numbers(data.amounts));
    const { amounts: _dropped, ...rest } = data;
    const customer = typeof data.customer === 'object' && data.customer !== null ? data.customer : {};
    return { ...rest, customer: { ...customer, risk }, churn: risk > model.threshold };
  }
}

async function main() {
  const stages: NamedStage[] = [
    ['parse', new ParseAmounts()],
    ['standardize', new Standardize()],
    ['score', new Score()]
  ];
  const training = { amounts: ['12.5', '40', '3.25', '18'], customer: { id: 'c-1', plan: 'basic' } };

  await fitChain(stages, training, { score: { threshold: 0.4 } });
  const scored = await transformChain(stages, { amounts: ['5', '60'], customer: { id: 'c-2', plan: 'pro' } });

  console.log('\n[Scored payload]');
  console.log(JSON.stringify(scored, null, 2));
}

main().catch(e => { console.error(e); process.exit(1); });
