/**
 * Standalone continuous fuzzer for the register decoders.
 *
 * Runs generation and mutation-based fuzzing in a loop, reporting any
 * value that makes a decoder throw something other than a DecodeError,
 * decode differently twice, or return fields that misreport their bits.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import { DecodeError } from '../src/DecodeError';
import type { FieldInfo } from '../src/FieldInfo';
import { decodeEsr, EXCEPTION_CLASSES } from '../src/esr/decodeEsr';
import { decodeMidr } from '../src/midr/decodeMidr';
import { decodeSmccc } from '../src/smccc/decodeSmccc';
import { generateEsr, generateMidr, generateSmccc, mutate, Rng } from './generators/register-generator';
import { checkBitAccounting } from './properties';
import { ESR_SEEDS, MIDR_SEEDS, SMCCC_SEEDS } from './seeds';

interface Target {
  name: string;
  decode: (value: bigint) => FieldInfo[];
  seeds: readonly bigint[];
  generate: (rng: Rng) => bigint;
}

const VALID_EC = [...EXCEPTION_CLASSES.keys()];

const TARGETS: readonly Target[] = [
  { name: 'esr', decode: decodeEsr, seeds: ESR_SEEDS, generate: rng => generateEsr(rng, rng.pick(VALID_EC)) },
  { name: 'midr', decode: decodeMidr, seeds: MIDR_SEEDS, generate: generateMidr },
  { name: 'smccc', decode: decodeSmccc, seeds: SMCCC_SEEDS, generate: generateSmccc },
];

type Outcome =
  | { kind: 'ok' }
  | { kind: 'rejected'; reason: string }
  | { kind: 'issue'; problem: string };

function fuzzOne(target: Target, value: bigint): Outcome {
  let fields: FieldInfo[];
  try {
    fields = target.decode(value);
  } catch (e) {
    if (e instanceof DecodeError) {
      return { kind: 'rejected', reason: e.kind };
    }
    return { kind: 'issue', problem: `threw ${e instanceof Error ? e.message : String(e)}` };
  }

  const problem = checkBitAccounting(fields, value, 64);
  if (problem !== undefined) {
    return { kind: 'issue', problem };
  }
  if (JSON.stringify(target.decode(value)) !== JSON.stringify(fields)) {
    return { kind: 'issue', problem: 'second decode differs' };
  }
  return { kind: 'ok' };
}

interface Issue {
  iteration: number;
  target: string;
  value: bigint;
  problem: string;
}

const USAGE = 'Usage: npx tsx fuzzing/run.ts [--iterations N]';

/**
 * Reads `--iterations N` from the command line; unlimited when absent.
 * Throws for a count that is not a positive whole number.
 */
export function parseIterations(args: readonly string[]): number {
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations') {
      const text = args[i + 1] ?? '';
      if (!/^[0-9]+$/.test(text) || Number(text) === 0) {
        throw new Error(`--iterations expects a positive whole number, got '${text}'`);
      }
      maxIterations = Number(text);
      i++;
    }
  }
  return maxIterations;
}

function main(): void {
  let maxIterations: number;
  try {
    maxIterations = parseIterations(process.argv.slice(2));
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    console.error(USAGE);
    process.exit(1);
  }

  console.log(`Register Decoder Fuzzer`);
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  let iteration = 0;
  let decoded = 0;
  const rejections = new Map<string, number>();
  const issues: Issue[] = [];

  const startTime = Date.now();

  while (iteration < maxIterations) {
    const rng = new Rng(iteration + 1);
    const target = TARGETS[iteration % TARGETS.length];
    const value = iteration % 2 === 0
      ? target.generate(rng)
      : mutate(target.seeds[iteration % target.seeds.length], rng, rng.int(1, 5));

    const outcome = fuzzOne(target, value);
    switch (outcome.kind) {
      case 'ok':
        decoded++;
        break;
      case 'rejected':
        rejections.set(outcome.reason, (rejections.get(outcome.reason) ?? 0) + 1);
        break;
      case 'issue':
        issues.push({ iteration, target: target.name, value, problem: outcome.problem });
        console.error(`\n[!] ${target.name} 0x${value.toString(16)} at iteration ${iteration}: ${outcome.problem}`);
        break;
    }

    iteration++;

    // Progress report every 10000 iterations
    if (iteration % 10000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(`[${elapsed}s] iteration=${iteration} rate=${rate}/s decoded=${decoded} issues=${issues.length}`);
    }
  }

  // Final report
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Decoded: ${decoded}`);
  for (const [reason, count] of [...rejections].sort()) {
    console.log(`Rejected (${reason}): ${count}`);
  }

  if (issues.length > 0) {
    console.log('');
    console.log(`=== ${issues.length} issue(s) found ===`);
    for (const issue of issues) {
      console.log(`  Iteration: ${issue.iteration}, Decoder: ${issue.target}`);
      console.log(`  Value: 0x${issue.value.toString(16)}`);
      console.log(`  Problem: ${issue.problem}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

if (require.main === module) {
  main();
}
