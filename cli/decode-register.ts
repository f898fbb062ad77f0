#!/usr/bin/env npx tsx
/**
 * CLI tool to decode an AArch64 register value into its fields.
 *
 * Register kinds:
 *   --esr   Exception Syndrome Register (default)
 *   --midr  Main ID Register
 *   --smccc SMC Calling Convention function identifier
 *
 * Usage:
 *   npx tsx cli/decode-register.ts [--esr|--midr|--smccc] [-v] [--json] <value>
 *
 * The value is hexadecimal with a 0x prefix, decimal otherwise.
 */

import { parseNumber } from '../src/BitField';
import { DecodeError } from '../src/DecodeError';
import type { FieldInfo } from '../src/FieldInfo';
import { decodeEsr } from '../src/esr/decodeEsr';
import { decodeMidr } from '../src/midr/decodeMidr';
import { formatRegister } from '../src/render/formatFields';
import { decodeSmccc } from '../src/smccc/decodeSmccc';

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

export type RegisterKind = 'esr' | 'midr' | 'smccc';

const DECODERS: Record<RegisterKind, (value: bigint) => FieldInfo[]> = {
  esr: decodeEsr,
  midr: decodeMidr,
  smccc: decodeSmccc,
};

export interface CliOptions {
  kind: RegisterKind;
  verbose: boolean;
  json: boolean;
  value: bigint;
}

/** Bad command line; the caller prints usage. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export const USAGE = [
  'Usage:',
  '  decode-register [--esr|--midr|--smccc] [-v] [--json] <value>',
];

export function parseArgs(args: readonly string[]): CliOptions {
  let kind: RegisterKind = 'esr';
  let verbose = false;
  let json = false;
  const positional: string[] = [];

  for (const arg of args) {
    switch (arg) {
      case '--esr':
      case '--midr':
      case '--smccc':
        kind = arg === '--esr' ? 'esr' : arg === '--midr' ? 'midr' : 'smccc';
        break;
      case '-v':
      case '--verbose':
        verbose = true;
        break;
      case '--json':
        json = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError(`Expected one register value, got ${positional.length}`);
  }
  try {
    return { kind, verbose, json, value: parseNumber(positional[0]) };
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

/** Runs the tool and returns its exit status. */
export function run(args: readonly string[], output: Output): number {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    output.error(`Error: ${err.message}`);
    USAGE.forEach(line => output.error(line));
    return 1;
  }

  let fields: FieldInfo[];
  try {
    fields = DECODERS[options.kind](options.value);
  } catch (err) {
    if (!(err instanceof DecodeError)) throw err;
    output.error(`Error: ${err.message}`);
    return 1;
  }

  if (options.json) {
    output.log(JSON.stringify({
      register: options.kind,
      value: `0x${options.value.toString(16)}`,
      fields,
    }, null, 2));
  } else {
    formatRegister(options.kind, options.value, fields, { verbose: options.verbose })
      .forEach(line => output.log(line));
  }
  return 0;
}

function main(): void {
  const status = run(process.argv.slice(2), {
    log: line => console.log(line),
    error: line => console.error(line),
  });
  process.exit(status);
}

if (require.main === module) {
  main();
}
