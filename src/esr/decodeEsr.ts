import { toRegister } from '../BitField';
import { DecodeError } from '../DecodeError';
import { FieldInfo } from '../FieldInfo';
import { decodeIssDataAbort, decodeIssInstructionAbort } from './abort';
import {
  decodeIssBreakpoint,
  decodeIssBreakpointVectorCatch,
  decodeIssSoftwareStep,
  decodeIssWatchpoint,
} from './breakpoint';
import { decodeIssBti } from './bti';
import { decodeIssRes0 } from './common';
import { decodeIssFp } from './fp';
import { decodeIssHvc } from './hvc';
import { decodeIssLd64b } from './ld64b';
import { decodeIssLdc } from './ldc';
import { decodeIssMcr, decodeIssMcrr } from './mcr';
import { decodeIssMsr } from './msr';
import { decodeIssPauth } from './pauth';
import { decodeIssSerror } from './serror';
import { decodeIssSve } from './sve';
import { decodeIssWf } from './wf';

/** Result of an ISS decoder: the ISS subfields and an optional ISS description. */
export interface IssDecode {
  subfields: FieldInfo[];
  description?: string;
}

export type IssDecoder = (iss: bigint) => IssDecode;

/** One Exception Class: what it means and how its ISS is laid out. */
export interface ExceptionClass {
  description: string;
  decodeIss: IssDecoder;
}

/** Adapts a decoder that only produces subfields. */
function fieldsOnly(decode: (iss: bigint) => FieldInfo[]): IssDecoder {
  return iss => ({ subfields: decode(iss) });
}

const decodeMsr: IssDecoder = iss => {
  const { fields, instruction } = decodeIssMsr(iss);
  return { subfields: fields, description: instruction };
};

const reserved = fieldsOnly(decodeIssRes0);
const wf = fieldsOnly(decodeIssWf);
const mcr = fieldsOnly(decodeIssMcr);
const mcrr = fieldsOnly(decodeIssMcrr);
const ldc = fieldsOnly(decodeIssLdc);
const sve = fieldsOnly(decodeIssSve);
const ld64b = fieldsOnly(decodeIssLd64b);
const bti = fieldsOnly(decodeIssBti);
const hvc = fieldsOnly(decodeIssHvc);
const pauth = fieldsOnly(decodeIssPauth);
const instructionAbort = fieldsOnly(decodeIssInstructionAbort);
const dataAbort = fieldsOnly(decodeIssDataAbort);
const fp = fieldsOnly(decodeIssFp);
const serror = fieldsOnly(decodeIssSerror);
const breakpointVectorCatch = fieldsOnly(decodeIssBreakpointVectorCatch);
const softwareStep = fieldsOnly(decodeIssSoftwareStep);
const watchpoint = fieldsOnly(decodeIssWatchpoint);
const breakpoint = fieldsOnly(decodeIssBreakpoint);

/** Exception Class → meaning and ISS decoder. Values not listed are invalid. */
export const EXCEPTION_CLASSES: ReadonlyMap<number, ExceptionClass> = new Map([
  [0b000000, { description: 'Unknown reason', decodeIss: reserved }],
  [0b000001, { description: 'Wrapped WF* instruction execution', decodeIss: wf }],
  [0b000011, { description: 'Trapped MCR or MRC access with coproc=0b1111', decodeIss: mcr }],
  [0b000100, { description: 'Trapped MCRR or MRRC access with coproc=0b1111', decodeIss: mcrr }],
  [0b000101, { description: 'Trapped MCR or MRC access with coproc=0b1110', decodeIss: mcr }],
  [0b000110, { description: 'Trapped LDC or STC access', decodeIss: ldc }],
  [0b000111, { description: 'Trapped access to SVE, Advanced SIMD or floating point', decodeIss: sve }],
  [0b001010, {
    description: 'Trapped execution of an LD64B, ST64B, ST64BV, or ST64BV0 instruction',
    decodeIss: ld64b,
  }],
  [0b001100, { description: 'Trapped MRRC access with (coproc==0b1110)', decodeIss: mcrr }],
  [0b001101, { description: 'Branch Target Exception', decodeIss: bti }],
  [0b001110, { description: 'Illegal Execution state', decodeIss: reserved }],
  [0b010001, { description: 'SVC instruction execution in AArch32 state', decodeIss: hvc }],
  [0b010101, { description: 'SVC instruction execution in AArch64 state', decodeIss: hvc }],
  [0b010110, { description: 'HVC instruction execution in AArch64 state', decodeIss: hvc }],
  [0b010111, { description: 'SMC instruction execution in AArch64 state', decodeIss: hvc }],
  [0b011000, {
    description: 'Trapped MSR, MRS or System instruction execution in AArch64 state',
    decodeIss: decodeMsr,
  }],
  [0b011001, {
    description: 'Access to SVE functionality trapped as a result of CPACR_EL1.ZEN, '
      + 'CPTR_EL2.ZEN, CPTR_EL2.TZ, or CPTR_EL3.EZ',
    decodeIss: reserved,
  }],
  [0b011100, {
    description: 'Exception from a Pointer Authentication instruction authentication failure',
    decodeIss: pauth,
  }],
  [0b100000, { description: 'Instruction Abort from a lower Exception level', decodeIss: instructionAbort }],
  [0b100001, {
    description: 'Instruction Abort taken without a change in Exception level',
    decodeIss: instructionAbort,
  }],
  [0b100010, { description: 'PC alignment fault exception', decodeIss: reserved }],
  [0b100100, { description: 'Data Abort from a lower Exception level', decodeIss: dataAbort }],
  [0b100101, { description: 'Data Abort taken without a change in Exception level', decodeIss: dataAbort }],
  [0b100110, { description: 'SP alignment fault exception', decodeIss: reserved }],
  [0b101000, { description: 'Trapped floating-point exception taken from AArch32 state', decodeIss: fp }],
  [0b101100, { description: 'Trapped floating-point exception taken from AArch64 state', decodeIss: fp }],
  [0b101111, { description: 'SError interrupt', decodeIss: serror }],
  [0b110000, {
    description: 'Breakpoint exception from a lower Exception level',
    decodeIss: breakpointVectorCatch,
  }],
  [0b110001, {
    description: 'Breakpoint exception taken without a change in Exception level',
    decodeIss: breakpointVectorCatch,
  }],
  [0b110010, { description: 'Software Step exception from a lower Exception level', decodeIss: softwareStep }],
  [0b110011, {
    description: 'Software Step exception taken without a change in Exception level',
    decodeIss: softwareStep,
  }],
  [0b110100, { description: 'Watchpoint exception from a lower Exception level', decodeIss: watchpoint }],
  [0b110101, {
    description: 'Watchpoint exception taken without a change in Exception level',
    decodeIss: watchpoint,
  }],
  [0b111000, { description: 'BKPT instruction execution in AArch32 state', decodeIss: breakpoint }],
  [0b111100, { description: 'BRK instruction execution in AArch64 state', decodeIss: breakpoint }],
]);

/**
 * Decodes an Exception Syndrome Register value.
 * Fields come back as [RES0, ISS2, EC, IL, ISS], with the class-specific
 * breakdown under ISS.
 */
export function decodeEsr(value: bigint | number): FieldInfo[] {
  const esr = toRegister(value);
  const res0 = FieldInfo.get(esr, 'RES0', 'Reserved', 37, 64).checkRes0();
  const iss2 = FieldInfo.get(esr, 'ISS2', undefined, 32, 37);
  const ec = FieldInfo.get(esr, 'EC', 'Exception Class', 26, 32);
  const il = FieldInfo.getBit(esr, 'IL', 'Instruction Length', 25).describeBit(describeIl);
  const iss = FieldInfo.get(esr, 'ISS', 'Instruction Specific Syndrome', 0, 25);

  const exceptionClass = EXCEPTION_CLASSES.get(Number(ec.value));
  if (exceptionClass === undefined) {
    throw new DecodeError({ kind: 'InvalidEc', ec: ec.value });
  }
  const { subfields, description } = exceptionClass.decodeIss(iss.value);

  return [
    res0,
    iss2,
    ec.withDescription(exceptionClass.description),
    il,
    iss.withSubfields(subfields, description),
  ];
}

function describeIl(il: boolean): string {
  return il ? '32-bit instruction trapped' : '16-bit instruction trapped';
}
