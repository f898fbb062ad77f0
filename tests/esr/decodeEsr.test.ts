import { DecodeError, tryDecode } from '../../src/DecodeError';
import { decodeEsr, EXCEPTION_CLASSES } from '../../src/esr/decodeEsr';

interface ExpectedField {
  name: string;
  longName?: string;
  start: number;
  width: number;
  value: bigint;
  description?: string;
  subfields: ExpectedField[];
}

function field(
  name: string,
  longName: string | undefined,
  start: number,
  width: number,
  value: bigint,
  description?: string,
  subfields: ExpectedField[] = [],
): ExpectedField {
  return { name, longName, start, width, value, description, subfields };
}

const EXTERNAL_ABORT =
  'Synchronous External abort, not on translation table walk or hardware update of translation table.';

function header(ec: bigint, ecDescription: string, il: boolean): ExpectedField[] {
  return [
    field('RES0', 'Reserved', 37, 27, 0n),
    field('ISS2', undefined, 32, 5, 0n),
    field('EC', 'Exception Class', 26, 6, ec, ecDescription),
    field('IL', 'Instruction Length', 25, 1, il ? 1n : 0n,
      il ? '32-bit instruction trapped' : '16-bit instruction trapped'),
  ];
}

describe('decodeEsr golden values', () => {
  test('0x0 is an unknown reason with RES0 ISS', () => {
    expect(decodeEsr(0n)).toEqual([
      ...header(0n, 'Unknown reason', false),
      field('ISS', 'Instruction Specific Syndrome', 0, 25, 0n, undefined, [
        field('RES0', 'Reserved', 0, 25, 0n, 'ISS is RES0'),
      ]),
    ]);
  });

  test('0x96000050 is a data abort without instruction syndrome', () => {
    expect(decodeEsr(0x96000050n)).toEqual([
      ...header(37n, 'Data Abort taken without a change in Exception level', true),
      field('ISS', 'Instruction Specific Syndrome', 0, 25, 80n, undefined, [
        field('ISV', 'Instruction Syndrome Valid', 24, 1, 0n, 'No valid instruction syndrome'),
        field('RES0', 'Reserved', 14, 10, 0n),
        field('VNCR', undefined, 13, 1, 0n),
        field('SET', 'Synchronous Error Type', 11, 2, 0n, 'Recoverable state (UER)'),
        field('FnV', 'FAR not Valid', 10, 1, 0n, 'FAR is valid'),
        field('EA', 'External abort type', 9, 1, 0n),
        field('CM', 'Cache Maintenance', 8, 1, 0n),
        field('S1PTW', 'Stage-1 translation table walk', 7, 1, 0n),
        field('WnR', 'Write not Read', 6, 1, 1n, 'Abort caused by writing to memory'),
        field('DFSC', 'Data Fault Status Code', 0, 6, 16n, EXTERNAL_ABORT),
      ]),
    ]);
  });

  test('0x97523050 is a data abort with a valid instruction syndrome', () => {
    expect(decodeEsr(0x97523050n)).toEqual([
      ...header(37n, 'Data Abort taken without a change in Exception level', true),
      field('ISS', 'Instruction Specific Syndrome', 0, 25, 22163536n, undefined, [
        field('ISV', 'Instruction Syndrome Valid', 24, 1, 1n, 'Valid instruction syndrome'),
        field('SAS', 'Syndrome Access Size', 22, 2, 1n, 'halfword'),
        field('SSE', 'Syndrome Sign Extend', 21, 1, 0n),
        field('SRT', 'Syndrome Register Transfer', 16, 5, 18n),
        field('SF', 'Sixty-Four', 15, 1, 0n, '32-bit wide register'),
        field('AR', 'Acquire/Release', 14, 1, 0n, 'No acquire/release semantics'),
        field('VNCR', undefined, 13, 1, 1n),
        field('SET', 'Synchronous Error Type', 11, 2, 2n, 'Uncontainable (UC)'),
        field('FnV', 'FAR not Valid', 10, 1, 0n, 'FAR is valid'),
        field('EA', 'External abort type', 9, 1, 0n),
        field('CM', 'Cache Maintenance', 8, 1, 0n),
        field('S1PTW', 'Stage-1 translation table walk', 7, 1, 0n),
        field('WnR', 'Write not Read', 6, 1, 1n, 'Abort caused by writing to memory'),
        field('DFSC', 'Data Fault Status Code', 0, 6, 16n, EXTERNAL_ABORT),
      ]),
    ]);
  });

  test('0x82001e10 is an instruction abort from a lower EL', () => {
    expect(decodeEsr(0x82001e10n)).toEqual([
      ...header(32n, 'Instruction Abort from a lower Exception level', true),
      field('ISS', 'Instruction Specific Syndrome', 0, 25, 7696n, undefined, [
        field('RES0', 'Reserved', 13, 12, 0n),
        field('SET', 'Synchronous Error Type', 11, 2, 3n, 'Restartable state (UEO)'),
        field('FnV', 'FAR not Valid', 10, 1, 1n, 'FAR is not valid, it holds an unknown value'),
        field('EA', 'External abort type', 9, 1, 1n),
        field('RES0', 'Reserved', 8, 1, 0n),
        field('S1PTW', 'Stage-1 translation table walk', 7, 1, 0n),
        field('RES0', 'Reserved', 6, 1, 0n),
        field('IFSC', 'Instruction Fault Status Code', 0, 6, 16n, EXTERNAL_ABORT),
      ]),
    ]);
  });

  test('0x1f300000 is an SVE trap with a condition code', () => {
    expect(decodeEsr(0x1f300000n)).toEqual([
      ...header(7n, 'Trapped access to SVE, Advanced SIMD or floating point', true),
      field('ISS', 'Instruction Specific Syndrome', 0, 25, 19922944n, undefined, [
        field('CV', 'Condition code valid', 24, 1, 1n, 'COND is valid'),
        field('COND', 'Condition code of the trapped instruction', 20, 4, 3n),
        field('RES0', 'Reserved', 0, 20, 0n),
      ]),
    ]);
  });

  test('0x2a000002 is a trapped LD64B or ST64B', () => {
    expect(decodeEsr(0x2a000002n)).toEqual([
      ...header(10n, 'Trapped execution of an LD64B, ST64B, ST64BV, or ST64BV0 instruction', true),
      field('ISS', 'Instruction Specific Syndrome', 0, 25, 2n, undefined, [
        field('ISS', undefined, 0, 25, 2n, 'LD64B or ST64B trapped'),
      ]),
    ]);
  });

  test('accepts a number as well as a bigint', () => {
    expect(decodeEsr(0x96000050)).toEqual(decodeEsr(0x96000050n));
  });
});

describe('decodeEsr top-level fields', () => {
  test('keeps ISS2 without checking it', () => {
    const fields = decodeEsr(0x1f_0000_0000n);
    expect(fields[1]).toEqual(field('ISS2', undefined, 32, 5, 0x1fn));
  });

  test('rejects any set bit above ISS2', () => {
    expect(() => decodeEsr(1n << 37n)).toThrow('Invalid ESR, res0 is 0x1');
    expect(() => decodeEsr(1n << 63n)).toThrow('Invalid ESR, res0 is 0x4000000');
  });

  test('rejects values outside 64 bits', () => {
    expect(() => decodeEsr(1n << 64n)).toThrow(RangeError);
    expect(() => decodeEsr(-1)).toThrow(RangeError);
  });

  test('describes MSR traps with the reconstructed instruction', () => {
    // EC 0x18, IL, MRS x2, CNTVCT_EL0
    const iss = decodeEsr(0x6234f841n)[4];
    expect(iss.description).toBe('MRS x2, CNTVCT_EL0');
    expect(iss.subfields.map(f => f.name)).toEqual(
      ['RES0', 'Op0', 'Op2', 'Op1', 'CRn', 'Rt', 'CRm', 'Direction'],
    );
  });
});

describe('Exception Class coverage', () => {
  const validEcs = [
    0x00, 0x01, 0x03, 0x04, 0x05, 0x06, 0x07, 0x0a, 0x0c, 0x0d, 0x0e, 0x11, 0x15, 0x16, 0x17,
    0x18, 0x19, 0x1c, 0x20, 0x21, 0x22, 0x24, 0x25, 0x26, 0x28, 0x2c, 0x2f, 0x30, 0x31, 0x32,
    0x33, 0x34, 0x35, 0x38, 0x3c,
  ];

  test('the table holds exactly the defined classes', () => {
    expect([...EXCEPTION_CLASSES.keys()].sort((a, b) => a - b)).toEqual(validEcs);
  });

  test.each(Array.from({ length: 64 }, (_, ec) => ec))('EC %i is decoded or rejected as InvalidEc', ec => {
    const result = tryDecode(decodeEsr, BigInt(ec) << 26n);
    if (validEcs.includes(ec)) {
      // The zero ISS is not valid for every class, but never because of EC.
      if (!result.ok) {
        expect(result.error.kind).not.toBe('InvalidEc');
      }
    } else {
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DecodeError);
        expect(result.error.detail).toEqual({ kind: 'InvalidEc', ec: BigInt(ec) });
      }
    }
  });

  test('EC descriptions come from the table', () => {
    for (const [ec, { description }] of EXCEPTION_CLASSES) {
      // Breakpoint and watchpoint classes need the debug fault status code.
      const value = (BigInt(ec) << 26n) | 0x22n;
      const result = tryDecode(decodeEsr, value);
      if (result.ok) {
        expect(result.fields[2].description).toBe(description);
      }
    }
  });
});
