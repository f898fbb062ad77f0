import { FieldInfo } from '../../src/FieldInfo';
import { decodeEsr } from '../../src/esr/decodeEsr';
import { decodeMidr } from '../../src/midr/decodeMidr';
import { layoutTable } from '../../src/render/layoutTable';

describe('layoutTable', () => {
  const register = 0xa5n;
  const high = FieldInfo.get(register, 'HI', undefined, 4, 8)
    .withSubfields([FieldInfo.get(0xan, 'B', undefined, 1, 3)]);
  const low = FieldInfo.get(register, 'LO', undefined, 0, 2).withDescription('low');

  test('lays out values, names and descriptions with fillers', () => {
    expect(layoutTable(register, [high, low], 8)).toEqual([
      { kind: 'value', cells: [{ text: 'a', colspan: 4 }, { text: '5', colspan: 4 }] },
      {
        kind: 'value',
        cells: [...'10100101'].map(bit => ({ text: bit, colspan: 1 })),
      },
      {
        kind: 'name',
        cells: [{ text: 'HI: 0xa 0b1010', colspan: 4 }, { colspan: 2 }, { text: 'LO: 0x1 0b01', colspan: 2 }],
      },
      { kind: 'description', cells: [{ colspan: 4 }, { colspan: 2 }, { text: 'low', colspan: 2 }] },
      { kind: 'name', cells: [{ colspan: 1 }, { text: 'B: 0x1 0b01', colspan: 2 }, { colspan: 5 }] },
      { kind: 'description', cells: [{ colspan: 1 }, { colspan: 2 }, { colspan: 5 }] },
    ]);
  });

  test('rejects fields out of order', () => {
    expect(() => layoutTable(register, [low, high], 8)).toThrow('Field HI at bit 4 overlaps the field to its left');
  });

  test('a 32-bit table leaves out the clear upper half of a MIDR', () => {
    const rows = layoutTable(0x410fd083n, decodeMidr(0x410fd083n), 32);
    expect(rows[0].cells.map(c => c.text).join('')).toBe('410fd083');
    expect(rows[2]).toEqual({
      kind: 'name',
      cells: [
        { text: 'Implementer: 0x41 0b01000001', colspan: 8 },
        { text: 'Variant: 0x0 0b0000', colspan: 4 },
        { text: 'Architecture: 0xf 0b1111', colspan: 4 },
        { text: 'PartNum: 0xd08 0b110100001000', colspan: 12 },
        { text: 'Revision: 0x3 0b0011', colspan: 4 },
      ],
    });
  });

  test('rejects a nonzero field beyond the table width', () => {
    const upper = FieldInfo.get(1n << 40n, 'RES0', undefined, 32, 64);
    expect(() => layoutTable(0n, [upper], 32)).toThrow('Field RES0 at bit 32 lies outside a 32-bit table');
  });

  test('rejects widths that are not whole hex digits', () => {
    expect(() => layoutTable(register, [], 6)).toThrow('Table width must be a positive multiple of 4, got 6');
  });

  test('every row of a decoded ESR spans 64 columns', () => {
    const rows = layoutTable(0x96000050n, decodeEsr(0x96000050n));
    expect(rows.map(r => r.kind)).toEqual(['value', 'value', 'name', 'description', 'name', 'description']);
    for (const row of rows) {
      expect(row.cells.reduce((sum, c) => sum + c.colspan, 0)).toBe(64);
    }
    expect(rows[2].cells.map(c => c.text)).toEqual([
      `RES0: 0x0000000 0b${'0'.repeat(27)}`,
      'ISS2: 0x00 0b00000',
      'EC: 0x25 0b100101',
      'IL: true',
      'ISS: 0x0000050 0b0000000000000000001010000',
    ]);
    expect(rows[4].cells[0]).toEqual({ colspan: 39 });
    expect(rows[4].cells).toHaveLength(11);
  });
});
