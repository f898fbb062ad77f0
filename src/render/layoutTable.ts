import type { FieldInfo } from '../FieldInfo';

export interface TableCell {
  /** Cell contents; absent for fillers and undescribed fields. */
  text?: string;
  colspan: number;
}

export type TableRowKind = 'value' | 'name' | 'description';

export interface TableRow {
  kind: TableRowKind;
  cells: TableCell[];
}

/** A field with its start bit made absolute within the register. */
interface PlacedField {
  field: FieldInfo;
  start: number;
}

function cell(text: string | undefined, colspan: number): TableCell {
  return text === undefined ? { colspan } : { text, colspan };
}

/**
 * Lay out one level of fields, most significant first, with fillers for
 * any bits the level does not cover.
 */
function fieldCells(
  placed: readonly PlacedField[],
  width: number,
  contents: (field: FieldInfo) => string | undefined,
): TableCell[] {
  const cells: TableCell[] = [];
  let last = width;
  for (const { field, start } of placed) {
    const end = start + field.width;
    if (end > last) {
      throw new Error(`Field ${field.name} at bit ${start} overlaps the field to its left`);
    }
    if (end < last) {
      cells.push({ colspan: last - end });
    }
    cells.push(cell(contents(field), field.width));
    last = start;
  }
  if (last > 0) {
    cells.push({ colspan: last });
  }
  return cells;
}

function nextLevel(placed: readonly PlacedField[]): PlacedField[] {
  return placed.flatMap(({ field, start }) =>
    field.subfields.map(subfield => ({ field: subfield, start: start + subfield.start })),
  );
}

/**
 * Table layout of a decoded register, one column per bit (most significant
 * on the left): a hex row, a binary row, then a name row and a description
 * row for each level of the field tree.
 *
 * Top-level fields that start at or above `width` are left out when they are
 * zero, so a 32-bit table can show a MIDR whose upper RES0 half is clear.
 * A nonzero field there cannot be shown and is an error.
 */
export function layoutTable(register: bigint, fields: readonly FieldInfo[], width = 64): TableRow[] {
  if (width <= 0 || width % 4 !== 0) {
    throw new Error(`Table width must be a positive multiple of 4, got ${width}`);
  }
  const rows: TableRow[] = [];

  const hex = register.toString(16).padStart(width / 4, '0');
  rows.push({ kind: 'value', cells: [...hex].map(digit => cell(digit, 4)) });

  const binary = register.toString(2).padStart(width, '0');
  rows.push({ kind: 'value', cells: [...binary].map(bit => cell(bit, 1)) });

  const shown = fields.filter(field => {
    if (field.start < width) return true;
    if (field.value !== 0n) {
      throw new Error(`Field ${field.name} at bit ${field.start} lies outside a ${width}-bit table`);
    }
    return false;
  });

  let level: PlacedField[] = shown.map(field => ({ field, start: field.start }));
  while (level.length > 0) {
    rows.push({ kind: 'name', cells: fieldCells(level, width, f => f.toString()) });
    rows.push({ kind: 'description', cells: fieldCells(level, width, f => f.description) });
    level = nextLevel(level);
  }
  return rows;
}
