import type { FieldInfo } from '../FieldInfo';

export interface FormatOptions {
  /** Append each field's long name, where it has one. */
  verbose?: boolean;
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

function bitRange(field: FieldInfo): string {
  if (field.width === 1) {
    return `${pad2(field.start)}     `;
  }
  return `${pad2(field.start)}..${pad2(field.start + field.width - 1)} `;
}

function formatField(field: FieldInfo, level: number, options: FormatOptions, lines: string[]): void {
  const indent = '  '.repeat(level);
  let line = `${indent}${bitRange(field)}${field.toString()}`;
  if (options.verbose && field.longName !== undefined) {
    line += ` (${field.longName})`;
  }
  lines.push(line);
  if (field.description !== undefined) {
    lines.push(`${indent}  # ${field.description}`);
  }
  for (const subfield of field.subfields) {
    formatField(subfield, level + 1, options, lines);
  }
}

/**
 * Render a decoded field tree as indented text, one field per line, e.g.
 *
 *   26..31 EC: 0x25 0b100101
 *     # Data Abort taken without a change in Exception level
 */
export function formatFields(fields: readonly FieldInfo[], options: FormatOptions = {}): string[] {
  const lines: string[] = [];
  for (const field of fields) {
    formatField(field, 0, options, lines);
  }
  return lines;
}

/** Same as {@link formatFields}, under an "ESR 0x…:" heading. */
export function formatRegister(
  kind: string,
  value: bigint,
  fields: readonly FieldInfo[],
  options: FormatOptions = {},
): string[] {
  const heading = `${kind.toUpperCase()} 0x${value.toString(16).padStart(16, '0')}:`;
  return [heading, ...formatFields(fields, options)];
}
