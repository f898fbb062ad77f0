/**
 * AArch64 system register names, keyed by their MSR/MRS encoding
 * (Op0, Op1, CRn, CRm, Op2).
 *
 * The table lives in sysregs.json: plain entries, plus numbered families
 * such as DBGBVR<n>_EL1 whose index is folded into CRm and/or Op2.
 */
import sysregs from './sysregs.json';

/** An MSR/MRS system register encoding. */
export interface SysregEncoding {
  op0: number;
  op1: number;
  crn: number;
  crm: number;
  op2: number;
}

function encodingKey({ op0, op1, crn, crm, op2 }: SysregEncoding): string {
  return `${op0}:${op1}:${crn}:${crm}:${op2}`;
}

/**
 * Encoding of member `n` of a numbered family.
 *   crm:    CRm = base + n
 *   op2:    Op2 = base + n
 *   crmOp2: CRm = base + n[3:], Op2 = n[2:0]
 */
function familyMember(base: SysregEncoding, layout: string, n: number): SysregEncoding {
  switch (layout) {
    case 'crm':
      return { ...base, crm: base.crm + n };
    case 'op2':
      return { ...base, op2: base.op2 + n };
    case 'crmOp2':
      return { ...base, crm: base.crm + (n >> 3), op2: n & 7 };
    default:
      throw new Error(`Unknown system register family layout '${layout}'`);
  }
}

function buildTable(): Map<string, string> {
  const table = new Map<string, string>();
  const add = (encoding: SysregEncoding, name: string): void => {
    const key = encodingKey(encoding);
    const existing = table.get(key);
    if (existing !== undefined) {
      throw new Error(`System register encoding ${key} is claimed by both ${existing} and ${name}`);
    }
    table.set(key, name);
  };

  for (const { name, ...encoding } of sysregs.registers) {
    add(encoding, name);
  }
  for (const { name, count, layout, ...base } of sysregs.indexed) {
    for (let n = 0; n < count; n++) {
      add(familyMember(base, layout, n), name.replace('{n}', String(n)));
    }
  }
  return table;
}

const SYSREG_NAMES: ReadonlyMap<string, string> = buildTable();

/** Number of encodings the table knows. */
export const SYSREG_COUNT = SYSREG_NAMES.size;

/** Looks up the name of a system register, or undefined if not in the table. */
export function sysregName(encoding: SysregEncoding): string | undefined {
  return SYSREG_NAMES.get(encodingKey(encoding));
}
