export { extractBit, extractBits, parseNumber, REGISTER_MAX, toRegister } from './BitField';
export { FieldInfo } from './FieldInfo';
export type { FieldInfoJson } from './FieldInfo';
export { DecodeError, tryDecode } from './DecodeError';
export type { DecodeErrorDetail, DecodeErrorKind, DecodeResult } from './DecodeError';
export { decodeEsr, EXCEPTION_CLASSES } from './esr/decodeEsr';
export type { ExceptionClass, IssDecode, IssDecoder } from './esr/decodeEsr';
export { FAULT_STATUS_CODES } from './esr/faultStatus';
export { decodeMidr } from './midr/decodeMidr';
export { decodeSmccc } from './smccc/decodeSmccc';
export { sysregName, SYSREG_COUNT } from './sysregs/sysregNames';
export type { SysregEncoding } from './sysregs/sysregNames';
export { formatFields, formatRegister } from './render/formatFields';
export type { FormatOptions } from './render/formatFields';
export { layoutTable } from './render/layoutTable';
export type { TableCell, TableRow, TableRowKind } from './render/layoutTable';
