import { DecodeError } from '../DecodeError';
import faultStatusCodes from './faultStatusCodes.json';

/** Data/Instruction Fault Status Code table, keyed by the 6-bit code. */
export const FAULT_STATUS_CODES: ReadonlyMap<bigint, string> = new Map(
  Object.entries(faultStatusCodes).map(([code, description]) => [BigInt(code), description]),
);

/** The fault status code that reports a synchronous External abort. */
export const FSC_SYNCHRONOUS_EXTERNAL_ABORT = 0b010000n;

/** Describes a DFSC or IFSC value; undefined codes fail with InvalidFsc. */
export function describeFsc(fsc: bigint): string {
  const description = FAULT_STATUS_CODES.get(fsc);
  if (description === undefined) {
    throw new DecodeError({ kind: 'InvalidFsc', fsc });
  }
  return description;
}

/** Describes a Synchronous Error Type. */
export function describeSet(set: bigint): string {
  switch (set) {
    case 0b00n:
      return 'Recoverable state (UER)';
    case 0b10n:
      return 'Uncontainable (UC)';
    case 0b11n:
      return 'Restartable state (UEO)';
    default:
      throw new DecodeError({ kind: 'InvalidSet', set });
  }
}
