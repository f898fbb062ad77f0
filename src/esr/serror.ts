import { DecodeError } from '../DecodeError';
import { FieldInfo } from '../FieldInfo';

const DFSC_ASYNC_SERROR = 0b010001n;

/** Decodes the ISS of an SError interrupt. */
export function decodeIssSerror(iss: bigint): FieldInfo[] {
  const ids = FieldInfo.getBit(iss, 'IDS', 'Implementation Defined Syndrome', 24)
    .describeBit(describeIds);
  if (ids.asBit()) {
    const impdef = FieldInfo.get(iss, 'IMPDEF', 'Implementation defined', 0, 24);
    return [ids, impdef];
  }

  const dfsc = FieldInfo.get(iss, 'DFSC', 'Data Fault Status Code', 0, 6).describe(describeDfsc);
  const res0a = FieldInfo.get(iss, 'RES0', 'Reserved', 14, 24).checkRes0();
  const iesb = dfsc.value === DFSC_ASYNC_SERROR
    ? FieldInfo.getBit(iss, 'IESB', 'Implicit Error Synchronisation event', 13)
      .describeBit(describeIesb)
    : FieldInfo.getBit(iss, 'RES0', 'Reserved for this DFSC value', 13).checkRes0();
  const aet = FieldInfo.get(iss, 'AET', 'Asynchronous Error Type', 10, 13).describe(describeAet);
  const ea = FieldInfo.getBit(iss, 'EA', 'External Abort type', 9);
  const res0b = FieldInfo.get(iss, 'RES0', 'Reserved', 6, 9).checkRes0();

  return [ids, res0a, iesb, aet, ea, res0b, dfsc];
}

function describeIds(ids: boolean): string {
  return ids
    ? 'The rest of the ISS is encoded in an implementation-defined format'
    : 'The rest of the ISS is encoded according to the platform';
}

function describeIesb(iesb: boolean): string {
  return iesb
    ? 'The SError interrupt was synchronized by the implicit error synchronization event and taken immediately.'
    : 'The SError interrupt was not synchronized by the implicit error synchronization event or not taken immediately.';
}

function describeAet(aet: bigint): string {
  switch (aet) {
    case 0b000n:
      return 'Uncontainable (UC)';
    case 0b001n:
      return 'Unrecoverable state (UEU)';
    case 0b010n:
      return 'Restartable state (UEO)';
    case 0b011n:
      return 'Recoverable state (UER)';
    case 0b110n:
      return 'Corrected (CE)';
    default:
      throw new DecodeError({ kind: 'InvalidAet', aet });
  }
}

function describeDfsc(dfsc: bigint): string {
  switch (dfsc) {
    case 0b000000n:
      return 'Uncategorized error';
    case DFSC_ASYNC_SERROR:
      return 'Asynchronous SError interrupt';
    default:
      throw new DecodeError({ kind: 'InvalidFsc', fsc: dfsc });
  }
}
