import { byConvention, generalQueries32, reservedFunctionIds } from './common';
import type { FieldInfo } from '../FieldInfo';

// Function numbers below the query range belong to the application itself.
function trustedApplicationCall(functionNumber: bigint): string | undefined {
  return functionNumber < 0xff00n ? 'Trusted Application defined call' : undefined;
}

function describeTapp32(functionNumber: bigint): string | undefined {
  return trustedApplicationCall(functionNumber) ?? generalQueries32(functionNumber);
}

function describeTapp64(functionNumber: bigint): string | undefined {
  return trustedApplicationCall(functionNumber) ?? reservedFunctionIds(functionNumber);
}

/** Trusted Application Calls (services 0x30 and 0x31). */
export function decodeTappService(fid: bigint, convention: bigint): FieldInfo {
  return byConvention(fid, convention, describeTapp32, describeTapp64);
}
