import type { FieldInfo } from './FieldInfo';

/** Why a register value could not be decoded. */
export type DecodeErrorDetail =
  | { kind: 'InvalidRes0'; res0: bigint }
  | { kind: 'InvalidEc'; ec: bigint }
  | { kind: 'InvalidFsc'; fsc: bigint }
  | { kind: 'InvalidSet'; set: bigint }
  | { kind: 'InvalidAet'; aet: bigint }
  | { kind: 'InvalidAm'; am: bigint }
  | { kind: 'InvalidLd64bIss'; iss: bigint };

export type DecodeErrorKind = DecodeErrorDetail['kind'];

function hex(value: bigint): string {
  return `0x${value.toString(16)}`;
}

function formatDetail(detail: DecodeErrorDetail): string {
  switch (detail.kind) {
    case 'InvalidRes0':
      return `Invalid ESR, res0 is ${hex(detail.res0)}`;
    case 'InvalidEc':
      return `Invalid EC ${hex(detail.ec)}`;
    case 'InvalidFsc':
      return `Invalid DFSC or IFSC ${hex(detail.fsc)}`;
    case 'InvalidSet':
      return `Invalid SET ${hex(detail.set)}`;
    case 'InvalidAet':
      return `Invalid AET ${hex(detail.aet)}`;
    case 'InvalidAm':
      return `Invalid AM ${hex(detail.am)}`;
    case 'InvalidLd64bIss':
      return `Invalid ISS ${hex(detail.iss)} for trapped LD64B or ST64B*`;
  }
}

/**
 * A register value that breaks the architecture's encoding rules.
 * Always terminal for the decode that raised it.
 */
export class DecodeError extends Error {
  readonly detail: DecodeErrorDetail;

  constructor(detail: DecodeErrorDetail) {
    super(formatDetail(detail));
    this.name = 'DecodeError';
    this.detail = detail;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }

  get kind(): DecodeErrorKind {
    return this.detail.kind;
  }
}

/** Outcome of {@link tryDecode}. */
export type DecodeResult =
  | { ok: true; fields: FieldInfo[] }
  | { ok: false; error: DecodeError };

/**
 * Run a decoder without throwing on invalid register values.
 * Errors other than DecodeError (bad input, programming errors) still throw.
 */
export function tryDecode<T>(decoder: (value: T) => FieldInfo[], value: T): DecodeResult {
  try {
    return { ok: true, fields: decoder(value) };
  } catch (e) {
    if (e instanceof DecodeError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
