import { extractBits } from './BitField';
import { DecodeError } from './DecodeError';

/** JSON form of a field, with the value as a hex string. */
export interface FieldInfoJson {
  name: string;
  longName?: string;
  start: number;
  width: number;
  value: string;
  description?: string;
  subfields: FieldInfoJson[];
}

/**
 * One named bit range of a register (or of an enclosing field), with its
 * extracted value and, where the value means something, a description.
 *
 * Instances are immutable: every `with*` / `describe*` call returns a new
 * field.
 */
export class FieldInfo {
  /** Short name from the architecture, e.g. "ISS". */
  readonly name: string;
  /** Long name, e.g. "Instruction Specific Syndrome". */
  readonly longName?: string;
  /** Index of the lowest bit of the field within its parent. */
  readonly start: number;
  /** Number of bits in the field. */
  readonly width: number;
  readonly value: bigint;
  /** What this particular value means, if known. */
  readonly description?: string;
  /** Nested breakdown of the field, empty when it has none. */
  readonly subfields: readonly FieldInfo[];

  private constructor(
    name: string,
    longName: string | undefined,
    start: number,
    width: number,
    value: bigint,
    description: string | undefined,
    subfields: readonly FieldInfo[],
  ) {
    this.name = name;
    if (longName !== undefined) this.longName = longName;
    this.start = start;
    this.width = width;
    this.value = value;
    if (description !== undefined) this.description = description;
    this.subfields = subfields;
  }

  /** Extract bits [start, end) of `register` as a field. */
  static get(
    register: bigint,
    name: string,
    longName: string | undefined,
    start: number,
    end: number,
  ): FieldInfo {
    const value = extractBits(register, start, end);
    return new FieldInfo(name, longName, start, end - start, value, undefined, []);
  }

  /** Extract a single bit of `register` as a field. */
  static getBit(
    register: bigint,
    name: string,
    longName: string | undefined,
    bit: number,
  ): FieldInfo {
    return FieldInfo.get(register, name, longName, bit, bit + 1);
  }

  withDescription(description: string): FieldInfo {
    return new FieldInfo(
      this.name, this.longName, this.start, this.width, this.value, description, this.subfields,
    );
  }

  /**
   * Attach a nested decode. The description is replaced by `description`,
   * so passing undefined clears it.
   */
  withSubfields(subfields: readonly FieldInfo[], description?: string): FieldInfo {
    return new FieldInfo(
      this.name, this.longName, this.start, this.width, this.value, description, subfields,
    );
  }

  /** The value of a 1-bit field. Throws for wider fields. */
  asBit(): boolean {
    if (this.width !== 1) {
      throw new Error(`Field ${this.name} is ${this.width} bits wide, not a single bit`);
    }
    return this.value === 1n;
  }

  /** Describe a 1-bit field from its boolean value. */
  describeBit(describer: (bit: boolean) => string): FieldInfo {
    return this.withDescription(describer(this.asBit()));
  }

  /**
   * Describe the field from its value. The describer may throw a
   * DecodeError for a value outside the field's encoding; it propagates as is.
   * An undefined result leaves the field undescribed.
   */
  describe(describer: (value: bigint) => string | undefined): FieldInfo {
    const description = describer(this.value);
    return description === undefined ? this : this.withDescription(description);
  }

  /** Returns the field if it is zero, otherwise fails with InvalidRes0. */
  checkRes0(): FieldInfo {
    if (this.value !== 0n) {
      throw new DecodeError({ kind: 'InvalidRes0', res0: this.value });
    }
    return this;
  }

  /** "true"/"false" for a single bit, otherwise zero-padded hex. */
  valueString(): string {
    if (this.width === 1) {
      return this.value === 1n ? 'true' : 'false';
    }
    return `0x${this.value.toString(16).padStart(Math.ceil(this.width / 4), '0')}`;
  }

  /** Zero-padded binary, e.g. "0b0101". */
  valueBinaryString(): string {
    return `0b${this.value.toString(2).padStart(this.width, '0')}`;
  }

  toString(): string {
    if (this.width === 1) {
      return `${this.name}: ${this.valueString()}`;
    }
    return `${this.name}: ${this.valueString()} ${this.valueBinaryString()}`;
  }

  toJSON(): FieldInfoJson {
    const json: FieldInfoJson = {
      name: this.name,
      start: this.start,
      width: this.width,
      value: `0x${this.value.toString(16)}`,
      subfields: this.subfields.map(f => f.toJSON()),
    };
    if (this.longName !== undefined) json.longName = this.longName;
    if (this.description !== undefined) json.description = this.description;
    return json;
  }
}
