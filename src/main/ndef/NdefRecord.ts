import { NdefFormatError } from '../errors';

/**
 * Type Name Format values, the 3-bit tag that says how a record's type field is read.
 */
export enum Tnf {
  EMPTY = 0x00,
  WELL_KNOWN = 0x01,
  MIME_MEDIA = 0x02,
  ABSOLUTE_URI = 0x03,
  EXTERNAL_TYPE = 0x04,
  UNKNOWN = 0x05,
  UNCHANGED = 0x06,
}

export const RTD_HANDOVER_REQUEST = Buffer.from('Hr', 'ascii');
export const RTD_COLLISION_RESOLUTION = Buffer.from('cr', 'ascii');
export const RTD_URI = Buffer.from('U', 'ascii');
export const RTD_TEXT = Buffer.from('T', 'ascii');

const EMPTY_BYTES = Buffer.alloc(0);

type Bytes = Uint8Array | string;

function toBuffer(value: Bytes | undefined): Buffer {
  if (value === undefined) {
    return EMPTY_BYTES;
  }
  // Copy so callers cannot mutate the record through a shared buffer.
  return typeof value === 'string' ? Buffer.from(value, 'utf-8') : Buffer.from(value);
}

export class NdefRecord {
  private readonly typeBytes: Buffer;
  private readonly idBytes: Buffer;
  private readonly payloadBytes: Buffer;

  constructor(
    readonly tnf: Tnf,
    type?: Bytes,
    id?: Bytes,
    payload?: Bytes
  ) {
    if (tnf < Tnf.EMPTY || tnf > Tnf.UNCHANGED || !Number.isInteger(tnf)) {
      throw new NdefFormatError(`Invalid TNF value ${tnf}`);
    }

    this.typeBytes = toBuffer(type);
    this.idBytes = toBuffer(id);
    this.payloadBytes = toBuffer(payload);

    if (this.typeBytes.length > 0xff || this.idBytes.length > 0xff) {
      throw new NdefFormatError('Record type and id must be at most 255 bytes');
    }

    if (
      tnf === Tnf.EMPTY &&
      (this.typeBytes.length > 0 || this.idBytes.length > 0 || this.payloadBytes.length > 0)
    ) {
      throw new NdefFormatError('An EMPTY record cannot carry a type, id or payload');
    }

    Object.freeze(this);
  }

  get type(): Buffer {
    return Buffer.from(this.typeBytes);
  }

  get id(): Buffer {
    return Buffer.from(this.idBytes);
  }

  get payload(): Buffer {
    return Buffer.from(this.payloadBytes);
  }

  get payloadLength(): number {
    return this.payloadBytes.length;
  }

  hasType(tnf: Tnf, type: Uint8Array): boolean {
    return this.tnf === tnf && this.typeBytes.equals(type);
  }

  equals(other: NdefRecord): boolean {
    return (
      this.tnf === other.tnf &&
      this.typeBytes.equals(other.typeBytes) &&
      this.idBytes.equals(other.idBytes) &&
      this.payloadBytes.equals(other.payloadBytes)
    );
  }

  toString(): string {
    const type = this.typeBytes.toString('latin1');
    return `NdefRecord(tnf=${Tnf[this.tnf]}, type=${type}, payload=${this.payloadBytes.length}b)`;
  }
}
