import { NdefFormatError } from '../errors';
import { NdefRecord, Tnf } from './NdefRecord';

const FLAG_MB = 0x80;
const FLAG_ME = 0x40;
const FLAG_CF = 0x20;
const FLAG_SR = 0x10;
const FLAG_IL = 0x08;
const TNF_MASK = 0x07;

const SHORT_RECORD_MAX = 0xff;

interface ChunkState {
  tnf: Tnf;
  type: Buffer;
  id: Buffer;
  parts: Buffer[];
}

/**
 * An ordered, non-empty, immutable sequence of NDEF records together with the
 * binary NDEF message codec.
 */
export class NdefMessage {
  readonly records: readonly NdefRecord[];

  constructor(records: readonly NdefRecord[]) {
    if (records.length === 0) {
      throw new NdefFormatError('An NDEF message must contain at least one record');
    }
    this.records = Object.freeze([...records]);
    Object.freeze(this);
  }

  get length(): number {
    return this.records.length;
  }

  record(index: number): NdefRecord | undefined {
    return this.records[index];
  }

  equals(other: NdefMessage): boolean {
    return (
      this.records.length === other.records.length &&
      this.records.every((record, index) => record.equals(other.records[index]))
    );
  }

  toBytes(): Buffer {
    const parts = this.records.map((record, index) =>
      encodeRecord(record, index === 0, index === this.records.length - 1)
    );
    return Buffer.concat(parts);
  }

  static fromBytes(bytes: Uint8Array): NdefMessage {
    const data = Buffer.from(bytes);
    if (data.length === 0) {
      throw new NdefFormatError('Empty NDEF message');
    }

    const records: NdefRecord[] = [];
    let chunk: ChunkState | null = null;
    let offset = 0;
    let sawEnd = false;

    while (offset < data.length) {
      if (sawEnd) {
        throw new NdefFormatError('Trailing bytes after message end', { offset });
      }

      const header = readByte(data, offset);
      offset += 1;
      const isFirst = offset === 1;
      if (isFirst !== ((header & FLAG_MB) !== 0)) {
        throw new NdefFormatError('Message begin flag in unexpected position', { offset });
      }

      const tnf = header & TNF_MASK;
      const shortRecord = (header & FLAG_SR) !== 0;
      const hasId = (header & FLAG_IL) !== 0;
      const chunked = (header & FLAG_CF) !== 0;
      sawEnd = (header & FLAG_ME) !== 0;

      const typeLength = readByte(data, offset);
      offset += 1;

      let payloadLength: number;
      if (shortRecord) {
        payloadLength = readByte(data, offset);
        offset += 1;
      } else {
        ensureAvailable(data, offset, 4);
        payloadLength = data.readUInt32BE(offset);
        offset += 4;
      }

      let idLength = 0;
      if (hasId) {
        idLength = readByte(data, offset);
        offset += 1;
      }

      const type = take(data, offset, typeLength);
      offset += typeLength;
      const id = take(data, offset, idLength);
      offset += idLength;
      const payload = take(data, offset, payloadLength);
      offset += payloadLength;

      if (chunk) {
        if (tnf !== Tnf.UNCHANGED || typeLength !== 0 || idLength !== 0) {
          throw new NdefFormatError('Malformed chunk continuation record', { offset });
        }
        chunk.parts.push(payload);
        if (!chunked) {
          records.push(
            new NdefRecord(chunk.tnf, chunk.type, chunk.id, Buffer.concat(chunk.parts))
          );
          chunk = null;
        }
        continue;
      }

      if (tnf === Tnf.UNCHANGED) {
        throw new NdefFormatError('UNCHANGED record outside of a chunked record', { offset });
      }

      if (chunked) {
        chunk = { tnf, type, id, parts: [payload] };
        continue;
      }

      records.push(new NdefRecord(tnf, type, id, payload));
    }

    if (!sawEnd || chunk) {
      throw new NdefFormatError('NDEF message is truncated');
    }

    return new NdefMessage(records);
  }
}

function encodeRecord(record: NdefRecord, first: boolean, last: boolean): Buffer {
  const type = record.type;
  const id = record.id;
  const payload = record.payload;
  const shortRecord = payload.length <= SHORT_RECORD_MAX;

  let header = record.tnf & TNF_MASK;
  if (first) header |= FLAG_MB;
  if (last) header |= FLAG_ME;
  if (shortRecord) header |= FLAG_SR;
  if (id.length > 0) header |= FLAG_IL;

  const lengths: number[] = [header, type.length];
  const head = Buffer.alloc(shortRecord ? 1 : 4);
  if (shortRecord) {
    head.writeUInt8(payload.length, 0);
  } else {
    head.writeUInt32BE(payload.length, 0);
  }

  return Buffer.concat([
    Buffer.from(lengths),
    head,
    id.length > 0 ? Buffer.from([id.length]) : Buffer.alloc(0),
    type,
    id,
    payload,
  ]);
}

function ensureAvailable(data: Buffer, offset: number, length: number): void {
  if (offset + length > data.length) {
    throw new NdefFormatError('NDEF message is truncated', { offset, length });
  }
}

function readByte(data: Buffer, offset: number): number {
  ensureAvailable(data, offset, 1);
  return data[offset];
}

function take(data: Buffer, offset: number, length: number): Buffer {
  ensureAvailable(data, offset, length);
  return data.subarray(offset, offset + length);
}
