import type { Readable } from 'stream';
import { ExchangeProtocolError, TransportError } from '../errors';

export const HANDOVER_VERSION = 0x19;
export const FRAME_HEADER_LENGTH = 5;

/**
 * `[u8 version][i32 big-endian length][payload]`. A missing payload is sent as a
 * zero-length frame.
 */
export function encodeFrame(payload: Uint8Array | null): Buffer {
  const body = payload ?? Buffer.alloc(0);
  const header = Buffer.alloc(FRAME_HEADER_LENGTH);
  header.writeUInt8(HANDOVER_VERSION, 0);
  header.writeInt32BE(body.length, 1);
  return Buffer.concat([header, body]);
}

/**
 * Incremental decoder for exactly one frame; tolerates the frame arriving in any number
 * of chunks.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private payloadLength: number | null = null;
  private done = false;

  get isComplete(): boolean {
    return this.done;
  }

  /**
   * Returns the payload once the frame is complete, otherwise null. Bytes past the end
   * of the frame are left unread.
   */
  push(chunk: Uint8Array): Buffer | null {
    if (this.done) {
      throw new ExchangeProtocolError('Frame already decoded');
    }
    this.buffer = Buffer.concat([this.buffer, chunk]);

    if (this.buffer.length >= 1 && this.buffer[0] !== HANDOVER_VERSION) {
      throw new ExchangeProtocolError('Bad handover protocol version.', {
        version: this.buffer[0],
      });
    }

    if (this.payloadLength === null) {
      if (this.buffer.length < FRAME_HEADER_LENGTH) {
        return null;
      }
      const length = this.buffer.readInt32BE(1);
      if (length < 0) {
        throw new ExchangeProtocolError('Negative frame length', { length });
      }
      this.payloadLength = length;
    }

    const end = FRAME_HEADER_LENGTH + this.payloadLength;
    if (this.buffer.length < end) {
      return null;
    }

    this.done = true;
    const payload = Buffer.from(this.buffer.subarray(FRAME_HEADER_LENGTH, end));
    this.buffer = Buffer.alloc(0);
    return payload;
  }
}

/**
 * Reads exactly one frame from a stream without ending or destroying it, so the write
 * direction sharing the socket is unaffected.
 */
export function readFrame(input: Readable): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const decoder = new FrameDecoder();

    const cleanup = () => {
      input.removeListener('data', onData);
      input.removeListener('end', onEnd);
      input.removeListener('close', onEnd);
      input.removeListener('error', onError);
    };

    const onData = (chunk: Buffer) => {
      let payload: Buffer | null;
      try {
        payload = decoder.push(chunk);
      } catch (error) {
        cleanup();
        input.pause();
        reject(error);
        return;
      }
      if (payload) {
        cleanup();
        input.pause();
        resolve(payload);
      }
    };

    const onEnd = () => {
      cleanup();
      reject(new TransportError('Stream ended before a full frame was read'));
    };

    const onError = (error: Error) => {
      cleanup();
      reject(
        new TransportError('Stream failed while reading a frame', undefined, { cause: error })
      );
    };

    if (input.destroyed || input.readableEnded) {
      reject(new TransportError('Stream is already closed'));
      return;
    }

    input.on('data', onData);
    input.once('end', onEnd);
    input.once('close', onEnd);
    input.once('error', onError);
  });
}
