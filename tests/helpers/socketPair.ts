import { Duplex } from 'stream';

/**
 * One end of an in-process pipe. Unlike a PassThrough, destroying one end still lets
 * the other end read what was already written, the way a closed TCP socket does.
 */
export class PairEnd extends Duplex {
  private peer: PairEnd | null = null;
  private peerEnded = false;
  readonly written: Buffer[] = [];

  link(peer: PairEnd): void {
    this.peer = peer;
  }

  _read(): void {
    // Data is pushed by the peer.
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const peer = this.peer;
    if (!peer || peer.destroyed || this.peerEnded) {
      callback(new Error('Peer is closed'));
      return;
    }
    this.written.push(Buffer.from(chunk));
    peer.push(chunk);
    callback();
  }

  _final(callback: (error?: Error | null) => void): void {
    this.endPeer();
    callback();
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.endPeer();
    callback(error);
  }

  private endPeer(): void {
    if (this.peer && !this.peerEnded && !this.peer.destroyed) {
      this.peerEnded = true;
      this.peer.push(null);
    }
  }
}

export function createSocketPair(): [PairEnd, PairEnd] {
  const left = new PairEnd();
  const right = new PairEnd();
  left.link(right);
  right.link(left);
  return [left, right];
}
