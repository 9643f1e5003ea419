import { randomBytes } from 'crypto';
import type { CollisionOutcome } from '../../../shared/types/handover';
import { NdefFormatError } from '../../errors';

export const NONCE_LENGTH = 2;

export function generateNonce(): Buffer {
  return randomBytes(NONCE_LENGTH);
}

function toValue(nonce: Uint8Array, side: string): number {
  if (nonce.length !== NONCE_LENGTH) {
    throw new NdefFormatError(`Collision nonce must be ${NONCE_LENGTH} bytes`, {
      side,
      length: nonce.length,
    });
  }
  return (nonce[0] << 8) | nonce[1];
}

/**
 * Two-party leader election on the published nonces, compared as big-endian unsigned
 * 16-bit values. The smaller nonce keeps listening as server; equal nonces are a draw and
 * both sides have to republish.
 */
export function resolveCollision(local: Uint8Array, remote: Uint8Array): CollisionOutcome {
  const mine = toValue(local, 'local');
  const theirs = toValue(remote, 'remote');
  if (mine === theirs) {
    return 'draw';
  }
  return mine < theirs ? 'server' : 'client';
}
