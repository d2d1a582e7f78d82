import { createHmac } from 'crypto';
import { InvalidSeedError } from '@shared/kernel/DomainError';

// 252 is the largest multiple of 6 below 256; bytes at or above it are
// discarded so every face keeps probability 1/6.
const UNBIASED_BYTE_LIMIT = 252;

export class SeededDice {
  static assertSeed(seed: string): void {
    if (seed.trim().length === 0) {
      throw new InvalidSeedError('Seed must be non-empty');
    }
  }

  static digest(seed: string, stream: number, nonce: number): Buffer {
    return createHmac('sha512', seed).update(`${stream}:${nonce}`).digest();
  }

  /**
   * Returns the two faces for roll `nonce` of `stream`. The digest of a
   * single nonce yields 64 bytes; when rejection sampling runs past them
   * the derivation continues with `nonce:k` sub-digests.
   */
  static faces(seed: string, stream: number, nonce: number): [number, number] {
    const faces: number[] = [];
    let block = 0;

    while (faces.length < 2) {
      const bytes =
        block === 0
          ? SeededDice.digest(seed, stream, nonce)
          : createHmac('sha512', seed).update(`${stream}:${nonce}:${block}`).digest();

      for (const byte of bytes) {
        if (byte >= UNBIASED_BYTE_LIMIT) continue;
        faces.push((byte % 6) + 1);
        if (faces.length === 2) break;
      }
      block++;
    }

    return [faces[0], faces[1]];
  }
}
