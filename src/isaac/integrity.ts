import { createHash, timingSafeEqual } from 'node:crypto';

export const DIGEST_SIZE = 32;

/**
 * SHA-256 of a checkpoint body.
 */
export function digestOf(data: Uint8Array): Uint8Array {
    return new Uint8Array(createHash('sha256').update(data).digest());
}

export function sameDigest(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    return timingSafeEqual(a, b);
}
