import { InvalidWordError } from './errors.js';
import type { SeedSource } from './types.js';

const INITIAL_FILL = 0x8b8b8b8b;
const MULT_ABSORB = 1664525;
const MULT_MIX = 1566083941;

const tempering = (x: number): number => (x ^ (x >>> 27)) >>> 0;

/**
 * SeedSequence — expands a short list of 32-bit entropy values into as many
 * well-mixed seed words as the target holds.
 *
 * Produces the same words as the standard seed-sequence procedure
 * (initial fill 0x8b8b8b8b, absorb with multiplier 1664525, then mix with
 * 1566083941), so seed material is portable between implementations.
 */
export class SeedSequence implements SeedSource {
    private readonly entropy: Uint32Array;

    /**
     * @param entropy - integers; each is reduced modulo 2^32
     */
    constructor(entropy: Iterable<number> = []) {
        const values: number[] = [];
        for (const value of entropy) {
            if (!Number.isInteger(value)) {
                throw new InvalidWordError(`Seed entropy must be integers, got ${String(value)}`);
            }
            values.push(value >>> 0);
        }
        this.entropy = Uint32Array.from(values);
    }

    get size(): number {
        return this.entropy.length;
    }

    param(): number[] {
        return Array.from(this.entropy);
    }

    generate(target: Uint32Array): void {
        const n = target.length;
        if (n === 0) return;

        const v = this.entropy;
        const s = v.length;
        target.fill(INITIAL_FILL);

        const t = n >= 623 ? 11 : n >= 68 ? 7 : n >= 39 ? 5 : n >= 7 ? 3 : (n - 1) >>> 1;
        const p = (n - t) >>> 1;
        const q = p + t;
        const m = Math.max(s + 1, n);

        for (let k = 0; k < m; k++) {
            const kn = k % n;
            const kp = (k + p) % n;
            const kq = (k + q) % n;
            const r1 = Math.imul(MULT_ABSORB, tempering(target[kn] ^ target[kp] ^ target[(k + n - 1) % n])) >>> 0;
            const extra = k === 0 ? s : k <= s ? kn + v[k - 1] : kn;
            const r2 = (r1 + extra) >>> 0;
            target[kp] += r1;
            target[kq] += r2;
            target[kn] = r2;
        }

        for (let k = m; k < m + n; k++) {
            const kn = k % n;
            const kp = (k + p) % n;
            const kq = (k + q) % n;
            const r3 = Math.imul(MULT_MIX, tempering((target[kn] + target[kp] + target[(k + n - 1) % n]) >>> 0)) >>> 0;
            const r4 = (r3 - kn) >>> 0;
            target[kp] ^= r3;
            target[kq] ^= r4;
            target[kn] = r4;
        }
    }
}
