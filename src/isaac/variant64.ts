import type { IsaacState, IsaacVariant, WordArray } from './types.js';

const MAX_WORD = 0xffffffffffffffffn;

const u64 = (value: bigint): bigint => BigInt.asUintN(64, value);

/**
 * 64-bit ISAAC. Words are bigints kept in [0, 2^64); anything that can leave
 * that range (add, subtract, left shift, NOT) goes through `u64` before the
 * value is shifted right or stored.
 */
export const Isaac64Variant: IsaacVariant<bigint> = {
    id: 'isaac64',
    wordBits: 64,
    wordBytes: 8,
    golden: 0x9e3779b97f4a7c13n,
    zero: 0n,
    max: MAX_WORD,

    allocate(size: number) {
        return new BigUint64Array(size);
    },

    add(x: bigint, y: bigint) {
        return u64(x + y);
    },

    mix(r: WordArray<bigint>) {
        let a = r[0], b = r[1], c = r[2], d = r[3];
        let e = r[4], f = r[5], g = r[6], h = r[7];

        a = u64(a - e); f ^= h >> 9n;            h = u64(h + a);
        b = u64(b - f); g = u64(g ^ (a << 9n));  a = u64(a + b);
        c = u64(c - g); h ^= b >> 23n;           b = u64(b + c);
        d = u64(d - h); a = u64(a ^ (c << 15n)); c = u64(c + d);
        e = u64(e - a); b ^= d >> 14n;           d = u64(d + e);
        f = u64(f - b); c = u64(c ^ (e << 20n)); e = u64(e + f);
        g = u64(g - c); d ^= f >> 17n;           f = u64(f + g);
        h = u64(h - d); e = u64(e ^ (g << 14n)); g = u64(g + h);

        r[0] = a; r[1] = b; r[2] = c; r[3] = d;
        r[4] = e; r[5] = f; r[6] = g; r[7] = h;
    },

    generate(state: IsaacState<bigint>, alpha: number) {
        const mem = state.memory;
        const res = state.results;
        const size = mem.length;
        const half = size >>> 1;
        const mask = size - 1;
        const maskN = BigInt(mask);
        const shiftN = BigInt(alpha + 3);

        state.c = u64(state.c + 1n);
        let a = state.a;
        let b = u64(state.b + state.c);

        const step = (mixed: bigint, i: number): void => {
            const x = mem[i];
            a = u64(mixed + mem[(i + half) & mask]);
            const y = u64(mem[Number((x >> 3n) & maskN)] + a + b);
            mem[i] = y;
            b = u64(mem[Number((y >> shiftN) & maskN)] + x);
            res[i] = b;
        };

        for (let i = 0; i < size; i += 4) {
            step(~(a ^ (a << 21n)), i);
            step(a ^ (a >> 5n), i + 1);
            step(a ^ (a << 12n), i + 2);
            step(a ^ (a >> 33n), i + 3);
        }

        state.a = a;
        state.b = b;
    },

    isWord(value: unknown): value is bigint {
        return typeof value === 'bigint' && value >= 0n && value <= MAX_WORD;
    },

    fromSeedWord(value: number) {
        return BigInt(value >>> 0);
    },

    fromSeedElement(value: unknown) {
        if (typeof value === 'number') {
            return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : null;
        }
        return Isaac64Variant.isWord(value) ? value : null;
    },

    parse(token: string) {
        if (!/^\d+$/.test(token)) return null;
        const value = BigInt(token);
        return value <= MAX_WORD ? value : null;
    },

    readWord(view: DataView, offset: number) {
        return view.getBigUint64(offset, true);
    },

    writeWord(view: DataView, offset: number, value: bigint) {
        view.setBigUint64(offset, value, true);
    },
};
