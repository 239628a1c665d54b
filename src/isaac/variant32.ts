import type { IsaacState, IsaacVariant, WordArray } from './types.js';

const MAX_WORD = 0xffffffff;
const MAX_ELEMENT = 0xffffffffffffffffn;

/**
 * 32-bit ISAAC. Words are JS numbers holding uint32 values. Locals are kept as
 * int32 (`| 0`) between steps, right shifts are always `>>>`, and every store
 * into state is normalized with `>>> 0`.
 */
export const Isaac32Variant: IsaacVariant<number> = {
    id: 'isaac32',
    wordBits: 32,
    wordBytes: 4,
    golden: 0x9e3779b9,
    zero: 0,
    max: MAX_WORD,

    allocate(size: number) {
        return new Uint32Array(size);
    },

    add(x: number, y: number) {
        return (x + y) >>> 0;
    },

    mix(r: WordArray<number>) {
        let a = r[0], b = r[1], c = r[2], d = r[3];
        let e = r[4], f = r[5], g = r[6], h = r[7];

        a ^= b << 11;  d = (d + a) | 0; b = (b + c) | 0;
        b ^= c >>> 2;  e = (e + b) | 0; c = (c + d) | 0;
        c ^= d << 8;   f = (f + c) | 0; d = (d + e) | 0;
        d ^= e >>> 16; g = (g + d) | 0; e = (e + f) | 0;
        e ^= f << 10;  h = (h + e) | 0; f = (f + g) | 0;
        f ^= g >>> 4;  a = (a + f) | 0; g = (g + h) | 0;
        g ^= h << 8;   b = (b + g) | 0; h = (h + a) | 0;
        h ^= a >>> 9;  c = (c + h) | 0; a = (a + b) | 0;

        r[0] = a >>> 0; r[1] = b >>> 0; r[2] = c >>> 0; r[3] = d >>> 0;
        r[4] = e >>> 0; r[5] = f >>> 0; r[6] = g >>> 0; r[7] = h >>> 0;
    },

    generate(state: IsaacState<number>, alpha: number) {
        const mem = state.memory;
        const res = state.results;
        const size = mem.length;
        const half = size >>> 1;
        const mask = size - 1;
        // indirect loads select a word by bits [2, 2 + alpha) of x and
        // [alpha + 2, 2 * alpha + 2) of y
        const shift = alpha + 2;

        state.c = (state.c + 1) >>> 0;
        let a = state.a | 0;
        let b = (state.b + state.c) | 0;

        // the partner index walks the opposite half: i + half, wrapping
        const step = (mixed: number, i: number): void => {
            const x = mem[i];
            a = (mixed + mem[(i + half) & mask]) | 0;
            const y = (mem[(x >>> 2) & mask] + a + b) | 0;
            mem[i] = y >>> 0;
            b = (mem[(y >>> shift) & mask] + x) | 0;
            res[i] = b >>> 0;
        };

        for (let i = 0; i < size; i += 4) {
            step(a ^ (a << 13), i);
            step(a ^ (a >>> 6), i + 1);
            step(a ^ (a << 2), i + 2);
            step(a ^ (a >>> 16), i + 3);
        }

        state.a = a >>> 0;
        state.b = b >>> 0;
    },

    isWord(value: unknown): value is number {
        return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_WORD;
    },

    fromSeedWord(value: number) {
        return value >>> 0;
    },

    fromSeedElement(value: unknown) {
        if (typeof value === 'bigint') {
            return value >= 0n && value <= MAX_ELEMENT ? Number(BigInt.asUintN(32, value)) : null;
        }
        return Isaac32Variant.isWord(value) ? value : null;
    },

    parse(token: string) {
        if (!/^\d+$/.test(token)) return null;
        const value = Number(token);
        return value <= MAX_WORD ? value : null;
    },

    readWord(view: DataView, offset: number) {
        return view.getUint32(offset, true);
    },

    writeWord(view: DataView, offset: number, value: number) {
        view.setUint32(offset, value, true);
    },
};
