/**
 * 32-bit ISAAC against reference outputs.
 *
 * The 512th word for the all-zero seed is 0xf650e4c8: the first word of the
 * second batch, i.e. the first word of the published ISAAC test vector.
 */
// NOTE: Vitest globals are enabled (see vitest.config.ts).
import { Isaac32 } from '../src/isaac/engines.js';
import { Isaac32Variant } from '../src/isaac/variant32.js';
import { take } from './helpers/test-utils.js';

describe('Isaac32', () => {

    describe('default alpha (8)', () => {
        it('produces the reference words for the zero seed', () => {
            const rng = new Isaac32();
            expect(take(rng, 6)).toEqual([405143795, 806046349, 807101986, 2961886497, 695195257, 2572289769]);
        });

        it('reaches the published test vector at output 512', () => {
            const rng = new Isaac32(0);
            rng.discard(511);
            expect(rng.next()).toBe(0xf650e4c8);
        });

        it('regenerates on output 257', () => {
            const rng = new Isaac32();
            rng.discard(256);
            expect(rng.next()).toBe(2053665039);
        });

        it('matches the reference for seeds 1234 and 1235', () => {
            expect(take(new Isaac32(1234), 3)).toEqual([2678892859, 3200587252, 482208129]);
            expect(take(new Isaac32(1235), 3)).toEqual([1069813420, 3646583203, 1097898268]);
        });
    });

    describe('smaller states', () => {
        it('alpha 4, seed 0', () => {
            const rng = new Isaac32(0, { alpha: 4 });
            expect(take(rng, 5)).toEqual([2737393670, 1162241970, 2323483827, 1967608246, 1882290365]);
        });

        it('alpha 4, seed 1234', () => {
            const rng = new Isaac32(1234, { preset: 'compact' });
            expect(take(rng, 5)).toEqual([3826045756, 1560081856, 1208119954, 786748967, 2804634837]);
        });

        it('alpha 3 serves a batch back to front, then regenerates', () => {
            const rng = new Isaac32(0, { alpha: 3 });
            expect(take(rng, 10)).toEqual([
                2986504015, 1139769319, 2962471956, 192152866, 2487842070,
                274217315, 2500037610, 2435785722, 632428692, 1768396012,
            ]);
        });
    });

    describe('Isaac32Variant', () => {
        it('mixes eight registers like the reference network', () => {
            const registers = Uint32Array.of(1, 2, 3, 4, 5, 6, 7, 8);
            Isaac32Variant.mix(registers);
            expect(Array.from(registers)).toEqual([75059553, 73997627, 1080327780, 4111, 1078209816, 1057829, 73997622, 1079273820]);
        });

        it('adds modulo 2^32', () => {
            expect(Isaac32Variant.add(0xffffffff, 2)).toBe(1);
        });

        it('parses only in-range unsigned decimals', () => {
            expect(Isaac32Variant.parse('4294967295')).toBe(4294967295);
            expect(Isaac32Variant.parse('007')).toBe(7);
            expect(Isaac32Variant.parse('4294967296')).toBeNull();
            expect(Isaac32Variant.parse('-1')).toBeNull();
            expect(Isaac32Variant.parse('1e3')).toBeNull();
        });

        it('recognises words', () => {
            expect(Isaac32Variant.isWord(0)).toBe(true);
            expect(Isaac32Variant.isWord(0xffffffff)).toBe(true);
            expect(Isaac32Variant.isWord(-1)).toBe(false);
            expect(Isaac32Variant.isWord(0.5)).toBe(false);
            expect(Isaac32Variant.isWord(1n)).toBe(false);
        });

        it('converts seed range elements of either word type', () => {
            expect(Isaac32Variant.fromSeedElement(7)).toBe(7);
            expect(Isaac32Variant.fromSeedElement(7n)).toBe(7);
            expect(Isaac32Variant.fromSeedElement(0x1_0000_0005n)).toBe(5);
            expect(Isaac32Variant.fromSeedElement(0xffffffffffffffffn)).toBe(0xffffffff);
            expect(Isaac32Variant.fromSeedElement(0x1_0000_0000_0000_0000n)).toBeNull();
            expect(Isaac32Variant.fromSeedElement(-1n)).toBeNull();
            expect(Isaac32Variant.fromSeedElement(2 ** 32)).toBeNull();
            expect(Isaac32Variant.fromSeedElement('7')).toBeNull();
        });
    });

    it('exposes the word bounds', () => {
        expect(Isaac32.min()).toBe(0);
        expect(Isaac32.max()).toBe(4294967295);
        const rng = new Isaac32();
        expect(rng.minimum).toBe(0);
        expect(rng.maximum).toBe(4294967295);
    });
});
