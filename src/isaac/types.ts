export type IsaacLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
};

/** Unsigned machine word: `number` for 32-bit engines, `bigint` for 64-bit engines. */
export type Word = number | bigint;

/**
 * Fixed-length word storage. `Uint32Array` and `BigUint64Array` both satisfy it,
 * and both wrap stored values to the word width.
 */
export interface WordArray<W extends Word> {
    readonly length: number;
    [index: number]: W;
    fill(value: W, start?: number, end?: number): this;
    set(array: ArrayLike<W>, offset?: number): void;
}

export type IsaacVariantId = 'isaac32' | 'isaac64';

/**
 * Mutable engine state. `count` is the number of unconsumed words left at the
 * front of `results`; words are handed out from the back.
 */
export interface IsaacState<W extends Word> {
    readonly results: WordArray<W>;
    readonly memory: WordArray<W>;
    a: W;
    b: W;
    c: W;
    count: number;
}

/**
 * Word-width specific half of the generator. The engine scaffold owns the
 * state and calls into the variant for everything that depends on the width.
 */
export interface IsaacVariant<W extends Word> {
    readonly id: IsaacVariantId;
    readonly wordBits: 32 | 64;
    readonly wordBytes: 4 | 8;
    /** Golden ratio, used only to prime the registers during initialization. */
    readonly golden: W;
    readonly zero: W;
    readonly max: W;

    allocate(size: number): WordArray<W>;
    /** Addition modulo 2^wordBits. */
    add(x: W, y: W): W;
    /** Scrambles eight registers in place. */
    mix(registers: WordArray<W>): void;
    /**
     * Runs one generation pass: refills `state.results`, rewrites
     * `state.memory` and advances `a`, `b`, `c`. Leaves `count` alone.
     */
    generate(state: IsaacState<W>, alpha: number): void;

    isWord(value: unknown): value is W;
    /** Widens a 32-bit word produced by a seed source. */
    fromSeedWord(value: number): W;
    /**
     * Converts one element of a seed range, which may be of either word type,
     * to this width. Wider values are reduced modulo 2^wordBits. Null when the
     * element is not an unsigned integer of at most 64 bits.
     */
    fromSeedElement(value: unknown): W | null;
    /** Parses an unsigned decimal token; null when it is not a word. */
    parse(token: string): W | null;
    readWord(view: DataView, offset: number): W;
    writeWord(view: DataView, offset: number, value: W): void;
}

/**
 * Entropy-expanding seed source. `generate` must fill the whole target; the
 * engine always hands it a buffer of exactly `stateSize` words.
 */
export interface SeedSource {
    generate(target: Uint32Array): void;
}

/**
 * A single word, a seed source, or a finite re-iterable sequence of unsigned
 * integers of either word type.
 */
export type IsaacSeed<W extends Word> = W | SeedSource | Iterable<Word>;

/**
 * Named alpha choices.
 *
 * - `secure`: 256-word state, the size the algorithm was published with (default)
 * - `compact`: 16-word state, for simulations that don't need the larger state
 */
export type IsaacPreset = 'secure' | 'compact';

export const ISAAC_PRESETS: Record<IsaacPreset, { alpha: number }> = {
    secure:  { alpha: 8 },
    compact: { alpha: 4 },
};

export const MIN_ALPHA = 3;
export const MAX_ALPHA = 16;

export type IsaacOptions = {
    /** Alpha preset. Ignored when `alpha` is also set. Default: `secure`. */
    preset?: IsaacPreset;
    /** State size exponent (3-16); the state holds 2^alpha words. */
    alpha?: number;
    /** Optional logger hook; src/ never writes to the console itself. */
    logger?: IsaacLogger | null;
};

export type ResolvedIsaacOptions = {
    alpha: number;
    logger: IsaacLogger | null;
};

export type CheckpointOptions = {
    /**
     * Digest verification mode.
     * - 'strict' (default): throw IntegrityError on digest mismatch
     * - 'warn': log a warning and restore anyway
     */
    integrityMode?: 'strict' | 'warn';
    /** Overrides the engine's logger for this restore. */
    logger?: IsaacLogger | null;
};
