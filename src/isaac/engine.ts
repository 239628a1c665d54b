import { resolveOptions } from '../isaac-utils.js';
import { EmptySeedRangeError, InvalidWordError } from './errors.js';
import { decodeStateText, encodeStateText } from './state-text.js';
import { decodeCheckpoint, encodeCheckpoint } from './checkpoint.js';
import type {
    CheckpointOptions,
    IsaacLogger,
    IsaacOptions,
    IsaacSeed,
    IsaacState,
    IsaacVariant,
    SeedSource,
    Word,
    WordArray,
} from './types.js';

/** Registers warmed up by the mixing network before any seed is absorbed. */
const REGISTER_COUNT = 8;
const WARMUP_ROUNDS = 4;

function isSeedSource(value: unknown): value is SeedSource {
    return typeof value === 'object' && value !== null
        && 'generate' in value && typeof value.generate === 'function';
}

function isIterable(value: unknown): value is Iterable<unknown> {
    return typeof value === 'object' && value !== null
        && typeof Reflect.get(value, Symbol.iterator) === 'function';
}

/**
 * IsaacEngine: state owner shared by both word widths.
 *
 * The engine serves one word per `next()` call from its output buffer, last
 * slot first, and asks the variant for a fresh batch when the buffer runs dry.
 * All width-specific arithmetic lives in the injected variant.
 */
export abstract class IsaacEngine<W extends Word> {
    readonly alpha: number;
    readonly stateSize: number;
    readonly variant: IsaacVariant<W>;
    protected readonly logger: IsaacLogger | null;
    private readonly state: IsaacState<W>;

    protected constructor(variant: IsaacVariant<W>, seed: IsaacSeed<W> | undefined, options: IsaacOptions) {
        const resolved = resolveOptions(options);
        this.variant = variant;
        this.alpha = resolved.alpha;
        this.logger = resolved.logger;
        this.stateSize = 1 << this.alpha;
        this.state = {
            results: variant.allocate(this.stateSize),
            memory: variant.allocate(this.stateSize),
            a: variant.zero,
            b: variant.zero,
            c: variant.zero,
            count: 0,
        };
        this.seed(seed);
    }

    get minimum(): W {
        return this.variant.zero;
    }

    get maximum(): W {
        return this.variant.max;
    }

    /**
     * Reinitializes the engine from a single word (default zero), a seed source,
     * or an iterable of unsigned integers (`number` or `bigint`, converted to
     * the word width). An iterable shorter than the state is restarted from its
     * beginning until the state is full.
     */
    seed(source?: IsaacSeed<W>): void {
        if (source === undefined) {
            this.seedFromWord(this.variant.zero);
        } else if (this.variant.isWord(source)) {
            this.seedFromWord(source);
        } else if (isSeedSource(source)) {
            this.seedFromSource(source);
        } else if (isIterable(source)) {
            this.seedFromIterable(source);
        } else {
            throw new InvalidWordError(`${this.variant.id}: seed ${String(source)} is not an unsigned ${this.variant.wordBits}-bit word`);
        }
    }

    next(): W {
        const s = this.state;
        if (s.count === 0) {
            this.variant.generate(s, this.alpha);
            s.count = this.stateSize;
        }
        s.count--;
        return s.results[s.count];
    }

    /**
     * Advances the engine by `n` words. Equivalent to `n` calls to `next()`;
     * whole batches are stepped over without reading them.
     */
    discard(n: number): void {
        if (!Number.isSafeInteger(n) || n < 0) {
            throw new RangeError(`discard count must be a non-negative integer, got ${n}`);
        }
        const s = this.state;
        let remaining = n;
        while (remaining > 0) {
            if (s.count === 0) {
                this.variant.generate(s, this.alpha);
                s.count = this.stateSize;
            }
            const taken = Math.min(remaining, s.count);
            s.count -= taken;
            remaining -= taken;
        }
    }

    /**
     * Writes consecutive outputs into `target`, first output at index 0.
     */
    fill(target: WordArray<W>): void {
        for (let i = 0; i < target.length; i++) {
            target[i] = this.next();
        }
    }

    equals(other: IsaacEngine<W>): boolean {
        if (other.variant.id !== this.variant.id || other.alpha !== this.alpha) return false;
        const x = this.state;
        const y = other.state;
        if (x.a !== y.a || x.b !== y.b || x.c !== y.c || x.count !== y.count) return false;
        for (let i = 0; i < this.stateSize; i++) {
            if (x.results[i] !== y.results[i] || x.memory[i] !== y.memory[i]) return false;
        }
        return true;
    }

    abstract clone(): IsaacEngine<W>;

    /**
     * Text form: `count results... memory... a b c`, decimal, space separated.
     */
    serialize(): string {
        return encodeStateText(this.state);
    }

    /**
     * Replaces the state with one read by `serialize()`. Throws
     * MalformedStateError and leaves the engine untouched on bad input.
     */
    deserialize(text: string): void {
        try {
            this.commit(decodeStateText(this.variant, this.stateSize, text));
        } catch (err) {
            this.logger?.warn?.(`${this.variant.id}: rejected serialized state: ${err instanceof Error ? err.message : String(err)}`);
            throw err;
        }
    }

    /**
     * Binary snapshot of the state (MessagePack body + SHA-256 digest).
     */
    checkpoint(): Uint8Array {
        return encodeCheckpoint(this.variant, this.alpha, this.state);
    }

    restore(bytes: Uint8Array, options: CheckpointOptions = {}): void {
        const logger = options.logger ?? this.logger;
        try {
            this.commit(decodeCheckpoint(this.variant, this.alpha, bytes, {
                integrityMode: options.integrityMode ?? 'strict',
                logger,
            }));
        } catch (err) {
            logger?.warn?.(`${this.variant.id}: rejected checkpoint: ${err instanceof Error ? err.message : String(err)}`);
            throw err;
        }
    }

    protected copyFrom(other: IsaacEngine<W>): void {
        this.commit(other.state);
    }

    private commit(source: IsaacState<W>): void {
        const s = this.state;
        s.results.set(source.results);
        s.memory.set(source.memory);
        s.a = source.a;
        s.b = source.b;
        s.c = source.c;
        s.count = source.count;
    }

    private seedFromWord(word: W): void {
        this.state.results.fill(word);
        this.initialize();
    }

    private seedFromSource(source: SeedSource): void {
        const material = new Uint32Array(this.stateSize);
        source.generate(material);
        const results = this.state.results;
        for (let i = 0; i < this.stateSize; i++) {
            results[i] = this.variant.fromSeedWord(material[i]);
        }
        this.initialize();
    }

    private seedFromIterable(words: Iterable<unknown>): void {
        // staged so that a bad element can't leave a half-seeded engine behind
        const staged = this.variant.allocate(this.stateSize);
        let iterator = words[Symbol.iterator]();
        let filled = 0;
        let readThisPass = 0;
        let rangeLength = 0;

        while (filled < this.stateSize) {
            const step = iterator.next();
            if (step.done) {
                if (readThisPass === 0) {
                    throw new EmptySeedRangeError(rangeLength === 0
                        ? `${this.variant.id}: seed range is empty`
                        : `${this.variant.id}: seed range yielded nothing on restart; pass a re-iterable collection, not a one-shot iterator`);
                }
                if (rangeLength === 0) rangeLength = readThisPass;
                iterator = words[Symbol.iterator]();
                readThisPass = 0;
                continue;
            }
            const word = this.variant.fromSeedElement(step.value);
            if (word === null) {
                iterator.return?.();
                throw new InvalidWordError(`${this.variant.id}: seed range element ${filled} (${String(step.value)}) is not an unsigned integer`);
            }
            staged[filled++] = word;
            readThisPass++;
        }
        iterator.return?.();

        if (rangeLength > 0) {
            this.logger?.info?.(`${this.variant.id}: seed range of ${rangeLength} words repeated to fill ${this.stateSize}-word state`);
        }
        this.state.results.set(staged);
        this.initialize();
    }

    private initialize(): void {
        const v = this.variant;
        const s = this.state;
        const registers = v.allocate(REGISTER_COUNT).fill(v.golden);
        for (let i = 0; i < WARMUP_ROUNDS; i++) {
            v.mix(registers);
        }

        s.a = v.zero;
        s.b = v.zero;
        s.c = v.zero;

        this.absorb(registers, s.results);
        // second pass so every seed word reaches every memory word
        this.absorb(registers, s.memory);

        v.generate(s, this.alpha);
        s.count = this.stateSize;
    }

    private absorb(registers: WordArray<W>, source: WordArray<W>): void {
        const v = this.variant;
        const memory = this.state.memory;
        for (let i = 0; i < this.stateSize; i += REGISTER_COUNT) {
            for (let j = 0; j < REGISTER_COUNT; j++) {
                registers[j] = v.add(registers[j], source[i + j]);
            }
            v.mix(registers);
            memory.set(registers, i);
        }
    }
}
