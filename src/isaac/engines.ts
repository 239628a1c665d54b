import { IsaacEngine } from './engine.js';
import { Isaac32Variant } from './variant32.js';
import { Isaac64Variant } from './variant64.js';
import type { IsaacOptions, IsaacSeed } from './types.js';

/**
 * ISAAC with 32-bit words (`number` outputs in [0, 2^32)).
 *
 * ```ts
 * const rng = new Isaac32(42);
 * const word = rng.next();
 * ```
 */
export class Isaac32 extends IsaacEngine<number> {
    constructor(seed?: IsaacSeed<number>, options: IsaacOptions = {}) {
        super(Isaac32Variant, seed, options);
    }

    static min(): number {
        return Isaac32Variant.zero;
    }

    static max(): number {
        return Isaac32Variant.max;
    }

    clone(): Isaac32 {
        const copy = new Isaac32(undefined, { alpha: this.alpha, logger: this.logger });
        copy.copyFrom(this);
        return copy;
    }
}

/**
 * ISAAC-64 (`bigint` outputs in [0, 2^64)).
 */
export class Isaac64 extends IsaacEngine<bigint> {
    constructor(seed?: IsaacSeed<bigint>, options: IsaacOptions = {}) {
        super(Isaac64Variant, seed, options);
    }

    static min(): bigint {
        return Isaac64Variant.zero;
    }

    static max(): bigint {
        return Isaac64Variant.max;
    }

    clone(): Isaac64 {
        const copy = new Isaac64(undefined, { alpha: this.alpha, logger: this.logger });
        copy.copyFrom(this);
        return copy;
    }
}
