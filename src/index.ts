/**
 * ISAAC engine public API
 *
 * @module isaac
 */

import { Isaac32, Isaac64 } from './isaac/engines.js';
import { SeedSequence } from './isaac/seed-seq.js';
import { ISAAC_PRESETS } from './isaac/types.js';
import type { IsaacOptions, IsaacSeed } from './isaac/types.js';

export type {
    Word,
    WordArray,
    IsaacState,
    IsaacVariant,
    IsaacVariantId,
    IsaacSeed,
    IsaacOptions,
    IsaacPreset,
    IsaacLogger as Logger,
    SeedSource,
    CheckpointOptions,
} from './isaac/types.js';
export { ISAAC_PRESETS, MIN_ALPHA, MAX_ALPHA } from './isaac/types.js';
export {
    IsaacError,
    MalformedStateError,
    EmptySeedRangeError,
    InvalidWordError,
    ConfigurationError,
    IntegrityError,
    IncompleteDataError,
} from './isaac/errors.js';
export { IsaacEngine } from './isaac/engine.js';
export { Isaac32, Isaac64 } from './isaac/engines.js';
export { Isaac32Variant } from './isaac/variant32.js';
export { Isaac64Variant } from './isaac/variant64.js';
export { SeedSequence } from './isaac/seed-seq.js';
export { stateFieldCount } from './isaac/state-text.js';

// The ISAAC Namespace Object
export const ISAAC = {
    /**
     * Creates a 32-bit engine.
     */
    create32: (seed?: IsaacSeed<number>, options?: IsaacOptions): Isaac32 => new Isaac32(seed, options),

    /**
     * Creates a 64-bit engine.
     */
    create64: (seed?: IsaacSeed<bigint>, options?: IsaacOptions): Isaac64 => new Isaac64(seed, options),

    /**
     * Builds a seed source from a few entropy integers.
     */
    seedSequence: (...entropy: number[]): SeedSequence => new SeedSequence(entropy),

    Isaac32,
    Isaac64,
    SeedSequence,

    /**
     * Named alpha presets.
     */
    presets: ISAAC_PRESETS,
};

export default ISAAC;
