/**
 * Shared helpers for the ISAAC engines: option resolution and little-endian
 * word packing.
 */
import { ConfigurationError, MalformedStateError } from './isaac/errors.js';
import { ISAAC_PRESETS, MAX_ALPHA, MIN_ALPHA } from './isaac/types.js';
import type { IsaacOptions, IsaacVariant, ResolvedIsaacOptions, Word, WordArray } from './isaac/types.js';

/**
 * Merge user options over the defaults. `alpha` wins over `preset`.
 */
export function resolveOptions(options: IsaacOptions = {}): ResolvedIsaacOptions {
    const preset = options.preset ?? 'secure';
    if (!Object.prototype.hasOwnProperty.call(ISAAC_PRESETS, preset)) {
        throw new ConfigurationError(`Unknown preset: ${String(preset)}`);
    }
    const alpha = options.alpha ?? ISAAC_PRESETS[preset].alpha;
    if (!Number.isInteger(alpha) || alpha < MIN_ALPHA || alpha > MAX_ALPHA) {
        throw new ConfigurationError(`alpha must be an integer in [${MIN_ALPHA}, ${MAX_ALPHA}], got ${alpha}`);
    }
    return { alpha, logger: options.logger ?? null };
}

/**
 * Pack words into little-endian bytes, `variant.wordBytes` per word.
 */
export function packWords<W extends Word>(variant: IsaacVariant<W>, words: ArrayLike<W>): Uint8Array {
    const bytes = new Uint8Array(words.length * variant.wordBytes);
    const view = new DataView(bytes.buffer);
    for (let i = 0; i < words.length; i++) {
        variant.writeWord(view, i * variant.wordBytes, words[i]);
    }
    return bytes;
}

/**
 * Unpack little-endian bytes written by `packWords`. The byte length must hold
 * exactly `count` words.
 */
export function unpackWords<W extends Word>(variant: IsaacVariant<W>, bytes: Uint8Array, count: number, label: string): WordArray<W> {
    if (bytes.length !== count * variant.wordBytes) {
        throw new MalformedStateError(`${label}: expected ${count * variant.wordBytes} bytes, got ${bytes.length}`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const words = variant.allocate(count);
    for (let i = 0; i < count; i++) {
        words[i] = variant.readWord(view, i * variant.wordBytes);
    }
    return words;
}
