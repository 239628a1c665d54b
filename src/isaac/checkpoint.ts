/**
 * Binary checkpoints.
 *
 * Layout: [MessagePack body][SHA-256 of body (32 bytes)]
 *
 * The body is a map with `format`, `version`, `variant`, `alpha`, `count` and
 * three byte fields holding little-endian words: `results`, `memory` and
 * `registers` (a, b, c).
 */
import { decode, encode } from '@msgpack/msgpack';
import { packWords, unpackWords } from '../isaac-utils.js';
import { IncompleteDataError, IntegrityError, MalformedStateError } from './errors.js';
import { DIGEST_SIZE, digestOf, sameDigest } from './integrity.js';
import type { CheckpointOptions, IsaacState, IsaacVariant, Word } from './types.js';

export const CHECKPOINT_FORMAT = 'isaac-checkpoint';
export const CHECKPOINT_VERSION = 1;

interface CheckpointRecord {
    format: string;
    version: number;
    variant: string;
    alpha: number;
    count: number;
    results: Uint8Array;
    memory: Uint8Array;
    registers: Uint8Array;
}

function isCheckpointRecord(value: unknown): value is CheckpointRecord {
    return typeof value === 'object' && value !== null
        && 'format' in value && typeof value.format === 'string'
        && 'version' in value && typeof value.version === 'number'
        && 'variant' in value && typeof value.variant === 'string'
        && 'alpha' in value && typeof value.alpha === 'number'
        && 'count' in value && typeof value.count === 'number'
        && 'results' in value && value.results instanceof Uint8Array
        && 'memory' in value && value.memory instanceof Uint8Array
        && 'registers' in value && value.registers instanceof Uint8Array;
}

export function encodeCheckpoint<W extends Word>(variant: IsaacVariant<W>, alpha: number, state: IsaacState<W>): Uint8Array {
    const body = encode({
        format: CHECKPOINT_FORMAT,
        version: CHECKPOINT_VERSION,
        variant: variant.id,
        alpha,
        count: state.count,
        results: packWords(variant, state.results),
        memory: packWords(variant, state.memory),
        registers: packWords(variant, [state.a, state.b, state.c]),
    });

    const out = new Uint8Array(body.length + DIGEST_SIZE);
    out.set(body, 0);
    out.set(digestOf(body), body.length);
    return out;
}

export function decodeCheckpoint<W extends Word>(
    variant: IsaacVariant<W>,
    alpha: number,
    bytes: Uint8Array,
    options: Required<CheckpointOptions>,
): IsaacState<W> {
    if (bytes.length <= DIGEST_SIZE) {
        throw new IncompleteDataError(`Checkpoint truncated: ${bytes.length} bytes`);
    }
    const body = bytes.subarray(0, bytes.length - DIGEST_SIZE);
    const digest = bytes.subarray(bytes.length - DIGEST_SIZE);
    if (!sameDigest(digestOf(body), digest)) {
        if (options.integrityMode === 'strict') {
            throw new IntegrityError('Checkpoint digest mismatch');
        }
        options.logger?.warn?.('Checkpoint digest mismatch; restoring anyway (integrityMode=warn)');
    }

    let payload: unknown;
    try {
        payload = decode(body);
    } catch (err) {
        throw new MalformedStateError(`Checkpoint body is not MessagePack: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isCheckpointRecord(payload)) {
        throw new MalformedStateError('Checkpoint body is missing fields');
    }
    if (payload.format !== CHECKPOINT_FORMAT || payload.version !== CHECKPOINT_VERSION) {
        throw new MalformedStateError(`Unsupported checkpoint: ${payload.format} v${payload.version}`);
    }
    if (payload.variant !== variant.id || payload.alpha !== alpha) {
        throw new MalformedStateError(`Checkpoint holds ${payload.variant} alpha=${payload.alpha}, engine is ${variant.id} alpha=${alpha}`);
    }

    const stateSize = 1 << alpha;
    if (!Number.isInteger(payload.count) || payload.count < 0 || payload.count > stateSize) {
        throw new MalformedStateError(`Checkpoint count ${payload.count} outside [0, ${stateSize}]`);
    }
    const registers = unpackWords(variant, payload.registers, 3, 'registers');

    return {
        results: unpackWords(variant, payload.results, stateSize, 'results'),
        memory: unpackWords(variant, payload.memory, stateSize, 'memory'),
        a: registers[0],
        b: registers[1],
        c: registers[2],
        count: payload.count,
    };
}
