/**
 * Binary checkpoints: [MessagePack body][SHA-256 digest].
 */
import { encode } from '@msgpack/msgpack';
import { Isaac32, Isaac64 } from '../src/isaac/engines.js';
import { IncompleteDataError, IntegrityError, MalformedStateError } from '../src/isaac/errors.js';
import { digestOf, sameDigest } from '../src/isaac/integrity.js';
import { recordingLogger, take } from './helpers/test-utils.js';

function withDigest(body: Uint8Array): Uint8Array {
    const out = new Uint8Array(body.length + 32);
    out.set(body, 0);
    out.set(digestOf(body), body.length);
    return out;
}

describe('checkpoints', () => {

    it('round-trips a 32-bit engine', () => {
        const rng = new Isaac32(2718);
        rng.discard(1000);
        const restored = new Isaac32();
        restored.restore(rng.checkpoint());
        expect(restored.equals(rng)).toBe(true);
        expect(take(restored, 20)).toEqual(take(rng, 20));
    });

    it('round-trips a 64-bit engine', () => {
        const rng = new Isaac64(2718n, { alpha: 4 });
        rng.discard(33);
        const restored = new Isaac64(0n, { alpha: 4 });
        restored.restore(rng.checkpoint());
        expect(restored.equals(rng)).toBe(true);
    });

    it('ends with the digest of its body', () => {
        const bytes = new Isaac32(1, { alpha: 3 }).checkpoint();
        const body = bytes.subarray(0, bytes.length - 32);
        expect(Array.from(bytes.subarray(bytes.length - 32))).toEqual(Array.from(digestOf(body)));
    });

    it('rejects a digest mismatch and keeps the previous state', () => {
        const bytes = new Isaac32(1, { alpha: 3 }).checkpoint();
        bytes[bytes.length - 1] ^= 0xff;
        const rng = new Isaac32(2, { alpha: 3 });
        expect(() => rng.restore(bytes)).toThrow(IntegrityError);
        expect(rng.equals(new Isaac32(2, { alpha: 3 }))).toBe(true);
    });

    it('restores despite a digest mismatch in warn mode', () => {
        const source = new Isaac32(1, { alpha: 3 });
        const bytes = source.checkpoint();
        bytes[bytes.length - 1] ^= 0xff;
        const logger = recordingLogger();
        const rng = new Isaac32(2, { alpha: 3 });
        rng.restore(bytes, { integrityMode: 'warn', logger });
        expect(rng.equals(source)).toBe(true);
        expect(logger.warnings).toEqual(['Checkpoint digest mismatch; restoring anyway (integrityMode=warn)']);
    });

    it('rejects a truncated checkpoint', () => {
        const bytes = new Isaac32(1, { alpha: 3 }).checkpoint();
        expect(() => new Isaac32(0, { alpha: 3 }).restore(bytes.subarray(0, 20))).toThrow(IncompleteDataError);
    });

    it('rejects a checkpoint of another alpha', () => {
        const bytes = new Isaac32(1, { alpha: 3 }).checkpoint();
        expect(() => new Isaac32(0, { alpha: 4 }).restore(bytes))
            .toThrow('Checkpoint holds isaac32 alpha=3, engine is isaac32 alpha=4');
    });

    it('rejects a checkpoint of another width', () => {
        const bytes = new Isaac64(1n, { alpha: 3 }).checkpoint();
        expect(() => new Isaac32(0, { alpha: 3 }).restore(bytes)).toThrow(MalformedStateError);
    });

    it('rejects a body that is not MessagePack', () => {
        const bytes = withDigest(Uint8Array.of(0xc1));
        expect(() => new Isaac32(0, { alpha: 3 }).restore(bytes)).toThrow(MalformedStateError);
    });

    it('rejects a body with missing fields', () => {
        const bytes = withDigest(encode({ format: 'isaac-checkpoint', version: 1 }));
        expect(() => new Isaac32(0, { alpha: 3 }).restore(bytes)).toThrow('Checkpoint body is missing fields');
    });

    it('rejects word arrays of the wrong length', () => {
        const bytes = withDigest(encode({
            format: 'isaac-checkpoint',
            version: 1,
            variant: 'isaac32',
            alpha: 3,
            count: 8,
            results: new Uint8Array(32),
            memory: new Uint8Array(28),
            registers: new Uint8Array(12),
        }));
        expect(() => new Isaac32(0, { alpha: 3 }).restore(bytes)).toThrow('memory: expected 32 bytes, got 28');
    });

    it('rejects a cursor beyond the state size', () => {
        const bytes = withDigest(encode({
            format: 'isaac-checkpoint',
            version: 1,
            variant: 'isaac32',
            alpha: 3,
            count: 9,
            results: new Uint8Array(32),
            memory: new Uint8Array(32),
            registers: new Uint8Array(12),
        }));
        expect(() => new Isaac32(0, { alpha: 3 }).restore(bytes)).toThrow('Checkpoint count 9 outside [0, 8]');
    });

    it('reports rejections through the engine logger', () => {
        const logger = recordingLogger();
        const rng = new Isaac32(0, { alpha: 3, logger });
        expect(() => rng.restore(new Uint8Array(8))).toThrow(IncompleteDataError);
        expect(logger.warnings).toEqual(['isaac32: rejected checkpoint: Checkpoint truncated: 8 bytes']);
    });
});

describe('sameDigest()', () => {
    const digest = digestOf(Uint8Array.of(1, 2, 3));

    it('accepts an identical digest', () => {
        expect(sameDigest(digest, digestOf(Uint8Array.of(1, 2, 3)))).toBe(true);
    });

    it('rejects a digest differing in the last byte', () => {
        const other = digest.slice();
        other[31] ^= 1;
        expect(sameDigest(digest, other)).toBe(false);
    });

    it('rejects a digest of another length', () => {
        expect(sameDigest(digest, digest.subarray(0, 16))).toBe(false);
    });
});
