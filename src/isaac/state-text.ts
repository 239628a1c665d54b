/**
 * Text form of an engine state:
 *
 *   count results[0..N) memory[0..N) a b c
 *
 * All fields unsigned decimal, separated by whitespace (single spaces on
 * output). 1 + 2N + 3 fields, no header and no version.
 */
import { MalformedStateError } from './errors.js';
import type { IsaacState, IsaacVariant, Word } from './types.js';

export function stateFieldCount(stateSize: number): number {
    return 1 + 2 * stateSize + 3;
}

export function encodeStateText<W extends Word>(state: IsaacState<W>): string {
    const fields: string[] = [String(state.count)];
    for (let i = 0; i < state.results.length; i++) fields.push(String(state.results[i]));
    for (let i = 0; i < state.memory.length; i++) fields.push(String(state.memory[i]));
    fields.push(String(state.a), String(state.b), String(state.c));
    return fields.join(' ');
}

class FieldReader<W extends Word> {
    private pos = 0;

    constructor(
        private readonly variant: IsaacVariant<W>,
        private readonly tokens: string[],
    ) { }

    word(label: string): W {
        const token = this.take(label);
        const value = this.variant.parse(token);
        if (value === null) {
            throw new MalformedStateError(`Field ${this.pos - 1} (${label}): '${token}' is not an unsigned ${this.variant.wordBits}-bit decimal`);
        }
        return value;
    }

    count(stateSize: number): number {
        const token = this.take('count');
        if (!/^\d+$/.test(token) || Number(token) > stateSize) {
            throw new MalformedStateError(`Field 0 (count): '${token}' is not a cursor in [0, ${stateSize}]`);
        }
        return Number(token);
    }

    finish(): void {
        if (this.pos !== this.tokens.length) {
            throw new MalformedStateError(`Unexpected trailing data: ${this.tokens.length - this.pos} extra field(s)`);
        }
    }

    private take(label: string): string {
        if (this.pos >= this.tokens.length) {
            throw new MalformedStateError(`State text truncated: missing field ${this.pos} (${label})`);
        }
        return this.tokens[this.pos++];
    }
}

/**
 * Parse into fresh arrays. Nothing is returned unless every field parsed,
 * so callers can commit the result wholesale.
 */
export function decodeStateText<W extends Word>(variant: IsaacVariant<W>, stateSize: number, text: string): IsaacState<W> {
    const trimmed = text.trim();
    const reader = new FieldReader(variant, trimmed === '' ? [] : trimmed.split(/\s+/));

    const count = reader.count(stateSize);
    const results = variant.allocate(stateSize);
    for (let i = 0; i < stateSize; i++) results[i] = reader.word(`results[${i}]`);
    const memory = variant.allocate(stateSize);
    for (let i = 0; i < stateSize; i++) memory[i] = reader.word(`memory[${i}]`);
    const a = reader.word('a');
    const b = reader.word('b');
    const c = reader.word('c');
    reader.finish();

    return { results, memory, a, b, c, count };
}
