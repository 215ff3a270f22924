import { ALPHABET_SIZE } from './format.js';
import { LimitExceededError } from './errors.js';

/**
 * Move-to-front recency list over the 256 byte values.
 *
 * Every symbol used is promoted to rank 0 and the symbols ahead of it move
 * back one place, so a symbol repeated immediately always encodes as 0.
 * A position table mirrors the list so encode finds a rank without scanning.
 */
export class RecencyList {
    private readonly symbols = new Uint8Array(ALPHABET_SIZE);
    private readonly positions = new Uint16Array(ALPHABET_SIZE);

    constructor() {
        for (let i = 0; i < ALPHABET_SIZE; i++) {
            this.symbols[i] = i;
            this.positions[i] = i;
        }
    }

    encode(value: number): number {
        RecencyList.checkSymbol(value, 'value');
        const rank = this.positions[value];
        this.promote(rank);
        return rank;
    }

    decode(rank: number): number {
        RecencyList.checkSymbol(rank, 'rank');
        const value = this.symbols[rank];
        this.promote(rank);
        return value;
    }

    private static checkSymbol(n: number, what: string): void {
        if (!Number.isInteger(n) || n < 0 || n >= ALPHABET_SIZE) {
            throw new LimitExceededError(`MTF ${what} ${n} outside [0, ${ALPHABET_SIZE - 1}]`);
        }
    }

    private promote(rank: number): void {
        if (rank === 0) return;
        const value = this.symbols[rank];
        for (let j = rank; j > 0; j--) {
            const moved = this.symbols[j - 1];
            this.symbols[j] = moved;
            this.positions[moved] = j;
        }
        this.symbols[0] = value;
        this.positions[value] = 0;
    }
}

export function mtfEncode(bytes: Uint8Array): Uint8Array {
    const list = new RecencyList();
    const ranks = new Uint8Array(bytes.length);
    for (let i = 0; i < bytes.length; i++) {
        ranks[i] = list.encode(bytes[i]);
    }
    return ranks;
}

export function mtfDecode(ranks: Uint8Array): Uint8Array {
    const list = new RecencyList();
    const bytes = new Uint8Array(ranks.length);
    for (let i = 0; i < ranks.length; i++) {
        bytes[i] = list.decode(ranks[i]);
    }
    return bytes;
}
