import { byteHistogram } from './rotation-order.js';

export interface BlockStats {
    /** Zero-based block position in the stream. */
    index: number;
    inputBytes: number;
    /** Record size including the primary index. */
    outputBytes: number;
    primaryIndex: number;
    /** Shannon entropy of the emitted column, bits per byte. */
    entropy: number;
    /** Number of maximal runs of equal bytes in the emitted column. */
    runs: number;
    /** Fraction of zero bytes in the emitted column (MTF rank 0 after MTF). */
    zeroRatio: number;
}

export function shannonEntropy(bytes: Uint8Array): number {
    if (bytes.length === 0) return 0;
    const counters = byteHistogram(bytes);
    let bits = 0;
    for (const count of counters) {
        if (count === 0) continue;
        const p = count / bytes.length;
        bits -= p * Math.log2(p);
    }
    return bits;
}

export function countRuns(bytes: Uint8Array): number {
    if (bytes.length === 0) return 0;
    let runs = 1;
    for (let i = 1; i < bytes.length; i++) {
        if (bytes[i] !== bytes[i - 1]) runs++;
    }
    return runs;
}

export function zeroRatio(bytes: Uint8Array): number {
    if (bytes.length === 0) return 0;
    let zeros = 0;
    for (const b of bytes) {
        if (b === 0) zeros++;
    }
    return zeros / bytes.length;
}

export function calculateBlockStats(
    index: number,
    inputBytes: number,
    outputBytes: number,
    primaryIndex: number,
    column: Uint8Array
): BlockStats {
    return {
        index,
        inputBytes,
        outputBytes,
        primaryIndex,
        entropy: shannonEntropy(column),
        runs: countRuns(column),
        zeroRatio: zeroRatio(column),
    };
}
