import { ALPHABET_SIZE } from './format.js';

/** Number of leading bytes already ordered by the two bucket passes. */
export const PRESORTED_PREFIX = 2;

/**
 * Histogram of byte values in `bytes`.
 */
export function byteHistogram(bytes: Uint8Array): Uint32Array {
    const counters = new Uint32Array(ALPHABET_SIZE);
    for (let i = 0; i < bytes.length; i++) {
        counters[bytes[i]]++;
    }
    return counters;
}

/**
 * Exclusive prefix sums over a histogram: the first rank of each byte value.
 */
export function prefixOffsets(counters: Uint32Array): Uint32Array {
    const offsets = new Uint32Array(ALPHABET_SIZE);
    for (let c = 1; c < ALPHABET_SIZE; c++) {
        offsets[c] = offsets[c - 1] + counters[c - 1];
    }
    return offsets;
}

/**
 * Sorted order of all cyclic rotations of `block`, as start offsets.
 *
 * Two counting passes order the rotations by their first two bytes (stable,
 * so equal prefixes stay in ascending offset order). Runs that share a
 * two-byte prefix are then refined by prefix doubling. Rotations equal over
 * the whole block keep ascending offset order.
 */
export function sortRotations(block: Uint8Array): Uint32Array {
    const n = block.length;
    const counters = byteHistogram(block);

    // Pass 1: bucket every offset by the byte that follows it.
    const secondOffsets = prefixOffsets(counters);
    const v = new Uint32Array(n);
    for (let i = 0; i < n - 1; i++) {
        v[secondOffsets[block[i + 1]]++] = i;
    }
    v[secondOffsets[block[0]]++] = n - 1;

    // Pass 2: stable re-bucket by the rotation's own first byte.
    const firstOffsets = prefixOffsets(counters);
    const rotationIndex = new Uint32Array(n);
    for (let i = 0; i < n; i++) {
        const j = v[i];
        rotationIndex[firstOffsets[block[j]]++] = j;
    }

    refinePrefixRuns(block, rotationIndex);
    return rotationIndex;
}

function refinePrefixRuns(block: Uint8Array, rotationIndex: Uint32Array): void {
    const n = block.length;

    // rank[r]: sorted position of the first rotation sharing r's prefix
    let rank = new Uint32Array(n);
    let next = new Uint32Array(n);
    let unsorted = false;

    let first = 0;
    while (first < n) {
        const start = rotationIndex[first];
        const lead = block[start];
        const second = block[(start + 1) % n];

        let end = first + 1;
        while (end < n) {
            const r = rotationIndex[end];
            if (block[r] !== lead || block[(r + 1) % n] !== second) break;
            end++;
        }

        for (let k = first; k < end; k++) rank[rotationIndex[k]] = first;
        if (end - first > 1) unsorted = true;
        first = end;
    }

    // Rotations sharing h bytes are ordered by the rank of the h bytes after them.
    for (let h = PRESORTED_PREFIX; unsorted && h < n; h *= 2) {
        const current = rank;
        const compare = (a: number, b: number): number =>
            current[(a + h) % n] - current[(b + h) % n] || a - b;

        first = 0;
        while (first < n) {
            const group = current[rotationIndex[first]];
            let end = first + 1;
            while (end < n && current[rotationIndex[end]] === group) end++;
            if (end - first > 1) {
                rotationIndex.subarray(first, end).sort(compare);
            }
            first = end;
        }

        unsorted = false;
        let head = 0;
        for (let k = 0; k < n; k++) {
            const r = rotationIndex[k];
            if (k > 0) {
                const prev = rotationIndex[k - 1];
                if (current[r] !== current[prev] || current[(r + h) % n] !== current[(prev + h) % n]) {
                    head = k;
                } else {
                    unsorted = true;
                }
            }
            next[r] = head;
        }

        rank = next;
        next = current;
    }
}
