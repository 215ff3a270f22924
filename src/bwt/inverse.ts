import { ALPHABET_SIZE } from './format.js';
import { CorruptDataError, IncompleteDataError } from './errors.js';
import type { TransformedBlock } from './forward.js';

/**
 * Inverse Burrows-Wheeler transform (LF-mapping walk).
 *
 * Throws CorruptDataError when `primaryIndex` is outside the column. A
 * tampered column with a valid index is not detected and decodes to
 * different bytes.
 */
export function inverseTransform({ primaryIndex, lastColumn }: TransformedBlock): Uint8Array {
    const n = lastColumn.length;
    if (n === 0) {
        throw new IncompleteDataError('Cannot invert an empty column');
    }
    if (!Number.isInteger(primaryIndex) || primaryIndex < 0 || primaryIndex >= n) {
        throw new CorruptDataError(`Primary index ${primaryIndex} out of range for a ${n}-byte block`);
    }

    // pred[i]: occurrences of lastColumn[i] before position i
    const pred = new Uint32Array(n);
    const count = new Uint32Array(ALPHABET_SIZE);
    for (let i = 0; i < n; i++) {
        pred[i] = count[lastColumn[i]]++;
    }

    let sum = 0;
    for (let c = 0; c < ALPHABET_SIZE; c++) {
        const tmp = count[c];
        count[c] = sum;
        sum += tmp;
    }

    const unrotated = new Uint8Array(n);
    let p = primaryIndex;
    for (let j = n; j > 0; j--) {
        const c = lastColumn[p];
        unrotated[j - 1] = c;
        p = pred[p] + count[c];
    }

    return unrotated;
}
