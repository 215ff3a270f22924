import { MAX_BLOCK_SIZE } from './format.js';
import { LimitExceededError } from './errors.js';
import { sortRotations } from './rotation-order.js';

export interface TransformedBlock {
    /** Position of the unrotated block among the sorted rotations. */
    primaryIndex: number;
    /** Byte preceding each sorted rotation's start. */
    lastColumn: Uint8Array;
}

/**
 * Forward Burrows-Wheeler transform of a single block.
 *
 * The block is only read; the returned column is a fresh array.
 */
export function forwardTransform(block: Uint8Array): TransformedBlock {
    const n = block.length;
    if (n === 0) {
        throw new LimitExceededError('Cannot transform an empty block');
    }
    if (n > MAX_BLOCK_SIZE) {
        throw new LimitExceededError(`Block too large (${n} > ${MAX_BLOCK_SIZE})`);
    }

    const rotationIndex = sortRotations(block);
    const lastColumn = new Uint8Array(n);
    let primaryIndex = 0;

    for (let i = 0; i < n; i++) {
        const start = rotationIndex[i];
        if (start === 0) {
            primaryIndex = i;
            lastColumn[i] = block[n - 1];
        } else {
            lastColumn[i] = block[start - 1];
        }
    }

    return { primaryIndex, lastColumn };
}
