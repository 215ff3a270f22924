import { PRIMARY_INDEX_SIZE } from './format.js';
import type { ByteOrder } from './format.js';
import { LimitExceededError } from './errors.js';

/**
 * Serializes one block record: primary index followed by the column bytes.
 */
export function encodeRecord(primaryIndex: number, column: Uint8Array, byteOrder: ByteOrder): Uint8Array {
    if (!Number.isInteger(primaryIndex) || primaryIndex < 0 || primaryIndex > 0xFFFFFFFF) {
        throw new LimitExceededError(`Primary index ${primaryIndex} does not fit in a u32`);
    }

    const buffer = new Uint8Array(PRIMARY_INDEX_SIZE + column.length);
    const view = new DataView(buffer.buffer);
    view.setUint32(0, primaryIndex, byteOrder === 'LE');
    buffer.set(column, PRIMARY_INDEX_SIZE);
    return buffer;
}

export function decodePrimaryIndex(header: Uint8Array, byteOrder: ByteOrder): number {
    const view = new DataView(header.buffer, header.byteOffset, PRIMARY_INDEX_SIZE);
    return view.getUint32(0, byteOrder === 'LE');
}
