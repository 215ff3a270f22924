import { endianness } from 'node:os';

export const DEFAULT_BLOCK_SIZE = 4096;
export const MIN_BLOCK_SIZE = 1;
export const MAX_BLOCK_SIZE = 1 << 20;

export const ALPHABET_SIZE = 256;

// Record layout:
// [primary_index (u32)] [last_column (n bytes)]
// No stream header, magic or length prefix. n is implied by the bytes that
// follow, so only the final record of a stream may be shorter than blockSize.
export const PRIMARY_INDEX_SIZE = 4;

export enum XformMethod {
    WITHOUT_MTF = 0,
    WITH_MTF = 1,
}

export type ByteOrder = 'LE' | 'BE';

export function nativeByteOrder(): ByteOrder {
    return endianness();
}
