import { MemorySink, MemorySource } from './io.js';
import { reverseTransform, transform } from './codec.js';
import type { BwtOptions } from './types.js';

/**
 * Transforms an in-memory buffer into a record stream.
 */
export async function pack(data: Uint8Array, options: BwtOptions = {}): Promise<Uint8Array> {
    const sink = new MemorySink();
    await transform(new MemorySource(data), sink, options);
    return sink.toUint8Array();
}

/**
 * Restores the original bytes from an in-memory record stream.
 */
export async function unpack(data: Uint8Array, options: BwtOptions = {}): Promise<Uint8Array> {
    const sink = new MemorySink();
    await reverseTransform(new MemorySource(data), sink, options);
    return sink.toUint8Array();
}
