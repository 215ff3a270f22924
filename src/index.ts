/**
 * Block Burrows-Wheeler transform codec with an optional move-to-front stage.
 *
 * @module bwt
 */

import { transform, reverseTransform } from './bwt/codec.js';
import { forwardTransform } from './bwt/forward.js';
import { inverseTransform } from './bwt/inverse.js';
import { mtfEncode, mtfDecode } from './bwt/mtf.js';
import { pack, unpack } from './bwt/pack.js';
import { BLOCK_PRESETS } from './bwt/types.js';

export type {
    BwtOptions as Options,
    BwtLogger as Logger,
    BlockPreset,
    TransformReport,
} from './bwt/types.js';
export { BLOCK_PRESETS, BLOCK_PRESET_NAMES } from './bwt/types.js';
export type { ByteOrder } from './bwt/format.js';
export {
    XformMethod,
    DEFAULT_BLOCK_SIZE,
    MIN_BLOCK_SIZE,
    MAX_BLOCK_SIZE,
    PRIMARY_INDEX_SIZE,
} from './bwt/format.js';
export {
    BwtError,
    StreamError,
    CorruptDataError,
    IncompleteDataError,
    LimitExceededError,
} from './bwt/errors.js';
export type { TransformedBlock } from './bwt/forward.js';
export type { ByteSource, ByteSink } from './bwt/io.js';
export { MemorySource, MemorySink, FileSource, FileSink, readFully } from './bwt/io.js';
export { RecencyList } from './bwt/mtf.js';
export { encodeRecord, decodePrimaryIndex } from './bwt/record.js';
export type { BlockStats } from './bwt/metrics.js';
export { shannonEntropy, countRuns, zeroRatio } from './bwt/metrics.js';
export { TransformProfiler } from './bwt/profiler.js';
export type { ProfileResult, ProfileMode, TrialResult, ProfileMeta } from './bwt/profiler.js';
export {
    transform,
    reverseTransform,
    forwardTransform,
    inverseTransform,
    mtfEncode,
    mtfDecode,
    pack,
    unpack,
};

export const BWT = {
    /**
     * Transforms a whole buffer into a record stream.
     */
    pack,

    /**
     * Restores a buffer from a record stream.
     */
    unpack,

    /**
     * Block-by-block forward pass from a ByteSource to a ByteSink.
     */
    transform,

    /**
     * Block-by-block reverse pass from a ByteSource to a ByteSink.
     */
    reverseTransform,

    /** Forward transform of a single block. */
    forward: forwardTransform,

    /** Inverse transform of a single block. */
    inverse: inverseTransform,

    mtfEncode,
    mtfDecode,

    presets: BLOCK_PRESETS,
};

export default BWT;
