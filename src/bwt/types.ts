import { DEFAULT_BLOCK_SIZE, MAX_BLOCK_SIZE, MIN_BLOCK_SIZE, XformMethod, nativeByteOrder } from './format.js';
import type { ByteOrder } from './format.js';
import type { BlockStats } from './metrics.js';
import { LimitExceededError } from './errors.js';

export type BwtLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/**
 * Block size presets.
 *
 * - `balanced`: the reference block size (default)
 * - `max_ratio`: long blocks, more context per sort, slower forward pass
 * - `low_latency`: short blocks, cheap sorts
 */
export const BLOCK_PRESET_NAMES = ['balanced', 'max_ratio', 'low_latency'] as const;
export type BlockPreset = typeof BLOCK_PRESET_NAMES[number];

export const BLOCK_PRESETS: Record<BlockPreset, { blockSize: number }> = {
    balanced:    { blockSize: DEFAULT_BLOCK_SIZE },
    max_ratio:   { blockSize: 65536 },
    low_latency: { blockSize: 1024 },
};

export type BwtOptions = {
    /** Transform method. Takes precedence over `useMTF` when both are set. */
    method?: XformMethod;
    /** Shorthand for `method: XformMethod.WITH_MTF`. */
    useMTF?: boolean;
    /** Block size preset. Default: `balanced`. */
    preset?: BlockPreset;
    /** Bytes per block (1 - 1 MiB). Overrides the preset value if both are set. */
    blockSize?: number;
    /** Byte order of the primary index. Defaults to the host's native order. */
    byteOrder?: ByteOrder;
    /**
     * Handling of truncated records on the reverse path.
     * - 'strict' (default): throw IncompleteDataError
     * - 'warn': log a warning and stop at the last complete record
     */
    integrityMode?: 'strict' | 'warn';
    /** Collect per-block statistics into the report. */
    collectStats?: boolean;
    /** Optional logger hook; the library never writes to the console itself. */
    logger?: BwtLogger | null;
};

export type ResolvedBwtOptions = {
    method: XformMethod;
    blockSize: number;
    byteOrder: ByteOrder;
    integrityMode: 'strict' | 'warn';
    collectStats: boolean;
    logger: BwtLogger | null;
};

export interface TransformReport {
    method: XformMethod;
    blockSize: number;
    blocks: number;
    bytesIn: number;
    bytesOut: number;
    /** Present only when `collectStats` was requested. */
    blockStats?: BlockStats[];
}

export function resolveOptions(options: BwtOptions = {}): ResolvedBwtOptions {
    const preset = BLOCK_PRESETS[options.preset ?? 'balanced'];
    const blockSize = options.blockSize ?? preset.blockSize;

    if (!Number.isInteger(blockSize) || blockSize < MIN_BLOCK_SIZE || blockSize > MAX_BLOCK_SIZE) {
        throw new LimitExceededError(
            `Block size must be an integer in [${MIN_BLOCK_SIZE}, ${MAX_BLOCK_SIZE}] (got ${blockSize})`
        );
    }

    let method = XformMethod.WITHOUT_MTF;
    if (options.method !== undefined) {
        method = options.method;
    } else if (options.useMTF) {
        method = XformMethod.WITH_MTF;
    }

    return {
        method,
        blockSize,
        byteOrder: options.byteOrder ?? nativeByteOrder(),
        integrityMode: options.integrityMode ?? 'strict',
        collectStats: options.collectStats ?? false,
        logger: options.logger ?? null,
    };
}
