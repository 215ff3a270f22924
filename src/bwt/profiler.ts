/**
 * TransformProfiler — measures which block size and method make a sample
 * most compressible for a downstream byte compressor.
 *
 * Every trial packs the sample with the codec, compresses the packed bytes
 * with zstd and records the resulting ratio. The codec does not depend on
 * this module.
 */

import { createHash } from 'node:crypto';
import { pack } from './pack.js';
import { XformMethod } from './format.js';
import { BLOCK_PRESETS, BLOCK_PRESET_NAMES } from './types.js';
import type { BlockPreset, BwtOptions } from './types.js';
import { zstdCompress } from './outer-codecs.js';

export type ProfileMode = 'quick' | 'deep';

export interface ProfileResult {
    /** Recommended transform method */
    method: XformMethod;
    /** Recommended block size in bytes */
    blockSize: number;
    /** Matching preset, if any */
    preset: BlockPreset | null;
    /** Best ratio achieved (sample bytes / zstd bytes) */
    bestRatio: number;
    /** Ratio of zstd on the untransformed sample */
    baselineRatio: number;
    /** Transform time in ms for the best configuration */
    bestEncodeMs: number;
    trials: TrialResult[];
    meta: ProfileMeta;
}

export interface TrialResult {
    method: XformMethod;
    blockSize: number;
    ratio: number;
    encodeMs: number;
    /** Size of the packed record stream */
    packedBytes: number;
    /** Size after zstd */
    outputBytes: number;
    inputBytes: number;
}

export interface ProfileMeta {
    /** SHA-256 prefix of the first sample bytes */
    sampleHash: string;
    sampleSize: number;
    codecVersion: string;
    /** ISO 8601 timestamp */
    date: string;
    mode: ProfileMode;
}

const CODEC_VERSION = '1.0.0';
const ZSTD_LEVEL = 3;
const HASHED_PREFIX = 64 * 1024;

const QUICK_BLOCK_SIZES = [1024, 4096];
const DEEP_BLOCK_SIZES = [512, 1024, 4096, 16384, 65536];

const METHODS = [XformMethod.WITHOUT_MTF, XformMethod.WITH_MTF];

export class TransformProfiler {
    /**
     * @param sample - bytes representative of the data to be transformed
     * @param mode - 'quick' (2 block sizes) or 'deep' (5 block sizes)
     * @param baseOptions - options shared by every trial (byte order, ...)
     */
    static async profile(
        sample: Uint8Array,
        mode: ProfileMode = 'quick',
        baseOptions: Omit<BwtOptions, 'method' | 'useMTF' | 'blockSize' | 'preset' | 'collectStats'> = {}
    ): Promise<ProfileResult> {
        if (sample.length === 0) {
            throw new Error('TransformProfiler: sample must not be empty');
        }

        const blockSizes = mode === 'quick' ? QUICK_BLOCK_SIZES : DEEP_BLOCK_SIZES;
        const baseline = await zstdCompress(sample, ZSTD_LEVEL);
        const trials: TrialResult[] = [];

        for (const blockSize of blockSizes) {
            for (const method of METHODS) {
                const t0 = performance.now();
                const packed = await pack(sample, { ...baseOptions, method, blockSize, logger: null });
                const encodeMs = performance.now() - t0;
                const compressed = await zstdCompress(packed, ZSTD_LEVEL);

                trials.push({
                    method,
                    blockSize,
                    ratio: sample.length / (compressed.length || 1),
                    encodeMs,
                    packedBytes: packed.length,
                    outputBytes: compressed.length,
                    inputBytes: sample.length,
                });
            }
        }

        // Highest ratio wins, faster transform breaks near-ties
        const sorted = [...trials].sort((a, b) => {
            if (Math.abs(a.ratio - b.ratio) > 0.01) return b.ratio - a.ratio;
            return a.encodeMs - b.encodeMs;
        });
        const best = sorted[0];

        return {
            method: best.method,
            blockSize: best.blockSize,
            preset: TransformProfiler.matchPreset(best.blockSize),
            bestRatio: best.ratio,
            baselineRatio: sample.length / (baseline.length || 1),
            bestEncodeMs: best.encodeMs,
            trials,
            meta: {
                sampleHash: TransformProfiler.computeSampleHash(sample),
                sampleSize: sample.length,
                codecVersion: CODEC_VERSION,
                date: new Date().toISOString(),
                mode,
            },
        };
    }

    private static computeSampleHash(sample: Uint8Array): string {
        const hash = createHash('sha256');
        hash.update(sample.subarray(0, HASHED_PREFIX));
        hash.update(String(sample.length));
        return hash.digest('hex').slice(0, 16);
    }

    private static matchPreset(blockSize: number): BlockPreset | null {
        for (const name of BLOCK_PRESET_NAMES) {
            if (BLOCK_PRESETS[name].blockSize === blockSize) return name;
        }
        return null;
    }
}
