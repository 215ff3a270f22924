import { describe, it, expect, vi } from 'vitest';
import {
    BWT,
    transform,
    reverseTransform,
    MemorySource,
    MemorySink,
    XformMethod,
    LimitExceededError,
    MAX_BLOCK_SIZE,
    DEFAULT_BLOCK_SIZE,
    PRIMARY_INDEX_SIZE,
} from '../src/index.js';
import { mtfDecode } from '../src/bwt/mtf.js';
import { SeededRNG, ascii, pseudoText, randomBytes, sortedBytes } from './helpers/test-utils.js';

describe('record stream', () => {
    it('packs "banana" into one record', async () => {
        const packed = await BWT.pack(ascii('banana'), { byteOrder: 'LE' });
        expect(Array.from(packed)).toEqual([3, 0, 0, 0, 110, 110, 98, 97, 97, 97]);
    });

    it('packs "banana" with move-to-front', async () => {
        const packed = await BWT.pack(ascii('banana'), { byteOrder: 'LE', useMTF: true });
        expect(Array.from(packed)).toEqual([3, 0, 0, 0, 110, 0, 99, 99, 0, 0]);
    });

    it('splits input into blocks with a shorter final record', async () => {
        const packed = await BWT.pack(ascii('banana'), { byteOrder: 'LE', blockSize: 4 });
        // "bana" -> (2, "nbaa"), "na" -> (1, "na")
        expect(Array.from(packed)).toEqual([2, 0, 0, 0, 110, 98, 97, 97, 1, 0, 0, 0, 110, 97]);
        expect(await BWT.unpack(packed, { byteOrder: 'LE', blockSize: 4 })).toEqual(ascii('banana'));
    });

    it('round-trips "banana_bwt_" through the full pipeline', async () => {
        const input = ascii('banana_bwt_');
        const packed = await BWT.pack(input, { byteOrder: 'BE', useMTF: true });
        expect(packed).toHaveLength(PRIMARY_INDEX_SIZE + 11);

        const column = mtfDecode(packed.subarray(PRIMARY_INDEX_SIZE));
        expect(sortedBytes(column)).toEqual(sortedBytes(input));

        expect(await BWT.unpack(packed, { byteOrder: 'BE', useMTF: true })).toEqual(input);
    });

    it('round-trips a full block of random bytes', async () => {
        const input = randomBytes(new SeededRNG(4096), DEFAULT_BLOCK_SIZE);
        for (const useMTF of [false, true]) {
            const packed = await BWT.pack(input, { useMTF });
            expect(packed).toHaveLength(DEFAULT_BLOCK_SIZE + PRIMARY_INDEX_SIZE);
            expect(await BWT.unpack(packed, { useMTF })).toEqual(input);
        }
    });

    it('round-trips inputs around block boundaries', async () => {
        const rng = new SeededRNG(31);
        for (const length of [1, 63, 64, 65, 128, 129, 300]) {
            const input = pseudoText(rng, length);
            for (const method of [XformMethod.WITHOUT_MTF, XformMethod.WITH_MTF]) {
                const packed = await BWT.pack(input, { method, blockSize: 64 });
                expect(packed).toHaveLength(length + Math.ceil(length / 64) * PRIMARY_INDEX_SIZE);
                expect(await BWT.unpack(packed, { method, blockSize: 64 }), `length=${length}`).toEqual(input);
            }
        }
    });

    it('round-trips a degenerate block', async () => {
        const input = new Uint8Array(64).fill(0x41);
        const packed = await BWT.pack(input, { byteOrder: 'LE', useMTF: true });
        expect(Array.from(packed.subarray(0, PRIMARY_INDEX_SIZE))).toEqual([0, 0, 0, 0]);
        expect(await BWT.unpack(packed, { byteOrder: 'LE', useMTF: true })).toEqual(input);
    });

    it('maps empty input to an empty stream and back', async () => {
        expect(await BWT.pack(new Uint8Array(0))).toEqual(new Uint8Array(0));
        expect(await BWT.unpack(new Uint8Array(0))).toEqual(new Uint8Array(0));
    });
});

describe('transform / reverseTransform', () => {
    it('accepts a boolean MTF flag', async () => {
        const sink = new MemorySink();
        const report = await transform(new MemorySource(ascii('banana')), sink, true);
        expect(report.method).toBe(XformMethod.WITH_MTF);
        expect(Array.from(sink.toUint8Array().subarray(PRIMARY_INDEX_SIZE))).toEqual([110, 0, 99, 99, 0, 0]);
    });

    it('lets an explicit method override useMTF', async () => {
        const packed = await BWT.pack(ascii('banana'), { method: XformMethod.WITHOUT_MTF, useMTF: true, byteOrder: 'LE' });
        expect(Array.from(packed.subarray(PRIMARY_INDEX_SIZE))).toEqual([110, 110, 98, 97, 97, 97]);
    });

    it('reports block and byte counts', async () => {
        const sink = new MemorySink();
        const report = await transform(new MemorySource(ascii('banana')), sink, { blockSize: 4 });
        expect(report).toEqual({
            method: XformMethod.WITHOUT_MTF,
            blockSize: 4,
            blocks: 2,
            bytesIn: 6,
            bytesOut: 14,
        });

        const out = new MemorySink();
        const reverse = await reverseTransform(new MemorySource(sink.toUint8Array()), out, { blockSize: 4 });
        expect(reverse.blocks).toBe(2);
        expect(reverse.bytesIn).toBe(14);
        expect(reverse.bytesOut).toBe(6);
    });

    it('collects per-block statistics on request', async () => {
        const report = await transform(new MemorySource(ascii('banana')), new MemorySink(), { collectStats: true });
        expect(report.blockStats).toHaveLength(1);
        const [stats] = report.blockStats ?? [];
        expect(stats.index).toBe(0);
        expect(stats.inputBytes).toBe(6);
        expect(stats.outputBytes).toBe(10);
        expect(stats.primaryIndex).toBe(3);
        expect(stats.runs).toBe(3);
        expect(stats.zeroRatio).toBe(0);
        expect(stats.entropy).toBeCloseTo(1.459148, 5);
    });

    it('measures the MTF column when MTF is on', async () => {
        const report = await transform(new MemorySource(ascii('banana')), new MemorySink(), { collectStats: true, useMTF: true });
        const [stats] = report.blockStats ?? [];
        expect(stats.runs).toBe(4);
        expect(stats.zeroRatio).toBe(0.5);
    });

    it('omits statistics by default', async () => {
        const report = await transform(new MemorySource(ascii('banana')), new MemorySink());
        expect(report.blockStats).toBeUndefined();
    });

    it('logs a summary through the logger hook', async () => {
        const info = vi.fn();
        await transform(new MemorySource(ascii('banana')), new MemorySink(), { logger: { info } });
        expect(info).toHaveBeenCalledWith('[BWT] transform (bwt): 1 blocks, 6 -> 10 bytes');
    });

    it('resolves the block size from a preset', async () => {
        const report = await transform(new MemorySource(ascii('banana')), new MemorySink(), { preset: 'low_latency' });
        expect(report.blockSize).toBe(1024);
    });

    it('lets an explicit block size override the preset', async () => {
        const report = await transform(new MemorySource(ascii('banana')), new MemorySink(), { preset: 'max_ratio', blockSize: 2 });
        expect(report.blockSize).toBe(2);
        expect(report.blocks).toBe(3);
    });

    it('rejects block sizes outside the supported range', async () => {
        for (const blockSize of [0, 1.5, MAX_BLOCK_SIZE + 1]) {
            await expect(BWT.pack(ascii('banana'), { blockSize })).rejects.toThrow(LimitExceededError);
        }
    });
});
