import { describe, it, expect } from 'vitest';
import { mtfEncode, mtfDecode, RecencyList, LimitExceededError } from '../src/index.js';
import { SeededRNG, ascii, randomBytes } from './helpers/test-utils.js';

/** Linear-scan move-to-front, for comparison. */
function naiveMtfEncode(bytes: Uint8Array): Uint8Array {
    const list = Array.from({ length: 256 }, (_, i) => i);
    const out = new Uint8Array(bytes.length);
    bytes.forEach((b, i) => {
        const idx = list.indexOf(b);
        out[i] = idx;
        list.splice(idx, 1);
        list.unshift(b);
    });
    return out;
}

describe('move-to-front', () => {
    it('encodes and decodes an empty sequence', () => {
        expect(mtfEncode(new Uint8Array(0))).toEqual(new Uint8Array(0));
        expect(mtfDecode(new Uint8Array(0))).toEqual(new Uint8Array(0));
    });

    it('encodes a BWT column', () => {
        expect(Array.from(mtfEncode(ascii('nnbaaa')))).toEqual([110, 0, 99, 99, 0, 0]);
    });

    it('encodes every byte value once, in ascending order, as the identity', () => {
        const all = Uint8Array.from({ length: 256 }, (_, i) => i);
        expect(mtfEncode(all)).toEqual(all);
        expect(mtfDecode(mtfEncode(all))).toEqual(all);
    });

    it('round-trips every byte value in descending order', () => {
        const all = Uint8Array.from({ length: 256 }, (_, i) => 255 - i);
        expect(mtfDecode(mtfEncode(all))).toEqual(all);
    });

    it('emits rank 0 for each repetition in a run', () => {
        const ranks = mtfEncode(new Uint8Array(5).fill(0x41));
        expect(Array.from(ranks)).toEqual([0x41, 0, 0, 0, 0]);
        expect(mtfDecode(ranks)).toEqual(new Uint8Array(5).fill(0x41));
    });

    it('emits rank 0 for a run that follows earlier symbols', () => {
        const ranks = mtfEncode(ascii('xyzqqqq'));
        expect(Array.from(ranks.subarray(4))).toEqual([0, 0, 0]);
    });

    it('matches a linear-scan encoder on random input', () => {
        const rng = new SeededRNG(2024);
        for (const alphabet of [4, 32, 256]) {
            const bytes = randomBytes(rng, 2000, alphabet);
            const ranks = mtfEncode(bytes);
            expect(ranks).toEqual(naiveMtfEncode(bytes));
            expect(mtfDecode(ranks)).toEqual(bytes);
        }
    });

    it('starts every call from the identity list', () => {
        expect(Array.from(mtfEncode(ascii('b')))).toEqual([98]);
        expect(Array.from(mtfEncode(ascii('b')))).toEqual([98]);
    });

    it('keeps encode and decode lists in step', () => {
        const encoder = new RecencyList();
        const decoder = new RecencyList();
        for (const value of [7, 7, 3, 7, 255, 0, 3]) {
            expect(decoder.decode(encoder.encode(value))).toBe(value);
        }
    });

    it('rejects symbols outside the byte range without touching the list', () => {
        const list = new RecencyList();
        expect(() => list.encode(300)).toThrow(LimitExceededError);
        expect(() => list.encode(-1)).toThrow('MTF value -1 outside [0, 255]');
        expect(() => list.decode(256)).toThrow('MTF rank 256 outside [0, 255]');
        expect(() => list.decode(1.5)).toThrow(LimitExceededError);
        expect(list.encode(0)).toBe(0);
        expect(list.encode(255)).toBe(255);
    });
});
