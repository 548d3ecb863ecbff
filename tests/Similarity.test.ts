// Similarity.test.ts - Unit tests for the similarity strategies

import { describe, it, expect } from 'vitest';
import {
    similarity,
    CompressionDistanceSimilarity,
    DigitProportionSimilarity,
} from '../src/core/Similarity';
import { ZlibCompressor } from '../src/core/Compressor';
import type { Compressor } from '../src/core/Compressor';
import { DegenerateInputError, EncodingError } from '../src/core/Errors';

// One output byte per distinct input byte, so compressed lengths are easy to count
const distinctBytes: Compressor = {
    compress: (data) => Uint8Array.from(new Set(data)),
};

const passage =
    'Compression distance compares two texts by how well they compress together. ' +
    'Texts that share long substrings compress to barely more than the larger one alone, ' +
    'while unrelated texts cost almost the sum of their separate sizes.';

function pseudoRandomLetters(length: number, seed: number): string {
    let state = seed;
    let out = '';
    for (let i = 0; i < length; i++) {
        state = (state * 16807) % 2147483647;
        out += String.fromCharCode(97 + (state % 26));
    }
    return out;
}

describe('similarity', () => {
    it('computes the normalized compression distance from compressed lengths', () => {
        // C("abc") = 3, C("abc abc") = 4
        expect(similarity('abc', 'abc', distinctBytes)).toBeCloseTo(2 / 3);
    });

    it('does not clamp scores below zero', () => {
        // C("aaaa") = C("zzzz") = 1, C("aaaa zzzz") = 3
        expect(similarity('aaaa', 'zzzz', distinctBytes)).toBe(-1);
    });

    it('uses the separator when joining texts', () => {
        // C("ab") = C("ba") = 2 and C("abba") = 2
        expect(similarity('ab', 'ba', distinctBytes, '')).toBe(1);
        // C("ab|ba") = 3
        expect(similarity('ab', 'ba', distinctBytes, '|')).toBe(0.5);
    });

    it('throws DegenerateInputError when both texts compress to nothing', () => {
        const empty: Compressor = { compress: () => new Uint8Array(0) };
        expect(() => similarity('a', 'b', empty)).toThrow(DegenerateInputError);
    });

    it('wraps compressor failures in EncodingError', () => {
        const failure = new Error('boom');
        const broken: Compressor = {
            compress: () => {
                throw failure;
            },
        };
        let caught: unknown;
        try {
            similarity('a', 'b', broken);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(EncodingError);
        expect(caught instanceof EncodingError && caught.cause).toBe(failure);
    });

    it('rejects texts that differ only in lone surrogates', () => {
        const gzip = new ZlibCompressor();
        expect(() => similarity('abc\uD800def', 'abc\uDBFFdef', gzip, '')).toThrow(EncodingError);
    });

    describe('with gzip', () => {
        const gzip = new ZlibCompressor();

        it('is deterministic', () => {
            const first = similarity(passage, 'texts compress together', gzip);
            const second = similarity(passage, 'texts compress together', gzip);
            expect(first).toBe(second);
        });

        it('scores a text against itself close to 1', () => {
            expect(similarity(passage, passage, gzip)).toBeGreaterThan(0.9);
        });

        it('is approximately symmetric', () => {
            const other = pseudoRandomLetters(120, 7);
            const forward = similarity(passage, other, gzip);
            const backward = similarity(other, passage, gzip);
            expect(Math.abs(forward - backward)).toBeLessThan(0.05);
        });

        it('stays roughly within [0, 1] for realistic text', () => {
            const other = 'Quarterly earnings beat forecasts as shares climbed in early trading on Monday.';
            const score = similarity(passage, other, gzip);
            expect(score).toBeGreaterThan(-0.05);
            expect(score).toBeLessThan(1.05);
        });

        it('scores a repeated pattern above unrelated random text', () => {
            const anchor = 'abc'.repeat(20);
            const repeated = 'bca'.repeat(20);
            const random = pseudoRandomLetters(60, 42);
            expect(similarity(anchor, repeated, gzip)).toBeGreaterThan(similarity(anchor, random, gzip));
        });
    });
});

describe('CompressionDistanceSimilarity', () => {
    function countingCompressor() {
        const counter = {
            calls: 0,
            compress(data: Uint8Array): Uint8Array {
                counter.calls++;
                return distinctBytes.compress(data);
            },
        };
        return counter;
    }

    it('matches the plain similarity function', () => {
        const strategy = new CompressionDistanceSimilarity({ compressor: distinctBytes });
        expect(strategy.score('abc', 'abc')).toBe(similarity('abc', 'abc', distinctBytes));
    });

    it('caches compressed lengths of training-side texts', () => {
        const compressor = countingCompressor();
        const strategy = new CompressionDistanceSimilarity({ compressor });

        const first = strategy.score('abc', 'xyz');
        expect(compressor.calls).toBe(3);
        const second = strategy.score('abc', 'xyz');
        expect(compressor.calls).toBe(5);

        expect(second).toBe(first);
        expect(strategy.cacheSize).toBe(1);

        strategy.clearCache();
        expect(strategy.cacheSize).toBe(0);
    });

    it('does not grow the cache with distinct queries', () => {
        const strategy = new CompressionDistanceSimilarity({ compressor: distinctBytes });
        for (let i = 0; i < 1000; i++) {
            strategy.score('training text', `query ${i}`);
        }
        expect(strategy.cacheSize).toBe(1);
    });

    it('recompresses every text when caching is disabled', () => {
        const compressor = countingCompressor();
        const strategy = new CompressionDistanceSimilarity({ compressor, cacheLengths: false });

        strategy.score('abc', 'xyz');
        strategy.score('abc', 'xyz');
        expect(compressor.calls).toBe(6);
        expect(strategy.cacheSize).toBe(0);
    });

    it('exposes itself as a SimilarityFn', () => {
        const fn = new CompressionDistanceSimilarity({ compressor: distinctBytes, separator: '' }).asFn();
        expect(fn('ab', 'ba')).toBe(1);
    });
});

describe('DigitProportionSimilarity', () => {
    it('measures the share of digits', () => {
        expect(DigitProportionSimilarity.digitProportion('a1b2')).toBe(0.5);
        expect(DigitProportionSimilarity.digitProportion('')).toBe(0);
    });

    it('scores by the difference in digit proportion', () => {
        const strategy = new DigitProportionSimilarity();
        expect(strategy.score('1234', 'abcd')).toBe(0);
        expect(strategy.score('12ab', '34cd')).toBe(1);
        expect(strategy.asFn()('1abc', '')).toBe(0.75);
    });
});
