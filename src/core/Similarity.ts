// Similarity.ts - Text similarity strategies for nearest-neighbor voting

import { ZlibCompressor, compressedLength } from './Compressor';
import type { Compressor } from './Compressor';
import { DegenerateInputError } from './Errors';

/**
 * Scores how alike two texts are. Higher is more similar, 1 is maximal.
 */
export type SimilarityFn = (text1: string, text2: string) => number;

export const DEFAULT_SEPARATOR = ' ';

/**
 * Normalized compression distance, expressed as a similarity:
 * `1 - (C(xy) - min(C(x), C(y))) / max(C(x), C(y))`.
 *
 * Scores are not clamped. Compressor framing overhead can push very short
 * or empty texts slightly outside [0, 1].
 */
export function similarity(
    text1: string,
    text2: string,
    compressor: Compressor,
    separator: string = DEFAULT_SEPARATOR
): number {
    const c1 = compressedLength(text1, compressor);
    const c2 = compressedLength(text2, compressor);
    const c12 = compressedLength(text1 + separator + text2, compressor);
    return ncd(c1, c2, c12);
}

function ncd(c1: number, c2: number, c12: number): number {
    const max = Math.max(c1, c2);
    if (max === 0) throw new DegenerateInputError([c1, c2]);
    return 1 - (c12 - Math.min(c1, c2)) / max;
}

export interface CompressionSimilarityOptions {
    compressor?: Compressor;
    separator?: string;
    cacheLengths?: boolean;
}

export class CompressionDistanceSimilarity {
    public readonly compressor: Compressor;
    public readonly separator: string;
    private lengthCache: Map<string, number> | null;

    constructor(options: CompressionSimilarityOptions = {}) {
        this.compressor = options.compressor ?? new ZlibCompressor();
        this.separator = options.separator ?? DEFAULT_SEPARATOR;
        this.lengthCache = options.cacheLengths === false ? null : new Map();
    }

    score(text1: string, text2: string): number {
        // Only the first (training-side) text is cached; queries and joined texts are not
        const c1 = this.lengthOf(text1);
        const c2 = compressedLength(text2, this.compressor);
        const c12 = compressedLength(text1 + this.separator + text2, this.compressor);
        return ncd(c1, c2, c12);
    }

    asFn(): SimilarityFn {
        return (text1, text2) => this.score(text1, text2);
    }

    get cacheSize(): number {
        return this.lengthCache?.size ?? 0;
    }

    clearCache(): void {
        this.lengthCache?.clear();
    }

    private lengthOf(text: string): number {
        if (!this.lengthCache) return compressedLength(text, this.compressor);
        const cached = this.lengthCache.get(text);
        if (cached !== undefined) return cached;
        const length = compressedLength(text, this.compressor);
        this.lengthCache.set(text, length);
        return length;
    }
}

/**
 * Compares texts only by how much of each is made of digits.
 */
export class DigitProportionSimilarity {
    static digitProportion(text: string): number {
        if (text.length === 0) return 0;
        let digits = 0;
        for (let i = 0; i < text.length; i++) {
            const code = text.charCodeAt(i);
            if (code >= 48 && code <= 57) digits++;
        }
        return digits / text.length;
    }

    score(text1: string, text2: string): number {
        return 1 - Math.abs(
            DigitProportionSimilarity.digitProportion(text1) - DigitProportionSimilarity.digitProportion(text2)
        );
    }

    asFn(): SimilarityFn {
        return (text1, text2) => this.score(text1, text2);
    }
}
