// Compressor.ts - Byte compressors used to measure text redundancy

import zlib from 'zlib';
import { EncodingError } from './Errors';

export interface Compressor {
    compress(data: Uint8Array): Uint8Array;
}

export type CompressionAlgorithm = 'gzip' | 'deflate' | 'deflateRaw' | 'brotli';

export interface ZlibCompressorOptions {
    algorithm?: CompressionAlgorithm;
    level?: number;
}

export class ZlibCompressor implements Compressor {
    public readonly algorithm: CompressionAlgorithm;
    public readonly level: number;

    constructor(options: ZlibCompressorOptions = {}) {
        this.algorithm = options.algorithm ?? 'gzip';
        this.level = options.level ?? 9;
    }

    compress(data: Uint8Array): Uint8Array {
        switch (this.algorithm) {
            case 'deflate':
                return zlib.deflateSync(data, { level: this.level });
            case 'deflateRaw':
                return zlib.deflateRawSync(data, { level: this.level });
            case 'brotli':
                // Brotli quality runs 0..11, zlib levels 0..9
                return zlib.brotliCompressSync(data, {
                    params: { [zlib.constants.BROTLI_PARAM_QUALITY]: Math.min(this.level, 11) },
                });
            case 'gzip':
            default:
                return zlib.gzipSync(data, { level: this.level });
        }
    }
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Text is always measured as UTF-8. Ill-formed UTF-16 (a lone surrogate)
 * has no UTF-8 form and is rejected.
 */
export function encodeText(text: string): Uint8Array {
    const match = LONE_SURROGATE.exec(text);
    if (match) {
        throw new EncodingError(`Text has a lone surrogate at index ${match.index}`, null);
    }
    return Buffer.from(text, 'utf8');
}

export function compressedLength(text: string, compressor: Compressor): number {
    const bytes = encodeText(text);
    try {
        return compressor.compress(bytes).length;
    } catch (err) {
        throw new EncodingError(`Failed to compress text of length ${text.length}`, err);
    }
}
