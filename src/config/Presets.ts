// Presets.ts - Reusable configuration presets for the compression classifier

import type { ClassifierConfig } from '../core/ClassifierConfig';
import { DigitProportionSimilarity } from '../core/Similarity';

export const GzipPreset: ClassifierConfig = {
    kFraction: 0.3,
    algorithm: 'gzip',
    level: 9,
    log: {
        modelName: 'GzipKNN',
    }
};

export const DeflatePreset: ClassifierConfig = {
    kFraction: 0.3,
    algorithm: 'deflateRaw',
    level: 9,
    log: {
        modelName: 'DeflateKNN',
    }
};

export const BrotliPreset: ClassifierConfig = {
    kFraction: 0.3,
    algorithm: 'brotli',
    level: 11,
    log: {
        modelName: 'BrotliKNN',
    }
};

export const DigitProportionPreset: ClassifierConfig = {
    kFraction: 0.3,
    similarity: new DigitProportionSimilarity().asFn(),
    log: {
        modelName: 'DigitProportionKNN',
    }
};
