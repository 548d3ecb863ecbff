// ClassifierConfig.ts - Configuration interface and defaults for compression-based classifiers

import type { CompressionAlgorithm, Compressor } from './Compressor';
import type { SimilarityFn } from './Similarity';
import type { DegeneratePolicy } from '../ml/KNN';

export interface ClassifierConfig {
    // Share of the training set that votes on each prediction
    kFraction?: number;

    // Compression options, ignored when a compressor or similarity is supplied
    algorithm?: CompressionAlgorithm;
    level?: number;
    compressor?: Compressor;

    // Inserted between the two texts before compressing them together
    separator?: string;
    cacheLengths?: boolean;

    // Replaces the compression distance entirely
    similarity?: SimilarityFn;

    onDegenerate?: DegeneratePolicy;

    // Logging
    log?: {
        modelName?: string,
        verbose?: boolean,
    }
}

export const defaultConfig: Required<Pick<ClassifierConfig, 'kFraction' | 'algorithm' | 'level' | 'separator' | 'cacheLengths' | 'onDegenerate'>> = {
    kFraction: 0.3,
    algorithm: 'gzip',
    level: 9,
    separator: ' ',
    cacheLengths: true,
    onDegenerate: 'throw',
};
