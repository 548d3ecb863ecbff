export { CompressionClassifier } from './tasks/CompressionClassifier';
export { KNN, DEFAULT_K_FRACTION } from './ml/KNN';
export type {
    TrainingExample,
    TrainingSet,
    RankedNeighbor,
    LabelVote,
    KNNClassification,
    DegeneratePolicy,
} from './ml/KNN';
export {
    similarity,
    CompressionDistanceSimilarity,
    DigitProportionSimilarity,
    DEFAULT_SEPARATOR,
} from './core/Similarity';
export type { SimilarityFn, CompressionSimilarityOptions } from './core/Similarity';
export { ZlibCompressor, encodeText, compressedLength } from './core/Compressor';
export type { Compressor, CompressionAlgorithm, ZlibCompressorOptions } from './core/Compressor';
export { ClassifierError, EmptyTrainingSetError, DegenerateInputError, EncodingError } from './core/Errors';
export { defaultConfig } from './core/ClassifierConfig';
export type { ClassifierConfig } from './core/ClassifierConfig';
export { GzipPreset, DeflatePreset, BrotliPreset, DigitProportionPreset } from './config/Presets';
export { evaluateClassifier } from './core/Evaluation';
export type { ClassificationReport, Misclassification } from './core/Evaluation';
export { IO } from './utils/IO';
export type { LabeledExample, Delimiter, TrainingDataFormat } from './utils/IO';
