import { defaultConfig } from '../core/ClassifierConfig';
import type { ClassifierConfig } from '../core/ClassifierConfig';
import { ZlibCompressor } from '../core/Compressor';
import { CompressionDistanceSimilarity } from '../core/Similarity';
import type { SimilarityFn } from '../core/Similarity';
import { evaluateClassifier } from '../core/Evaluation';
import type { ClassificationReport } from '../core/Evaluation';
import { KNN } from '../ml/KNN';
import type { KNNClassification, TrainingExample } from '../ml/KNN';
import { IO } from '../utils/IO';
import type { LabeledExample, TrainingDataFormat } from '../utils/IO';

/**
 * Nearest-neighbor text classifier scored by compression distance.
 *
 * Nothing is learned: `train` only stores the examples, and each prediction
 * compares the query against all of them.
 */
export class CompressionClassifier {
    public readonly config: ClassifierConfig & typeof defaultConfig;
    public readonly similarity: SimilarityFn;
    public readonly modelName: string;
    public readonly verbose: boolean;

    private examples: TrainingExample[] = [];

    constructor(config: ClassifierConfig = {}) {
        const cfg = { ...defaultConfig, ...config };
        this.config = cfg;
        this.modelName = cfg.log?.modelName ?? 'CompressionClassifier';
        this.verbose = cfg.log?.verbose ?? false;

        if (cfg.similarity) {
            this.similarity = cfg.similarity;
        } else {
            const compressor = cfg.compressor ?? new ZlibCompressor({ algorithm: cfg.algorithm, level: cfg.level });
            this.similarity = new CompressionDistanceSimilarity({
                compressor,
                separator: cfg.separator,
                cacheLengths: cfg.cacheLengths,
            }).asFn();
        }

        // Validates kFraction
        KNN.computeK(1, cfg.kFraction);
    }

    get size(): number {
        return this.examples.length;
    }

    get labels(): string[] {
        return [...new Set(this.examples.map(e => e.label))];
    }

    loadTrainingData(raw: string, format: TrainingDataFormat = 'json'): LabeledExample[] {
        return IO.parse(raw, format);
    }

    loadTrainingFile(filePath: string): LabeledExample[] {
        return IO.readFile(filePath);
    }

    train(data: readonly LabeledExample[]): void {
        for (const { text, label } of data) {
            this.examples.push(Object.freeze({ text, label }));
        }
        if (this.verbose) {
            console.log(`📚 ${this.modelName} stored ${data.length} examples (${this.size} total, ${this.labels.length} labels)`);
        }
    }

    predictDetailed(text: string): KNNClassification {
        const result = KNN.classify(this.examples, text, this.similarity, this.config.kFraction, this.config.onDegenerate);
        if (this.verbose) {
            const votes = result.votes.map(v => `${v.label}:${v.count}`).join(', ');
            console.log(`✅ ${this.modelName} predicted "${result.label}" (k=${result.k}; ${votes})`);
        }
        return result;
    }

    predict(text: string): string {
        return this.predictDetailed(text).label;
    }

    predictBatch(texts: readonly string[]): string[] {
        return texts.map(text => this.predict(text));
    }

    evaluate(testSet: readonly LabeledExample[]): ClassificationReport {
        const report = evaluateClassifier(testSet, text => this.predict(text));
        if (this.verbose) {
            console.log(`📊 ${this.modelName} accuracy: ${(report.accuracy * 100).toFixed(2)}% (${report.correct}/${report.total})`);
        }
        return report;
    }
}
