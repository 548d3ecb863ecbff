import { DegenerateInputError, EmptyTrainingSetError } from '../core/Errors';
import type { SimilarityFn } from '../core/Similarity';
import type { LabeledExample } from '../utils/IO';

export type TrainingExample = Readonly<LabeledExample>;

export type TrainingSet = readonly TrainingExample[];

export interface RankedNeighbor {
    index: number;
    text: string;
    label: string;
    score: number;
}

export interface LabelVote {
    label: string;
    count: number;
}

export interface KNNClassification {
    label: string;
    k: number;
    neighbors: RankedNeighbor[];
    votes: LabelVote[];
}

export type DegeneratePolicy = 'throw' | 'rankLast';

export const DEFAULT_K_FRACTION = 0.3;

export class KNN {
    /**
     * Number of neighbors for a training set: `round(size * kFraction)`,
     * never below 1 and never above `size`.
     */
    static computeK(size: number, kFraction: number = DEFAULT_K_FRACTION): number {
        if (!Number.isFinite(kFraction) || kFraction <= 0) {
            throw new RangeError(`kFraction must be a positive finite number, got ${kFraction}`);
        }
        const k = Math.round(size * kFraction);
        return Math.min(Math.max(k, 1), Math.max(size, 1));
    }

    /**
     * Score every training example against the query and sort by score, highest first.
     * The sort is stable, so equal scores keep training-set order.
     */
    static rank(
        trainingSet: TrainingSet,
        query: string,
        similarityFn: SimilarityFn,
        onDegenerate: DegeneratePolicy = 'throw'
    ): RankedNeighbor[] {
        const ranking = trainingSet.map((example, index) => ({
            index,
            text: example.text,
            label: example.label,
            score: this.scoreOf(example.text, query, similarityFn, onDegenerate),
        }));

        ranking.sort((a, b) => this.compareScores(a.score, b.score));
        return ranking;
    }

    /**
     * Count labels among the neighbors. Labels are ordered by first appearance,
     * and the first one to reach the highest count wins ties.
     */
    static vote(neighbors: readonly RankedNeighbor[]): LabelVote[] {
        const counts = new Map<string, number>();
        for (const neighbor of neighbors) {
            counts.set(neighbor.label, (counts.get(neighbor.label) ?? 0) + 1);
        }
        return [...counts.entries()].map(([label, count]) => ({ label, count }));
    }

    static winner(votes: readonly LabelVote[]): LabelVote {
        if (votes.length === 0) throw new RangeError('Cannot pick a winner from zero votes');
        let best = votes[0];
        for (const vote of votes) {
            if (vote.count > best.count) best = vote;
        }
        return best;
    }

    static classify(
        trainingSet: TrainingSet,
        query: string,
        similarityFn: SimilarityFn,
        kFraction: number = DEFAULT_K_FRACTION,
        onDegenerate: DegeneratePolicy = 'throw'
    ): KNNClassification {
        if (trainingSet.length === 0) throw new EmptyTrainingSetError();

        const k = this.computeK(trainingSet.length, kFraction);
        const neighbors = this.rank(trainingSet, query, similarityFn, onDegenerate).slice(0, k);
        const votes = this.vote(neighbors);

        return { label: this.winner(votes).label, k, neighbors, votes };
    }

    static predict(
        trainingSet: TrainingSet,
        query: string,
        similarityFn: SimilarityFn,
        kFraction: number = DEFAULT_K_FRACTION
    ): string {
        return this.classify(trainingSet, query, similarityFn, kFraction).label;
    }

    private static scoreOf(
        text: string,
        query: string,
        similarityFn: SimilarityFn,
        onDegenerate: DegeneratePolicy
    ): number {
        try {
            return similarityFn(text, query);
        } catch (err) {
            if (onDegenerate === 'rankLast' && err instanceof DegenerateInputError) {
                return -Infinity;
            }
            throw err;
        }
    }

    private static compareScores(a: number, b: number): number {
        if (a === b) return 0;
        return b > a ? 1 : -1;
    }
}
