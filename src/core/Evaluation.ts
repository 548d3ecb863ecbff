import type { LabeledExample } from '../utils/IO';

export interface Misclassification {
    text: string;
    expected: string;
    predicted: string;
}

export interface ClassificationReport {
    total: number;
    correct: number;
    accuracy: number;
    // confusion[actual][predicted]
    confusion: Record<string, Record<string, number>>;
    misclassified: Misclassification[];
}

export function evaluateClassifier(
    testSet: readonly LabeledExample[],
    predict: (text: string) => string
): ClassificationReport {
    let correct = 0;
    const counts = new Map<string, Map<string, number>>();
    const misclassified: Misclassification[] = [];

    for (const { text, label } of testSet) {
        const predicted = predict(text);

        let row = counts.get(label);
        if (!row) {
            row = new Map();
            counts.set(label, row);
        }
        row.set(predicted, (row.get(predicted) ?? 0) + 1);

        if (predicted === label) {
            correct++;
        } else {
            misclassified.push({ text, expected: label, predicted });
        }
    }

    // fromEntries defines own properties, so a label such as __proto__ is an ordinary key
    const confusion: Record<string, Record<string, number>> = Object.fromEntries(
        [...counts].map(([actual, row]): [string, Record<string, number>] => [actual, Object.fromEntries(row)])
    );

    const total = testSet.length;
    return {
        total,
        correct,
        accuracy: total === 0 ? 0 : correct / total,
        confusion,
        misclassified,
    };
}
