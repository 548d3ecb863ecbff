import { CompressionClassifier } from "../src/tasks/CompressionClassifier";
import { GzipPreset } from "../src/config/Presets";

// Define training data
const trainSamples = [
    { text: "Go has goroutines and channels for concurrency.", label: "go" },
    { text: "The defer keyword is used in Go to delay a call.", label: "go" },
    { text: "Python has list comprehensions and generators.", label: "python" },
    { text: "Python supports decorators on functions and classes.", label: "python" },
    { text: "TypeScript adds static typing to JavaScript.", label: "typescript" },
    { text: "TypeScript interfaces help define contracts between modules.", label: "typescript" },
];

const testSamples = [
    { text: "Go uses goroutines and channels for concurrency.", label: "go" },
    { text: "Decorators in Python wrap functions.", label: "python" },
    { text: "Static typing for JavaScript comes from TypeScript.", label: "typescript" },
];

const classifier = new CompressionClassifier({
    ...GzipPreset,
    kFraction: 0.34,
    log: { modelName: "TopicKNN", verbose: true },
});

classifier.train(trainSamples);

for (const { text } of testSamples) {
    const result = classifier.predictDetailed(text);
    console.log(`\n🔍 "${text}" → ${result.label}`);
    result.neighbors.forEach(n => {
        console.log(`   ${n.label.padEnd(10)} ${n.score.toFixed(4)}  ${n.text}`);
    });
}

const report = classifier.evaluate(testSamples);
console.log(`\nMisclassified: ${report.misclassified.length}`);
