// Errors.ts - Error types raised by the classifier

export class ClassifierError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class EmptyTrainingSetError extends ClassifierError {
    constructor() {
        super('Cannot predict: the training set is empty.');
    }
}

/**
 * Raised when both compressed lengths are zero, which would divide by zero.
 */
export class DegenerateInputError extends ClassifierError {
    constructor(public readonly lengths: [number, number]) {
        super(`Degenerate input: compressed lengths are ${lengths[0]} and ${lengths[1]}.`);
    }
}

export class EncodingError extends ClassifierError {
    constructor(message: string, cause: unknown) {
        super(message, { cause });
    }
}
