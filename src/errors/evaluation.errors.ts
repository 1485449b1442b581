export class EvaluationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "EvaluationError";
    }
}

/** Malformed input: misaligned arrays, labels out of range, bad parameters. */
export class ValidationError extends EvaluationError {
    constructor(message: string, public readonly issues: string[] = [message]) {
        super(message);
        this.name = "ValidationError";
    }
}

/** NaN or Infinity in a score or a box coordinate. */
export class NumericValidityError extends EvaluationError {
    constructor(message: string, public readonly issues: string[] = [message]) {
        super(message);
        this.name = "NumericValidityError";
    }
}
