import {ValidationError} from "../errors/evaluation.errors";

/**
 * Arithmetic mean of per-class AP. Classes with no ground truth stay in the
 * mean with AP 0, so classes absent from the split pull the score down.
 */
export function meanAveragePrecision(apPerClass: number[]): number {
    if (apPerClass.length === 0) {
        throw new ValidationError("Cannot average an empty list of per-class AP values");
    }
    const sum = apPerClass.reduce((acc, ap) => acc + ap, 0);
    return sum / apPerClass.length;
}
