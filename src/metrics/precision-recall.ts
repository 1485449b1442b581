import type {PrecisionRecallPoint} from "../types/match.types";

export type PrecisionRecall = {
    precision: number[];
    recall: number[];
};

/**
 * Precision and recall at every rank cutoff.
 * Returns null when the class has no ground truth: recall has no denominator then.
 */
export function computePrecisionRecall(
    cumulativeTruePositives: number[],
    cumulativeFalsePositives: number[],
    numGroundTruths: number,
): PrecisionRecall | null {
    if (cumulativeTruePositives.length !== cumulativeFalsePositives.length) {
        throw new Error(
            `Cumulative TP/FP length mismatch: ${cumulativeTruePositives.length} vs ${cumulativeFalsePositives.length}`
        );
    }
    if (numGroundTruths === 0) return null;

    const recall = cumulativeTruePositives.map((tp) => tp / numGroundTruths);
    const precision = cumulativeTruePositives.map((tp, i) => tp / (tp + cumulativeFalsePositives[i]));
    return { precision, recall };
}

export function toCurve({ precision, recall }: PrecisionRecall): PrecisionRecallPoint[] {
    return precision.map((p, i) => ({ precision: p, recall: recall[i] }));
}
