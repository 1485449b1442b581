import type {PrecisionRecall} from "./precision-recall";

/** Recall grid of the 11-point (VOC2007) definition: 0, 0.1, ..., 1. */
export const RECALL_THRESHOLDS: readonly number[] = Array.from({ length: 11 }, (_, i) => i / 10);

/**
 * 11-point interpolated average precision.
 *
 * For each recall threshold t the interpolated precision is the maximum precision
 * among points whose recall strictly exceeds t. When no point exceeds t but some
 * point reaches it exactly, the maximum over those points is used instead, so a
 * curve ending at recall 1 still counts at t = 1. A threshold that is never
 * reached contributes 0. AP is the sum over the grid divided by 11.
 * A class without ground truth (curve === null) scores 0.
 */
export function elevenPointAveragePrecision(curve: PrecisionRecall | null): number {
    if (!curve) return 0;
    const { precision, recall } = curve;

    let sum = 0;
    for (const t of RECALL_THRESHOLDS) {
        let aboveBest = -1;
        let reachedBest = -1;
        for (let i = 0; i < recall.length; i++) {
            if (recall[i] > t && precision[i] > aboveBest) aboveBest = precision[i];
            if (recall[i] >= t && precision[i] > reachedBest) reachedBest = precision[i];
        }
        if (aboveBest >= 0) sum += aboveBest;
        else if (reachedBest >= 0) sum += reachedBest;
    }
    return sum / RECALL_THRESHOLDS.length;
}
