import type {ClassPartition, MatchResult} from "../types/match.types";
import type {OverlapFunction} from "../interfaces/overlap.interface";
import {ValidationError} from "../errors/evaluation.errors";

/**
 * Indices of `scores` sorted by descending score.
 * Equal scores keep ascending index order (Array.prototype.sort is stable).
 */
export function rankByScore(scores: number[]): number[] {
    return scores.map((_, i) => i).sort((a, b) => scores[b] - scores[a]);
}

/** Column of the row maximum; the first column wins ties. */
function argmax(row: number[]): number {
    let best = 0;
    for (let j = 1; j < row.length; j++) {
        if (row[j] > row[best]) best = j;
    }
    return best;
}

function checkOverlapMatrix(matrix: number[][], rows: number, cols: number) {
    const ok = matrix.length === rows && matrix.every((row) => row.length === cols);
    if (!ok) {
        const got = `${matrix.length}x${matrix[0]?.length ?? 0}`;
        throw new ValidationError(`Overlap function returned a ${got} matrix, expected ${rows}x${cols}`);
    }
    matrix.forEach((row, i) => row.forEach((value, j) => {
        if (!Number.isFinite(value) || value < 0 || value > 1) {
            throw new ValidationError(`Overlap function returned ${value} at [${i}][${j}], expected a value in [0, 1]`);
        }
    }));
}

/**
 * Greedy assignment of detections to ground truths for one (class, image) pair.
 *
 * Detections are visited by descending score. Each one looks only at its
 * highest-overlap ground truth: it becomes a true positive when that overlap is
 * at least `iouThreshold` and no higher-ranked detection has claimed the same
 * ground truth. Anything else is a false positive, including a detection whose
 * second-best ground truth would also clear the threshold.
 */
export function matchDetections(
    partition: ClassPartition,
    iouThreshold: number,
    overlap: OverlapFunction,
): MatchResult {
    const { boxes, scores } = partition.detections;
    const gtBoxes = partition.groundTruths.boxes;

    const order = rankByScore(scores);
    const result: MatchResult = {
        classIndex: partition.classIndex,
        order,
        scores: order.map((i) => scores[i]),
        labels: order.map(() => false),
        matchedGroundTruth: order.map(() => -1),
        numGroundTruths: gtBoxes.length,
    };

    if (gtBoxes.length === 0 || boxes.length === 0) {
        return result;
    }

    const ious = overlap(boxes, gtBoxes);
    checkOverlapMatrix(ious, boxes.length, gtBoxes.length);

    const claimed = new Array<boolean>(gtBoxes.length).fill(false);
    order.forEach((detIdx, rank) => {
        const row = ious[detIdx];
        const gtMatch = argmax(row);
        if (row[gtMatch] >= iouThreshold && !claimed[gtMatch]) {
            claimed[gtMatch] = true;
            result.labels[rank] = true;
            result.matchedGroundTruth[rank] = gtMatch;
        }
    });

    return result;
}
