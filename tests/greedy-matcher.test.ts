import { describe, expect, it, vi } from "vitest";
import { matchDetections, rankByScore } from "../src/metrics/greedy-matcher";
import { partitionByClass } from "../src/metrics/partition";
import { bboxOverlaps } from "../src/utils/bbox-overlaps";
import { ValidationError } from "../src/errors/evaluation.errors";
import type { Box } from "../src/types/detection.types";
import type { ClassPartition } from "../src/types/match.types";

function partition(scores: number[], numGroundTruths: number): ClassPartition {
    const box: Box = [0, 0, 10, 10];
    return {
        classIndex: 0,
        detections: { boxes: scores.map(() => box), scores, indices: scores.map((_, i) => i) },
        groundTruths: {
            boxes: Array.from({ length: numGroundTruths }, () => box),
            indices: Array.from({ length: numGroundTruths }, (_, i) => i),
        },
    };
}

const fixed = (matrix: number[][]) => () => matrix;

describe("rankByScore", () => {
    it("sorts by descending score and keeps input order on ties", () => {
        expect(rankByScore([0.2, 0.9, 0.5, 0.9, 0.2])).toEqual([1, 3, 2, 0, 4]);
    });
});

describe("matchDetections", () => {
    it("labels every detection a false positive when there is no ground truth", () => {
        const overlap = vi.fn(fixed([]));
        const result = matchDetections(partition([0.4, 0.8], 0), 0.5, overlap);
        expect(result.order).toEqual([1, 0]);
        expect(result.scores).toEqual([0.8, 0.4]);
        expect(result.labels).toEqual([false, false]);
        expect(result.matchedGroundTruth).toEqual([-1, -1]);
        expect(result.numGroundTruths).toBe(0);
        expect(overlap).not.toHaveBeenCalled();
    });

    it("returns empty labels when there are no detections", () => {
        const result = matchDetections(partition([], 2), 0.5, fixed([]));
        expect(result.labels).toEqual([]);
        expect(result.numGroundTruths).toBe(2);
    });

    it("matches an exact overlap", () => {
        const result = matchDetections(partition([0.9], 1), 0.5, fixed([[1]]));
        expect(result.labels).toEqual([true]);
        expect(result.matchedGroundTruth).toEqual([0]);
    });

    it("rejects an overlap below the threshold", () => {
        const result = matchDetections(partition([0.9], 1), 0.5, fixed([[0.3]]));
        expect(result.labels).toEqual([false]);
    });

    it("accepts an overlap equal to the threshold", () => {
        const result = matchDetections(partition([0.9], 1), 0.5, fixed([[0.5]]));
        expect(result.labels).toEqual([true]);
    });

    it("gives a contested ground truth to the higher score", () => {
        // input order: 0.8 first, 0.9 second; both overlap gt 0 at 0.9
        const result = matchDetections(partition([0.8, 0.9], 2), 0.5, fixed([[0.9, 0], [0.9, 0]]));
        expect(result.order).toEqual([1, 0]);
        expect(result.scores).toEqual([0.9, 0.8]);
        expect(result.labels).toEqual([true, false]);
        expect(result.matchedGroundTruth).toEqual([0, -1]);
    });

    it("prefers confidence over a better overlap", () => {
        const result = matchDetections(partition([0.9, 0.6], 1), 0.5, fixed([[0.6], [0.95]]));
        expect(result.labels).toEqual([true, false]);
    });

    it("only considers the best ground truth of each detection", () => {
        // second detection's best gt (0) is taken; gt 1 also clears the threshold but is not tried
        const result = matchDetections(partition([0.9, 0.8], 2), 0.5, fixed([[0.9, 0.6], [0.8, 0.7]]));
        expect(result.labels).toEqual([true, false]);
        expect(result.matchedGroundTruth).toEqual([0, -1]);
    });

    it("breaks equal-score ties by input order", () => {
        const result = matchDetections(partition([0.5, 0.5], 1), 0.5, fixed([[0.9], [0.9]]));
        expect(result.order).toEqual([0, 1]);
        expect(result.labels).toEqual([true, false]);
    });

    it("breaks equal-overlap ties by the lowest ground-truth index", () => {
        const result = matchDetections(partition([0.9], 2), 0.5, fixed([[0.7, 0.7]]));
        expect(result.matchedGroundTruth).toEqual([0]);
    });

    it("never assigns one ground truth twice", () => {
        const result = matchDetections(
            partition([0.9, 0.8, 0.7, 0.6], 2),
            0.5,
            fixed([[0.9, 0.1], [0.8, 0.2], [0.1, 0.7], [0.2, 0.9]]),
        );
        const claimed = result.matchedGroundTruth.filter((g) => g >= 0);
        expect(new Set(claimed).size).toBe(claimed.length);
        expect(result.labels).toEqual([true, false, true, false]);
    });

    it("works with real boxes and the default overlap", () => {
        const p = partitionByClass(
            {
                boxes: [[0, 0, 10, 10], [50, 50, 60, 60], [1, 0, 11, 10]],
                labels: [0, 0, 0],
                scores: [0.7, 0.9, 0.8],
            },
            { boxes: [[0, 0, 10, 10], [50, 50, 60, 60]], labels: [0, 0] },
            0,
        );
        const result = matchDetections(p, 0.5, bboxOverlaps);
        // order: 0.9 (idx 1), 0.8 (idx 2), 0.7 (idx 0)
        expect(result.order).toEqual([1, 2, 0]);
        expect(result.labels).toEqual([true, true, false]);
        expect(result.matchedGroundTruth).toEqual([1, 0, -1]);
    });

    it("rejects an overlap matrix of the wrong shape", () => {
        expect(() => matchDetections(partition([0.9, 0.8], 1), 0.5, fixed([[1]]))).toThrow(ValidationError);
    });

    it("rejects non-finite overlap values", () => {
        expect(() => matchDetections(partition([0.9], 1), 0.5, fixed([[Number.NaN]]))).toThrow(
            "Overlap function returned NaN at [0][0], expected a value in [0, 1]",
        );
    });

    it("rejects overlap values outside [0, 1]", () => {
        const run = (value: number) => () => matchDetections(partition([0.9, 0.8], 1), 0.5, fixed([[0.2], [value]]));
        expect(run(1.5)).toThrow(ValidationError);
        expect(run(1.5)).toThrow("Overlap function returned 1.5 at [1][0], expected a value in [0, 1]");
        expect(run(-0.1)).toThrow(ValidationError);
    });
});
