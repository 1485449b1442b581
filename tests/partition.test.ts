import { describe, expect, it } from "vitest";
import { partitionByClass } from "../src/metrics/partition";
import type { ImageDetections, ImageGroundTruths } from "../src/types/detection.types";

const detections: ImageDetections = {
    boxes: [[0, 0, 1, 1], [1, 1, 2, 2], [2, 2, 3, 3], [3, 3, 4, 4]],
    labels: [1, 0, 1, 2],
    scores: [0.3, 0.9, 0.7, 0.1],
};
const groundTruths: ImageGroundTruths = {
    boxes: [[0, 0, 1, 1], [5, 5, 6, 6]],
    labels: [1, 1],
};

describe("partitionByClass", () => {
    it("keeps the detections and ground truths of one class in input order", () => {
        const p = partitionByClass(detections, groundTruths, 1);
        expect(p.classIndex).toBe(1);
        expect(p.detections.indices).toEqual([0, 2]);
        expect(p.detections.scores).toEqual([0.3, 0.7]);
        expect(p.detections.boxes).toEqual([[0, 0, 1, 1], [2, 2, 3, 3]]);
        expect(p.groundTruths.indices).toEqual([0, 1]);
        expect(p.groundTruths.boxes).toEqual([[0, 0, 1, 1], [5, 5, 6, 6]]);
    });

    it("returns empty subsets for a class that is absent", () => {
        const p = partitionByClass(detections, groundTruths, 3);
        expect(p.detections).toEqual({ boxes: [], scores: [], indices: [] });
        expect(p.groundTruths).toEqual({ boxes: [], indices: [] });
    });

    it("handles detections without ground truth", () => {
        const p = partitionByClass(detections, groundTruths, 0);
        expect(p.detections.indices).toEqual([1]);
        expect(p.groundTruths.indices).toEqual([]);
    });
});
