import { describe, expect, it } from "vitest";
import { bboxOverlaps, boxArea, boxIoU } from "../src/utils/bbox-overlaps";

describe("boxIoU", () => {
    it("is 1 for identical boxes", () => {
        expect(boxIoU([0, 0, 10, 10], [0, 0, 10, 10])).toBe(1);
    });

    it("computes partial overlap", () => {
        // intersection 5x10 = 50, union 100 + 100 - 50 = 150
        expect(boxIoU([0, 0, 10, 10], [5, 0, 15, 10])).toBeCloseTo(1 / 3, 12);
    });

    it("is 0 for disjoint boxes and touching edges", () => {
        expect(boxIoU([0, 0, 10, 10], [20, 20, 30, 30])).toBe(0);
        expect(boxIoU([0, 0, 10, 10], [10, 0, 20, 10])).toBe(0);
    });

    it("is 0 when both boxes have zero area", () => {
        expect(boxIoU([5, 5, 5, 5], [5, 5, 5, 5])).toBe(0);
    });

    it("is symmetric", () => {
        const a: [number, number, number, number] = [1, 2, 11, 7];
        const b: [number, number, number, number] = [4, 0, 9, 12];
        expect(boxIoU(a, b)).toBe(boxIoU(b, a));
    });
});

describe("boxArea", () => {
    it("clamps inverted boxes to zero", () => {
        expect(boxArea([10, 10, 0, 0])).toBe(0);
        expect(boxArea([0, 0, 4, 3])).toBe(12);
    });
});

describe("bboxOverlaps", () => {
    it("returns an A x B matrix", () => {
        const m = bboxOverlaps(
            [[0, 0, 10, 10], [100, 100, 110, 110]],
            [[0, 0, 10, 10], [5, 0, 15, 10], [100, 100, 110, 110]],
        );
        expect(m).toHaveLength(2);
        expect(m[0]).toHaveLength(3);
        expect(m[0][0]).toBe(1);
        expect(m[0][2]).toBe(0);
        expect(m[1][2]).toBe(1);
    });

    it("handles empty inputs", () => {
        expect(bboxOverlaps([], [[0, 0, 1, 1]])).toEqual([]);
        expect(bboxOverlaps([[0, 0, 1, 1]], [])).toEqual([[]]);
    });
});
