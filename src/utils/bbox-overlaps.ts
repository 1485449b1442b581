import type {Box} from "../types/detection.types";
import type {OverlapFunction} from "../interfaces/overlap.interface";

export function boxArea(box: Box): number {
    const [x1, y1, x2, y2] = box;
    return Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
}

/** Intersection-over-Union of two [x1, y1, x2, y2] boxes. Zero-area union yields 0. */
export function boxIoU(a: Box, b: Box): number {
    const intersectionWidth = Math.max(0, Math.min(a[2], b[2]) - Math.max(a[0], b[0]));
    const intersectionHeight = Math.max(0, Math.min(a[3], b[3]) - Math.max(a[1], b[1]));
    const intersectionArea = intersectionWidth * intersectionHeight;

    const unionArea = boxArea(a) + boxArea(b) - intersectionArea;
    return unionArea > 0 ? intersectionArea / unionArea : 0;
}

/** Default overlap primitive: IoU of every box in `boxesA` against every box in `boxesB`. */
export const bboxOverlaps: OverlapFunction = (boxesA, boxesB) =>
    boxesA.map((a) => boxesB.map((b) => boxIoU(a, b)));
