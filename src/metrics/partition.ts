import type {ImageDetections, ImageGroundTruths} from "../types/detection.types";
import type {ClassPartition} from "../types/match.types";

/**
 * Selects the detections and ground truths of one class on one image.
 * Input order is preserved; empty subsets are valid.
 */
export function partitionByClass(
    detections: ImageDetections,
    groundTruths: ImageGroundTruths,
    classIndex: number,
): ClassPartition {
    const partition: ClassPartition = {
        classIndex,
        detections: { boxes: [], scores: [], indices: [] },
        groundTruths: { boxes: [], indices: [] },
    };

    detections.labels.forEach((label, i) => {
        if (label !== classIndex) return;
        partition.detections.boxes.push(detections.boxes[i]);
        partition.detections.scores.push(detections.scores[i]);
        partition.detections.indices.push(i);
    });

    groundTruths.labels.forEach((label, i) => {
        if (label !== classIndex) return;
        partition.groundTruths.boxes.push(groundTruths.boxes[i]);
        partition.groundTruths.indices.push(i);
    });

    return partition;
}
