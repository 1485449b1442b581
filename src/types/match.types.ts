import type {Box} from "./detection.types";

/** Detections and ground truths of a single class on a single image. */
export type ClassPartition = {
    classIndex: number;
    detections: {
        boxes: Box[];
        scores: number[];
        indices: number[];              // Positions in the image's detection arrays
    };
    groundTruths: {
        boxes: Box[];
        indices: number[];
    };
};

/**
 * Greedy match outcome for one (class, image) pair.
 * Every array is aligned with `order`, i.e. with the detections sorted by descending score.
 */
export type MatchResult = {
    classIndex: number;
    order: number[];                    // Indices into the partition's detections
    scores: number[];
    labels: boolean[];                  // true = true positive
    matchedGroundTruth: number[];       // Claimed ground-truth index in the partition, or -1
    numGroundTruths: number;
};

export type ClassStatistics = {
    classIndex: number;
    numGroundTruths: number;
    labels: boolean[];                  // Flattened over images, sorted by descending score
    scores: number[];
    cumulativeTruePositives: number[];
    cumulativeFalsePositives: number[];
};

export type PrecisionRecallPoint = {
    precision: number;
    recall: number;
};

/** Match outcome of one class on one image, with the partition it indexes into. */
export type ImageClassMatch = {
    partition: ClassPartition;
    match: MatchResult;
};
