/** Axis-aligned box as [x1, y1, x2, y2]. */
export type Box = [number, number, number, number];

/** Detector output for one image. The three arrays are aligned by index. */
export type ImageDetections = {
    boxes: Box[];
    labels: number[];                   // Class index in [0, numClasses)
    scores: number[];                   // Used for ranking only, not normalized
};

/** Annotations for one image. `boxes` and `labels` are aligned by index. */
export type ImageGroundTruths = {
    boxes: Box[];
    labels: number[];
};

/** One image as collected from the detector, with an id for traceability. */
export type EvaluationImage = {
    id: string;
    detections: ImageDetections;
    groundTruths: ImageGroundTruths;
};

/** Complete, frozen input for one mAP run. All arrays are aligned per image. */
export type EvaluationSnapshot = {
    readonly imageIds: readonly string[];
    readonly detections: readonly ImageDetections[];
    readonly groundTruths: readonly ImageGroundTruths[];
};
