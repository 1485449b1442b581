export interface ClassEvaluation {
    classIndex: number;
    className?: string;                 // From classes.txt / classNames option, if known
    numGroundTruths: number;            // Recall denominator over the whole dataset
    numDetections: number;
    truePositives: number;
    falsePositives: number;
    averagePrecision: number;           // 11-point interpolated, in [0..1]
}

export interface MapEvaluationResult {
    meanAp: number;
    apPerClass: number[];               // Indexed by class
    classes: ClassEvaluation[];

    iouThreshold: number;
    numImages: number;
    numClasses: number;

    timestamp: string;                  // ISO 8601 timestamp
}

/** Shape returned by `computeMap`. */
export interface MapSummary {
    meanAp: number;
    apPerClass: number[];
}
