export * from "./types/detection.types";
export * from "./types/match.types";
export * from "./interfaces/overlap.interface";
export * from "./interfaces/map-evaluation-result";
export * from "./errors/evaluation.errors";

export {partitionByClass} from "./metrics/partition";
export {matchDetections, rankByScore} from "./metrics/greedy-matcher";
export {ClassAccumulator, accumulateRanks} from "./metrics/rank-accumulator";
export {computePrecisionRecall, toCurve} from "./metrics/precision-recall";
export type {PrecisionRecall} from "./metrics/precision-recall";
export {elevenPointAveragePrecision, RECALL_THRESHOLDS} from "./metrics/average-precision";
export {meanAveragePrecision} from "./metrics/mean-average-precision";

export {MapEvaluator, computeMap, buildConfig} from "./evaluation/map-evaluator";
export type {EvaluatorOptions} from "./evaluation/map-evaluator";
export {DetectionOutputAccumulator} from "./evaluation/detection-accumulator";
export {formatReport} from "./evaluation/format-report";

export {
    EvaluationDumpSchema,
    validateEvaluationInput,
    validateEvaluationParams,
} from "./validation/evaluation-input.schema";
export type {EvaluationDump} from "./validation/evaluation-input.schema";

export {bboxOverlaps, boxIoU, boxArea} from "./utils/bbox-overlaps";
export {readClassNames, findClassNamesBeside, parseClassNames} from "./utils/read-class-names";
export {readEvaluationDump, parseEvaluationDump, resolveNumClasses} from "./utils/read-evaluation-dump";
export {buildMatchOverlaySvg, drawMatchesOnBuffer, collectOutcomes, DEFAULT_MATCH_PALETTE} from "./utils/draw-matches";
export type {MatchPalette, MatchOverlayOptions, DetectionOutcome} from "./utils/draw-matches";
