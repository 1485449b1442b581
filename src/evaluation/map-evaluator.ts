import type {EvaluationSnapshot, ImageDetections, ImageGroundTruths} from "../types/detection.types";
import type {ImageClassMatch} from "../types/match.types";
import type {OverlapFunction} from "../interfaces/overlap.interface";
import type {ClassEvaluation, MapEvaluationResult, MapSummary} from "../interfaces/map-evaluation-result";
import {bboxOverlaps} from "../utils/bbox-overlaps";
import {validateEvaluationInput, validateEvaluationParams} from "../validation/evaluation-input.schema";
import {ValidationError} from "../errors/evaluation.errors";
import {partitionByClass} from "../metrics/partition";
import {matchDetections} from "../metrics/greedy-matcher";
import {ClassAccumulator} from "../metrics/rank-accumulator";
import {computePrecisionRecall} from "../metrics/precision-recall";
import {elevenPointAveragePrecision} from "../metrics/average-precision";
import {meanAveragePrecision} from "../metrics/mean-average-precision";

export type EvaluatorOptions = {
    iouThreshold?: number;          // Minimum overlap for a true positive
    overlap?: OverlapFunction;      // Pairwise overlap primitive, IoU by default
    classNames?: string[];          // Class order used by the detector, for reports only
    debug?: boolean;
};

type EvaluatorConfig = Required<EvaluatorOptions>;

const DEFAULT_OPTIONS: EvaluatorConfig = {
    iouThreshold: 0.5,
    overlap: bboxOverlaps,
    classNames: [],
    debug: false,
};

export function buildConfig(options: EvaluatorOptions = {}): EvaluatorConfig {
    return {
        iouThreshold: options.iouThreshold ?? DEFAULT_OPTIONS.iouThreshold,
        overlap: options.overlap ?? DEFAULT_OPTIONS.overlap,
        classNames: options.classNames ?? DEFAULT_OPTIONS.classNames,
        debug: options.debug ?? DEFAULT_OPTIONS.debug,
    };
}

/**
 * mAP@iouThreshold over a complete set of detector outputs.
 *
 * For every class, detections on each image are ranked by confidence and
 * greedily matched to ground truth (a higher-confidence detection wins a box
 * even if a later one overlaps it better; duplicates are false positives).
 * The per-image outcomes are pooled per class, re-ranked, and the
 * interpolated precision-recall curve is integrated on the 11-point grid.
 * mAP is the plain mean over all classes.
 */
export class MapEvaluator {
    private readonly config: EvaluatorConfig;

    constructor(options?: EvaluatorOptions) {
        this.config = buildConfig(options);
    }

    get iouThreshold(): number { return this.config.iouThreshold; }
    get classNames(): string[] { return this.config.classNames; }

    private log(text: string) {
        if (this.config.debug) {
            console.log(text);
        }
    }

    evaluate(
        detectionsPerImage: readonly ImageDetections[],
        groundTruthsPerImage: readonly ImageGroundTruths[],
        numClasses: number,
        imageIds?: readonly string[],
    ): MapEvaluationResult {
        this.checkParams(numClasses);
        const { detections, groundTruths } = validateEvaluationInput(
            { detections: detectionsPerImage, groundTruths: groundTruthsPerImage },
            numClasses,
        );
        if (imageIds && imageIds.length !== detections.length) {
            throw new ValidationError(`Expected ${detections.length} image ids, got ${imageIds.length}`);
        }

        this.log(`Evaluating ${detections.length} images, ${numClasses} classes, IoU >= ${this.config.iouThreshold}`);

        const accumulators = Array.from({ length: numClasses }, (_, c) => new ClassAccumulator(c));
        detections.forEach((imageDetections, i) => {
            const matches = this.matchValidatedImage(imageDetections, groundTruths[i], numClasses);
            for (const { match } of matches) {
                accumulators[match.classIndex].add(match);
            }
            if (imageIds) {
                const tp = matches.reduce((n, { match }) => n + match.labels.filter(Boolean).length, 0);
                this.log(`  ${imageIds[i]}: ${imageDetections.scores.length} detections, ${tp} true positives`);
            }
        });

        const classes = accumulators.map((acc) => this.evaluateClass(acc));
        const apPerClass = classes.map((c) => c.averagePrecision);
        const meanAp = meanAveragePrecision(apPerClass);

        this.log(`mAP@${this.config.iouThreshold} = ${meanAp.toFixed(4)}`);

        return {
            meanAp,
            apPerClass,
            classes,
            iouThreshold: this.config.iouThreshold,
            numImages: detections.length,
            numClasses,
            timestamp: new Date().toISOString(),
        };
    }

    evaluateSnapshot(snapshot: EvaluationSnapshot, numClasses: number): MapEvaluationResult {
        return this.evaluate(snapshot.detections, snapshot.groundTruths, numClasses, snapshot.imageIds);
    }

    /** Per-class match outcomes for one image, e.g. to draw them with `drawMatchesOnBuffer`. */
    matchImage(detections: ImageDetections, groundTruths: ImageGroundTruths, numClasses: number): ImageClassMatch[] {
        this.checkParams(numClasses);
        const valid = validateEvaluationInput({ detections: [detections], groundTruths: [groundTruths] }, numClasses);
        return this.matchValidatedImage(valid.detections[0], valid.groundTruths[0], numClasses);
    }

    private matchValidatedImage(
        detections: ImageDetections,
        groundTruths: ImageGroundTruths,
        numClasses: number,
    ): ImageClassMatch[] {
        const out: ImageClassMatch[] = [];
        for (let c = 0; c < numClasses; c++) {
            const partition = partitionByClass(detections, groundTruths, c);
            const match = matchDetections(partition, this.config.iouThreshold, this.config.overlap);
            out.push({ partition, match });
        }
        return out;
    }

    private evaluateClass(acc: ClassAccumulator): ClassEvaluation {
        const stats = acc.finalize();
        const curve = computePrecisionRecall(
            stats.cumulativeTruePositives,
            stats.cumulativeFalsePositives,
            stats.numGroundTruths,
        );
        const averagePrecision = elevenPointAveragePrecision(curve);

        const n = stats.labels.length;
        const row: ClassEvaluation = {
            classIndex: stats.classIndex,
            className: this.config.classNames[stats.classIndex],
            numGroundTruths: stats.numGroundTruths,
            numDetections: n,
            truePositives: n ? stats.cumulativeTruePositives[n - 1] : 0,
            falsePositives: n ? stats.cumulativeFalsePositives[n - 1] : 0,
            averagePrecision,
        };

        this.log(
            `  class ${row.classIndex}${row.className ? ` (${row.className})` : ""}: ` +
            `gt=${row.numGroundTruths} det=${row.numDetections} tp=${row.truePositives} ` +
            `fp=${row.falsePositives} ap=${averagePrecision.toFixed(4)}`
        );
        return row;
    }

    private checkParams(numClasses: number) {
        validateEvaluationParams(numClasses, this.config.iouThreshold);
        const names = this.config.classNames;
        if (names.length && names.length !== numClasses) {
            throw new ValidationError(`Got ${names.length} class names for ${numClasses} classes`);
        }
    }
}

/**
 * mAP over aligned per-image detections and ground truths.
 * Throws ValidationError / NumericValidityError on bad input; nothing is computed then.
 */
export function computeMap(
    detectionsPerImage: readonly ImageDetections[],
    groundTruthsPerImage: readonly ImageGroundTruths[],
    numClasses: number,
    iouThreshold = 0.5,
    options?: Omit<EvaluatorOptions, "iouThreshold">,
): MapSummary {
    const evaluator = new MapEvaluator({ ...options, iouThreshold });
    const { meanAp, apPerClass } = evaluator.evaluate(detectionsPerImage, groundTruthsPerImage, numClasses);
    return { meanAp, apPerClass };
}
