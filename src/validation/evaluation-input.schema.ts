import {z} from "zod";
import type {ImageDetections, ImageGroundTruths} from "../types/detection.types";
import {NumericValidityError, ValidationError} from "../errors/evaluation.errors";

const coordinate = z.number().finite();

export const BoxSchema = z.tuple([coordinate, coordinate, coordinate, coordinate]);

/** Class labels are integer indices; the upper bound is known only once numClasses is. */
function labelSchema(numClasses?: number) {
    const label = z.number().int().min(0);
    return numClasses === undefined
        ? label
        : label.max(numClasses - 1, {message: `Label must be in [0, ${numClasses})`});
}

function checkAligned(boxCount: number, lengths: Record<string, number>, ctx: z.RefinementCtx) {
    for (const [key, got] of Object.entries(lengths)) {
        if (got !== boxCount) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [key],
                message: `Expected ${boxCount} entries (one per box), got ${got}`,
            });
        }
    }
}

export function imageDetectionsSchema(numClasses?: number) {
    return z.object({
        boxes: z.array(BoxSchema),
        labels: z.array(labelSchema(numClasses)),
        scores: z.array(z.number().finite()),
    }).superRefine((value, ctx) =>
        checkAligned(value.boxes.length, {labels: value.labels.length, scores: value.scores.length}, ctx));
}

export function imageGroundTruthsSchema(numClasses?: number) {
    return z.object({
        boxes: z.array(BoxSchema),
        labels: z.array(labelSchema(numClasses)),
    }).superRefine((value, ctx) =>
        checkAligned(value.boxes.length, {labels: value.labels.length}, ctx));
}

export const EvaluationParamsSchema = z.object({
    numClasses: z.number().int().positive(),
    iouThreshold: z.number().finite().min(0).max(1),
});

export function evaluationInputSchema(numClasses: number) {
    return z.object({
        detections: z.array(imageDetectionsSchema(numClasses)),
        groundTruths: z.array(imageGroundTruthsSchema(numClasses)),
    }).superRefine((value, ctx) => {
        if (value.detections.length !== value.groundTruths.length) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["groundTruths"],
                message: `Expected ${value.detections.length} images (one per detection entry), got ${value.groundTruths.length}`,
            });
        }
    });
}

/** JSON dump of accumulated detector output, as read by the command-line example. */
export const EvaluationDumpSchema = z.object({
    numClasses: z.number().int().positive().optional(),
    images: z.array(z.object({
        id: z.string(),
        detections: imageDetectionsSchema(),
        groundTruths: imageGroundTruthsSchema(),
    })),
});

export type EvaluationDump = z.infer<typeof EvaluationDumpSchema>;

export function formatIssuePath(path: (string | number)[]): string {
    return path.reduce<string>((acc, part) => {
        if (typeof part === "number") return `${acc}[${part}]`;
        return acc ? `${acc}.${part}` : part;
    }, "");
}

function isNumericIssue(issue: z.ZodIssue): boolean {
    const onNumericField = issue.path.some((p) => p === "boxes" || p === "scores");
    if (!onNumericField) return false;
    if (issue.code === z.ZodIssueCode.not_finite) return true;
    return issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.nan;
}

/**
 * Turns a failed parse into one of the two evaluation error kinds.
 * Structural problems win over numeric ones when both are present.
 */
export function toEvaluationError(error: z.ZodError, context: string): ValidationError | NumericValidityError {
    const structural = error.issues.filter((issue) => !isNumericIssue(issue));
    const describe = (issue: z.ZodIssue) => {
        const where = formatIssuePath(issue.path);
        return where ? `${where}: ${issue.message}` : issue.message;
    };

    if (structural.length) {
        const lines = structural.map(describe);
        return new ValidationError(`Invalid ${context}: ${lines.join("; ")}`, lines);
    }
    const lines = error.issues.map(describe);
    return new NumericValidityError(`Non-finite value in ${context}: ${lines.join("; ")}`, lines);
}

export function validateEvaluationParams(numClasses: number, iouThreshold: number): void {
    const parsed = EvaluationParamsSchema.safeParse({numClasses, iouThreshold});
    if (!parsed.success) {
        throw toEvaluationError(parsed.error, "evaluation parameters");
    }
}

/** Validates detector output and annotations before any matching starts. */
export function validateEvaluationInput(
    input: { detections: unknown; groundTruths: unknown },
    numClasses: number,
): { detections: ImageDetections[]; groundTruths: ImageGroundTruths[] } {
    const parsed = evaluationInputSchema(numClasses).safeParse(input);
    if (!parsed.success) {
        throw toEvaluationError(parsed.error, "evaluation input");
    }
    return parsed.data;
}
