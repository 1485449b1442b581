import type {EvaluationImage, EvaluationSnapshot} from "../types/detection.types";
import {EvaluationError, ValidationError} from "../errors/evaluation.errors";

function deepFreeze<T>(value: T): T {
    if (value && typeof value === "object") {
        for (const inner of Object.values(value)) deepFreeze(inner);
        Object.freeze(value);
    }
    return value;
}

/**
 * Collects detector output image by image while a dataset is being consumed.
 * `snapshot()` closes the accumulator and returns a frozen copy for evaluation.
 */
export class DetectionOutputAccumulator {
    private readonly images: EvaluationImage[] = [];
    private readonly seenIds = new Set<string>();
    private closed = false;

    get size(): number {
        return this.images.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    addImage(image: EvaluationImage): void {
        if (this.closed) {
            throw new EvaluationError(`Accumulator is closed; cannot add image "${image.id}" after snapshot()`);
        }
        if (this.seenIds.has(image.id)) {
            throw new ValidationError(`Duplicate image id "${image.id}"`);
        }
        this.seenIds.add(image.id);
        // Stored by copy: later edits to the caller's arrays do not leak in.
        this.images.push(structuredClone(image));
    }

    addBatch(batch: EvaluationImage[]): void {
        for (const image of batch) this.addImage(image);
    }

    snapshot(): EvaluationSnapshot {
        this.closed = true;
        return deepFreeze({
            imageIds: this.images.map((img) => img.id),
            detections: this.images.map((img) => img.detections),
            groundTruths: this.images.map((img) => img.groundTruths),
        });
    }
}
