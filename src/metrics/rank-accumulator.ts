import type {ClassStatistics, MatchResult} from "../types/match.types";
import {rankByScore} from "./greedy-matcher";

/**
 * Sorts (label, score) pairs by descending score and returns running TP / FP counts.
 * Ties keep the order in which the pairs were given.
 */
export function accumulateRanks(labels: boolean[], scores: number[]): {
    labels: boolean[];
    scores: number[];
    cumulativeTruePositives: number[];
    cumulativeFalsePositives: number[];
} {
    if (labels.length !== scores.length) {
        throw new Error(`labels/scores length mismatch: ${labels.length} vs ${scores.length}`);
    }

    const order = rankByScore(scores);
    const sortedLabels = order.map((i) => labels[i]);
    const sortedScores = order.map((i) => scores[i]);

    const cumulativeTruePositives: number[] = [];
    const cumulativeFalsePositives: number[] = [];
    let tp = 0, fp = 0;
    for (const isTruePositive of sortedLabels) {
        if (isTruePositive) tp++; else fp++;
        cumulativeTruePositives.push(tp);
        cumulativeFalsePositives.push(fp);
    }

    return {
        labels: sortedLabels,
        scores: sortedScores,
        cumulativeTruePositives,
        cumulativeFalsePositives,
    };
}

/** Per-class collector, filled image by image and finalized once. */
export class ClassAccumulator {
    private readonly labels: boolean[] = [];
    private readonly scores: number[] = [];
    private numGroundTruths = 0;

    constructor(public readonly classIndex: number) {}

    add(match: MatchResult): void {
        if (match.classIndex !== this.classIndex) {
            throw new Error(`Match for class ${match.classIndex} added to accumulator of class ${this.classIndex}`);
        }
        for (let i = 0; i < match.labels.length; i++) {
            this.labels.push(match.labels[i]);
            this.scores.push(match.scores[i]);
        }
        this.numGroundTruths += match.numGroundTruths;
    }

    get numDetections(): number {
        return this.labels.length;
    }

    finalize(): ClassStatistics {
        return {
            classIndex: this.classIndex,
            numGroundTruths: this.numGroundTruths,
            ...accumulateRanks(this.labels, this.scores),
        };
    }
}
