import type {Box} from "../types/detection.types";

/**
 * Pairwise overlap between two box sets.
 * Returns a boxesA.length x boxesB.length matrix of values in [0, 1].
 * overlap(a, b)[i][j] must equal overlap(b, a)[j][i].
 */
export type OverlapFunction = (boxesA: Box[], boxesB: Box[]) => number[][];
