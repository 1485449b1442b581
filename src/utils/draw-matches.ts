import sharp from "sharp";
import type {Box, ImageDetections, ImageGroundTruths} from "../types/detection.types";
import type {ImageClassMatch} from "../types/match.types";

export type MatchPalette = {
    truePositive: string;
    falsePositive: string;
    matchedGroundTruth: string;
    missedGroundTruth: string;
};

export const DEFAULT_MATCH_PALETTE: MatchPalette = {
    truePositive: "#22c55e",
    falsePositive: "#ef4444",
    matchedGroundTruth: "#3b82f6",
    missedGroundTruth: "#f97316",
};

export type MatchOverlayOptions = {
    classNames?: string[];
    palette?: Partial<MatchPalette>;
};

export type DetectionOutcome = {
    detectionIndex: number;             // Position in the image's detection arrays
    classIndex: number;
    score: number;
    truePositive: boolean;
};

/** Maps per-class match results back to image-level detection / ground-truth indices. */
export function collectOutcomes(matches: ImageClassMatch[]): {
    detections: DetectionOutcome[];
    matchedGroundTruths: Set<number>;
} {
    const detections: DetectionOutcome[] = [];
    const matchedGroundTruths = new Set<number>();

    for (const { partition, match } of matches) {
        match.order.forEach((subsetIdx, rank) => {
            detections.push({
                detectionIndex: partition.detections.indices[subsetIdx],
                classIndex: match.classIndex,
                score: match.scores[rank],
                truePositive: match.labels[rank],
            });
            const gt = match.matchedGroundTruth[rank];
            if (gt >= 0) matchedGroundTruths.add(partition.groundTruths.indices[gt]);
        });
    }
    detections.sort((a, b) => a.detectionIndex - b.detectionIndex);
    return { detections, matchedGroundTruths };
}

const esc = (s: string) => s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

function clampBox(box: Box, W: number, H: number) {
    const x1 = Math.max(0, Math.min(W, Math.round(box[0])));
    const y1 = Math.max(0, Math.min(H, Math.round(box[1])));
    const x2 = Math.max(0, Math.min(W, Math.round(box[2])));
    const y2 = Math.max(0, Math.min(H, Math.round(box[3])));
    return { x1, y1, x2, y2, w: x2 - x1, h: y2 - y1 };
}

/**
 * SVG overlay of one image's evaluation: dashed ground-truth boxes (matched or
 * missed) and solid detection boxes labelled "<class> <score> TP|FP".
 */
export function buildMatchOverlaySvg(
    W: number,
    H: number,
    detections: ImageDetections,
    groundTruths: ImageGroundTruths,
    matches: ImageClassMatch[],
    options: MatchOverlayOptions = {},
): string {
    const palette: MatchPalette = { ...DEFAULT_MATCH_PALETTE, ...(options.palette ?? {}) };
    const { detections: outcomes, matchedGroundTruths } = collectOutcomes(matches);

    const strokeWidth = Math.max(2, Math.floor(Math.min(W, H) * 0.003));
    const fontSize = Math.max(14, Math.floor(Math.min(W, H) * 0.025));
    const padX = Math.max(6, Math.floor(fontSize * 0.5));
    const padY = Math.max(4, Math.floor(fontSize * 0.35));

    let svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${W}" height="${H}">` +
        `<style>.lbl{font-family:-apple-system,BlinkMacSystemFont,Segoe UI,Roboto,Helvetica,Arial;font-size:${fontSize}px;font-weight:600;}</style>`;

    groundTruths.boxes.forEach((box, i) => {
        const b = clampBox(box, W, H);
        if (b.w <= 0 || b.h <= 0) return;
        const col = matchedGroundTruths.has(i) ? palette.matchedGroundTruth : palette.missedGroundTruth;
        svg += `<rect class="gt" x="${b.x1}" y="${b.y1}" width="${b.w}" height="${b.h}" fill="none" stroke="${col}" ` +
            `stroke-width="${strokeWidth}" stroke-dasharray="${strokeWidth * 3},${strokeWidth * 2}"/>`;
    });

    for (const o of outcomes) {
        const b = clampBox(detections.boxes[o.detectionIndex], W, H);
        if (b.w <= 0 || b.h <= 0) continue;

        const col = o.truePositive ? palette.truePositive : palette.falsePositive;
        const name = options.classNames?.[o.classIndex] ?? String(o.classIndex);
        const text = `${name} ${o.score.toFixed(2)} ${o.truePositive ? "TP" : "FP"}`;
        const approxW = Math.ceil(text.length * fontSize * 0.6);
        const bgW = approxW + padX * 2, bgH = fontSize + padY * 2;
        const bgY = Math.max(0, b.y1 - bgH - Math.max(2, strokeWidth));
        const labelX = b.x1 + padX, labelY = bgY + padY + Math.floor(fontSize * 0.8);

        svg += `<rect class="det" x="${b.x1}" y="${b.y1}" width="${b.w}" height="${b.h}" fill="none" stroke="${col}" stroke-width="${strokeWidth}"/>` +
            `<rect x="${b.x1}" y="${bgY}" width="${Math.min(bgW, W - b.x1)}" height="${bgH}" fill="${col}" opacity="0.85" rx="${Math.floor(bgH * 0.2)}"/>` +
            `<text x="${labelX}" y="${labelY}" class="lbl" fill="#fff">${esc(text)}</text>`;
    }
    return svg + `</svg>`;
}

export async function drawMatchesOnBuffer(
    imageBuffer: Buffer,
    detections: ImageDetections,
    groundTruths: ImageGroundTruths,
    matches: ImageClassMatch[],
    options?: MatchOverlayOptions,
): Promise<Buffer> {
    const meta = await sharp(imageBuffer).metadata();
    const W = meta.width ?? 0;
    const H = meta.height ?? 0;
    if (!W || !H) throw new Error("Could not determine image dimensions");

    const svg = buildMatchOverlaySvg(W, H, detections, groundTruths, matches, options);
    return await sharp(imageBuffer).composite([{ input: Buffer.from(svg), left: 0, top: 0 }]).toBuffer();
}
