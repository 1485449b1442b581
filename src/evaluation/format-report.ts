import type {MapEvaluationResult} from "../interfaces/map-evaluation-result";

const NAME_WIDTH = 20;
const COUNT_WIDTH = 6;
const AP_WIDTH = 8;

function classLabel(classIndex: number, className?: string): string {
    const label = className ? `${classIndex} ${className}` : String(classIndex);
    return label.length < NAME_WIDTH ? label : label.slice(0, NAME_WIDTH - 1);
}

/** Fixed-width per-class table followed by the mAP line. */
export function formatReport(result: MapEvaluationResult): string {
    const header =
        "class".padEnd(NAME_WIDTH) +
        ["gt", "det", "tp", "fp"].map((h) => h.padStart(COUNT_WIDTH)).join("") +
        "ap".padStart(AP_WIDTH);

    const rows = result.classes.map((c) =>
        classLabel(c.classIndex, c.className).padEnd(NAME_WIDTH) +
        [c.numGroundTruths, c.numDetections, c.truePositives, c.falsePositives]
            .map((v) => String(v).padStart(COUNT_WIDTH))
            .join("") +
        c.averagePrecision.toFixed(4).padStart(AP_WIDTH)
    );

    const footer = `mAP@${result.iouThreshold} = ${result.meanAp.toFixed(4)} over ${result.numImages} images`;
    return [header, ...rows, footer].join("\n");
}
