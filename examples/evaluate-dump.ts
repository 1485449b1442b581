import path from "node:path";
import {DetectionOutputAccumulator} from "../src/evaluation/detection-accumulator";
import {MapEvaluator} from "../src/evaluation/map-evaluator";
import {formatReport} from "../src/evaluation/format-report";
import {findClassNamesBeside, readClassNames} from "../src/utils/read-class-names";
import {readEvaluationDump, resolveNumClasses} from "../src/utils/read-evaluation-dump";

const args = process.argv.slice(2);
const flags = args.filter((a) => a.startsWith("--"));
const [dumpPathArg, classesPathArg] = args.filter((a) => !a.startsWith("--"));
if (!dumpPathArg) {
    console.error("Usage: tsx examples/evaluate-dump.ts path/to/dump.json [path/to/classes.txt] [--iou=0.5] [--debug] [--json]");
    process.exit(1);
}

const iouFlag = flags.find((f) => f.startsWith("--iou="));
const iouThreshold = iouFlag ? Number(iouFlag.slice("--iou=".length)) : 0.5;
const debug = flags.includes("--debug");
const asJson = flags.includes("--json");

const dumpPath = path.resolve(process.cwd(), dumpPathArg);

try {
    const dump = await readEvaluationDump(dumpPath);
    const classNames = classesPathArg
        ? await readClassNames(path.resolve(process.cwd(), classesPathArg))
        : await findClassNamesBeside(dumpPath);
    const numClasses = resolveNumClasses(dump, classNames);

    const accumulator = new DetectionOutputAccumulator();
    accumulator.addBatch(dump.images);
    console.log(`🖼 Loaded ${accumulator.size} images`);

    const evaluator = new MapEvaluator({ iouThreshold, classNames, debug });
    const result = evaluator.evaluateSnapshot(accumulator.snapshot(), numClasses);
    console.log(asJson ? JSON.stringify(result, null, 2) : formatReport(result));
} catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`❌ ${message}`);
    process.exit(1);
}
