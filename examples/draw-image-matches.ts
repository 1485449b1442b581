import path from "node:path";
import { promises as fs } from "node:fs";
import sharp from "sharp";
import {MapEvaluator} from "../src/evaluation/map-evaluator";
import {drawMatchesOnBuffer} from "../src/utils/draw-matches";
import {findClassNamesBeside} from "../src/utils/read-class-names";
import {readEvaluationDump, resolveNumClasses} from "../src/utils/read-evaluation-dump";

const [, , dumpPathArg, imagePathArg] = process.argv;
if (!dumpPathArg || !imagePathArg) {
    console.error("Usage: tsx examples/draw-image-matches.ts path/to/dump.json path/to/image.jpg");
    process.exit(1);
}
const dumpPath = path.resolve(process.cwd(), dumpPathArg);
const imagePath = path.resolve(process.cwd(), imagePathArg);
const outDir = path.resolve(process.cwd(), "images/processed");
await fs.mkdir(outDir, { recursive: true });

try {
    const dump = await readEvaluationDump(dumpPath);
    const classNames = await findClassNamesBeside(dumpPath);
    const numClasses = resolveNumClasses(dump, classNames);

    // the dump is keyed by file name
    const image = dump.images.find((img) => img.id === path.basename(imagePath));
    if (!image) {
        throw new Error(`No entry for ${path.basename(imagePath)} in ${dumpPath}`);
    }

    const evaluator = new MapEvaluator({ classNames });
    const matches = evaluator.matchImage(image.detections, image.groundTruths, numClasses);
    const tp = matches.reduce((n, { match }) => n + match.labels.filter(Boolean).length, 0);
    console.log(`${image.id}: ${image.detections.scores.length} detections, ${tp} true positives`);

    const overlay = await drawMatchesOnBuffer(
        await fs.readFile(imagePath),
        image.detections,
        image.groundTruths,
        matches,
        { classNames },
    );
    const outPath = path.join(outDir, `matches-${path.basename(imagePath)}`);
    await sharp(overlay).toFile(outPath);
    console.log("Saved overlay:", outPath);
} catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`❌ ${message}`);
    process.exit(1);
}
