import { promises as fs } from "node:fs";
import path from "node:path";
import {EvaluationDumpSchema, toEvaluationError} from "../validation/evaluation-input.schema";
import type {EvaluationDump} from "../validation/evaluation-input.schema";
import {ValidationError} from "../errors/evaluation.errors";

/** Parses and validates the text of a JSON dump; `context` names it in error messages. */
export function parseEvaluationDump(text: string, context: string): EvaluationDump {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (e) {
        if (e instanceof SyntaxError) {
            throw new ValidationError(`Invalid ${context}: ${e.message}`);
        }
        throw e;
    }

    const parsed = EvaluationDumpSchema.safeParse(raw);
    if (!parsed.success) {
        throw toEvaluationError(parsed.error, context);
    }
    return parsed.data;
}

export async function readEvaluationDump(filePath: string): Promise<EvaluationDump> {
    const text = await fs.readFile(filePath, "utf8");
    return parseEvaluationDump(text, path.basename(filePath));
}

/** Class count from the dump, else from the class names found for it. */
export function resolveNumClasses(dump: EvaluationDump, classNames: string[]): number {
    const numClasses = dump.numClasses ?? classNames.length;
    if (!numClasses) {
        throw new ValidationError("numClasses is missing from the dump and no classes.txt was found");
    }
    return numClasses;
}
