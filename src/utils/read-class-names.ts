import { promises as fs } from "node:fs";
import path from "node:path";

/** One class name per line; blank lines and surrounding whitespace are ignored. */
export function parseClassNames(text: string): string[] {
    return text.split(/\r?\n/).map((s) => s.trim()).filter(Boolean);
}

export async function readClassNames(filePath: string): Promise<string[]> {
    const text = await fs.readFile(filePath, "utf8");
    return parseClassNames(text);
}

/**
 * Looks for classes.txt in the directory of `filePath`.
 * Returns an empty list when there is none.
 */
export async function findClassNamesBeside(filePath: string): Promise<string[]> {
    const classesPath = path.join(path.dirname(filePath), "classes.txt");

    const exists = await fs.access(classesPath).then(() => true, () => false);
    if (!exists) return [];
    return readClassNames(classesPath);
}
