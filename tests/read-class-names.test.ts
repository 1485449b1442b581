import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { findClassNamesBeside, parseClassNames, readClassNames } from "../src/utils/read-class-names";

let dir = "";

beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "class-names-"));
});

afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
});

describe("parseClassNames", () => {
    it("splits lines and drops blanks", () => {
        expect(parseClassNames("person\r\n\n  car \nbicycle\n")).toEqual(["person", "car", "bicycle"]);
    });
});

describe("readClassNames", () => {
    it("reads classes.txt", async () => {
        const file = path.join(dir, "classes.txt");
        await fs.writeFile(file, "cat\ndog\n", "utf8");
        await expect(readClassNames(file)).resolves.toEqual(["cat", "dog"]);
    });

    it("fails for a missing file", async () => {
        await expect(readClassNames(path.join(dir, "nope.txt"))).rejects.toThrow();
    });
});

describe("findClassNamesBeside", () => {
    it("finds classes.txt next to a dump file", async () => {
        await fs.writeFile(path.join(dir, "classes.txt"), "person\ncar\n", "utf8");
        await expect(findClassNamesBeside(path.join(dir, "dump.json"))).resolves.toEqual(["person", "car"]);
    });

    it("returns an empty list when there is no classes.txt", async () => {
        await expect(findClassNamesBeside(path.join(dir, "dump.json"))).resolves.toEqual([]);
    });
});
