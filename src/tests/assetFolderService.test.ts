import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { organizeAssetFolders } from "../services/assetFolderService.js";
import { dimensionsOf, makeTempDir, removeDir, silentLogger, writeSample } from "./helpers.js";

const deps = { logger: silentLogger };

describe("organizeAssetFolders", () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        await writeSample(path.join(root, "chair", "chair_albedo.png"), 64, 64);
        await writeFile(path.join(root, "chair", "chair.usdz"), "scene");
        await writeFile(path.join(root, "chair", "readme.md"), "notes");
        await writeSample(path.join(root, "lamp", "lamp.JPG"), 48, 48, "jpeg");
        await writeSample(path.join(root, "loose.png"), 8, 8);
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it("files images into 2K and scenes into USD, then resizes 2K into 1k", async () => {
        const reports = await organizeAssetFolders(root, { concurrency: 1 }, deps);

        expect(reports.map((r) => [path.basename(r.folder), r.moved, r.movedScenes, r.batch.processed])).toEqual([
            ["chair", 1, 1, 1],
            ["lamp", 1, 0, 1]
        ]);
        expect(existsSync(path.join(root, "chair", "2K", "chair_albedo.png"))).toBe(true);
        expect(existsSync(path.join(root, "chair", "USD", "chair.usdz"))).toBe(true);
        expect(existsSync(path.join(root, "chair", "readme.md"))).toBe(true);
        expect(existsSync(path.join(root, "chair", "chair_albedo.png"))).toBe(false);
        expect(await dimensionsOf(path.join(root, "chair", "1k", "chair_albedo.png"))).toEqual({ width: 1024, height: 1024, format: "png" });
        expect(await dimensionsOf(path.join(root, "lamp", "1k", "lamp.JPG"))).toEqual({ width: 1024, height: 1024, format: "jpeg" });
    });

    it("leaves loose files at the root alone", async () => {
        await organizeAssetFolders(root, { concurrency: 1 }, deps);
        expect(existsSync(path.join(root, "loose.png"))).toBe(true);
        expect(existsSync(path.join(root, "2K"))).toBe(false);
    });

    it("can be run again over an already organized tree", async () => {
        await organizeAssetFolders(root, { concurrency: 1 }, deps);
        await mkdir(path.join(root, "chair", "extra"), { recursive: true });
        const reports = await organizeAssetFolders(root, { concurrency: 1 }, deps);

        expect(reports.map((r) => [path.basename(r.folder), r.moved, r.batch.processed])).toEqual([
            ["chair", 0, 1],
            ["lamp", 0, 1]
        ]);
    });

    it("rejects a root that does not exist", async () => {
        await expect(organizeAssetFolders(path.join(root, "missing"), {}, deps)).rejects.toMatchObject({ kind: "not_found" });
    });
});
