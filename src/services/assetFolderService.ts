import type { Dirent } from "node:fs";
import { mkdir, readdir, rename } from "node:fs/promises";
import path from "node:path";
import { logger as defaultLogger } from "../logger.js";
import type { AssetFolderReport, BatchJob } from "../types/dto.js";
import { toResizeError } from "../utils/errors.js";
import { DEFAULT_EXTENSIONS, batchResize, byName, matchesExtension } from "./batchService.js";
import type { ResizeDeps } from "./resizeService.js";

export const SCENE_EXTENSIONS: readonly string[] = [".usda", ".usdc", ".usdz"];

// Layout inside each asset folder
export const ASSET_DIRS = {
    scenes: "USD",
    source: "2K",
    target: "1k"
} as const;

export type AssetBatchOptions = Omit<BatchJob, "inputDir" | "outputDir" | "recursive">;

async function readFolder(dir: string): Promise<Dirent[]> {
    try {
        return (await readdir(dir, { withFileTypes: true })).sort(byName);
    } catch (err) {
        throw toResizeError("not_found", err, `Could not find the folder '${dir}'`);
    }
}

async function moveInto(folder: string, name: string, destDir: string) {
    try {
        await rename(path.join(folder, name), path.join(destDir, name));
    } catch (err) {
        throw toResizeError("io", err, `Could not move '${name}' into '${destDir}'`);
    }
}

/**
 * For every folder under `root`: file the source images into `2K/` and USD
 * scenes into `USD/`, then resize `2K/` into `1k/`.
 */
export async function organizeAssetFolders(
    root: string,
    opts: AssetBatchOptions = {},
    deps: ResizeDeps = {}
): Promise<AssetFolderReport[]> {
    const log = deps.logger ?? defaultLogger;
    const extensions = opts.extensions ?? DEFAULT_EXTENSIONS;
    const reports: AssetFolderReport[] = [];

    for (const entry of await readFolder(root)) {
        if (!entry.isDirectory()) continue;
        const folder = path.join(root, entry.name);
        const scenes = path.join(folder, ASSET_DIRS.scenes);
        const source = path.join(folder, ASSET_DIRS.source);
        const target = path.join(folder, ASSET_DIRS.target);
        try {
            for (const dir of [scenes, source, target]) await mkdir(dir, { recursive: true });
        } catch (err) {
            throw toResizeError("io", err, `Could not prepare '${folder}'`);
        }

        let moved = 0;
        let movedScenes = 0;
        for (const file of await readFolder(folder)) {
            if (!file.isFile()) continue;
            if (matchesExtension(file.name, extensions)) {
                await moveInto(folder, file.name, source);
                moved++;
            } else if (matchesExtension(file.name, SCENE_EXTENSIONS)) {
                await moveInto(folder, file.name, scenes);
                movedScenes++;
            }
        }
        log.info({ folder, moved, movedScenes }, `Organized ${entry.name}: ${moved} images, ${movedScenes} scenes`);

        const batch = await batchResize({ ...opts, inputDir: source, outputDir: target }, deps);
        reports.push({ folder, moved, movedScenes, batch });
    }
    return reports;
}
