import type { Dirent } from "node:fs";
import { mkdir, opendir, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { loadConfig } from "../config.js";
import { logger as defaultLogger } from "../logger.js";
import type { BatchJob, BatchReport, ResizeResult } from "../types/dto.js";
import { ResizeError, toResizeError } from "../utils/errors.js";
import { createLimiter, type Limit } from "../utils/limiter.js";
import { DEFAULT_TARGET, resizeImage, type ResizeDeps } from "./resizeService.js";

export const DEFAULT_EXTENSIONS: readonly string[] = [".png", ".jpg", ".jpeg", ".bmp", ".gif"];
export const DEFAULT_OUTPUT_SUBDIR = "resized_1024";

export interface ListOptions {
    extensions?: readonly string[];
    recursive?: boolean;
    sort?: boolean; // false: whatever order the filesystem hands back
    exclude?: readonly string[]; // directories never descended into
}

export function matchesExtension(name: string, extensions: readonly string[]): boolean {
    const lower = name.toLowerCase();
    return extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
}

export function byName(a: Dirent, b: Dirent): number {
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
}

async function* entriesOf(dir: string, sort: boolean): AsyncGenerator<Dirent> {
    if (sort) {
        yield* (await readdir(dir, { withFileTypes: true })).sort(byName);
        return;
    }
    yield* await opendir(dir);
}

async function isRegularFile(entry: Dirent, full: string): Promise<boolean> {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
        return (await stat(full)).isFile();
    } catch {
        return false; // dangling link
    }
}

/**
 * Lazily yields the image files of a directory. Each call walks the
 * directory again, so the sequence can be restarted by calling it anew.
 */
export async function* listImageFiles(dir: string, opts: ListOptions = {}): AsyncGenerator<string> {
    const extensions = opts.extensions ?? DEFAULT_EXTENSIONS;
    const excluded = new Set((opts.exclude ?? []).map((p) => path.resolve(p)));
    for await (const entry of entriesOf(dir, opts.sort ?? false)) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            if (opts.recursive && !excluded.has(path.resolve(full))) yield* listImageFiles(full, opts);
            continue;
        }
        if (matchesExtension(entry.name, extensions) && (await isRegularFile(entry, full))) yield full;
    }
}

function limiterFor(concurrency: number): Limit {
    try {
        return createLimiter(concurrency);
    } catch (err) {
        throw toResizeError("other", err);
    }
}

async function assertDirectory(dir: string) {
    try {
        if ((await stat(dir)).isDirectory()) return;
    } catch (err) {
        throw toResizeError("not_found", err, `Could not find the folder '${dir}'`);
    }
    throw new ResizeError("not_found", `'${dir}' is not a folder`);
}

/**
 * Resize every matching image of `job.inputDir` into `job.outputDir`, keeping
 * file names. Per-file failures are counted and skipped; the promise only
 * rejects when the job itself cannot run.
 */
export async function batchResize(job: BatchJob, deps: ResizeDeps = {}): Promise<BatchReport> {
    const log = deps.logger ?? defaultLogger;
    const { inputDir } = job;
    const outputDir = job.outputDir ?? path.join(inputDir, DEFAULT_OUTPUT_SUBDIR);
    const width = job.width ?? DEFAULT_TARGET.width;
    const height = job.height ?? DEFAULT_TARGET.height;

    const limit = limiterFor(job.concurrency ?? loadConfig().concurrency);
    await assertDirectory(inputDir);
    try {
        await mkdir(outputDir, { recursive: true });
    } catch (err) {
        throw toResizeError("io", err, `Could not create output folder '${outputDir}'`);
    }

    const tasks: Promise<ResizeResult>[] = [];
    const files = listImageFiles(inputDir, {
        extensions: job.extensions,
        recursive: job.recursive,
        sort: job.sort,
        exclude: [outputDir]
    });
    try {
        for await (const file of files) {
            const rel = path.relative(inputDir, file);
            const outputPath = path.join(outputDir, rel);
            tasks.push(
                limit(() => {
                    log.info({ file: rel }, `Processing: ${rel}`);
                    return resizeImage({ inputPath: file, outputPath, width, height, quality: job.quality }, deps);
                })
            );
        }
    } catch (err) {
        await Promise.all(tasks);
        throw toResizeError("not_found", err, `Could not list '${inputDir}'`);
    }

    const results = await Promise.all(tasks);
    const processed = results.filter((r) => r.ok).length;
    const failed = results.length - processed;
    if (failed) log.warn({ failed }, `${failed} images could not be resized`);
    log.info({ processed, outputDir }, `Batch processing complete! Processed ${processed} images.`);
    log.info({ outputDir }, `Output folder: ${outputDir}`);
    return { inputDir, outputDir, processed, failed, results };
}
