import { copyFile, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { loadConfig } from "../config.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import type { ResizeRequest, ResizeResult, TargetSize } from "../types/dto.js";
import { ResizeError, errorMessage, toResizeError } from "../utils/errors.js";
import { formatFromPath, sameFormat, sharpCodec, type ImageCodec, type ImageHandle } from "./codec.js";

export const DEFAULT_TARGET: TargetSize = { width: 1024, height: 1024 };
export const EXPECTED_SOURCE: TargetSize = { width: 2048, height: 2048 };

export interface ResizeDeps {
    codec?: ImageCodec;
    logger?: Logger;
}

/** `dir/photo.jpg` -> `dir/photo_1024x1024.jpg` */
export function deriveOutputPath(inputPath: string, size: TargetSize = DEFAULT_TARGET): string {
    const { dir, name, ext } = path.parse(inputPath);
    return path.format({ dir, base: `${name}_${size.width}x${size.height}${ext}` });
}

function assertTargetSize(size: TargetSize) {
    for (const [label, v] of Object.entries(size)) {
        if (!Number.isInteger(v) || v < 1) {
            throw new ResizeError("other", `Target ${label} must be a positive integer, got ${v}`);
        }
    }
}

async function readInput(inputPath: string): Promise<Buffer> {
    try {
        return await readFile(inputPath);
    } catch (err) {
        throw toResizeError("not_found", err, `Could not find the file '${inputPath}'`);
    }
}

async function writeOutput(outputPath: string, write: () => Promise<void>) {
    try {
        await mkdir(path.dirname(outputPath), { recursive: true });
        await write();
    } catch (err) {
        throw toResizeError("io", err, `Could not write '${outputPath}': ${errorMessage(err)}`);
    }
}

/**
 * Resize one image file and save it. Never rejects: every failure comes back
 * as `{ ok: false, kind }` so a batch can carry on.
 */
export async function resizeImage(request: ResizeRequest, deps: ResizeDeps = {}): Promise<ResizeResult> {
    const codec = deps.codec ?? sharpCodec;
    const log = deps.logger ?? defaultLogger;
    const { inputPath } = request;
    const target: TargetSize = {
        width: request.width ?? DEFAULT_TARGET.width,
        height: request.height ?? DEFAULT_TARGET.height
    };
    let outputPath = request.outputPath;

    try {
        assertTargetSize(target);
        const input = await readInput(inputPath);

        let image: ImageHandle;
        try {
            image = await codec.decode(input);
        } catch (err) {
            throw toResizeError("decode", err, `Could not decode '${inputPath}': ${errorMessage(err)}`);
        }

        log.info({ inputPath, width: image.width, height: image.height }, `Original image size: ${image.width} x ${image.height}`);
        const warnings: string[] = [];
        if (image.width !== EXPECTED_SOURCE.width || image.height !== EXPECTED_SOURCE.height) {
            const advisory = `Input image is not ${EXPECTED_SOURCE.width}x${EXPECTED_SOURCE.height}. Proceeding with resize...`;
            warnings.push(advisory);
            log.warn({ inputPath }, advisory);
        }

        const out = outputPath ?? deriveOutputPath(inputPath, target);
        outputPath = out;
        const format = formatFromPath(out);
        if (!format) throw new ResizeError("other", `Unsupported output format '${path.extname(out) || out}'`);

        const sameSize = image.width === target.width && image.height === target.height;
        const copied = sameSize && sameFormat(image.format, format);
        if (copied) {
            // already at target size in the same format: keep the exact bytes
            if (path.resolve(out) !== path.resolve(inputPath)) await writeOutput(out, () => copyFile(inputPath, out));
        } else {
            let data: Buffer;
            try {
                const resized = sameSize ? image : await codec.resize(image, target.width, target.height);
                data = await codec.encode(resized, format, { quality: request.quality ?? loadConfig().quality });
            } catch (err) {
                throw toResizeError("other", err, `Could not encode '${out}': ${errorMessage(err)}`);
            }
            await writeOutput(out, () => writeFile(out, data));
        }

        log.info({ inputPath, outputPath: out }, `Successfully resized image to ${target.width} x ${target.height}`);
        log.info({ outputPath: out }, `Saved to: ${out}`);
        return {
            ok: true,
            inputPath,
            outputPath: out,
            originalWidth: image.width,
            originalHeight: image.height,
            width: target.width,
            height: target.height,
            copied,
            warnings
        };
    } catch (e: unknown) {
        const err = toResizeError("other", e);
        log.error({ err, kind: err.kind, inputPath }, `Error: ${err.message}`);
        return { ok: false, inputPath, outputPath, kind: err.kind, error: err.message };
    }
}
