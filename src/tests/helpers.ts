import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { pino } from "pino";
import sharp from "sharp";

export const silentLogger = pino({ level: "silent" });

export type SampleFormat = "png" | "jpeg" | "gif" | "webp";

export async function createSampleBuffer(width: number, height: number, format: SampleFormat = "png"): Promise<Buffer> {
    const raw = Buffer.alloc(width * height * 3);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const i = (y * width + x) * 3;
            raw[i] = Math.floor((x * 255) / width);
            raw[i + 1] = Math.floor((y * 255) / height);
            raw[i + 2] = 128;
        }
    }
    return sharp(raw, { raw: { width, height, channels: 3 } })
        .toFormat(format)
        .toBuffer();
}

export async function writeSample(file: string, width: number, height: number, format: SampleFormat = "png"): Promise<string> {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, await createSampleBuffer(width, height, format));
    return file;
}

export async function makeTempDir(): Promise<string> {
    return mkdtemp(path.join(os.tmpdir(), "resize-1024-test-"));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

export async function dimensionsOf(file: string): Promise<{ width?: number; height?: number; format?: string }> {
    const { width, height, format } = await sharp(file).metadata();
    return { width, height, format };
}
