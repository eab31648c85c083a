import path from "node:path";
import sharp, { type Sharp } from "sharp";
import { Jimp } from "jimp";

export type OutputFormat = "png" | "jpeg" | "webp" | "gif" | "tiff" | "avif" | "bmp";
export type Channels = 1 | 2 | 3 | 4;

/** A decoded bitmap: raw, interleaved pixels plus the format it was decoded from. */
export interface ImageHandle {
    data: Buffer;
    width: number;
    height: number;
    channels: Channels;
    format: string;
}

export interface EncodeOptions {
    quality: number;
}

/** The image library seam used by the resizer; tests may swap it. */
export interface ImageCodec {
    decode(buffer: Buffer): Promise<ImageHandle>;
    resize(image: ImageHandle, width: number, height: number): Promise<ImageHandle>;
    encode(image: ImageHandle, format: OutputFormat, opts: EncodeOptions): Promise<Buffer>;
}

const EXTENSION_FORMATS = new Map<string, OutputFormat>([
    [".png", "png"],
    [".jpg", "jpeg"],
    [".jpeg", "jpeg"],
    [".webp", "webp"],
    [".gif", "gif"],
    [".tif", "tiff"],
    [".tiff", "tiff"],
    [".avif", "avif"],
    [".bmp", "bmp"]
]);

const FORMAT_ALIASES = new Map<string, string>([
    ["jpg", "jpeg"],
    ["tif", "tiff"]
]);

export function formatFromPath(file: string): OutputFormat | undefined {
    return EXTENSION_FORMATS.get(path.extname(file).toLowerCase());
}

export function sameFormat(a: string, b: string): boolean {
    const norm = (f: string) => FORMAT_ALIASES.get(f.toLowerCase()) ?? f.toLowerCase();
    return norm(a) === norm(b);
}

// libvips as shipped with sharp has no BMP loader, so BMP goes through jimp
function isBmp(buf: Buffer): boolean {
    return buf.length > 2 && buf[0] === 0x42 && buf[1] === 0x4d;
}

function fromRaw(image: ImageHandle): Sharp {
    return sharp(image.data, { raw: { width: image.width, height: image.height, channels: image.channels } });
}

async function decode(buffer: Buffer): Promise<ImageHandle> {
    if (isBmp(buffer)) {
        const image = await Jimp.read(buffer);
        const { data, width, height } = image.bitmap;
        return { data: Buffer.from(data), width, height, channels: 4, format: "bmp" };
    }
    const pipeline = sharp(buffer, { failOn: "warning" });
    const meta = await pipeline.metadata();
    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: info.channels, format: meta.format ?? "unknown" };
}

/** Lanczos3 remap to exactly width x height. Aspect ratio is not kept. */
async function resize(image: ImageHandle, width: number, height: number): Promise<ImageHandle> {
    const { data, info } = await fromRaw(image)
        .resize(width, height, { fit: "fill", kernel: sharp.kernel.lanczos3 })
        .raw()
        .toBuffer({ resolveWithObject: true });
    return { ...image, data, width: info.width, height: info.height, channels: info.channels };
}

async function encode(image: ImageHandle, format: OutputFormat, opts: EncodeOptions): Promise<Buffer> {
    if (format === "bmp") {
        const rgba = image.channels === 4 ? image.data : await fromRaw(image).toColourspace("srgb").ensureAlpha().raw().toBuffer();
        return Jimp.fromBitmap({ data: rgba, width: image.width, height: image.height }).getBuffer("image/bmp");
    }
    let pipeline = fromRaw(image);
    switch (format) {
        case "png":
            pipeline = pipeline.png({ compressionLevel: 9 });
            break;
        case "jpeg":
            pipeline = pipeline.jpeg({ quality: opts.quality, mozjpeg: true });
            break;
        case "webp":
            pipeline = pipeline.webp({ quality: opts.quality });
            break;
        case "gif":
            pipeline = pipeline.gif();
            break;
        case "tiff":
            pipeline = pipeline.tiff({ quality: opts.quality });
            break;
        case "avif":
            pipeline = pipeline.avif({ quality: opts.quality });
            break;
    }
    return pipeline.toBuffer();
}

export const sharpCodec: ImageCodec = { decode, resize, encode };
