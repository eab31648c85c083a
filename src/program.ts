import { stat } from "node:fs/promises";
import path from "node:path";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { loadConfig } from "./config.js";
import { organizeAssetFolders } from "./services/assetFolderService.js";
import { DEFAULT_OUTPUT_SUBDIR, batchResize, listImageFiles, type ListOptions } from "./services/batchService.js";
import { DEFAULT_TARGET, resizeImage, type ResizeDeps } from "./services/resizeService.js";
import type { BatchReport, TargetSize } from "./types/dto.js";
import { ResizeError, toResizeError } from "./utils/errors.js";

export interface CliIO {
    out(text: string): void;
    err(text: string): void;
}

interface CliOptions {
    size: TargetSize;
    quality?: number;
    batch?: boolean;
    folders?: boolean;
    extensions?: string[];
    recursive?: boolean;
    sort?: boolean;
    concurrency?: number;
}

const consoleIO: CliIO = {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text)
};

export function parseSize(value: string): TargetSize {
    const m = /^(\d+)x(\d+)$/i.exec(value.trim());
    const width = m ? parseInt(m[1], 10) : 0;
    const height = m ? parseInt(m[2], 10) : 0;
    if (width < 1 || height < 1) throw new InvalidArgumentError("Expected WIDTHxHEIGHT, e.g. 1024x1024.");
    return { width, height };
}

function parseIntIn(min: number, max: number) {
    return (value: string): number => {
        const n = Number(value);
        if (!Number.isInteger(n) || n < min || n > max) throw new InvalidArgumentError(`Expected an integer from ${min} to ${max}.`);
        return n;
    };
}

export function parseExtensions(value: string): string[] {
    return value
        .split(",")
        .map((e) => e.trim().toLowerCase())
        .filter(Boolean)
        .map((e) => (e.startsWith(".") ? e : `.${e}`));
}

async function isDirectory(p: string): Promise<boolean> {
    try {
        return (await stat(p)).isDirectory();
    } catch {
        return false; // let the single resize report the missing file
    }
}

async function hasImages(dir: string, opts: ListOptions): Promise<boolean> {
    const files = listImageFiles(dir, opts);
    try {
        return !(await files.next()).done;
    } catch (err) {
        throw toResizeError("not_found", err, `Could not list '${dir}'`);
    } finally {
        await files.return(undefined);
    }
}

function summarize(report: BatchReport): string {
    return `Processed ${report.processed} images, ${report.failed} failed. Output folder: ${report.outputDir}\n`;
}

export function createProgram(io: CliIO, deps: ResizeDeps, setExitCode: (code: number) => void): Command {
    const program = new Command();
    program
        .name("resize-1024")
        .description("Resize 2048x2048 images to 1024x1024 with Lanczos resampling")
        .argument("<input>", "image to resize, or a folder in batch / folders mode")
        .argument("[output]", "output image (default: <name>_1024x1024<ext>), or output folder in batch mode")
        .addOption(new Option("-s, --size <WxH>", "target size").argParser(parseSize).default(DEFAULT_TARGET, "1024x1024"))
        .addOption(new Option("-q, --quality <n>", "jpeg/webp/avif/tiff quality").argParser(parseIntIn(1, 100)))
        .option("-b, --batch", "resize every image in the <input> folder")
        .option("-f, --folders", "lay out each asset folder under <input> as 2K/, 1k/ and USD/, then resize 2K into 1k")
        .addOption(new Option("-e, --extensions <list>", "comma-separated extensions for batch mode").argParser(parseExtensions))
        .option("-r, --recursive", "descend into subfolders in batch mode")
        .option("--sort", "process files in name order instead of filesystem order")
        .addOption(
            new Option("-c, --concurrency <n>", "images resized at once in batch mode").argParser(parseIntIn(1, 64))
        )
        .addHelpText("after", "\nExample:\n  resize-1024 image_2048.png image_1024.png\n  resize-1024 --batch ./textures")
        .showHelpAfterError()
        .exitOverride()
        .configureOutput({ writeOut: (str) => io.out(str), writeErr: (str) => io.err(str) })
        .action(async (input: string, output: string | undefined, options: CliOptions) => {
            const config = loadConfig();
            const { width, height } = options.size;
            const quality = options.quality ?? config.quality;
            const concurrency = options.concurrency ?? config.concurrency;
            const batchOpts = { width, height, quality, concurrency, extensions: options.extensions, sort: options.sort };
            try {
                if (options.folders) {
                    const reports = await organizeAssetFolders(input, batchOpts, deps);
                    let failed = 0;
                    for (const r of reports) {
                        io.out(`${r.folder}: ${summarize(r.batch)}`);
                        failed += r.batch.failed;
                    }
                    setExitCode(failed ? 1 : 0);
                    return;
                }
                const inputIsDir = await isDirectory(input);
                if (options.batch || inputIsDir) {
                    const listing = {
                        extensions: options.extensions,
                        recursive: options.recursive,
                        exclude: [output ?? path.join(input, DEFAULT_OUTPUT_SUBDIR)]
                    };
                    if (inputIsDir && !(await hasImages(input, listing))) {
                        io.err(`Error: '${input}' has no images to resize\n`);
                        setExitCode(1);
                        return;
                    }
                    const report = await batchResize(
                        { ...batchOpts, inputDir: input, outputDir: output, recursive: options.recursive },
                        deps
                    );
                    io.out(summarize(report));
                    setExitCode(report.failed ? 1 : 0);
                    return;
                }
                const result = await resizeImage({ inputPath: input, outputPath: output, width, height, quality }, deps);
                if (result.ok) {
                    io.out(`${result.inputPath} -> ${result.outputPath} (${result.width}x${result.height})\n`);
                    setExitCode(0);
                } else {
                    io.err(`Error: ${result.error}\n`);
                    setExitCode(1);
                }
            } catch (err) {
                if (!(err instanceof ResizeError)) throw err;
                io.err(`Error: ${err.message}\n`);
                setExitCode(1);
            }
        });
    return program;
}

/** Runs the CLI on `argv` (without node and script path) and resolves with the exit code. */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO, deps: ResizeDeps = {}): Promise<number> {
    let exitCode = 0;
    const program = createProgram(io, deps, (code) => {
        exitCode = code;
    });
    try {
        await program.parseAsync([...argv], { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) return err.exitCode;
        throw err;
    }
    return exitCode;
}
