import type { ResizeErrorKind } from "../utils/errors.js";

export interface TargetSize {
    width: number;
    height: number;
}

export interface ResizeRequest {
    inputPath: string;
    outputPath?: string; // derived from inputPath when absent
    width?: number;
    height?: number;
    quality?: number; // jpeg / webp / avif / tiff
}

export interface ResizeResultSuccess {
    ok: true;
    inputPath: string;
    outputPath: string;
    originalWidth: number;
    originalHeight: number;
    width: number;
    height: number;
    copied: boolean; // source already had the target size and format
    warnings: string[];
}

export interface ResizeResultError {
    ok: false;
    inputPath: string;
    outputPath?: string;
    kind: ResizeErrorKind;
    error: string;
}

export type ResizeResult = ResizeResultSuccess | ResizeResultError;

export interface BatchJob {
    inputDir: string;
    outputDir?: string; // {inputDir}/resized_1024
    extensions?: readonly string[];
    recursive?: boolean;
    sort?: boolean;
    concurrency?: number;
    width?: number;
    height?: number;
    quality?: number;
}

export interface BatchReport {
    inputDir: string;
    outputDir: string;
    processed: number;
    failed: number;
    results: ResizeResult[];
}

export interface AssetFolderReport {
    folder: string;
    moved: number;
    movedScenes: number;
    batch: BatchReport;
}
