export { loadConfig, type ResizeConfig } from "./config.js";
export { logger, type Logger } from "./logger.js";
export { sharpCodec, formatFromPath, sameFormat, type ImageCodec, type ImageHandle, type OutputFormat } from "./services/codec.js";
export { resizeImage, deriveOutputPath, DEFAULT_TARGET, EXPECTED_SOURCE, type ResizeDeps } from "./services/resizeService.js";
export {
    batchResize,
    listImageFiles,
    matchesExtension,
    DEFAULT_EXTENSIONS,
    DEFAULT_OUTPUT_SUBDIR,
    type ListOptions
} from "./services/batchService.js";
export { organizeAssetFolders, ASSET_DIRS, SCENE_EXTENSIONS } from "./services/assetFolderService.js";
export { runCli } from "./program.js";
export { ResizeError, type ResizeErrorKind } from "./utils/errors.js";
export type * from "./types/dto.js";
