export interface ResizeConfig {
    logLevel: string;
    quality: number;
    concurrency: number;
}

const DEFAULT_QUALITY = 90;
const DEFAULT_CONCURRENCY = 1;

function positiveInt(raw: string | undefined, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
    const n = parseInt(raw || String(fallback), 10);
    if (!Number.isInteger(n) || n < 1 || n > max) return fallback;
    return n;
}

// Environment configurable defaults; CLI flags win over these.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResizeConfig {
    return {
        logLevel: env.LOG_LEVEL || "info",
        quality: positiveInt(env.RESIZE_QUALITY, DEFAULT_QUALITY, 100),
        concurrency: positiveInt(env.RESIZE_CONCURRENCY, DEFAULT_CONCURRENCY)
    };
}
