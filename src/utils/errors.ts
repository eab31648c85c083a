export type ResizeErrorKind = "not_found" | "decode" | "io" | "other";

export class ResizeError extends Error {
    readonly kind: ResizeErrorKind;

    constructor(kind: ResizeErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ResizeError";
        this.kind = kind;
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

/**
 * Narrow whatever the filesystem or codec threw into a ResizeError.
 * An existing ResizeError keeps its own kind.
 */
export function toResizeError(kind: ResizeErrorKind, err: unknown, message?: string): ResizeError {
    if (err instanceof ResizeError) return err;
    return new ResizeError(kind, message ?? errorMessage(err), { cause: err });
}
