export const ErrorCode = {
    TITLE_UNPARSEABLE: "TITLE_UNPARSEABLE",
    NO_CANDIDATE_FOUND: "NO_CANDIDATE_FOUND",
    SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
    INVALID_DURATION: "INVALID_DURATION",
    CACHE_CORRUPT: "CACHE_CORRUPT",
    INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for every failure the lyrics pipeline reports.
 * Only INVALID_CONFIG ever reaches the user as a fatal error; the rest are
 * turned into a display state by the alignment loop.
 */
export class LyricsError extends Error {
    public readonly code: ErrorCodeType;
    public readonly details?: unknown;

    constructor(code: ErrorCodeType, message: string, details?: unknown) {
        super(message);
        this.name = "LyricsError";
        this.code = code;
        this.details = details;
    }
}

export class ServiceUnavailableError extends LyricsError {
    public readonly status?: number;

    constructor(message: string, status?: number, details?: unknown) {
        super(ErrorCode.SERVICE_UNAVAILABLE, message, details);
        this.name = "ServiceUnavailableError";
        this.status = status;
    }
}

export class InvalidDurationError extends LyricsError {
    public readonly durationSeconds: number;

    constructor(message: string, durationSeconds: number) {
        super(ErrorCode.INVALID_DURATION, message);
        this.name = "InvalidDurationError";
        this.durationSeconds = durationSeconds;
    }
}

export class CacheCorruptError extends LyricsError {
    constructor(message: string, details?: unknown) {
        super(ErrorCode.CACHE_CORRUPT, message, details);
        this.name = "CacheCorruptError";
    }
}

export class ConfigError extends LyricsError {
    constructor(message: string, details?: unknown) {
        super(ErrorCode.INVALID_CONFIG, message, details);
        this.name = "ConfigError";
    }
}

export function isLyricsError(error: unknown): error is LyricsError {
    return error instanceof LyricsError;
}
