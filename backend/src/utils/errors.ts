/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",
    FFMPEG_NOT_FOUND = "FFMPEG_NOT_FOUND",

    // Planning input
    EMPTY_INPUT = "EMPTY_INPUT",
    INVALID_INPUT = "INVALID_INPUT",
    OVERSIZE_SOURCE_FILE = "OVERSIZE_SOURCE_FILE",

    // File system errors
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    FILE_READ_ERROR = "FILE_READ_ERROR",
    DISK_FULL = "DISK_FULL",
    PERMISSION_DENIED = "PERMISSION_DENIED",

    // Audio processing
    METADATA_PARSE_ERROR = "METADATA_PARSE_ERROR",
    COMBINE_FAILED = "COMBINE_FAILED",

    // Storage sink
    AUTH_EXPIRED = "AUTH_EXPIRED",
    AUTH_FAILED = "AUTH_FAILED",
    NETWORK_FAILURE = "NETWORK_FAILURE",
    DOWNLOAD_INCOMPLETE = "DOWNLOAD_INCOMPLETE",

    // Playback
    PLAYBACK_FAILED = "PLAYBACK_FAILED",
    NO_BOOK_SELECTED = "NO_BOOK_SELECTED",
    INVALID_STATE = "INVALID_STATE",
}

export type ErrorDetails = Record<string, unknown>;

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: ErrorDetails
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/** Empty or malformed source set; aborts a planning run. */
export class InputError extends AppError {
    constructor(message: string, details?: ErrorDetails, code = ErrorCode.INVALID_INPUT) {
        super(code, ErrorCategory.FATAL, message, details);
        this.name = "InputError";
    }
}

export class EmptyInputError extends InputError {
    constructor() {
        super("No source files to plan", undefined, ErrorCode.EMPTY_INPUT);
        this.name = "EmptyInputError";
    }
}

/** A file that cannot fit a segment without re-encoding. Never retried. */
export class CapacityError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ErrorCode.OVERSIZE_SOURCE_FILE, ErrorCategory.FATAL, message, details);
        this.name = "CapacityError";
    }
}

export class OversizeSingleFileError extends CapacityError {
    constructor(index: number, sizeBytes: number, maxSegmentBytes: number) {
        super(
            `Source file #${index} is ${sizeBytes} bytes, above the ${maxSegmentBytes} byte segment ceiling`,
            { index, sizeBytes, maxSegmentBytes }
        );
        this.name = "OversizeSingleFileError";
    }
}

/**
 * AUTH_EXPIRED is recoverable by re-authenticating once; AUTH_FAILED is not.
 */
export class AuthError extends AppError {
    constructor(message: string, expired: boolean, details?: ErrorDetails) {
        super(
            expired ? ErrorCode.AUTH_EXPIRED : ErrorCode.AUTH_FAILED,
            expired ? ErrorCategory.RECOVERABLE : ErrorCategory.FATAL,
            message,
            details
        );
        this.name = "AuthError";
    }

    get expired(): boolean {
        return this.code === ErrorCode.AUTH_EXPIRED;
    }
}

export class NetworkError extends AppError {
    constructor(message: string, details?: ErrorDetails, code = ErrorCode.NETWORK_FAILURE) {
        super(code, ErrorCategory.TRANSIENT, message, details);
        this.name = "NetworkError";
    }
}

export class PlaybackError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ErrorCode.PLAYBACK_FAILED, ErrorCategory.RECOVERABLE, message, details);
        this.name = "PlaybackError";
    }
}

/** Operation invoked in a state that cannot serve it. Surfaced, never retried. */
export class StateError extends AppError {
    constructor(message: string, details?: ErrorDetails, code = ErrorCode.INVALID_STATE) {
        super(code, ErrorCategory.FATAL, message, details);
        this.name = "StateError";
    }
}

export class NoBookSelectedError extends StateError {
    constructor(operation: string) {
        super(`No book selected (${operation})`, { operation }, ErrorCode.NO_BOOK_SELECTED);
        this.name = "NoBookSelectedError";
    }
}

/**
 * Check if an error is recoverable
 */
export function isRecoverable(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.RECOVERABLE;
    }
    return false;
}

/**
 * Check if an error is transient
 */
export function isTransient(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.TRANSIENT;
    }
    return false;
}

export function isAuthExpired(error: unknown): error is AuthError {
    return error instanceof AuthError && error.expired;
}

function readErrorCode(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err) {
        return typeof err.code === "string" ? err.code : undefined;
    }
    return undefined;
}

function readMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a Node.js error in an AppError
 */
export function wrapNodeError(err: unknown, context: string): AppError {
    const code = readErrorCode(err);
    const originalError = readMessage(err);

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.FILE_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `File not found: ${context}`,
            { originalError }
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            { originalError }
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            { originalError }
        );
    }

    return new AppError(
        ErrorCode.FILE_READ_ERROR,
        ErrorCategory.RECOVERABLE,
        `Failed to read file: ${context}`,
        { originalError }
    );
}

export function toUserMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
