import axios from "axios";
import { isTransient } from "./errors";
import { logger } from "./logger";

const TRANSIENT_ERROR_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ECONNREFUSED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "EPIPE",
    "ERR_SOCKET_CLOSED",
]);

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

export interface RetryAttemptInfo {
    label: string;
    attempt: number;
    maxAttempts: number;
    delayMs: number;
    error: unknown;
}

export interface RetryOptions {
    /** Used in log lines; also identifies the operation whose attempts are counted. */
    label: string;
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    /** Upper bound of the random component added to each delay. */
    jitterMs?: number;
    shouldRetry?: (error: unknown, attempt: number) => boolean;
    onRetry?: (info: RetryAttemptInfo) => void;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
    signal?: AbortSignal;
}

export const DEFAULT_RETRY_MAX_ATTEMPTS = 4;
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;
export const DEFAULT_RETRY_MAX_DELAY_MS = 8_000;

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff with jitter: base, 2x base, 4x base, ... capped at `maxDelayMs`.
 * `attempt` is 1-based (the attempt that just failed).
 */
export function computeBackoffDelay(
    attempt: number,
    baseDelayMs: number,
    maxDelayMs: number,
    jitterMs = 0,
    random: () => number = Math.random,
): number {
    const exponential = baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
    const jitter = jitterMs > 0 ? random() * jitterMs : 0;
    return Math.min(Math.round(exponential + jitter), maxDelayMs);
}

/** Reads a `Retry-After` header (seconds) from an axios error response. */
export function readRetryAfterMs(error: unknown): number | null {
    if (!axios.isAxiosError(error)) {
        return null;
    }
    const raw: unknown = error.response?.headers?.["retry-after"];
    if (typeof raw !== "string" && typeof raw !== "number") {
        return null;
    }
    const parsed = Number.parseInt(String(raw), 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed * 1000 : null;
}

export function readHttpStatus(error: unknown): number | undefined {
    if (axios.isAxiosError(error)) {
        return error.response?.status;
    }
    return undefined;
}

export function isTransientRequestError(error: unknown): boolean {
    if (isTransient(error)) {
        return true;
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (typeof status === "number") {
            return RETRYABLE_STATUS.has(status);
        }
        if (error.code && TRANSIENT_ERROR_CODES.has(error.code)) {
            return true;
        }
    }

    if (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        typeof error.code === "string" &&
        TRANSIENT_ERROR_CODES.has(error.code)
    ) {
        return true;
    }

    const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
    return (
        message.includes("socket hang up") ||
        message.includes("network error") ||
        message.includes("timeout")
    );
}

/**
 * Runs `operation` until it succeeds, a non-retryable error is thrown, or
 * `maxAttempts` is reached. Attempt state lives in this call only, so
 * unrelated operations never share backoff.
 */
export async function retryWithBackoff<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions,
): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS);
    const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS);
    const maxDelayMs = Math.max(baseDelayMs, options.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS);
    const shouldRetry = options.shouldRetry ?? isTransientRequestError;
    const wait = options.sleep ?? sleep;

    for (let attempt = 1; ; attempt += 1) {
        try {
            return await operation(attempt);
        } catch (error) {
            if (attempt >= maxAttempts || !shouldRetry(error, attempt) || options.signal?.aborted) {
                throw error;
            }

            const retryAfter = readRetryAfterMs(error);
            const delayMs =
                retryAfter !== null
                    ? Math.min(retryAfter, maxDelayMs)
                    : computeBackoffDelay(
                          attempt,
                          baseDelayMs,
                          maxDelayMs,
                          options.jitterMs ?? 250,
                          options.random,
                      );

            logger.warn(
                `${options.label} failed (attempt ${attempt}/${maxAttempts}) - retrying in ${delayMs}ms`,
                { error }
            );
            options.onRetry?.({
                label: options.label,
                attempt,
                maxAttempts,
                delayMs,
                error,
            });
            await wait(delayMs);
        }
    }
}
