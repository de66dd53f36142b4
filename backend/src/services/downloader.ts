import axios, { AxiosResponse } from "axios";
import { createWriteStream, promises as fs } from "fs";
import * as path from "path";
import type { Readable } from "stream";
import PQueue from "p-queue";
import { BRAND_USER_AGENT } from "../config/brand";
import { ErrorCode, NetworkError, toUserMessage, wrapNodeError } from "../utils/errors";
import { logger } from "../utils/logger";
import { readHttpStatus, retryWithBackoff, sleep } from "../utils/retry";

const log = logger.child("download");

/** Allowed relative difference between Content-Length and the bytes on disk. */
const SIZE_VARIANCE_TOLERANCE = 0.01;
const PROGRESS_LOG_INTERVAL_MS = 30_000;

export interface DownloadTarget {
    /** 1-based position in the series; becomes the source file index. */
    index: number;
    url: string;
    fileName: string;
}

export interface DownloadedFile {
    index: number;
    url: string;
    filePath: string;
    sizeBytes: number;
}

export interface FailedDownload {
    index: number;
    url: string;
    error: string;
}

export interface DownloadReport {
    downloaded: DownloadedFile[];
    failed: FailedDownload[];
    totalBytes: number;
}

export interface DownloaderOptions {
    outputDir: string;
    concurrency?: number;
    maxAttempts?: number;
    timeoutMs?: number;
    retryBaseDelayMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

export interface NumberedSeriesOptions {
    /** URL prefix the zero-padded number and extension are appended to. */
    baseUrl: string;
    startIndex?: number;
    padWidth?: number;
    extension?: string;
    /** Upper bound on how many numbers are probed. */
    maxFiles?: number;
}

/** The origin answered 404: the end of a numbered series, never retried. */
export class SeriesEndError extends NetworkError {
    constructor(public readonly url: string) {
        super(`Not found: ${url}`, { url });
        this.name = "SeriesEndError";
    }
}

export function localFileName(index: number): string {
    return `audio_${String(index).padStart(2, "0")}.mp3`;
}

export function buildSeriesUrl(baseUrl: string, number: number, padWidth = 2, extension = ".mp3"): string {
    return `${baseUrl}${String(number).padStart(padWidth, "0")}${extension}`;
}

function isReadable(value: unknown): value is Readable {
    return (
        typeof value === "object" &&
        value !== null &&
        "pipe" in value &&
        typeof value.pipe === "function" &&
        "on" in value &&
        typeof value.on === "function"
    );
}

function writeStreamToFile(
    source: Readable,
    tempPath: string,
    label: string,
    expectedBytes: number
): Promise<number> {
    const writeStream = createWriteStream(tempPath);
    let bytesDownloaded = 0;
    let lastLogTime = Date.now();

    return new Promise<number>((resolve, reject) => {
        source.on("data", (chunk: Buffer) => {
            bytesDownloaded += chunk.length;
            const now = Date.now();
            if (now - lastLogTime > PROGRESS_LOG_INTERVAL_MS) {
                const percent = expectedBytes > 0 ? Math.round((bytesDownloaded / expectedBytes) * 100) : 0;
                log.debug(`Download progress ${label}: ${percent}% (${Math.round(bytesDownloaded / 1024 / 1024)}MB)`);
                lastLogTime = now;
            }
        });

        source.on("end", () => {
            writeStream.end(() => resolve(bytesDownloaded));
        });

        source.pipe(writeStream, { end: false });

        writeStream.on("error", (err) => {
            source.destroy();
            reject(err);
        });

        source.on("error", (err: Error) => {
            writeStream.destroy();
            reject(err);
        });

        source.on("aborted", () => {
            writeStream.destroy();
            reject(new NetworkError("Download aborted by server", { label }));
        });
    });
}

async function removeQuietly(filePath: string): Promise<void> {
    try {
        await fs.rm(filePath, { force: true });
    } catch (error) {
        log.warn(`Could not remove ${filePath}: ${toUserMessage(error)}`);
    }
}

/**
 * Streams `url` to `finalPath` through a temp file. The temp file is renamed
 * only after the byte count matches Content-Length (within 1%).
 */
export async function downloadFile(
    url: string,
    finalPath: string,
    timeoutMs = 600_000
): Promise<number> {
    const tempPath = `${finalPath}.tmp`;
    await removeQuietly(tempPath);

    let response: AxiosResponse<unknown>;
    try {
        response = await axios.get<unknown>(url, {
            responseType: "stream",
            timeout: timeoutMs,
            headers: { "User-Agent": BRAND_USER_AGENT },
            decompress: false,
        });
    } catch (error) {
        if (readHttpStatus(error) === 404) {
            throw new SeriesEndError(url);
        }
        throw error;
    }

    if (!isReadable(response.data)) {
        throw new NetworkError(`Response for ${url} is not a stream`, { url });
    }

    const contentLength = Number.parseInt(String(response.headers["content-length"] ?? "0"), 10);
    const expectedBytes = Number.isFinite(contentLength) && contentLength > 0 ? contentLength : 0;
    log.debug(`Downloading ${url} (${expectedBytes > 0 ? Math.round(expectedBytes / 1024 / 1024) : "?"}MB)`);

    try {
        await writeStreamToFile(response.data, tempPath, path.basename(finalPath), expectedBytes);
    } catch (error) {
        await removeQuietly(tempPath);
        throw error;
    }

    const stats = await fs.stat(tempPath);
    if (stats.size === 0) {
        await removeQuietly(tempPath);
        throw new NetworkError(`Downloaded file is empty: ${url}`, { url }, ErrorCode.DOWNLOAD_INCOMPLETE);
    }

    if (expectedBytes > 0) {
        const variance = Math.abs(stats.size - expectedBytes) / expectedBytes;
        if (variance > SIZE_VARIANCE_TOLERANCE) {
            await removeQuietly(tempPath);
            throw new NetworkError(
                `Download incomplete: got ${stats.size} bytes, expected ${expectedBytes}`,
                { url, actualBytes: stats.size, expectedBytes },
                ErrorCode.DOWNLOAD_INCOMPLETE
            );
        }
    }

    try {
        await fs.rename(tempPath, finalPath);
    } catch (error) {
        throw wrapNodeError(error, finalPath);
    }
    return stats.size;
}

function shouldRetryDownload(error: unknown): boolean {
    return !(error instanceof SeriesEndError);
}

async function downloadTarget(
    target: DownloadTarget,
    options: DownloaderOptions
): Promise<DownloadedFile> {
    const filePath = path.join(options.outputDir, target.fileName);
    const sizeBytes = await retryWithBackoff(
        () => downloadFile(target.url, filePath, options.timeoutMs),
        {
            label: `Download ${target.fileName}`,
            maxAttempts: options.maxAttempts ?? 3,
            baseDelayMs: options.retryBaseDelayMs ?? 1000,
            shouldRetry: shouldRetryDownload,
            sleep: options.sleep ?? sleep,
        }
    );
    return { index: target.index, url: target.url, filePath, sizeBytes };
}

function summarize(downloaded: DownloadedFile[], failed: FailedDownload[]): DownloadReport {
    const sortedDownloads = [...downloaded].sort((a, b) => a.index - b.index);
    const sortedFailures = [...failed].sort((a, b) => a.index - b.index);
    return {
        downloaded: sortedDownloads,
        failed: sortedFailures,
        totalBytes: sortedDownloads.reduce((sum, file) => sum + file.sizeBytes, 0),
    };
}

/** Downloads an explicit list of targets; a failed file is reported, not thrown. */
export async function downloadAll(
    targets: readonly DownloadTarget[],
    options: DownloaderOptions
): Promise<DownloadReport> {
    await fs.mkdir(options.outputDir, { recursive: true });
    const queue = new PQueue({ concurrency: Math.max(1, options.concurrency ?? 2) });
    const downloaded: DownloadedFile[] = [];
    const failed: FailedDownload[] = [];

    await queue.addAll(
        targets.map((target) => async () => {
            try {
                downloaded.push(await downloadTarget(target, options));
            } catch (error) {
                log.error(`Failed to download ${target.url}: ${toUserMessage(error)}`);
                failed.push({ index: target.index, url: target.url, error: toUserMessage(error) });
            }
        })
    );

    const report = summarize(downloaded, failed);
    log.info(
        `Downloaded ${report.downloaded.length}/${targets.length} files (${(report.totalBytes / 1024 / 1024).toFixed(1)} MB)`
    );
    return report;
}

/**
 * Walks `<baseUrl><NN><extension>` from `startIndex` until the origin answers
 * 404. Numbers are fetched in batches of `concurrency`; anything past the first
 * missing number is discarded so the series has no gaps.
 */
export async function downloadNumberedSeries(
    series: NumberedSeriesOptions,
    options: DownloaderOptions
): Promise<DownloadReport> {
    await fs.mkdir(options.outputDir, { recursive: true });
    const startIndex = series.startIndex ?? 1;
    const maxFiles = series.maxFiles ?? 999;
    const batchSize = Math.max(1, options.concurrency ?? 2);
    const queue = new PQueue({ concurrency: batchSize });

    const downloaded: DownloadedFile[] = [];
    const failed: FailedDownload[] = [];
    // Index of the first missing file; Infinity until a 404 is seen.
    let endOfSeries = Number.POSITIVE_INFINITY;

    for (let offset = 0; offset < maxFiles && !Number.isFinite(endOfSeries); offset += batchSize) {
        const batch: DownloadTarget[] = [];
        for (let i = offset; i < Math.min(offset + batchSize, maxFiles); i += 1) {
            const number = startIndex + i;
            batch.push({
                index: i + 1,
                url: buildSeriesUrl(series.baseUrl, number, series.padWidth, series.extension),
                fileName: localFileName(i + 1),
            });
        }

        await queue.addAll(
            batch.map((target) => async () => {
                try {
                    downloaded.push(await downloadTarget(target, options));
                } catch (error) {
                    if (error instanceof SeriesEndError) {
                        endOfSeries = Math.min(endOfSeries, target.index);
                        return;
                    }
                    log.error(`Failed to download ${target.url}: ${toUserMessage(error)}`);
                    failed.push({ index: target.index, url: target.url, error: toUserMessage(error) });
                }
            })
        );
    }

    if (Number.isFinite(endOfSeries)) {
        log.info(`Series ends before file #${endOfSeries}`);
        for (const file of downloaded.filter((entry) => entry.index > endOfSeries)) {
            await removeQuietly(file.filePath);
        }
    }

    return summarize(
        downloaded.filter((file) => file.index < endOfSeries),
        failed.filter((failure) => failure.index < endOfSeries)
    );
}
