import { promises as fsPromises } from "fs";
import * as path from "path";
import { parseFile } from "music-metadata";
import type { SourceFile } from "@segmentshelf/audiobook-contract";
import { ErrorCode, InputError, wrapNodeError } from "../utils/errors";
import { logger } from "../utils/logger";

const log = logger.child("probe");

export interface AudioMeasurement {
    sizeBytes: number;
    durationSeconds: number;
    bitrate: number | null;
}

/**
 * Reads size from the filesystem and duration from the audio headers.
 * Files whose duration cannot be determined are rejected.
 */
export async function measureAudioFile(filePath: string): Promise<AudioMeasurement> {
    let sizeBytes: number;
    try {
        const stats = await fsPromises.stat(filePath);
        sizeBytes = stats.size;
    } catch (error) {
        throw wrapNodeError(error, filePath);
    }

    let durationSeconds: number | undefined;
    let bitrate: number | null = null;
    try {
        const metadata = await parseFile(filePath, { duration: true });
        durationSeconds = metadata.format.duration;
        bitrate = metadata.format.bitrate ? Math.round(metadata.format.bitrate) : null;
    } catch (error) {
        throw new InputError(
            `Could not read audio metadata: ${path.basename(filePath)}`,
            { path: filePath, originalError: error instanceof Error ? error.message : String(error) },
            ErrorCode.METADATA_PARSE_ERROR
        );
    }

    if (typeof durationSeconds !== "number" || !Number.isFinite(durationSeconds)) {
        throw new InputError(
            `Audio duration unavailable: ${path.basename(filePath)}`,
            { path: filePath },
            ErrorCode.METADATA_PARSE_ERROR
        );
    }

    return { sizeBytes, durationSeconds, bitrate };
}

/**
 * Measures downloaded files in the given order; the position in `filePaths`
 * becomes the source index (1-based, matching the download numbering).
 */
export async function probeSourceFiles(filePaths: readonly string[]): Promise<SourceFile[]> {
    const files: SourceFile[] = [];
    for (const [position, filePath] of filePaths.entries()) {
        const measurement = await measureAudioFile(filePath);
        log.debug(
            `Measured ${path.basename(filePath)}: ${(measurement.durationSeconds / 60).toFixed(1)} min, ${(measurement.sizeBytes / 1024 / 1024).toFixed(1)} MB`
        );
        files.push({
            index: position + 1,
            sizeBytes: measurement.sizeBytes,
            durationSeconds: measurement.durationSeconds,
            path: filePath,
            name: path.basename(filePath),
        });
    }
    return files;
}
