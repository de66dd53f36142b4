import { promises as fsPromises } from "fs";
import * as path from "path";
import ffmpeg from "fluent-ffmpeg";
import ffmpegPath from "@ffmpeg-installer/ffmpeg";
import {
    DEFAULT_SEGMENT_LIMITS,
    SegmentLimits,
    SourceFile,
} from "@segmentshelf/audiobook-contract";
import {
    AppError,
    CapacityError,
    ErrorCategory,
    ErrorCode,
    InputError,
    wrapNodeError,
} from "../utils/errors";
import { logger } from "../utils/logger";
import { measureAudioFile } from "./audioProbe";
import { entryFiles, PlannedSegment } from "./segmentPlanner";

// Set FFmpeg path to bundled binary
ffmpeg.setFfmpegPath(ffmpegPath.path);

const log = logger.child("materializer");

/** A planned segment that now exists on disk, measured from the written file. */
export interface MaterializedSegment {
    sequence: number;
    displayName: string;
    filePath: string;
    durationSeconds: number;
    sizeBytes: number;
    sourceIndexes: number[];
}

function requireSourcePath(file: SourceFile): string {
    if (!file.path) {
        throw new InputError(`Source file #${file.index} has no local path`, {
            index: file.index,
        });
    }
    return file.path;
}

/** Builds an ffmpeg concat-demuxer list; single quotes are escaped per its syntax. */
export function buildConcatList(filePaths: readonly string[]): string {
    return filePaths
        .map((filePath) => `file '${path.resolve(filePath).replace(/'/g, "'\\''")}'`)
        .join("\n")
        .concat("\n");
}

export function concatAudioFiles(listPath: string, outputPath: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        ffmpeg()
            .input(listPath)
            .inputOptions(["-f concat", "-safe 0"])
            .outputOptions(["-c copy", "-map_metadata -1"])
            .on("error", (err: Error) => {
                const errorMsg = err.message.toLowerCase();
                if (errorMsg.includes("ffmpeg") && errorMsg.includes("not found")) {
                    reject(
                        new AppError(
                            ErrorCode.FFMPEG_NOT_FOUND,
                            ErrorCategory.FATAL,
                            "FFmpeg not installed. Install FFmpeg to combine segments.",
                            { outputPath }
                        )
                    );
                    return;
                }
                reject(
                    new AppError(
                        ErrorCode.COMBINE_FAILED,
                        ErrorCategory.RECOVERABLE,
                        `Combining failed: ${err.message}`,
                        { outputPath }
                    )
                );
            })
            .on("end", () => resolve())
            .save(outputPath);
    });
}

async function writeSegmentFile(
    segment: PlannedSegment,
    outputPath: string
): Promise<void> {
    const { entry } = segment;
    if (entry.kind === "passThrough") {
        const sourcePath = requireSourcePath(entry.file);
        try {
            await fsPromises.copyFile(sourcePath, outputPath);
        } catch (error) {
            throw wrapNodeError(error, sourcePath);
        }
        return;
    }

    const sourcePaths = entry.files.map(requireSourcePath);
    const listPath = `${outputPath}.concat.txt`;
    await fsPromises.writeFile(listPath, buildConcatList(sourcePaths), "utf8");
    try {
        await concatAudioFiles(listPath, outputPath);
    } finally {
        await fsPromises.rm(listPath, { force: true });
    }
}

/**
 * Writes every planned segment into `outputDir` as `<displayName>.mp3` and
 * re-measures the result. A written segment over the byte ceiling aborts the run.
 */
export async function materializeSegments(
    planned: readonly PlannedSegment[],
    outputDir: string,
    limits: SegmentLimits = DEFAULT_SEGMENT_LIMITS
): Promise<MaterializedSegment[]> {
    await fsPromises.mkdir(outputDir, { recursive: true });

    const results: MaterializedSegment[] = [];
    for (const segment of planned) {
        const outputPath = path.join(outputDir, `${segment.displayName}.mp3`);
        const files = entryFiles(segment.entry);
        log.info(
            `Writing segment ${segment.sequence}/${planned.length}: ${path.basename(outputPath)} (${files.length} source file${files.length === 1 ? "" : "s"})`
        );

        await writeSegmentFile(segment, outputPath);
        const measurement = await measureAudioFile(outputPath);

        if (measurement.sizeBytes > limits.maxSegmentBytes) {
            throw new CapacityError(
                `Segment ${segment.displayName} is ${measurement.sizeBytes} bytes after writing, above the ${limits.maxSegmentBytes} byte ceiling`,
                {
                    displayName: segment.displayName,
                    sizeBytes: measurement.sizeBytes,
                    maxSegmentBytes: limits.maxSegmentBytes,
                }
            );
        }

        results.push({
            sequence: segment.sequence,
            displayName: segment.displayName,
            filePath: outputPath,
            durationSeconds: measurement.durationSeconds,
            sizeBytes: measurement.sizeBytes,
            sourceIndexes: segment.sourceIndexes,
        });
    }
    return results;
}
