import {
    DEFAULT_SEGMENT_LIMITS,
    formatSegmentDisplayName,
    SegmentLimits,
    SourceFile,
} from "@segmentshelf/audiobook-contract";
import {
    EmptyInputError,
    InputError,
    OversizeSingleFileError,
} from "../utils/errors";
import { logger } from "../utils/logger";

const log = logger.child("planner");

export type SegmentPlanEntry =
    | { kind: "passThrough"; file: SourceFile }
    | { kind: "combine"; files: SourceFile[] };

export interface SourceFileStats {
    fileCount: number;
    totalDurationSeconds: number;
    totalSizeBytes: number;
    averageDurationSeconds: number;
    averageSizeBytes: number;
}

/** A plan entry with the name and totals its uploaded segment will carry. */
export interface PlannedSegment {
    sequence: number;
    displayName: string;
    durationSeconds: number;
    sizeBytes: number;
    sourceIndexes: number[];
    entry: SegmentPlanEntry;
}

export interface ExistingSegmentSize {
    sizeBytes: number;
}

export function entryFiles(entry: SegmentPlanEntry): SourceFile[] {
    return entry.kind === "passThrough" ? [entry.file] : entry.files;
}

export function summarizeSourceFiles(files: readonly SourceFile[]): SourceFileStats {
    const totalDurationSeconds = files.reduce((sum, file) => sum + file.durationSeconds, 0);
    const totalSizeBytes = files.reduce((sum, file) => sum + file.sizeBytes, 0);
    const fileCount = files.length;
    return {
        fileCount,
        totalDurationSeconds,
        totalSizeBytes,
        averageDurationSeconds: fileCount > 0 ? totalDurationSeconds / fileCount : 0,
        averageSizeBytes: fileCount > 0 ? totalSizeBytes / fileCount : 0,
    };
}

function isNonNegativeFinite(value: number): boolean {
    return Number.isFinite(value) && value >= 0;
}

function validateSourceFiles(
    files: readonly SourceFile[],
    limits: SegmentLimits
): SourceFile[] {
    if (files.length === 0) {
        throw new EmptyInputError();
    }

    const seen = new Set<number>();
    for (const file of files) {
        if (!Number.isInteger(file.index)) {
            throw new InputError(`Source file index must be an integer, got ${file.index}`, {
                index: file.index,
            });
        }
        if (seen.has(file.index)) {
            throw new InputError(`Duplicate source file index ${file.index}`, { index: file.index });
        }
        seen.add(file.index);

        if (!isNonNegativeFinite(file.sizeBytes) || !isNonNegativeFinite(file.durationSeconds)) {
            throw new InputError(`Source file #${file.index} has an invalid size or duration`, {
                index: file.index,
                sizeBytes: file.sizeBytes,
                durationSeconds: file.durationSeconds,
            });
        }
        if (file.sizeBytes > limits.maxSegmentBytes) {
            throw new OversizeSingleFileError(file.index, file.sizeBytes, limits.maxSegmentBytes);
        }
    }

    // Array.prototype.sort is stable, and indexes are unique at this point.
    return [...files].sort((a, b) => a.index - b.index);
}

function fitsAsIs(file: SourceFile, limits: SegmentLimits): boolean {
    return (
        file.durationSeconds >= limits.minSegmentSeconds &&
        file.durationSeconds <= limits.maxSegmentSeconds &&
        file.sizeBytes <= limits.maxSegmentBytes
    );
}

/**
 * Decides how downloaded files become playback segments.
 *
 * When every file already sits inside the duration window and under the byte
 * ceiling, each file passes through untouched. Otherwise files are grouped
 * greedily in source order; a group closes as soon as the next file would push
 * it over either ceiling, and the final group is flushed whatever its length.
 */
export function plan(
    sourceFiles: readonly SourceFile[],
    limits: SegmentLimits = DEFAULT_SEGMENT_LIMITS
): SegmentPlanEntry[] {
    const ordered = validateSourceFiles(sourceFiles, limits);
    const stats = summarizeSourceFiles(ordered);

    if (ordered.every((file) => fitsAsIs(file, limits))) {
        log.debug("Every source file fits a segment, passing through", { ...stats });
        return ordered.map((file): SegmentPlanEntry => ({ kind: "passThrough", file }));
    }

    const entries: SegmentPlanEntry[] = [];
    let group: SourceFile[] = [];
    let groupDuration = 0;
    let groupSize = 0;

    for (const file of ordered) {
        const fits =
            groupDuration + file.durationSeconds <= limits.maxSegmentSeconds &&
            groupSize + file.sizeBytes <= limits.maxSegmentBytes;

        if (group.length > 0 && !fits) {
            entries.push({ kind: "combine", files: group });
            group = [];
            groupDuration = 0;
            groupSize = 0;
        }

        group.push(file);
        groupDuration += file.durationSeconds;
        groupSize += file.sizeBytes;
    }

    entries.push({ kind: "combine", files: group });

    log.debug(`Combining ${ordered.length} source files into ${entries.length} segments`, {
        ...stats,
    });
    return entries;
}

export function describePlan(
    bookTitle: string,
    entries: readonly SegmentPlanEntry[]
): PlannedSegment[] {
    return entries.map((entry, position) => {
        const files = entryFiles(entry);
        const sequence = position + 1;
        return {
            sequence,
            displayName: formatSegmentDisplayName(bookTitle, sequence, entries.length),
            durationSeconds: files.reduce((sum, file) => sum + file.durationSeconds, 0),
            sizeBytes: files.reduce((sum, file) => sum + file.sizeBytes, 0),
            sourceIndexes: files.map((file) => file.index),
            entry,
        };
    });
}

/**
 * True when the catalog already holds exactly this plan: same segment count,
 * and every size within `tolerance` (relative) of the planned size, in order.
 */
export function isPlanAlreadyApplied(
    planned: readonly Pick<PlannedSegment, "sizeBytes">[],
    existing: readonly ExistingSegmentSize[],
    tolerance = 0.01
): boolean {
    if (planned.length === 0 || planned.length !== existing.length) {
        return false;
    }

    return planned.every((segment, position) => {
        const expected = segment.sizeBytes;
        const actual = existing[position].sizeBytes;
        if (expected === 0) {
            return actual === 0;
        }
        return Math.abs(actual - expected) / expected <= tolerance;
    });
}
