import { z } from "zod";
import {
    TableOfContents,
    toBookSlug,
} from "@segmentshelf/audiobook-contract";
import { InputError } from "../utils/errors";

export interface TocSegmentInput {
    displayName: string;
    durationSeconds: number;
    sizeBytes: number;
    sourceIndexes?: number[];
}

const tocEntrySchema = z.object({
    sequence: z.number().int().positive(),
    displayName: z.string().min(1),
    startOffsetSeconds: z.number().nonnegative(),
    durationSeconds: z.number().nonnegative(),
    sizeBytes: z.number().nonnegative(),
    sourceIndexes: z.array(z.number().int()),
});

const tableOfContentsSchema = z.object({
    bookId: z.string(),
    bookTitle: z.string().min(1),
    totalSegments: z.number().int().nonnegative(),
    totalDurationSeconds: z.number().nonnegative(),
    segments: z.array(tocEntrySchema),
});

function roundSeconds(value: number): number {
    return Math.round(value * 1000) / 1000;
}

/**
 * Derives the table of contents from the final segment list. Offsets are the
 * running sum of the preceding segments' durations.
 */
export function buildTableOfContents(
    book: { id: string; title: string },
    segments: readonly TocSegmentInput[]
): TableOfContents {
    let offset = 0;
    const entries = segments.map((segment, position) => {
        const entry = {
            sequence: position + 1,
            displayName: segment.displayName,
            startOffsetSeconds: roundSeconds(offset),
            durationSeconds: roundSeconds(segment.durationSeconds),
            sizeBytes: segment.sizeBytes,
            sourceIndexes: [...(segment.sourceIndexes ?? [])],
        };
        offset += segment.durationSeconds;
        return entry;
    });

    return {
        bookId: book.id,
        bookTitle: book.title,
        totalSegments: entries.length,
        totalDurationSeconds: roundSeconds(offset),
        segments: entries,
    };
}

export function tocFileName(bookTitle: string): string {
    return `${toBookSlug(bookTitle)}_toc.json`;
}

export function isTocFileName(name: string): boolean {
    return name.endsWith("_toc.json");
}

export function serializeTableOfContents(toc: TableOfContents): string {
    return `${JSON.stringify(toc, null, 2)}\n`;
}

export function parseTableOfContents(raw: unknown): TableOfContents {
    let value: unknown = raw;
    if (typeof raw === "string") {
        try {
            value = JSON.parse(raw);
        } catch (error) {
            throw new InputError("Table of contents is not valid JSON", {
                originalError: error instanceof Error ? error.message : String(error),
            });
        }
    }

    const parsed = tableOfContentsSchema.safeParse(value);
    if (!parsed.success) {
        throw new InputError("Table of contents has an unexpected shape", {
            issues: parsed.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        });
    }
    return parsed.data;
}
