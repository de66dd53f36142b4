export const MIB = 1024 * 1024;

/** Hard ceiling for one uploaded playback segment. */
export const MAX_SEGMENT_BYTES = 150 * MIB;
export const MIN_SEGMENT_SECONDS = 60 * 60;
export const MAX_SEGMENT_SECONDS = 120 * 60;

export const MIN_PLAYBACK_SPEED = 0.5;
export const MAX_PLAYBACK_SPEED = 2.0;
export const DEFAULT_PLAYBACK_SPEED = 1.0;

export interface SegmentLimits {
    minSegmentSeconds: number;
    maxSegmentSeconds: number;
    maxSegmentBytes: number;
}

export const DEFAULT_SEGMENT_LIMITS: Readonly<SegmentLimits> = Object.freeze({
    minSegmentSeconds: MIN_SEGMENT_SECONDS,
    maxSegmentSeconds: MAX_SEGMENT_SECONDS,
    maxSegmentBytes: MAX_SEGMENT_BYTES,
});

/** One downloaded audio unit, in source order. */
export interface SourceFile {
    readonly index: number;
    readonly sizeBytes: number;
    readonly durationSeconds: number;
    readonly path?: string;
    readonly name?: string;
}

/** One playable unit of a book as stored in the sink. */
export interface Segment {
    fileId: string;
    displayName: string;
    durationSeconds: number;
    sizeBytes: number;
}

export interface Book {
    id: string;
    displayName: string;
    segments: Segment[];
    tocFileId?: string | null;
}

export interface PlaybackPosition {
    bookId: string;
    segmentIndex: number;
    offsetMillis: number;
    playbackSpeed: number;
}

export interface TocEntry {
    sequence: number;
    displayName: string;
    startOffsetSeconds: number;
    durationSeconds: number;
    sizeBytes: number;
    sourceIndexes: number[];
}

export interface TableOfContents {
    bookId: string;
    bookTitle: string;
    totalSegments: number;
    totalDurationSeconds: number;
    segments: TocEntry[];
}

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === "number" && Number.isFinite(value);

const normalizeString = (value: unknown): string | undefined => {
    if (typeof value !== "string") {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
};

/** Out-of-range speeds are clamped; non-numeric input falls back to 1.0x. */
export const clampPlaybackSpeed = (value: unknown): number => {
    if (!isFiniteNumber(value)) {
        return DEFAULT_PLAYBACK_SPEED;
    }
    return Math.min(MAX_PLAYBACK_SPEED, Math.max(MIN_PLAYBACK_SPEED, value));
};

export const clampSegmentIndex = (value: number, segmentCount: number): number => {
    if (segmentCount <= 0) {
        return 0;
    }
    const whole = isFiniteNumber(value) ? Math.trunc(value) : 0;
    return Math.min(segmentCount - 1, Math.max(0, whole));
};

export const normalizeOffsetMillis = (value: unknown): number =>
    isFiniteNumber(value) && value > 0 ? Math.floor(value) : 0;

/**
 * Accepts loosely-typed persisted data and returns a position that satisfies
 * the range invariants, or null when no book id is present.
 */
export const normalizePlaybackPosition = (value: {
    bookId?: unknown;
    segmentIndex?: unknown;
    offsetMillis?: unknown;
    playbackSpeed?: unknown;
}): PlaybackPosition | null => {
    const bookId = normalizeString(value.bookId);
    if (!bookId) {
        return null;
    }
    const rawIndex = isFiniteNumber(value.segmentIndex) ? Math.trunc(value.segmentIndex) : 0;
    return {
        bookId,
        segmentIndex: Math.max(0, rawIndex),
        offsetMillis: normalizeOffsetMillis(value.offsetMillis),
        playbackSpeed: clampPlaybackSpeed(value.playbackSpeed),
    };
};

export const isSamePlaybackPosition = (
    a: PlaybackPosition | null,
    b: PlaybackPosition | null,
): boolean => {
    if (!a || !b) {
        return a === b;
    }
    return (
        a.bookId === b.bookId &&
        a.segmentIndex === b.segmentIndex &&
        a.offsetMillis === b.offsetMillis &&
        a.playbackSpeed === b.playbackSpeed
    );
};

/** Lowercased, underscore-joined form of a title used in uploaded file names. */
export const toBookSlug = (title: string): string => {
    const slug = title
        .trim()
        .toLowerCase()
        .replace(/[^\w\s-]/g, "")
        .replace(/[-\s]+/g, "_")
        .replace(/^_+|_+$/g, "");
    return slug.length > 0 ? slug : "audiobook";
};

export const segmentSequenceWidth = (segmentCount: number): number =>
    Math.max(2, String(Math.max(1, segmentCount)).length);

export const formatSegmentDisplayName = (
    bookTitle: string,
    sequence: number,
    segmentCount: number,
): string => {
    const padded = String(sequence).padStart(segmentSequenceWidth(segmentCount), "0");
    return `${toBookSlug(bookTitle)}_segment_${padded}`;
};
