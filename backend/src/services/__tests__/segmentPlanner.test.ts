import { MIB, SourceFile } from "@segmentshelf/audiobook-contract";
import {
    describePlan,
    entryFiles,
    isPlanAlreadyApplied,
    plan,
    SegmentPlanEntry,
    summarizeSourceFiles,
} from "../segmentPlanner";
import {
    CapacityError,
    EmptyInputError,
    ErrorCode,
    InputError,
    OversizeSingleFileError,
} from "../../utils/errors";

function file(index: number, minutes: number, megabytes: number): SourceFile {
    return {
        index,
        durationSeconds: minutes * 60,
        sizeBytes: Math.round(megabytes * MIB),
    };
}

function groups(entries: SegmentPlanEntry[]): number[][] {
    return entries.map((entry) => entryFiles(entry).map((source) => source.index));
}

describe("segment planner", () => {
    it("passes every file through when each already fits a segment", () => {
        const entries = plan([file(1, 90, 80), file(2, 61, 70), file(3, 120, 150)]);

        expect(entries.map((entry) => entry.kind)).toEqual([
            "passThrough",
            "passThrough",
            "passThrough",
        ]);
        expect(groups(entries)).toEqual([[1], [2], [3]]);
    });

    it("orders files by source index before planning", () => {
        const entries = plan([file(3, 90, 10), file(1, 90, 10), file(2, 90, 10)]);

        expect(groups(entries)).toEqual([[1], [2], [3]]);
    });

    it("closes a group as soon as the byte ceiling would be crossed", () => {
        const entries = plan([file(1, 40, 80), file(2, 40, 80), file(3, 40, 80)]);

        expect(entries.map((entry) => entry.kind)).toEqual(["combine", "combine", "combine"]);
        expect(groups(entries)).toEqual([[1], [2], [3]]);
    });

    it("fills groups up to the duration ceiling and flushes the remainder", () => {
        const files = Array.from({ length: 10 }, (_, position) => file(position + 1, 20, 10));

        const entries = plan(files);

        expect(groups(entries)).toEqual([
            [1, 2, 3, 4, 5, 6],
            [7, 8, 9, 10],
        ]);
    });

    it("groups by size when size runs out first", () => {
        const entries = plan([file(1, 30, 60), file(2, 30, 60), file(3, 30, 60), file(4, 30, 60)]);

        expect(groups(entries)).toEqual([
            [1, 2],
            [3, 4],
        ]);
    });

    it("gives a file longer than the window a group of its own", () => {
        const entries = plan([file(1, 30, 10), file(2, 150, 100), file(3, 30, 10)]);

        expect(groups(entries)).toEqual([[1], [2], [3]]);
        expect(entries.every((entry) => entry.kind === "combine")).toBe(true);
    });

    it("keeps every file exactly once and preserves the totals", () => {
        const files = [file(1, 25, 20), file(2, 50, 45), file(3, 45, 40), file(4, 70, 60), file(5, 15, 12)];

        const planned = describePlan("Totals", plan(files));

        expect(planned.flatMap((segment) => segment.sourceIndexes)).toEqual([1, 2, 3, 4, 5]);
        expect(planned.reduce((sum, segment) => sum + segment.durationSeconds, 0)).toBe(205 * 60);
        expect(planned.reduce((sum, segment) => sum + segment.sizeBytes, 0)).toBe(
            summarizeSourceFiles(files).totalSizeBytes
        );
        for (const segment of planned) {
            expect(segment.sizeBytes).toBeLessThanOrEqual(150 * MIB);
            expect(segment.durationSeconds).toBeLessThanOrEqual(7200);
        }
    });

    it("returns the same plan for the same input", () => {
        const files = [file(1, 25, 20), file(2, 50, 45), file(3, 45, 40)];

        expect(plan(files)).toEqual(plan(files));
    });

    it("honours overridden limits", () => {
        const entries = plan([file(1, 10, 1), file(2, 10, 1), file(3, 10, 1)], {
            minSegmentSeconds: 600,
            maxSegmentSeconds: 1200,
            maxSegmentBytes: 10 * MIB,
        });

        expect(entries.map((entry) => entry.kind)).toEqual(["passThrough", "passThrough", "passThrough"]);
    });

    it("rejects an empty source set", () => {
        expect(() => plan([])).toThrow(EmptyInputError);
        expect(() => plan([])).toThrow(InputError);
    });

    it("rejects a single file above the byte ceiling", () => {
        let caught: unknown;
        try {
            plan([file(1, 60, 100), file(2, 60, 151)]);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(OversizeSingleFileError);
        expect(caught).toBeInstanceOf(CapacityError);
        expect(caught).toMatchObject({
            code: ErrorCode.OVERSIZE_SOURCE_FILE,
            details: { index: 2, sizeBytes: Math.round(151 * MIB), maxSegmentBytes: 150 * MIB },
        });
    });

    it("rejects duplicate indexes and invalid measurements", () => {
        expect(() => plan([file(1, 60, 10), file(1, 60, 10)])).toThrow("Duplicate source file index 1");
        expect(() => plan([{ index: 1, durationSeconds: -1, sizeBytes: 10 }])).toThrow(
            "Source file #1 has an invalid size or duration"
        );
        expect(() => plan([{ index: 1.5, durationSeconds: 60, sizeBytes: 10 }])).toThrow(InputError);
    });

    it("summarizes the source set", () => {
        expect(summarizeSourceFiles([file(1, 30, 10), file(2, 90, 30)])).toEqual({
            fileCount: 2,
            totalDurationSeconds: 7200,
            totalSizeBytes: 40 * MIB,
            averageDurationSeconds: 3600,
            averageSizeBytes: 20 * MIB,
        });
        expect(summarizeSourceFiles([]).averageSizeBytes).toBe(0);
    });
});

describe("describePlan", () => {
    it("names segments after the book with zero-padded sequence numbers", () => {
        const planned = describePlan("The Well of Ascension", plan([file(1, 90, 50), file(2, 90, 50)]));

        expect(planned.map((segment) => segment.displayName)).toEqual([
            "the_well_of_ascension_segment_01",
            "the_well_of_ascension_segment_02",
        ]);
        expect(planned[1]).toMatchObject({ sequence: 2, sourceIndexes: [2], durationSeconds: 5400 });
    });

    it("widens the sequence number past 99 segments", () => {
        const files = Array.from({ length: 100 }, (_, position) => file(position + 1, 90, 1));

        const planned = describePlan("Long", plan(files));

        expect(planned[0].displayName).toBe("long_segment_001");
        expect(planned[99].displayName).toBe("long_segment_100");
    });
});

describe("isPlanAlreadyApplied", () => {
    const planned = [{ sizeBytes: 1_000_000 }, { sizeBytes: 2_000_000 }];

    it("accepts sizes within one percent", () => {
        expect(isPlanAlreadyApplied(planned, [{ sizeBytes: 1_005_000 }, { sizeBytes: 1_990_000 }])).toBe(true);
    });

    it("rejects sizes further off", () => {
        expect(isPlanAlreadyApplied(planned, [{ sizeBytes: 1_020_000 }, { sizeBytes: 2_000_000 }])).toBe(false);
    });

    it("rejects a different segment count or an empty plan", () => {
        expect(isPlanAlreadyApplied(planned, [{ sizeBytes: 1_000_000 }])).toBe(false);
        expect(isPlanAlreadyApplied([], [])).toBe(false);
    });
});
