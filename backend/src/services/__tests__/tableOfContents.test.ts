import {
    buildTableOfContents,
    isTocFileName,
    parseTableOfContents,
    serializeTableOfContents,
    tocFileName,
} from "../tableOfContents";
import { InputError } from "../../utils/errors";

const segments = [
    { displayName: "mistborn_segment_01", durationSeconds: 3600.5, sizeBytes: 100, sourceIndexes: [1, 2] },
    { displayName: "mistborn_segment_02", durationSeconds: 4000, sizeBytes: 200, sourceIndexes: [3] },
    { displayName: "mistborn_segment_03", durationSeconds: 1200.25, sizeBytes: 50 },
];

describe("table of contents", () => {
    it("records cumulative start offsets for each segment", () => {
        const toc = buildTableOfContents({ id: "folder-1", title: "Mistborn" }, segments);

        expect(toc).toEqual({
            bookId: "folder-1",
            bookTitle: "Mistborn",
            totalSegments: 3,
            totalDurationSeconds: 8800.75,
            segments: [
                {
                    sequence: 1,
                    displayName: "mistborn_segment_01",
                    startOffsetSeconds: 0,
                    durationSeconds: 3600.5,
                    sizeBytes: 100,
                    sourceIndexes: [1, 2],
                },
                {
                    sequence: 2,
                    displayName: "mistborn_segment_02",
                    startOffsetSeconds: 3600.5,
                    durationSeconds: 4000,
                    sizeBytes: 200,
                    sourceIndexes: [3],
                },
                {
                    sequence: 3,
                    displayName: "mistborn_segment_03",
                    startOffsetSeconds: 7600.5,
                    durationSeconds: 1200.25,
                    sizeBytes: 50,
                    sourceIndexes: [],
                },
            ],
        });
    });

    it("derives the file name from the title", () => {
        expect(tocFileName("The Hero of Ages")).toBe("the_hero_of_ages_toc.json");
        expect(isTocFileName("the_hero_of_ages_toc.json")).toBe(true);
        expect(isTocFileName("the_hero_of_ages_segment_01.mp3")).toBe(false);
    });

    it("parses what it serializes", () => {
        const toc = buildTableOfContents({ id: "folder-1", title: "Mistborn" }, segments);
        const json = serializeTableOfContents(toc);

        expect(json.endsWith("}\n")).toBe(true);
        expect(json.split("\n")[1]).toBe('  "bookId": "folder-1",');
        expect(parseTableOfContents(json)).toEqual(toc);
    });

    it("rejects malformed input", () => {
        expect(() => parseTableOfContents("{not json")).toThrow("Table of contents is not valid JSON");
        expect(() => parseTableOfContents({ bookTitle: "x" })).toThrow(InputError);
        expect(() =>
            parseTableOfContents({
                bookId: "b",
                bookTitle: "Book",
                totalSegments: 1,
                totalDurationSeconds: 10,
                segments: [{ sequence: 0, displayName: "a", startOffsetSeconds: 0, durationSeconds: 1, sizeBytes: 1, sourceIndexes: [] }],
            })
        ).toThrow("Table of contents has an unexpected shape");
    });
});
