import { promises as fs } from "fs";
import * as path from "path";
import {
    DEFAULT_SEGMENT_LIMITS,
    SegmentLimits,
    TableOfContents,
    toBookSlug,
} from "@segmentshelf/audiobook-contract";
import { ErrorCode, InputError, NetworkError, toUserMessage } from "../utils/errors";
import { logger, withLogTiming } from "../utils/logger";
import { probeSourceFiles } from "./audioProbe";
import {
    downloadAll,
    DownloaderOptions,
    DownloadReport,
    downloadNumberedSeries,
    localFileName,
    NumberedSeriesOptions,
} from "./downloader";
import type { DriveFile, DriveStorage } from "./driveStorage";
import { isAudioFile } from "./libraryCatalog";
import { materializeSegments } from "./segmentMaterializer";
import { describePlan, isPlanAlreadyApplied, plan, PlannedSegment } from "./segmentPlanner";
import {
    buildTableOfContents,
    isTocFileName,
    serializeTableOfContents,
    tocFileName,
} from "./tableOfContents";

const log = logger.child("ingest");

export type IngestSource =
    | ({ kind: "series" } & NumberedSeriesOptions)
    | { kind: "urls"; urls: string[] }
    | { kind: "local"; paths: string[] };

export interface IngestRequest {
    bookTitle: string;
    source: IngestSource;
    /** Stop after planning; nothing is written to the storage sink. */
    dryRun?: boolean;
    keepWorkFiles?: boolean;
}

export type IngestStatus = "planned" | "skipped" | "uploaded";

export interface IngestResult {
    status: IngestStatus;
    bookTitle: string;
    planned: PlannedSegment[];
    toc: TableOfContents;
    download?: DownloadReport;
    folderId?: string;
    uploaded: DriveFile[];
    removed: string[];
}

export type IngestStorage = Pick<
    DriveStorage,
    "ensureFolder" | "listFiles" | "uploadFile" | "uploadJson" | "deleteFile"
>;

export interface IngestOptions {
    workDir: string;
    rootFolderName: string;
    segmentLimits?: SegmentLimits;
    download?: Omit<DownloaderOptions, "outputDir">;
    /** Required unless every run is a dry run. */
    storage?: IngestStorage;
    downloadSeries?: typeof downloadNumberedSeries;
    downloadUrls?: typeof downloadAll;
    probe?: typeof probeSourceFiles;
    materialize?: typeof materializeSegments;
}

/**
 * download → probe → plan → compare with the library → materialize → TOC →
 * upload → cleanup. Planning and materializing finish before the first
 * upload, so a failure there leaves the library untouched.
 */
export class IngestPipeline {
    constructor(private readonly options: IngestOptions) {}

    private get limits(): SegmentLimits {
        return this.options.segmentLimits ?? DEFAULT_SEGMENT_LIMITS;
    }

    private async acquire(
        source: IngestSource,
        downloadsDir: string
    ): Promise<{ paths: string[]; report?: DownloadReport }> {
        if (source.kind === "local") {
            return { paths: [...source.paths] };
        }

        const downloaderOptions: DownloaderOptions = { ...this.options.download, outputDir: downloadsDir };
        const report =
            source.kind === "series"
                ? await (this.options.downloadSeries ?? downloadNumberedSeries)(source, downloaderOptions)
                : await (this.options.downloadUrls ?? downloadAll)(
                      source.urls.map((url, position) => ({
                          index: position + 1,
                          url,
                          fileName: localFileName(position + 1),
                      })),
                      downloaderOptions
                  );

        if (report.failed.length > 0) {
            throw new NetworkError(
                `${report.failed.length} file(s) failed to download; refusing to plan an incomplete book`,
                { failed: report.failed.map((failure) => failure.url) },
                ErrorCode.DOWNLOAD_INCOMPLETE
            );
        }
        return { paths: report.downloaded.map((file) => file.filePath), report };
    }

    async run(request: IngestRequest): Promise<IngestResult> {
        const bookTitle = request.bookTitle.trim();
        if (!bookTitle) {
            throw new InputError("Book title is required");
        }

        const bookDir = path.join(this.options.workDir, toBookSlug(bookTitle));
        const downloadsDir = path.join(bookDir, "downloads");
        const segmentsDir = path.join(bookDir, "segments");

        try {
            return await withLogTiming(log, `Ingest "${bookTitle}"`, () =>
                this.process(request, bookTitle, downloadsDir, segmentsDir)
            );
        } finally {
            // Local sources belong to the caller; only our own output is removed.
            if (!request.keepWorkFiles) {
                await fs.rm(request.source.kind === "local" ? segmentsDir : bookDir, {
                    recursive: true,
                    force: true,
                });
            }
        }
    }

    private async process(
        request: IngestRequest,
        bookTitle: string,
        downloadsDir: string,
        segmentsDir: string
    ): Promise<IngestResult> {
        const { paths, report } = await this.acquire(request.source, downloadsDir);
        const sourceFiles = await (this.options.probe ?? probeSourceFiles)(paths);
        const planned = describePlan(bookTitle, plan(sourceFiles, this.limits));
        log.info(
            `Planned ${planned.length} segment(s) from ${sourceFiles.length} file(s) for "${bookTitle}"`
        );

        if (request.dryRun) {
            return {
                status: "planned",
                bookTitle,
                planned,
                toc: buildTableOfContents({ id: toBookSlug(bookTitle), title: bookTitle }, planned),
                download: report,
                uploaded: [],
                removed: [],
            };
        }

        const storage = this.options.storage;
        if (!storage) {
            throw new InputError("A storage sink is required to upload segments");
        }

        const root = await storage.ensureFolder(this.options.rootFolderName);
        const folder = await storage.ensureFolder(bookTitle, root.id);
        const existing = await storage.listFiles(folder.id);
        const existingAudio = existing.filter(isAudioFile).sort((a, b) => a.name.localeCompare(b.name));

        if (isPlanAlreadyApplied(planned, existingAudio)) {
            log.info(`"${bookTitle}" already holds these ${planned.length} segment(s); nothing to upload`);
            return {
                status: "skipped",
                bookTitle,
                planned,
                toc: buildTableOfContents({ id: folder.id, title: bookTitle }, planned),
                download: report,
                folderId: folder.id,
                uploaded: [],
                removed: [],
            };
        }

        const materialized = await (this.options.materialize ?? materializeSegments)(
            planned,
            segmentsDir,
            this.limits
        );
        const toc = buildTableOfContents({ id: folder.id, title: bookTitle }, materialized);

        const uploaded: DriveFile[] = [];
        try {
            for (const segment of materialized) {
                uploaded.push(
                    await storage.uploadFile(segment.filePath, {
                        name: path.basename(segment.filePath),
                        parentId: folder.id,
                        mimeType: "audio/mpeg",
                    })
                );
            }
            uploaded.push(
                await storage.uploadJson(tocFileName(bookTitle), folder.id, serializeTableOfContents(toc))
            );
        } catch (error) {
            // A partial upload would sit beside the previous segments under the same names.
            await this.rollbackUploads(storage, uploaded);
            throw error;
        }

        const keep = new Set(uploaded.map((file) => file.id));
        const stale = existing.filter(
            (file) => !keep.has(file.id) && (isAudioFile(file) || isTocFileName(file.name))
        );
        const removed: string[] = [];
        for (const file of stale) {
            try {
                await storage.deleteFile(file.id);
                removed.push(file.name);
            } catch (error) {
                log.warn(`Could not remove stale file ${file.name}: ${toUserMessage(error)}`);
            }
        }

        log.info(`Uploaded ${materialized.length} segment(s) and the table of contents for "${bookTitle}"`);
        return {
            status: "uploaded",
            bookTitle,
            planned,
            toc,
            download: report,
            folderId: folder.id,
            uploaded,
            removed,
        };
    }

    private async rollbackUploads(storage: IngestStorage, uploaded: readonly DriveFile[]): Promise<void> {
        for (const file of uploaded) {
            try {
                await storage.deleteFile(file.id);
            } catch (error) {
                log.warn(`Could not roll back upload of ${file.name}: ${toUserMessage(error)}`);
            }
        }
        if (uploaded.length > 0) {
            log.warn(`Rolled back ${uploaded.length} partial upload(s)`);
        }
    }
}
