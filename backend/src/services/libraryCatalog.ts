import type { Book, Segment, TableOfContents } from "@segmentshelf/audiobook-contract";
import { isAuthExpired, toUserMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { createSingleFlight } from "../utils/singleFlight";
import type { DriveFile, DriveStorage } from "./driveStorage";
import { isTocFileName, parseTableOfContents } from "./tableOfContents";

const log = logger.child("library");

export const LIBRARY_REFRESH_KEY = "library-refresh";
/** Bitrate assumed when a book has no table of contents to read durations from. */
const ESTIMATED_BITRATE_BPS = 128_000;

export interface PlayableSource {
    url: string;
    headers: Record<string, string>;
}

export interface BookCatalog {
    findBook(bookId: string): Book | undefined;
}

export type LibraryStorage = Pick<
    DriveStorage,
    "findFolder" | "listFolders" | "listFiles" | "downloadJson" | "resolvePlayableUrl" | "getAuthHeaders" | "invalidateAuth"
>;

export function estimateDurationSeconds(sizeBytes: number): number {
    return Math.round((sizeBytes * 8) / ESTIMATED_BITRATE_BPS);
}

export function isAudioFile(file: Pick<DriveFile, "mimeType" | "name">): boolean {
    return file.mimeType.startsWith("audio/") || file.name.toLowerCase().endsWith(".mp3");
}

function stripExtension(name: string): string {
    const dot = name.lastIndexOf(".");
    return dot > 0 ? name.slice(0, dot) : name;
}

/**
 * Read model of the Drive library: one book per folder under the root, its
 * audio files (by name) as segments.
 */
export class LibraryCatalog implements BookCatalog {
    private books: Book[] = [];
    private readonly refreshes = createSingleFlight<Book[]>();

    constructor(
        private readonly storage: LibraryStorage,
        private readonly rootFolderName: string
    ) {}

    /** The books of the last completed refresh. */
    listBooks(): Book[] {
        return [...this.books];
    }

    findBook(bookId: string): Book | undefined {
        return this.books.find((book) => book.id === bookId);
    }

    /** Concurrent callers share one in-flight refresh. */
    refresh(): Promise<Book[]> {
        return this.refreshes.run(LIBRARY_REFRESH_KEY, async () => {
            const books = await this.loadBooks();
            this.books = books;
            return [...books];
        });
    }

    isRefreshing(): boolean {
        return this.refreshes.isInFlight(LIBRARY_REFRESH_KEY);
    }

    private async loadBooks(): Promise<Book[]> {
        const root = await this.storage.findFolder(this.rootFolderName);
        if (!root) {
            log.warn(`Library folder "${this.rootFolderName}" not found`);
            return [];
        }

        const folders = await this.storage.listFolders(root.id);
        const books: Book[] = [];
        for (const folder of folders) {
            const book = await this.loadBook(folder);
            if (book) {
                books.push(book);
            }
        }
        log.info(`Library refreshed: ${books.length} book(s)`);
        return books;
    }

    private async loadBook(folder: DriveFile): Promise<Book | null> {
        const files = await this.storage.listFiles(folder.id);
        const audio = files.filter(isAudioFile).sort((a, b) => a.name.localeCompare(b.name));
        if (audio.length === 0) {
            log.debug(`Skipping "${folder.name}": no audio files`);
            return null;
        }

        const tocFile = files.find((file) => isTocFileName(file.name));
        const toc = tocFile ? await this.readToc(tocFile) : null;

        const segments: Segment[] = audio.map((file) => {
            const displayName = stripExtension(file.name);
            const entry = toc?.segments.find((candidate) => candidate.displayName === displayName);
            return {
                fileId: file.id,
                displayName,
                durationSeconds: entry ? entry.durationSeconds : estimateDurationSeconds(file.sizeBytes),
                sizeBytes: file.sizeBytes,
            };
        });

        return {
            id: folder.id,
            displayName: folder.name,
            segments,
            ...(tocFile ? { tocFileId: tocFile.id } : {}),
        };
    }

    private async readToc(file: DriveFile): Promise<TableOfContents | null> {
        try {
            return parseTableOfContents(await this.storage.downloadJson(file.id));
        } catch (error) {
            log.warn(`Ignoring unreadable table of contents ${file.name}: ${toUserMessage(error)}`);
            return null;
        }
    }

    /** URL and bearer headers for streaming one segment, re-authenticating once if needed. */
    async resolvePlayableSource(segment: Pick<Segment, "fileId">): Promise<PlayableSource> {
        const url = this.storage.resolvePlayableUrl(segment.fileId);
        try {
            return { url, headers: await this.storage.getAuthHeaders() };
        } catch (error) {
            if (!isAuthExpired(error)) {
                throw error;
            }
            this.storage.invalidateAuth();
            return { url, headers: await this.storage.getAuthHeaders() };
        }
    }
}
