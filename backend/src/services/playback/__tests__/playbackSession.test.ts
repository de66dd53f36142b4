import type { Book } from "@segmentshelf/audiobook-contract";
import { NoBookSelectedError, StateError } from "../../../utils/errors";
import type { PlayableSource } from "../../libraryCatalog";
import { PlaybackSession } from "../playbackSession";
import { MemoryPositionStore } from "../positionStore";
import type { MediaPlayer, PlayerEvent, PlayerListener, SessionNotice } from "../types";

class FakePlayer implements MediaPlayer {
    autoReady = true;
    positionMs = 0;
    /** Seeks past this offset throw, like a player that cannot reach it. */
    seekLimitMs = Number.POSITIVE_INFINITY;
    loads: string[] = [];
    seeks: number[] = [];
    speeds: number[] = [];
    plays = 0;
    pauses = 0;
    stops = 0;
    private listeners = new Set<PlayerListener>();

    load(source: PlayableSource): void {
        this.loads.push(source.url);
        this.positionMs = 0;
        if (this.autoReady) {
            this.emit({ type: "state", state: "ready" });
        }
    }

    play(): void {
        this.plays += 1;
    }

    pause(): void {
        this.pauses += 1;
    }

    seekTo(positionMs: number): void {
        this.seeks.push(positionMs);
        if (positionMs > this.seekLimitMs) {
            throw new Error(`Cannot seek to ${positionMs}`);
        }
        this.positionMs = positionMs;
    }

    getPositionMs(): number {
        return this.positionMs;
    }

    setSpeed(speed: number): void {
        this.speeds.push(speed);
    }

    stop(): void {
        this.stops += 1;
    }

    subscribe(listener: PlayerListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    get listenerCount(): number {
        return this.listeners.size;
    }

    emit(event: PlayerEvent): void {
        this.listeners.forEach((listener) => listener(event));
    }
}

function createBook(segmentCount: number, id = "book-1"): Book {
    return {
        id,
        displayName: "Mistborn",
        segments: Array.from({ length: segmentCount }, (_, position) => ({
            fileId: `file-${position + 1}`,
            displayName: `mistborn_segment_0${position + 1}`,
            durationSeconds: 3600,
            sizeBytes: 100,
        })),
    };
}

const sources = {
    resolvePlayableSource: async (segment: { fileId: string }): Promise<PlayableSource> => ({
        url: `https://media.example.test/${segment.fileId}`,
        headers: { Authorization: "Bearer token-1" },
    }),
};

describe("PlaybackSession", () => {
    let player: FakePlayer;
    let store: MemoryPositionStore;
    let session: PlaybackSession;
    let notices: SessionNotice[];

    beforeEach(() => {
        jest.useFakeTimers({ doNotFake: ["nextTick", "queueMicrotask"] });
        player = new FakePlayer();
        store = new MemoryPositionStore();
        session = new PlaybackSession({ player, sources, store });
        notices = [];
        session.onNotice((notice) => notices.push(notice));
    });

    afterEach(async () => {
        await session.shutdown();
        jest.useRealTimers();
    });

    async function select(book: Book = createBook(3)): Promise<Book> {
        await session.selectBook(book);
        await session.whenIdle();
        return book;
    }

    async function play(): Promise<void> {
        await session.playPause();
        await session.whenIdle();
    }

    it("loads the first segment of a selected book and records the position", async () => {
        await select();

        expect(player.loads).toEqual(["https://media.example.test/file-1"]);
        expect(session.getSnapshot()).toEqual({
            state: "READY",
            bookId: "book-1",
            segmentIndex: 0,
            speed: 1,
            error: null,
        });
        await expect(store.load()).resolves.toEqual({
            bookId: "book-1",
            segmentIndex: 0,
            offsetMillis: 0,
            playbackSpeed: 1,
        });
    });

    it("rejects a book without segments", async () => {
        await expect(session.selectBook(createBook(0))).rejects.toBeInstanceOf(StateError);
        expect(session.getSnapshot().state).toBe("IDLE");
    });

    it("requires a selected book for transport commands", async () => {
        await expect(session.playPause()).rejects.toBeInstanceOf(NoBookSelectedError);
        await expect(session.advance("next")).rejects.toThrow("No book selected (advance)");
        await expect(session.skipBy(1000)).rejects.toThrow("No book selected (skipBy)");
    });

    it("tracks the position only while playing", async () => {
        await select();
        expect(jest.getTimerCount()).toBe(0);

        await play();
        expect(session.getSnapshot().state).toBe("PLAYING");
        expect(player.plays).toBe(1);
        expect(jest.getTimerCount()).toBe(1);

        player.positionMs = 4000;
        await jest.advanceTimersByTimeAsync(5000);
        await session.whenIdle();
        await expect(store.load()).resolves.toMatchObject({ offsetMillis: 4000 });
        expect(store.saveCount).toBe(2);

        await jest.advanceTimersByTimeAsync(5000);
        await session.whenIdle();
        expect(store.saveCount).toBe(2);

        player.positionMs = 4500;
        await play();
        expect(session.getSnapshot().state).toBe("PAUSED");
        expect(player.pauses).toBe(1);
        expect(jest.getTimerCount()).toBe(0);
        await expect(store.load()).resolves.toMatchObject({ offsetMillis: 4500 });
        expect(store.saveCount).toBe(3);
    });

    it("queues play while a segment is still loading", async () => {
        player.autoReady = false;
        await select();
        expect(session.getSnapshot().state).toBe("LOADING");

        await play();
        expect(player.plays).toBe(0);

        player.emit({ type: "state", state: "ready" });
        await session.whenIdle();

        expect(session.getSnapshot().state).toBe("PLAYING");
        expect(player.plays).toBe(1);
    });

    it("moves between segments and reports the boundaries", async () => {
        await select(createBook(2));

        await expect(session.advance("previous")).resolves.toEqual({ kind: "atBoundary", boundary: "start" });
        await expect(session.advance("next")).resolves.toEqual({ kind: "moved", segmentIndex: 1 });
        await session.whenIdle();
        await expect(session.advance("next")).resolves.toEqual({ kind: "atBoundary", boundary: "end" });

        expect(player.loads).toEqual(["https://media.example.test/file-1", "https://media.example.test/file-2"]);
        expect(session.getSnapshot()).toMatchObject({ state: "READY", segmentIndex: 1 });
    });

    it("continues into the next segment when one ends", async () => {
        await select();
        await play();

        player.emit({ type: "state", state: "ended" });
        await session.whenIdle();

        expect(session.getSnapshot()).toMatchObject({ state: "PLAYING", segmentIndex: 1 });
        expect(player.loads).toHaveLength(2);
        expect(player.plays).toBe(2);
    });

    it("finishes the book after the last segment and can replay it", async () => {
        await select(createBook(1));
        await play();
        player.positionMs = 9000;

        await session.onSegmentEnded();

        expect(session.getSnapshot().state).toBe("FINISHED");
        expect(notices).toEqual([
            { kind: "finished", message: 'Finished "Mistborn"', bookId: "book-1", segmentIndex: 0 },
        ]);
        await expect(store.load()).resolves.toMatchObject({ segmentIndex: 0, offsetMillis: 9000 });
        expect(jest.getTimerCount()).toBe(0);

        await play();
        expect(player.seeks).toEqual([0]);
        expect(session.getSnapshot().state).toBe("PLAYING");
    });

    it("resumes a saved position, clamping the segment index", async () => {
        const book = createBook(3);
        const catalog = { findBook: (bookId: string) => (bookId === book.id ? book : undefined) };

        const resumed = await session.resumeFromSaved(
            { bookId: "book-1", segmentIndex: 7, offsetMillis: 12_345, playbackSpeed: 1.5 },
            catalog
        );
        await session.whenIdle();

        expect(resumed).toBe(true);
        expect(player.loads).toEqual(["https://media.example.test/file-3"]);
        expect(player.speeds).toEqual([1.5]);
        expect(player.seeks).toEqual([12_345]);
        expect(session.getSnapshot()).toMatchObject({ state: "READY", segmentIndex: 2, speed: 1.5 });
        await expect(store.load()).resolves.toEqual({
            bookId: "book-1",
            segmentIndex: 2,
            offsetMillis: 12_345,
            playbackSpeed: 1.5,
        });
    });

    it("ignores a saved position for an unknown book", async () => {
        const resumed = await session.resumeFromSaved(
            { bookId: "gone", segmentIndex: 0, offsetMillis: 10, playbackSpeed: 1 },
            { findBook: () => undefined }
        );

        expect(resumed).toBe(false);
        expect(player.loads).toEqual([]);
        expect(session.getSnapshot()).toMatchObject({ state: "IDLE", bookId: null });
    });

    it("starts from the beginning when the player rejects the saved offset", async () => {
        player.seekLimitMs = 10_000;
        const book = createBook(2);

        await session.resumeFromSaved(
            { bookId: "book-1", segmentIndex: 1, offsetMillis: 50_000, playbackSpeed: 1 },
            { findBook: () => book }
        );
        await session.whenIdle();

        expect(player.seeks).toEqual([50_000, 0]);
        expect(session.getSnapshot()).toMatchObject({ state: "READY", segmentIndex: 1 });
    });

    it("skips to the next segment once after a playback error", async () => {
        player.autoReady = false;
        await select();

        player.emit({ type: "error", message: "decoder crashed" });
        player.emit({ type: "error", message: "decoder crashed again" });
        await session.whenIdle();

        expect(session.getSnapshot()).toMatchObject({ state: "ERROR", error: "decoder crashed", segmentIndex: 0 });
        expect(notices.map((notice) => notice.kind)).toEqual(["error"]);
        expect(notices[0].message).toBe("Playback failed: decoder crashed");
        expect(jest.getTimerCount()).toBe(1);

        player.autoReady = true;
        await jest.advanceTimersByTimeAsync(2000);
        await session.whenIdle();

        expect(notices.map((notice) => notice.kind)).toEqual(["error", "skipping"]);
        expect(session.getSnapshot()).toMatchObject({ state: "PLAYING", segmentIndex: 1, error: null });
        expect(player.loads).toEqual(["https://media.example.test/file-1", "https://media.example.test/file-2"]);
    });

    it("stops with a terminal notice when the last segment fails", async () => {
        player.autoReady = false;
        await select(createBook(1));

        await session.onPlaybackError(new Error("stream reset"));
        await jest.advanceTimersByTimeAsync(2000);
        await session.whenIdle();

        expect(notices.map((notice) => [notice.kind, notice.message])).toEqual([
            ["error", "Playback failed: stream reset"],
            ["terminal", "Playback failed on the last segment; nothing left to skip to"],
        ]);
        expect(session.getSnapshot().state).toBe("ERROR");
        expect(player.loads).toHaveLength(1);
    });

    it("reports an error after the book finished without scheduling a skip", async () => {
        await select(createBook(1));
        await play();
        await session.onSegmentEnded();

        await session.onPlaybackError(new Error("output device lost"));

        expect(notices.map((notice) => [notice.kind, notice.message])).toEqual([
            ["finished", 'Finished "Mistborn"'],
            ["error", "Playback failed: output device lost"],
        ]);
        expect(session.getSnapshot()).toMatchObject({ state: "FINISHED", error: null });
        expect(jest.getTimerCount()).toBe(0);
    });

    it("cancels a pending error skip when the user moves on", async () => {
        player.autoReady = false;
        await select();
        await session.onPlaybackError(new Error("stream reset"));

        player.autoReady = true;
        await session.playPause();
        await session.whenIdle();
        expect(jest.getTimerCount()).toBe(1);

        await jest.advanceTimersByTimeAsync(2000);
        await session.whenIdle();

        expect(notices.map((notice) => notice.kind)).toEqual(["error"]);
        expect(session.getSnapshot()).toMatchObject({ state: "PLAYING", segmentIndex: 0 });
    });

    it("skips relative to the current position without going below zero", async () => {
        await select();
        player.positionMs = 20_000;

        await expect(session.skipBy(30_000)).resolves.toBe(50_000);
        await expect(session.skipBy(-90_000)).resolves.toBe(0);
        await expect(session.skipBy()).resolves.toBe(30_000);
        expect(player.seeks).toEqual([50_000, 0, 30_000]);
    });

    it("refuses to skip before the segment is ready", async () => {
        player.autoReady = false;
        await select();

        await expect(session.skipBy(30_000)).rejects.toThrow("No segment is loaded yet");
    });

    it("clamps and persists the playback speed", async () => {
        await select();

        await expect(session.setSpeed(3)).resolves.toBe(2);
        await expect(session.setSpeed(0.1)).resolves.toBe(0.5);

        expect(player.speeds).toEqual([1, 2, 0.5]);
        await expect(store.load()).resolves.toMatchObject({ playbackSpeed: 0.5 });
    });

    it("keeps playing when the position cannot be saved", async () => {
        const failing = new MemoryPositionStore();
        jest.spyOn(failing, "save").mockRejectedValue(new Error("disk full"));
        await session.shutdown();
        session = new PlaybackSession({ player, sources, store: failing });

        await session.selectBook(createBook(1));
        await session.whenIdle();
        await session.playPause();

        expect(session.getSnapshot().state).toBe("PLAYING");
    });

    it("saves the final position, stops the player and detaches on shutdown", async () => {
        await select();
        await play();
        player.positionMs = 61_000;

        await session.shutdown();

        expect(player.stops).toBe(1);
        expect(player.listenerCount).toBe(0);
        expect(jest.getTimerCount()).toBe(0);
        expect(session.getSnapshot().state).toBe("IDLE");
        await expect(store.load()).resolves.toMatchObject({ segmentIndex: 0, offsetMillis: 61_000 });
    });

    it("drops player events that arrive before shutdown runs", async () => {
        player.autoReady = false;
        await select();

        player.emit({ type: "state", state: "ready" });
        await session.shutdown();
        await session.whenIdle();

        expect(session.getSnapshot().state).toBe("IDLE");
        expect(player.speeds).toEqual([]);
        expect(store.saveCount).toBe(0);
    });

    it("ignores a ready event from a load that a new selection abandoned", async () => {
        await session.shutdown();
        const gate = { hold: false, release: () => {}, entered: () => {} };
        const gatedSources = {
            resolvePlayableSource: async (segment: { fileId: string }): Promise<PlayableSource> => {
                if (gate.hold) {
                    gate.hold = false;
                    await new Promise<void>((resolve) => {
                        gate.release = () => resolve();
                        gate.entered();
                    });
                }
                return sources.resolvePlayableSource(segment);
            },
        };
        session = new PlaybackSession({ player, sources: gatedSources, store });

        await session.selectBook(createBook(2, "book-a"));
        await session.whenIdle();
        expect(store.saveCount).toBe(1);

        player.autoReady = false;
        gate.hold = true;
        const resolving = new Promise<void>((resolve) => {
            gate.entered = () => resolve();
        });
        const selecting = session.selectBook(createBook(2, "book-b"));
        await resolving;

        player.emit({ type: "state", state: "ready" });
        gate.release();
        await selecting;
        await session.whenIdle();

        expect(player.loads).toEqual(["https://media.example.test/file-1", "https://media.example.test/file-1"]);
        expect(session.getSnapshot()).toMatchObject({ state: "LOADING", bookId: "book-b" });
        expect(store.saveCount).toBe(1);
        await expect(store.load()).resolves.toMatchObject({ bookId: "book-a" });

        player.emit({ type: "state", state: "ready" });
        await session.whenIdle();

        expect(session.getSnapshot()).toMatchObject({ state: "READY", bookId: "book-b" });
        await expect(store.load()).resolves.toMatchObject({ bookId: "book-b", segmentIndex: 0 });
    });
});
