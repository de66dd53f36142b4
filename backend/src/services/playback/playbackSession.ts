import PQueue from "p-queue";
import {
    Book,
    clampPlaybackSpeed,
    clampSegmentIndex,
    DEFAULT_PLAYBACK_SPEED,
    isSamePlaybackPosition,
    normalizeOffsetMillis,
    normalizePlaybackPosition,
    PlaybackPosition,
} from "@segmentshelf/audiobook-contract";
import {
    AppError,
    NoBookSelectedError,
    PlaybackError,
    StateError,
    toUserMessage,
} from "../../utils/errors";
import { logErrorWithContext, logger } from "../../utils/logger";
import type { BookCatalog, PlayableSource } from "../libraryCatalog";
import { PlaybackStateMachine, SessionState, StateContext } from "./playbackStateMachine";
import type {
    AdvanceDirection,
    AdvanceResult,
    MediaPlayer,
    NoticeKind,
    PlaybackSourceResolver,
    PlayerEvent,
    PositionStore,
    SessionNotice,
    SessionSnapshot,
} from "./types";

const log = logger.child("session");

export const DEFAULT_POSITION_SAVE_INTERVAL_MS = 5000;
export const DEFAULT_ERROR_SKIP_DELAY_MS = 2000;
export const DEFAULT_SKIP_MS = 30_000;

export interface PlaybackSessionOptions {
    player: MediaPlayer;
    sources: PlaybackSourceResolver;
    store: PositionStore;
    positionSaveIntervalMs?: number;
    errorSkipDelayMs?: number;
    /** Keep playing into the next segment when one ends. */
    continueAfterSegmentEnd?: boolean;
}

interface PendingLoad {
    generation: number;
    autoPlay: boolean;
    seekToMs: number | null;
}

/**
 * Drives one book through the player.
 *
 * Commands, player events and timer callbacks all run through one queue, so
 * none of them observe another half-done. Each load bumps `generation`; work
 * tagged with an older generation is dropped when it finally runs.
 */
export class PlaybackSession {
    private readonly queue = new PQueue({ concurrency: 1 });
    private readonly machine = new PlaybackStateMachine();
    private readonly noticeListeners = new Set<(notice: SessionNotice) => void>();

    private book: Book | null = null;
    private segmentIndex = 0;
    private speed = DEFAULT_PLAYBACK_SPEED;

    private generation = 0;
    /** Generation of the load last handed to the player; its events carry this tag. */
    private playerGeneration: number | null = null;
    private pendingLoad: PendingLoad | null = null;
    /** Generation whose segment the player reported ready. */
    private confirmedGeneration: number | null = null;
    private skipScheduledFor: number | null = null;

    private trackingTimer: NodeJS.Timeout | null = null;
    private errorSkipTimer: NodeJS.Timeout | null = null;

    private lastPersisted: PlaybackPosition | null = null;
    private lastKnownPosition: PlaybackPosition | null = null;
    private unsubscribePlayer: (() => void) | null = null;

    private readonly positionSaveIntervalMs: number;
    private readonly errorSkipDelayMs: number;
    private readonly continueAfterSegmentEnd: boolean;

    constructor(private readonly options: PlaybackSessionOptions) {
        this.positionSaveIntervalMs = options.positionSaveIntervalMs ?? DEFAULT_POSITION_SAVE_INTERVAL_MS;
        this.errorSkipDelayMs = options.errorSkipDelayMs ?? DEFAULT_ERROR_SKIP_DELAY_MS;
        this.continueAfterSegmentEnd = options.continueAfterSegmentEnd ?? true;

        // The tracking timer exists exactly while PLAYING.
        this.machine.subscribe(({ state }) => this.syncTracking(state));
        this.attachPlayer();
    }

    // ----- public commands ------------------------------------------------

    selectBook(book: Book): Promise<void> {
        return this.enqueue(async () => {
            if (book.segments.length === 0) {
                throw new StateError(`Book "${book.displayName}" has no segments`, { bookId: book.id });
            }
            this.book = book;
            this.lastKnownPosition = null;
            log.info(`Selected "${book.displayName}" (${book.segments.length} segments)`);
            await this.loadSegment(0, false, null);
        });
    }

    /**
     * Restores a saved position. Resolves false, leaving the session untouched,
     * when the catalog does not know the saved book.
     */
    resumeFromSaved(saved: PlaybackPosition, catalog: BookCatalog): Promise<boolean> {
        return this.enqueue(async () => {
            const position = normalizePlaybackPosition(saved);
            const book = position ? catalog.findBook(position.bookId) : undefined;
            if (!position || !book || book.segments.length === 0) {
                log.info(`Saved position refers to an unknown book (${saved.bookId}); not resuming`);
                return false;
            }

            const segmentIndex = clampSegmentIndex(position.segmentIndex, book.segments.length);
            this.book = book;
            this.speed = position.playbackSpeed;
            this.lastPersisted = position;
            this.lastKnownPosition = null;
            log.info(`Resuming "${book.displayName}" at segment ${segmentIndex + 1}, ${position.offsetMillis}ms`);
            await this.loadSegment(segmentIndex, false, position.offsetMillis);
            return true;
        });
    }

    playPause(): Promise<void> {
        return this.enqueue(async () => {
            if (!this.book) {
                throw new NoBookSelectedError("playPause");
            }

            switch (this.machine.getState()) {
                case "PLAYING":
                    this.options.player.pause();
                    this.machine.transition("PAUSED");
                    await this.persistPosition();
                    return;
                case "READY":
                case "PAUSED":
                    this.startPlayback();
                    return;
                case "LOADING":
                    if (this.pendingLoad) {
                        this.pendingLoad.autoPlay = true;
                    }
                    return;
                case "FINISHED":
                    this.options.player.seekTo(0);
                    this.startPlayback();
                    return;
                case "IDLE":
                case "ERROR":
                case "ENDED":
                    await this.loadSegment(this.segmentIndex, true, this.resumeOffsetFor(this.segmentIndex));
                    return;
            }
        });
    }

    advance(direction: AdvanceDirection): Promise<AdvanceResult> {
        return this.enqueue(async (): Promise<AdvanceResult> => {
            const book = this.requireBook("advance");
            const target = direction === "next" ? this.segmentIndex + 1 : this.segmentIndex - 1;
            if (target < 0) {
                return { kind: "atBoundary", boundary: "start" };
            }
            if (target >= book.segments.length) {
                return { kind: "atBoundary", boundary: "end" };
            }
            await this.loadSegment(target, false, null);
            return { kind: "moved", segmentIndex: target };
        });
    }

    /** Called when the current segment played to its end. */
    onSegmentEnded(): Promise<void> {
        return this.enqueue(() => this.handleSegmentEnded());
    }

    onPlaybackError(error: unknown): Promise<void> {
        return this.enqueue(() => this.handleError(error));
    }

    /** Relative seek; never before the start of the segment. Resolves to the new offset. */
    skipBy(deltaMillis: number = DEFAULT_SKIP_MS): Promise<number> {
        return this.enqueue(async () => {
            this.requireBook("skipBy");
            if (!this.isConfirmed()) {
                throw new StateError("No segment is loaded yet", { state: this.machine.getState() });
            }
            const target = Math.max(0, this.options.player.getPositionMs() + deltaMillis);
            this.options.player.seekTo(target);
            return target;
        });
    }

    /** Resolves to the speed actually applied after clamping. */
    setSpeed(value: number): Promise<number> {
        return this.enqueue(async () => {
            this.speed = clampPlaybackSpeed(value);
            if (this.isConfirmed()) {
                this.options.player.setSpeed(this.speed);
                await this.persistPosition();
            }
            return this.speed;
        });
    }

    /**
     * Cancels in-flight loads, stops timers, saves the last confirmed
     * position, stops the player and detaches from it.
     */
    async shutdown(): Promise<void> {
        const finalPosition = this.sampleConfirmedPosition() ?? this.lastKnownPosition;
        this.generation += 1;
        this.pendingLoad = null;
        this.confirmedGeneration = null;
        this.clearErrorSkip();

        await this.enqueue(async () => {
            if (finalPosition) {
                await this.writePosition(finalPosition);
            }
            this.clearErrorSkip();
            this.options.player.stop();
            this.detachPlayer();
            if (this.machine.getState() !== "IDLE") {
                this.machine.forceTransition("IDLE");
            }
            log.info("Playback session shut down");
        });
    }

    getSnapshot(): SessionSnapshot {
        const context = this.machine.getContext();
        return {
            state: context.state,
            bookId: this.book?.id ?? null,
            segmentIndex: this.segmentIndex,
            speed: this.speed,
            error: context.error,
        };
    }

    onNotice(listener: (notice: SessionNotice) => void): () => void {
        this.noticeListeners.add(listener);
        return () => {
            this.noticeListeners.delete(listener);
        };
    }

    onStateChange(listener: (context: StateContext) => void): () => void {
        return this.machine.subscribe(listener);
    }

    /** Resolves once every queued command and event has been processed. */
    whenIdle(): Promise<void> {
        return this.queue.onIdle();
    }

    // ----- internals --------------------------------------------------------

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        return this.queue.add(task);
    }

    private schedule(task: () => Promise<void>, label: string): void {
        void this.enqueue(task).catch((error: unknown) => {
            logErrorWithContext(log, `${label} failed`, error, { bookId: this.book?.id });
        });
    }

    private requireBook(operation: string): Book {
        if (!this.book) {
            throw new NoBookSelectedError(operation);
        }
        return this.book;
    }

    private isConfirmed(): boolean {
        return this.confirmedGeneration !== null && this.confirmedGeneration === this.generation;
    }

    private attachPlayer(): void {
        if (this.unsubscribePlayer) {
            return;
        }
        this.unsubscribePlayer = this.options.player.subscribe((event) => {
            // Tag the event with the load the player is working on, not the one being resolved.
            const generation = this.playerGeneration;
            this.schedule(() => this.handlePlayerEvent(event, generation), `Player event ${event.type}`);
        });
    }

    private detachPlayer(): void {
        this.unsubscribePlayer?.();
        this.unsubscribePlayer = null;
    }

    private resumeOffsetFor(segmentIndex: number): number | null {
        const known = this.lastKnownPosition;
        if (known && this.book && known.bookId === this.book.id && known.segmentIndex === segmentIndex) {
            return known.offsetMillis;
        }
        return null;
    }

    private async loadSegment(index: number, autoPlay: boolean, seekToMs: number | null): Promise<void> {
        const book = this.requireBook("load");
        this.attachPlayer();
        this.clearErrorSkip();

        this.generation += 1;
        const generation = this.generation;
        this.segmentIndex = index;
        this.confirmedGeneration = null;
        this.pendingLoad = { generation, autoPlay, seekToMs };
        this.machine.transition("LOADING");

        let source: PlayableSource;
        try {
            source = await this.options.sources.resolvePlayableSource(book.segments[index]);
        } catch (error) {
            if (generation === this.generation) {
                await this.handleError(error);
            }
            return;
        }

        if (generation !== this.generation) {
            log.debug(`Load of segment ${index + 1} superseded`);
            return;
        }
        log.debug(`Loading segment ${index + 1}/${book.segments.length}`);
        this.playerGeneration = generation;
        this.options.player.load(source);
    }

    private async handlePlayerEvent(event: PlayerEvent, generation: number | null): Promise<void> {
        if (generation === null || generation !== this.generation) {
            log.debug(`Discarding stale player event (${event.type})`);
            return;
        }

        if (event.type === "error") {
            await this.handleError(new PlaybackError(event.message, { segmentIndex: this.segmentIndex }));
            return;
        }

        if (event.state === "ready") {
            await this.confirmLoad(generation);
        } else if (event.state === "ended") {
            await this.handleSegmentEnded();
        }
    }

    private async confirmLoad(generation: number): Promise<void> {
        const pending = this.pendingLoad;
        if (!pending || pending.generation !== generation || !this.machine.isLoading) {
            return;
        }
        this.pendingLoad = null;

        const player = this.options.player;
        player.setSpeed(this.speed);
        if (pending.seekToMs !== null && pending.seekToMs > 0) {
            try {
                player.seekTo(pending.seekToMs);
            } catch (error) {
                log.warn(`Player rejected seek to ${pending.seekToMs}ms; starting from the beginning`, {
                    error,
                });
                player.seekTo(0);
            }
        }

        this.confirmedGeneration = generation;
        this.machine.transition("READY");
        await this.persistPosition();

        if (pending.autoPlay) {
            this.startPlayback();
        }
    }

    private startPlayback(): void {
        this.options.player.play();
        this.machine.transition("PLAYING");
    }

    private async handleSegmentEnded(): Promise<void> {
        const book = this.book;
        if (!book || !this.machine.isPlaying) {
            return;
        }

        const finalPosition = this.sampleConfirmedPosition();
        this.machine.transition("ENDED");

        if (this.segmentIndex >= book.segments.length - 1) {
            this.machine.transition("FINISHED");
            if (finalPosition) {
                await this.writePosition(finalPosition);
            }
            this.emitNotice("finished", `Finished "${book.displayName}"`);
            return;
        }

        await this.loadSegment(this.segmentIndex + 1, this.continueAfterSegmentEnd, null);
    }

    private async handleError(error: unknown): Promise<void> {
        const book = this.book;
        if (!book) {
            return;
        }

        const failing = this.generation;
        if (this.skipScheduledFor === failing) {
            log.debug("Error for a load that is already being skipped");
            return;
        }

        const message = error instanceof AppError ? error.message : toUserMessage(error);
        if (!this.machine.transition("ERROR", { error: message })) {
            // Nothing to skip from here; still surface it.
            logErrorWithContext(log, `Playback error in state ${this.machine.getState()}`, error, { bookId: book.id });
            this.emitNotice("error", `Playback failed: ${message}`);
            return;
        }

        logErrorWithContext(log, `Segment ${this.segmentIndex + 1} failed`, error, { bookId: book.id });
        this.pendingLoad = null;
        this.confirmedGeneration = null;
        this.skipScheduledFor = failing;
        this.emitNotice("error", `Playback failed: ${message}`);

        this.clearErrorSkip();
        this.errorSkipTimer = setTimeout(() => {
            this.errorSkipTimer = null;
            this.schedule(() => this.skipAfterError(failing), "Error skip");
        }, this.errorSkipDelayMs);
    }

    private async skipAfterError(failing: number): Promise<void> {
        const book = this.book;
        if (!book || failing !== this.generation || this.machine.getState() !== "ERROR") {
            return;
        }

        if (this.segmentIndex >= book.segments.length - 1) {
            this.emitNotice("terminal", "Playback failed on the last segment; nothing left to skip to");
            return;
        }

        this.emitNotice("skipping", "Skipping to next segment");
        await this.loadSegment(this.segmentIndex + 1, true, null);
    }

    private clearErrorSkip(): void {
        if (this.errorSkipTimer) {
            clearTimeout(this.errorSkipTimer);
            this.errorSkipTimer = null;
        }
    }

    private syncTracking(state: SessionState): void {
        if (state === "PLAYING") {
            if (!this.trackingTimer) {
                this.trackingTimer = setInterval(() => {
                    this.schedule(async () => {
                        if (this.machine.isPlaying) {
                            await this.persistPosition();
                        }
                    }, "Position tick");
                }, this.positionSaveIntervalMs);
            }
            return;
        }

        if (this.trackingTimer) {
            clearInterval(this.trackingTimer);
            this.trackingTimer = null;
        }
    }

    private sampleConfirmedPosition(): PlaybackPosition | null {
        if (!this.book || !this.isConfirmed()) {
            return null;
        }
        const position: PlaybackPosition = {
            bookId: this.book.id,
            segmentIndex: this.segmentIndex,
            offsetMillis: normalizeOffsetMillis(this.options.player.getPositionMs()),
            playbackSpeed: this.speed,
        };
        this.lastKnownPosition = position;
        return position;
    }

    private async persistPosition(): Promise<void> {
        const position = this.sampleConfirmedPosition();
        if (position) {
            await this.writePosition(position);
        }
    }

    /** Last write wins; an unchanged tuple is not written again. */
    private async writePosition(position: PlaybackPosition): Promise<void> {
        if (isSamePlaybackPosition(position, this.lastPersisted)) {
            return;
        }
        try {
            await this.options.store.save(position);
            this.lastPersisted = position;
        } catch (error) {
            logErrorWithContext(log, "Could not save playback position", error, { bookId: position.bookId });
        }
    }

    private emitNotice(kind: NoticeKind, message: string): void {
        const notice: SessionNotice = {
            kind,
            message,
            bookId: this.book?.id ?? "",
            segmentIndex: this.segmentIndex,
        };
        log.info(message);
        this.noticeListeners.forEach((listener) => {
            try {
                listener(notice);
            } catch (err) {
                log.error("Notice listener error:", err);
            }
        });
    }
}
