import type { PlaybackPosition, Segment } from "@segmentshelf/audiobook-contract";
import type { PlayableSource } from "../libraryCatalog";
import type { SessionState } from "./playbackStateMachine";

export type PlayerState = "idle" | "buffering" | "ready" | "ended";

export type PlayerEvent =
    | { type: "state"; state: PlayerState }
    | { type: "error"; message: string };

export type PlayerListener = (event: PlayerEvent) => void;

/**
 * The streaming player the session drives. `load` returns immediately; the
 * outcome arrives as a `ready` state or an `error` event. `seekTo` throws
 * when the player cannot seek to the requested position.
 */
export interface MediaPlayer {
    load(source: PlayableSource): void;
    play(): void;
    pause(): void;
    seekTo(positionMs: number): void;
    getPositionMs(): number;
    setSpeed(speed: number): void;
    stop(): void;
    subscribe(listener: PlayerListener): () => void;
}

export interface PlaybackSourceResolver {
    resolvePlayableSource(segment: Pick<Segment, "fileId">): Promise<PlayableSource>;
}

export interface PositionStore {
    load(): Promise<PlaybackPosition | null>;
    save(position: PlaybackPosition): Promise<void>;
    clear(): Promise<void>;
}

export type AdvanceDirection = "next" | "previous";

export type AdvanceResult =
    | { kind: "moved"; segmentIndex: number }
    | { kind: "atBoundary"; boundary: "start" | "end" };

export type NoticeKind = "error" | "skipping" | "terminal" | "finished";

/** User-visible message; the host decides how to show it. */
export interface SessionNotice {
    kind: NoticeKind;
    message: string;
    bookId: string;
    segmentIndex: number;
}

export interface SessionSnapshot {
    state: SessionState;
    bookId: string | null;
    segmentIndex: number;
    speed: number;
    error: string | null;
}
