import { logger } from "../../utils/logger";

/**
 * Playback State Machine
 *
 * Single source of truth for the session's state. Transitions not listed in
 * the table are rejected.
 */

export type SessionState =
    | "IDLE"
    | "LOADING"
    | "READY"
    | "PLAYING"
    | "PAUSED"
    | "ENDED"
    | "FINISHED"
    | "ERROR";

export interface StateContext {
    state: SessionState;
    previousState: SessionState | null;
    error: string | null;
    lastTransitionTime: number;
}

const VALID_TRANSITIONS: Record<SessionState, SessionState[]> = {
    IDLE: ["LOADING"],
    LOADING: ["LOADING", "READY", "ERROR", "IDLE"],
    READY: ["PLAYING", "LOADING", "ERROR", "IDLE"],
    PLAYING: ["PAUSED", "ENDED", "LOADING", "ERROR", "IDLE"],
    PAUSED: ["PLAYING", "LOADING", "ERROR", "IDLE"],
    ENDED: ["LOADING", "FINISHED", "IDLE"],
    FINISHED: ["PLAYING", "LOADING", "IDLE"],
    ERROR: ["LOADING", "IDLE"],
};

export type StateListener = (context: StateContext) => void;

const log = logger.child("state");

export class PlaybackStateMachine {
    private context: StateContext = {
        state: "IDLE",
        previousState: null,
        error: null,
        lastTransitionTime: Date.now(),
    };

    private listeners: Set<StateListener> = new Set();

    getState(): SessionState {
        return this.context.state;
    }

    getContext(): Readonly<StateContext> {
        return { ...this.context };
    }

    canTransition(to: SessionState): boolean {
        return VALID_TRANSITIONS[this.context.state].includes(to);
    }

    transition(to: SessionState, options?: { error?: string }): boolean {
        if (!this.canTransition(to)) {
            log.debug(`Invalid transition: ${this.context.state} → ${to}`);
            return false;
        }

        const from = this.context.state;
        this.context = {
            previousState: from,
            state: to,
            // Leaving ERROR clears the message
            error: to === "ERROR" ? (options?.error ?? "Unknown error") : null,
            lastTransitionTime: Date.now(),
        };

        log.debug(`${from} → ${to}`);
        this.notify();
        return true;
    }

    /**
     * Bypasses validation; shutdown uses it to return to IDLE from anywhere.
     */
    forceTransition(to: SessionState): void {
        const from = this.context.state;
        this.context = {
            previousState: from,
            state: to,
            error: null,
            lastTransitionTime: Date.now(),
        };
        log.debug(`FORCE: ${from} → ${to}`);
        this.notify();
    }

    subscribe(listener: StateListener): () => void {
        this.listeners.add(listener);
        listener(this.getContext());
        return () => {
            this.listeners.delete(listener);
        };
    }

    private notify(): void {
        const ctx = this.getContext();
        this.listeners.forEach((fn) => {
            try {
                fn(ctx);
            } catch (err) {
                log.error("Listener error:", err);
            }
        });
    }

    get isPlaying(): boolean {
        return this.context.state === "PLAYING";
    }

    get isLoading(): boolean {
        return this.context.state === "LOADING";
    }
}
