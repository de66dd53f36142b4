import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import {
    normalizePlaybackPosition,
    PlaybackPosition,
} from "@segmentshelf/audiobook-contract";
import { toUserMessage, wrapNodeError } from "../../utils/errors";
import { createIORedisClient } from "../../utils/ioredis";
import { logger } from "../../utils/logger";
import type { PositionStore } from "./types";

const log = logger.child("position-store");

export const POSITION_REDIS_KEY = "playback:last-position";

/** On-disk / in-Redis record. Field names are stable across releases. */
export interface PositionRecord {
    last_book_id: string;
    last_segment_index: number;
    last_position_ms: number;
    last_speed: number;
}

const positionRecordSchema = z.object({
    last_book_id: z.string(),
    last_segment_index: z.coerce.number(),
    last_position_ms: z.coerce.number(),
    last_speed: z.coerce.number(),
});

export function toPositionRecord(position: PlaybackPosition): PositionRecord {
    return {
        last_book_id: position.bookId,
        last_segment_index: position.segmentIndex,
        last_position_ms: position.offsetMillis,
        last_speed: position.playbackSpeed,
    };
}

/** Null when the record is malformed or names no book. */
export function fromPositionRecord(raw: unknown): PlaybackPosition | null {
    const parsed = positionRecordSchema.safeParse(raw);
    if (!parsed.success) {
        return null;
    }
    return normalizePlaybackPosition({
        bookId: parsed.data.last_book_id,
        segmentIndex: parsed.data.last_segment_index,
        offsetMillis: parsed.data.last_position_ms,
        playbackSpeed: parsed.data.last_speed,
    });
}

export class MemoryPositionStore implements PositionStore {
    private position: PlaybackPosition | null = null;
    saveCount = 0;

    async load(): Promise<PlaybackPosition | null> {
        return this.position ? { ...this.position } : null;
    }

    async save(position: PlaybackPosition): Promise<void> {
        this.position = { ...position };
        this.saveCount += 1;
    }

    async clear(): Promise<void> {
        this.position = null;
    }
}

/**
 * JSON file written through a temp file and a rename, so a crash mid-write
 * leaves the previous record intact.
 */
export class FilePositionStore implements PositionStore {
    constructor(private readonly filePath: string) {}

    async load(): Promise<PlaybackPosition | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, "utf8");
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                return null;
            }
            throw wrapNodeError(error, this.filePath);
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (error) {
            log.warn(`Ignoring corrupt position file ${this.filePath}: ${toUserMessage(error)}`);
            return null;
        }

        const position = fromPositionRecord(data);
        if (!position) {
            log.warn(`Ignoring position file with unexpected shape: ${this.filePath}`);
        }
        return position;
    }

    async save(position: PlaybackPosition): Promise<void> {
        const tempPath = `${this.filePath}.tmp`;
        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.writeFile(tempPath, `${JSON.stringify(toPositionRecord(position), null, 2)}\n`, "utf8");
            await fs.rename(tempPath, this.filePath);
        } catch (error) {
            throw wrapNodeError(error, this.filePath);
        }
    }

    async clear(): Promise<void> {
        await fs.rm(this.filePath, { force: true });
    }
}

/** The slice of an ioredis client the store uses. */
export interface PositionHashClient {
    hgetall(key: string): Promise<Record<string, string>>;
    hset(key: string, values: Record<string, string>): Promise<number>;
    del(key: string): Promise<number>;
}

/** One Redis hash holding the record's four fields. */
export class RedisPositionStore implements PositionStore {
    constructor(
        private readonly client: PositionHashClient,
        private readonly key: string = POSITION_REDIS_KEY
    ) {}

    static fromUrl(url: string, key?: string): RedisPositionStore {
        return new RedisPositionStore(createIORedisClient(url, "playback-position"), key);
    }

    async load(): Promise<PlaybackPosition | null> {
        const hash = await this.client.hgetall(this.key);
        if (Object.keys(hash).length === 0) {
            return null;
        }
        const position = fromPositionRecord(hash);
        if (!position) {
            log.warn(`Ignoring malformed position hash ${this.key}`);
        }
        return position;
    }

    async save(position: PlaybackPosition): Promise<void> {
        const record = toPositionRecord(position);
        await this.client.hset(this.key, {
            last_book_id: record.last_book_id,
            last_segment_index: String(record.last_segment_index),
            last_position_ms: String(record.last_position_ms),
            last_speed: String(record.last_speed),
        });
    }

    async clear(): Promise<void> {
        await this.client.del(this.key);
    }
}
