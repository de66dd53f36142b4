/**
 * Shared ioredis connection factory
 *
 * Every connection gets the same exponential-backoff reconnect policy,
 * timeouts and logging.
 *
 * Usage:
 *   import { createIORedisClient } from "../utils/ioredis";
 *   const redis = createIORedisClient(config.playback.redisUrl, "playback-position");
 */

import Redis, { RedisOptions } from "ioredis";
import { logger } from "./logger";

const MAX_RETRY_DELAY_MS = 30_000;
const BASE_RETRY_DELAY_MS = 250;

const log = logger.child("ioredis");

/** 250ms → 500ms → 1s → 2s → … capped at 30s */
export function reconnectDelay(times: number): number {
    return Math.min(BASE_RETRY_DELAY_MS * Math.pow(2, times - 1), MAX_RETRY_DELAY_MS);
}

/**
 * @param url - Redis connection URL (redis://host:port/db)
 * @param label - Used in log messages (e.g. "playback-position")
 * @param overrides - Per-instance ioredis option overrides
 */
export function createIORedisClient(
    url: string,
    label: string,
    overrides: Partial<RedisOptions> = {},
): Redis {
    const client = new Redis(url, {
        retryStrategy(times: number) {
            const delay = reconnectDelay(times);
            log.debug(`[${label}] Reconnect attempt ${times} – retrying in ${delay}ms`);
            return delay;
        },

        maxRetriesPerRequest: 3,
        connectTimeout: 10_000,
        enableReadyCheck: true,
        lazyConnect: false,

        ...overrides,
    });

    client.on("error", (err: Error) => {
        log.error(`[${label}] Error: ${err.message}`);
    });

    client.on("close", () => {
        log.debug(`[${label}] Connection closed`);
    });

    client.on("reconnecting", (ms: number) => {
        log.debug(`[${label}] Reconnecting in ${ms}ms...`);
    });

    client.on("ready", () => {
        log.debug(`[${label}] Ready`);
    });

    return client;
}
