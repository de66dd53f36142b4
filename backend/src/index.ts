import type { AppConfig } from "./config";
import { FilePositionStore, RedisPositionStore } from "./services/playback/positionStore";
import { PlaybackSession } from "./services/playback/playbackSession";
import type { MediaPlayer, PlaybackSourceResolver, PositionStore } from "./services/playback/types";
import { logger } from "./utils/logger";

export * from "@segmentshelf/audiobook-contract";
export { loadConfig, requireDriveConfig } from "./config";
export type { AppConfig, DriveConfig } from "./config";
export * from "./utils/errors";
export { createLogger, logger, setLogLevel } from "./utils/logger";
export { plan, describePlan, isPlanAlreadyApplied, summarizeSourceFiles } from "./services/segmentPlanner";
export type { PlannedSegment, SegmentPlanEntry, SourceFileStats } from "./services/segmentPlanner";
export {
    buildTableOfContents,
    parseTableOfContents,
    serializeTableOfContents,
    tocFileName,
} from "./services/tableOfContents";
export { DriveAuth } from "./services/driveAuth";
export { DriveStorage } from "./services/driveStorage";
export { LibraryCatalog } from "./services/libraryCatalog";
export type { BookCatalog, PlayableSource } from "./services/libraryCatalog";
export { IngestPipeline } from "./services/ingestPipeline";
export type { IngestRequest, IngestResult } from "./services/ingestPipeline";
export {
    FilePositionStore,
    MemoryPositionStore,
    RedisPositionStore,
} from "./services/playback/positionStore";
export { PlaybackSession } from "./services/playback/playbackSession";
export type { PlaybackSessionOptions } from "./services/playback/playbackSession";
export type { SessionState } from "./services/playback/playbackStateMachine";
export * from "./services/playback/types";

/** Redis when REDIS_URL is set, otherwise the JSON file under WORK_DIR. */
export function createPositionStore(config: AppConfig): PositionStore {
    if (config.playback.redisUrl) {
        logger.debug("Playback positions stored in Redis");
        return RedisPositionStore.fromUrl(config.playback.redisUrl);
    }
    return new FilePositionStore(config.playback.positionStorePath);
}

export function createPlaybackSession(
    config: AppConfig,
    player: MediaPlayer,
    sources: PlaybackSourceResolver,
    store: PositionStore = createPositionStore(config)
): PlaybackSession {
    return new PlaybackSession({
        player,
        sources,
        store,
        positionSaveIntervalMs: config.playback.positionSaveIntervalMs,
        errorSkipDelayMs: config.playback.errorSkipDelayMs,
    });
}
