import dotenv from "dotenv";
import * as path from "path";
import { z } from "zod";
import {
    DEFAULT_SEGMENT_LIMITS,
    SegmentLimits,
} from "@segmentshelf/audiobook-contract";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { parseEnvInt } from "./utils/envParsers";

dotenv.config();

const optionalNonEmpty = z
    .string()
    .trim()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : undefined));

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
    WORK_DIR: optionalNonEmpty,
    DOWNLOAD_CONCURRENCY: optionalNonEmpty,
    DOWNLOAD_MAX_ATTEMPTS: optionalNonEmpty,
    DOWNLOAD_TIMEOUT_MS: optionalNonEmpty,
    SEGMENT_MIN_SECONDS: optionalNonEmpty,
    SEGMENT_MAX_SECONDS: optionalNonEmpty,
    SEGMENT_MAX_BYTES: optionalNonEmpty,
    DRIVE_CLIENT_ID: optionalNonEmpty,
    DRIVE_CLIENT_SECRET: optionalNonEmpty,
    DRIVE_REFRESH_TOKEN: optionalNonEmpty,
    DRIVE_ROOT_FOLDER: optionalNonEmpty,
    POSITION_STORE_PATH: optionalNonEmpty,
    REDIS_URL: optionalNonEmpty,
    POSITION_SAVE_INTERVAL_MS: optionalNonEmpty,
    ERROR_SKIP_DELAY_MS: optionalNonEmpty,
});

const positiveInt = z.number().int().positive();

const limitsSchema = z
    .object({
        minSegmentSeconds: positiveInt,
        maxSegmentSeconds: positiveInt,
        maxSegmentBytes: positiveInt,
    })
    .refine((limits) => limits.minSegmentSeconds <= limits.maxSegmentSeconds, {
        message: "SEGMENT_MIN_SECONDS must not exceed SEGMENT_MAX_SECONDS",
        path: ["minSegmentSeconds"],
    });

export interface DriveConfig {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    rootFolderName: string;
}

export interface AppConfig {
    nodeEnv: string;
    workDir: string;
    download: {
        concurrency: number;
        maxAttempts: number;
        timeoutMs: number;
    };
    segmentLimits: SegmentLimits;
    /** Undefined when any Drive credential is missing; upload and library commands need it. */
    drive?: DriveConfig;
    playback: {
        positionStorePath: string;
        redisUrl?: string;
        positionSaveIntervalMs: number;
        errorSkipDelayMs: number;
    };
}

function describeZodError(error: z.ZodError): string[] {
    return error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

/** Validates the environment and builds the runtime configuration. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Environment validation failed",
            { issues: describeZodError(parsed.error) }
        );
    }
    const vars = parsed.data;

    const limits = limitsSchema.safeParse({
        minSegmentSeconds: parseEnvInt(vars.SEGMENT_MIN_SECONDS, DEFAULT_SEGMENT_LIMITS.minSegmentSeconds),
        maxSegmentSeconds: parseEnvInt(vars.SEGMENT_MAX_SECONDS, DEFAULT_SEGMENT_LIMITS.maxSegmentSeconds),
        maxSegmentBytes: parseEnvInt(vars.SEGMENT_MAX_BYTES, DEFAULT_SEGMENT_LIMITS.maxSegmentBytes),
    });
    if (!limits.success) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Invalid segment limits",
            { issues: describeZodError(limits.error) }
        );
    }

    const workDir = path.resolve(vars.WORK_DIR ?? "./work");

    const drive =
        vars.DRIVE_CLIENT_ID && vars.DRIVE_CLIENT_SECRET && vars.DRIVE_REFRESH_TOKEN
            ? {
                  clientId: vars.DRIVE_CLIENT_ID,
                  clientSecret: vars.DRIVE_CLIENT_SECRET,
                  refreshToken: vars.DRIVE_REFRESH_TOKEN,
                  rootFolderName: vars.DRIVE_ROOT_FOLDER ?? "audiobooks",
              }
            : undefined;

    return {
        nodeEnv: vars.NODE_ENV ?? "development",
        workDir,
        download: {
            concurrency: Math.max(1, parseEnvInt(vars.DOWNLOAD_CONCURRENCY, 2)),
            maxAttempts: Math.max(1, parseEnvInt(vars.DOWNLOAD_MAX_ATTEMPTS, 3)),
            timeoutMs: Math.max(1000, parseEnvInt(vars.DOWNLOAD_TIMEOUT_MS, 600_000)),
        },
        segmentLimits: limits.data,
        drive,
        playback: {
            positionStorePath: path.resolve(
                vars.POSITION_STORE_PATH ?? path.join(workDir, "playback-position.json")
            ),
            redisUrl: vars.REDIS_URL,
            positionSaveIntervalMs: Math.max(250, parseEnvInt(vars.POSITION_SAVE_INTERVAL_MS, 5000)),
            errorSkipDelayMs: Math.max(0, parseEnvInt(vars.ERROR_SKIP_DELAY_MS, 2000)),
        },
    };
}

export function requireDriveConfig(config: AppConfig): DriveConfig {
    if (!config.drive) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Drive is not configured: set DRIVE_CLIENT_ID, DRIVE_CLIENT_SECRET and DRIVE_REFRESH_TOKEN"
        );
    }
    return config.drive;
}
