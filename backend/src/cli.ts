#!/usr/bin/env node
import { AppConfig, loadConfig, requireDriveConfig } from "./config";
import { DriveAuth } from "./services/driveAuth";
import { DriveStorage } from "./services/driveStorage";
import { IngestPipeline, IngestResult, IngestSource } from "./services/ingestPipeline";
import { LibraryCatalog } from "./services/libraryCatalog";
import { serializeTableOfContents } from "./services/tableOfContents";
import { toUserMessage } from "./utils/errors";
import { parseLogLevel, setLogLevel } from "./utils/logger";

export const HELP_TEXT = [
    "Usage: segmentshelf <command> [options]",
    "",
    "Commands:",
    "  ingest   Download a numbered series, build segments and upload them.",
    "  plan     Show the segment plan for local files without uploading.",
    "  library  List the books in the library.",
    "",
    "ingest options:",
    "  --title <title>      Book title (required).",
    "  --base-url <url>     Series prefix; <url>01.mp3, <url>02.mp3, ... are fetched.",
    "  --start <n>          First number of the series (default 1).",
    "  --pad <n>            Digits in the series number (default 2).",
    "  --max <n>            Stop after this many files.",
    "  --url <url>          Explicit file URL, repeatable; replaces --base-url.",
    "  --file <path>        Local audio file, repeatable; replaces downloading.",
    "  --dry-run            Stop after planning.",
    "  --keep-files         Keep downloaded and combined files in WORK_DIR.",
    "",
    "plan options:",
    "  --title <title>      Book title (required).",
    "  --file <path>        Local audio file, repeatable (at least one).",
    "",
    "Global options:",
    "  --verbose            Debug logging.",
    "  --quiet              Errors only.",
    "  --log-level <level>  debug, info, warn, error or silent.",
    "  --help               Show this help text.",
].join("\n");

export type CliCommand =
    | { command: "help" }
    | {
          command: "ingest";
          title: string;
          source: IngestSource;
          dryRun: boolean;
          keepFiles: boolean;
      }
    | { command: "plan"; title: string; files: string[] }
    | { command: "library" };

interface ParsedFlags {
    title?: string;
    baseUrl?: string;
    start?: number;
    pad?: number;
    max?: number;
    urls: string[];
    files: string[];
    dryRun: boolean;
    keepFiles: boolean;
}

function readValue(argv: string[], index: number, flag: string): string {
    const value = argv[index + 1];
    if (!value || value.startsWith("--")) {
        throw new Error(`Missing value for ${flag}`);
    }
    return value;
}

function readPositiveInt(argv: string[], index: number, flag: string): number {
    const raw = readValue(argv, index, flag);
    const value = Number.parseInt(raw, 10);
    if (!Number.isInteger(value) || value < 0 || String(value) !== raw.trim()) {
        throw new Error(`${flag} expects a non-negative integer, got "${raw}"`);
    }
    return value;
}

function parseFlags(argv: string[]): ParsedFlags {
    const flags: ParsedFlags = { urls: [], files: [], dryRun: false, keepFiles: false };

    for (let index = 0; index < argv.length; index += 1) {
        const token = argv[index];
        switch (token) {
            case "--title":
                flags.title = readValue(argv, index, token);
                index += 1;
                break;
            case "--base-url":
                flags.baseUrl = readValue(argv, index, token);
                index += 1;
                break;
            case "--start":
                flags.start = readPositiveInt(argv, index, token);
                index += 1;
                break;
            case "--pad":
                flags.pad = readPositiveInt(argv, index, token);
                index += 1;
                break;
            case "--max":
                flags.max = readPositiveInt(argv, index, token);
                index += 1;
                break;
            case "--url":
                flags.urls.push(readValue(argv, index, token));
                index += 1;
                break;
            case "--file":
                flags.files.push(readValue(argv, index, token));
                index += 1;
                break;
            case "--dry-run":
                flags.dryRun = true;
                break;
            case "--keep-files":
                flags.keepFiles = true;
                break;
            case "--verbose":
                setLogLevel("debug");
                break;
            case "--quiet":
                setLogLevel("error");
                break;
            case "--log-level": {
                const raw = readValue(argv, index, token);
                const level = parseLogLevel(raw);
                if (!level) {
                    throw new Error(`Unknown log level: ${raw}`);
                }
                setLogLevel(level);
                index += 1;
                break;
            }
            default:
                throw new Error(`Unknown flag: ${token}`);
        }
    }
    return flags;
}

function requireTitle(flags: ParsedFlags): string {
    const title = flags.title?.trim();
    if (!title) {
        throw new Error("Missing required --title <title>");
    }
    return title;
}

function resolveSource(flags: ParsedFlags): IngestSource {
    if (flags.files.length > 0) {
        return { kind: "local", paths: flags.files };
    }
    if (flags.urls.length > 0) {
        return { kind: "urls", urls: flags.urls };
    }
    if (flags.baseUrl) {
        return {
            kind: "series",
            baseUrl: flags.baseUrl,
            startIndex: flags.start,
            padWidth: flags.pad,
            maxFiles: flags.max,
        };
    }
    throw new Error("ingest needs --base-url, --url or --file");
}

export function parseCliArgs(argv: string[]): CliCommand {
    const [command, ...rest] = argv;
    if (!command || command === "--help" || command === "-h" || rest.includes("--help")) {
        return { command: "help" };
    }

    const flags = parseFlags(rest);
    switch (command) {
        case "ingest":
            return {
                command: "ingest",
                title: requireTitle(flags),
                source: resolveSource(flags),
                dryRun: flags.dryRun,
                keepFiles: flags.keepFiles,
            };
        case "plan":
            if (flags.files.length === 0) {
                throw new Error("plan needs at least one --file <path>");
            }
            return { command: "plan", title: requireTitle(flags), files: flags.files };
        case "library":
            return { command: "library" };
        default:
            throw new Error(`Unknown command: ${command}`);
    }
}

export function formatIngestSummary(result: IngestResult): string {
    const lines = [`${result.bookTitle}: ${result.status}`];
    for (const segment of result.planned) {
        const kind = segment.entry.kind === "passThrough" ? "pass-through" : "combine";
        lines.push(
            `  ${segment.displayName}  ${(segment.durationSeconds / 60).toFixed(1)} min  ${(segment.sizeBytes / 1024 / 1024).toFixed(1)} MB  ${kind} [${segment.sourceIndexes.join(", ")}]`
        );
    }
    if (result.removed.length > 0) {
        lines.push(`  removed ${result.removed.length} stale file(s)`);
    }
    return `${lines.join("\n")}\n`;
}

function createDriveStorage(config: AppConfig): DriveStorage {
    const drive = requireDriveConfig(config);
    return new DriveStorage(new DriveAuth(drive));
}

export async function runCli(argv: string[], config: AppConfig = loadConfig()): Promise<void> {
    const parsed = parseCliArgs(argv);

    switch (parsed.command) {
        case "help":
            process.stdout.write(`${HELP_TEXT}\n`);
            return;

        case "plan": {
            const pipeline = new IngestPipeline({
                workDir: config.workDir,
                rootFolderName: config.drive?.rootFolderName ?? "audiobooks",
                segmentLimits: config.segmentLimits,
            });
            const result = await pipeline.run({
                bookTitle: parsed.title,
                source: { kind: "local", paths: parsed.files },
                dryRun: true,
            });
            process.stdout.write(formatIngestSummary(result));
            process.stdout.write(serializeTableOfContents(result.toc));
            return;
        }

        case "ingest": {
            const pipeline = new IngestPipeline({
                workDir: config.workDir,
                rootFolderName: config.drive?.rootFolderName ?? "audiobooks",
                segmentLimits: config.segmentLimits,
                download: {
                    concurrency: config.download.concurrency,
                    maxAttempts: config.download.maxAttempts,
                    timeoutMs: config.download.timeoutMs,
                },
                storage: parsed.dryRun ? undefined : createDriveStorage(config),
            });
            const result = await pipeline.run({
                bookTitle: parsed.title,
                source: parsed.source,
                dryRun: parsed.dryRun,
                keepWorkFiles: parsed.keepFiles,
            });
            process.stdout.write(formatIngestSummary(result));
            return;
        }

        case "library": {
            const drive = requireDriveConfig(config);
            const catalog = new LibraryCatalog(createDriveStorage(config), drive.rootFolderName);
            const books = await catalog.refresh();
            if (books.length === 0) {
                process.stdout.write("No books in the library.\n");
                return;
            }
            for (const book of books) {
                const minutes = book.segments.reduce((sum, segment) => sum + segment.durationSeconds, 0) / 60;
                process.stdout.write(
                    `${book.displayName}  ${book.segments.length} segment(s)  ${minutes.toFixed(0)} min\n`
                );
            }
            return;
        }
    }
}

if (require.main === module) {
    runCli(process.argv.slice(2)).catch((error: unknown) => {
        console.error(`segmentshelf failed: ${toUserMessage(error)}`);
        console.error("");
        console.error("Run with --help for usage.");
        process.exitCode = 1;
    });
}
