import axios, { AxiosInstance } from "axios";
import { createReadStream, promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import { BRAND_USER_AGENT } from "../config/brand";
import { AppError, AuthError, NetworkError, toUserMessage, wrapNodeError } from "../utils/errors";
import { logger } from "../utils/logger";
import { isTransientRequestError, readHttpStatus, retryWithBackoff, sleep } from "../utils/retry";
import type { AccessTokenSource } from "./driveAuth";

const log = logger.child("drive");

export const DRIVE_API_BASE = "https://www.googleapis.com/drive/v3";
export const DRIVE_UPLOAD_BASE = "https://www.googleapis.com/upload/drive/v3";
export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

const FILE_FIELDS = "id,name,mimeType,size,parents";

const driveFileSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    mimeType: z.string(),
    // Drive reports sizes as decimal strings
    size: z.union([z.string(), z.number()]).optional(),
    parents: z.array(z.string()).optional(),
});

const fileListSchema = z.object({
    files: z.array(driveFileSchema).default([]),
    nextPageToken: z.string().optional(),
});

export interface DriveFile {
    id: string;
    name: string;
    mimeType: string;
    sizeBytes: number;
    parents: string[];
}

export interface UploadOptions {
    name: string;
    parentId: string;
    mimeType: string;
}

export interface DriveStorageOptions {
    maxAttempts?: number;
    sleep?: (ms: number) => Promise<void>;
}

/** Escapes a literal for use inside single quotes in a Drive `q` expression. */
export function escapeQueryLiteral(value: string): string {
    return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

function toDriveFile(raw: z.infer<typeof driveFileSchema>): DriveFile {
    const size = typeof raw.size === "number" ? raw.size : Number.parseInt(raw.size ?? "0", 10);
    return {
        id: raw.id,
        name: raw.name,
        mimeType: raw.mimeType,
        sizeBytes: Number.isFinite(size) ? size : 0,
        parents: raw.parents ?? [],
    };
}

function parseDriveFile(data: unknown, label: string): DriveFile {
    const parsed = driveFileSchema.safeParse(data);
    if (!parsed.success) {
        throw new NetworkError(`${label}: unexpected response from Drive`);
    }
    return toDriveFile(parsed.data);
}

function readLocationHeader(headers: unknown): string | null {
    if (typeof headers !== "object" || headers === null || !("location" in headers)) {
        return null;
    }
    return typeof headers.location === "string" ? headers.location : null;
}

function bearer(token: string): Record<string, string> {
    return { Authorization: `Bearer ${token}` };
}

/**
 * Drive REST v3 access for the audiobook library. Every call carries a bearer
 * token; a 401 invalidates the token and the call is retried once before an
 * AuthError surfaces. Rate limits and 5xx responses back off and retry.
 */
export class DriveStorage {
    private readonly client: AxiosInstance;

    constructor(
        private readonly auth: AccessTokenSource,
        private readonly options: DriveStorageOptions = {}
    ) {
        this.client = axios.create({
            timeout: 60000,
            headers: { "User-Agent": BRAND_USER_AGENT },
            maxBodyLength: Infinity,
            maxContentLength: Infinity,
        });
    }

    /** Authorization headers for requests made outside this class (media streaming). */
    async getAuthHeaders(): Promise<Record<string, string>> {
        return bearer(await this.auth.getAccessToken());
    }

    invalidateAuth(): void {
        this.auth.invalidate();
    }

    private async authorized<T>(
        label: string,
        send: (headers: Record<string, string>) => Promise<T>
    ): Promise<T> {
        const attempt = async (): Promise<T> => {
            const token = await this.auth.getAccessToken();
            try {
                return await send(bearer(token));
            } catch (error) {
                if (readHttpStatus(error) !== 401) {
                    throw error;
                }
                log.debug(`${label}: access token expired, re-authenticating`);
                this.auth.invalidate();
                const refreshed = await this.auth.getAccessToken();
                try {
                    return await send(bearer(refreshed));
                } catch (retryError) {
                    if (readHttpStatus(retryError) === 401) {
                        throw new AuthError(`${label}: Drive rejected a freshly issued token`, true);
                    }
                    throw retryError;
                }
            }
        };

        try {
            return await retryWithBackoff(attempt, {
                label,
                maxAttempts: this.options.maxAttempts ?? 4,
                baseDelayMs: 500,
                maxDelayMs: 8000,
                sleep: this.options.sleep ?? sleep,
            });
        } catch (error) {
            if (error instanceof AppError) {
                throw error;
            }
            throw new NetworkError(`${label} failed: ${toUserMessage(error)}`, {
                status: readHttpStatus(error),
                transient: isTransientRequestError(error),
            });
        }
    }

    private async query(label: string, q: string): Promise<DriveFile[]> {
        const files: DriveFile[] = [];
        let pageToken: string | undefined;
        do {
            const page = await this.authorized(label, (headers) =>
                this.client.get<unknown>(`${DRIVE_API_BASE}/files`, {
                    headers,
                    params: {
                        q,
                        fields: `nextPageToken,files(${FILE_FIELDS})`,
                        orderBy: "name",
                        pageSize: 1000,
                        pageToken,
                    },
                })
            );
            const parsed = fileListSchema.safeParse(page.data);
            if (!parsed.success) {
                throw new NetworkError(`${label}: unexpected response from Drive`);
            }
            files.push(...parsed.data.files.map(toDriveFile));
            pageToken = parsed.data.nextPageToken;
        } while (pageToken);

        return files.sort((a, b) => a.name.localeCompare(b.name));
    }

    async findFolder(name: string, parentId?: string): Promise<DriveFile | null> {
        const clauses = [
            `mimeType='${FOLDER_MIME_TYPE}'`,
            `name='${escapeQueryLiteral(name)}'`,
            "trashed=false",
        ];
        if (parentId) {
            clauses.push(`'${escapeQueryLiteral(parentId)}' in parents`);
        }
        const matches = await this.query(`Find folder ${name}`, clauses.join(" and "));
        return matches[0] ?? null;
    }

    async ensureFolder(name: string, parentId?: string): Promise<DriveFile> {
        const existing = await this.findFolder(name, parentId);
        if (existing) {
            return existing;
        }

        const response = await this.authorized(`Create folder ${name}`, (headers) =>
            this.client.post<unknown>(
                `${DRIVE_API_BASE}/files`,
                {
                    name,
                    mimeType: FOLDER_MIME_TYPE,
                    ...(parentId ? { parents: [parentId] } : {}),
                },
                { headers, params: { fields: FILE_FIELDS } }
            )
        );
        log.info(`Created Drive folder ${name}`);
        return parseDriveFile(response.data, `Create folder ${name}`);
    }

    listFolders(parentId: string): Promise<DriveFile[]> {
        return this.query(
            "List folders",
            `'${escapeQueryLiteral(parentId)}' in parents and mimeType='${FOLDER_MIME_TYPE}' and trashed=false`
        );
    }

    /** Non-folder children of `parentId`, sorted by name. `nameContains` narrows by substring. */
    listFiles(parentId: string, nameContains?: string): Promise<DriveFile[]> {
        const clauses = [
            `'${escapeQueryLiteral(parentId)}' in parents`,
            `mimeType!='${FOLDER_MIME_TYPE}'`,
            "trashed=false",
        ];
        if (nameContains) {
            clauses.push(`name contains '${escapeQueryLiteral(nameContains)}'`);
        }
        return this.query("List files", clauses.join(" and "));
    }

    private async resumableUpload(
        label: string,
        metadata: UploadOptions,
        sizeBytes: number,
        body: () => Buffer | NodeJS.ReadableStream
    ): Promise<DriveFile> {
        const response = await this.authorized(label, async (headers) => {
            const session = await this.client.post<unknown>(
                `${DRIVE_UPLOAD_BASE}/files`,
                { name: metadata.name, mimeType: metadata.mimeType, parents: [metadata.parentId] },
                {
                    headers: {
                        ...headers,
                        "X-Upload-Content-Type": metadata.mimeType,
                        "X-Upload-Content-Length": String(sizeBytes),
                    },
                    params: { uploadType: "resumable", fields: FILE_FIELDS },
                }
            );
            const location = readLocationHeader(session.headers);
            if (!location) {
                throw new NetworkError(`${label}: Drive did not return an upload session`);
            }
            return this.client.put<unknown>(location, body(), {
                headers: {
                    ...headers,
                    "Content-Type": metadata.mimeType,
                    "Content-Length": String(sizeBytes),
                },
            });
        });
        return parseDriveFile(response.data, label);
    }

    async uploadFile(localPath: string, options: UploadOptions): Promise<DriveFile> {
        let sizeBytes: number;
        try {
            sizeBytes = (await fs.stat(localPath)).size;
        } catch (error) {
            throw wrapNodeError(error, localPath);
        }

        log.info(`Uploading ${path.basename(localPath)} (${(sizeBytes / 1024 / 1024).toFixed(1)} MB)`);
        return this.resumableUpload(`Upload ${options.name}`, options, sizeBytes, () =>
            createReadStream(localPath)
        );
    }

    uploadJson(name: string, parentId: string, json: string): Promise<DriveFile> {
        const content = Buffer.from(json, "utf8");
        return this.resumableUpload(
            `Upload ${name}`,
            { name, parentId, mimeType: "application/json" },
            content.length,
            () => content
        );
    }

    async downloadJson(fileId: string): Promise<unknown> {
        const response = await this.authorized(`Download ${fileId}`, (headers) =>
            this.client.get<unknown>(this.resolvePlayableUrl(fileId), {
                headers,
                responseType: "text",
            })
        );
        if (typeof response.data !== "string") {
            return response.data;
        }
        try {
            return JSON.parse(response.data);
        } catch (error) {
            throw new NetworkError(`File ${fileId} is not valid JSON: ${toUserMessage(error)}`, { fileId });
        }
    }

    /** Deleting a file that no longer exists is not an error. */
    async deleteFile(fileId: string): Promise<void> {
        await this.authorized(`Delete ${fileId}`, async (headers) => {
            try {
                await this.client.delete(`${DRIVE_API_BASE}/files/${encodeURIComponent(fileId)}`, { headers });
            } catch (error) {
                if (readHttpStatus(error) !== 404) {
                    throw error;
                }
            }
        });
    }

    resolvePlayableUrl(fileId: string): string {
        return `${DRIVE_API_BASE}/files/${encodeURIComponent(fileId)}?alt=media`;
    }
}
