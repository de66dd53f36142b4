import axios, { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import { BRAND_USER_AGENT } from "../config/brand";
import type { DriveConfig } from "../config";
import { AuthError, NetworkError, toUserMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { isTransientRequestError, readHttpStatus, retryWithBackoff, sleep } from "../utils/retry";
import { createSingleFlight } from "../utils/singleFlight";

const log = logger.child("drive-auth");

export const TOKEN_ENDPOINT = "https://oauth2.googleapis.com/token";
/** Tokens are treated as expired this long before Google says they are. */
const EXPIRY_SKEW_MS = 60_000;
const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;
const REFRESH_KEY = "drive-token";

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().positive().optional(),
    token_type: z.string().optional(),
});

export interface DriveAuthOptions {
    tokenEndpoint?: string;
    maxAttempts?: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export interface AccessTokenSource {
    getAccessToken(): Promise<string>;
    invalidate(): void;
}

function isTokenRejection(error: unknown): boolean {
    const status = readHttpStatus(error);
    return status === 400 || status === 401 || status === 403;
}

/**
 * OAuth2 refresh-token grant for the Drive API. The access token is cached
 * until shortly before it expires, and concurrent callers share one refresh.
 */
export class DriveAuth implements AccessTokenSource {
    private readonly client: AxiosInstance;
    private readonly refreshes = createSingleFlight<string>();
    private cachedToken: { value: string; expiresAt: number } | null = null;

    constructor(
        private readonly credentials: Pick<DriveConfig, "clientId" | "clientSecret" | "refreshToken">,
        private readonly options: DriveAuthOptions = {}
    ) {
        this.client = axios.create({
            timeout: 30000,
            headers: { "User-Agent": BRAND_USER_AGENT },
        });
    }

    private now(): number {
        return this.options.now ? this.options.now() : Date.now();
    }

    async getAccessToken(): Promise<string> {
        if (this.cachedToken && this.now() < this.cachedToken.expiresAt - EXPIRY_SKEW_MS) {
            return this.cachedToken.value;
        }
        return this.refreshes.run(REFRESH_KEY, () => this.refreshAccessToken());
    }

    /** Drops the cached token so the next call re-authenticates. */
    invalidate(): void {
        this.cachedToken = null;
    }

    private async refreshAccessToken(): Promise<string> {
        let response: AxiosResponse<unknown>;
        try {
            response = await retryWithBackoff(
                () =>
                    this.client.post<unknown>(
                        this.options.tokenEndpoint ?? TOKEN_ENDPOINT,
                        new URLSearchParams({
                            client_id: this.credentials.clientId,
                            client_secret: this.credentials.clientSecret,
                            refresh_token: this.credentials.refreshToken,
                            grant_type: "refresh_token",
                        }).toString(),
                        { headers: { "Content-Type": "application/x-www-form-urlencoded" } }
                    ),
                {
                    label: "Drive token refresh",
                    maxAttempts: this.options.maxAttempts ?? 5,
                    baseDelayMs: 1000,
                    maxDelayMs: 60_000,
                    jitterMs: 0,
                    shouldRetry: (error) => !isTokenRejection(error) && isTransientRequestError(error),
                    sleep: this.options.sleep ?? sleep,
                }
            );
        } catch (error) {
            if (isTokenRejection(error)) {
                log.error("Drive refresh token was rejected; re-authorize the application");
                throw new AuthError("Drive credentials were rejected by the token endpoint", false, {
                    status: readHttpStatus(error),
                });
            }
            throw new NetworkError(`Drive token refresh failed: ${toUserMessage(error)}`, {
                status: readHttpStatus(error),
            });
        }

        const parsed = tokenResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new AuthError("Token endpoint returned no access token", false);
        }

        const lifetimeSeconds = parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
        this.cachedToken = {
            value: parsed.data.access_token,
            expiresAt: this.now() + lifetimeSeconds * 1000,
        };
        log.debug(`Refreshed Drive access token (valid ${lifetimeSeconds}s)`);
        return parsed.data.access_token;
    }
}
