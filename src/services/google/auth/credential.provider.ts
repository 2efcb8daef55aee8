import { readFile, writeFile } from "fs/promises";
import type { Auth } from "googleapis";
import { AuthError } from "../../../errors";
import logger from "../../../config/logger";
import type { CredentialRecord } from "../../../types/credential.types";
import { errorMessage } from "../../../utils/error.utils";
import { mergeCredentials, parseCredentialRecord, serializeCredentialRecord } from "./credentials";
import type { OAuthFlow } from "./oauth.flow";
import { coversScopes } from "./scopes";

const EXPIRY_SKEW_MS = 60_000;

export interface CredentialProviderOptions {
    tokenPath: string;
    flow: OAuthFlow;
    now?: () => number;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Loads, refreshes or obtains Google OAuth2 credentials and keeps them in a
 * local token cache.
 *
 * The cache file holds live secrets in clear text with mode 0600. Every
 * read-refresh-write cycle runs through a single queue, so concurrent
 * requests never interleave writes to it.
 */
export class CredentialProvider {
    private queue: Promise<void> = Promise.resolve();
    private readonly now: () => number;

    constructor(private readonly options: CredentialProviderOptions) {
        this.now = options.now ?? Date.now;
    }

    authenticate(scopes: readonly string[]): Promise<CredentialRecord> {
        return this.exclusive(() => this.acquire(scopes));
    }

    /**
     * Returns an OAuth2 client seeded with usable credentials. Tokens the client
     * refreshes on its own later are written back to the cache.
     */
    async getClient(scopes: readonly string[]): Promise<Auth.OAuth2Client> {
        const record = await this.authenticate(scopes);
        const client = await this.options.flow.createClient(record);

        client.on("tokens", (tokens: Auth.Credentials) => {
            this.exclusive(() => this.persistRefreshedTokens(tokens, record)).catch((error: unknown) => {
                logger.error(`Failed to persist refreshed Google credentials: ${errorMessage(error)}`);
            });
        });

        return client;
    }

    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const result = this.queue.then(task);
        this.queue = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    private async acquire(scopes: readonly string[]): Promise<CredentialRecord> {
        const cached = await this.load();
        if (cached && this.isUsable(cached, scopes)) {
            return cached;
        }

        let record: CredentialRecord;
        try {
            if (cached?.refreshToken && coversScopes(cached.scopes, scopes)) {
                logger.info("Cached Google credentials expired, refreshing");
                record = await this.options.flow.refresh(cached);
            } else {
                logger.info("No usable cached Google credentials, starting authorization flow");
                record = await this.options.flow.authorize(scopes);
            }
        } catch (error) {
            if (error instanceof AuthError) throw error;
            throw new AuthError(`Google authentication failed: ${errorMessage(error)}`);
        }

        await this.save(record);
        return record;
    }

    private isUsable(record: CredentialRecord, scopes: readonly string[]): boolean {
        if (!record.accessToken || !coversScopes(record.scopes, scopes)) {
            return false;
        }
        return record.expiryDate === null || record.expiryDate - EXPIRY_SKEW_MS > this.now();
    }

    private async persistRefreshedTokens(tokens: Auth.Credentials, initial: CredentialRecord): Promise<void> {
        const cached = await this.load();
        await this.save(mergeCredentials(cached ?? initial, tokens));
        logger.debug("Persisted refreshed Google credentials");
    }

    private async load(): Promise<CredentialRecord | null> {
        const { tokenPath } = this.options;

        let raw: string;
        try {
            raw = await readFile(tokenPath, "utf-8");
        } catch (error) {
            if (isMissingFile(error)) return null;
            throw new AuthError(`Unable to read token cache ${tokenPath}: ${errorMessage(error)}`);
        }

        const record = parseCredentialRecord(raw);
        if (!record) {
            logger.warn(`Ignoring unreadable token cache at ${tokenPath}`);
        }
        return record;
    }

    private async save(record: CredentialRecord): Promise<void> {
        const { tokenPath } = this.options;
        try {
            await writeFile(tokenPath, serializeCredentialRecord(record), { mode: 0o600 });
        } catch (error) {
            throw new AuthError(`Unable to write token cache ${tokenPath}: ${errorMessage(error)}`);
        }
    }
}
