import { readFile } from "fs/promises";
import fastify from "fastify";
import { google } from "googleapis";
import type { Auth } from "googleapis";
import { z } from "zod";
import { AuthError } from "../../../errors";
import logger from "../../../config/logger";
import type { CredentialRecord } from "../../../types/credential.types";
import { fromGoogleCredentials, toGoogleCredentials } from "./credentials";

export const AUTH_SUCCESS_MESSAGE = "Authentication successful! You may close this window.";
export const AUTH_FAILURE_MESSAGE = "Authentication failed. You may close this window.";

const ClientSecretSchema = z.object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    redirect_uris: z.array(z.string()).optional(),
});

const ClientSecretFileSchema = z.object({
    installed: ClientSecretSchema.optional(),
    web: ClientSecretSchema.optional(),
});

type ClientSecret = z.infer<typeof ClientSecretSchema>;

/**
 * The network half of credential acquisition. {@link CredentialProvider} decides
 * when each step runs and owns the token cache.
 */
export interface OAuthFlow {
    /** Interactive authorization-code exchange. */
    authorize(scopes: readonly string[]): Promise<CredentialRecord>;
    refresh(record: CredentialRecord): Promise<CredentialRecord>;
    createClient(record: CredentialRecord): Promise<Auth.OAuth2Client>;
}

export interface GoogleOAuthFlowOptions {
    clientSecretPath: string;
    callbackPort: number;
}

export class GoogleOAuthFlow implements OAuthFlow {
    constructor(private readonly options: GoogleOAuthFlowOptions) {}

    private get redirectUri(): string {
        return `http://localhost:${this.options.callbackPort}/`;
    }

    async authorize(scopes: readonly string[]): Promise<CredentialRecord> {
        const client = await this.newClient();
        const authUrl = client.generateAuthUrl({
            access_type: "offline",
            prompt: "consent",
            scope: [...scopes],
        });

        logger.info(`Authorize this app by visiting: ${authUrl}`);
        const code = await this.waitForAuthorizationCode();

        const tokens = await this.exchangeCode(client, code);
        logger.info("Google authorization completed");
        return fromGoogleCredentials(tokens, scopes);
    }

    async refresh(record: CredentialRecord): Promise<CredentialRecord> {
        if (!record.refreshToken) {
            throw new AuthError("Cannot refresh Google credentials without a refresh token");
        }

        const client = await this.newClient();
        client.setCredentials({ refresh_token: record.refreshToken });

        const { token } = await client.getAccessToken();
        if (!token) {
            throw new AuthError("Google did not return an access token on refresh");
        }

        const refreshed = fromGoogleCredentials(client.credentials, record.scopes);
        return {
            ...refreshed,
            refreshToken: refreshed.refreshToken ?? record.refreshToken,
        };
    }

    async createClient(record: CredentialRecord): Promise<Auth.OAuth2Client> {
        let client: Auth.OAuth2Client;
        try {
            client = await this.newClient();
        } catch (error) {
            if (!(error instanceof AuthError)) throw error;
            // A cached access token still works until it expires; refreshing will need the secret.
            logger.warn(`${error.message}; using cached access token without refresh support`);
            client = new google.auth.OAuth2();
        }

        client.setCredentials(toGoogleCredentials(record));
        return client;
    }

    protected async exchangeCode(client: Auth.OAuth2Client, code: string): Promise<Auth.Credentials> {
        const { tokens } = await client.getToken(code);
        return tokens;
    }

    private async newClient(): Promise<Auth.OAuth2Client> {
        const secret = await this.loadClientSecret();
        return new google.auth.OAuth2(secret.client_id, secret.client_secret, this.redirectUri);
    }

    private async loadClientSecret(): Promise<ClientSecret> {
        const { clientSecretPath } = this.options;

        let raw: string;
        try {
            raw = await readFile(clientSecretPath, "utf-8");
        } catch {
            throw new AuthError(`No client secret configuration found at ${clientSecretPath}`);
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            throw new AuthError(`Client secret file ${clientSecretPath} is not valid JSON`);
        }

        const parsed = ClientSecretFileSchema.safeParse(json);
        const secret = parsed.success ? parsed.data.installed ?? parsed.data.web : undefined;
        if (!secret) {
            throw new AuthError(
                `Client secret file ${clientSecretPath} must contain an "installed" or "web" client with client_id and client_secret`
            );
        }

        return secret;
    }

    private async waitForAuthorizationCode(): Promise<string> {
        const app = fastify({ logger: false });

        try {
            return await new Promise<string>((resolve, reject) => {
                app.get<{ Querystring: { code?: string; error?: string } }>("/", async (request, reply) => {
                    const { code, error } = request.query;

                    if (!code) {
                        reply.raw.once("finish", () =>
                            reject(new AuthError(`Authorization was not granted: ${error ?? "missing code"}`))
                        );
                        return reply.status(400).type("text/plain").send(AUTH_FAILURE_MESSAGE);
                    }

                    reply.raw.once("finish", () => resolve(code));
                    return reply.type("text/plain").send(AUTH_SUCCESS_MESSAGE);
                });

                app.listen({ host: "localhost", port: this.options.callbackPort }).catch(reject);
            });
        } finally {
            await app.close();
        }
    }
}
