import { expect } from "chai";
import request from "supertest";
import { afterEach, beforeEach, describe, it } from "node:test";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { setTimeout as delay } from "timers/promises";
import fastify from "fastify";
import type { Auth } from "googleapis";
import { AuthError } from "../src/errors";
import {
    AUTH_FAILURE_MESSAGE,
    AUTH_SUCCESS_MESSAGE,
    GoogleOAuthFlow,
} from "../src/services/google/auth/oauth.flow";
import { DOCS_SCOPES } from "../src/services/google/auth/scopes";
import type { CredentialRecord } from "../src/types/credential.types";

const EXPIRY = 1_700_000_000_000;

const cachedRecord: CredentialRecord = {
    accessToken: "cached-access",
    refreshToken: "cached-refresh",
    expiryDate: EXPIRY,
    scopes: [...DOCS_SCOPES],
    tokenType: "Bearer",
};

/** Stops short of Google's token endpoint. */
class OfflineOAuthFlow extends GoogleOAuthFlow {
    exchangedCodes: string[] = [];

    protected async exchangeCode(_client: Auth.OAuth2Client, code: string): Promise<Auth.Credentials> {
        this.exchangedCodes.push(code);
        return {
            access_token: "granted-access",
            refresh_token: "granted-refresh",
            expiry_date: EXPIRY,
            token_type: "Bearer",
        };
    }
}

async function freePort(): Promise<number> {
    const app = fastify({ logger: false });
    await app.listen({ host: "localhost", port: 0 });
    const address = app.server.address();
    await app.close();
    return typeof address === "object" && address ? address.port : 0;
}

// The listener comes up only after the secret is read, so retry until it accepts.
async function visitCallback(port: number, query: string): Promise<{ status: number; text: string }> {
    for (let attempt = 0; ; attempt++) {
        try {
            const response = await request(`http://localhost:${port}`).get(`/${query}`);
            return { status: response.status, text: response.text };
        } catch (error) {
            if (attempt >= 100) throw error;
            await delay(20);
        }
    }
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    return undefined;
}

describe("GoogleOAuthFlow", () => {
    let dir: string;
    let secretPath: string;
    let port: number;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), "docs-agent-secret-"));
        secretPath = path.join(dir, "client_secret.json");
        port = await freePort();
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    function flow(clientSecretPath = secretPath): OfflineOAuthFlow {
        return new OfflineOAuthFlow({ clientSecretPath, callbackPort: port });
    }

    async function writeSecret(section: "installed" | "web"): Promise<void> {
        await writeFile(
            secretPath,
            JSON.stringify({ [section]: { client_id: "test-client", client_secret: "test-secret" } })
        );
    }

    describe("client secret loading", () => {
        it("rejects a missing file", async () => {
            const missing = path.join(dir, "absent.json");

            const error = await rejectionOf(flow(missing).authorize(DOCS_SCOPES));

            expect(error).to.be.instanceOf(AuthError);
            expect(error).to.have.property("message", `No client secret configuration found at ${missing}`);
        });

        it("rejects a file that is not JSON", async () => {
            await writeFile(secretPath, "{ not json");

            const error = await rejectionOf(flow().authorize(DOCS_SCOPES));

            expect(error).to.be.instanceOf(AuthError);
            expect(error).to.have.property("message", `Client secret file ${secretPath} is not valid JSON`);
        });

        it("rejects a file without an installed or web client", async () => {
            await writeFile(secretPath, JSON.stringify({ other: { client_id: "test-client" } }));

            const error = await rejectionOf(flow().authorize(DOCS_SCOPES));

            expect(error).to.be.instanceOf(AuthError);
            expect(error).to.have.property(
                "message",
                `Client secret file ${secretPath} must contain an "installed" or "web" client with client_id and client_secret`
            );
        });
    });

    describe("authorize", () => {
        it("exchanges the code delivered to the callback", async () => {
            await writeSecret("installed");
            const oauth = flow();
            const pending = oauth.authorize(DOCS_SCOPES);

            const callback = await visitCallback(port, "?code=test-code");
            const result = await pending;

            expect(callback).to.deep.equal({ status: 200, text: AUTH_SUCCESS_MESSAGE });
            expect(oauth.exchangedCodes).to.deep.equal(["test-code"]);
            expect(result).to.deep.equal({
                accessToken: "granted-access",
                refreshToken: "granted-refresh",
                expiryDate: EXPIRY,
                scopes: [...DOCS_SCOPES],
                tokenType: "Bearer",
            });
        });

        it("fails when consent is denied", async () => {
            await writeSecret("web");
            const oauth = flow();
            const outcome = rejectionOf(oauth.authorize(DOCS_SCOPES));

            const callback = await visitCallback(port, "?error=access_denied");
            const error = await outcome;

            expect(callback).to.deep.equal({ status: 400, text: AUTH_FAILURE_MESSAGE });
            expect(error).to.be.instanceOf(AuthError);
            expect(error).to.have.property("message", "Authorization was not granted: access_denied");
            expect(oauth.exchangedCodes).to.have.length(0);
        });
    });

    describe("refresh", () => {
        it("requires a refresh token", async () => {
            const error = await rejectionOf(flow().refresh({ ...cachedRecord, refreshToken: null }));

            expect(error).to.be.instanceOf(AuthError);
            expect(error).to.have.property("message", "Cannot refresh Google credentials without a refresh token");
        });
    });

    describe("createClient", () => {
        it("builds a client for the configured application", async () => {
            await writeSecret("installed");

            const client = await flow().createClient(cachedRecord);

            expect(client._clientId).to.equal("test-client");
            expect(client.credentials.access_token).to.equal("cached-access");
            expect(client.credentials.refresh_token).to.equal("cached-refresh");
        });

        it("falls back to the cached token when no client secret is configured", async () => {
            const client = await flow(path.join(dir, "absent.json")).createClient(cachedRecord);

            expect(client._clientId).to.equal(undefined);
            expect(client.credentials.access_token).to.equal("cached-access");
            expect(client.credentials.expiry_date).to.equal(EXPIRY);
        });
    });
});
