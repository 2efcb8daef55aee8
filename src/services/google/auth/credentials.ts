import { z } from "zod";
import type { Auth } from "googleapis";
import type { CredentialRecord } from "../../../types/credential.types";
import { parseScopeString } from "./scopes";

// On-disk shape is Google's own token response.
const TokenCacheSchema = z.object({
    access_token: z.string().nullable().optional(),
    refresh_token: z.string().nullable().optional(),
    expiry_date: z.number().nullable().optional(),
    scope: z.string().optional(),
    token_type: z.string().nullable().optional(),
});

export function fromGoogleCredentials(
    tokens: Auth.Credentials,
    fallbackScopes: readonly string[]
): CredentialRecord {
    return {
        accessToken: tokens.access_token ?? null,
        refreshToken: tokens.refresh_token ?? null,
        expiryDate: tokens.expiry_date ?? null,
        scopes: tokens.scope ? parseScopeString(tokens.scope) : [...fallbackScopes],
        tokenType: tokens.token_type ?? null,
    };
}

export function toGoogleCredentials(record: CredentialRecord): Auth.Credentials {
    return {
        access_token: record.accessToken,
        refresh_token: record.refreshToken,
        expiry_date: record.expiryDate,
        token_type: record.tokenType,
        scope: record.scopes.join(" "),
    };
}

/** Overlays a partial token update (e.g. an automatic refresh) onto a stored record. */
export function mergeCredentials(base: CredentialRecord, tokens: Auth.Credentials): CredentialRecord {
    return {
        accessToken: tokens.access_token ?? base.accessToken,
        refreshToken: tokens.refresh_token ?? base.refreshToken,
        expiryDate: tokens.expiry_date ?? base.expiryDate,
        scopes: tokens.scope ? parseScopeString(tokens.scope) : base.scopes,
        tokenType: tokens.token_type ?? base.tokenType,
    };
}

export function serializeCredentialRecord(record: CredentialRecord): string {
    return JSON.stringify(toGoogleCredentials(record), null, 2);
}

/** Returns null when the text is not a token cache this service wrote. */
export function parseCredentialRecord(raw: string): CredentialRecord | null {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        return null;
    }

    const parsed = TokenCacheSchema.safeParse(json);
    if (!parsed.success) {
        return null;
    }

    return fromGoogleCredentials(parsed.data, []);
}
