import { ZodError } from "zod";
import { AuthError, RemoteApiError } from "../errors";

export type GoogleApiName = "Google Docs API" | "Google Drive API";

/** What googleapis (gaxios) errors look like once thrown. */
export interface GoogleApiError extends Error {
    config: unknown;
    code?: string | number;
    status?: number;
}

export function isGoogleApiError(error: unknown): error is GoogleApiError {
    return error instanceof Error && "config" in error;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isApiNotEnabledError(error: unknown): boolean {
    const message = errorMessage(error);
    return message.includes("SERVICE_DISABLED") || message.includes("has not been used in project");
}

export function apiNotEnabledMessage(apiName: GoogleApiName): string {
    return (
        `The ${apiName} is not enabled for this project. Please enable it by visiting ` +
        "the Google Cloud Console (https://console.cloud.google.com/apis/library), " +
        `searching for '${apiName}', and clicking 'Enable'. ` +
        "After enabling, wait a few minutes before trying again."
    );
}

/**
 * Turns any failure of a document operation into the text handed back to the
 * caller. `action` completes "An error occurred while ...".
 */
export function describeOperationError(error: unknown, action: string, apiName: GoogleApiName): string {
    if (isApiNotEnabledError(error)) {
        return apiNotEnabledMessage(apiName);
    }

    if (error instanceof ZodError) {
        const issues = error.issues
            .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
            .join("; ");
        return `Invalid input: ${issues}`;
    }

    if (error instanceof AuthError) {
        return `Authentication failed while ${action}: ${error.message}`;
    }

    if (isGoogleApiError(error) || error instanceof RemoteApiError) {
        return `An error occurred while ${action}: ${error.message}`;
    }

    return `An unexpected error occurred: ${errorMessage(error)}`;
}
