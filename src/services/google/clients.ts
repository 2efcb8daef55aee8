import { google } from "googleapis";
import type { Auth, docs_v1, drive_v3 } from "googleapis";

/**
 * The subset of the Docs v1 surface the document operations call.
 * `docs_v1.Docs` satisfies it; tests provide in-process fakes.
 */
export interface DocsClient {
    documents: {
        create(params: docs_v1.Params$Resource$Documents$Create): Promise<{ data: docs_v1.Schema$Document }>;
        get(params: docs_v1.Params$Resource$Documents$Get): Promise<{ data: docs_v1.Schema$Document }>;
        batchUpdate(
            params: docs_v1.Params$Resource$Documents$Batchupdate
        ): Promise<{ data: docs_v1.Schema$BatchUpdateDocumentResponse }>;
    };
}

/** The subset of the Drive v3 surface used for search and comments. */
export interface DriveClient {
    files: {
        list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
    };
    comments: {
        create(params: drive_v3.Params$Resource$Comments$Create): Promise<{ data: drive_v3.Schema$Comment }>;
    };
}

export interface GoogleClients {
    docs: DocsClient;
    drive: DriveClient;
}

/** Resolved per operation so authentication happens only when a tool actually runs. */
export type GoogleClientsProvider = () => Promise<GoogleClients>;

// googleapis retries idempotent requests unless told otherwise.
export function createGoogleClients(auth: Auth.OAuth2Client): GoogleClients {
    return {
        docs: google.docs({ version: "v1", auth, retry: false }),
        drive: google.drive({ version: "v3", auth, retry: false }),
    };
}
