import type { docs_v1, drive_v3 } from "googleapis";
import type { DocSearchResult } from "../types/docs.types";

export const GOOGLE_DOC_MIME_TYPE = "application/vnd.google-apps.document";
export const DRIVE_PAGE_SIZE_LIMIT = 100;
export const UNKNOWN_TIMESTAMP = "Unknown";

/**
 * Index bookkeeping for the Docs batchUpdate API.
 *
 * Body indices start at 1 (index 0 belongs to the leading section break) and
 * every document ends with a newline that can never be deleted or inserted after.
 */
export class DocsUtils {
    /** Text run contents of every top-level paragraph, in document order. */
    static textRuns(document: docs_v1.Schema$Document): string[] {
        const runs: string[] = [];

        for (const element of document.body?.content ?? []) {
            if (!element.paragraph) continue;

            for (const paragraphElement of element.paragraph.elements ?? []) {
                const content = paragraphElement.textRun?.content;
                if (content) {
                    runs.push(content);
                }
            }
        }

        return runs;
    }

    static extractText(document: docs_v1.Schema$Document): string {
        return DocsUtils.textRuns(document).join("");
    }

    /** One past the last text index, counting from the first body position. */
    static contentEndIndex(document: docs_v1.Schema$Document): number {
        return DocsUtils.textRuns(document).reduce((end, run) => end + run.length, 1);
    }

    static appendIndex(document: docs_v1.Schema$Document): number {
        const content = document.body?.content ?? [];
        if (content.length === 0) {
            return 1;
        }

        const endIndex = content[content.length - 1].endIndex ?? 1;
        return Math.max(1, endIndex - 1);
    }

    static insertTextRequest(index: number, text: string): docs_v1.Schema$Request {
        return { insertText: { location: { index }, text } };
    }

    static deleteRangeRequest(startIndex: number, endIndex: number): docs_v1.Schema$Request {
        return { deleteContentRange: { range: { startIndex, endIndex } } };
    }

    /**
     * Clears the body up to, but not including, the trailing newline and then
     * writes `text` at the first position.
     */
    static buildReplaceRequests(document: docs_v1.Schema$Document, text: string): docs_v1.Schema$Request[] {
        const requests: docs_v1.Schema$Request[] = [];
        const endIndex = DocsUtils.contentEndIndex(document);

        if (endIndex > 1) {
            const deleteEnd = endIndex - 1;
            // a body holding only the trailing newline leaves an empty range, which the API rejects
            if (deleteEnd > 1) {
                requests.push(DocsUtils.deleteRangeRequest(1, deleteEnd));
            }
        }

        requests.push(DocsUtils.insertTextRequest(1, text));
        return requests;
    }

    static buildAppendRequests(document: docs_v1.Schema$Document, text: string): docs_v1.Schema$Request[] {
        return [DocsUtils.insertTextRequest(DocsUtils.appendIndex(document), text)];
    }

    static escapeDriveQuery(value: string): string {
        return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
    }

    static buildSearchQuery(query: string): string {
        return `name contains '${DocsUtils.escapeDriveQuery(query)}' and mimeType='${GOOGLE_DOC_MIME_TYPE}'`;
    }

    static toSearchResult(file: drive_v3.Schema$File): DocSearchResult {
        return {
            id: file.id ?? "",
            title: file.name ?? "",
            created: file.createdTime ?? UNKNOWN_TIMESTAMP,
            modified: file.modifiedTime ?? UNKNOWN_TIMESTAMP,
        };
    }

    /**
     * Drive's comment anchor format for a text range. Drive offsets are 0-based,
     * Docs body indices are 1-based.
     */
    static buildCommentAnchor(documentId: string, startIndex: number, endIndex: number): string {
        const length = endIndex - startIndex;
        return JSON.stringify({
            r: documentId,
            a: [{ txt: { o: startIndex - 1, l: length, ml: length } }],
        });
    }
}
