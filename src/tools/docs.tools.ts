import { tool } from "@langchain/core/tools";
import type { StructuredToolInterface } from "@langchain/core/tools";
import type { DocsOperations } from "../services/docs.service";
import {
    AddCommentInput,
    AddCommentInputSchema,
    CreateDocInput,
    CreateDocInputSchema,
    ReadDocInput,
    ReadDocInputSchema,
    SearchDocsInput,
    SearchDocsInputSchema,
    UpdateDocInput,
    UpdateDocInputSchema,
} from "../types/docs.types";

export const DOCS_TOOL_METADATA = {
    create_google_doc: {
        description: "Creates a new Google Document",
        schema: CreateDocInputSchema,
    },
    read_google_doc: {
        description: "Reads content from an existing Google Document",
        schema: ReadDocInputSchema,
    },
    update_google_doc: {
        description: "Updates content in an existing Google Document",
        schema: UpdateDocInputSchema,
    },
    add_comment_google_doc: {
        description: "Adds a comment to a specific section of text in a Google Document",
        schema: AddCommentInputSchema,
    },
    search_google_docs: {
        description: "Searches for Google Documents by title or content",
        schema: SearchDocsInputSchema,
    },
} as const;

export type DocsToolCall =
    | { name: "create_google_doc"; args: CreateDocInput }
    | { name: "read_google_doc"; args: ReadDocInput }
    | { name: "update_google_doc"; args: UpdateDocInput }
    | { name: "add_comment_google_doc"; args: AddCommentInput }
    | { name: "search_google_docs"; args: SearchDocsInput };

function toObservation(result: unknown): string {
    return typeof result === "string" ? result : JSON.stringify(result);
}

/** Runs one tool call and returns the text observation for the reasoning loop. */
export async function runDocsTool(operations: DocsOperations, call: DocsToolCall): Promise<string> {
    switch (call.name) {
        case "create_google_doc":
            return operations.createDocument(call.args);
        case "read_google_doc":
            return toObservation(await operations.readDocument(call.args));
        case "update_google_doc":
            return operations.updateDocument(call.args);
        case "add_comment_google_doc":
            return operations.addComment(call.args);
        case "search_google_docs":
            return toObservation(await operations.searchDocuments(call.args));
        default: {
            const unknownCall: never = call;
            throw new Error(`Unknown docs tool: ${JSON.stringify(unknownCall)}`);
        }
    }
}

export function createDocsTools(operations: DocsOperations): StructuredToolInterface[] {
    const meta = DOCS_TOOL_METADATA;

    return [
        tool((args) => runDocsTool(operations, { name: "create_google_doc", args }), {
            name: "create_google_doc",
            ...meta.create_google_doc,
        }),
        tool((args) => runDocsTool(operations, { name: "read_google_doc", args }), {
            name: "read_google_doc",
            ...meta.read_google_doc,
        }),
        tool((args) => runDocsTool(operations, { name: "update_google_doc", args }), {
            name: "update_google_doc",
            ...meta.update_google_doc,
        }),
        tool((args) => runDocsTool(operations, { name: "add_comment_google_doc", args }), {
            name: "add_comment_google_doc",
            ...meta.add_comment_google_doc,
        }),
        tool((args) => runDocsTool(operations, { name: "search_google_docs", args }), {
            name: "search_google_docs",
            ...meta.search_google_docs,
        }),
    ];
}
