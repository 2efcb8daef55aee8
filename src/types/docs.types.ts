import { z } from "zod";
import type { docs_v1 } from "googleapis";

export const CreateDocInputSchema = z.object({
    title: z.string().describe("Title of the new document"),
    content: z.string().nullish().describe("Initial content for the doc"),
});

export const ReadDocInputSchema = z.object({
    document_id: z.string().describe("ID of the Google Document to read"),
    include_formatting: z
        .boolean()
        .default(false)
        .describe("Whether to include formatting information in the response"),
});

export const UpdateDocInputSchema = z.object({
    document_id: z.string().describe("ID of the Google Document to update"),
    content: z.string().describe("Content to append or replace in the document"),
    replace_all: z
        .boolean()
        .default(false)
        .describe("Whether to replace all content or append to the end"),
});

export const AddCommentInputSchema = z.object({
    document_id: z.string().describe("The ID of the Google Document to add a comment to"),
    content: z.string().describe("The comment text to add"),
    start_index: z.number().int().describe("The start index of the text to comment on"),
    end_index: z.number().int().describe("The end index of the text to comment on"),
});

export const SearchDocsInputSchema = z.object({
    query: z.string().describe("Search query to find documents by title or content"),
    max_results: z.number().int().min(1).default(10).describe("Maximum number of results to return"),
});

// Inputs as callers may send them (defaults not yet applied)
export type CreateDocInput = z.input<typeof CreateDocInputSchema>;
export type ReadDocInput = z.input<typeof ReadDocInputSchema>;
export type UpdateDocInput = z.input<typeof UpdateDocInputSchema>;
export type AddCommentInput = z.input<typeof AddCommentInputSchema>;
export type SearchDocsInput = z.input<typeof SearchDocsInputSchema>;

export interface FormattedDocument {
    content: string;
    raw_document: docs_v1.Schema$Document;
}

export interface DocSearchResult {
    id: string;
    title: string;
    created: string;
    modified: string;
}

/** Either the linear text, the text plus raw body, or an error description. */
export type ReadDocResult = string | FormattedDocument;

/** Either the matches or a message (no matches, or an error description). */
export type SearchDocsResult = string | DocSearchResult[];
