import type { drive_v3 } from "googleapis";
import logger from "../config/logger";
import { RemoteApiError } from "../errors";
import type { GoogleClientsProvider } from "./google/clients";
import {
    AddCommentInput,
    AddCommentInputSchema,
    CreateDocInput,
    CreateDocInputSchema,
    ReadDocInput,
    ReadDocInputSchema,
    ReadDocResult,
    SearchDocsInput,
    SearchDocsInputSchema,
    SearchDocsResult,
    UpdateDocInput,
    UpdateDocInputSchema,
} from "../types/docs.types";
import { DocsUtils, DRIVE_PAGE_SIZE_LIMIT } from "../utils/docs.utils";
import { describeOperationError, errorMessage } from "../utils/error.utils";

export const NO_DOCUMENTS_FOUND = "No documents found matching your search criteria.";

/**
 * Create, read, update, comment on and search Google Docs.
 *
 * None of these methods reject: every failure comes back as a descriptive
 * string so it can be handed to a model as a tool observation.
 */
export class DocsOperations {
    constructor(private readonly getClients: GoogleClientsProvider) {}

    async createDocument(input: CreateDocInput): Promise<string> {
        try {
            const { title, content } = CreateDocInputSchema.parse(input);

            const { docs } = await this.getClients();
            const { data: document } = await docs.documents.create({
                requestBody: { title },
            });
            const documentId = document.documentId;
            if (!documentId) {
                throw new RemoteApiError("Google Docs did not return a document ID");
            }

            if (content) {
                await docs.documents.batchUpdate({
                    documentId,
                    requestBody: { requests: [DocsUtils.insertTextRequest(1, content)] },
                });
            }

            logger.info(`Created Google Doc ${documentId}`);
            return `Document created successfully. ID: ${documentId}, Title: ${title}`;
        } catch (error) {
            logger.error(`Failed to create Google Doc: ${errorMessage(error)}`);
            return describeOperationError(error, "creating the document", "Google Docs API");
        }
    }

    async readDocument(input: ReadDocInput): Promise<ReadDocResult> {
        try {
            const { document_id, include_formatting } = ReadDocInputSchema.parse(input);

            const { docs } = await this.getClients();
            const { data: document } = await docs.documents.get({ documentId: document_id });
            const content = DocsUtils.extractText(document);

            if (include_formatting) {
                return { content, raw_document: document };
            }
            return content;
        } catch (error) {
            logger.error(`Failed to read Google Doc: ${errorMessage(error)}`);
            return describeOperationError(error, "reading the document", "Google Docs API");
        }
    }

    async updateDocument(input: UpdateDocInput): Promise<string> {
        try {
            const { document_id, content, replace_all } = UpdateDocInputSchema.parse(input);

            const { docs } = await this.getClients();
            const { data: document } = await docs.documents.get({ documentId: document_id });
            const requests = replace_all
                ? DocsUtils.buildReplaceRequests(document, content)
                : DocsUtils.buildAppendRequests(document, content);

            await docs.documents.batchUpdate({
                documentId: document_id,
                requestBody: { requests },
            });

            logger.info(`Updated Google Doc ${document_id} (${replace_all ? "replace" : "append"})`);
            return `Document updated successfully. ID: ${document_id}`;
        } catch (error) {
            logger.error(`Failed to update Google Doc: ${errorMessage(error)}`);
            return describeOperationError(error, "updating the document", "Google Docs API");
        }
    }

    async addComment(input: AddCommentInput): Promise<string> {
        try {
            const { document_id, content, start_index, end_index } = AddCommentInputSchema.parse(input);

            const { drive } = await this.getClients();
            await drive.comments.create({
                fileId: document_id,
                fields: "id",
                requestBody: {
                    content,
                    anchor: DocsUtils.buildCommentAnchor(document_id, start_index, end_index),
                },
            });

            logger.info(`Added comment to Google Doc ${document_id}`);
            return `Comment added successfully to document ID: ${document_id}`;
        } catch (error) {
            logger.error(`Failed to comment on Google Doc: ${errorMessage(error)}`);
            return describeOperationError(error, "adding the comment", "Google Drive API");
        }
    }

    async searchDocuments(input: SearchDocsInput): Promise<SearchDocsResult> {
        try {
            const { query, max_results } = SearchDocsInputSchema.parse(input);

            const { drive } = await this.getClients();
            const files: drive_v3.Schema$File[] = [];
            let pageToken: string | undefined;

            do {
                const { data } = await drive.files.list({
                    q: DocsUtils.buildSearchQuery(query),
                    spaces: "drive",
                    fields: "nextPageToken, files(id, name, createdTime, modifiedTime)",
                    pageSize: Math.min(max_results, DRIVE_PAGE_SIZE_LIMIT),
                    pageToken,
                });

                files.push(...(data.files ?? []));
                pageToken = data.nextPageToken ?? undefined;
            } while (pageToken && files.length < max_results);

            if (files.length === 0) {
                return NO_DOCUMENTS_FOUND;
            }

            return files.slice(0, max_results).map(DocsUtils.toSearchResult);
        } catch (error) {
            logger.error(`Failed to search Google Docs: ${errorMessage(error)}`);
            return describeOperationError(error, "searching documents", "Google Drive API");
        }
    }
}
