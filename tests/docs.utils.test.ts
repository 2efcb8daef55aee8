import { expect } from "chai";
import { describe, it } from "node:test";
import type { docs_v1 } from "googleapis";
import { DocsUtils } from "../src/utils/docs.utils";

function paragraph(startIndex: number, ...runs: string[]): docs_v1.Schema$StructuralElement {
    const length = runs.reduce((total, run) => total + run.length, 0);
    return {
        startIndex,
        endIndex: startIndex + length,
        paragraph: { elements: runs.map((content) => ({ textRun: { content } })) },
    };
}

const twoParagraphs: docs_v1.Schema$Document = {
    body: {
        content: [{ endIndex: 1, sectionBreak: {} }, paragraph(1, "Quarterly ", "report\n"), paragraph(18, "Totals\n")],
    },
};

describe("DocsUtils", () => {
    describe("extractText", () => {
        it("concatenates text runs of every paragraph in order", () => {
            expect(DocsUtils.extractText(twoParagraphs)).to.equal("Quarterly report\nTotals\n");
        });

        it("skips structural elements that are not paragraphs", () => {
            const document: docs_v1.Schema$Document = {
                body: { content: [{ endIndex: 1, sectionBreak: {} }, { table: {} }, paragraph(1, "after table\n")] },
            };

            expect(DocsUtils.extractText(document)).to.equal("after table\n");
        });

        it("returns an empty string for a document without a body", () => {
            expect(DocsUtils.extractText({})).to.equal("");
        });
    });

    describe("contentEndIndex", () => {
        it("is one past the last character counting from index 1", () => {
            expect(DocsUtils.contentEndIndex(twoParagraphs)).to.equal(25);
        });

        it("is 1 for an empty body", () => {
            expect(DocsUtils.contentEndIndex({ body: { content: [] } })).to.equal(1);
        });
    });

    describe("appendIndex", () => {
        it("inserts before the trailing newline of the last element", () => {
            expect(DocsUtils.appendIndex(twoParagraphs)).to.equal(24);
        });

        it("uses index 1 when the body is empty", () => {
            expect(DocsUtils.appendIndex({ body: { content: [] } })).to.equal(1);
        });

        it("never goes below index 1", () => {
            expect(DocsUtils.appendIndex({ body: { content: [{ endIndex: 1 }] } })).to.equal(1);
        });

        it("treats a missing end index as 1", () => {
            expect(DocsUtils.appendIndex({ body: { content: [{ sectionBreak: {} }] } })).to.equal(1);
        });
    });

    describe("buildReplaceRequests", () => {
        it("deletes everything except the trailing newline and inserts at 1", () => {
            expect(DocsUtils.buildReplaceRequests(twoParagraphs, "New")).to.deep.equal([
                { deleteContentRange: { range: { startIndex: 1, endIndex: 24 } } },
                { insertText: { location: { index: 1 }, text: "New" } },
            ]);
        });

        it("only inserts when the body has no text", () => {
            expect(DocsUtils.buildReplaceRequests({ body: { content: [] } }, "New")).to.deep.equal([
                { insertText: { location: { index: 1 }, text: "New" } },
            ]);
        });

        it("does not emit an empty delete range when only the newline is left", () => {
            const document: docs_v1.Schema$Document = { body: { content: [paragraph(1, "\n")] } };

            expect(DocsUtils.buildReplaceRequests(document, "New")).to.deep.equal([
                { insertText: { location: { index: 1 }, text: "New" } },
            ]);
        });
    });

    describe("buildAppendRequests", () => {
        it("inserts at the append index", () => {
            expect(DocsUtils.buildAppendRequests(twoParagraphs, " more")).to.deep.equal([
                { insertText: { location: { index: 24 }, text: " more" } },
            ]);
        });
    });

    describe("search query", () => {
        it("escapes backslashes and single quotes", () => {
            expect(DocsUtils.escapeDriveQuery("Bob's \\notes")).to.equal("Bob\\'s \\\\notes");
        });

        it("restricts matches to Google Docs", () => {
            expect(DocsUtils.buildSearchQuery("Budget")).to.equal(
                "name contains 'Budget' and mimeType='application/vnd.google-apps.document'"
            );
        });
    });

    describe("toSearchResult", () => {
        it("maps Drive file fields and defaults missing timestamps", () => {
            expect(DocsUtils.toSearchResult({ id: "doc-9", name: "Plan", createdTime: "2024-01-02T03:04:05Z" })).to.deep.equal({
                id: "doc-9",
                title: "Plan",
                created: "2024-01-02T03:04:05Z",
                modified: "Unknown",
            });
        });
    });

    describe("buildCommentAnchor", () => {
        it("converts the body range into a zero-based Drive text anchor", () => {
            expect(JSON.parse(DocsUtils.buildCommentAnchor("doc-1", 5, 12))).to.deep.equal({
                r: "doc-1",
                a: [{ txt: { o: 4, l: 7, ml: 7 } }],
            });
        });
    });
});
