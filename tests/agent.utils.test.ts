import { expect } from "chai";
import { describe, it } from "node:test";
import { AIMessage, HumanMessage, ToolMessage } from "@langchain/core/messages";
import { AgentUtils } from "../src/utils/agent.utils";
import { RemoteApiError } from "../src/errors";

describe("AgentUtils", () => {
    describe("messageText", () => {
        it("returns string content as is", () => {
            expect(AgentUtils.messageText("Done.")).to.equal("Done.");
        });

        it("joins the text parts of complex content", () => {
            expect(
                AgentUtils.messageText([
                    { type: "text", text: "Created " },
                    { type: "image_url", image_url: "https://example.com/chart.png" },
                    { type: "text", text: "the doc." },
                ])
            ).to.equal("Created the doc.");
        });
    });

    describe("extractResponseContent", () => {
        it("returns the text of the last message", () => {
            const result = AgentUtils.extractResponseContent({
                messages: [new HumanMessage("Create a doc"), new AIMessage("Created doc-1.")],
            });

            expect(result).to.equal("Created doc-1.");
        });

        it("returns an empty string when the model said nothing", () => {
            expect(AgentUtils.extractResponseContent({ messages: [new AIMessage("")] })).to.equal("");
        });

        it("rejects a loop result without messages", () => {
            expect(() => AgentUtils.extractResponseContent({ messages: [] })).to.throw(
                RemoteApiError,
                "Agent returned invalid response"
            );
        });
    });

    describe("extractToolCalls", () => {
        it("lists tool calls made by the model in order", () => {
            const messages = [
                new HumanMessage("Find my budget"),
                new AIMessage({
                    content: "",
                    tool_calls: [{ name: "search_google_docs", args: { query: "budget" }, id: "call-1" }],
                }),
                new ToolMessage({ content: "[]", tool_call_id: "call-1" }),
                new AIMessage({
                    content: "",
                    tool_calls: [{ name: "read_google_doc", args: { document_id: "doc-1" }, id: "call-2" }],
                }),
                new AIMessage("Nothing found."),
            ];

            expect(AgentUtils.extractToolCalls(messages)).to.deep.equal([
                { name: "search_google_docs", args: { query: "budget" } },
                { name: "read_google_doc", args: { document_id: "doc-1" } },
            ]);
        });
    });
});
