import { BaseMessage, isAIMessage } from "@langchain/core/messages";
import type { MessageContent } from "@langchain/core/messages";
import { RemoteApiError } from "../errors";
import type { AgentLoopState, ToolCallSummary } from "../types/agent.types";

export class AgentUtils {
    static messageText(content: MessageContent): string {
        if (typeof content === "string") {
            return content;
        }

        return content
            .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
            .join("");
    }

    /** Text of the last message the loop produced; empty when the model said nothing. */
    static extractResponseContent(agentResponse: AgentLoopState): string {
        if (!agentResponse.messages.length) {
            throw new RemoteApiError("Agent returned invalid response");
        }

        const lastMessage = agentResponse.messages[agentResponse.messages.length - 1];
        return AgentUtils.messageText(lastMessage.content);
    }

    static extractToolCalls(messages: BaseMessage[]): ToolCallSummary[] {
        const calls: ToolCallSummary[] = [];

        for (const message of messages) {
            if (!isAIMessage(message)) continue;

            for (const call of message.tool_calls ?? []) {
                calls.push({ name: call.name, args: call.args });
            }
        }

        return calls;
    }
}
