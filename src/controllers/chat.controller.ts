import { FastifyReply, FastifyRequest } from "fastify";
import { AIMessage, BaseMessage, ChatMessage, HumanMessage, SystemMessage } from "@langchain/core/messages";
import { chatPersonaPrompt } from "../ai_prompt/docs.agent.prompt";
import type { ChatHistoryMessage, ChatRequestBody } from "../types/chat.types";
import { AgentUtils } from "../utils/agent.utils";
import { errorMessage } from "../utils/error.utils";

export class ChatController {
    public static async chat(
        request: FastifyRequest<{ Body: ChatRequestBody }>,
        reply: FastifyReply
    ): Promise<FastifyReply> {
        try {
            const { prompt, history = [] } = request.body;

            const messages: BaseMessage[] = [
                new SystemMessage(chatPersonaPrompt),
                ...history.map(ChatController.toMessage),
                new HumanMessage(prompt),
            ];

            const completion = await request.server.chatModel.invoke(messages);

            return reply.send({ response: AgentUtils.messageText(completion.content) });
        } catch (error) {
            request.log.error(
                {
                    error: errorMessage(error),
                    stack: error instanceof Error ? error.stack : undefined,
                },
                "Error processing chat request"
            );

            return reply.status(500).send({ detail: errorMessage(error) });
        }
    }

    static toMessage({ role, content }: ChatHistoryMessage): BaseMessage {
        switch (role) {
            case "system":
                return new SystemMessage(content);
            case "user":
                return new HumanMessage(content);
            case "assistant":
                return new AIMessage(content);
            default:
                return new ChatMessage(content, role);
        }
    }
}
