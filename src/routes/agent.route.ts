import { FastifyInstance } from "fastify";
import type { ChatRequestBody } from "../types/chat.types";
import { AgentSchema } from "./schema/agent.schema";
import { AgentController } from "../controllers/agent.controller";

async function agentRoutes(server: FastifyInstance): Promise<void> {
    server.route<{ Body: ChatRequestBody }>({
        url: "/agent",
        method: "POST",
        schema: AgentSchema,
        handler: AgentController.runAgent,
    });
}
export default agentRoutes;
