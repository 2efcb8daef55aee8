import { FastifyInstance } from "fastify";
import type { ChatRequestBody } from "../types/chat.types";
import { ChatSchema } from "./schema/chat.schema";
import { ChatController } from "../controllers/chat.controller";

async function chatRoutes(server: FastifyInstance): Promise<void> {
    server.route<{ Body: ChatRequestBody }>({
        url: "/chat",
        method: "POST",
        schema: ChatSchema,
        handler: ChatController.chat,
    });
}
export default chatRoutes;
