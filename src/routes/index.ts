import type { FastifyInstance } from "fastify";
import chatRoutes from "./chat.route";
import agentRoutes from "./agent.route";

export default async function (fastify: FastifyInstance): Promise<void> {
    await fastify.register(chatRoutes);
    await fastify.register(agentRoutes);

    fastify.get("/health", async () => ({ status: "healthy" }));
}
