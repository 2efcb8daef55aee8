import fastify, { type FastifyInstance } from "fastify";

/** OpenAI-compatible endpoint that answers every completion with a 500 and counts attempts. */
export class FailingCompletionsServer {
    hits = 0;
    private readonly app: FastifyInstance = fastify({ logger: false });

    /** Resolves to the base URL to hand to the client. */
    async start(): Promise<string> {
        this.app.post("/v1/chat/completions", async (_request, reply) => {
            this.hits++;
            return reply.status(500).send({ error: { message: "upstream unavailable", type: "server_error" } });
        });

        await this.app.listen({ host: "127.0.0.1", port: 0 });
        const address = this.app.server.address();
        const port = typeof address === "object" && address ? address.port : 0;
        return `http://127.0.0.1:${port}/v1`;
    }

    async stop(): Promise<void> {
        await this.app.close();
    }
}
