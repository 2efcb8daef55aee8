import type { FastifyInstance } from "fastify";
import fp from "fastify-plugin";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

export interface SwaggerPluginOptions {
    port: number;
}

const swaggerPlugin = async (fastify: FastifyInstance, options: SwaggerPluginOptions) => {
    await fastify.register(swagger, {
        openapi: {
            openapi: "3.0.0",
            info: {
                title: "Docs Agent API",
                description: "Chat completions and a Google Docs agent backed by an OpenAI-compatible LLM API",
                version: "1.0.0",
            },
            servers: [
                {
                    url: `http://localhost:${options.port}`,
                    description: "Development server",
                },
            ],
        },
    });

    await fastify.register(swaggerUi, {
        routePrefix: "/docs",
        uiConfig: {
            docExpansion: "full",
            deepLinking: false,
        },
        staticCSP: true,
    });
};

export default fp(swaggerPlugin, {
    name: "swagger",
});
