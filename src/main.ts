import fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import api from "./routes/index";
import defaultConfig from "./config";
import type { Config } from "./config";
import logger from "./config/logger";
import { ConfigError } from "./errors";
import type { AgentManager } from "./agent/agent.manager";
import errorHandlerPlugin from "./plugins/errorHandler.plugin";
import swaggerPlugin from "./plugins/swagger.plugin";
import aiServicesPlugin, { type AiServices } from "./plugins/ai-services.plugin";

export interface BuildServerOptions {
    config?: Config;
    services?: Partial<AiServices>;
}

function validateConfig(config: Config): void {
    if (!config.LLM_API_KEY) {
        throw new ConfigError("GROQ_API_KEY environment variable is not set");
    }
}

async function setupDebugHooks(server: FastifyInstance, config: Config): Promise<void> {
    const debugEnabled = config.DEBUG || config.NODE_ENV === "development";

    if (!debugEnabled) return;

    const startTimes = new WeakMap<object, bigint>();

    server.addHook("onRequest", async (request) => {
        startTimes.set(request, process.hrtime.bigint());
    });

    server.addHook("preHandler", async (request) => {
        request.log.debug(
            {
                requestId: request.id,
                method: request.method,
                url: request.url,
                body: request.body,
                bodySize: request.body ? `${Buffer.byteLength(JSON.stringify(request.body))} bytes` : "0 bytes",
                contentType: request.headers["content-type"],
            },
            "REQUEST BODY DATA"
        );
    });

    server.addHook("onSend", async (request, reply, payload) => {
        let responseBody: unknown = payload;
        let responseSize = 0;

        if (typeof payload === "string") {
            responseSize = Buffer.byteLength(payload);
            if (responseSize < 10000) {
                try {
                    responseBody = JSON.parse(payload);
                } catch {
                    responseBody = payload;
                }
            } else {
                responseBody = `[Large response: ${responseSize} bytes]`;
            }
        } else if (Buffer.isBuffer(payload)) {
            responseSize = payload.length;
            responseBody = `[Buffer: ${responseSize} bytes]`;
        }

        const startTime = startTimes.get(request);
        const duration = startTime ? Number(process.hrtime.bigint() - startTime) / 1000000 : 0;

        request.log.debug(
            {
                requestId: request.id,
                method: request.method,
                url: request.url,
                statusCode: reply.statusCode,
                responseBody,
                responseSize: `${responseSize} bytes`,
                duration: `${duration.toFixed(2)}ms`,
            },
            "RESPONSE BODY DATA"
        );
        return payload;
    });

    server.addHook("onError", async (request, reply, error) => {
        request.log.error(
            {
                requestId: request.id,
                method: request.method,
                url: request.url,
                errorName: error.name,
                errorMessage: error.message,
                errorCode: error.code || "UNKNOWN",
                statusCode: error.statusCode || 500,
                stack: error.stack,
            },
            "ERROR DATA"
        );
    });
}

async function registerPlugins(
    server: FastifyInstance,
    config: Config,
    services?: Partial<AiServices>
): Promise<void> {
    // Browsers refuse credentials alongside a wildcard origin.
    await server.register(cors, {
        origin: config.origin,
        credentials: config.origin !== "*",
    });

    await server.register(helmet, {
        contentSecurityPolicy: {
            directives: {
                defaultSrc: [`'self'`],
                imgSrc: [`'self'`, "data:", "validator.swagger.io"],
                scriptSrc: [`'self'`, `'unsafe-inline'`, `'unsafe-eval'`],
                styleSrc: [`'self'`, `'unsafe-inline'`],
                connectSrc: [`'self'`],
            },
        },
    });

    if (config.NODE_ENV !== "production") {
        await server.register(swaggerPlugin, { port: config.PORT });
    }

    await server.register(errorHandlerPlugin);
    await server.register(aiServicesPlugin, { config, services });
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
    const config = options.config ?? defaultConfig;
    validateConfig(config);

    const server = fastify({
        logger:
            config.NODE_ENV === "test"
                ? false
                : {
                      level: config.NODE_ENV === "production" ? "info" : "debug",
                  },
        keepAliveTimeout: 30000,
        requestIdHeader: "x-request-id",
    });

    await registerPlugins(server, config, options.services);
    await setupDebugHooks(server, config);
    await server.register(api);

    return server;
}

async function startServer(): Promise<void> {
    const config = defaultConfig;

    try {
        const server = await buildServer({ config });

        const gracefulShutdown = async (signal: string) => {
            server.log.info(`Received ${signal}, shutting down gracefully...`);
            try {
                await server.close();
                process.exit(0);
            } catch (error) {
                server.log.error(error, "Error during shutdown");
                process.exit(1);
            }
        };

        for (const signal of ["SIGINT", "SIGTERM"]) {
            process.on(signal, () => void gracefulShutdown(signal));
        }

        process.on("unhandledRejection", (reason) => {
            server.log.error({ reason }, "Unhandled Rejection");
        });

        await server.listen({
            host: config.HOST,
            port: config.PORT,
        });

        if (config.NODE_ENV !== "production") {
            logger.info(`API Documentation: http://${config.HOST}:${config.PORT}/docs`);
        }
    } catch (error) {
        logger.error(`Error starting server: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    }
}

declare module "fastify" {
    interface FastifyInstance {
        chatModel: BaseChatModel;
        createAgent: () => AgentManager;
    }
}

if (require.main === module) {
    void startServer();
}

export default buildServer;
