import type { FastifyInstance } from "fastify";
import fp from "fastify-plugin";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ChatOpenAI } from "@langchain/openai";
import { AgentManager, createAgent } from "../agent/agent.manager";
import type { Config } from "../config";
import logger from "../config/logger";
import { DocsOperations, createCredentialProvider, createGoogleClientsProvider } from "../services";

export interface AiServices {
    chatModel: BaseChatModel;
    createAgent: () => AgentManager;
}

export interface AiServicesPluginOptions {
    config: Config;
    /** Replaces the default model or agent factory. */
    services?: Partial<AiServices>;
}

export function setupChatModel(config: Config): ChatOpenAI {
    return new ChatOpenAI({
        model: config.CHAT_MODEL,
        apiKey: config.LLM_API_KEY,
        configuration: {
            baseURL: config.LLM_BASE_URL,
        },
        maxRetries: 0,
    });
}

function setupAgentFactory(config: Config): () => AgentManager {
    // One credential provider for the whole process so token cache writes stay serialized.
    const credentials = createCredentialProvider(config);
    const operations = new DocsOperations(createGoogleClientsProvider(credentials));

    return () => createAgent({ operations, config });
}

const aiServicesPlugin = fp(
    async function aiServicesPlugin(fastify: FastifyInstance, options: AiServicesPluginOptions) {
        const { config, services = {} } = options;

        const chatModel = services.chatModel ?? setupChatModel(config);
        const agentFactory = services.createAgent ?? setupAgentFactory(config);

        logger.info(`Chat model: ${config.CHAT_MODEL}, agent model: ${config.AGENT_MODEL}`);

        fastify.decorate("chatModel", chatModel);
        fastify.decorate("createAgent", agentFactory);
    },
    {
        name: "ai-services",
        dependencies: [],
    }
);

export default aiServicesPlugin;
