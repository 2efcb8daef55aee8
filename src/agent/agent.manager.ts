import { HumanMessage } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { createReactAgent } from "@langchain/langgraph/prebuilt";
import { ChatOpenAI } from "@langchain/openai";
import defaultConfig from "../config";
import type { Config } from "../config";
import logger from "../config/logger";
import { agentPrompt } from "../ai_prompt/docs.agent.prompt";
import { ConfigError } from "../errors";
import type { DocsOperations } from "../services/docs.service";
import { createDocsTools } from "../tools/docs.tools";
import type { ReasoningLoop } from "../types/agent.types";
import { AgentUtils } from "../utils/agent.utils";

export type ReasoningLoopFactory = (llm: BaseChatModel, tools: StructuredToolInterface[]) => ReasoningLoop;

export interface AgentManagerOptions {
    operations: DocsOperations;
    /** Falls back to GROQ_API_KEY from the configuration. */
    apiKey?: string;
    modelName?: string;
    config?: Config;
    loopFactory?: ReasoningLoopFactory;
}

export const createReactLoop: ReasoningLoopFactory = (llm, tools) => {
    const agent = createReactAgent({
        llm,
        tools,
        prompt: agentPrompt,
    });

    return {
        invoke: async (input) => {
            const state = await agent.invoke(input);
            return { messages: state.messages };
        },
    };
};

/**
 * A model bound to the Google Docs tools. Holds no memory between runs;
 * build a new one per request.
 */
export class AgentManager {
    readonly llm: BaseChatModel;
    readonly tools: StructuredToolInterface[];
    private readonly loop: ReasoningLoop;

    constructor(options: AgentManagerOptions) {
        const config = options.config ?? defaultConfig;

        const apiKey = options.apiKey || config.LLM_API_KEY;
        if (!apiKey) {
            throw new ConfigError("Groq API key not provided and GROQ_API_KEY not found in environment");
        }

        this.llm = new ChatOpenAI({
            model: options.modelName ?? config.AGENT_MODEL,
            apiKey,
            configuration: {
                baseURL: config.LLM_BASE_URL,
            },
            temperature: 0,
            maxRetries: 0,
        });

        this.tools = createDocsTools(options.operations);
        this.loop = (options.loopFactory ?? createReactLoop)(this.llm, this.tools);
    }

    async run(inputText: string): Promise<string> {
        const result = await this.loop.invoke({ messages: [new HumanMessage(inputText)] });

        for (const call of AgentUtils.extractToolCalls(result.messages)) {
            logger.info(`Agent called ${call.name} with ${JSON.stringify(call.args)}`);
        }

        return AgentUtils.extractResponseContent(result);
    }
}

export function createAgent(options: AgentManagerOptions): AgentManager {
    return new AgentManager(options);
}
