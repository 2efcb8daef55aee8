import type { BaseMessage } from "@langchain/core/messages";

export interface AgentLoopState {
    messages: BaseMessage[];
}

/**
 * The reasoning loop as the manager sees it. The LangGraph prebuilt agent
 * satisfies it; tests substitute scripted loops.
 */
export interface ReasoningLoop {
    invoke(input: AgentLoopState): Promise<AgentLoopState>;
}

export interface ToolCallSummary {
    name: string;
    args: Record<string, unknown>;
}
