import { ChatRequestBodySchema, ChatResponseSchema, ErrorResponseSchema } from "./common.schema";

export const AgentSchema = {
    tags: ["Agent"],
    summary: "Ask the agent to carry out a task with its Google Docs tools",
    description:
        "The agent can create, read, update, comment on and search Google Docs. " +
        "Each request starts a fresh agent; the history field is accepted but not used.",
    body: ChatRequestBodySchema,
    response: {
        200: {
            description: "Agent finished the task",
            ...ChatResponseSchema,
        },
        400: ErrorResponseSchema,
        500: ErrorResponseSchema,
    },
};
