export const ChatRequestBodySchema = {
    type: "object",
    required: ["prompt"],
    properties: {
        prompt: {
            type: "string",
            description: "The user's message",
        },
        history: {
            type: "array",
            description: "Earlier turns of the conversation, oldest first",
            default: [],
            items: {
                type: "object",
                required: ["role", "content"],
                properties: {
                    role: {
                        type: "string",
                        description: "system, user, assistant or any other chat role",
                    },
                    content: { type: "string" },
                },
            },
        },
    },
} as const;

export const ChatResponseSchema = {
    type: "object",
    properties: {
        response: { type: "string" },
    },
} as const;

export const ErrorResponseSchema = {
    type: "object",
    properties: {
        detail: { type: "string" },
    },
} as const;
