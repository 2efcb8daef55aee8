import { ChatRequestBodySchema, ChatResponseSchema, ErrorResponseSchema } from "./common.schema";

export const ChatSchema = {
    tags: ["Chat"],
    summary: "Send a prompt, with optional conversation history, straight to the chat model",
    body: ChatRequestBodySchema,
    response: {
        200: {
            description: "Completion generated successfully",
            ...ChatResponseSchema,
        },
        400: ErrorResponseSchema,
        500: ErrorResponseSchema,
    },
};
