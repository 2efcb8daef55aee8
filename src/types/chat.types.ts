export interface ChatHistoryMessage {
    role: string;
    content: string;
}

export interface ChatRequestBody {
    prompt: string;
    history?: ChatHistoryMessage[];
}
