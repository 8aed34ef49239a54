// src/services/llm/types.ts

export type JsonSchemaProperty = {
    type: string | string[];
    description?: string;
    enum?: string[];
    items?: JsonSchemaProperty;
    properties?: Record<string, JsonSchemaProperty>;
    minimum?: number;
    maximum?: number;
};

// A type alias (not an interface) so it stays assignable to the SDKs'
// `Record<string, unknown>` function-parameter type.
export type JsonSchemaObject = {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
    additionalProperties?: boolean;
};

export interface ToolCall {
    id: string;
    name: string;
    /** Raw JSON string exactly as the model produced it. */
    arguments: string;
}

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: JsonSchemaObject;
}

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
    | { role: 'tool'; content: string; toolCallId: string };

export interface CompletionRequest {
    messages: ChatMessage[];
    tools?: ToolDefinition[];
    maxTokens: number;
    temperature?: number;
    responseFormat?: 'text' | 'json_object';
}

export interface CompletionResult {
    content: string;
    toolCalls?: ToolCall[];
    finishReason?: string;
}

/**
 * Provider-neutral chat completion. Everything above this interface is
 * unaware of which vendor answers.
 */
export interface CompletionService {
    complete(request: CompletionRequest): Promise<CompletionResult>;
}

export class CompletionError extends Error {
    readonly provider: string;

    constructor(provider: string, message: string) {
        super(`${provider} API error: ${message}`);
        this.name = 'CompletionError';
        this.provider = provider;
    }
}
