// src/services/llm/wire.ts
// Shapes shared by the OpenAI-compatible chat APIs (Groq and OpenAI).

import type { ChatMessage, CompletionResult, ToolDefinition } from './types';

interface WireToolCall {
    id: string;
    type: 'function';
    function: { name: string; arguments: string };
}

export type WireMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string; tool_calls?: WireToolCall[] }
    | { role: 'tool'; content: string; tool_call_id: string };

export interface WireTool {
    type: 'function';
    function: { name: string; description: string; parameters: ToolDefinition['parameters'] };
}

export interface WireChoice {
    finish_reason: string | null;
    message: {
        content: string | null;
        tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
    };
}

export function toWireMessages(messages: ChatMessage[]): WireMessage[] {
    return messages.map((message): WireMessage => {
        switch (message.role) {
            case 'assistant':
                if (message.toolCalls && message.toolCalls.length > 0) {
                    return {
                        role: 'assistant',
                        content: message.content,
                        tool_calls: message.toolCalls.map((call) => ({
                            id: call.id,
                            type: 'function',
                            function: { name: call.name, arguments: call.arguments },
                        })),
                    };
                }
                return { role: 'assistant', content: message.content };
            case 'tool':
                return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
            case 'system':
                return { role: 'system', content: message.content };
            case 'user':
                return { role: 'user', content: message.content };
        }
    });
}

export function toWireTools(tools: ToolDefinition[]): WireTool[] {
    return tools.map((tool) => ({
        type: 'function',
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));
}

export function fromWireChoice(choice: WireChoice | undefined): CompletionResult {
    if (!choice) {
        return { content: '' };
    }
    const toolCalls = (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
    }));
    return {
        content: choice.message.content ?? '',
        ...(toolCalls.length > 0 ? { toolCalls } : {}),
        ...(choice.finish_reason ? { finishReason: choice.finish_reason } : {}),
    };
}
