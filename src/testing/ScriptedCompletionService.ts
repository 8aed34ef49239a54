// src/testing/ScriptedCompletionService.ts

import type { CompletionRequest, CompletionResult, CompletionService } from '../services/llm/types';

export type CompletionHandler = (request: CompletionRequest, callIndex: number) => CompletionResult | string | Promise<CompletionResult | string>;

/**
 * Completion service for tests. Every request is recorded; the reply comes
 * from the handler, or from a queue of canned replies when one is given.
 */
export class ScriptedCompletionService implements CompletionService {
    readonly requests: CompletionRequest[] = [];
    private handler: CompletionHandler;

    constructor(handler: CompletionHandler | Array<CompletionResult | string | Error>) {
        if (Array.isArray(handler)) {
            const queue = [...handler];
            this.handler = () => {
                const next = queue.shift();
                if (next === undefined) {
                    throw new Error('ScriptedCompletionService ran out of replies');
                }
                if (next instanceof Error) {
                    throw next;
                }
                return next;
            };
        } else {
            this.handler = handler;
        }
    }

    get callCount(): number {
        return this.requests.length;
    }

    /** System prompt of the nth request. */
    systemPrompt(index: number): string {
        const first = this.requests[index]?.messages[0];
        return first && first.role === 'system' ? first.content : '';
    }

    async complete(request: CompletionRequest): Promise<CompletionResult> {
        const index = this.requests.length;
        this.requests.push(request);
        const reply = await this.handler(request, index);
        return typeof reply === 'string' ? { content: reply } : reply;
    }
}

export const silentLogger = {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    debug: () => undefined,
};
