// src/services/llm/GroqCompletionService.ts

import Groq from 'groq-sdk';
import type { ChatCompletionCreateParamsNonStreaming } from 'groq-sdk/resources/chat/completions';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import { CompletionError, type CompletionRequest, type CompletionResult, type CompletionService } from './types';
import { fromWireChoice, toWireMessages, toWireTools } from './wire';
import { errorMessage } from '../../utils/errors';

export interface GroqCompletionConfig extends ServiceConfig {
    apiKey: string;
    model: string;
}

export class GroqCompletionService extends BaseService implements CompletionService {
    private client: Groq;
    private model: string;

    constructor(config: GroqCompletionConfig) {
        super(config);
        if (!config.apiKey) {
            throw new Error('GROQ_API_KEY environment variable is required');
        }
        // Retries are owned by RetryPolicy, not the SDK.
        this.client = new Groq({ apiKey: config.apiKey, maxRetries: 0 });
        this.model = config.model;
    }

    public async complete(request: CompletionRequest): Promise<CompletionResult> {
        const params: ChatCompletionCreateParamsNonStreaming = {
            model: this.model,
            messages: toWireMessages(request.messages),
            max_tokens: request.maxTokens,
            stream: false,
        };
        if (request.temperature !== undefined) {
            params.temperature = request.temperature;
        }
        if (request.tools && request.tools.length > 0) {
            params.tools = toWireTools(request.tools);
            params.tool_choice = 'auto';
        }
        if (request.responseFormat === 'json_object') {
            params.response_format = { type: 'json_object' };
        }

        try {
            const response = await this.client.chat.completions.create(params);
            const result = fromWireChoice(response.choices[0]);
            this.logger.debug('Groq completion finished', {
                model: response.model,
                finishReason: result.finishReason,
                toolCalls: result.toolCalls?.length ?? 0,
                totalTokens: response.usage?.total_tokens,
            });
            return result;
        } catch (error) {
            throw new CompletionError('Groq', errorMessage(error));
        }
    }
}
