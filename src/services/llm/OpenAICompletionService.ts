// src/services/llm/OpenAICompletionService.ts

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import { CompletionError, type CompletionRequest, type CompletionResult, type CompletionService } from './types';
import { fromWireChoice, toWireMessages, toWireTools } from './wire';
import { errorMessage } from '../../utils/errors';

export interface OpenAICompletionConfig extends ServiceConfig {
    apiKey: string;
    model: string;
}

export class OpenAICompletionService extends BaseService implements CompletionService {
    private client: OpenAI;
    private model: string;

    constructor(config: OpenAICompletionConfig) {
        super(config);
        if (!config.apiKey) {
            throw new Error('OPENAI_API_KEY environment variable is required');
        }
        this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0, timeout: 60_000 });
        this.model = config.model;
    }

    public async complete(request: CompletionRequest): Promise<CompletionResult> {
        const params: ChatCompletionCreateParamsNonStreaming = {
            model: this.model,
            messages: toWireMessages(request.messages),
            max_completion_tokens: request.maxTokens,
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
            this.logger.debug('OpenAI completion finished', {
                model: response.model,
                finishReason: result.finishReason,
                toolCalls: result.toolCalls?.length ?? 0,
                totalTokens: response.usage?.total_tokens,
            });
            return result;
        } catch (error) {
            throw new CompletionError('OpenAI', errorMessage(error));
        }
    }
}
