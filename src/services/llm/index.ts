// src/services/llm/index.ts

import type { AppConfig } from '../../config';
import type { Logger } from '../base/types';
import { GroqCompletionService } from './GroqCompletionService';
import { OpenAICompletionService } from './OpenAICompletionService';
import { RetryingCompletionService, RetryPolicy } from './RetryPolicy';
import type { CompletionService } from './types';

export * from './types';
export { RetryPolicy, RetryingCompletionService, defaultSleep } from './RetryPolicy';
export type { Sleep } from './RetryPolicy';

type LlmConfig = Pick<
    AppConfig,
    'LLM_PROVIDER' | 'GROQ_API_KEY' | 'OPENAI_API_KEY' | 'MODEL_NAME' | 'LLM_MAX_RETRIES' | 'LLM_RETRY_DELAY_MS'
>;

/** Builds the configured provider adapter wrapped in the retry policy. */
export function createCompletionService(config: LlmConfig, logger: Logger): CompletionService {
    const inner: CompletionService =
        config.LLM_PROVIDER === 'openai'
            ? new OpenAICompletionService({ logger, apiKey: config.OPENAI_API_KEY, model: config.MODEL_NAME })
            : new GroqCompletionService({ logger, apiKey: config.GROQ_API_KEY, model: config.MODEL_NAME });

    logger.info('Completion service ready', {
        provider: config.LLM_PROVIDER,
        model: config.MODEL_NAME,
        maxRetries: config.LLM_MAX_RETRIES,
    });

    return new RetryingCompletionService({
        logger,
        inner,
        policy: new RetryPolicy({
            maxAttempts: config.LLM_MAX_RETRIES + 1,
            delayMs: config.LLM_RETRY_DELAY_MS,
        }),
    });
}
