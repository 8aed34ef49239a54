// src/services/llm/RetryPolicy.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { CompletionRequest, CompletionResult, CompletionService } from './types';
import { errorMessage } from '../../utils/errors';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicyOptions {
    /** Total attempts including the first one. */
    maxAttempts: number;
    /** Fixed pause between attempts. */
    delayMs: number;
    sleep?: Sleep;
    onRetry?: (attempt: number, error: unknown) => void;
}

/**
 * Bounded retry with a fixed backoff. The last error is rethrown once
 * attempts run out.
 */
export class RetryPolicy {
    readonly maxAttempts: number;
    readonly delayMs: number;
    private sleep: Sleep;
    private onRetry?: (attempt: number, error: unknown) => void;

    constructor(options: RetryPolicyOptions) {
        if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
            throw new Error(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
        }
        this.maxAttempts = options.maxAttempts;
        this.delayMs = Math.max(0, options.delayMs);
        this.sleep = options.sleep ?? defaultSleep;
        this.onRetry = options.onRetry;
    }

    async run<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
        let lastError: unknown;
        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                return await operation(attempt);
            } catch (error) {
                lastError = error;
                if (attempt < this.maxAttempts) {
                    this.onRetry?.(attempt, error);
                    await this.sleep(this.delayMs);
                }
            }
        }
        throw lastError;
    }
}

export interface RetryingCompletionConfig extends ServiceConfig {
    inner: CompletionService;
    policy: RetryPolicy;
}

export class RetryingCompletionService extends BaseService implements CompletionService {
    private inner: CompletionService;
    private policy: RetryPolicy;

    constructor(config: RetryingCompletionConfig) {
        super(config);
        this.inner = config.inner;
        this.policy = config.policy;
    }

    public async complete(request: CompletionRequest): Promise<CompletionResult> {
        return this.policy.run(async (attempt) => {
            try {
                return await this.inner.complete(request);
            } catch (error) {
                this.logger.warn('Completion attempt failed', {
                    attempt,
                    maxAttempts: this.policy.maxAttempts,
                    error: errorMessage(error),
                });
                throw error;
            }
        });
    }
}
