import { describe, expect, it, vi } from 'vitest';
import { RetryPolicy, RetryingCompletionService } from './RetryPolicy';
import { ScriptedCompletionService, silentLogger } from '../../testing/ScriptedCompletionService';

describe('RetryPolicy', () => {
    it('returns the first successful result without sleeping', async () => {
        const sleep = vi.fn(async () => undefined);
        const policy = new RetryPolicy({ maxAttempts: 3, delayMs: 50, sleep });

        await expect(policy.run(async () => 'ok')).resolves.toBe('ok');
        expect(sleep).not.toHaveBeenCalled();
    });

    it('retries with the fixed delay until an attempt succeeds', async () => {
        const sleep = vi.fn(async (_ms: number) => undefined);
        const policy = new RetryPolicy({ maxAttempts: 3, delayMs: 50, sleep });
        const attempts: number[] = [];

        const result = await policy.run(async (attempt) => {
            attempts.push(attempt);
            if (attempt < 3) throw new Error(`fail ${attempt}`);
            return 'third time';
        });

        expect(result).toBe('third time');
        expect(attempts).toEqual([1, 2, 3]);
        expect(sleep.mock.calls).toEqual([[50], [50]]);
    });

    it('rethrows the last error once attempts run out', async () => {
        const onRetry = vi.fn();
        const policy = new RetryPolicy({ maxAttempts: 2, delayMs: 0, sleep: async () => undefined, onRetry });

        await expect(
            policy.run(async (attempt) => {
                throw new Error(`fail ${attempt}`);
            }),
        ).rejects.toThrow('fail 2');
        expect(onRetry).toHaveBeenCalledTimes(1);
    });

    it('rejects a non-positive attempt count', () => {
        expect(() => new RetryPolicy({ maxAttempts: 0, delayMs: 0 })).toThrow('maxAttempts must be a positive integer');
    });
});

describe('RetryingCompletionService', () => {
    it('retries the wrapped completion service', async () => {
        const inner = new ScriptedCompletionService([new Error('rate limited'), 'recovered']);
        const service = new RetryingCompletionService({
            logger: silentLogger,
            inner,
            policy: new RetryPolicy({ maxAttempts: 2, delayMs: 0, sleep: async () => undefined }),
        });

        const result = await service.complete({ messages: [{ role: 'user', content: 'hi' }], maxTokens: 10 });

        expect(result.content).toBe('recovered');
        expect(inner.callCount).toBe(2);
    });
});
