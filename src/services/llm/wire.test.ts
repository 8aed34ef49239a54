import { describe, expect, it } from 'vitest';
import { fromWireChoice, toWireMessages } from './wire';

describe('toWireMessages', () => {
    it('maps tool calls and tool results to snake_case fields', () => {
        const wire = toWireMessages([
            { role: 'system', content: 'sys' },
            { role: 'assistant', content: '', toolCalls: [{ id: 'call_1', name: 'get_current_date', arguments: '{}' }] },
            { role: 'tool', content: '2026-01-01', toolCallId: 'call_1' },
        ]);

        expect(wire).toEqual([
            { role: 'system', content: 'sys' },
            {
                role: 'assistant',
                content: '',
                tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_current_date', arguments: '{}' } }],
            },
            { role: 'tool', content: '2026-01-01', tool_call_id: 'call_1' },
        ]);
    });
});

describe('fromWireChoice', () => {
    it('treats a missing choice as empty content', () => {
        expect(fromWireChoice(undefined)).toEqual({ content: '' });
    });

    it('reads content, tool calls and the finish reason', () => {
        const result = fromWireChoice({
            finish_reason: 'tool_calls',
            message: { content: null, tool_calls: [{ id: 'a', function: { name: 'n', arguments: '{"q":1}' } }] },
        });
        expect(result).toEqual({
            content: '',
            toolCalls: [{ id: 'a', name: 'n', arguments: '{"q":1}' }],
            finishReason: 'tool_calls',
        });
    });
});
