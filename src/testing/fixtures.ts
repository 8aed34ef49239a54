// src/testing/fixtures.ts

import type { AgentDefinition } from '../models/agent.model';
import type { Session } from '../models/session.model';

export function makeSession(overrides: Partial<Session> = {}): Session {
    return {
        id: 'room-1',
        title: 'Launch plan',
        goal: 'Decide how to launch the beta',
        keyOutcome: '',
        mode: 'work',
        outputType: 'summary',
        discussionMode: 'open',
        focusedAgent: null,
        activeAgents: ['challenger', 'writer'],
        decisions: [],
        generatedOutputs: [],
        documentContext: null,
        facilitator: { enabled: false, summaryInterval: 6, introSent: false },
        topicDescription: '',
        recommendedAgents: [],
        status: 'active',
        createdAt: '2026-01-01T00:00:00.000Z',
        ...overrides,
    };
}

export function makeAgent(key: string, overrides: Partial<AgentDefinition> = {}): AgentDefinition {
    const label = key
        .split('_')
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
        .join(' ');
    return {
        id: `id-${key}`,
        key,
        label,
        emoji: '',
        description: `${label} agent`,
        systemPrompt: `You are the ${label}.`,
        category: 'General',
        isDefault: false,
        skillNames: [],
        createdAt: '2026-01-01T00:00:00.000Z',
        ...overrides,
    };
}
