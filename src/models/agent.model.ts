// src/models/agent.model.ts

import { z } from 'zod';

// Keys double as @mention tokens, so they stay within \w and lower case.
export const agentKeySchema = z.string().regex(/^[a-z0-9_]+$/, 'Agent keys are lowercase snake_case');

export const agentDefinitionSchema = z.object({
    id: z.string().min(1),
    key: agentKeySchema,
    label: z.string().min(1),
    emoji: z.string().default('🤖'),
    description: z.string().default(''),
    systemPrompt: z.string().min(1),
    category: z.string().default(''),
    isDefault: z.boolean().default(false),
    skillNames: z.array(z.string()).default([]),
    createdAt: z.string(),
});

export type AgentDefinition = z.infer<typeof agentDefinitionSchema>;

export const createAgentSchema = agentDefinitionSchema.omit({ id: true, isDefault: true, createdAt: true });
export type CreateAgentInput = z.input<typeof createAgentSchema>;

// Category is owned by the shipped defaults or set once at creation.
export const updateAgentSchema = createAgentSchema.omit({ key: true, category: true }).partial().strict();
export type UpdateAgentInput = z.input<typeof updateAgentSchema>;

/** The only field a default agent lets users change. */
export const DEFAULT_AGENT_EDITABLE_FIELDS: readonly string[] = ['systemPrompt'];

/** `[⚔️ Challenger]` style label used on every transcript entry an agent writes. */
export function displayLabel(agent: Pick<AgentDefinition, 'emoji' | 'label'>): string {
    return agent.emoji ? `[${agent.emoji} ${agent.label}]` : `[${agent.label}]`;
}
