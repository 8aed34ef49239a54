// src/models/session.model.ts

import { z } from 'zod';
import { generatedOutputSchema, outputTypeSchema } from './output.model';
import { agentKeySchema } from './agent.model';

export const messageRoleSchema = z.enum(['user', 'assistant']);
export type MessageRole = z.infer<typeof messageRoleSchema>;

export const agentReplySchema = z.object({
    agent: z.string(),
    text: z.string(),
});
export type AgentReply = z.infer<typeof agentReplySchema>;

export const messageSchema = z.object({
    role: messageRoleSchema,
    content: z.string(),
    agent: z.string().optional(),
    multiResponse: z.array(agentReplySchema).optional(),
    createdAt: z.string().optional(),
});
export type Message = z.infer<typeof messageSchema>;

/** The part of a transcript entry agents and routers read. */
export type ConversationTurn = Pick<Message, 'role' | 'content' | 'agent'>;

export const decisionSchema = z.object({
    id: z.string().min(1),
    content: z.string(),
    context: z.string().default(''),
    madeAt: z.string(),
});
export type Decision = z.infer<typeof decisionSchema>;

export const documentContextSchema = z.object({
    filename: z.string().min(1),
    text: z.string(),
});
export type DocumentContext = z.infer<typeof documentContextSchema>;

export const workroomModeSchema = z.enum(['work', 'life']);
export const discussionModeSchema = z.enum(['open', 'round_table', 'focused']);
export type DiscussionMode = z.infer<typeof discussionModeSchema>;
export const sessionStatusSchema = z.enum(['active', 'completed', 'archived']);

export const facilitatorSettingsSchema = z.object({
    enabled: z.boolean().default(true),
    summaryInterval: z.number().int().positive().default(6),
    introSent: z.boolean().default(false),
});
export type FacilitatorSettings = z.infer<typeof facilitatorSettingsSchema>;

export const sessionSchema = z
    .object({
        id: z.string().min(1),
        title: z.string().min(1),
        goal: z.string(),
        keyOutcome: z.string().default(''),
        mode: workroomModeSchema.default('work'),
        outputType: outputTypeSchema.default('summary'),
        discussionMode: discussionModeSchema.default('open'),
        focusedAgent: agentKeySchema.nullable().default(null),
        activeAgents: z.array(agentKeySchema).default([]),
        decisions: z.array(decisionSchema).default([]),
        generatedOutputs: z.array(generatedOutputSchema).default([]),
        documentContext: documentContextSchema.nullable().default(null),
        facilitator: facilitatorSettingsSchema.default({}),
        topicDescription: z.string().default(''),
        recommendedAgents: z.array(agentKeySchema).default([]),
        status: sessionStatusSchema.default('active'),
        createdAt: z.string(),
    })
    .refine((session) => session.focusedAgent === null || session.discussionMode === 'focused', {
        message: 'focusedAgent must be null unless discussionMode is "focused"',
        path: ['focusedAgent'],
    });

/** A workroom: one goal-directed conversation with a fixed team of agents. */
export type Session = z.infer<typeof sessionSchema>;

export const createWorkroomSchema = z.object({
    title: z.string().trim().min(1, 'title is required'),
    goal: z.string().trim().min(1, 'goal is required'),
    keyOutcome: z.string().default(''),
    mode: workroomModeSchema.default('work'),
    outputType: outputTypeSchema.default('summary'),
    activeAgents: z.array(agentKeySchema).default([]),
    topicDescription: z.string().default(''),
    recommendedAgents: z.array(agentKeySchema).default([]),
    facilitator: facilitatorSettingsSchema.omit({ introSent: true }).default({}),
});
export type CreateWorkroomInput = z.input<typeof createWorkroomSchema>;

export const discussionSettingsSchema = z
    .object({
        discussionMode: discussionModeSchema,
        focusedAgent: agentKeySchema.nullable().optional(),
    })
    .refine((settings) => settings.discussionMode !== 'focused' || Boolean(settings.focusedAgent), {
        message: 'focused mode needs a focusedAgent',
        path: ['focusedAgent'],
    });
export type DiscussionSettings = z.infer<typeof discussionSettingsSchema>;
