// src/routes/chat.ts

import express from 'express';
import { z } from 'zod';
import { agentKeySchema } from '../models/agent.model';
import { documentContextSchema, messageRoleSchema } from '../models/session.model';
import type { Orchestrator } from '../services/orchestrator/Orchestrator';
import { asyncHandler, parseBody } from './errors';

const chatSchema = z.object({
    message: z.string().trim().min(1, 'message is required'),
    history: z
        .array(z.object({ role: messageRoleSchema, content: z.string(), agent: z.string().optional() }))
        .default([]),
    activeAgents: z.array(agentKeySchema).default([]),
    documentContext: documentContextSchema.nullable().default(null),
});

/** Free chat: no workroom, nothing persisted. */
export function createChatRouter(orchestrator: Pick<Orchestrator, 'handleMessage'>): express.Router {
    const router = express.Router();

    router.post(
        '/',
        asyncHandler(async (req, res) => {
            const { message, history, activeAgents, documentContext } = parseBody(chatSchema, req.body, 'chat request');
            res.json(await orchestrator.handleMessage({ text: message, history, activeAgents, documentContext }));
        }),
    );

    return router;
}
