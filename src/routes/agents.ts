// src/routes/agents.ts

import express from 'express';
import { z } from 'zod';
import type { AgentLibraryService } from '../services/agent-library.service';
import type { TeamAdvisorService } from '../services/team-advisor.service';
import { asyncHandler, parseBody } from './errors';

const designSchema = z.object({ problem: z.string().trim().min(1, 'problem is required') });

const recommendSchema = z.object({
    topic: z.string().default(''),
    objective: z.string().default(''),
    outcome: z.string().default(''),
});

export interface AgentsRouterDeps {
    library: AgentLibraryService;
    advisor: TeamAdvisorService;
}

export function createAgentsRouter({ library, advisor }: AgentsRouterDeps): express.Router {
    const router = express.Router();

    router.get(
        '/',
        asyncHandler(async (req, res) => {
            res.json(await library.list());
        }),
    );

    router.post(
        '/',
        asyncHandler(async (req, res) => {
            res.status(201).json(await library.create(req.body));
        }),
    );

    router.patch(
        '/:key',
        asyncHandler(async (req, res) => {
            res.json(await library.update(req.params.key, req.body));
        }),
    );

    router.delete(
        '/:key',
        asyncHandler(async (req, res) => {
            await library.remove(req.params.key);
            res.json({ success: true });
        }),
    );

    router.post(
        '/design',
        asyncHandler(async (req, res) => {
            const { problem } = parseBody(designSchema, req.body, 'design request');
            res.json(await advisor.designTeam(problem));
        }),
    );

    router.post(
        '/recommend',
        asyncHandler(async (req, res) => {
            const { topic, objective, outcome } = parseBody(recommendSchema, req.body, 'recommendation request');
            res.json(await advisor.recommendAgents(topic, objective, outcome, await library.list()));
        }),
    );

    return router;
}
