// src/routes/workrooms.ts

import express from 'express';
import multer from 'multer';
import { z } from 'zod';
import { agentKeySchema } from '../models/agent.model';
import { outputTypeSchema } from '../models/output.model';
import type { WorkroomService } from '../services/workroom.service';
import { ValidationError } from '../utils/errors';
import { asyncHandler, parseBody } from './errors';

const messageSchema = z.object({ text: z.string().trim().min(1, 'text is required') });
const activeAgentsSchema = z.object({ activeAgents: z.array(agentKeySchema) });
const decisionSchema = z.object({
    content: z.string().trim().min(1, 'content is required'),
    context: z.string().default(''),
});
const outputSchema = z.object({
    outputType: outputTypeSchema.optional(),
    customDescription: z.string().optional(),
});

export interface WorkroomsRouterDeps {
    workrooms: WorkroomService;
    uploadMaxBytes: number;
}

export function createWorkroomsRouter({ workrooms, uploadMaxBytes }: WorkroomsRouterDeps): express.Router {
    const router = express.Router();
    const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: uploadMaxBytes } });

    router.get(
        '/',
        asyncHandler(async (req, res) => {
            res.json(await workrooms.listWorkrooms(req.query.includeArchived === 'true'));
        }),
    );

    router.post(
        '/',
        asyncHandler(async (req, res) => {
            res.status(201).json(await workrooms.createWorkroom(req.body));
        }),
    );

    router.get(
        '/:id',
        asyncHandler(async (req, res) => {
            res.json(await workrooms.getWorkroom(req.params.id));
        }),
    );

    router.patch(
        '/:id/discussion',
        asyncHandler(async (req, res) => {
            res.json(await workrooms.setDiscussionMode(req.params.id, req.body));
        }),
    );

    router.put(
        '/:id/agents',
        asyncHandler(async (req, res) => {
            const { activeAgents } = parseBody(activeAgentsSchema, req.body, 'agent list');
            res.json(await workrooms.setActiveAgents(req.params.id, activeAgents));
        }),
    );

    router.post(
        '/:id/archive',
        asyncHandler(async (req, res) => {
            res.json(await workrooms.archive(req.params.id));
        }),
    );

    router.get(
        '/:id/messages',
        asyncHandler(async (req, res) => {
            res.json(await workrooms.getTranscript(req.params.id));
        }),
    );

    router.post(
        '/:id/messages',
        asyncHandler(async (req, res) => {
            const { text } = parseBody(messageSchema, req.body, 'message');
            res.json(await workrooms.postMessage(req.params.id, text));
        }),
    );

    router.post(
        '/:id/decisions',
        asyncHandler(async (req, res) => {
            const { content, context } = parseBody(decisionSchema, req.body, 'decision');
            res.status(201).json(await workrooms.addDecision(req.params.id, content, context));
        }),
    );

    router.post(
        '/:id/outputs',
        asyncHandler(async (req, res) => {
            const { outputType, customDescription } = parseBody(outputSchema, req.body, 'output request');
            res.json(await workrooms.generateOutput(req.params.id, outputType, customDescription));
        }),
    );

    router.post(
        '/:id/document',
        upload.single('file'),
        asyncHandler(async (req, res) => {
            const file = req.file;
            if (!file) throw new ValidationError('No file uploaded');
            res.json(await workrooms.attachDocument(req.params.id, file.buffer, file.originalname));
        }),
    );

    router.delete(
        '/:id/document',
        asyncHandler(async (req, res) => {
            res.json(await workrooms.clearDocument(req.params.id));
        }),
    );

    return router;
}
