// src/app.ts

import express from 'express';
import cors from 'cors';
import type { Logger } from './services/base/types';
import type { AgentLibraryService } from './services/agent-library.service';
import type { Orchestrator } from './services/orchestrator/Orchestrator';
import type { TeamAdvisorService } from './services/team-advisor.service';
import type { WorkroomService } from './services/workroom.service';
import { createAgentsRouter } from './routes/agents';
import { createChatRouter } from './routes/chat';
import { errorHandler, notFound } from './routes/errors';
import { createWorkroomsRouter } from './routes/workrooms';

export interface AppDeps {
    logger: Logger;
    orchestrator: Orchestrator;
    workrooms: WorkroomService;
    library: AgentLibraryService;
    advisor: TeamAdvisorService;
    uploadMaxBytes: number;
}

export function createApp(deps: AppDeps): express.Express {
    const app = express();

    // --- Middleware Setup ---
    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    // --- API Routes ---
    app.use('/api/agents', createAgentsRouter({ library: deps.library, advisor: deps.advisor }));
    app.use('/api/workrooms', createWorkroomsRouter({ workrooms: deps.workrooms, uploadMaxBytes: deps.uploadMaxBytes }));
    app.use('/api/chat', createChatRouter(deps.orchestrator));

    // Health check
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.use(notFound);
    app.use(errorHandler(deps.logger));
    return app;
}
