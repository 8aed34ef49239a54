// src/index.ts

import { CONFIG } from './config';
import { createApp } from './app';
import { AgentLibraryService } from './services/agent-library.service';
import { AgentRegistry } from './services/agents/AgentRegistry';
import { DEFAULT_AGENTS } from './services/agents/defaults';
import { FacilitatorAgent } from './services/agents/FacilitatorAgent';
import { DocumentExtractor } from './services/document/DocumentExtractor';
import { createCompletionService } from './services/llm';
import { Orchestrator } from './services/orchestrator/Orchestrator';
import { createSkillRegistry } from './services/skills';
import { JsonFileStorage } from './services/storage/JsonFileStorage';
import { TeamAdvisorService } from './services/team-advisor.service';
import { WorkroomService } from './services/workroom.service';
import { errorMessage } from './utils/errors';
import { componentLogger, logger } from './utils/logger';

async function main(): Promise<void> {
    if (!CONFIG.ENV_FILE_LOADED) {
        logger.warn('No .env file found; using process environment only');
    }

    // --- Service Initialization ---
    const completion = createCompletionService(CONFIG, componentLogger('llm'));
    const storage = new JsonFileStorage({ logger: componentLogger('storage'), dataDir: CONFIG.DATA_DIR });
    const facilitator = new FacilitatorAgent({ logger: componentLogger('facilitator'), completion });

    const registry = new AgentRegistry({
        logger: componentLogger('agents'),
        completion,
        skills: createSkillRegistry(componentLogger('skills')),
        builtins: [facilitator],
    });
    registry.load(await storage.ensureDefaultAgents(DEFAULT_AGENTS));

    const orchestrator = new Orchestrator({
        logger: componentLogger('orchestrator'),
        completion,
        agents: registry,
        storage,
        options: { roundTableRetryDelayMs: CONFIG.ROUND_TABLE_RETRY_DELAY_MS },
    });

    const app = createApp({
        logger,
        orchestrator,
        workrooms: new WorkroomService({
            logger: componentLogger('workrooms'),
            storage,
            orchestrator,
            agents: registry,
            extractor: new DocumentExtractor({ logger: componentLogger('documents') }),
            facilitator,
        }),
        library: new AgentLibraryService({ logger: componentLogger('library'), storage, registry }),
        advisor: new TeamAdvisorService({ logger: componentLogger('advisor'), completion }),
        uploadMaxBytes: CONFIG.UPLOAD_MAX_BYTES,
    });

    app.listen(CONFIG.PORT, () => {
        logger.info('Server listening', { port: CONFIG.PORT, provider: CONFIG.LLM_PROVIDER, dataDir: CONFIG.DATA_DIR });
    });
}

main().catch((error) => {
    logger.error('Startup failed', { error: errorMessage(error) });
    process.exit(1);
});
