// src/services/orchestrator/Orchestrator.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { OutputType } from '../../models/output.model';
import type { Message, Session } from '../../models/session.model';
import type { Agent, AgentTurnContext } from '../agents/types';
import { unavailablePlaceholder } from '../agents/prompts';
import type { CompletionService } from '../llm/types';
import type { Sleep } from '../llm/RetryPolicy';
import { errorMessage } from '../../utils/errors';
import { buildDecision, isDecision } from './decisions';
import { DocumentContextCache } from './DocumentContextCache';
import { INTENT_AGENTS, OPEN_ENDED_MAX_WORDS, detectIntent, isOpenEnded } from './intent';
import { findInactiveMentions, resolveMentions } from './mentions';
import { OutputSynthesizer, type SynthesisResult } from './OutputSynthesizer';
import { DEFAULT_ROUND_TABLE_RETRY_DELAY_MS, RoundTableExecutor } from './RoundTableExecutor';
import { SMART_ROUTE_MAX_AGENTS, SmartRouter, planRoute } from './SmartRouter';
import { SYSTEM_LABEL, type HandleMessageInput, type OrchestratorResponse, type OrchestratorStorage } from './types';

export interface OrchestratorAgents {
    get(key: string): Agent | undefined;
    keys(): string[];
    describe(keys: string[]): Array<{ key: string; description: string }>;
}

export interface OrchestratorOptions {
    openEndedMaxWords?: number;
    smartRouteMaxAgents?: number;
    roundTableRetryDelayMs?: number;
    sleep?: Sleep;
}

export interface OrchestratorConfig extends ServiceConfig {
    completion: CompletionService;
    agents: OrchestratorAgents;
    /** Where detected decisions and generated outputs are stored. */
    storage?: OrchestratorStorage;
    options?: OrchestratorOptions;
}

const CLARIFY_EXAMPLES: ReadonlyArray<{ key: string; example: string }> = [
    { key: 'challenger', example: "- **Challenge an idea**: 'Challenge this: [plan]' or 'Red team this'" },
    { key: 'writer', example: "- **Draft a message**: 'Draft an email to [recipient] about [topic]'" },
    { key: 'researcher', example: "- **Research a topic**: 'Research: [topic]' or 'Deep dive on [subject]'" },
];

function titleCase(key: string): string {
    return key
        .split('_')
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
        .join(' ');
}

/**
 * Decides who answers each user message and assembles the reply. Holds no
 * per-session state apart from the document summary cache.
 */
export class Orchestrator extends BaseService {
    private agents: OrchestratorAgents;
    private storage?: OrchestratorStorage;
    private openEndedMaxWords: number;
    private smartRouteMaxAgents: number;
    readonly documents: DocumentContextCache;
    private router: SmartRouter;
    private roundTables: RoundTableExecutor;
    private synthesizer: OutputSynthesizer;

    constructor(config: OrchestratorConfig) {
        super(config);
        const options = config.options ?? {};
        this.agents = config.agents;
        this.storage = config.storage;
        this.openEndedMaxWords = options.openEndedMaxWords ?? OPEN_ENDED_MAX_WORDS;
        this.smartRouteMaxAgents = options.smartRouteMaxAgents ?? SMART_ROUTE_MAX_AGENTS;

        const logger = config.logger;
        this.documents = new DocumentContextCache({ logger, completion: config.completion });
        this.router = new SmartRouter({ logger, completion: config.completion, agents: config.agents });
        this.roundTables = new RoundTableExecutor({
            logger,
            agents: config.agents,
            storage: config.storage,
            retryDelayMs: options.roundTableRetryDelayMs ?? DEFAULT_ROUND_TABLE_RETRY_DELAY_MS,
            sleep: options.sleep,
        });
        this.synthesizer = new OutputSynthesizer({ logger, completion: config.completion, storage: config.storage });
    }

    async handleMessage(input: HandleMessageInput): Promise<OrchestratorResponse> {
        const { text, activeAgents, session } = input;

        const known = new Set([...this.agents.keys(), ...activeAgents]);
        const mentions = resolveMentions(text, known);
        if (mentions.length > 0) {
            const inactive = findInactiveMentions(mentions, activeAgents);
            if (inactive.length > 0) {
                this.logger.info('Mention of inactive agent blocked', { sessionId: session?.id, inactive });
                return this.blockedMentions(inactive, activeAgents);
            }
            if (mentions.length === 1 && mentions[0] !== undefined) {
                return this.routeToAgent(mentions[0], input);
            }
            return this.roundTable(input, mentions);
        }

        if (session) {
            if (activeAgents.length === 0) {
                return {
                    agent: SYSTEM_LABEL,
                    text: 'This workroom has no active agents yet. Add at least one agent to the team to start the discussion.',
                };
            }
            return this.smartRoute(input);
        }

        const intent = detectIntent(text);
        if (intent) {
            const key = INTENT_AGENTS[intent];
            if (!this.isAllowed(key, activeAgents)) {
                return this.blockedAgent(key, activeAgents);
            }
            return this.routeToAgent(key, input);
        }

        if (input.documentContext) {
            return this.documents.answerQuestion(text, input.documentContext, input.history);
        }

        return this.clarificationMenu(activeAgents);
    }

    /** Workroom routing: whole team for broad messages, otherwise the router's pick. */
    async smartRoute(input: HandleMessageInput): Promise<OrchestratorResponse> {
        const { text, activeAgents } = input;
        if (isOpenEnded(text, this.openEndedMaxWords)) {
            this.logger.info('Open-ended message, full round table', { sessionId: input.session?.id });
            return this.roundTable(input, activeAgents);
        }

        const selected = await this.router.select(text, activeAgents, input.history);
        const plan = planRoute(selected, activeAgents, this.smartRouteMaxAgents);
        this.logger.info('Smart route planned', { sessionId: input.session?.id, plan: plan.kind, selected });

        switch (plan.kind) {
            case 'single':
                return this.routeToAgent(plan.agent, input);
            case 'mini_round_table':
            case 'round_table':
                return this.roundTable(input, plan.agents);
        }
    }

    /** One agent answers. Used for mentions, focused mode and keyword intents. */
    async routeToAgent(key: string, input: HandleMessageInput): Promise<OrchestratorResponse> {
        const { activeAgents, session } = input;
        if (!this.isAllowed(key, activeAgents)) {
            return this.blockedAgent(key, activeAgents);
        }
        const agent = this.agents.get(key);
        if (!agent) {
            return {
                agent: SYSTEM_LABEL,
                text: `Agent \`${key}\` not found. Check the spelling or create an agent with that key.`,
            };
        }

        const { context, warning } = await this.sharedContext(input);
        let reply: string;
        try {
            reply = await agent.respond(input.text, { ...context, activeAgents });
        } catch (error) {
            this.logger.error('Agent failed', { agent: key, sessionId: session?.id, error: errorMessage(error) });
            reply = unavailablePlaceholder(agent.label.replace(/^\[|\]$/g, ''));
        }

        const response: OrchestratorResponse = { agent: agent.label, text: reply, ...(warning ? { warning } : {}) };
        if (session && this.storage && isDecision(reply)) {
            const decision = buildDecision(reply, input.text);
            await this.storage.addDecision(session.id, decision);
            response.decisions = [decision];
        }
        return response;
    }

    /** Every listed agent answers the same message; the summary is ready before fan-out. */
    async roundTable(input: HandleMessageInput, agentKeys: string[] = input.activeAgents): Promise<OrchestratorResponse> {
        const { context, warning } = await this.sharedContext(input);
        const result = await this.roundTables.run({ message: input.text, agentKeys, context });
        return warning ? { ...result, warning } : result;
    }

    async generateOutput(
        outputType: OutputType,
        messages: Message[],
        session?: Session | null,
        customDescription?: string,
    ): Promise<SynthesisResult> {
        return this.synthesizer.generate(outputType, messages, session, customDescription);
    }

    private async sharedContext(
        input: HandleMessageInput,
    ): Promise<{ context: Omit<AgentTurnContext, 'activeAgents'>; warning?: string }> {
        const workroom = Boolean(input.session);
        const doc = input.documentContext ?? null;
        let documentBlock = '';
        let warning: string | undefined;

        if (workroom && doc) {
            documentBlock = await this.documents.contextBlock(doc);
            if (this.documents.isDegraded(await this.documents.summarize(doc))) {
                warning = `Could not summarise ${doc.filename}; agents are working from a raw excerpt.`;
            }
        }

        return {
            context: {
                history: input.history,
                concise: workroom,
                session: input.session ?? null,
                ...(documentBlock ? { documentBlock } : { document: workroom ? null : doc }),
            },
            ...(warning ? { warning } : {}),
        };
    }

    private isAllowed(key: string, activeAgents: string[]): boolean {
        return activeAgents.length === 0 || activeAgents.includes(key);
    }

    private blockedMentions(inactive: string[], activeAgents: string[]): OrchestratorResponse {
        const names = inactive.map((key) => `**${key}**`).join(', ');
        return {
            agent: SYSTEM_LABEL,
            text:
                `${names} ${inactive.length === 1 ? 'is' : 'are'} not in this session.\n\n` +
                `Active agents: ${activeAgents.join(', ')}.\n\n` +
                'Add them to the team, or @mention one of the active agents.',
        };
    }

    private blockedAgent(key: string, activeAgents: string[]): OrchestratorResponse {
        const name = titleCase(key);
        const available = activeAgents.map(titleCase).join(', ') || 'none';
        return {
            agent: SYSTEM_LABEL,
            text:
                `**${name}** isn't in this session.\n\n` +
                `Active agents: ${available}.\n\n` +
                `Add **${name}** to the team to use it.`,
        };
    }

    private clarificationMenu(activeAgents: string[]): OrchestratorResponse {
        const pool = activeAgents.length > 0 ? activeAgents : CLARIFY_EXAMPLES.map((entry) => entry.key);
        const lines = CLARIFY_EXAMPLES.filter((entry) => pool.includes(entry.key)).map((entry) => entry.example);
        const others = pool.filter((key) => !CLARIFY_EXAMPLES.some((entry) => entry.key === key));
        if (others.length > 0) {
            lines.push(`- **Ask a specialist directly**: ${others.map((key) => `@${key}`).join(', ')} followed by your question`);
        }
        return {
            agent: SYSTEM_LABEL,
            text: `I'm not sure what you'd like to do. Here are your options with the active agents:\n\n${lines.join('\n')}`,
            pendingAction: 'choose_agent',
        };
    }
}
