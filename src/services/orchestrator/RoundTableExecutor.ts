// src/services/orchestrator/RoundTableExecutor.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { AgentReply, Decision } from '../../models/session.model';
import type { Agent, AgentTurnContext } from '../agents/types';
import { RetryPolicy, type Sleep } from '../llm/RetryPolicy';
import { mapConcurrent } from '../../utils/concurrency';
import { errorMessage } from '../../utils/errors';
import { buildDecision, isDecision } from './decisions';
import { ROUND_TABLE_LABEL, SYSTEM_LABEL, type OrchestratorResponse, type OrchestratorStorage } from './types';

export const ROUND_TABLE_PLACEHOLDER = '_(Temporarily unavailable. Please resend your message to try again.)_';
export const DEFAULT_ROUND_TABLE_RETRY_DELAY_MS = 2000;

export interface AgentLookup {
    get(key: string): Agent | undefined;
}

export interface RoundTableExecutorConfig extends ServiceConfig {
    agents: AgentLookup;
    storage?: Pick<OrchestratorStorage, 'addDecision'>;
    retryDelayMs?: number;
    sleep?: Sleep;
}

export interface RoundTableRequest {
    message: string;
    agentKeys: string[];
    /** Shared by every agent; `activeAgents` is the round-table roster. */
    context: Omit<AgentTurnContext, 'activeAgents'>;
}

/** `ux_designer` → `[Ux_designer]`. */
export function fallbackLabel(key: string): string {
    return `[${key.charAt(0).toUpperCase()}${key.slice(1).toLowerCase()}]`;
}

export function combineReplies(replies: AgentReply[]): string {
    return replies.map((reply) => `**${reply.agent}**\n\n${reply.text}`).join('\n\n---\n\n');
}

/**
 * Fans one message out to several agents at once and assembles the answers
 * in the order the agents were requested.
 */
export class RoundTableExecutor extends BaseService {
    private agents: AgentLookup;
    private storage?: Pick<OrchestratorStorage, 'addDecision'>;
    private retry: RetryPolicy;

    constructor(config: RoundTableExecutorConfig) {
        super(config);
        this.agents = config.agents;
        this.storage = config.storage;
        this.retry = new RetryPolicy({
            maxAttempts: 2,
            delayMs: config.retryDelayMs ?? DEFAULT_ROUND_TABLE_RETRY_DELAY_MS,
            sleep: config.sleep,
        });
    }

    async run(request: RoundTableRequest): Promise<OrchestratorResponse> {
        const { message, agentKeys } = request;
        const context: AgentTurnContext = { ...request.context, activeAgents: agentKeys };

        const replies = await mapConcurrent(agentKeys, agentKeys.length, (key) => this.callAgent(key, message, context));

        const decisions: Decision[] = [];
        const session = request.context.session;
        if (session && this.storage) {
            for (const reply of replies) {
                if (!isDecision(reply.text)) continue;
                const decision = buildDecision(reply.text, message);
                await this.storage.addDecision(session.id, decision);
                decisions.push(decision);
            }
        }

        this.logger.info('Round table finished', {
            sessionId: session?.id,
            agents: agentKeys,
            decisions: decisions.length,
        });

        return {
            agent: ROUND_TABLE_LABEL,
            text: combineReplies(replies),
            multiResponse: replies,
            ...(decisions.length > 0 ? { decisions } : {}),
        };
    }

    private async callAgent(key: string, message: string, context: AgentTurnContext): Promise<AgentReply> {
        const agent = this.agents.get(key);
        if (!agent) {
            return { agent: SYSTEM_LABEL, text: `Agent \`${key}\` not found. Check the spelling or create an agent with that key.` };
        }

        try {
            const text = await this.retry.run(async (attempt) => {
                try {
                    return await agent.respond(message, { ...context, history: [...context.history] });
                } catch (error) {
                    this.logger.warn('Round table agent failed', { agent: key, attempt, error: errorMessage(error) });
                    throw error;
                }
            });
            return { agent: agent.label, text };
        } catch (error) {
            this.logger.error('Round table agent unavailable after retry', { agent: key, error: errorMessage(error) });
            return { agent: fallbackLabel(key), text: ROUND_TABLE_PLACEHOLDER };
        }
    }
}
