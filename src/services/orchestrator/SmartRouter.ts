// src/services/orchestrator/SmartRouter.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { ConversationTurn } from '../../models/session.model';
import type { CompletionService } from '../llm/types';
import { errorMessage } from '../../utils/errors';

export const SMART_ROUTE_MAX_AGENTS = 2;
const ROUTING_HISTORY_TURNS = 4;
const ROUTING_TURN_CHARS = 200;

const SMART_ROUTE_SYSTEM =
    'You route messages inside a multi-agent workroom.\n' +
    'Given a user message and the available agents, pick the 1-2 agents best suited to answer. ' +
    'Pick 2 only when the question clearly spans two distinct areas of expertise; fewer is better.\n\n' +
    "If the user asks something broad such as 'what does everyone think' or 'discuss this', return ALL agents.\n\n" +
    'Reply with a JSON array of agent keys only, e.g. ["planner", "challenger"]. No explanation and no markdown.';

export type RoutePlan =
    | { kind: 'round_table'; agents: string[] }
    | { kind: 'single'; agent: string }
    | { kind: 'mini_round_table'; agents: string[] };

export interface AgentDescriber {
    describe(keys: string[]): Array<{ key: string; description: string }>;
}

/**
 * Reads the router's reply. Anything other than a JSON array of active keys
 * means "everyone".
 */
export function parseRoutingResponse(raw: string, activeAgents: string[]): string[] {
    let text = raw.trim();
    if (text.startsWith('```')) {
        const newline = text.indexOf('\n');
        text = newline >= 0 ? text.slice(newline + 1) : '';
        const fence = text.lastIndexOf('```');
        text = (fence >= 0 ? text.slice(0, fence) : text).trim();
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return [...activeAgents];
    }
    if (!Array.isArray(parsed)) return [...activeAgents];

    const selected: string[] = [];
    for (const item of parsed) {
        if (typeof item === 'string' && activeAgents.includes(item) && !selected.includes(item)) {
            selected.push(item);
        }
    }
    return selected.length > 0 ? selected : [...activeAgents];
}

/** Turns a selection into the shape of the reply. */
export function planRoute(selected: string[], activeAgents: string[], maxAgents: number = SMART_ROUTE_MAX_AGENTS): RoutePlan {
    if (selected.length === 0 || selected.length >= activeAgents.length || selected.length > maxAgents) {
        return { kind: 'round_table', agents: [...activeAgents] };
    }
    const [only] = selected;
    if (selected.length === 1 && only !== undefined) {
        return { kind: 'single', agent: only };
    }
    return { kind: 'mini_round_table', agents: [...selected] };
}

export interface SmartRouterConfig extends ServiceConfig {
    completion: CompletionService;
    agents: AgentDescriber;
}

export class SmartRouter extends BaseService {
    private completion: CompletionService;
    private agents: AgentDescriber;

    constructor(config: SmartRouterConfig) {
        super(config);
        this.completion = config.completion;
        this.agents = config.agents;
    }

    /** Never throws; on any problem every active agent is selected. */
    async select(message: string, activeAgents: string[], history: ConversationTurn[]): Promise<string[]> {
        const roster = this.agents
            .describe(activeAgents)
            .map((agent) => `- ${agent.key}: ${agent.description}`)
            .join('\n');
        const recent = history
            .slice(-ROUTING_HISTORY_TURNS)
            .map((turn) => `${turn.role}: ${turn.content.slice(0, ROUTING_TURN_CHARS)}\n`)
            .join('');

        try {
            const result = await this.completion.complete({
                messages: [
                    { role: 'system', content: SMART_ROUTE_SYSTEM },
                    {
                        role: 'user',
                        content:
                            `Available agents:\n${roster}\n\n` +
                            `Recent conversation:\n${recent}\n` +
                            `User message: ${message}\n\n` +
                            'Which agent(s) should respond? Return a JSON array of keys.',
                    },
                ],
                maxTokens: 100,
                temperature: 0,
            });
            const selected = parseRoutingResponse(result.content, activeAgents);
            this.logger.debug('Smart route selection', { selected, raw: result.content.slice(0, 200) });
            return selected;
        } catch (error) {
            this.logger.warn('Smart routing failed, using the whole team', { error: errorMessage(error) });
            return [...activeAgents];
        }
    }
}
