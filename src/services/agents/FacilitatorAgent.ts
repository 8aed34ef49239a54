// src/services/agents/FacilitatorAgent.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { AgentDefinition } from '../../models/agent.model';
import type { ConversationTurn, Session } from '../../models/session.model';
import type { CompletionService } from '../llm/types';
import { errorMessage } from '../../utils/errors';
import type { Agent, AgentTurnContext } from './types';

export const FACILITATOR_KEY = 'facilitator';
export const FACILITATOR_LABEL = '[Facilitator]';

const SUMMARY_WINDOW = 20;
const ASSISTANT_SNIPPET_CHARS = 300;

const FACILITATOR_SYSTEM = `You facilitate a working session between a person and a team of AI specialists.

- Keep the conversation pointed at the stated objective and desired outcome.
- Acknowledge progress, name gaps and propose concrete next steps.
- Be brief; this is a working session.
- Use markdown (bullets, bold) where it helps.
- Never speak for the other agents or make decisions on their behalf.`;

export const FALLBACK_CHECK_IN =
    '**Facilitator check-in:** Let us pause and review. What has been decided so far, and what still needs resolving?';

/** True every `interval` user messages. */
export function shouldSummarise(userMessageCount: number, interval: number): boolean {
    return interval > 0 && userMessageCount > 0 && userMessageCount % interval === 0;
}

export interface FacilitatorConfig extends ServiceConfig {
    completion: CompletionService;
}

export class FacilitatorAgent extends BaseService implements Agent {
    readonly key = FACILITATOR_KEY;
    readonly label = FACILITATOR_LABEL;
    readonly description = 'Facilitates discussion, summarises progress';
    private completion: CompletionService;

    constructor(config: FacilitatorConfig) {
        super(config);
        this.completion = config.completion;
    }

    /** As a team member, the facilitator answers with a progress check-in. */
    async respond(message: string, context: AgentTurnContext): Promise<string> {
        return this.generateSummary(context.history, context.session?.goal || message);
    }

    async openSession(session: Session, agents: Pick<AgentDefinition, 'label' | 'emoji' | 'description'>[]): Promise<string> {
        const roster = agents.map((agent) => `- ${agent.emoji || '🤖'} **${agent.label}**: ${agent.description}`).join('\n');
        const prompt = `Write the opening message for a new working session.

Session title: ${session.title}
Topic: ${session.topicDescription || session.title}
Objective: ${session.goal}
Desired outcome: ${session.keyOutcome || 'Not specified'}

Agents in this session:
${roster}

The message should:
1. Restate the objective and desired outcome in one or two sentences
2. List the agents present and what each contributes (short bullets)
3. Ask one sharp opening question

Stay under 200 words.`;

        try {
            const result = await this.completion.complete({
                messages: [
                    { role: 'system', content: FACILITATOR_SYSTEM },
                    { role: 'user', content: prompt },
                ],
                maxTokens: 700,
                temperature: 0.5,
            });
            return result.content.trim();
        } catch (error) {
            this.logger.error('Facilitator opening message failed', { sessionId: session.id, error: errorMessage(error) });
            return `**Welcome to this workroom.**\n\n**Objective:** ${session.goal}\n\nWhere would you like to start?`;
        }
    }

    async generateSummary(messages: ConversationTurn[], objective: string): Promise<string> {
        const transcript = messages
            .slice(-SUMMARY_WINDOW)
            .map((turn) => {
                if (turn.role === 'user') return `User: ${turn.content}`;
                const snippet =
                    turn.content.length > ASSISTANT_SNIPPET_CHARS
                        ? `${turn.content.slice(0, ASSISTANT_SNIPPET_CHARS)}...`
                        : turn.content;
                return `${turn.agent || 'Agent'}: ${snippet}`;
            })
            .join('\n');

        const prompt = `Objective of this session:
"${objective}"

Recent transcript:
---
${transcript}
---

Write a short check-in (under 150 words) that:
1. Summarises what has been covered or decided (2-3 bullets)
2. Names open questions or gaps
3. Suggests what to focus on next`;

        try {
            const result = await this.completion.complete({
                messages: [
                    { role: 'system', content: FACILITATOR_SYSTEM },
                    { role: 'user', content: prompt },
                ],
                maxTokens: 600,
                temperature: 0.3,
            });
            return result.content.trim();
        } catch (error) {
            this.logger.error('Facilitator summary failed', { error: errorMessage(error) });
            return FALLBACK_CHECK_IN;
        }
    }
}
