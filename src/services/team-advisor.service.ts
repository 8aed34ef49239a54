// src/services/team-advisor.service.ts

import { z } from 'zod';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import type { AgentDefinition } from '../models/agent.model';
import type { CompletionService } from './llm/types';
import { errorMessage } from '../utils/errors';

const RECOMMEND_SYSTEM = `You are an expert meeting facilitator and product management coach.

Recommend the most relevant AI agents for a focused workroom session, based on the topic,
objective and desired outcome the user gives.

Rules:
- Choose between 2 and 5 agents. Quality over quantity.
- Prefer agents whose specialties directly address the stated objective.
- Always include at least one agent that can synthesise or document (e.g. Writer).
- Return ONLY valid JSON with no markdown fences and no text outside the JSON.

Output format:
{
  "recommended": ["agent_key1", "agent_key2"],
  "rationale": {
    "agent_key1": "One sentence explaining why this agent is needed."
  }
}`;

const DESIGN_SYSTEM = `You design AI agent teams for complex problem-solving.

Given a problem or challenge:
1. Identify the distinct domain expertise that would be most valuable
2. Explain why these experts, and what gap each one fills
3. Propose 3-5 specialist agents as concrete personas

Rules:
- Each agent has a clear, non-overlapping specialty
- System prompts are 4-8 sentences and specific enough to produce useful work
- Keys are lowercase snake_case, unique within the set
- Pick an emoji that reflects the role
- Category: "pm_workflow" for PM and business work, "ai_product" for AI or ML product work, "career" for professional growth, "life" for personal topics, or one short descriptive word otherwise. Never blank.
- Return ONLY valid JSON with no markdown fences and no text outside the JSON

Output format:
{
  "reasoning": "One or two paragraphs on what expertise the problem needs and why.",
  "agents": [
    {
      "key": "agent_key",
      "label": "Agent Name",
      "emoji": "🎯",
      "description": "Short tagline, max 60 chars",
      "system_prompt": "You are a [Role] specialising in... Your job is to...",
      "category": "pm_workflow"
    }
  ]
}`;

const recommendationSchema = z.object({
    recommended: z.array(z.string()),
    rationale: z.record(z.string()),
});

const designSchema = z.object({
    reasoning: z.string(),
    agents: z.array(z.unknown()),
});

const proposedAgentSchema = z.object({
    key: z.string().min(1),
    label: z.string().min(1),
    system_prompt: z.string().min(1),
    emoji: z.string().optional(),
    description: z.string().optional(),
    category: z.string().optional(),
});

export interface AgentRecommendation {
    recommended: string[];
    rationale: Record<string, string>;
}

export interface ProposedAgent {
    key: string;
    label: string;
    emoji: string;
    description: string;
    systemPrompt: string;
    category: string;
}

export interface TeamDesign {
    reasoning: string;
    agents: ProposedAgent[];
}

/** Lowercase snake_case; anything outside [a-z0-9_] becomes an underscore. */
export function normaliseAgentKey(key: string): string {
    return key
        .trim()
        .toLowerCase()
        .replace(/[\s-]+/g, '_')
        .replace(/[^a-z0-9_]/g, '');
}

function parseJsonObject(raw: string): unknown {
    const text = raw
        .trim()
        .replace(/^```(?:json)?\s*/i, '')
        .replace(/\s*```$/, '');
    return JSON.parse(text);
}

export interface TeamAdvisorConfig extends ServiceConfig {
    completion: CompletionService;
}

/**
 * Suggests who should be in a workroom, and drafts brand-new agent teams
 * from a problem statement. Both degrade to empty results.
 */
export class TeamAdvisorService extends BaseService {
    private completion: CompletionService;

    constructor(config: TeamAdvisorConfig) {
        super(config);
        this.completion = config.completion;
    }

    async recommendAgents(
        topic: string,
        objective: string,
        outcome: string,
        agents: Pick<AgentDefinition, 'key' | 'label' | 'description'>[],
    ): Promise<AgentRecommendation> {
        const agentList = agents
            .map((agent) => `- key: ${agent.key} | label: ${agent.label} | description: ${agent.description}`)
            .join('\n');
        const prompt = `Topic: ${topic}

Meeting objective: ${objective}

Desired outcome: ${outcome}

Available agents:
${agentList}

Recommend the best subset of agents for this session.`;

        try {
            const result = await this.completion.complete({
                messages: [
                    { role: 'system', content: RECOMMEND_SYSTEM },
                    { role: 'user', content: prompt },
                ],
                maxTokens: 800,
                temperature: 0.2,
                responseFormat: 'json_object',
            });
            const parsed = recommendationSchema.parse(parseJsonObject(result.content));
            const known = new Set(agents.map((agent) => agent.key));
            const recommended = [...new Set(parsed.recommended.filter((key) => known.has(key)))];
            const rationale = Object.fromEntries(Object.entries(parsed.rationale).filter(([key]) => known.has(key)));
            this.logger.info('Agents recommended', { recommended });
            return { recommended, rationale };
        } catch (error) {
            this.logger.error('Agent recommendation failed', { error: errorMessage(error) });
            return { recommended: [], rationale: {} };
        }
    }

    async designTeam(problem: string): Promise<TeamDesign> {
        const prompt = `Problem or challenge to solve:

${problem.trim()}

Identify the domain experts needed and propose a specialist agent team.`;

        try {
            const result = await this.completion.complete({
                messages: [
                    { role: 'system', content: DESIGN_SYSTEM },
                    { role: 'user', content: prompt },
                ],
                maxTokens: 2000,
                temperature: 0.4,
                responseFormat: 'json_object',
            });
            const parsed = designSchema.parse(parseJsonObject(result.content));

            const seen = new Set<string>();
            const proposed: ProposedAgent[] = [];
            for (const entry of parsed.agents) {
                const candidate = proposedAgentSchema.safeParse(entry);
                if (!candidate.success) continue;
                let key = normaliseAgentKey(candidate.data.key);
                if (!key) continue;
                if (seen.has(key)) key = `${key}_2`;
                seen.add(key);
                proposed.push({
                    key,
                    label: candidate.data.label,
                    emoji: candidate.data.emoji || '🤖',
                    description: candidate.data.description ?? '',
                    systemPrompt: candidate.data.system_prompt,
                    category: (candidate.data.category ?? '').trim(),
                });
            }

            this.logger.info('Agent team designed', { agents: proposed.map((agent) => agent.key) });
            return { reasoning: parsed.reasoning, agents: proposed };
        } catch (error) {
            this.logger.error('Agent team design failed', { error: errorMessage(error) });
            return { reasoning: '', agents: [] };
        }
    }
}
