// src/services/agents/PersonaAgent.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import { displayLabel, type AgentDefinition } from '../../models/agent.model';
import type { ChatMessage, CompletionResult, CompletionService, ToolCall } from '../llm/types';
import type { SkillRegistry } from '../skills/SkillRegistry';
import type { SkillArgs } from '../skills/types';
import { errorMessage } from '../../utils/errors';
import type { Agent, AgentTurnContext } from './types';
import {
    HISTORY_WINDOW_CONCISE,
    HISTORY_WINDOW_DEFAULT,
    MAX_TOKENS_CONCISE,
    MAX_TOKENS_DEFAULT,
    MAX_TOOL_ROUNDS,
    buildSystemPrompt,
    buildTeamNote,
    embedRawDocument,
    noAnswerPlaceholder,
    rawDocumentNotice,
    trimHistory,
    unavailablePlaceholder,
} from './prompts';

export interface PersonaAgentConfig extends ServiceConfig {
    definition: AgentDefinition;
    completion: CompletionService;
    skills?: SkillRegistry;
}

function isRecord(value: unknown): value is SkillArgs {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Tool arguments the model produced; anything unparsable becomes `{}`. */
export function parseToolArguments(raw: string): SkillArgs {
    try {
        const parsed: unknown = JSON.parse(raw);
        return isRecord(parsed) ? parsed : {};
    } catch {
        return {};
    }
}

/**
 * An agent defined by a persona prompt: the default library and every
 * user-created agent run through here.
 */
export class PersonaAgent extends BaseService implements Agent {
    readonly key: string;
    readonly label: string;
    readonly description: string;
    private definition: AgentDefinition;
    private completion: CompletionService;
    private skills?: SkillRegistry;

    constructor(config: PersonaAgentConfig) {
        super(config);
        this.definition = config.definition;
        this.completion = config.completion;
        this.skills = config.skills;
        this.key = config.definition.key;
        this.label = displayLabel(config.definition);
        this.description = config.definition.description || `Custom agent: ${config.definition.label}`;
    }

    /** Never throws: a failed completion becomes a visible placeholder. */
    async respond(message: string, context: AgentTurnContext): Promise<string> {
        const messages = this.buildMessages(message, context);
        const tools = this.skills && this.definition.skillNames.length > 0 ? this.skills.toTools(this.definition.skillNames) : [];
        const maxTokens = context.concise ? MAX_TOKENS_CONCISE : MAX_TOKENS_DEFAULT;

        try {
            let last: CompletionResult = { content: '' };
            for (let round = 0; round < MAX_TOOL_ROUNDS; round++) {
                last = await this.completion.complete({
                    messages: [...messages],
                    maxTokens,
                    ...(tools.length > 0 ? { tools } : {}),
                });
                if (!last.toolCalls || last.toolCalls.length === 0) {
                    return this.finalText(last.content);
                }
                messages.push({ role: 'assistant', content: last.content, toolCalls: last.toolCalls });
                for (const call of last.toolCalls) {
                    messages.push({ role: 'tool', toolCallId: call.id, content: await this.runTool(call, context) });
                }
            }
            this.logger.warn('Tool round limit reached', { agent: this.key, rounds: MAX_TOOL_ROUNDS });
            return this.finalText(last.content);
        } catch (error) {
            this.logger.error('Agent completion failed', { agent: this.key, error: errorMessage(error) });
            return unavailablePlaceholder(this.definition.label);
        }
    }

    private finalText(content: string): string {
        const text = content.trim();
        if (text) return text;
        this.logger.warn('Agent returned an empty reply', { agent: this.key });
        return noAnswerPlaceholder(this.definition.label);
    }

    buildMessages(message: string, context: AgentTurnContext): ChatMessage[] {
        const rawDocument = !context.documentBlock && context.document?.text ? context.document : null;
        const system = buildSystemPrompt({
            persona: this.definition.systemPrompt,
            concise: context.concise,
            documentBlock: context.documentBlock || (rawDocument ? rawDocumentNotice(rawDocument.filename) : undefined),
            teamNote: buildTeamNote(this.key, context.activeAgents),
        });

        const window = context.concise ? HISTORY_WINDOW_CONCISE : HISTORY_WINDOW_DEFAULT;
        const userTurn = rawDocument ? embedRawDocument(message, rawDocument.filename, rawDocument.text) : message;

        return [{ role: 'system', content: system }, ...trimHistory(context.history, window), { role: 'user', content: userTurn }];
    }

    private async runTool(call: ToolCall, context: AgentTurnContext): Promise<string> {
        if (!this.skills) {
            return `Error: skill "${call.name}" could not be executed: no skill registry available`;
        }
        const result = await this.skills.execute(call.name, parseToolArguments(call.arguments), {
            session: context.session,
            history: context.history,
        });
        this.logger.debug('Tool call finished', { agent: this.key, skill: call.name, preview: result.slice(0, 120) });
        return result;
    }
}
