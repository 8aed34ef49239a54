// src/services/orchestrator/OutputSynthesizer.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import { OUTPUT_TYPES, OUTPUT_TYPE_META, type GeneratedOutput, type OutputType } from '../../models/output.model';
import type { Message, Session } from '../../models/session.model';
import type { CompletionService } from '../llm/types';
import { errorMessage } from '../../utils/errors';
import type { OrchestratorStorage } from './types';

export const MIN_TURN_CHARS = 5;
export const MAX_TRANSCRIPT_TURNS = 60;
const DECISION_SNIPPET_CHARS = 200;
export const OUTPUT_UNAVAILABLE = '_(Unable to generate output due to a connection issue. Please try again.)_';

function synthesisInstruction(): string {
    const structure = OUTPUT_TYPES.map(
        (type) => `- **${OUTPUT_TYPE_META[type].label}**: ${OUTPUT_TYPE_META[type].sections.join(', ')}`,
    ).join('\n');

    return `You compile a multi-agent working session into one structured document.

Required sections by output type:
${structure}

Rules:
- Be concrete: use the actual names, numbers and quotes from the discussion.
- Never invent facts that are not in the transcript or the session context.
- When the transcript does not contain enough material for a required section, keep the section heading and write [NEEDS INPUT] under it.
- Use markdown headers and bullet points.
- Be thorough without padding.

Return only the document in markdown, with no preamble.`;
}

/** Speaker-tagged transcript: drops near-empty turns and keeps the most recent ones. */
export function buildTranscript(messages: Pick<Message, 'role' | 'content' | 'agent'>[]): string {
    return messages
        .filter((message) => message.content.length >= MIN_TURN_CHARS)
        .map((message) => {
            const speaker = message.role === 'user' ? 'User' : (message.agent ?? 'Assistant').replace(/^\[+|\]+$/g, '');
            return `**${speaker}:** ${message.content}`;
        })
        .slice(-MAX_TRANSCRIPT_TURNS)
        .join('\n\n');
}

export interface SynthesisResult {
    content: string;
    /** Set when the document was stored on a session. */
    output?: GeneratedOutput;
}

export interface OutputSynthesizerConfig extends ServiceConfig {
    completion: CompletionService;
    storage?: Pick<OrchestratorStorage, 'addOutput'>;
}

export class OutputSynthesizer extends BaseService {
    private completion: CompletionService;
    private storage?: Pick<OrchestratorStorage, 'addOutput'>;

    constructor(config: OutputSynthesizerConfig) {
        super(config);
        this.completion = config.completion;
        this.storage = config.storage;
    }

    buildPrompt(outputType: OutputType, messages: Message[], session?: Session | null, customDescription = ''): string {
        const context: string[] = [];
        if (session) {
            context.push(`Session title: ${session.title}`);
            context.push(`Session goal: ${session.goal}`);
            if (session.decisions.length > 0) {
                const decisions = session.decisions.map((d) => `- ${d.content.slice(0, DECISION_SNIPPET_CHARS)}`).join('\n');
                context.push(`Logged decisions:\n${decisions}`);
            }
        }
        if (customDescription) {
            context.push(`Custom output description: ${customDescription}`);
        }

        const label = outputType.toUpperCase().replace(/_/g, ' ');
        let prompt = `Generate a **${label}** from the following multi-agent workroom discussion.\n\n`;
        if (context.length > 0) {
            prompt += `Session context:\n${context.join('\n')}\n\n`;
        }
        return `${prompt}Conversation transcript:\n\n${buildTranscript(messages)}`;
    }

    async generate(
        outputType: OutputType,
        messages: Message[],
        session?: Session | null,
        customDescription = '',
    ): Promise<SynthesisResult> {
        let content: string;
        try {
            const result = await this.completion.complete({
                messages: [
                    { role: 'system', content: synthesisInstruction() },
                    { role: 'user', content: this.buildPrompt(outputType, messages, session, customDescription) },
                ],
                maxTokens: 3000,
            });
            content = result.content.trim();
        } catch (error) {
            this.logger.error('Output synthesis failed', { outputType, sessionId: session?.id, error: errorMessage(error) });
            content = OUTPUT_UNAVAILABLE;
        }

        if (!session || !this.storage) {
            return { content };
        }

        const output: GeneratedOutput = {
            id: uuidv4(),
            outputType,
            title: `${OUTPUT_TYPE_META[outputType].label} — ${session.title}`,
            content,
            generatedAt: new Date().toISOString(),
        };
        await this.storage.addOutput(session.id, output);
        this.logger.info('Output generated', { sessionId: session.id, outputType, chars: content.length });
        return { content, output };
    }
}
