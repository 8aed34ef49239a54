// src/services/workroom.service.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import type { AgentDefinition } from '../models/agent.model';
import type { OutputType } from '../models/output.model';
import {
    createWorkroomSchema,
    discussionSettingsSchema,
    sessionSchema,
    type ConversationTurn,
    type Decision,
    type DiscussionSettings,
    type Message,
    type Session,
} from '../models/session.model';
import { FACILITATOR_LABEL, shouldSummarise, type FacilitatorAgent } from './agents/FacilitatorAgent';
import type { DocumentExtractor } from './document/DocumentExtractor';
import type { Orchestrator } from './orchestrator/Orchestrator';
import { buildDecision } from './orchestrator/decisions';
import type { SynthesisResult } from './orchestrator/OutputSynthesizer';
import { SYSTEM_LABEL, type HandleMessageInput, type OrchestratorResponse } from './orchestrator/types';
import type { Storage } from './storage/types';
import { ConflictError, NotFoundError, StorageError, ValidationError, errorMessage } from '../utils/errors';

export const SOMETHING_WENT_WRONG = 'Something went wrong while handling that message. Please try again.';

export interface WorkroomAgents {
    has(key: string): boolean;
    definition(key: string): AgentDefinition | undefined;
}

export interface WorkroomServiceConfig extends ServiceConfig {
    storage: Storage;
    orchestrator: Pick<Orchestrator, 'handleMessage' | 'roundTable' | 'routeToAgent' | 'generateOutput'>;
    agents: WorkroomAgents;
    extractor: Pick<DocumentExtractor, 'extractText'>;
    /** Opening messages and check-ins are skipped without one. */
    facilitator?: Pick<FacilitatorAgent, 'openSession' | 'generateSummary'>;
    now?: () => Date;
    newId?: () => string;
}

export interface CreatedWorkroom {
    session: Session;
    messages: Message[];
}

export interface PostedMessage {
    session: Session;
    reply: Message;
    /** Facilitator check-in appended after the reply. */
    checkIn?: Message;
    warning?: string;
    pendingAction?: OrchestratorResponse['pendingAction'];
}

function toTurn(message: Message): ConversationTurn {
    return { role: message.role, content: message.content, ...(message.agent ? { agent: message.agent } : {}) };
}

/**
 * Lifecycle of a workroom: creation, posting messages through the
 * orchestrator in the room's discussion mode, documents and outputs.
 */
export class WorkroomService extends BaseService {
    private storage: Storage;
    private orchestrator: WorkroomServiceConfig['orchestrator'];
    private agents: WorkroomAgents;
    private extractor: WorkroomServiceConfig['extractor'];
    private facilitator?: WorkroomServiceConfig['facilitator'];
    private now: () => Date;
    private newId: () => string;

    constructor(config: WorkroomServiceConfig) {
        super(config);
        this.storage = config.storage;
        this.orchestrator = config.orchestrator;
        this.agents = config.agents;
        this.extractor = config.extractor;
        this.facilitator = config.facilitator;
        this.now = config.now ?? (() => new Date());
        this.newId = config.newId ?? uuidv4;
    }

    async createWorkroom(input: unknown): Promise<CreatedWorkroom> {
        const parsed = createWorkroomSchema.safeParse(input);
        if (!parsed.success) throw ValidationError.fromZod(parsed.error, 'workroom');
        const data = parsed.data;
        this.assertKnownAgents(data.activeAgents);

        let session = this.validSession({
            ...data,
            id: this.newId(),
            facilitator: { ...data.facilitator, introSent: false },
            createdAt: this.timestamp(),
        });
        const messages: Message[] = [];

        if (session.facilitator.enabled && this.facilitator) {
            const roster = session.activeAgents
                .map((key) => this.agents.definition(key))
                .filter((definition): definition is AgentDefinition => definition !== undefined);
            const opening = await this.facilitator.openSession(session, roster);
            messages.push({ role: 'assistant', content: opening, agent: FACILITATOR_LABEL, createdAt: this.timestamp() });
            session = { ...session, facilitator: { ...session.facilitator, introSent: true } };
        }

        await this.storage.saveSession(session);
        await this.storage.saveMessages(session.id, messages);
        this.logger.info('Workroom created', { sessionId: session.id, agents: session.activeAgents, intro: messages.length > 0 });
        return { session, messages };
    }

    async getWorkroom(id: string): Promise<Session> {
        const session = await this.storage.getSession(id);
        if (!session) throw new NotFoundError(`Workroom ${id} not found`);
        return session;
    }

    async listWorkrooms(includeArchived = false): Promise<Session[]> {
        return this.storage.listSessions(includeArchived);
    }

    async getTranscript(id: string): Promise<Message[]> {
        await this.getWorkroom(id);
        return this.storage.loadMessages(id);
    }

    async postMessage(id: string, text: string): Promise<PostedMessage> {
        const content = text.trim();
        if (!content) throw new ValidationError('Message text is required');
        const session = await this.getWorkroom(id);
        if (session.status === 'archived') throw new ConflictError(`Workroom ${id} is archived`);

        const messages = await this.storage.loadMessages(id);
        const input: HandleMessageInput = {
            text: content,
            documentContext: session.documentContext,
            history: messages.map(toTurn),
            activeAgents: session.activeAgents,
            session,
        };
        messages.push({ role: 'user', content, createdAt: this.timestamp() });
        await this.storage.saveMessages(id, messages);

        let response: OrchestratorResponse;
        try {
            response = await this.dispatch(session, input);
        } catch (error) {
            if (error instanceof StorageError) throw error;
            this.logger.error('Message handling failed', { sessionId: id, error: errorMessage(error) });
            response = { agent: SYSTEM_LABEL, text: SOMETHING_WENT_WRONG };
        }

        const reply: Message = {
            role: 'assistant',
            content: response.text,
            agent: response.agent,
            ...(response.multiResponse ? { multiResponse: response.multiResponse } : {}),
            createdAt: this.timestamp(),
        };
        messages.push(reply);
        await this.storage.saveMessages(id, messages);

        const checkIn = await this.facilitatorCheckIn(session, messages);
        if (checkIn) {
            messages.push(checkIn);
            await this.storage.saveMessages(id, messages);
        }

        return {
            // Re-read: the orchestrator may have logged decisions meanwhile.
            session: await this.getWorkroom(id),
            reply,
            ...(checkIn ? { checkIn } : {}),
            ...(response.warning ? { warning: response.warning } : {}),
            ...(response.pendingAction ? { pendingAction: response.pendingAction } : {}),
        };
    }

    async setDiscussionMode(id: string, settings: unknown): Promise<Session> {
        const parsed = discussionSettingsSchema.safeParse(settings);
        if (!parsed.success) throw ValidationError.fromZod(parsed.error, 'discussion settings');
        const { discussionMode, focusedAgent }: DiscussionSettings = parsed.data;

        const session = await this.getWorkroom(id);
        const focused = discussionMode === 'focused' ? focusedAgent ?? null : null;
        if (focused !== null && !session.activeAgents.includes(focused)) {
            throw new ValidationError(`Agent "${focused}" is not in this workroom`);
        }
        return this.save({ ...session, discussionMode, focusedAgent: focused });
    }

    async setActiveAgents(id: string, keys: string[]): Promise<Session> {
        const activeAgents = [...new Set(keys)];
        this.assertKnownAgents(activeAgents);
        const session = await this.getWorkroom(id);
        const focusLost = session.focusedAgent !== null && !activeAgents.includes(session.focusedAgent);
        return this.save({
            ...session,
            activeAgents,
            ...(focusLost ? { discussionMode: 'open' as const, focusedAgent: null } : {}),
        });
    }

    async attachDocument(id: string, bytes: Buffer, filename: string): Promise<Session> {
        if (!filename.trim()) throw new ValidationError('A filename is required');
        const session = await this.getWorkroom(id);
        const text = await this.extractor.extractText(bytes, filename);
        this.logger.info('Document attached', { sessionId: id, filename, chars: text.length });
        return this.save({ ...session, documentContext: { filename, text } });
    }

    async clearDocument(id: string): Promise<Session> {
        const session = await this.getWorkroom(id);
        return this.save({ ...session, documentContext: null });
    }

    async archive(id: string): Promise<Session> {
        await this.getWorkroom(id);
        const session = await this.storage.archiveSession(id);
        this.logger.info('Workroom archived', { sessionId: id });
        return session;
    }

    async generateOutput(id: string, outputType?: OutputType, customDescription?: string): Promise<SynthesisResult> {
        const session = await this.getWorkroom(id);
        const messages = await this.storage.loadMessages(id);
        return this.orchestrator.generateOutput(outputType ?? session.outputType, messages, session, customDescription);
    }

    /** Logs a decision by hand, outside the detector. */
    async addDecision(id: string, content: string, context = ''): Promise<Decision> {
        if (!content.trim()) throw new ValidationError('Decision content is required');
        await this.getWorkroom(id);
        const decision = buildDecision(content.trim(), context, this.now());
        await this.storage.addDecision(id, decision);
        return decision;
    }

    private async dispatch(session: Session, input: HandleMessageInput): Promise<OrchestratorResponse> {
        if (session.discussionMode === 'round_table' && session.activeAgents.length > 0) {
            return this.orchestrator.roundTable(input);
        }
        if (session.discussionMode === 'focused' && session.focusedAgent) {
            return this.orchestrator.routeToAgent(session.focusedAgent, input);
        }
        return this.orchestrator.handleMessage(input);
    }

    private async facilitatorCheckIn(session: Session, messages: Message[]): Promise<Message | null> {
        if (!this.facilitator || !session.facilitator.enabled) return null;
        const userMessages = messages.filter((message) => message.role === 'user').length;
        if (!shouldSummarise(userMessages, session.facilitator.summaryInterval)) return null;

        const summary = await this.facilitator.generateSummary(messages.map(toTurn), session.goal);
        this.logger.info('Facilitator check-in', { sessionId: session.id, userMessages });
        return { role: 'assistant', content: summary, agent: FACILITATOR_LABEL, createdAt: this.timestamp() };
    }

    private assertKnownAgents(keys: string[]): void {
        const unknown = keys.filter((key) => !this.agents.has(key));
        if (unknown.length > 0) throw new ValidationError(`Unknown agents: ${unknown.join(', ')}`);
    }

    private validSession(candidate: unknown): Session {
        const parsed = sessionSchema.safeParse(candidate);
        if (!parsed.success) throw ValidationError.fromZod(parsed.error, 'workroom');
        return parsed.data;
    }

    private async save(session: Session): Promise<Session> {
        const valid = this.validSession(session);
        await this.storage.saveSession(valid);
        return valid;
    }

    private timestamp(): string {
        return this.now().toISOString();
    }
}
