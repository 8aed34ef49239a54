// src/services/storage/types.ts

import type { AgentDefinition, CreateAgentInput } from '../../models/agent.model';
import type { GeneratedOutput } from '../../models/output.model';
import type { Decision, Message, Session } from '../../models/session.model';

/** A shipped default agent before it has been stored. */
export type DefaultAgentSeed = Omit<AgentDefinition, 'id' | 'isDefault' | 'createdAt'>;
export type { CreateAgentInput };

export interface Storage {
    saveSession(session: Session): Promise<void>;
    getSession(id: string): Promise<Session | null>;
    listSessions(includeArchived?: boolean): Promise<Session[]>;
    archiveSession(id: string): Promise<Session>;

    /** Replaces the whole transcript of a session. */
    saveMessages(sessionId: string, messages: Message[]): Promise<void>;
    loadMessages(sessionId: string): Promise<Message[]>;

    saveAgent(agent: AgentDefinition): Promise<void>;
    getAgent(key: string): Promise<AgentDefinition | null>;
    listAgents(): Promise<AgentDefinition[]>;
    /** Refuses to delete default agents. */
    deleteAgent(key: string): Promise<void>;
    ensureDefaultAgents(defaults: DefaultAgentSeed[]): Promise<AgentDefinition[]>;

    addDecision(sessionId: string, decision: Decision): Promise<Session>;
    addOutput(sessionId: string, output: GeneratedOutput): Promise<Session>;
}
