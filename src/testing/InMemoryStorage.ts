// src/testing/InMemoryStorage.ts

import type { AgentDefinition } from '../models/agent.model';
import type { GeneratedOutput } from '../models/output.model';
import type { Decision, Message, Session } from '../models/session.model';
import { syncDefaultAgents } from '../services/storage/syncDefaultAgents';
import type { DefaultAgentSeed, Storage } from '../services/storage/types';
import { ConflictError, NotFoundError, StorageError } from '../utils/errors';

/** Storage that lives in maps. Set `failWrites` to simulate a full disk. */
export class InMemoryStorage implements Storage {
    readonly sessions = new Map<string, Session>();
    readonly messages = new Map<string, Message[]>();
    readonly agents = new Map<string, AgentDefinition>();
    failWrites = false;

    constructor(agents: AgentDefinition[] = []) {
        agents.forEach((agent) => this.agents.set(agent.key, agent));
    }

    private checkWrite(): void {
        if (this.failWrites) {
            throw new StorageError('Failed to write (simulated)');
        }
    }

    async saveSession(session: Session): Promise<void> {
        this.checkWrite();
        this.sessions.set(session.id, structuredClone(session));
    }

    async getSession(id: string): Promise<Session | null> {
        const session = this.sessions.get(id);
        return session ? structuredClone(session) : null;
    }

    async listSessions(includeArchived = false): Promise<Session[]> {
        return [...this.sessions.values()]
            .filter((session) => includeArchived || session.status !== 'archived')
            .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
            .map((session) => structuredClone(session));
    }

    async archiveSession(id: string): Promise<Session> {
        return this.update(id, (session) => ({ ...session, status: 'archived' }));
    }

    async saveMessages(sessionId: string, messages: Message[]): Promise<void> {
        this.checkWrite();
        this.messages.set(sessionId, structuredClone(messages));
    }

    async loadMessages(sessionId: string): Promise<Message[]> {
        return structuredClone(this.messages.get(sessionId) ?? []);
    }

    async saveAgent(agent: AgentDefinition): Promise<void> {
        this.checkWrite();
        this.agents.set(agent.key, structuredClone(agent));
    }

    async getAgent(key: string): Promise<AgentDefinition | null> {
        return this.agents.get(key) ?? null;
    }

    async listAgents(): Promise<AgentDefinition[]> {
        return [...this.agents.values()];
    }

    async deleteAgent(key: string): Promise<void> {
        const agent = this.agents.get(key);
        if (!agent) throw new NotFoundError(`Agent "${key}" not found`);
        if (agent.isDefault) throw new ConflictError(`Agent "${key}" is a default agent and cannot be deleted`);
        this.checkWrite();
        this.agents.delete(key);
    }

    async ensureDefaultAgents(defaults: DefaultAgentSeed[]): Promise<AgentDefinition[]> {
        const { agents } = syncDefaultAgents([...this.agents.values()], defaults);
        this.agents.clear();
        agents.forEach((agent) => this.agents.set(agent.key, agent));
        return agents;
    }

    async addDecision(sessionId: string, decision: Decision): Promise<Session> {
        return this.update(sessionId, (session) => ({ ...session, decisions: [...session.decisions, decision] }));
    }

    async addOutput(sessionId: string, output: GeneratedOutput): Promise<Session> {
        return this.update(sessionId, (session) => ({
            ...session,
            generatedOutputs: [...session.generatedOutputs, output],
        }));
    }

    private async update(id: string, change: (session: Session) => Session): Promise<Session> {
        const session = this.sessions.get(id);
        if (!session) throw new NotFoundError(`Workroom ${id} not found`);
        this.checkWrite();
        const next = change(session);
        this.sessions.set(id, next);
        return structuredClone(next);
    }
}
