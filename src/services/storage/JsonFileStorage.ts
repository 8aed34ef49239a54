// src/services/storage/JsonFileStorage.ts

import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import { agentDefinitionSchema, type AgentDefinition } from '../../models/agent.model';
import type { GeneratedOutput } from '../../models/output.model';
import { messageSchema, sessionSchema, type Decision, type Message, type Session } from '../../models/session.model';
import { ConflictError, NotFoundError, StorageError, ValidationError, errorMessage } from '../../utils/errors';
import { syncDefaultAgents } from './syncDefaultAgents';
import type { DefaultAgentSeed, Storage } from './types';

export interface JsonFileStorageConfig extends ServiceConfig {
    dataDir: string;
}

const SAFE_ID = /^[A-Za-z0-9_-]+$/;
const agentListSchema = z.array(agentDefinitionSchema);
const messageListSchema = z.array(messageSchema);

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores sessions, transcripts and agents as JSON files under one data
 * directory:
 *
 *   <dataDir>/agents.json
 *   <dataDir>/sessions/<id>.json
 *   <dataDir>/messages/<id>.json
 *
 * Writes go through one queue, and every file is written to a temp file in
 * the same directory and renamed over the target.
 */
export class JsonFileStorage extends BaseService implements Storage {
    private dataDir: string;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(config: JsonFileStorageConfig) {
        super(config);
        this.dataDir = config.dataDir;
    }

    // --- sessions ---

    async saveSession(session: Session): Promise<void> {
        const valid = this.validate(sessionSchema, session, 'session');
        await this.enqueue(() => this.writeJson(this.sessionPath(valid.id), valid));
    }

    async getSession(id: string): Promise<Session | null> {
        return this.readJson(this.sessionPath(id), sessionSchema, 'session');
    }

    async listSessions(includeArchived = false): Promise<Session[]> {
        const dir = path.join(this.dataDir, 'sessions');
        let files: string[];
        try {
            files = await fs.readdir(dir);
        } catch (error) {
            if (isMissingFile(error)) return [];
            throw new StorageError(`Failed to list sessions in ${dir}`, error);
        }

        const sessions: Session[] = [];
        for (const file of files.filter((name) => name.endsWith('.json'))) {
            const session = await this.readJson(path.join(dir, file), sessionSchema, 'session');
            if (session && (includeArchived || session.status !== 'archived')) {
                sessions.push(session);
            }
        }
        return sessions.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    }

    async archiveSession(id: string): Promise<Session> {
        return this.updateSession(id, (session) => ({ ...session, status: 'archived' }));
    }

    async addDecision(sessionId: string, decision: Decision): Promise<Session> {
        return this.updateSession(sessionId, (session) => ({ ...session, decisions: [...session.decisions, decision] }));
    }

    async addOutput(sessionId: string, output: GeneratedOutput): Promise<Session> {
        return this.updateSession(sessionId, (session) => ({
            ...session,
            generatedOutputs: [...session.generatedOutputs, output],
        }));
    }

    // --- transcripts ---

    async saveMessages(sessionId: string, messages: Message[]): Promise<void> {
        const valid = this.validate(messageListSchema, messages, 'messages');
        await this.enqueue(() => this.writeJson(this.messagesPath(sessionId), valid));
    }

    async loadMessages(sessionId: string): Promise<Message[]> {
        return (await this.readJson(this.messagesPath(sessionId), messageListSchema, 'messages')) ?? [];
    }

    // --- agents ---

    async saveAgent(agent: AgentDefinition): Promise<void> {
        const valid = this.validate(agentDefinitionSchema, agent, 'agent');
        await this.enqueue(async () => {
            const agents = await this.readAgents();
            const index = agents.findIndex((existing) => existing.key === valid.key);
            if (index >= 0) {
                agents[index] = valid;
            } else {
                agents.push(valid);
            }
            await this.writeJson(this.agentsPath(), agents);
        });
    }

    async getAgent(key: string): Promise<AgentDefinition | null> {
        return (await this.readAgents()).find((agent) => agent.key === key) ?? null;
    }

    async listAgents(): Promise<AgentDefinition[]> {
        return this.readAgents();
    }

    async deleteAgent(key: string): Promise<void> {
        await this.enqueue(async () => {
            const agents = await this.readAgents();
            const target = agents.find((agent) => agent.key === key);
            if (!target) {
                throw new NotFoundError(`Agent "${key}" not found`);
            }
            if (target.isDefault) {
                throw new ConflictError(`Agent "${key}" is a default agent and cannot be deleted`);
            }
            await this.writeJson(
                this.agentsPath(),
                agents.filter((agent) => agent.key !== key),
            );
        });
    }

    async ensureDefaultAgents(defaults: DefaultAgentSeed[]): Promise<AgentDefinition[]> {
        return this.enqueue(async () => {
            const { agents, changed } = syncDefaultAgents(await this.readAgents(), defaults);
            if (changed) {
                await this.writeJson(this.agentsPath(), agents);
                this.logger.info('Default agents synced', { total: agents.length });
            }
            return agents;
        });
    }

    // --- internals ---

    private async updateSession(id: string, update: (session: Session) => Session): Promise<Session> {
        return this.enqueue(async () => {
            const current = await this.getSession(id);
            if (!current) {
                throw new NotFoundError(`Workroom ${id} not found`);
            }
            const next = this.validate(sessionSchema, update(current), 'session');
            await this.writeJson(this.sessionPath(id), next);
            return next;
        });
    }

    private async readAgents(): Promise<AgentDefinition[]> {
        return (await this.readJson(this.agentsPath(), agentListSchema, 'agents')) ?? [];
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task, task);
        // The chain only orders writes; each caller sees its own failure through `run`.
        this.queue = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            throw ValidationError.fromZod(parsed.error, what);
        }
        return parsed.data;
    }

    private async readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T | null> {
        let raw: string;
        try {
            raw = await fs.readFile(file, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) return null;
            throw new StorageError(`Failed to read ${file}`, error);
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new StorageError(`Corrupt ${what} file ${file}: ${errorMessage(error)}`, error);
        }
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new StorageError(`Invalid ${what} record in ${file}`, parsed.error.issues);
        }
        return parsed.data;
    }

    /** Write-temp-then-rename so a crash never leaves a half-written file. */
    private async writeJson(file: string, value: unknown): Promise<void> {
        const dir = path.dirname(file);
        const temp = path.join(dir, `.${path.basename(file)}.${randomBytes(6).toString('hex')}.tmp`);
        try {
            await fs.mkdir(dir, { recursive: true });
            await fs.writeFile(temp, JSON.stringify(value, null, 2), 'utf-8');
            await fs.rename(temp, file);
        } catch (error) {
            await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
                this.logger.warn('Failed to remove temp file', { temp, error: errorMessage(cleanupError) });
            });
            this.logger.error('Atomic write failed', { file, error: errorMessage(error) });
            throw new StorageError(`Failed to write ${file}`, error);
        }
    }

    private sessionPath(id: string): string {
        return path.join(this.dataDir, 'sessions', `${this.safeId(id)}.json`);
    }

    private messagesPath(id: string): string {
        return path.join(this.dataDir, 'messages', `${this.safeId(id)}.json`);
    }

    private agentsPath(): string {
        return path.join(this.dataDir, 'agents.json');
    }

    private safeId(id: string): string {
        if (!SAFE_ID.test(id)) {
            throw new ValidationError(`Invalid workroom id "${id}"`);
        }
        return id;
    }
}
