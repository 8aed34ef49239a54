// src/services/agent-library.service.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import {
    DEFAULT_AGENT_EDITABLE_FIELDS,
    agentDefinitionSchema,
    createAgentSchema,
    updateAgentSchema,
    type AgentDefinition,
} from '../models/agent.model';
import type { AgentRegistry } from './agents/AgentRegistry';
import type { Storage } from './storage/types';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';

export interface AgentLibraryConfig extends ServiceConfig {
    storage: Storage;
    registry: Pick<AgentRegistry, 'has' | 'upsert' | 'remove'>;
    now?: () => Date;
    newId?: () => string;
}

/**
 * Stored agent definitions. Every change is written to storage first and
 * then mirrored into the live registry.
 */
export class AgentLibraryService extends BaseService {
    private storage: Storage;
    private registry: AgentLibraryConfig['registry'];
    private now: () => Date;
    private newId: () => string;

    constructor(config: AgentLibraryConfig) {
        super(config);
        this.storage = config.storage;
        this.registry = config.registry;
        this.now = config.now ?? (() => new Date());
        this.newId = config.newId ?? uuidv4;
    }

    async list(): Promise<AgentDefinition[]> {
        return this.storage.listAgents();
    }

    async create(input: unknown): Promise<AgentDefinition> {
        const parsed = createAgentSchema.safeParse(input);
        if (!parsed.success) throw ValidationError.fromZod(parsed.error, 'agent');

        const { key } = parsed.data;
        if (this.registry.has(key) || (await this.storage.getAgent(key))) {
            throw new ConflictError(`Agent "${key}" already exists`);
        }

        const agent: AgentDefinition = {
            ...parsed.data,
            id: this.newId(),
            isDefault: false,
            createdAt: this.now().toISOString(),
        };
        await this.storage.saveAgent(agent);
        this.registry.upsert(agent);
        this.logger.info('Agent created', { agent: key });
        return agent;
    }

    async update(key: string, patch: unknown): Promise<AgentDefinition> {
        const existing = await this.storage.getAgent(key);
        if (!existing) throw new NotFoundError(`Agent "${key}" not found`);

        const parsed = updateAgentSchema.safeParse(patch);
        if (!parsed.success) throw ValidationError.fromZod(parsed.error, 'agent update');
        const changes = Object.fromEntries(Object.entries(parsed.data).filter(([, value]) => value !== undefined));

        if (existing.isDefault) {
            const locked = Object.keys(changes).filter((field) => !DEFAULT_AGENT_EDITABLE_FIELDS.includes(field));
            if (locked.length > 0) {
                throw new ConflictError(
                    `Agent "${key}" is a default agent; only its systemPrompt can be edited (got ${locked.join(', ')})`,
                );
            }
        }

        const agent = agentDefinitionSchema.parse({ ...existing, ...changes });
        await this.storage.saveAgent(agent);
        this.registry.upsert(agent);
        this.logger.info('Agent updated', { agent: key, fields: Object.keys(changes) });
        return agent;
    }

    /** Default agents are refused by storage. */
    async remove(key: string): Promise<void> {
        await this.storage.deleteAgent(key);
        this.registry.remove(key);
        this.logger.info('Agent deleted', { agent: key });
    }
}
