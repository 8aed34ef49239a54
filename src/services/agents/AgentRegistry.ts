// src/services/agents/AgentRegistry.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { AgentDefinition } from '../../models/agent.model';
import type { CompletionService } from '../llm/types';
import type { SkillRegistry } from '../skills/SkillRegistry';
import { PersonaAgent } from './PersonaAgent';
import type { Agent } from './types';

export interface AgentRegistryConfig extends ServiceConfig {
    completion: CompletionService;
    skills?: SkillRegistry;
    /** Agents that exist independently of the stored library, e.g. the facilitator. */
    builtins?: Agent[];
}

/**
 * Keyed lookup over built-in agents and the stored agent library.
 */
export class AgentRegistry extends BaseService {
    private completion: CompletionService;
    private skills?: SkillRegistry;
    private builtins = new Map<string, Agent>();
    private personas = new Map<string, PersonaAgent>();
    private definitions = new Map<string, AgentDefinition>();

    constructor(config: AgentRegistryConfig) {
        super(config);
        this.completion = config.completion;
        this.skills = config.skills;
        (config.builtins ?? []).forEach((agent) => this.builtins.set(agent.key, agent));
    }

    /** Replaces the stored-library agents. Built-ins are untouched. */
    load(definitions: AgentDefinition[]): void {
        this.personas.clear();
        this.definitions.clear();
        definitions.forEach((definition) => this.upsert(definition));
        this.logger.info('Agent library loaded', { agents: this.personas.size, builtins: this.builtins.size });
    }

    upsert(definition: AgentDefinition): void {
        if (this.builtins.has(definition.key)) {
            this.logger.warn('Stored agent shadows a built-in and is ignored', { agent: definition.key });
            return;
        }
        this.definitions.set(definition.key, definition);
        this.personas.set(
            definition.key,
            new PersonaAgent({ logger: this.logger, definition, completion: this.completion, skills: this.skills }),
        );
    }

    remove(key: string): void {
        this.personas.delete(key);
        this.definitions.delete(key);
    }

    get(key: string): Agent | undefined {
        return this.builtins.get(key) ?? this.personas.get(key);
    }

    has(key: string): boolean {
        return this.builtins.has(key) || this.personas.has(key);
    }

    keys(): string[] {
        return [...this.builtins.keys(), ...this.personas.keys()];
    }

    definition(key: string): AgentDefinition | undefined {
        return this.definitions.get(key);
    }

    /** One-line specialty per agent, for routing prompts. Unknown keys get a generic line. */
    describe(keys: string[]): Array<{ key: string; description: string }> {
        return keys.map((key) => ({ key, description: this.get(key)?.description ?? `Agent: ${key}` }));
    }
}
