// src/services/skills/SkillRegistry.ts

import Ajv, { type ValidateFunction } from 'ajv';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { ToolDefinition } from '../llm/types';
import type { Skill, SkillArgs, SkillContext } from './types';
import { errorMessage } from '../../utils/errors';

interface RegisteredSkill {
    skill: Skill;
    validate: ValidateFunction;
}

/**
 * Skills an agent may call. Built per orchestrator, so two registries never
 * share state.
 */
export class SkillRegistry extends BaseService {
    private ajv = new Ajv({ allErrors: true });
    private skills = new Map<string, RegisteredSkill>();

    constructor(config: ServiceConfig, skills: Skill[] = []) {
        super(config);
        skills.forEach((skill) => this.register(skill));
    }

    register(skill: Skill): void {
        if (this.skills.has(skill.name)) {
            throw new Error(`Skill "${skill.name}" is already registered`);
        }
        this.skills.set(skill.name, { skill, validate: this.ajv.compile(skill.parameters) });
    }

    get(name: string): Skill | undefined {
        return this.skills.get(name)?.skill;
    }

    names(): string[] {
        return [...this.skills.keys()];
    }

    /** Tool schemas for the given skill names, or for every skill. */
    toTools(names?: string[]): ToolDefinition[] {
        const wanted = names ?? this.names();
        const tools: ToolDefinition[] = [];
        for (const name of wanted) {
            const entry = this.skills.get(name);
            if (!entry) {
                this.logger.warn('Unknown skill requested for agent, skipping', { skill: name });
                continue;
            }
            tools.push({
                name: entry.skill.name,
                description: entry.skill.description,
                parameters: entry.skill.parameters,
            });
        }
        return tools;
    }

    /** Runs a skill. Never throws; problems come back as text for the model. */
    async execute(name: string, args: SkillArgs, context: SkillContext): Promise<string> {
        const entry = this.skills.get(name);
        if (!entry) {
            return `Error: unknown skill "${name}". Available skills: ${this.names().join(', ') || 'none'}`;
        }

        if (!entry.validate(args)) {
            const problems = (entry.validate.errors ?? [])
                .map((e) => `${e.instancePath || '(arguments)'} ${e.message ?? 'is invalid'}`)
                .join(', ');
            this.logger.warn('Skill argument validation failed', { skill: name, problems });
            return `Error: invalid arguments for ${name}: ${problems || 'validation failed'}`;
        }

        try {
            const result = await entry.skill.execute(args, context);
            this.logger.debug('Skill executed', { skill: name, resultLength: result.length });
            return result;
        } catch (error) {
            this.logger.error('Skill execution failed', { skill: name, error: errorMessage(error) });
            return `Error running ${name}: ${errorMessage(error)}`;
        }
    }
}
