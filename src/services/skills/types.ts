// src/services/skills/types.ts

import type { ConversationTurn, Session } from '../../models/session.model';
import type { JsonSchemaObject } from '../llm/types';

export interface SkillContext {
    session?: Session | null;
    history: ConversationTurn[];
    now?: () => Date;
}

export type SkillArgs = Record<string, unknown>;

/** A callable capability an agent can invoke through the model's tool calls. */
export interface Skill {
    name: string;
    description: string;
    parameters: JsonSchemaObject;
    execute(args: SkillArgs, context: SkillContext): Promise<string> | string;
}
