// src/services/skills/index.ts

import type { Logger } from '../base/types';
import { BUILTIN_SKILLS } from './builtin';
import { SkillRegistry } from './SkillRegistry';

export { SkillRegistry } from './SkillRegistry';
export * from './builtin';
export type { Skill, SkillArgs, SkillContext } from './types';

export function createSkillRegistry(logger: Logger): SkillRegistry {
    return new SkillRegistry({ logger }, BUILTIN_SKILLS);
}
