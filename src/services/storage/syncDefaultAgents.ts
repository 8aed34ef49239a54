// src/services/storage/syncDefaultAgents.ts

import { v4 as uuidv4 } from 'uuid';
import type { AgentDefinition } from '../../models/agent.model';
import type { DefaultAgentSeed } from './types';

export interface SyncResult {
    agents: AgentDefinition[];
    changed: boolean;
}

/**
 * Reconciles stored agents with the shipped defaults: defaults that no
 * longer ship are pruned, categories follow the shipped value, missing
 * defaults are seeded. Prompt edits on defaults are kept.
 */
export function syncDefaultAgents(
    stored: AgentDefinition[],
    defaults: DefaultAgentSeed[],
    now: () => Date = () => new Date(),
    newId: () => string = () => uuidv4(),
): SyncResult {
    const shipped = new Map(defaults.map((seed) => [seed.key, seed]));
    let changed = false;

    const agents: AgentDefinition[] = [];
    for (const agent of stored) {
        if (!agent.isDefault) {
            agents.push(agent);
            continue;
        }
        const seed = shipped.get(agent.key);
        if (!seed) {
            changed = true;
            continue;
        }
        if (agent.category !== seed.category) {
            agents.push({ ...agent, category: seed.category });
            changed = true;
        } else {
            agents.push(agent);
        }
    }

    const present = new Set(agents.map((agent) => agent.key));
    for (const seed of defaults) {
        if (present.has(seed.key)) continue;
        agents.push({ ...seed, id: newId(), isDefault: true, createdAt: now().toISOString() });
        present.add(seed.key);
        changed = true;
    }

    return { agents, changed };
}
