// src/services/agents/defaults.ts

import { z } from 'zod';
import { createAgentSchema } from '../../models/agent.model';
import type { DefaultAgentSeed } from '../storage/types';
import rawDefaults from './default-agents.json';

/** Agents shipped with the app, validated at load. */
export const DEFAULT_AGENTS: DefaultAgentSeed[] = z.array(createAgentSchema).parse(rawDefaults);
