// src/services/agents/types.ts

import type { ConversationTurn, DocumentContext, Session } from '../../models/session.model';

export interface AgentTurnContext {
    history: ConversationTurn[];
    /** Keys of every agent active in the room, this one included. */
    activeAgents: string[];
    /** Short workroom replies instead of full-length answers. */
    concise: boolean;
    /** Cached document summary block, already wrapped with its grounding rule. */
    documentBlock?: string;
    /** Raw document, embedded in the user turn only when there is no summary block. */
    document?: DocumentContext | null;
    session?: Session | null;
}

/**
 * Anything that can take a turn in a conversation. Built-in and
 * user-defined agents look the same to the orchestrator.
 */
export interface Agent {
    readonly key: string;
    /** Transcript label, e.g. `[⚔️ Challenger]`. */
    readonly label: string;
    readonly description: string;
    respond(message: string, context: AgentTurnContext): Promise<string>;
}
