// src/services/orchestrator/types.ts

import type { AgentReply, ConversationTurn, Decision, DocumentContext, Session } from '../../models/session.model';
import type { Storage } from '../storage/types';

export const SYSTEM_LABEL = '[System]';
export const ROUND_TABLE_LABEL = '[Round Table]';
export const DOCUMENT_QA_LABEL = '[Document Q&A]';

export type PendingAction = 'choose_agent';

export interface HandleMessageInput {
    text: string;
    documentContext?: DocumentContext | null;
    history: ConversationTurn[];
    /** Empty means no restriction in free chat. */
    activeAgents: string[];
    /** Present when the message belongs to a workroom. */
    session?: Session | null;
}

export interface OrchestratorResponse {
    agent: string;
    text: string;
    multiResponse?: AgentReply[];
    pendingAction?: PendingAction;
    warning?: string;
    /** Decisions logged while producing this response. */
    decisions?: Decision[];
}

/** The slice of storage the orchestrator writes through. */
export type OrchestratorStorage = Pick<Storage, 'addDecision' | 'addOutput'>;
