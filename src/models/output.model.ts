// src/models/output.model.ts

import { z } from 'zod';

export const OUTPUT_TYPES = ['prd', 'architecture', 'decision_log', 'event_plan', 'requirements', 'summary', 'custom'] as const;

export const outputTypeSchema = z.enum(OUTPUT_TYPES);
export type OutputType = z.infer<typeof outputTypeSchema>;

export const generatedOutputSchema = z.object({
    id: z.string().min(1),
    outputType: outputTypeSchema,
    title: z.string(),
    content: z.string(),
    generatedAt: z.string(),
});
export type GeneratedOutput = z.infer<typeof generatedOutputSchema>;

export interface OutputTypeMeta {
    label: string;
    emoji: string;
    description: string;
    /** Sections the synthesised document must contain, in order. */
    sections: string[];
}

export const OUTPUT_TYPE_META: Record<OutputType, OutputTypeMeta> = {
    prd: {
        label: 'PRD',
        emoji: '📋',
        description: 'Product Requirements Document — goals, user stories, scope, non-goals',
        sections: ['Title', 'Overview', 'Problem Statement', 'Goals', 'Target Users', 'Key Features (prioritised)', 'Non-Goals', 'Success Metrics', 'Open Questions'],
    },
    architecture: {
        label: 'Architecture',
        emoji: '🏗️',
        description: 'System design, components, data flow, trade-offs',
        sections: ['Overview', 'Components', 'Data Flow', 'API / Integration Points', 'Trade-offs', 'Risks', 'Next Steps'],
    },
    decision_log: {
        label: 'Decision Log',
        emoji: '📓',
        description: 'All decisions made in this session with rationale',
        sections: ['Chronological decisions, each with: Context, Options Considered, Decision Taken, Rationale'],
    },
    event_plan: {
        label: 'Event Plan',
        emoji: '🗓️',
        description: 'Agenda, logistics, attendees, action items',
        sections: ['Goal', 'Date/Time', 'Attendees', 'Agenda (timed)', 'Logistics', 'Budget (if mentioned)', 'Action Items'],
    },
    requirements: {
        label: 'Requirements',
        emoji: '📝',
        description: 'Functional and non-functional requirements list',
        sections: ['Functional Requirements (numbered)', 'Non-Functional Requirements (numbered)', 'Constraints', 'Assumptions'],
    },
    summary: {
        label: 'Summary',
        emoji: '📄',
        description: 'Concise summary of key points and next steps',
        sections: ['TL;DR (2-3 sentences)', 'Key Points', 'Decisions Made', 'Open Questions', 'Next Steps'],
    },
    custom: {
        label: 'Custom',
        emoji: '✨',
        description: 'Custom output — describe what you want when generating',
        sections: ["Interpret the user's custom request and produce the most useful structure"],
    },
};
