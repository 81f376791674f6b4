import { z } from 'zod';

export interface Alias {
    /** Normalised nickname: lower-case, trimmed, single spaces. */
    nickname: string;
    entityId: string;
    /** ISO-8601 creation time. */
    createdAt: string;
}

export const AliasFileSchema = z.object({
    version: z.literal(1),
    aliases: z.record(z.object({
        entityId: z.string().min(1),
        createdAt: z.string(),
    })),
});

export type AliasFile = z.infer<typeof AliasFileSchema>;

export const DEFAULT_ALIAS_FILE: AliasFile = {
    version: 1,
    aliases: {},
};

export type TurnRole = 'user' | 'assistant' | 'tool';

export interface TurnToolCall {
    id: string;
    name: string;
    arguments: string;
}

export interface ConversationTurn {
    role: TurnRole;
    content: string;
    /** Position in the chat's history; keeps growing across evictions. */
    ordinal: number;
    /** Set on assistant turns that requested tools. */
    toolCalls?: TurnToolCall[];
    /** Set on tool turns: the request this result answers. */
    toolCallId?: string;
}
