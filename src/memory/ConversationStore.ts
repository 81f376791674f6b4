import { ConversationTurn } from './memory_types';

export type NewTurn = Omit<ConversationTurn, 'ordinal'>;

/**
 * Per-chat history with a fixed capacity. Appending past the capacity evicts
 * the oldest turns first.
 */
export class ConversationStore {
    private readonly chats = new Map<string, ConversationTurn[]>();
    private readonly nextOrdinal = new Map<string, number>();

    constructor(private readonly maxTurns: number) {
        if (!Number.isInteger(maxTurns) || maxTurns < 1) {
            throw new Error(`Conversation history limit must be a positive integer, got ${maxTurns}.`);
        }
    }

    append(chatId: string, turns: NewTurn[]): void {
        const history = this.chats.get(chatId) ?? [];
        let ordinal = this.nextOrdinal.get(chatId) ?? 0;
        for (const turn of turns) {
            history.push({ ...turn, ordinal: ordinal++ });
        }
        if (history.length > this.maxTurns) {
            history.splice(0, history.length - this.maxTurns);
        }
        this.chats.set(chatId, history);
        this.nextOrdinal.set(chatId, ordinal);
    }

    history(chatId: string): ConversationTurn[] {
        return [...(this.chats.get(chatId) ?? [])];
    }

    /**
     * History as it may be replayed to the model: turns before the first user
     * turn are dropped, so an eviction never leaves tool results without the
     * request that produced them.
     */
    replayableHistory(chatId: string): ConversationTurn[] {
        const history = this.history(chatId);
        const firstUser = history.findIndex(t => t.role === 'user');
        return firstUser === -1 ? [] : history.slice(firstUser);
    }

    reset(chatId: string): void {
        this.chats.delete(chatId);
        this.nextOrdinal.delete(chatId);
    }

    size(chatId: string): number {
        return this.chats.get(chatId)?.length ?? 0;
    }
}
