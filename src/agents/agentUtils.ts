import { EntityCache } from '../cache/EntityCache';
import { AliasStore } from '../memory/AliasStore';
import { NewTurn } from '../memory/ConversationStore';
import { ConversationTurn } from '../memory/memory_types';
import { PromptService } from '../services/PromptService';
import { ChatMessage } from './ILLMClient';
import { AbortReason } from './graph';

export const HUB_AGENT_PROMPTS = 'hubAgent';
export const SYSTEM_PROMPT_KEY = 'system';

/**
 * Fills the system prompt template with the current entity and alias summaries.
 */
export async function buildSystemPrompt(
  prompts: PromptService,
  cache: EntityCache,
  aliases: AliasStore,
  now: Date
): Promise<string> {
  return prompts.getFormattedPrompt(HUB_AGENT_PROMPTS, SYSTEM_PROMPT_KEY, {
    now: now.toISOString(),
    entitySummary: cache.entitySummary(),
    aliasSummary: aliases.summary(),
  });
}

export function turnToMessage(turn: ConversationTurn): ChatMessage {
  switch (turn.role) {
    case 'user':
      return { role: 'user', content: turn.content };
    case 'tool':
      return { role: 'tool', content: turn.content, toolCallId: turn.toolCallId ?? '' };
    case 'assistant':
      return turn.toolCalls && turn.toolCalls.length > 0
        ? { role: 'assistant', content: turn.content === '' ? null : turn.content, toolCalls: turn.toolCalls }
        : { role: 'assistant', content: turn.content };
  }
}

/**
 * Converts the messages a run produced back into history turns.
 * System messages are never stored.
 */
export function messagesToTurns(messages: ChatMessage[]): NewTurn[] {
  const turns: NewTurn[] = [];
  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        break;
      case 'user':
        turns.push({ role: 'user', content: msg.content });
        break;
      case 'tool':
        turns.push({ role: 'tool', content: msg.content, toolCallId: msg.toolCallId });
        break;
      case 'assistant':
        turns.push(msg.toolCalls && msg.toolCalls.length > 0
          ? { role: 'assistant', content: msg.content ?? '', toolCalls: msg.toolCalls }
          : { role: 'assistant', content: msg.content ?? '' });
        break;
    }
  }
  return turns;
}

const ABORT_MESSAGES: Record<AbortReason, string> = {
  round_limit: "I couldn't complete that: it needed more steps than I can take for one request.",
  timeout: "I couldn't complete that: it took too long and was cancelled.",
  model_error: "I couldn't complete that: the language model is not responding right now.",
  budget: "I couldn't complete that: today's token budget is used up.",
  internal_error: "I couldn't complete that because of an internal error.",
};

export function abortMessage(reason: AbortReason, detail?: string): string {
  return detail ? `${ABORT_MESSAGES[reason]} ${detail}` : ABORT_MESSAGES[reason];
}
