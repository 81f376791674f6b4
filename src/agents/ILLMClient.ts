import { ToolSchema } from '../tools/toolTypes';

export interface ToolCallRequest {
    id: string;
    name: string;
    /** JSON text exactly as the model produced it. */
    arguments: string;
}

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string | null; toolCalls?: ToolCallRequest[] }
    | { role: 'tool'; content: string; toolCallId: string };

export interface TokenUsage {
    promptTokens: number;
    completionTokens: number;
}

/**
 * One model reply: either the final answer or a batch of tool calls.
 */
export type ModelTurn =
    | { kind: 'final'; text: string; usage?: TokenUsage }
    | { kind: 'tool_calls'; text: string | null; calls: ToolCallRequest[]; usage?: TokenUsage };

export interface ChatCompletionOptions {
    modelName?: string;
    signal?: AbortSignal;
}

export interface ILLMClient {
    /**
     * Calls the underlying LLM provider's chat completions API with the tool catalogue attached.
     *
     * @param messages The full request, system prompt first.
     * @param tools Tools the model may call; empty for a plain completion.
     * @throws Error on API errors, cancellation or an empty reply.
     */
    chatCompletion(
        messages: ChatMessage[],
        tools: ToolSchema[],
        options?: ChatCompletionOptions
    ): Promise<ModelTurn>;
}
