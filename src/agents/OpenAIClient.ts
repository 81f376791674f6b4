import OpenAI from "openai";
import { ILLMClient, ChatMessage, ChatCompletionOptions, ModelTurn, ToolCallRequest } from "./ILLMClient";
import {
    OPENAI_API_KEY_ENV_VAR,
    BASE_URL_ENV_VAR,
    DEFAULT_MODEL_NAME,
    DEFAULT_MAX_TOKENS,
    DEFAULT_TEMPERATURE,
} from "./llmConstants";
import { ToolSchema } from "../tools/toolTypes";
import { dbg, errorMessage } from "../utils";

/** The slice of the OpenAI SDK this client talks to. */
export interface ChatCompletionsApi {
    create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
    ): Promise<OpenAI.Chat.ChatCompletion>;
}

export interface OpenAIClientOptions {
    apiKey?: string;
    baseURL?: string;
    model?: string;
    /** Replaces the SDK; used by tests. */
    completions?: ChatCompletionsApi;
}

export function toOpenAIMessage(msg: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
    switch (msg.role) {
        case 'system':
            return { role: 'system', content: msg.content };
        case 'user':
            return { role: 'user', content: msg.content };
        case 'tool':
            return { role: 'tool', content: msg.content, tool_call_id: msg.toolCallId };
        case 'assistant':
            if (msg.toolCalls && msg.toolCalls.length > 0) {
                return {
                    role: 'assistant',
                    content: msg.content,
                    tool_calls: msg.toolCalls.map(call => ({
                        id: call.id,
                        type: 'function',
                        function: { name: call.name, arguments: call.arguments },
                    })),
                };
            }
            return { role: 'assistant', content: msg.content };
    }
}

export function toOpenAITool(tool: ToolSchema): OpenAI.Chat.ChatCompletionTool {
    return {
        type: 'function',
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    };
}

/**
 * OpenAIClient implements the ILLMClient interface on top of OpenAI's chat completions
 * API with function calling. Any OpenAI-compatible endpoint works through `baseURL`.
 */
export class OpenAIClient implements ILLMClient {
    private readonly completions: ChatCompletionsApi;
    private readonly defaultModel: string;

    /**
     * @throws Error if no API key is given and OPENAI_API_KEY is not set
     */
    constructor(options: OpenAIClientOptions = {}) {
        this.defaultModel = options.model || DEFAULT_MODEL_NAME;

        if (options.completions) {
            this.completions = options.completions;
            return;
        }

        const apiKey = options.apiKey || process.env[OPENAI_API_KEY_ENV_VAR] || '';
        if (!apiKey) {
            const message = `OpenAI API key (${OPENAI_API_KEY_ENV_VAR}) is not set in environment variables.`;
            console.warn(message);
            throw new Error(message);
        }

        const baseURL = options.baseURL || process.env[BASE_URL_ENV_VAR] || '';
        let openai: OpenAI;
        if (!baseURL) {
            dbg(`${BASE_URL_ENV_VAR} is not set. Using default OpenAI URL.`);
            openai = new OpenAI({ apiKey });
        } else {
            dbg(`Using base URL: ${baseURL}`);
            openai = new OpenAI({ apiKey, baseURL });
        }
        this.completions = {
            create: (body, requestOptions) => openai.chat.completions.create(body, requestOptions),
        };
    }

    async chatCompletion(
        messages: ChatMessage[],
        tools: ToolSchema[],
        options: ChatCompletionOptions = {}
    ): Promise<ModelTurn> {
        const effectiveModel = options.modelName && options.modelName.trim() !== ''
            ? options.modelName
            : this.defaultModel;

        const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
            model: effectiveModel,
            messages: messages.map(toOpenAIMessage),
            temperature: DEFAULT_TEMPERATURE,
            max_tokens: DEFAULT_MAX_TOKENS,
        };
        if (tools.length > 0) {
            body.tools = tools.map(toOpenAITool);
        }

        let completion: OpenAI.Chat.ChatCompletion;
        try {
            dbg(`--- Calling OpenAI API (${effectiveModel}, ${messages.length} messages) ---`);
            completion = await this.completions.create(body, { signal: options.signal });
            dbg('--- OpenAI API Call Complete ---');
        } catch (error) {
            console.error(`Error calling OpenAI API: ${errorMessage(error)}`);
            throw new Error(`Failed to communicate with OpenAI: ${errorMessage(error)}`);
        }

        const message = completion.choices[0]?.message;
        if (!message) {
            throw new Error("OpenAI API call returned successfully but contained no choices.");
        }
        const usage = completion.usage
            ? { promptTokens: completion.usage.prompt_tokens, completionTokens: completion.usage.completion_tokens }
            : undefined;

        const calls: ToolCallRequest[] = (message.tool_calls ?? []).map(call => ({
            id: call.id,
            name: call.function.name,
            arguments: call.function.arguments,
        }));
        if (calls.length > 0) {
            return { kind: 'tool_calls', text: message.content, calls, usage };
        }

        if (!message.content) {
            throw new Error("OpenAI API call returned successfully but contained no content.");
        }
        return { kind: 'final', text: message.content, usage };
    }
}
