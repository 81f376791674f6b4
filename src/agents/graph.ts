import { StateGraph, END, START } from "@langchain/langgraph";
import { RunnableConfig } from "@langchain/core/runnables";
import { ChatMessage, ILLMClient, ModelTurn, TokenUsage, ToolCallRequest } from "./ILLMClient";
import { ToolRegistry, formatToolResult } from "../tools/ToolRegistry";
import { dbg, errorMessage, runId, runSignal } from "../utils";

const CALL_MODEL = "callModel";
const EXECUTE_TOOLS = "executeTools";

export type AbortReason = 'round_limit' | 'timeout' | 'model_error' | 'budget' | 'internal_error';

// State flowing through the graph. `messages` is the full model request, system prompt first.
export type AgentState = {
    messages: ChatMessage[];
    pendingCalls: ToolCallRequest[];
    rounds: number;
    finalText: string | null;
    abortReason: AbortReason | null;
};

export interface AgentWorkflowDeps {
    llm: ILLMClient;
    registry: ToolRegistry;
    maxToolRounds: number;
    modelName?: string;
    onUsage?: (usage: TokenUsage) => Promise<void>;
}

export function initialAgentState(messages: ChatMessage[]): AgentState {
    return { messages, pendingCalls: [], rounds: 0, finalText: null, abortReason: null };
}

/**
 * Graph steps needed for `maxToolRounds` full rounds plus the closing model call.
 */
export function recursionLimitFor(maxToolRounds: number): number {
    return maxToolRounds * 2 + 5;
}

/**
 * Builds the tool-calling loop: `callModel` either finishes the run or hands a batch of
 * tool calls to `executeTools`, which always returns to `callModel`.
 */
export function createAgentWorkflow(deps: AgentWorkflowDeps) {
    const { llm, registry, maxToolRounds } = deps;

    async function callModelNode(state: AgentState, config?: RunnableConfig): Promise<Partial<AgentState>> {
        const signal = runSignal(config);
        const id = runId(config);
        if (signal?.aborted) {
            return { abortReason: 'timeout' };
        }

        let turn: ModelTurn;
        try {
            turn = await llm.chatCompletion(state.messages, registry.schemas(), { modelName: deps.modelName, signal });
        } catch (error) {
            if (signal?.aborted) {
                return { abortReason: 'timeout' };
            }
            console.error(`[${id}] Model call failed: ${errorMessage(error)}`);
            return { abortReason: 'model_error' };
        }

        if (turn.usage && deps.onUsage) {
            await deps.onUsage(turn.usage);
        }

        if (turn.kind === 'final') {
            dbg(`[${id}] Model answered after ${state.rounds} tool round(s)`);
            return { messages: [{ role: 'assistant', content: turn.text }], finalText: turn.text };
        }

        if (state.rounds >= maxToolRounds) {
            console.warn(`[${id}] Tool round limit (${maxToolRounds}) reached; aborting run`);
            return { abortReason: 'round_limit' };
        }

        dbg(`[${id}] Model requested ${turn.calls.map(c => c.name).join(', ')}`);
        return {
            messages: [{ role: 'assistant', content: turn.text, toolCalls: turn.calls }],
            pendingCalls: turn.calls,
        };
    }

    async function executeToolsNode(state: AgentState, config?: RunnableConfig): Promise<Partial<AgentState>> {
        const signal = runSignal(config);
        const calls = state.pendingCalls;
        // Promise.all keeps request order regardless of completion order.
        const outcomes = await Promise.all(calls.map(call => registry.execute(call.name, call.arguments, { signal })));
        const results: ChatMessage[] = outcomes.map((outcome, i) => ({
            role: 'tool',
            toolCallId: calls[i].id,
            content: formatToolResult(outcome),
        }));
        return { messages: results, pendingCalls: [], rounds: state.rounds + 1 };
    }

    const workflow = new StateGraph<AgentState>({
            channels: {
                messages: { value: (x: ChatMessage[], y: ChatMessage[]) => x.concat(y), default: () => [] },   // Append
                pendingCalls: { value: (x: ToolCallRequest[], y: ToolCallRequest[]) => y, default: () => [] },
                rounds: { value: (x: number, y: number) => y, default: () => 0 },
                finalText: { value: (x: string | null, y: string | null) => y, default: () => null },
                abortReason: { value: (x: AbortReason | null, y: AbortReason | null) => y, default: () => null },
            },
        })
        .addNode(CALL_MODEL, callModelNode)
        .addNode(EXECUTE_TOOLS, executeToolsNode)
        .addEdge(START, CALL_MODEL)
        .addConditionalEdges(CALL_MODEL,
            (state: AgentState) => {
                if (state.abortReason !== null || state.finalText !== null) {
                    return END;
                }
                return EXECUTE_TOOLS;
            },
            {
                [END]: END,
                [EXECUTE_TOOLS]: EXECUTE_TOOLS,
            }
        )
        .addEdge(EXECUTE_TOOLS, CALL_MODEL);

    return workflow.compile();
}

export type AgentWorkflow = ReturnType<typeof createAgentWorkflow>;
