import { EntityCache } from '../cache/EntityCache';
import { AliasStore } from '../memory/AliasStore';
import { ConversationStore, NewTurn } from '../memory/ConversationStore';
import { PromptService } from '../services/PromptService';
import { UsageTracker } from '../services/UsageTracker';
import { ToolRegistry } from '../tools/ToolRegistry';
import { dbg, errorMessage, newRunConfig } from '../utils';
import { ChatMessage, ILLMClient } from './ILLMClient';
import { AbortReason, AgentState, AgentWorkflow, createAgentWorkflow, initialAgentState, recursionLimitFor } from './graph';
import { abortMessage, buildSystemPrompt, messagesToTurns, turnToMessage } from './agentUtils';

export type RunOutcome =
    | { kind: 'completed'; text: string; warnings: string[] }
    | { kind: 'aborted'; reason: AbortReason; text: string; warnings: string[] };

export interface HubAgentSettings {
    maxToolRounds: number;
    runTimeoutMs: number;
    model?: string;
}

export interface HubAgentDeps {
    llm: ILLMClient;
    registry: ToolRegistry;
    cache: EntityCache;
    aliases: AliasStore;
    conversations: ConversationStore;
    prompts: PromptService;
    usage?: UsageTracker;
    settings: HubAgentSettings;
    now?: () => Date;
}

type RunResult =
    | { kind: 'state'; state: AgentState; initialMessages: ChatMessage[] }
    | { kind: 'prepare_error'; error: unknown }
    | { kind: 'error'; error: unknown }
    | { kind: 'timeout' };

/**
 * Drives one tool-calling run per inbound instruction. Runs are independent;
 * the only state they share is what the injected stores hold.
 */
export class HubAgent {
    private readonly workflow: AgentWorkflow;
    private readonly now: () => Date;

    constructor(private readonly deps: HubAgentDeps) {
        this.now = deps.now ?? (() => new Date());
        const usage = deps.usage;
        this.workflow = createAgentWorkflow({
            llm: deps.llm,
            registry: deps.registry,
            maxToolRounds: deps.settings.maxToolRounds,
            modelName: deps.settings.model,
            onUsage: usage ? tokens => usage.record(tokens) : undefined,
        });
    }

    /**
     * Answers one chat message, replaying that chat's bounded history.
     * Never rejects: failures come back as an aborted outcome.
     */
    async handle(chatId: string, text: string): Promise<RunOutcome> {
        const history = this.deps.conversations.replayableHistory(chatId).map(turnToMessage);
        const { outcome, turns } = await this.run(text, history);
        this.deps.conversations.append(chatId, turns);
        return outcome;
    }

    /**
     * Runs a stored prompt with no history; nothing is recorded in any conversation.
     */
    async runScheduledPrompt(prompt: string): Promise<RunOutcome> {
        const { outcome } = await this.run(prompt, []);
        return outcome;
    }

    resetConversation(chatId: string): void {
        this.deps.conversations.reset(chatId);
        dbg(`Conversation ${chatId} reset`);
    }

    private async run(text: string, history: ChatMessage[]): Promise<{ outcome: RunOutcome; turns: NewTurn[] }> {
        const userTurn: NewTurn = { role: 'user', content: text };
        const warnings: string[] = [];
        const aborted = (reason: AbortReason, detail?: string) => {
            const message = abortMessage(reason, detail);
            return {
                outcome: { kind: 'aborted' as const, reason, text: message, warnings },
                turns: [userTurn, { role: 'assistant' as const, content: message }],
            };
        };

        const budget = this.deps.usage?.checkBudget();
        if (budget && !budget.allowed) {
            return aborted('budget', budget.warning);
        }
        if (budget?.warning) {
            warnings.push(budget.warning);
        }

        const controller = new AbortController();
        const config = newRunConfig(controller.signal, recursionLimitFor(this.deps.settings.maxToolRounds));
        const runId = config.configurable.run_id;
        dbg(`[${runId}] Run started: "${text}"`);

        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<RunResult>(resolve => {
            timer = setTimeout(() => {
                controller.abort();
                resolve({ kind: 'timeout' });
            }, this.deps.settings.runTimeoutMs);
        });
        // Preparation counts against the run timeout too. Settles to a value either way,
        // so losing the race leaves no rejection behind.
        const finished = this.prepare(text, history, warnings).then<RunResult, RunResult>(
            initialMessages => controller.signal.aborted
                ? { kind: 'timeout' }
                : this.workflow.invoke(initialAgentState(initialMessages), config).then<RunResult, RunResult>(
                    state => ({ kind: 'state', state, initialMessages }),
                    error => ({ kind: 'error', error })
                ),
            error => ({ kind: 'prepare_error', error })
        );

        let result: RunResult;
        try {
            result = await Promise.race([finished, timedOut]);
        } finally {
            clearTimeout(timer);
        }

        if (result.kind === 'timeout') {
            console.warn(`[${runId}] Run timed out after ${this.deps.settings.runTimeoutMs} ms`);
            return aborted('timeout');
        }
        if (result.kind === 'prepare_error') {
            console.error(`[${runId}] Could not prepare run: ${errorMessage(result.error)}`);
            return aborted('internal_error');
        }
        if (result.kind === 'error') {
            console.error(`[${runId}] Run failed: ${errorMessage(result.error)}`);
            return aborted(controller.signal.aborted ? 'timeout' : 'internal_error');
        }

        const { state, initialMessages } = result;
        if (state.abortReason !== null) {
            dbg(`[${runId}] Run aborted: ${state.abortReason}`);
            return aborted(state.abortReason);
        }
        if (state.finalText === null) {
            return aborted('internal_error');
        }

        dbg(`[${runId}] Run completed`);
        return {
            outcome: { kind: 'completed', text: state.finalText, warnings },
            turns: [userTurn, ...messagesToTurns(state.messages.slice(initialMessages.length))],
        };
    }

    /** Refreshes a stale cache and builds the messages the run starts from. */
    private async prepare(text: string, history: ChatMessage[], warnings: string[]): Promise<ChatMessage[]> {
        const cacheWarning = await this.deps.cache.refreshIfStale();
        if (cacheWarning) {
            warnings.push(cacheWarning);
        }
        const systemPrompt = await buildSystemPrompt(this.deps.prompts, this.deps.cache, this.deps.aliases, this.now());
        return [{ role: 'system', content: systemPrompt }, ...history, { role: 'user', content: text }];
    }
}
