import * as path from 'path';
import { AppConfig, ALIASES_FILE_NAME, USAGE_FILE_NAME } from './config';
import { HubClient, FetchFn } from './hub/HubClient';
import { IHubClient } from './hub/hubTypes';
import { EntityCache } from './cache/EntityCache';
import { AliasStore } from './memory/AliasStore';
import { ConversationStore } from './memory/ConversationStore';
import { EntityResolver } from './resolver/EntityResolver';
import { ToolRegistry } from './tools/ToolRegistry';
import { createHubTools } from './tools/hubTools';
import { ILLMClient } from './agents/ILLMClient';
import { OpenAIClient } from './agents/OpenAIClient';
import { HubAgent } from './agents/HubAgent';
import { PromptService } from './services/PromptService';
import { UsageTracker } from './services/UsageTracker';
import { dbg, say } from './utils';

export interface AppContext {
    config: AppConfig;
    hub: IHubClient;
    cache: EntityCache;
    aliases: AliasStore;
    conversations: ConversationStore;
    usage: UsageTracker;
    registry: ToolRegistry;
    agent: HubAgent;
    /** Stops background work so the process can exit. */
    close(): void;
}

export interface AppOptions {
    /** Keep the entity cache fresh on a timer (long-running transports). */
    backgroundRefresh?: boolean;
    fetchFn?: FetchFn;
    llm?: ILLMClient;
    prompts?: PromptService;
}

/**
 * Composition root: builds every shared object once and wires them together.
 * Loads persisted aliases and usage, then fills the entity cache.
 */
export async function createApp(config: AppConfig, options: AppOptions = {}): Promise<AppContext> {
    dbg(`Using data directory: ${config.dataDir}`);

    const hub = new HubClient({
        baseUrl: config.hub.url,
        token: config.hub.token,
        requestTimeoutMs: config.hub.requestTimeoutMs,
        fetchFn: options.fetchFn,
    });
    const cache = new EntityCache(hub, { refreshIntervalMs: config.cache.refreshIntervalMs });

    const aliases = new AliasStore();
    await aliases.load(path.join(config.dataDir, ALIASES_FILE_NAME));

    const usage = new UsageTracker(config.usage);
    await usage.load(path.join(config.dataDir, USAGE_FILE_NAME));

    const conversations = new ConversationStore(config.agent.historyLimit);
    const resolver = new EntityResolver(() => cache.getAll(), nickname => aliases.lookup(nickname), config.resolver);
    const registry = new ToolRegistry(createHubTools({ hub, cache, resolver, aliases }));

    const llm = options.llm ?? new OpenAIClient({
        apiKey: config.llm.apiKey,
        baseURL: config.llm.baseURL,
        model: config.llm.model,
    });
    say(`Using model: ${config.llm.model}`);

    const agent = new HubAgent({
        llm,
        registry,
        cache,
        aliases,
        conversations,
        prompts: options.prompts ?? new PromptService(config.promptsConfig),
        usage,
        settings: {
            maxToolRounds: config.agent.maxToolRounds,
            runTimeoutMs: config.agent.runTimeoutMs,
            model: config.llm.model,
        },
    });

    const initial = await cache.refresh();
    if (initial.ok) {
        say(cache.entitySummary());
    }
    if (options.backgroundRefresh) {
        cache.start();
    }

    return {
        config,
        hub,
        cache,
        aliases,
        conversations,
        usage,
        registry,
        agent,
        close: () => cache.stop(),
    };
}
