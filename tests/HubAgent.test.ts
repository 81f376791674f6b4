import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { HubAgent, HubAgentSettings } from '../src/agents/HubAgent';
import { ModelTurn } from '../src/agents/ILLMClient';
import { abortMessage } from '../src/agents/agentUtils';
import { EntityCache } from '../src/cache/EntityCache';
import { AliasStore } from '../src/memory/AliasStore';
import { ConversationStore } from '../src/memory/ConversationStore';
import { EntityResolver } from '../src/resolver/EntityResolver';
import { PromptService } from '../src/services/PromptService';
import { UsageTracker } from '../src/services/UsageTracker';
import { ToolRegistry } from '../src/tools/ToolRegistry';
import { createHubTools } from '../src/tools/hubTools';
import { HubError } from '../src/hub/hubTypes';
import { FakeHub, RecordedCall, ScriptedLLM, fakeHub, hubState, inMemoryFiles } from './helpers/fakes';

const HOUR = 60 * 60 * 1000;
const NOW = new Date('2024-05-01T10:00:00.000Z');
const TEMPLATE = 'Now: {{now}}\n{{entitySummary}}\nAliases: {{aliasSummary}}';
const SYSTEM_PROMPT = 'Now: 2024-05-01T10:00:00.000Z\nCached entities: 1 automation, 1 climate, 2 light, 2 lock, 1 sensor\nAliases: No entity aliases learned yet.';

const DEFAULT_SETTINGS: HubAgentSettings = { maxToolRounds: 10, runTimeoutMs: 2000 };

function toolCall(id: string, name: string, args: Record<string, unknown>, usage?: { promptTokens: number; completionTokens: number }): ModelTurn {
    return { kind: 'tool_calls', text: null, calls: [{ id, name, arguments: JSON.stringify(args) }], usage };
}

function final(text: string, usage?: { promptTokens: number; completionTokens: number }): ModelTurn {
    return { kind: 'final', text, usage };
}

describe('HubAgent', () => {
    let hub: FakeHub;
    let cache: EntityCache;
    let aliases: AliasStore;
    let conversations: ConversationStore;
    let registry: ToolRegistry;
    let prompts: PromptService;

    beforeEach(async () => {
        sinon.stub(console, 'log');
        sinon.stub(console, 'debug');
        sinon.stub(console, 'warn');
        sinon.stub(console, 'error');

        hub = fakeHub();
        cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now: () => NOW });
        await cache.refresh();
        const files = inMemoryFiles();
        aliases = new AliasStore(files.readFileFn, files.writeFileFn, () => NOW);
        await aliases.load('/data/aliases.json');
        conversations = new ConversationStore(20);
        const resolver = new EntityResolver(() => cache.getAll(), nickname => aliases.lookup(nickname));
        registry = new ToolRegistry(createHubTools({ hub, cache, resolver, aliases, now: () => NOW }));
        prompts = new PromptService(undefined, { readFileFn: async () => TEMPLATE });
    });

    afterEach(() => {
        sinon.restore();
    });

    function agentWith(llm: ScriptedLLM, settings: Partial<HubAgentSettings> = {}, usage?: UsageTracker): HubAgent {
        return new HubAgent({
            llm,
            registry,
            cache,
            aliases,
            conversations,
            prompts,
            usage,
            settings: { ...DEFAULT_SETTINGS, ...settings },
            now: () => NOW,
        });
    }

    describe('handle', () => {
        it('runs tools until the model answers and records the whole exchange', async () => {
            const llm = new ScriptedLLM([
                toolCall('call_1', 'lock', { entity_ref: 'front door' }),
                final('The front door is locked.'),
            ]);
            const agent = agentWith(llm);

            const outcome = await agent.handle('chat-1', 'Lock the front door');

            expect(outcome).to.deep.equal({ kind: 'completed', text: 'The front door is locked.', warnings: [] });
            expect(hub.callService.firstCall.args.slice(0, 3)).to.deep.equal(['lock', 'lock', { entity_id: 'lock.front_door' }]);
            expect(llm.calls).to.have.length(2);
            expect(llm.calls[0].messages).to.deep.equal([
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: 'Lock the front door' },
            ]);
            expect(llm.calls[0].tools.map(t => t.name)).to.deep.equal(registry.names());

            const toolMessage = llm.calls[1].messages[3];
            expect(toolMessage.role).to.equal('tool');
            if (toolMessage.role === 'tool') {
                expect(toolMessage.toolCallId).to.equal('call_1');
                expect(JSON.parse(toolMessage.content)).to.deep.equal({
                    status: 'ok',
                    data: { success: true, action: 'locked', entity_id: 'lock.front_door', resolved_via: 'Matched', changed: [] },
                });
            }

            expect(conversations.history('chat-1').map(t => [t.role, t.ordinal])).to.deep.equal([
                ['user', 0], ['assistant', 1], ['tool', 2], ['assistant', 3],
            ]);
            expect(conversations.history('chat-1')[1].toolCalls).to.deep.equal([
                { id: 'call_1', name: 'lock', arguments: '{"entity_ref":"front door"}' },
            ]);
            expect(conversations.history('chat-1')[3].content).to.equal('The front door is locked.');
        });

        it('replays earlier turns of the same chat only', async () => {
            const llm = new ScriptedLLM([final('Hello.')]);
            const agent = agentWith(llm);

            await agent.handle('chat-1', 'Hi');
            await agent.handle('chat-2', 'Hi there');
            await agent.handle('chat-1', 'And again');

            expect(llm.calls[2].messages).to.deep.equal([
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: 'Hi' },
                { role: 'assistant', content: 'Hello.' },
                { role: 'user', content: 'And again' },
            ]);
            expect(conversations.size('chat-1')).to.equal(4);
            expect(conversations.size('chat-2')).to.equal(2);
        });

        it('returns tool results in request order', async () => {
            hub.getState.callsFake(async (id: string) => {
                if (id === 'lock.front_door') {
                    await new Promise(resolve => setTimeout(resolve, 20));
                }
                return hubState(id, 'locked');
            });
            const llm = new ScriptedLLM([
                {
                    kind: 'tool_calls',
                    text: null,
                    calls: [
                        { id: 'call_a', name: 'get_state', arguments: '{"entity_ref":"lock.front_door"}' },
                        { id: 'call_b', name: 'get_state', arguments: '{"entity_ref":"lock.back_door"}' },
                    ],
                },
                final('Both are locked.'),
            ]);

            await agentWith(llm).handle('chat-1', 'Are the doors locked?');

            const toolIds = llm.calls[1].messages.flatMap(m => (m.role === 'tool' ? [m.toolCallId] : []));
            expect(toolIds).to.deep.equal(['call_a', 'call_b']);
        });

        it('returns every result of a round even when one call fails', async () => {
            hub.getState.callsFake(async (id: string) => {
                await new Promise(resolve => setTimeout(resolve, 20));
                throw new HubError('ServerError', `Hub responded 500 to GET /api/states/${id}`, 500);
            });
            const llm = new ScriptedLLM([
                {
                    kind: 'tool_calls',
                    text: null,
                    calls: [
                        { id: 'call_a', name: 'get_state', arguments: '{"entity_ref":"lock.front_door"}' },
                        { id: 'call_b', name: 'open_garage', arguments: '{}' },
                        { id: 'call_c', name: 'list_entities', arguments: '{"domain":"climate"}' },
                    ],
                },
                final('The front door state is unavailable.'),
            ]);

            const outcome = await agentWith(llm).handle('chat-1', 'Check the doors and the thermostat');

            expect(outcome.kind).to.equal('completed');
            const results = llm.calls[1].messages.flatMap(m => (m.role === 'tool' ? [{ id: m.toolCallId, outcome: JSON.parse(m.content) }] : []));
            expect(results.map(r => [r.id, r.outcome.status])).to.deep.equal([
                ['call_a', 'error'],
                ['call_b', 'error'],
                ['call_c', 'ok'],
            ]);
            expect(results[0].outcome.error).to.deep.equal({
                kind: 'HubError',
                reason: 'ServerError',
                message: 'Hub responded 500 to GET /api/states/lock.front_door',
                status: 500,
            });
            expect(results[1].outcome.error.kind).to.equal('ValidationError');
            expect(results[2].outcome.data.entities).to.deep.equal([
                { entity_id: 'climate.hallway', name: 'Hallway Thermostat', state: 'heat' },
            ]);
        });

        it('aborts once the tool round limit is used up', async () => {
            const llm = new ScriptedLLM([toolCall('call_x', 'get_state', { entity_ref: 'front door' })]);
            const agent = agentWith(llm, { maxToolRounds: 2 });

            const outcome = await agent.handle('chat-1', 'Keep checking the door');

            expect(outcome).to.deep.equal({
                kind: 'aborted',
                reason: 'round_limit',
                text: abortMessage('round_limit'),
                warnings: [],
            });
            expect(llm.calls).to.have.length(3);
            expect(hub.getState.callCount).to.equal(2);
            expect(conversations.history('chat-1').map(t => [t.role, t.content])).to.deep.equal([
                ['user', 'Keep checking the door'],
                ['assistant', "I couldn't complete that: it needed more steps than I can take for one request."],
            ]);
        });

        it('cancels a run that exceeds its time limit', async () => {
            const hanging = (call: RecordedCall) => new Promise<ModelTurn>((_, reject) => {
                call.options?.signal?.addEventListener('abort', () => reject(new Error('Request was aborted.')));
            });
            const llm = new ScriptedLLM([hanging]);
            const agent = agentWith(llm, { runTimeoutMs: 20 });

            const outcome = await agent.handle('chat-1', 'Turn on the kitchen light');

            expect(outcome.kind).to.equal('aborted');
            expect(outcome.kind === 'aborted' && outcome.reason).to.equal('timeout');
            expect(outcome.text).to.equal("I couldn't complete that: it took too long and was cancelled.");
            expect(llm.calls[0].options?.signal?.aborted).to.be.true;
        });

        it('counts a slow cache refresh against the time limit', async () => {
            const later = new Date(NOW.getTime() + 2 * HOUR);
            cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now: () => later });
            hub.getStates.callsFake(async () => {
                await new Promise(resolve => setTimeout(resolve, 200));
                return [];
            });
            const llm = new ScriptedLLM([final('unused')]);
            const started = Date.now();

            const outcome = await agentWith(llm, { runTimeoutMs: 20 }).handle('chat-1', 'What is on?');

            expect(outcome.kind === 'aborted' && outcome.reason).to.equal('timeout');
            expect(Date.now() - started).to.be.below(150);
            expect(llm.calls).to.have.length(0);
        });

        it('reports a failing model as model_error', async () => {
            const llm = new ScriptedLLM([async () => {
                throw new Error('Failed to communicate with OpenAI: 503');
            }]);

            const outcome = await agentWith(llm).handle('chat-1', 'Hello');

            expect(outcome).to.deep.equal({
                kind: 'aborted',
                reason: 'model_error',
                text: "I couldn't complete that: the language model is not responding right now.",
                warnings: [],
            });
        });

        it('reports an unreadable system prompt as internal_error without calling the model', async () => {
            prompts = new PromptService(undefined, { readFileFn: async () => { throw new Error('EACCES'); } });
            const llm = new ScriptedLLM([final('unused')]);

            const outcome = await agentWith(llm).handle('chat-1', 'Hello');

            expect(outcome.kind === 'aborted' && outcome.reason).to.equal('internal_error');
            expect(llm.calls).to.have.length(0);
        });

        it('passes a cache refresh warning along with the answer', async () => {
            const later = new Date(NOW.getTime() + 2 * HOUR);
            cache = new EntityCache(hub, { refreshIntervalMs: HOUR, now: () => later });
            hub.getStates.rejects(new Error('connect ECONNREFUSED'));
            const llm = new ScriptedLLM([final('I cannot see any devices right now.')]);

            const outcome = await agentWith(llm).handle('chat-1', 'What is on?');

            expect(outcome).to.deep.equal({
                kind: 'completed',
                text: 'I cannot see any devices right now.',
                warnings: ['Entity list could not be refreshed (connect ECONNREFUSED); no cached data is available.'],
            });
        });
    });

    describe('token budget', () => {
        function tracker(limits: { dailyTokenLimit: number; warningThreshold: number; hardLimit: boolean }, used: number) {
            const files = inMemoryFiles({
                '/data/usage.json': JSON.stringify({
                    daily: { '2024-05-01': { date: '2024-05-01', inputTokens: used, outputTokens: 0, requests: 3 } },
                }),
            });
            return new UsageTracker(limits, files.readFileFn, files.writeFileFn, () => NOW);
        }

        it('refuses to run when a hard limit is reached', async () => {
            const usage = tracker({ dailyTokenLimit: 100, warningThreshold: 0.8, hardLimit: true }, 150);
            await usage.load('/data/usage.json');
            const llm = new ScriptedLLM([final('unused')]);

            const outcome = await agentWith(llm, {}, usage).handle('chat-1', 'Hello');

            expect(outcome).to.deep.equal({
                kind: 'aborted',
                reason: 'budget',
                text: "I couldn't complete that: today's token budget is used up. Daily token limit reached (150/100). Try again tomorrow.",
                warnings: [],
            });
            expect(llm.calls).to.have.length(0);
        });

        it('warns near the limit and records what the run used', async () => {
            const usage = tracker({ dailyTokenLimit: 1000, warningThreshold: 0.8, hardLimit: true }, 850);
            await usage.load('/data/usage.json');
            const llm = new ScriptedLLM([
                toolCall('call_1', 'get_state', { entity_ref: 'front door' }, { promptTokens: 40, completionTokens: 10 }),
                final('It is locked.', { promptTokens: 60, completionTokens: 5 }),
            ]);

            const outcome = await agentWith(llm, {}, usage).handle('chat-1', 'Is the front door locked?');

            expect(outcome).to.deep.equal({
                kind: 'completed',
                text: 'It is locked.',
                warnings: ['Warning: 85% of daily token budget used (150 tokens remaining)'],
            });
            expect(usage.today()).to.deep.equal({ date: '2024-05-01', inputTokens: 950, outputTokens: 15, requests: 5 });
        });
    });

    describe('runScheduledPrompt', () => {
        it('runs without history and leaves every conversation untouched', async () => {
            const llm = new ScriptedLLM([final('Hello.'), final('Good night routine started.')]);
            const agent = agentWith(llm);
            await agent.handle('cli', 'Hi');

            const outcome = await agent.runScheduledPrompt('Trigger the good night automation');

            expect(outcome).to.deep.equal({ kind: 'completed', text: 'Good night routine started.', warnings: [] });
            expect(llm.calls[1].messages).to.deep.equal([
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: 'Trigger the good night automation' },
            ]);
            expect(conversations.size('cli')).to.equal(2);
        });
    });

    describe('resetConversation', () => {
        it('forgets the chat history', async () => {
            const llm = new ScriptedLLM([final('Hello.')]);
            const agent = agentWith(llm);
            await agent.handle('chat-1', 'Hi');

            agent.resetConversation('chat-1');
            await agent.handle('chat-1', 'Hi again');

            expect(llm.calls[1].messages).to.deep.equal([
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: 'Hi again' },
            ]);
            expect(conversations.history('chat-1').map(t => t.ordinal)).to.deep.equal([0, 1]);
        });
    });
});
