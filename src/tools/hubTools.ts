import { z } from 'zod';
import { EntityCache } from '../cache/EntityCache';
import { EntityResolver } from '../resolver/EntityResolver';
import { AliasStore } from '../memory/AliasStore';
import { HubState, IHubClient, domainOf, friendlyNameOf } from '../hub/hubTypes';
import { errorMessage } from '../utils';
import { defineTool, outcomeFromError } from './ToolRegistry';
import { RegisteredTool, ToolOutcome, failed, ok, validationError } from './toolTypes';

export interface HubToolDeps {
    hub: IHubClient;
    cache: EntityCache;
    resolver: EntityResolver;
    aliases: AliasStore;
    now?: () => Date;
}

const LIST_LIMIT = 25;
const HISTORY_SAMPLE = 10;
const DEFAULT_HISTORY_HOURS = 24;

export const CLIMATE_ATTRIBUTES = [
    'temperature',
    'target_temp_high',
    'target_temp_low',
    'hvac_mode',
    'fan_mode',
    'preset_mode',
    'humidity',
    'swing_mode',
] as const;

const ClimateAttributesSchema = z.object({
    temperature: z.number().optional(),
    target_temp_high: z.number().optional(),
    target_temp_low: z.number().optional(),
    hvac_mode: z.string().min(1).optional(),
    fan_mode: z.string().min(1).optional(),
    preset_mode: z.string().min(1).optional(),
    humidity: z.number().min(0).max(100).optional(),
    swing_mode: z.string().min(1).optional(),
});

type ClimateAttributes = z.infer<typeof ClimateAttributesSchema>;

const EntityRefInput = z.object({ entity_ref: z.string().trim().min(1) });

const entityRefProperty = {
    type: 'string',
    description: "The entity id (e.g. 'light.living_room') or the user's name for it (e.g. 'foyer light')",
};

const entityRefParameters = {
    type: 'object',
    properties: { entity_ref: entityRefProperty },
    required: ['entity_ref'],
};

type Resolved =
    | { ok: true; entityId: string; via: string; warnings: string[] }
    | { ok: false; outcome: ToolOutcome };

function changedIds(states: HubState[]): string[] {
    return states.map(s => s.entity_id);
}

/**
 * Climate attributes grouped into the hub services that set them, in call order.
 */
export function climateServiceCalls(attributes: ClimateAttributes): Array<{ service: string; data: Record<string, unknown> }> {
    const calls: Array<{ service: string; data: Record<string, unknown> }> = [];
    const { temperature, target_temp_high, target_temp_low, hvac_mode, fan_mode, preset_mode, humidity, swing_mode } = attributes;

    const temperatureData: Record<string, unknown> = {};
    if (temperature !== undefined) temperatureData.temperature = temperature;
    if (target_temp_high !== undefined) temperatureData.target_temp_high = target_temp_high;
    if (target_temp_low !== undefined) temperatureData.target_temp_low = target_temp_low;

    if (Object.keys(temperatureData).length > 0) {
        if (hvac_mode !== undefined) temperatureData.hvac_mode = hvac_mode;
        calls.push({ service: 'set_temperature', data: temperatureData });
    } else if (hvac_mode !== undefined) {
        calls.push({ service: 'set_hvac_mode', data: { hvac_mode } });
    }
    if (fan_mode !== undefined) calls.push({ service: 'set_fan_mode', data: { fan_mode } });
    if (preset_mode !== undefined) calls.push({ service: 'set_preset_mode', data: { preset_mode } });
    if (humidity !== undefined) calls.push({ service: 'set_humidity', data: { humidity } });
    if (swing_mode !== undefined) calls.push({ service: 'set_swing_mode', data: { swing_mode } });
    return calls;
}

/**
 * Builds the hub tool catalogue. Every tool that takes an entity reference
 * refreshes a stale cache first, then resolves the reference; only an exact,
 * aliased or single fuzzy match reaches the hub.
 */
export function createHubTools(deps: HubToolDeps): RegisteredTool[] {
    const { hub, cache, resolver, aliases } = deps;
    const now = deps.now ?? (() => new Date());

    async function resolveRef(reference: string): Promise<Resolved> {
        const warnings: string[] = [];
        const warning = await cache.refreshIfStale();
        if (warning) {
            warnings.push(warning);
        }

        const result = resolver.resolve(reference);
        switch (result.kind) {
            case 'Exact':
            case 'Aliased':
            case 'Matched':
                return { ok: true, entityId: result.entityId, via: result.kind, warnings };
            case 'Ambiguous':
                return {
                    ok: false,
                    outcome: failed({
                        kind: 'ResolutionError',
                        reason: 'Ambiguous',
                        reference,
                        candidates: result.candidates,
                        message: `'${reference}' matches several entities: ${result.candidates.map(c => `${c.name} (${c.entityId})`).join(', ')}. Ask the user which one they mean.`,
                    }, warnings),
                };
            case 'Stale':
                return {
                    ok: false,
                    outcome: failed({
                        kind: 'ResolutionError',
                        reason: 'Stale',
                        reference,
                        entityId: result.entityId,
                        message: `The alias '${reference}' points to ${result.entityId}, which the hub no longer reports.`,
                    }, warnings),
                };
            case 'NotFound':
                return {
                    ok: false,
                    outcome: failed({
                        kind: 'ResolutionError',
                        reason: 'NotFound',
                        reference,
                        message: `No entity matches '${reference}'. List a domain with list_entities to find it.`,
                    }, warnings),
                };
        }
    }

    /**
     * Runs the hub or alias-store part of a tool; a failure becomes an error
     * outcome that still carries the warnings gathered before it.
     */
    async function withWarnings(tool: string, warnings: string[], action: () => Promise<ToolOutcome>): Promise<ToolOutcome> {
        try {
            return await action();
        } catch (error) {
            console.error(`Tool execution error (${tool}): ${errorMessage(error)}`);
            return outcomeFromError(error, warnings);
        }
    }

    function wrongDomain(entityId: string, expected: string, tool: string): ToolOutcome | null {
        const domain = domainOf(entityId);
        return domain === expected
            ? null
            : validationError(`${tool} only works on ${expected} entities, but ${entityId} is a ${domain || 'unknown'} entity.`);
    }

    async function simpleService(
        entityRef: string,
        service: string,
        action: string,
        signal: AbortSignal | undefined,
        options: { domain?: string; tool?: string; data?: Record<string, unknown> } = {}
    ): Promise<ToolOutcome> {
        const resolved = await resolveRef(entityRef);
        if (!resolved.ok) {
            return resolved.outcome;
        }
        if (options.domain && options.tool) {
            const mismatch = wrongDomain(resolved.entityId, options.domain, options.tool);
            if (mismatch) {
                return mismatch;
            }
        }
        const domain = options.domain ?? domainOf(resolved.entityId);
        return withWarnings(service, resolved.warnings, async () => {
            const changed = await hub.callService(domain, service, { ...options.data, entity_id: resolved.entityId }, signal);
            return ok({
                success: true,
                action,
                entity_id: resolved.entityId,
                resolved_via: resolved.via,
                changed: changedIds(changed),
            }, resolved.warnings);
        });
    }

    return [
        defineTool({
            name: 'get_state',
            description: 'Get the current state of an entity: whether a light is on, a door locked, a sensor value, etc.',
            parameters: entityRefParameters,
            input: EntityRefInput,
            handler: async ({ entity_ref }, { signal }) => {
                const resolved = await resolveRef(entity_ref);
                if (!resolved.ok) {
                    return resolved.outcome;
                }
                return withWarnings('get_state', resolved.warnings, async () => {
                    const state = await hub.getState(resolved.entityId, signal);
                    return ok({
                        entity_id: state.entity_id,
                        name: friendlyNameOf(state),
                        state: state.state,
                        attributes: state.attributes,
                        last_changed: state.last_changed ?? null,
                        resolved_via: resolved.via,
                    }, resolved.warnings);
                });
            },
        }),

        defineTool({
            name: 'list_entities',
            description: `List cached entities of one domain (at most ${LIST_LIMIT}). Domains include light, switch, lock, sensor, binary_sensor, climate, cover, media_player, automation, script.`,
            parameters: {
                type: 'object',
                properties: { domain: { type: 'string', description: "The domain to list, e.g. 'lock' or 'climate'" } },
                required: ['domain'],
            },
            input: z.object({ domain: z.string().trim().toLowerCase().min(1) }),
            handler: async ({ domain }) => {
                const warning = await cache.refreshIfStale();
                const entities = cache.listDomain(domain);
                const shown = entities.slice(0, LIST_LIMIT);
                const data: Record<string, unknown> = {
                    domain,
                    total_count: entities.length,
                    showing: shown.length,
                    entities: shown.map(e => ({ entity_id: e.id, name: e.name, state: e.state })),
                };
                if (entities.length > LIST_LIMIT) {
                    data.note = `Showing the first ${LIST_LIMIT} of ${entities.length}. Use get_state with a specific name for the others.`;
                }
                return ok(data, warning ? [warning] : []);
            },
        }),

        defineTool({
            name: 'turn_on',
            description: 'Turn on a light, switch or other entity that supports being turned on.',
            parameters: {
                type: 'object',
                properties: {
                    entity_ref: entityRefProperty,
                    brightness_pct: { type: 'number', description: 'Light brightness, 0-100' },
                    color_temp_kelvin: { type: 'number', description: 'Light colour temperature in Kelvin' },
                },
                required: ['entity_ref'],
            },
            input: EntityRefInput.extend({
                brightness_pct: z.number().min(0).max(100).optional(),
                color_temp_kelvin: z.number().positive().optional(),
            }),
            handler: async ({ entity_ref, brightness_pct, color_temp_kelvin }, { signal }) => {
                const data: Record<string, unknown> = {};
                if (brightness_pct !== undefined) data.brightness_pct = brightness_pct;
                if (color_temp_kelvin !== undefined) data.color_temp_kelvin = color_temp_kelvin;
                return simpleService(entity_ref, 'turn_on', 'turned on', signal, { data });
            },
        }),

        defineTool({
            name: 'turn_off',
            description: 'Turn off a light, switch or other entity that supports being turned off.',
            parameters: entityRefParameters,
            input: EntityRefInput,
            handler: async ({ entity_ref }, { signal }) => simpleService(entity_ref, 'turn_off', 'turned off', signal),
        }),

        defineTool({
            name: 'toggle',
            description: 'Toggle an entity between on and off.',
            parameters: entityRefParameters,
            input: EntityRefInput,
            handler: async ({ entity_ref }, { signal }) => simpleService(entity_ref, 'toggle', 'toggled', signal),
        }),

        defineTool({
            name: 'call_service',
            description: 'Call any hub service directly, for operations no other tool covers.',
            parameters: {
                type: 'object',
                properties: {
                    domain: { type: 'string', description: "Service domain, e.g. 'light', 'script', 'scene'" },
                    service: { type: 'string', description: "Service name, e.g. 'turn_on', 'activate'" },
                    entity_ref: { ...entityRefProperty, description: 'Optional target entity id or name' },
                    data: { type: 'object', description: 'Optional service data' },
                },
                required: ['domain', 'service'],
            },
            input: z.object({
                domain: z.string().regex(/^[a-z0-9_]+$/, 'must be a lower-case domain name'),
                service: z.string().regex(/^[a-z0-9_]+$/, 'must be a lower-case service name'),
                entity_ref: z.string().trim().min(1).optional(),
                data: z.record(z.unknown()).optional(),
            }),
            handler: async ({ domain, service, entity_ref, data }, { signal }) => {
                const payload: Record<string, unknown> = { ...data };
                let warnings: string[] = [];
                let via: string | undefined;
                if (entity_ref !== undefined) {
                    const resolved = await resolveRef(entity_ref);
                    if (!resolved.ok) {
                        return resolved.outcome;
                    }
                    payload.entity_id = resolved.entityId;
                    warnings = resolved.warnings;
                    via = resolved.via;
                }
                return withWarnings('call_service', warnings, async () => {
                    const changed = await hub.callService(domain, service, payload, signal);
                    return ok({
                        success: true,
                        domain,
                        service,
                        entity_id: payload.entity_id ?? null,
                        resolved_via: via ?? null,
                        changed: changedIds(changed),
                    }, warnings);
                });
            },
        }),

        defineTool({
            name: 'list_services',
            description: 'List the services the hub offers, for one domain or for all of them. Use it before call_service when unsure a service exists.',
            parameters: {
                type: 'object',
                properties: { domain: { type: 'string', description: "Optional domain, e.g. 'light' or 'script'" } },
            },
            input: z.object({ domain: z.string().trim().toLowerCase().min(1).optional() }),
            handler: async ({ domain }, { signal }) => withWarnings('list_services', [], async () => {
                const services = await hub.getServices(signal);
                if (domain === undefined) {
                    return ok({ services });
                }
                const forDomain = services[domain];
                if (forDomain === undefined) {
                    return validationError(`The hub offers no services in the '${domain}' domain.`);
                }
                return ok({ domain, services: forDomain });
            }),
        }),

        defineTool({
            name: 'lock',
            description: 'Lock a lock entity.',
            parameters: entityRefParameters,
            input: EntityRefInput,
            handler: async ({ entity_ref }, { signal }) =>
                simpleService(entity_ref, 'lock', 'locked', signal, { domain: 'lock', tool: 'lock' }),
        }),

        defineTool({
            name: 'unlock',
            description: 'Unlock a lock entity.',
            parameters: entityRefParameters,
            input: EntityRefInput,
            handler: async ({ entity_ref }, { signal }) =>
                simpleService(entity_ref, 'unlock', 'unlocked', signal, { domain: 'lock', tool: 'unlock' }),
        }),

        defineTool({
            name: 'set_climate',
            description: `Change thermostat settings. Supported attributes: ${CLIMATE_ATTRIBUTES.join(', ')}.`,
            parameters: {
                type: 'object',
                properties: {
                    entity_ref: entityRefProperty,
                    attributes: {
                        type: 'object',
                        description: 'Attributes to set, e.g. {"temperature": 21, "hvac_mode": "heat"}',
                        properties: {
                            temperature: { type: 'number' },
                            target_temp_high: { type: 'number' },
                            target_temp_low: { type: 'number' },
                            hvac_mode: { type: 'string', description: 'heat, cool, heat_cool, auto, dry, fan_only or off' },
                            fan_mode: { type: 'string' },
                            preset_mode: { type: 'string' },
                            humidity: { type: 'number' },
                            swing_mode: { type: 'string' },
                        },
                    },
                },
                required: ['entity_ref', 'attributes'],
            },
            input: EntityRefInput.extend({ attributes: z.record(z.unknown()) }),
            handler: async ({ entity_ref, attributes }, { signal }) => {
                const allowed: readonly string[] = CLIMATE_ATTRIBUTES;
                const unsupported = Object.keys(attributes).filter(key => !allowed.includes(key));
                if (unsupported.length > 0) {
                    return validationError(
                        `Unsupported climate attributes: ${unsupported.join(', ')}. Allowed: ${CLIMATE_ATTRIBUTES.join(', ')}.`
                    );
                }
                const parsed = ClimateAttributesSchema.safeParse(attributes);
                if (!parsed.success) {
                    return validationError(
                        'Invalid climate attribute values.',
                        parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
                    );
                }
                const calls = climateServiceCalls(parsed.data);
                if (calls.length === 0) {
                    return validationError('set_climate needs at least one attribute to set.');
                }

                const resolved = await resolveRef(entity_ref);
                if (!resolved.ok) {
                    return resolved.outcome;
                }
                const mismatch = wrongDomain(resolved.entityId, 'climate', 'set_climate');
                if (mismatch) {
                    return mismatch;
                }

                return withWarnings('set_climate', resolved.warnings, async () => {
                    const servicesCalled: string[] = [];
                    for (const call of calls) {
                        await hub.callService('climate', call.service, { ...call.data, entity_id: resolved.entityId }, signal);
                        servicesCalled.push(`climate.${call.service}`);
                    }
                    return ok({
                        success: true,
                        entity_id: resolved.entityId,
                        resolved_via: resolved.via,
                        services_called: servicesCalled,
                    }, resolved.warnings);
                });
            },
        }),

        defineTool({
            name: 'get_history',
            description: 'Get the state history of an entity over the past N hours (default 24).',
            parameters: {
                type: 'object',
                properties: {
                    entity_ref: entityRefProperty,
                    hours: { type: 'integer', description: `Hours of history to fetch (default ${DEFAULT_HISTORY_HOURS}, max 168)` },
                },
                required: ['entity_ref'],
            },
            input: EntityRefInput.extend({
                hours: z.number().int().min(1).max(168).default(DEFAULT_HISTORY_HOURS),
            }),
            handler: async ({ entity_ref, hours }, { signal }) => {
                const resolved = await resolveRef(entity_ref);
                if (!resolved.ok) {
                    return resolved.outcome;
                }
                const start = new Date(now().getTime() - hours * 3600 * 1000);
                return withWarnings('get_history', resolved.warnings, async () => {
                    const history = await hub.getHistory(resolved.entityId, start, undefined, signal);
                    const states = history[0] ?? [];
                    return ok({
                        entity_id: resolved.entityId,
                        hours,
                        state_changes: states.length,
                        recent_states: states.slice(-HISTORY_SAMPLE).map(s => ({ state: s.state, last_changed: s.last_changed ?? null })),
                    }, resolved.warnings);
                });
            },
        }),

        defineTool({
            name: 'trigger_automation',
            description: 'Trigger an automation.',
            parameters: entityRefParameters,
            input: EntityRefInput,
            handler: async ({ entity_ref }, { signal }) =>
                simpleService(entity_ref, 'trigger', 'triggered', signal, { domain: 'automation', tool: 'trigger_automation' }),
        }),

        defineTool({
            name: 'remember_alias',
            description: "Remember the user's nickname for an entity so it resolves directly next time. Call it after you worked out which entity a nickname meant.",
            parameters: {
                type: 'object',
                properties: {
                    nickname: { type: 'string', description: "The user's name for the entity, e.g. 'foyer light'" },
                    entity_id: { type: 'string', description: 'The canonical entity id' },
                },
                required: ['nickname', 'entity_id'],
            },
            input: z.object({
                nickname: z.string().trim().min(1),
                entity_id: z.string().trim().min(1),
            }),
            handler: async ({ nickname, entity_id }) => {
                const warning = await cache.refreshIfStale();
                const warnings = warning ? [warning] : [];
                const entity = cache.get(entity_id);
                if (!entity) {
                    return failed({
                        kind: 'ResolutionError',
                        reason: 'NotFound',
                        reference: entity_id,
                        message: `Cannot remember '${nickname}': ${entity_id} is not a known entity id.`,
                    }, warnings);
                }
                return withWarnings('remember_alias', warnings, async () => {
                    const alias = await aliases.remember(nickname, entity.id);
                    return ok({
                        success: true,
                        nickname: alias.nickname,
                        entity_id: alias.entityId,
                        message: `I'll remember that '${alias.nickname}' refers to ${entity.name}.`,
                    }, warnings);
                });
            },
        }),

        defineTool({
            name: 'list_aliases',
            description: 'List all learned entity nicknames.',
            parameters: { type: 'object', properties: {} },
            input: z.object({}),
            handler: async () => {
                const all = aliases.all();
                return ok({
                    count: all.length,
                    aliases: all.map(a => ({ nickname: a.nickname, entity_id: a.entityId, created_at: a.createdAt })),
                });
            },
        }),
    ];
}
