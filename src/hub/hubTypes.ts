import { z } from 'zod';

/**
 * One entity state object as returned by the hub's REST API.
 */
export const HubStateSchema = z.object({
    entity_id: z.string().min(1),
    state: z.string(),
    attributes: z.record(z.unknown()).default({}),
    last_changed: z.string().optional(),
    last_updated: z.string().optional(),
});

export type HubState = z.infer<typeof HubStateSchema>;

export const HubStateListSchema = z.array(HubStateSchema);

/** `/history/period` returns one list of states per requested entity. */
export const HubHistorySchema = z.array(z.array(HubStateSchema));

/** `/services` returns one entry per domain, keyed by service name. */
export const HubServicesSchema = z.array(z.object({
    domain: z.string().min(1),
    services: z.record(z.unknown()).default({}),
}));

export type HubErrorReason = 'Unreachable' | 'Unauthorized' | 'BadRequest' | 'ServerError' | 'Timeout';

/**
 * Raised by the hub client for any failed request. Tool handlers let it propagate
 * and the tool registry turns it into a structured tool outcome.
 */
export class HubError extends Error {
    readonly reason: HubErrorReason;
    readonly status?: number;

    constructor(reason: HubErrorReason, message: string, status?: number) {
        super(message);
        this.name = 'HubError';
        this.reason = reason;
        this.status = status;
    }
}

export function reasonForStatus(status: number): HubErrorReason {
    if (status === 401 || status === 403) return 'Unauthorized';
    if (status >= 500) return 'ServerError';
    return 'BadRequest';
}

/**
 * Typed operations against the hub. Everything else in the agent depends on
 * this interface, not on the HTTP implementation.
 */
export interface IHubClient {
    getStates(signal?: AbortSignal): Promise<HubState[]>;
    getState(entityId: string, signal?: AbortSignal): Promise<HubState>;
    callService(domain: string, service: string, data: Record<string, unknown>, signal?: AbortSignal): Promise<HubState[]>;
    getHistory(entityId: string, start: Date, end?: Date, signal?: AbortSignal): Promise<HubState[][]>;
    /** Service names grouped by domain. */
    getServices(signal?: AbortSignal): Promise<Record<string, string[]>>;
    checkConnection(): Promise<boolean>;
}

export function domainOf(entityId: string): string {
    const dot = entityId.indexOf('.');
    return dot > 0 ? entityId.substring(0, dot) : '';
}

export function friendlyNameOf(state: HubState): string {
    const name = state.attributes['friendly_name'];
    return typeof name === 'string' && name.trim() !== '' ? name : state.entity_id;
}
