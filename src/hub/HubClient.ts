import { z } from 'zod';
import {
    HubError,
    HubHistorySchema,
    HubServicesSchema,
    HubState,
    HubStateListSchema,
    HubStateSchema,
    IHubClient,
    reasonForStatus,
} from './hubTypes';
import { dbg, errorMessage } from '../utils';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HubClientOptions {
    baseUrl: string;
    token: string;
    /** Per-request timeout; a request exceeding it fails with a `Timeout` HubError. */
    requestTimeoutMs: number;
    fetchFn?: FetchFn;
}

const ApiStatusSchema = z.unknown();

/**
 * Normalises the configured hub address into the REST base url:
 * adds a scheme when missing and drops trailing slashes or an `/api` suffix.
 */
export function normalizeBaseUrl(baseUrl: string): string {
    let restBaseUrl = baseUrl.trim().replace(/^ws(s?):\/\//, 'http$1://');
    if (!restBaseUrl.startsWith('http://') && !restBaseUrl.startsWith('https://')) {
        restBaseUrl = `http://${restBaseUrl}`;
    }
    restBaseUrl = restBaseUrl.replace(/\/+$/, '');
    restBaseUrl = restBaseUrl.replace(/\/api(\/websocket)?$/, '');
    return restBaseUrl;
}

/**
 * Stateless wrapper over the hub's REST API.
 * Every failure surfaces as a {@link HubError} with a reason the tools can report.
 */
export class HubClient implements IHubClient {
    private readonly baseUrl: string;
    private readonly token: string;
    private readonly requestTimeoutMs: number;
    private readonly fetchFn: FetchFn;

    constructor(options: HubClientOptions) {
        if (!options.token) {
            throw new Error('Hub access token is not configured.');
        }
        this.baseUrl = normalizeBaseUrl(options.baseUrl);
        this.token = options.token;
        this.requestTimeoutMs = options.requestTimeoutMs;
        this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    }

    async getStates(signal?: AbortSignal): Promise<HubState[]> {
        return this.request('GET', 'states', HubStateListSchema, undefined, signal);
    }

    async getState(entityId: string, signal?: AbortSignal): Promise<HubState> {
        return this.request('GET', `states/${encodeURIComponent(entityId)}`, HubStateSchema, undefined, signal);
    }

    /**
     * Calls `POST /services/{domain}/{service}`. The body is the service data as given;
     * callers put `entity_id` into it.
     * @returns the states the hub reports as changed by the call
     */
    async callService(
        domain: string,
        service: string,
        data: Record<string, unknown>,
        signal?: AbortSignal
    ): Promise<HubState[]> {
        const endpoint = `services/${encodeURIComponent(domain)}/${encodeURIComponent(service)}`;
        return this.request('POST', endpoint, HubStateListSchema, data, signal);
    }

    async getHistory(entityId: string, start: Date, end?: Date, signal?: AbortSignal): Promise<HubState[][]> {
        let endpoint = `history/period/${encodeURIComponent(start.toISOString())}?filter_entity_id=${encodeURIComponent(entityId)}`;
        if (end) {
            endpoint += `&end_time=${encodeURIComponent(end.toISOString())}`;
        }
        return this.request('GET', endpoint, HubHistorySchema, undefined, signal);
    }

    async getServices(signal?: AbortSignal): Promise<Record<string, string[]>> {
        const domains = await this.request('GET', 'services', HubServicesSchema, undefined, signal);
        const byDomain: Record<string, string[]> = {};
        for (const entry of domains) {
            byDomain[entry.domain] = Object.keys(entry.services).sort();
        }
        return byDomain;
    }

    async checkConnection(): Promise<boolean> {
        try {
            await this.request('GET', '', ApiStatusSchema);
            return true;
        } catch (error) {
            console.error(`Failed to connect to hub at ${this.baseUrl}: ${errorMessage(error)}`);
            return false;
        }
    }

    private async request<T>(
        method: 'GET' | 'POST',
        endpoint: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        body?: Record<string, unknown>,
        signal?: AbortSignal
    ): Promise<T> {
        const url = `${this.baseUrl}/api/${endpoint}`;
        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.requestTimeoutMs);
        const onRunAbort = () => controller.abort();
        if (signal?.aborted) {
            controller.abort();
        } else {
            signal?.addEventListener('abort', onRunAbort, { once: true });
        }

        dbg(`Hub request: ${method} ${url}`);
        const cancelled = new Promise<never>((_resolve, reject) => {
            if (controller.signal.aborted) {
                reject(new Error('aborted'));
                return;
            }
            controller.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
        // Observed only through the races below; a request that settles first leaves it pending.
        cancelled.catch(() => undefined);
        const failure = (error: unknown): HubError => {
            if (error instanceof HubError) {
                return error;
            }
            if (timedOut) {
                return new HubError('Timeout', `Hub request timed out after ${this.requestTimeoutMs} ms: ${method} /api/${endpoint}`);
            }
            if (controller.signal.aborted) {
                return new HubError('Timeout', `Hub request cancelled: ${method} /api/${endpoint}`);
            }
            return new HubError('Unreachable', `Cannot reach hub at ${this.baseUrl}: ${errorMessage(error)}`);
        };

        try {
            let response: Response;
            try {
                response = await Promise.race([
                    this.fetchFn(url, {
                        method,
                        headers: {
                            'Authorization': `Bearer ${this.token}`,
                            'Content-Type': 'application/json',
                        },
                        body: body === undefined ? undefined : JSON.stringify(body),
                        signal: controller.signal,
                    }),
                    cancelled,
                ]);
            } catch (error) {
                throw failure(error);
            }

            // The body read stays under the same timeout and cancellation as the request.
            let text: string;
            try {
                text = await Promise.race([response.text(), cancelled]);
            } catch (error) {
                if (timedOut || controller.signal.aborted) {
                    throw failure(error);
                }
                throw new HubError('ServerError', `Failed to read hub response for ${method} /api/${endpoint}: ${errorMessage(error)}`, response.status);
            }

            if (!response.ok) {
                throw new HubError(
                    reasonForStatus(response.status),
                    `Hub responded ${response.status} to ${method} /api/${endpoint}${text ? `: ${text}` : ''}`,
                    response.status
                );
            }

            let payload: unknown;
            try {
                payload = JSON.parse(text);
            } catch (error) {
                throw new HubError('ServerError', `Hub returned invalid JSON for ${method} /api/${endpoint}: ${errorMessage(error)}`, response.status);
            }

            const parsed = schema.safeParse(payload);
            if (!parsed.success) {
                throw new HubError('ServerError', `Unexpected hub response for ${method} /api/${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, response.status);
            }
            return parsed.data;
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onRunAbort);
        }
    }
}
