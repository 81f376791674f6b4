import { HubError, HubState, IHubClient, domainOf, friendlyNameOf } from '../hub/hubTypes';
import { dbg, errorMessage, say } from '../utils';

/**
 * A hub entity as seen at the time of the snapshot that holds it.
 */
export interface Entity {
    /** Canonical `<domain>.<slug>` id, the only stable identifier. */
    id: string;
    /** Display name (the hub's friendly_name, or the id when it has none). */
    name: string;
    domain: string;
    state: string;
    attributes: Readonly<Record<string, unknown>>;
    lastChanged?: string;
    /** When the snapshot holding this entity was fetched. */
    observedAt: Date;
}

export interface CacheSnapshot {
    readonly entities: ReadonlyMap<string, Entity>;
    readonly lastRefresh: Date | null;
    readonly refreshIntervalMs: number;
}

export type RefreshResult =
    | { ok: true; snapshot: CacheSnapshot }
    | { ok: false; error: HubError; snapshot: CacheSnapshot };

export interface EntityCacheOptions {
    refreshIntervalMs: number;
    now?: () => Date;
}

function buildSnapshot(states: HubState[], observedAt: Date, refreshIntervalMs: number): CacheSnapshot {
    const entities = new Map<string, Entity>();
    for (const state of states) {
        entities.set(state.entity_id, Object.freeze({
            id: state.entity_id,
            name: friendlyNameOf(state),
            domain: domainOf(state.entity_id),
            state: state.state,
            attributes: Object.freeze({ ...state.attributes }),
            lastChanged: state.last_changed,
            observedAt,
        }));
    }
    return Object.freeze({ entities, lastRefresh: observedAt, refreshIntervalMs });
}

/**
 * Point-in-time copy of every entity the hub exposes.
 *
 * The snapshot is replaced wholesale: readers holding the previous one keep a
 * consistent view, and a failed refresh leaves it in place. At most one fetch
 * is in flight; concurrent refresh requests share it.
 */
export class EntityCache {
    private snapshot: CacheSnapshot;
    private inFlight: Promise<RefreshResult> | null = null;
    private timer: NodeJS.Timeout | null = null;
    private readonly refreshIntervalMs: number;
    private readonly now: () => Date;

    constructor(private readonly hub: Pick<IHubClient, 'getStates'>, options: EntityCacheOptions) {
        this.refreshIntervalMs = options.refreshIntervalMs;
        this.now = options.now ?? (() => new Date());
        this.snapshot = Object.freeze({ entities: new Map<string, Entity>(), lastRefresh: null, refreshIntervalMs: this.refreshIntervalMs });
    }

    getAll(): CacheSnapshot {
        return this.snapshot;
    }

    get(entityId: string): Entity | undefined {
        return this.snapshot.entities.get(entityId);
    }

    isStale(): boolean {
        const lastRefresh = this.snapshot.lastRefresh;
        if (!lastRefresh) {
            return true;
        }
        return this.now().getTime() - lastRefresh.getTime() >= this.refreshIntervalMs;
    }

    refresh(): Promise<RefreshResult> {
        if (this.inFlight) {
            dbg('EntityCache: refresh already in flight, joining it.');
            return this.inFlight;
        }
        this.inFlight = this.fetchSnapshot().finally(() => {
            this.inFlight = null;
        });
        return this.inFlight;
    }

    /**
     * Refreshes only when the snapshot is stale. A failed refresh is not fatal:
     * the stale snapshot keeps serving and the failure comes back as a warning.
     */
    async refreshIfStale(): Promise<string | undefined> {
        if (!this.isStale()) {
            return undefined;
        }
        const result = await this.refresh();
        if (result.ok) {
            return undefined;
        }
        const fallback = result.snapshot.lastRefresh
            ? `using cached data from ${result.snapshot.lastRefresh.toISOString()}`
            : 'no cached data is available';
        return `Entity list could not be refreshed (${result.error.message}); ${fallback}.`;
    }

    start(): void {
        if (this.timer) {
            return;
        }
        this.timer = setInterval(() => {
            this.refresh().then(result => {
                if (!result.ok) {
                    console.warn(`EntityCache: background refresh failed: ${result.error.message}`);
                }
            }, error => console.error('EntityCache: background refresh crashed:', error));
        }, this.refreshIntervalMs);
        this.timer.unref();
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    /** Entities of one domain, sorted by id. */
    listDomain(domain: string): Entity[] {
        return [...this.snapshot.entities.values()]
            .filter(e => e.domain === domain)
            .sort((a, b) => a.id.localeCompare(b.id));
    }

    entitySummary(): string {
        const counts = new Map<string, number>();
        for (const entity of this.snapshot.entities.values()) {
            counts.set(entity.domain, (counts.get(entity.domain) ?? 0) + 1);
        }
        if (counts.size === 0) {
            return 'No entities cached.';
        }
        const parts = [...counts.entries()]
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([domain, count]) => `${count} ${domain}`);
        return `Cached entities: ${parts.join(', ')}`;
    }

    private async fetchSnapshot(): Promise<RefreshResult> {
        say('Refreshing hub entity cache...');
        try {
            const states = await this.hub.getStates();
            const next = buildSnapshot(states, this.now(), this.refreshIntervalMs);
            this.snapshot = next;
            dbg(`EntityCache: refreshed with ${next.entities.size} entities.`);
            return { ok: true, snapshot: next };
        } catch (error) {
            const hubError = error instanceof HubError ? error : new HubError('Unreachable', errorMessage(error));
            console.warn(`EntityCache: refresh failed, keeping previous snapshot: ${hubError.message}`);
            return { ok: false, error: hubError, snapshot: this.snapshot };
        }
    }
}
