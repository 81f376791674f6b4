import { CacheSnapshot, Entity } from '../cache/EntityCache';
import { dbg } from '../utils';

export interface Candidate {
    entityId: string;
    name: string;
}

export type ResolutionResult =
    | { kind: 'Exact'; entityId: string }
    | { kind: 'Aliased'; entityId: string }
    | { kind: 'Matched'; entityId: string; name: string }
    | { kind: 'Ambiguous'; candidates: Candidate[] }
    | { kind: 'Stale'; entityId: string }
    | { kind: 'NotFound' };

export interface MatchSettings {
    /** Minimum score for a fuzzy candidate to count at all. */
    matchThreshold: number;
    /** Score of a reference found inside a display name or id slug. */
    substringScore: number;
    /** Multiplier on the share of reference tokens found on the entity; kept below `substringScore`. */
    tokenWeight: number;
    /** Candidates this close to the top score are treated as tied. */
    ambiguityMargin: number;
}

export const DEFAULT_MATCH_SETTINGS: MatchSettings = {
    matchThreshold: 0.4,
    substringScore: 0.9,
    tokenWeight: 0.8,
    ambiguityMargin: 0,
};

const STOP_WORDS = new Set(['the', 'a', 'an', 'my']);
const EXACT_SCORE = 1;
const EPSILON = 1e-9;

export function normalizeText(text: string): string {
    return text.toLowerCase().replace(/[_.\-]+/g, ' ').replace(/\s+/g, ' ').trim();
}

function tokensOf(text: string): string[] {
    return normalizeText(text).split(' ').filter(t => t !== '' && !STOP_WORDS.has(t));
}

function slugOf(entity: Entity): string {
    return normalizeText(entity.id.substring(entity.domain.length + 1));
}

/**
 * Scores one entity against a normalised reference. Exact name or slug equality
 * beats containment, which beats token overlap.
 */
export function scoreEntity(reference: string, entity: Entity, settings: MatchSettings): number {
    const name = normalizeText(entity.name);
    const slug = slugOf(entity);
    if (reference === name || reference === slug) {
        return EXACT_SCORE;
    }
    if (reference.length > 0 && (name.includes(reference) || slug.includes(reference))) {
        return settings.substringScore;
    }
    const refTokens = tokensOf(reference);
    if (refTokens.length === 0) {
        return 0;
    }
    const entityTokens = new Set([...tokensOf(entity.name), ...tokensOf(slug), entity.domain]);
    const overlap = refTokens.filter(t => entityTokens.has(t)).length;
    return settings.tokenWeight * (overlap / refTokens.length);
}

/**
 * Maps free text to an entity id, or to the reason it could not.
 *
 * Resolution is read-only and synchronous: it never touches the alias store's
 * contents beyond a lookup and never calls the hub.
 */
export class EntityResolver {
    private readonly settings: MatchSettings;

    constructor(
        private readonly snapshot: () => CacheSnapshot,
        private readonly lookupAlias: (nickname: string) => string | undefined,
        settings: Partial<MatchSettings> = {}
    ) {
        this.settings = { ...DEFAULT_MATCH_SETTINGS, ...settings };
    }

    resolve(reference: string): ResolutionResult {
        const entities = this.snapshot().entities;
        const trimmed = reference.trim();

        if (entities.has(trimmed)) {
            return { kind: 'Exact', entityId: trimmed };
        }

        const aliased = this.lookupAlias(trimmed);
        if (aliased !== undefined) {
            return entities.has(aliased)
                ? { kind: 'Aliased', entityId: aliased }
                : { kind: 'Stale', entityId: aliased };
        }

        return this.fuzzyMatch(normalizeText(trimmed), entities);
    }

    private fuzzyMatch(reference: string, entities: ReadonlyMap<string, Entity>): ResolutionResult {
        const scored: Array<{ entity: Entity; score: number }> = [];
        for (const entity of entities.values()) {
            const score = scoreEntity(reference, entity, this.settings);
            if (score > 0 && score + EPSILON >= this.settings.matchThreshold) {
                scored.push({ entity, score });
            }
        }
        if (scored.length === 0) {
            dbg(`Resolver: no match for '${reference}'`);
            return { kind: 'NotFound' };
        }

        const top = Math.max(...scored.map(s => s.score));
        const tied = scored
            .filter(s => top - s.score <= this.settings.ambiguityMargin + EPSILON)
            .map(s => s.entity)
            .sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id));

        if (tied.length === 1) {
            const [match] = tied;
            dbg(`Resolver: '${reference}' -> ${match.id} (score ${top.toFixed(2)})`);
            return { kind: 'Matched', entityId: match.id, name: match.name };
        }
        dbg(`Resolver: '${reference}' is ambiguous between ${tied.map(e => e.id).join(', ')}`);
        return { kind: 'Ambiguous', candidates: tied.map(e => ({ entityId: e.id, name: e.name })) };
    }
}
