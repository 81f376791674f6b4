import { EntityCache } from '../cache/EntityCache';
import { say } from '../utils';

/**
 * Forces an entity cache refresh and prints what the hub reported.
 *
 * @throws the hub error when the refresh fails
 */
export async function runRefresh(cache: EntityCache): Promise<void> {
    const result = await cache.refresh();
    if (!result.ok) {
        throw result.error;
    }
    say(cache.entitySummary());
}
