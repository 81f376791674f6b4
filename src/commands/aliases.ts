import { AliasStore, normalizeNickname } from '../memory/AliasStore';
import { say } from '../utils';

/**
 * Lists learned aliases, or deletes one when `remove` is given.
 *
 * @returns false when the alias to remove does not exist
 */
export async function runAliases(aliases: AliasStore, remove?: string): Promise<boolean> {
    if (remove === undefined) {
        say(aliases.summary());
        return true;
    }
    const removed = await aliases.forget(remove);
    say(removed
        ? `Forgot alias '${normalizeNickname(remove)}'.`
        : `No alias named '${normalizeNickname(remove)}'.`);
    return removed;
}
