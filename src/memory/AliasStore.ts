import * as path from 'path';
import { Alias, AliasFile, AliasFileSchema, DEFAULT_ALIAS_FILE } from './memory_types';
import { domainOf } from '../hub/hubTypes';
import { ReadFileFn, WriteFileFn, dbg, errorMessage, isFileNotFound, readTextFile, say, writeTextFile } from '../utils';

/**
 * Raised when an alias could not be written to disk. The alias is not kept.
 */
export class PersistError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PersistError';
    }
}

export function normalizeNickname(nickname: string): string {
    return nickname.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Learned nickname → entity id bindings, persisted as a JSON file.
 *
 * Lookups are served from memory. Writes go through a single queue so two
 * `remember` calls never interleave their file writes; lookups never wait on it.
 * Each write holds what earlier writes committed plus its own change, so a
 * binding whose write failed never reaches the file through a later write.
 */
export class AliasStore {
    private aliasFilePath: string | null = null;
    private aliases = new Map<string, Alias>();
    /** What the file holds after the last successful write. */
    private persisted = new Map<string, Alias>();
    private writeQueue: Promise<void> = Promise.resolve();
    private readonly readFile: ReadFileFn;
    private readonly writeFile: WriteFileFn;
    private readonly now: () => Date;

    constructor(
        readFileFn: ReadFileFn = readTextFile,
        writeFileFn: WriteFileFn = writeTextFile,
        now: () => Date = () => new Date()
    ) {
        this.readFile = readFileFn;
        this.writeFile = writeFileFn;
        this.now = now;
    }

    /**
     * Loads aliases from the given file. A missing file means no aliases yet;
     * any other read or parse error is thrown.
     */
    async load(filePath: string): Promise<void> {
        this.aliasFilePath = path.resolve(filePath);
        dbg(`AliasStore: loading aliases from ${this.aliasFilePath}`);
        let data: string;
        try {
            data = await this.readFile(this.aliasFilePath);
        } catch (error) {
            if (isFileNotFound(error)) {
                dbg(`AliasStore: no alias file at ${this.aliasFilePath}, starting empty.`);
                this.aliases = new Map();
                this.persisted = new Map();
                return;
            }
            console.error(`AliasStore: error loading alias file ${this.aliasFilePath}:`, error);
            throw error;
        }

        const parsed = AliasFileSchema.safeParse(JSON.parse(data));
        if (!parsed.success) {
            throw new Error(`AliasStore: alias file ${this.aliasFilePath} is malformed: ${parsed.error.issues.map(i => i.message).join('; ')}`);
        }
        this.aliases = new Map(
            Object.entries(parsed.data.aliases).map(([nickname, entry]) => [
                nickname,
                { nickname, entityId: entry.entityId, createdAt: entry.createdAt },
            ])
        );
        this.persisted = new Map(this.aliases);
        say(`Loaded ${this.aliases.size} aliases.`);
    }

    lookup(nickname: string): string | undefined {
        return this.aliases.get(normalizeNickname(nickname))?.entityId;
    }

    /**
     * Binds a nickname to an entity id (last write wins) and persists the
     * change before resolving. On a write failure the binding on file is
     * restored and a {@link PersistError} is thrown.
     */
    async remember(nickname: string, entityId: string): Promise<Alias> {
        const key = normalizeNickname(nickname);
        if (!key) {
            throw new Error('Alias nickname must not be empty.');
        }
        const alias: Alias = { nickname: key, entityId, createdAt: this.now().toISOString() };
        this.aliases.set(key, alias);

        try {
            await this.enqueueSave(key, alias);
        } catch (error) {
            if (this.aliases.get(key) === alias) {
                this.restoreFromFile(key);
            }
            throw new PersistError(`Could not save alias '${key}': ${errorMessage(error)}`);
        }
        dbg(`AliasStore: learned '${key}' -> ${entityId}`);
        return alias;
    }

    /** Removes an alias. Only the administrative CLI calls this. */
    async forget(nickname: string): Promise<boolean> {
        const key = normalizeNickname(nickname);
        const previous = this.aliases.get(key);
        if (!previous) {
            return false;
        }
        this.aliases.delete(key);
        try {
            await this.enqueueSave(key, null);
        } catch (error) {
            if (!this.aliases.has(key)) {
                this.restoreFromFile(key);
            }
            throw new PersistError(`Could not remove alias '${key}': ${errorMessage(error)}`);
        }
        return true;
    }

    all(): Alias[] {
        return [...this.aliases.values()].sort((a, b) => a.nickname.localeCompare(b.nickname));
    }

    aliasesFor(entityId: string): string[] {
        return this.all().filter(a => a.entityId === entityId).map(a => a.nickname);
    }

    /** One line per domain for the agent's system prompt. */
    summary(): string {
        if (this.aliases.size === 0) {
            return 'No entity aliases learned yet.';
        }
        const byDomain = new Map<string, string[]>();
        for (const alias of this.all()) {
            const domain = domainOf(alias.entityId) || 'other';
            const entries = byDomain.get(domain) ?? [];
            entries.push(`'${alias.nickname}' -> ${alias.entityId}`);
            byDomain.set(domain, entries);
        }
        return [...byDomain.entries()]
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([domain, entries]) => `${domain}: ${entries.join(', ')}`)
            .join('\n');
    }

    private restoreFromFile(key: string): void {
        const onFile = this.persisted.get(key);
        if (onFile) {
            this.aliases.set(key, onFile);
        } else {
            this.aliases.delete(key);
        }
    }

    private toFile(aliases: Map<string, Alias>): AliasFile {
        const file: AliasFile = { ...DEFAULT_ALIAS_FILE, aliases: {} };
        for (const alias of [...aliases.values()].sort((a, b) => a.nickname.localeCompare(b.nickname))) {
            file.aliases[alias.nickname] = { entityId: alias.entityId, createdAt: alias.createdAt };
        }
        return file;
    }

    private enqueueSave(key: string, alias: Alias | null): Promise<void> {
        const save = this.writeQueue.then(() => this.save(key, alias));
        // keep the queue alive after a failed write; the caller sees the failure
        this.writeQueue = save.catch(() => undefined);
        return save;
    }

    /** Writes the committed bindings with one change applied; `null` removes the key. */
    private async save(key: string, alias: Alias | null): Promise<void> {
        if (!this.aliasFilePath) {
            throw new Error('AliasStore: cannot save aliases, file path not set (load was likely not called).');
        }
        const next = new Map(this.persisted);
        if (alias) {
            next.set(key, alias);
        } else {
            next.delete(key);
        }
        await this.writeFile(this.aliasFilePath, JSON.stringify(this.toFile(next), null, 2));
        this.persisted = next;
    }
}
