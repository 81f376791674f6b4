import * as uuid from 'uuid';
import { RunnableConfig } from '@langchain/core/runnables';
import * as fsPromises from 'fs/promises';
import * as path from 'path';

export type ReadFileFn = (path: string) => Promise<string>;
export type WriteFileFn = (path: string, data: string) => Promise<void>;

export interface AgentGraphConfigurable {
    run_id: string;
    signal?: AbortSignal;
}

export interface AgentRunnableConfig extends RunnableConfig {
    configurable: AgentGraphConfigurable;
}

export function dbg(s: string) {
    console.debug(s);
}

export function say(s: string) {
    console.log(s);
}

/**
 * Creates the configuration object for a single agent graph run.
 * Every run gets a fresh id so its log lines can be correlated.
 *
 * @param signal - Cancels outstanding LLM and hub calls of the run when aborted.
 * @param recursionLimit - Upper bound on graph steps, derived from the tool round limit.
 */
export function newRunConfig(signal?: AbortSignal, recursionLimit?: number): AgentRunnableConfig {
    const run_id = uuid.v4();
    const configurable: AgentGraphConfigurable = { run_id, signal };
    return recursionLimit ? { configurable, recursionLimit } : { configurable };
}

/**
 * Reads the run's abort signal back out of a graph node's config.
 */
export function runSignal(config?: RunnableConfig): AbortSignal | undefined {
    const signal: unknown = config?.configurable?.signal;
    return signal instanceof AbortSignal ? signal : undefined;
}

export function runId(config?: RunnableConfig): string {
    const id: unknown = config?.configurable?.run_id;
    return typeof id === 'string' ? id : 'unknown-run';
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isFileNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export const readTextFile: ReadFileFn = (filePath: string) => fsPromises.readFile(filePath, 'utf-8');

/**
 * Writes a file, creating its parent directory first.
 * Errors are logged and re-thrown so the caller decides how to surface them.
 */
export async function writeTextFile(filePath: string, data: string): Promise<void> {
    try {
        await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
        await fsPromises.writeFile(filePath, data, 'utf-8');
    } catch (error) {
        console.error(`Error saving output to ${filePath}:`, error);
        throw error;
    }
}
