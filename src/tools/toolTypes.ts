import { z } from 'zod';
import { Candidate } from '../resolver/EntityResolver';
import { HubErrorReason } from '../hub/hubTypes';

export type ToolError =
    | { kind: 'ResolutionError'; reason: 'NotFound'; message: string; reference: string }
    | { kind: 'ResolutionError'; reason: 'Ambiguous'; message: string; reference: string; candidates: Candidate[] }
    | { kind: 'ResolutionError'; reason: 'Stale'; message: string; reference: string; entityId: string }
    | { kind: 'HubError'; reason: HubErrorReason; message: string; status?: number }
    | { kind: 'ValidationError'; message: string; issues?: string[] }
    | { kind: 'PersistError'; message: string }
    | { kind: 'InternalError'; message: string };

/**
 * What every tool call comes back as. Failures are values, so the model can
 * read them and decide what to do next.
 */
export type ToolOutcome =
    | { status: 'ok'; data: Record<string, unknown>; warnings?: string[] }
    | { status: 'error'; error: ToolError; warnings?: string[] };

export interface ToolContext {
    signal?: AbortSignal;
}

/** The provider-neutral description the LLM sees. */
export interface ToolSchema {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
}

export interface ToolDefinition<S extends z.ZodTypeAny> extends ToolSchema {
    input: S;
    handler: (args: z.infer<S>, context: ToolContext) => Promise<ToolOutcome>;
}

/** A tool with its argument type erased, ready to sit in the registry. */
export interface RegisteredTool extends ToolSchema {
    run(args: unknown, context: ToolContext): Promise<ToolOutcome>;
}

export function ok(data: Record<string, unknown>, warnings: string[] = []): ToolOutcome {
    return warnings.length > 0 ? { status: 'ok', data, warnings } : { status: 'ok', data };
}

export function failed(error: ToolError, warnings: string[] = []): ToolOutcome {
    return warnings.length > 0 ? { status: 'error', error, warnings } : { status: 'error', error };
}

export function validationError(message: string, issues?: string[]): ToolOutcome {
    return failed(issues ? { kind: 'ValidationError', message, issues } : { kind: 'ValidationError', message });
}
