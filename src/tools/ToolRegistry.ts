import { z } from 'zod';
import { HubError } from '../hub/hubTypes';
import { PersistError } from '../memory/AliasStore';
import { dbg, errorMessage } from '../utils';
import {
    RegisteredTool,
    ToolContext,
    ToolDefinition,
    ToolOutcome,
    ToolSchema,
    failed,
    validationError,
} from './toolTypes';

/**
 * Erases a tool's argument type behind a validating `run`.
 * Arguments failing the tool's zod schema come back as a ValidationError outcome.
 */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
    return {
        name: definition.name,
        description: definition.description,
        parameters: definition.parameters,
        run: async (args: unknown, context: ToolContext) => {
            const parsed = definition.input.safeParse(args);
            if (!parsed.success) {
                return validationError(
                    `Invalid arguments for ${definition.name}.`,
                    parsed.error.issues.map(issue => `${issue.path.join('.') || '(arguments)'}: ${issue.message}`)
                );
            }
            return definition.handler(parsed.data, context);
        },
    };
}

export function outcomeFromError(error: unknown, warnings: string[] = []): ToolOutcome {
    if (error instanceof HubError) {
        return failed(error.status === undefined
            ? { kind: 'HubError', reason: error.reason, message: error.message }
            : { kind: 'HubError', reason: error.reason, message: error.message, status: error.status }, warnings);
    }
    if (error instanceof PersistError) {
        return failed({ kind: 'PersistError', message: error.message }, warnings);
    }
    return failed({ kind: 'InternalError', message: errorMessage(error) }, warnings);
}

/**
 * Renders an outcome as the text handed back to the model.
 */
export function formatToolResult(outcome: ToolOutcome): string {
    return JSON.stringify(outcome, null, 2);
}

/**
 * The fixed catalogue of operations the model may request.
 * `execute` always resolves: unknown tools, malformed arguments and handler
 * failures all come back as structured outcomes.
 */
export class ToolRegistry {
    private readonly tools = new Map<string, RegisteredTool>();

    constructor(tools: RegisteredTool[]) {
        for (const tool of tools) {
            if (this.tools.has(tool.name)) {
                throw new Error(`Duplicate tool name: ${tool.name}`);
            }
            this.tools.set(tool.name, tool);
        }
    }

    names(): string[] {
        return [...this.tools.keys()];
    }

    schemas(): ToolSchema[] {
        return [...this.tools.values()].map(({ name, description, parameters }) => ({ name, description, parameters }));
    }

    /**
     * @param rawArguments JSON text as sent by the model, or an already parsed object
     */
    async execute(name: string, rawArguments: string | Record<string, unknown>, context: ToolContext = {}): Promise<ToolOutcome> {
        const tool = this.tools.get(name);
        if (!tool) {
            return validationError(`Unknown tool: ${name}. Available tools: ${this.names().join(', ')}`);
        }

        let args: unknown = rawArguments;
        if (typeof rawArguments === 'string') {
            try {
                args = rawArguments.trim() === '' ? {} : JSON.parse(rawArguments);
            } catch (error) {
                return validationError(`Arguments for ${name} are not valid JSON: ${errorMessage(error)}`);
            }
        }

        try {
            const outcome = await tool.run(args, context);
            dbg(`Tool ${name} -> ${outcome.status}`);
            return outcome;
        } catch (error) {
            console.error(`Tool execution error (${name}): ${errorMessage(error)}`);
            return outcomeFromError(error);
        }
    }
}
