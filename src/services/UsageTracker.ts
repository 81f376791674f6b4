import * as path from 'path';
import { z } from 'zod';
import { TokenUsage } from '../agents/ILLMClient';
import { ReadFileFn, WriteFileFn, dbg, errorMessage, isFileNotFound, readTextFile, writeTextFile } from '../utils';

const DailyUsageSchema = z.object({
    date: z.string(),
    inputTokens: z.number().int().nonnegative(),
    outputTokens: z.number().int().nonnegative(),
    requests: z.number().int().nonnegative(),
});

const UsageFileSchema = z.object({
    daily: z.record(DailyUsageSchema),
});

export type DailyUsage = z.infer<typeof DailyUsageSchema>;

export interface UsageLimits {
    /** Tokens per day; 0 or less disables budgeting. */
    dailyTokenLimit: number;
    /** Share of the limit (0-1) above which a warning is reported. */
    warningThreshold: number;
    /** Refuse runs once the limit is reached. */
    hardLimit: boolean;
}

export interface BudgetCheck {
    allowed: boolean;
    warning?: string;
}

export function totalTokens(usage: DailyUsage): number {
    return usage.inputTokens + usage.outputTokens;
}

function formatCount(n: number): string {
    return n.toLocaleString('en-US');
}

/**
 * Daily token accounting persisted to `usage.json`. Days are keyed by UTC date.
 */
export class UsageTracker {
    private daily = new Map<string, DailyUsage>();
    private filePath?: string;
    private writeQueue: Promise<void> = Promise.resolve();

    constructor(
        private readonly limits: UsageLimits,
        private readonly readFileFn: ReadFileFn = readTextFile,
        private readonly writeFileFn: WriteFileFn = writeTextFile,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Loads earlier usage. A missing or unreadable file starts a fresh record.
     */
    async load(filePath: string): Promise<void> {
        this.filePath = path.resolve(filePath);
        this.daily = new Map();
        let text: string;
        try {
            text = await this.readFileFn(this.filePath);
        } catch (error) {
            if (!isFileNotFound(error)) {
                console.warn(`Failed to read usage data from ${this.filePath}: ${errorMessage(error)}`);
            }
            return;
        }
        try {
            const parsed = UsageFileSchema.parse(JSON.parse(text));
            for (const [day, usage] of Object.entries(parsed.daily)) {
                this.daily.set(day, usage);
            }
            dbg(`Loaded usage data from ${this.filePath}`);
        } catch (error) {
            console.warn(`Ignoring malformed usage data in ${this.filePath}: ${errorMessage(error)}`);
        }
    }

    private todayKey(): string {
        return this.now().toISOString().slice(0, 10);
    }

    today(): DailyUsage {
        const key = this.todayKey();
        return this.daily.get(key) ?? { date: key, inputTokens: 0, outputTokens: 0, requests: 0 };
    }

    /**
     * Adds one model reply to today's totals and persists. A failed write is logged;
     * the in-memory totals still count.
     */
    async record(usage: TokenUsage): Promise<void> {
        const current = this.today();
        const updated: DailyUsage = {
            date: current.date,
            inputTokens: current.inputTokens + usage.promptTokens,
            outputTokens: current.outputTokens + usage.completionTokens,
            requests: current.requests + 1,
        };
        this.daily.set(current.date, updated);
        dbg(`Recorded usage: +${usage.promptTokens} input, +${usage.completionTokens} output`);

        const write = this.writeQueue.then(() => this.save());
        this.writeQueue = write.catch(() => undefined);
        try {
            await write;
        } catch (error) {
            console.warn(`Failed to save usage data: ${errorMessage(error)}`);
        }
    }

    checkBudget(): BudgetCheck {
        const limit = this.limits.dailyTokenLimit;
        if (limit <= 0) {
            return { allowed: true };
        }
        const used = totalTokens(this.today());
        const share = used / limit;

        if (this.limits.hardLimit && share >= 1) {
            return {
                allowed: false,
                warning: `Daily token limit reached (${formatCount(used)}/${formatCount(limit)}). Try again tomorrow.`,
            };
        }
        if (share >= this.limits.warningThreshold) {
            const remaining = Math.max(limit - used, 0);
            return {
                allowed: true,
                warning: `Warning: ${Math.round(share * 100)}% of daily token budget used (${formatCount(remaining)} tokens remaining)`,
            };
        }
        return { allowed: true };
    }

    summary(): string {
        const usage = this.today();
        const limit = this.limits.dailyTokenLimit;
        const total = totalTokens(usage);
        const lines = [
            `Today's usage (${usage.date}):`,
            `- Requests: ${formatCount(usage.requests)}`,
            `- Input tokens: ${formatCount(usage.inputTokens)}`,
            `- Output tokens: ${formatCount(usage.outputTokens)}`,
        ];
        lines.push(limit > 0
            ? `- Total: ${formatCount(total)} / ${formatCount(limit)} (${((total / limit) * 100).toFixed(1)}%)`
            : `- Total: ${formatCount(total)} (no daily limit)`);
        return lines.join('\n');
    }

    private async save(): Promise<void> {
        if (!this.filePath) {
            throw new Error('UsageTracker: load() must be called before saving.');
        }
        const data = { daily: Object.fromEntries(this.daily) };
        await this.writeFileFn(this.filePath, JSON.stringify(data, null, 2));
    }
}
