import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_MODEL_NAME, BASE_URL_ENV_VAR, MODEL_ENV_VAR, OPENAI_API_KEY_ENV_VAR } from './agents/llmConstants';
import { DEFAULT_MATCH_SETTINGS, MatchSettings } from './resolver/EntityResolver';
import { UsageLimits } from './services/UsageTracker';
import { ReadFileFn, errorMessage, readTextFile } from './utils';

export const HUB_URL_ENV_VAR = 'HUB_URL';
export const HUB_TOKEN_ENV_VAR = 'HUB_TOKEN';
export const DATA_DIR_ENV_VAR = 'DATA_DIR';

export const DEFAULT_DATA_DIR = 'data';
export const ALIASES_FILE_NAME = 'aliases.json';
export const USAGE_FILE_NAME = 'usage.json';

// Chat id used by the local command-line transport.
export const CLI_CHAT_ID = 'cli';

const HOUR_MS = 60 * 60 * 1000;

const ConfigFileSchema = z.object({
    hub: z.object({
        url: z.string().min(1).optional(),
        requestTimeoutMs: z.number().int().positive().default(10_000),
    }).strict().default({}),
    llm: z.object({
        model: z.string().min(1).optional(),
        baseURL: z.string().url().optional(),
    }).strict().default({}),
    cache: z.object({
        refreshIntervalMs: z.number().int().positive().default(6 * HOUR_MS),
    }).strict().default({}),
    agent: z.object({
        historyLimit: z.number().int().positive().default(20),
        maxToolRounds: z.number().int().positive().default(10),
        runTimeoutMs: z.number().int().positive().default(120_000),
    }).strict().default({}),
    resolver: z.object({
        matchThreshold: z.number().min(0).max(1).default(DEFAULT_MATCH_SETTINGS.matchThreshold),
        substringScore: z.number().min(0).max(1).default(DEFAULT_MATCH_SETTINGS.substringScore),
        tokenWeight: z.number().min(0).max(1).default(DEFAULT_MATCH_SETTINGS.tokenWeight),
        ambiguityMargin: z.number().min(0).max(1).default(DEFAULT_MATCH_SETTINGS.ambiguityMargin),
    }).strict().default({}).refine(r => r.tokenWeight < r.substringScore, {
        message: 'tokenWeight must be lower than substringScore',
        path: ['tokenWeight'],
    }),
    usage: z.object({
        dailyTokenLimit: z.number().int().nonnegative().default(100_000),
        warningThreshold: z.number().min(0).max(1).default(0.8),
        hardLimit: z.boolean().default(false),
    }).strict().default({}),
    dataDir: z.string().min(1).optional(),
    promptsConfig: z.string().min(1).optional(),
}).strict();

export interface AppConfig {
    hub: { url: string; token: string; requestTimeoutMs: number };
    llm: { apiKey: string; baseURL?: string; model: string };
    cache: { refreshIntervalMs: number };
    agent: { historyLimit: number; maxToolRounds: number; runTimeoutMs: number };
    resolver: MatchSettings;
    usage: UsageLimits;
    dataDir: string;
    promptsConfig?: string;
}

export interface ConfigOverrides {
    configPath?: string;
    dataDir?: string;
    model?: string;
}

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

function nonEmpty(value: string | undefined): string | undefined {
    return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Builds the runtime configuration. Precedence: command-line overrides, then
 * environment, then the JSON config file, then defaults. Secrets are only read
 * from the environment.
 *
 * @throws ConfigError listing every invalid or missing setting
 */
export async function loadConfig(
    overrides: ConfigOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
    readFileFn: ReadFileFn = readTextFile
): Promise<AppConfig> {
    let raw: unknown = {};
    if (overrides.configPath) {
        const configPath = path.resolve(overrides.configPath);
        try {
            raw = JSON.parse(await readFileFn(configPath));
        } catch (error) {
            throw new ConfigError([`config file ${configPath}: ${errorMessage(error)}`]);
        }
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
    }
    const file = parsed.data;

    const issues: string[] = [];
    const hubUrl = nonEmpty(env[HUB_URL_ENV_VAR]) ?? file.hub.url;
    const hubToken = nonEmpty(env[HUB_TOKEN_ENV_VAR]);
    const apiKey = nonEmpty(env[OPENAI_API_KEY_ENV_VAR]);
    if (!hubUrl) issues.push(`hub.url: set ${HUB_URL_ENV_VAR} or hub.url in the config file`);
    if (!hubToken) issues.push(`hub.token: set ${HUB_TOKEN_ENV_VAR}`);
    if (!apiKey) issues.push(`llm.apiKey: set ${OPENAI_API_KEY_ENV_VAR}`);
    if (!hubUrl || !hubToken || !apiKey) {
        throw new ConfigError(issues);
    }

    const baseURL = nonEmpty(env[BASE_URL_ENV_VAR]) ?? file.llm.baseURL;
    const config: AppConfig = {
        hub: { url: hubUrl, token: hubToken, requestTimeoutMs: file.hub.requestTimeoutMs },
        llm: {
            apiKey,
            model: nonEmpty(overrides.model) ?? nonEmpty(env[MODEL_ENV_VAR]) ?? file.llm.model ?? DEFAULT_MODEL_NAME,
        },
        cache: file.cache,
        agent: file.agent,
        resolver: file.resolver,
        usage: file.usage,
        dataDir: path.resolve(nonEmpty(overrides.dataDir) ?? nonEmpty(env[DATA_DIR_ENV_VAR]) ?? file.dataDir ?? DEFAULT_DATA_DIR),
    };
    if (baseURL) {
        config.llm.baseURL = baseURL;
    }
    if (file.promptsConfig) {
        config.promptsConfig = overrides.configPath
            ? path.resolve(path.dirname(path.resolve(overrides.configPath)), file.promptsConfig)
            : path.resolve(file.promptsConfig);
    }
    return config;
}
