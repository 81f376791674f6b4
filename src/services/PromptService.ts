import * as fs from 'fs/promises';
import * as path from 'path';
import { FullPromptsConfig, FullPromptsConfigSchema, PromptContext } from './promptTypes';
import { errorMessage } from '../utils';

export interface PromptServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
    dirnameFn?: (p: string) => string;
    isAbsoluteFn?: (p: string) => boolean;
}

/**
 * Loads prompt templates and fills in their `{{placeholders}}`.
 *
 * Templates default to `src/agents/prompts/<agent>/<key>.txt` under the working
 * directory; a prompts config file may point any of them elsewhere, relative to
 * the config file.
 */
export class PromptService {
    private loadedConfig?: FullPromptsConfig;
    private readonly configFilePath?: string;
    private readonly configDir?: string;

    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePathFn: (...paths: string[]) => string;
    private readonly dirnameFn: (p: string) => string;
    private readonly isAbsoluteFn: (p: string) => boolean;

    constructor(configFilePath?: string, deps?: PromptServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.dirnameFn = deps?.dirnameFn || path.dirname;
        this.isAbsoluteFn = deps?.isAbsoluteFn || path.isAbsolute;

        if (configFilePath) {
            this.configFilePath = this.resolvePathFn(configFilePath);
            this.configDir = this.dirnameFn(this.configFilePath);
        }
    }

    private async _ensureConfigLoaded(): Promise<void> {
        if (this.configFilePath && !this.loadedConfig) {
            try {
                const fileContent = await this._readFile(this.configFilePath);
                this.loadedConfig = FullPromptsConfigSchema.parse(JSON.parse(fileContent));
            } catch (error) {
                throw new Error(`Failed to load or parse prompt configuration file: ${this.configFilePath}. Original error: ${errorMessage(error)}`);
            }
        }
    }

    public async getFormattedPrompt(
        agentName: string,
        promptKey: string,
        context: PromptContext
    ): Promise<string> {
        await this._ensureConfigLoaded();

        const customPromptConfig = this.loadedConfig?.prompts[agentName]?.[promptKey];
        const promptPath = customPromptConfig
            ? this._resolvePath(customPromptConfig.path)
            : this._resolvePath(`src/agents/prompts/${agentName}/${promptKey}.txt`);
        const kind = customPromptConfig ? 'custom' : 'default';

        let promptText: string;
        try {
            promptText = await this._readFile(promptPath);
        } catch (error) {
            throw new Error(`Error loading ${kind} prompt file ${promptPath} for agent ${agentName}, prompt ${promptKey}. Original error: ${errorMessage(error)}`);
        }

        if (!promptText) {
            throw new Error(`Failed to load prompt for agent ${agentName}, prompt ${promptKey}.`);
        }

        for (const [key, value] of Object.entries(context)) {
            const escapedKey = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
            const regex = new RegExp(`{{${escapedKey}}}`, 'g');
            // Function replacer: values may contain `$` sequences.
            promptText = promptText.replace(regex, () => String(value));
        }

        return promptText;
    }

    private async _readFile(filePath: string): Promise<string> {
        try {
            return await this.readFileFn(filePath, 'utf-8');
        } catch (error) {
            throw new Error(`Reading file ${filePath} failed: ${errorMessage(error)}`);
        }
    }

    private _resolvePath(promptPath: string): string {
        if (this.isAbsoluteFn(promptPath)) {
            return promptPath;
        }
        if (this.configDir) {
            return this.resolvePathFn(this.configDir, promptPath);
        }
        return this.resolvePathFn(promptPath);
    }
}
