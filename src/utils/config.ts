import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const SettingsSchema = z.object({
    blockSize: z.number().int().positive().default(16384),
    maxLinkDepth: z.number().int().positive().default(40),
    logLevel: LogLevelSchema.default('warn'),
});

export type Settings = z.infer<typeof SettingsSchema>;

const ENV_VARIABLES = {
    blockSize: 'OMNIFILE_BLOCK_SIZE',
    maxLinkDepth: 'OMNIFILE_MAX_LINK_DEPTH',
    logLevel: 'OMNIFILE_LOG_LEVEL',
} as const;

export class ConfigManager {
    private configPath: string | undefined;
    private config: Settings;

    constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
        this.configPath = configPath;
        this.config = this.load(env);
    }

    /**
     * Load settings from file and environment, falling back to defaults
     */
    private load(env: NodeJS.ProcessEnv): Settings {
        let fromFile: unknown = {};
        if (this.configPath && existsSync(this.configPath)) {
            const content = readFileSync(this.configPath, 'utf-8');
            fromFile = JSON.parse(content);
        }

        const base = SettingsSchema.parse(fromFile);
        return SettingsSchema.parse({ ...base, ...readEnvironment(env) });
    }

    /**
     * Get entire config
     */
    getConfig(): Settings {
        return { ...this.config };
    }

    /**
     * Override selected settings
     */
    update(partial: Partial<Settings>): Settings {
        this.config = SettingsSchema.parse({ ...this.config, ...partial });
        return this.getConfig();
    }
}

function readEnvironment(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    const blockSize = env[ENV_VARIABLES.blockSize];
    if (blockSize) {
        values.blockSize = Number(blockSize);
    }
    const maxLinkDepth = env[ENV_VARIABLES.maxLinkDepth];
    if (maxLinkDepth) {
        values.maxLinkDepth = Number(maxLinkDepth);
    }
    const logLevel = env[ENV_VARIABLES.logLevel];
    if (logLevel) {
        values.logLevel = logLevel;
    }
    return values;
}

let processConfig: ConfigManager | undefined;

function processConfigManager(): ConfigManager {
    if (!processConfig) {
        const path = process.env.OMNIFILE_CONFIG;
        processConfig = new ConfigManager(path ? resolve(path) : undefined);
    }
    return processConfig;
}

/**
 * Settings of the current process, loaded on first use
 */
export function getSettings(): Settings {
    return processConfigManager().getConfig();
}

/**
 * Override process settings at run time
 */
export function configure(partial: Partial<Settings>): Settings {
    return processConfigManager().update(partial);
}
