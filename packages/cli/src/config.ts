/**
 * Configuration file support for webkeep
 *
 * Loads config from the `webkeep` key of package.json, `.webkeeprc`,
 * `.webkeeprc.json`, `.webkeeprc.yaml` or `webkeep.config.json`. CLI flags
 * override config file values.
 */

import { dirname, isAbsolute, resolve } from 'path';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { captureEngineSchema } from '@webkeep/capture';
import { DEFAULT_USER_AGENT } from '@webkeep/http';
import { errorMessage } from '@webkeep/utils';

export const webkeepConfigSchema = z
    .object({
        baseDir: z.string().min(1).default('saved_websites'),
        databasePath: z.string().min(1).default('websites.db'),
        maxConcurrentDownloads: z.number().int().positive().default(8),
        /** Seconds */
        timeout: z.number().positive().default(30),
        respectRobotsTxt: z.boolean().default(true),
        sanitizeHtml: z.boolean().default(false),
        userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
        headless: z.boolean().default(true),
        downloadImages: z.boolean().default(true),
        downloadCss: z.boolean().default(true),
        downloadJs: z.boolean().default(true),
        downloadFonts: z.boolean().default(true),
        preferredEngine: captureEngineSchema.default('direct'),
        /** Milliseconds */
        settleDelay: z.number().int().nonnegative().default(2000),
        retries: z.number().int().nonnegative().default(2),
    })
    .strict();

export type WebkeepConfig = z.infer<typeof webkeepConfigSchema>;

export const DEFAULT_CONFIG: WebkeepConfig = webkeepConfigSchema.parse({});

/**
 * Raised when a config file cannot be read or holds invalid settings.
 */
export class ConfigError extends Error {
    readonly name = 'ConfigError';

    constructor(
        public readonly filepath: string | null,
        public readonly reason: string,
    ) {
        super(
            filepath
                ? `Invalid configuration in ${filepath}: ${reason}`
                : `Invalid configuration: ${reason}`,
        );
    }
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        )
        .join('; ');
}

function validate(input: unknown, filepath: string | null): WebkeepConfig {
    const parsed = webkeepConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError(filepath, formatIssues(parsed.error));
    }
    return parsed.data;
}

const explorer = cosmiconfig('webkeep', {
    searchPlaces: [
        'package.json',
        '.webkeeprc',
        '.webkeeprc.json',
        '.webkeeprc.yaml',
        '.webkeeprc.yml',
        'webkeep.config.json',
    ],
});

export interface LoadConfigOptions {
    /** Explicit config file; skips the search */
    configPath?: string;
    /** Directory to search from, defaults to the working directory */
    searchFrom?: string;
}

export interface LoadedConfig {
    config: WebkeepConfig;
    /** File the settings came from, null when only defaults apply */
    filepath: string | null;
}

/**
 * Load configuration from the file system.
 *
 * Relative `baseDir` and `databasePath` values are resolved against the
 * directory of the config file.
 *
 * @throws ConfigError when the file is malformed or fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = options.configPath
            ? await explorer.load(resolve(options.configPath))
            : await explorer.search(options.searchFrom);
    } catch (error) {
        throw new ConfigError(options.configPath ?? null, errorMessage(error));
    }

    if (!result || result.isEmpty) {
        return { config: { ...DEFAULT_CONFIG }, filepath: null };
    }

    const config = validate(result.config, result.filepath);
    const configDir = dirname(result.filepath);
    return {
        config: {
            ...config,
            baseDir: isAbsolute(config.baseDir) ? config.baseDir : resolve(configDir, config.baseDir),
            databasePath:
                config.databasePath === ':memory:' || isAbsolute(config.databasePath)
                    ? config.databasePath
                    : resolve(configDir, config.databasePath),
        },
        filepath: result.filepath,
    };
}

/**
 * Merge CLI flags over loaded configuration. Flags left `undefined` keep the
 * configured value; the result is validated again.
 *
 * @throws ConfigError when a flag holds an invalid value
 */
export function mergeConfig(
    config: WebkeepConfig,
    overrides: Record<string, unknown>,
): WebkeepConfig {
    const defined = Object.fromEntries(
        Object.entries(overrides).filter(([, value]) => value !== undefined),
    );
    return validate({ ...config, ...defined }, null);
}
