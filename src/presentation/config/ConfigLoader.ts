import * as path from 'path';
import * as os from 'os';
import { cosmiconfigSync } from 'cosmiconfig';
import { z } from 'zod';
import {
    DownloadConfig,
    ImageQuality,
    VideoQuality,
    DEFAULT_PER_PAGE
} from '../../domain';
import { Logger } from '../../shared/logging/Logger';
import { ConfigurationError } from '../../shared/errors/AppError';

export const CONFIG_MODULE_NAME = 'polystock';

export interface ProviderConfig {
    apiKey?: string;
}

export interface AppConfig {
    outputDir: string;
    imageQuality: ImageQuality;
    videoQuality: VideoQuality;
    useOriginalNames: boolean;
    maxConcurrent: number;
    perPage: number;
    /** HTTP timeout in milliseconds */
    timeout: number;
    verbose: boolean;
    providers: {
        pixabay: ProviderConfig;
        pexels: ProviderConfig;
    };
}

const providerSchema = z.object({
    apiKey: z.string().optional()
});

/**
 * Shape of a config file, also used for environment and CLI overrides
 */
export const partialConfigSchema = z.object({
    outputDir: z.string().min(1).optional(),
    imageQuality: z.nativeEnum(ImageQuality).optional(),
    videoQuality: z.nativeEnum(VideoQuality).optional(),
    useOriginalNames: z.boolean().optional(),
    maxConcurrent: z.number().int().positive().optional(),
    perPage: z.number().int().min(1).max(200).optional(),
    timeout: z.number().int().positive().optional(),
    verbose: z.boolean().optional(),
    providers: z.object({
        pixabay: providerSchema.optional(),
        pexels: providerSchema.optional()
    }).optional()
});

export type PartialConfig = z.infer<typeof partialConfigSchema>;

export interface ConfigLoaderOptions {
    cwd?: string;
    homeDir?: string;
    env?: NodeJS.ProcessEnv;
}

/* --------------------- Default Configuration --------------------- */
export function getDefaultConfig(): AppConfig {
    return {
        outputDir: './downloads',
        imageQuality: ImageQuality.LARGE,
        videoQuality: VideoQuality.LARGE,
        useOriginalNames: false,
        maxConcurrent: 5,
        perPage: DEFAULT_PER_PAGE,
        timeout: 30000,
        verbose: false,
        providers: {
            pixabay: {},
            pexels: {}
        }
    };
}

/**
 * Loads configuration: defaults < home directory < working directory <
 * environment < explicit overrides
 */
export class ConfigLoader {
    private readonly explorer: ReturnType<typeof cosmiconfigSync>;
    private sources: string[] = [];

    constructor(
        private logger: Logger,
        private options: ConfigLoaderOptions = {}
    ) {
        this.explorer = cosmiconfigSync(CONFIG_MODULE_NAME, {
            searchPlaces: [
                'package.json',
                `${CONFIG_MODULE_NAME}.config.json`,
                `${CONFIG_MODULE_NAME}.config.js`,
                `.${CONFIG_MODULE_NAME}rc.json`,
                `.${CONFIG_MODULE_NAME}rc.js`,
                `.${CONFIG_MODULE_NAME}rc`
            ],
            packageProp: CONFIG_MODULE_NAME
        });
    }

    /**
     * Load and validate the merged configuration
     */
    load(overrides: PartialConfig = {}): AppConfig {
        this.sources = [];

        const homeDir = this.options.homeDir ?? os.homedir();
        const cwd = this.options.cwd ?? process.cwd();

        let config = getDefaultConfig();
        config = mergeConfig(config, this.loadFromDirectory(homeDir));
        if (path.resolve(cwd) !== path.resolve(homeDir)) {
            config = mergeConfig(config, this.loadFromDirectory(cwd));
        }
        config = mergeConfig(config, this.loadFromEnvironment(this.options.env ?? process.env));
        config = mergeConfig(config, this.validate(overrides, 'overrides'));

        config.outputDir = path.resolve(cwd, config.outputDir);

        this.logger.debug('Configuration loaded', { sources: this.sources });
        return config;
    }

    /**
     * Where the last load() found settings
     */
    getSources(): readonly string[] {
        return [...this.sources];
    }

    private loadFromDirectory(dir: string): PartialConfig {
        const result = this.search(dir);
        if (!result || result.isEmpty) {
            return {};
        }

        const config = this.validate(result.config, result.filepath);
        this.sources.push(result.filepath);
        this.logger.debug(`Loaded config from ${result.filepath}`);
        return config;
    }

    private search(dir: string) {
        try {
            return this.explorer.search(dir);
        } catch (error) {
            throw new ConfigurationError(
                `Failed to read configuration: ${error instanceof Error ? error.message : String(error)}`,
                { dir }
            );
        }
    }

    private loadFromEnvironment(env: NodeJS.ProcessEnv): PartialConfig {
        const config: PartialConfig = {};

        if (env.POLYSTOCK_OUTPUT_DIR) {
            config.outputDir = env.POLYSTOCK_OUTPUT_DIR;
        }
        if (env.POLYSTOCK_MAX_CONCURRENT) {
            const value = Number(env.POLYSTOCK_MAX_CONCURRENT);
            if (!Number.isInteger(value) || value < 1) {
                throw new ConfigurationError(
                    `POLYSTOCK_MAX_CONCURRENT must be a positive integer, got '${env.POLYSTOCK_MAX_CONCURRENT}'`
                );
            }
            config.maxConcurrent = value;
        }
        if (env.POLYSTOCK_VERBOSE) {
            config.verbose = ['1', 'true', 'yes'].includes(env.POLYSTOCK_VERBOSE.toLowerCase());
        }

        const providers: NonNullable<PartialConfig['providers']> = {};
        if (env.PIXABAY_API_KEY) {
            providers.pixabay = { apiKey: env.PIXABAY_API_KEY };
        }
        if (env.PEXELS_API_KEY) {
            providers.pexels = { apiKey: env.PEXELS_API_KEY };
        }
        if (providers.pixabay || providers.pexels) {
            config.providers = providers;
        }

        if (Object.keys(config).length > 0) {
            this.sources.push('environment');
        }
        return config;
    }

    private validate(raw: unknown, source: string): PartialConfig {
        const parsed = partialConfigSchema.safeParse(raw ?? {});
        if (!parsed.success) {
            const issues = parsed.error.issues.map(
                issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`
            );
            throw new ConfigurationError(`Invalid configuration in ${source}: ${issues.join('; ')}`, {
                source,
                issues
            });
        }
        return parsed.data;
    }
}

/**
 * Apply the fields a partial config sets; provider entries merge per key
 */
export function mergeConfig(base: AppConfig, patch: PartialConfig): AppConfig {
    return {
        outputDir: patch.outputDir ?? base.outputDir,
        imageQuality: patch.imageQuality ?? base.imageQuality,
        videoQuality: patch.videoQuality ?? base.videoQuality,
        useOriginalNames: patch.useOriginalNames ?? base.useOriginalNames,
        maxConcurrent: patch.maxConcurrent ?? base.maxConcurrent,
        perPage: patch.perPage ?? base.perPage,
        timeout: patch.timeout ?? base.timeout,
        verbose: patch.verbose ?? base.verbose,
        providers: {
            pixabay: {
                apiKey: patch.providers?.pixabay?.apiKey ?? base.providers.pixabay.apiKey
            },
            pexels: {
                apiKey: patch.providers?.pexels?.apiKey ?? base.providers.pexels.apiKey
            }
        }
    };
}

/**
 * Pipeline settings carried by the application config
 */
export function toDownloadConfig(config: AppConfig): Partial<DownloadConfig> {
    return {
        outputDir: config.outputDir,
        imageQuality: config.imageQuality,
        videoQuality: config.videoQuality,
        useOriginalNames: config.useOriginalNames,
        maxConcurrent: config.maxConcurrent
    };
}

/**
 * Configured providers with a non-empty key, in registration order
 */
export function configuredProviders(config: AppConfig): Array<{ name: string; apiKey: string }> {
    const entries: Array<{ name: string; apiKey: string }> = [];
    const { pixabay, pexels } = config.providers;

    if (pixabay.apiKey) {
        entries.push({ name: 'pixabay', apiKey: pixabay.apiKey });
    }
    if (pexels.apiKey) {
        entries.push({ name: 'pexels', apiKey: pexels.apiKey });
    }
    return entries;
}
