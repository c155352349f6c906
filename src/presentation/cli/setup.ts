import { ICommand } from './commands/ICommand';
import { SearchCommand } from './commands/SearchCommand';
import { SearchProviderCommand } from './commands/SearchProviderCommand';
import { DownloadCommand } from './commands/DownloadCommand';
import { DownloadSearchCommand } from './commands/DownloadSearchCommand';
import { ProvidersCommand } from './commands/ProvidersCommand';
import { MediaDownloader } from '../../application/services/MediaDownloader';
import { HttpClient } from '../../infrastructure/http/HttpClient';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { Logger, LoggerFactory } from '../../shared/logging/Logger';
import {
    AppConfig,
    PartialConfig,
    configuredProviders,
    mergeConfig,
    toDownloadConfig
} from '../config/ConfigLoader';

/**
 * Builds a MediaDownloader for one command run, applying per-command
 * overrides such as `--output` or `--concurrent`
 */
export type DownloaderFactory = (overrides?: PartialConfig) => MediaDownloader;

export interface Dependencies {
    config: AppConfig;
    createDownloader: DownloaderFactory;
    commands: ICommand[];
}

export function createDownloaderFactory(config: AppConfig, logger: Logger): DownloaderFactory {
    return (overrides: PartialConfig = {}) => {
        const effective = mergeConfig(config, overrides);

        const http = new HttpClient(LoggerFactory.getLogger('HttpClient'), {
            timeout: effective.timeout
        });
        const downloader = new MediaDownloader({
            config: toDownloadConfig(effective),
            http,
            storage: new LocalFileStorage(logger, effective.outputDir),
            logger
        });

        configuredProviders(effective).forEach(({ name, apiKey }) => {
            downloader.addProviderByName(name, apiKey);
        });

        return downloader;
    };
}

/**
 * Set up all dependencies using manual dependency injection
 */
export function setupDependencies(config: AppConfig, logger: Logger): Dependencies {
    const createDownloader = createDownloaderFactory(config, logger);

    const commands: ICommand[] = [
        new SearchCommand(logger, createDownloader, config),
        new SearchProviderCommand(logger, createDownloader, config),
        new DownloadCommand(logger, createDownloader),
        new DownloadSearchCommand(logger, createDownloader, config),
        new ProvidersCommand(logger, createDownloader)
    ];

    return {
        config,
        createDownloader,
        commands
    };
}
