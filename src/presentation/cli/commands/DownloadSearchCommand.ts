import { BaseCommand, CommandArgs, CommandOption, CommandPositional } from './ICommand';
import { searchOptions } from './SearchCommand';
import { formatBatchProgress, formatDownloadSummary } from './output';
import { DownloaderFactory } from '../setup';
import { AppConfig, PartialConfig } from '../../config/ConfigLoader';
import { BatchDownloadProgress, MediaType, SearchParams, parseMediaType } from '../../../domain';
import { Logger } from '../../../shared/logging/Logger';
import { ValidationError } from '../../../shared/errors/AppError';

/**
 * Search every provider, then download the first `--limit` hits
 */
export class DownloadSearchCommand extends BaseCommand {
    name = 'download-search';
    description = 'Search all providers and download the results';

    constructor(
        logger: Logger,
        private createDownloader: DownloaderFactory,
        private config: AppConfig
    ) {
        super(logger);
    }

    getPositionals(): CommandPositional[] {
        return [{ name: 'query', description: 'Keywords, separated by spaces or commas' }];
    }

    getOptions(): CommandOption[] {
        return [
            ...searchOptions(),
            {
                name: 'limit',
                alias: 'l',
                description: 'Maximum number of items to download',
                type: 'number'
            },
            {
                name: 'output',
                alias: 'o',
                description: 'Output directory',
                type: 'string'
            },
            {
                name: 'concurrent',
                alias: 'c',
                description: 'Parallel downloads',
                type: 'number'
            }
        ];
    }

    async execute(args: CommandArgs): Promise<void> {
        const params = new SearchParams(
            this.requireString(args, 'query'),
            parseMediaType(this.getString(args, 'type') ?? MediaType.IMAGE),
            this.getNumber(args, 'per-page') ?? this.config.perPage,
            this.getNumber(args, 'page') ?? 1
        );

        const limit = this.getNumber(args, 'limit');
        if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
            throw new ValidationError(`--limit must be a positive integer, got ${limit}`);
        }

        const overrides: PartialConfig = {};
        const output = this.getString(args, 'output');
        if (output) {
            overrides.outputDir = output;
        }
        const concurrent = this.getNumber(args, 'concurrent');
        if (concurrent !== undefined) {
            overrides.maxConcurrent = concurrent;
        }

        const downloader = this.createDownloader(overrides);
        const result = await downloader.search(params);
        const items = result.items.slice(0, limit ?? result.items.length);

        if (items.length === 0) {
            this.print(`No results for '${params.query}'`);
            return;
        }

        this.print(`Downloading ${items.length} of ${result.items.length} result(s) to ${downloader.getConfig().outputDir}`);

        const results = await downloader.downloadBatch(items, progress => this.reportProgress(progress));
        process.stderr.write('\n');

        formatDownloadSummary(results).forEach(line => this.print(line));
    }

    private reportProgress(progress: BatchDownloadProgress): void {
        process.stderr.write(`\r${formatBatchProgress(progress)}`);
    }
}
