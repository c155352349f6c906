import { BaseCommand, CommandArgs, CommandOption, CommandPositional } from './ICommand';
import { formatSearchResult } from './output';
import { DownloaderFactory } from '../setup';
import { AppConfig } from '../../config/ConfigLoader';
import { MediaType, SearchParams, parseMediaType } from '../../../domain';
import { Logger } from '../../../shared/logging/Logger';

/**
 * Options shared by the search commands
 */
export function searchOptions(): CommandOption[] {
    return [
        {
            name: 'type',
            alias: 't',
            description: 'Media type',
            type: 'string',
            choices: [MediaType.IMAGE, MediaType.VIDEO],
            default: MediaType.IMAGE
        },
        {
            name: 'per-page',
            alias: 'n',
            description: 'Results per provider',
            type: 'number'
        },
        {
            name: 'page',
            alias: 'p',
            description: 'Page number',
            type: 'number',
            default: 1
        }
    ];
}

export class SearchCommand extends BaseCommand {
    name = 'search';
    description = 'Search every configured provider';

    constructor(
        logger: Logger,
        protected createDownloader: DownloaderFactory,
        protected config: AppConfig
    ) {
        super(logger);
    }

    getPositionals(): CommandPositional[] {
        return [{ name: 'query', description: 'Keywords, separated by spaces or commas' }];
    }

    getOptions(): CommandOption[] {
        return searchOptions();
    }

    async execute(args: CommandArgs): Promise<void> {
        const params = this.buildParams(args);
        const result = await this.createDownloader().search(params);

        formatSearchResult(result).forEach(line => this.print(line));

        const counts = result.providerResults
            .map(providerResult => `${providerResult.provider}: ${providerResult.items.length}`)
            .join(', ');
        this.print(`Providers: ${counts}`);
    }

    protected buildParams(args: CommandArgs): SearchParams {
        return new SearchParams(
            this.requireString(args, 'query'),
            parseMediaType(this.getString(args, 'type') ?? MediaType.IMAGE),
            this.getNumber(args, 'per-page') ?? this.config.perPage,
            this.getNumber(args, 'page') ?? 1
        );
    }
}
