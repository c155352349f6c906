import { CommandArgs, CommandPositional } from './ICommand';
import { SearchCommand } from './SearchCommand';
import { formatSearchResult } from './output';

export class SearchProviderCommand extends SearchCommand {
    name = 'search-provider';
    description = 'Search a single provider by name';

    getPositionals(): CommandPositional[] {
        return [
            { name: 'provider', description: 'Provider name (pixabay, pexels)' },
            ...super.getPositionals()
        ];
    }

    async execute(args: CommandArgs): Promise<void> {
        const provider = this.requireString(args, 'provider');
        const params = this.buildParams(args);

        const result = await this.createDownloader().searchFromProvider(provider, params);
        formatSearchResult(result).forEach(line => this.print(line));
    }
}
