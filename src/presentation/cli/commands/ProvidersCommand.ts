import { BaseCommand, CommandArgs, CommandOption } from './ICommand';
import { DownloaderFactory } from '../setup';
import { SUPPORTED_PROVIDERS } from '../../../infrastructure/providers/createProvider';
import { Logger } from '../../../shared/logging/Logger';

export class ProvidersCommand extends BaseCommand {
    name = 'providers';
    description = 'List supported providers and which ones are configured';
    aliases = ['list-providers'];

    constructor(
        logger: Logger,
        private createDownloader: DownloaderFactory
    ) {
        super(logger);
    }

    getOptions(): CommandOption[] {
        return [];
    }

    async execute(_args: CommandArgs): Promise<void> {
        const registered = this.createDownloader()
            .providers()
            .map(provider => provider.name.toLowerCase());

        this.print('Providers:');
        SUPPORTED_PROVIDERS.forEach(name => {
            const status = registered.includes(name) ? 'configured' : 'no API key';
            this.print(`  ${name.padEnd(10)} ${status}`);
        });

        if (registered.length === 0) {
            this.print('Set PIXABAY_API_KEY or PEXELS_API_KEY to enable a provider.');
        }
    }
}
