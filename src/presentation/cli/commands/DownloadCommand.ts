import { BaseCommand, CommandArgs, CommandOption, CommandPositional } from './ICommand';
import { DownloaderFactory } from '../setup';
import { MediaType, parseMediaType } from '../../../domain';
import { Logger } from '../../../shared/logging/Logger';

export class DownloadCommand extends BaseCommand {
    name = 'download';
    description = 'Download one item by its provider id';

    constructor(
        logger: Logger,
        private createDownloader: DownloaderFactory
    ) {
        super(logger);
    }

    getPositionals(): CommandPositional[] {
        return [{ name: 'id', description: 'Provider media id' }];
    }

    getOptions(): CommandOption[] {
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
                name: 'provider',
                alias: 'p',
                description: 'Provider to look the id up on (default: try each in turn)',
                type: 'string'
            },
            {
                name: 'output',
                alias: 'o',
                description: 'Output directory',
                type: 'string'
            }
        ];
    }

    async execute(args: CommandArgs): Promise<void> {
        const id = this.requireString(args, 'id');
        const mediaType = parseMediaType(this.getString(args, 'type') ?? MediaType.IMAGE);
        const provider = this.getString(args, 'provider');
        const output = this.getString(args, 'output');

        const downloader = this.createDownloader(output ? { outputDir: output } : {});
        const path = await downloader.downloadById(id, mediaType, provider);

        this.print(`Saved ${mediaType} ${id} to ${path}`);
    }
}
