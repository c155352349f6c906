import yargs, { Argv, Options } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ICommand, CommandArgs, commandUsage } from './commands/ICommand';
import { Logger, LoggerFactory, LogLevel } from '../../shared/logging/Logger';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';

export class CliApplication {
    private commands: Map<string, ICommand> = new Map();

    constructor(
        private logger: Logger,
        private errorHandler: ErrorHandler = new ErrorHandler(logger),
        private appName: string = 'polystock',
        private version: string = '1.0.0'
    ) {}

    /**
     * Register a command
     */
    registerCommand(command: ICommand): void {
        this.commands.set(command.name, command);
        this.logger.debug(`Registered command: ${command.name}`);
    }

    /**
     * Run the CLI application; resolves to the process exit code
     */
    async run(argv: string[] = process.argv): Promise<number> {
        const args = hideBin(argv);

        const yargsInstance = yargs(args)
            .scriptName(this.appName)
            .version(this.version)
            .option('verbose', {
                type: 'boolean',
                describe: 'Log debug output to stderr',
                default: false,
                global: true
            })
            .middleware(parsed => {
                if (parsed.verbose === true) {
                    LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG });
                }
            })
            .help()
            .alias('h', 'help')
            .alias('v', 'version')
            .demandCommand(1, 'Specify a command')
            .strict()
            .fail(false)
            .wrap(100);

        this.commands.forEach(command => {
            yargsInstance.command(
                [commandUsage(command.name, command.getPositionals()), ...(command.aliases ?? [])],
                command.description,
                builder => this.configureCommand(builder, command),
                async parsed => this.executeCommand(command, parsed)
            );
        });

        try {
            await yargsInstance.parseAsync();
            return 0;
        } catch (error) {
            const response = this.errorHandler.handle(error);
            console.error(`Error: ${response.message}`);
            if (error instanceof Error && error.name === 'YError') {
                console.error(`Run '${this.appName} --help' for usage.`);
            }
            return 1;
        }
    }

    private configureCommand(builder: Argv, command: ICommand): Argv {
        command.getPositionals().forEach(positional => {
            builder.positional(positional.name, {
                describe: positional.description,
                type: 'string'
            });
        });

        command.getOptions().forEach(option => {
            const config: Options = {
                describe: option.description,
                type: option.type,
                default: option.default,
                demandOption: option.required,
                choices: option.choices,
                alias: option.alias
            };

            builder.option(option.name, config);
        });

        return builder;
    }

    private async executeCommand(command: ICommand, argv: CommandArgs): Promise<void> {
        this.logger.debug(`Running command: ${command.name}`);
        await command.execute(argv);
    }

    /**
     * Get registered commands
     */
    getCommands(): ICommand[] {
        return Array.from(this.commands.values());
    }
}
