import { Logger } from '../../../shared/logging/Logger';
import { ValidationError } from '../../../shared/errors/AppError';

/**
 * Base interface for CLI commands
 */
export interface ICommand {
    /**
     * Command name (e.g., 'search', 'download')
     */
    name: string;

    /**
     * Command description for help text
     */
    description: string;

    /**
     * Command aliases (e.g., ['list-providers'] for 'providers')
     */
    aliases?: string[];

    /**
     * Positional arguments, in order
     */
    getPositionals(): CommandPositional[];

    /**
     * Get command-specific options
     */
    getOptions(): CommandOption[];

    /**
     * Execute the command
     */
    execute(args: CommandArgs): Promise<void>;
}

/**
 * Command arguments passed from CLI
 */
export interface CommandArgs {
    /**
     * Unnamed positional arguments
     */
    _: Array<string | number>;

    /**
     * Named positionals and options
     */
    [key: string]: unknown;
}

export interface CommandPositional {
    name: string;
    description: string;
}

/**
 * Command option definition
 */
export interface CommandOption {
    name: string;
    alias?: string;
    description: string;
    type: 'string' | 'number' | 'boolean';
    default?: string | number | boolean;
    required?: boolean;
    choices?: string[];
}

/**
 * Usage string for yargs, e.g. `search-provider <provider> <query>`
 */
export function commandUsage(name: string, positionals: CommandPositional[]): string {
    return [name, ...positionals.map(positional => `<${positional.name}>`)].join(' ');
}

/**
 * Base command class with common functionality
 */
export abstract class BaseCommand implements ICommand {
    abstract name: string;
    abstract description: string;
    aliases?: string[];

    constructor(protected logger: Logger) {}

    abstract execute(args: CommandArgs): Promise<void>;

    abstract getOptions(): CommandOption[];

    getPositionals(): CommandPositional[] {
        return [];
    }

    /**
     * Write a line of command output to stdout
     */
    protected print(message: string = ''): void {
        console.log(message);
    }

    protected getString(args: CommandArgs, name: string): string | undefined {
        const value = this.getOption(args, name);
        if (value === undefined) {
            return undefined;
        }
        return String(value);
    }

    protected requireString(args: CommandArgs, name: string): string {
        const value = this.getString(args, name);
        if (value === undefined || value.trim().length === 0) {
            throw new ValidationError(`Missing required argument: ${name}`);
        }
        return value;
    }

    protected getNumber(args: CommandArgs, name: string): number | undefined {
        const value = this.getOption(args, name);
        if (value === undefined) {
            return undefined;
        }

        const number = typeof value === 'number' ? value : Number(value);
        if (!Number.isFinite(number)) {
            throw new ValidationError(`Invalid value for --${name}: ${String(value)}`);
        }
        return number;
    }

    /**
     * Get option value with default
     */
    private getOption(args: CommandArgs, name: string): unknown {
        const value = args[name];
        if (value !== undefined) {
            return value;
        }

        return this.getOptions().find(option => option.name === name)?.default;
    }
}
