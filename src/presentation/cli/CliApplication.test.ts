import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { CliApplication } from './CliApplication';
import { BaseCommand, CommandArgs, CommandOption, CommandPositional } from './commands/ICommand';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';
import { mockLogger } from '../../test-support/fixtures';

class EchoCommand extends BaseCommand {
    name = 'echo';
    description = 'Print the text back';
    aliases = ['say'];
    received: CommandArgs[] = [];

    getPositionals(): CommandPositional[] {
        return [{ name: 'text', description: 'What to print' }];
    }

    getOptions(): CommandOption[] {
        return [{ name: 'times', alias: 'n', description: 'Repeat count', type: 'number', default: 1 }];
    }

    async execute(args: CommandArgs): Promise<void> {
        this.received.push(args);
        const text = this.requireString(args, 'text');
        const times = this.getNumber(args, 'times') ?? 1;
        this.print(Array.from({ length: times }, () => text).join(' '));
    }
}

describe('CliApplication', () => {
    let app: CliApplication;
    let echo: EchoCommand;
    let stdout: jest.SpiedFunction<typeof console.log>;
    let stderr: jest.SpiedFunction<typeof console.error>;

    beforeEach(() => {
        const logger = mockLogger();
        app = new CliApplication(logger, new ErrorHandler(logger), 'polystock', '1.2.3');
        echo = new EchoCommand(logger);
        app.registerCommand(echo);
        stdout = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        stdout.mockRestore();
        stderr.mockRestore();
    });

    it('should run the matching command with parsed arguments', async () => {
        const code = await app.run(['node', 'polystock', 'echo', 'hello', '--times', '2']);

        expect(code).toBe(0);
        expect(echo.received[0]).toMatchObject({ text: 'hello', times: 2 });
        expect(stdout).toHaveBeenCalledWith('hello hello');
    });

    it('should accept aliases and short options', async () => {
        const code = await app.run(['node', 'polystock', 'say', 'hi', '-n', '3']);

        expect(code).toBe(0);
        expect(stdout).toHaveBeenCalledWith('hi hi hi');
    });

    it('should fail with exit code 1 and a usage hint for unknown options', async () => {
        const code = await app.run(['node', 'polystock', 'echo', 'hi', '--bogus']);

        expect(code).toBe(1);
        expect(echo.received).toHaveLength(0);
        expect(stderr).toHaveBeenCalledWith("Run 'polystock --help' for usage.");
    });

    it('should fail when no command is given', async () => {
        const code = await app.run(['node', 'polystock']);

        expect(code).toBe(1);
        expect(stderr).toHaveBeenCalledWith('Error: Specify a command');
    });

    it('should report command errors without a usage hint', async () => {
        const code = await app.run(['node', 'polystock', 'echo', 'hi', '--times', 'many']);

        expect(code).toBe(1);
        expect(stderr).toHaveBeenCalledWith('Error: Invalid value for --times: NaN');
        expect(stderr).not.toHaveBeenCalledWith("Run 'polystock --help' for usage.");
    });

    it('should list registered commands', () => {
        expect(app.getCommands()).toEqual([echo]);
    });
});
