#!/usr/bin/env node

import * as dotenv from 'dotenv';
import { CliApplication } from './CliApplication';
import { setupDependencies } from './setup';
import { ConfigLoader } from '../config/ConfigLoader';
import { LoggerFactory, LogLevel } from '../../shared/logging/Logger';
import { ErrorHandler } from '../../shared/errors/ErrorHandler';

async function main(argv: string[] = process.argv): Promise<number> {
    dotenv.config();

    LoggerFactory.setDefaultConfig({ level: LogLevel.WARN });
    const logger = LoggerFactory.getLogger('CLI');
    const errorHandler = new ErrorHandler(logger);

    try {
        // Load configuration
        const config = new ConfigLoader(logger).load();
        if (config.verbose) {
            LoggerFactory.setDefaultConfig({ level: LogLevel.DEBUG });
        }

        // Set up dependencies
        const { commands } = setupDependencies(config, logger);

        // Create and configure CLI application
        const app = new CliApplication(
            logger,
            errorHandler,
            'polystock',
            process.env.npm_package_version || '1.0.0'
        );
        commands.forEach(command => app.registerCommand(command));

        return await app.run(argv);
    } catch (error) {
        const response = errorHandler.handle(error);
        console.error(`Fatal error: ${response.message}`);
        return 1;
    }
}

// Run if this is the main module
if (require.main === module) {
    main().then(code => {
        process.exitCode = code;
    });
}

export { main };
