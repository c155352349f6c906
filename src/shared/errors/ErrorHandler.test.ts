import { describe, it, expect } from '@jest/globals';
import { ErrorHandler } from './ErrorHandler';
import {
    AppError,
    ConfigurationError,
    DownloadError,
    InternalError,
    NetworkError,
    NotFoundError,
    ValidationError
} from './AppError';
import { mockLogger } from '../../test-support/fixtures';

describe('ErrorHandler', () => {
    it('should pass AppErrors through unchanged', () => {
        const handler = new ErrorHandler(mockLogger());
        const error = new NotFoundError('Pixabay image', '99');

        expect(handler.normalize(error)).toBe(error);
        expect(error.message).toBe("Pixabay image with identifier '99' not found");
    });

    it('should map plain errors by name and message', () => {
        const handler = new ErrorHandler(mockLogger());

        const yargsError = new Error('Unknown argument: x');
        yargsError.name = 'YError';
        expect(handler.normalize(yargsError)).toBeInstanceOf(ValidationError);

        expect(handler.normalize(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toBeInstanceOf(NetworkError);

        const internal = handler.normalize(new TypeError('x is undefined'));
        expect(internal).toBeInstanceOf(InternalError);
        expect(internal.details).toEqual({ originalError: 'TypeError' });

        expect(handler.normalize('a string').message).toBe('a string');
    });

    it('should log operational errors at debug and the rest at error', () => {
        const logger = mockLogger();
        const handler = new ErrorHandler(logger);

        handler.handle(new ValidationError('bad input'));
        expect(logger.debug).toHaveBeenCalledWith('[VALIDATION_ERROR] bad input', undefined);
        expect(logger.error).not.toHaveBeenCalled();

        const config = new ConfigurationError('broken config');
        handler.handle(config);
        expect(logger.error).toHaveBeenCalledWith('Non-operational error [CONFIGURATION_ERROR]', config, undefined);
    });

    it('should return the serialized error and notify listeners', () => {
        const handler = new ErrorHandler(mockLogger());
        const seen: AppError[] = [];
        const listener = (error: AppError): void => {
            seen.push(error);
        };
        handler.addListener(listener);

        const error = new DownloadError('5', 'Lake', 'HTTP 500');
        const response = handler.handle(error);

        expect(response.code).toBe('DOWNLOAD_ERROR');
        expect(response.message).toBe("Download of '5' failed: HTTP 500");
        expect(seen).toEqual([error]);

        handler.removeListener(listener);
        handler.handle(error);
        expect(seen).toHaveLength(1);
    });

    it('should keep going when a listener throws', () => {
        const logger = mockLogger();
        const handler = new ErrorHandler(logger);
        handler.addListener(() => {
            throw new Error('listener broke');
        });

        expect(() => handler.handle(new ValidationError('x'))).not.toThrow();
        expect(logger.error).toHaveBeenCalledWith('Error in error listener', expect.any(Error));
    });
});
