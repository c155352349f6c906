import { IMediaProvider } from '../../domain';
import { ConfigurationError, ILogger, LoggerFactory, UnknownProviderError } from '../../shared';
import { HttpClient } from '../http/HttpClient';
import { PexelsProvider } from './PexelsProvider';
import { PixabayProvider } from './PixabayProvider';

export const SUPPORTED_PROVIDERS = ['pixabay', 'pexels'] as const;

export type ProviderName = typeof SUPPORTED_PROVIDERS[number];

export function isSupportedProvider(name: string): name is ProviderName {
    return SUPPORTED_PROVIDERS.some(supported => supported === name.toLowerCase());
}

/**
 * Build a provider adapter from its name (any case) and API key
 */
export function createProvider(
    name: string,
    apiKey: string,
    http: HttpClient,
    logger: ILogger = LoggerFactory.getLogger('ProviderFactory')
): IMediaProvider {
    if (apiKey.trim().length === 0) {
        throw new ConfigurationError(`API key for provider '${name}' is empty`, { provider: name });
    }

    switch (name.trim().toLowerCase()) {
        case 'pixabay':
            return new PixabayProvider(apiKey, http, logger);
        case 'pexels':
            return new PexelsProvider(apiKey, http, logger);
        default:
            throw new UnknownProviderError(name);
    }
}
