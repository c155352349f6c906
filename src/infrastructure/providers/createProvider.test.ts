import { describe, it, expect } from '@jest/globals';
import { SUPPORTED_PROVIDERS, createProvider, isSupportedProvider } from './createProvider';
import { PexelsProvider } from './PexelsProvider';
import { PixabayProvider } from './PixabayProvider';
import { HttpClient } from '../http/HttpClient';
import { ConfigurationError, UnknownProviderError } from '../../shared';
import { mockLogger } from '../../test-support/fixtures';

describe('createProvider', () => {
    const http = new HttpClient(mockLogger());

    it('should build adapters by name in any case', () => {
        expect(createProvider('pixabay', 'test-key', http, mockLogger())).toBeInstanceOf(PixabayProvider);
        expect(createProvider('Pexels', 'test-key', http, mockLogger())).toBeInstanceOf(PexelsProvider);
        expect(createProvider(' PEXELS ', 'test-key', http, mockLogger()).name).toBe('Pexels');
    });

    it('should refuse an empty API key', () => {
        expect(() => createProvider('pixabay', '  ', http)).toThrow(ConfigurationError);
        expect(() => createProvider('pixabay', '', http)).toThrow("API key for provider 'pixabay' is empty");
    });

    it('should refuse unknown providers', () => {
        expect(() => createProvider('unsplash', 'test-key', http)).toThrow(UnknownProviderError);
    });

    it('should list the supported providers', () => {
        expect(SUPPORTED_PROVIDERS).toEqual(['pixabay', 'pexels']);
        expect(isSupportedProvider('Pixabay')).toBe(true);
        expect(isSupportedProvider('flickr')).toBe(false);
    });
});
