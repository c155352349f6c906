import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import nodeFetch, { FetchError, Response } from 'node-fetch';
import { Readable } from 'stream';
import { DEFAULT_USER_AGENT, HttpClient } from './HttpClient';
import { AppError, HttpError, NetworkError, ResponseParseError, TimeoutError } from '../../shared/errors/AppError';
import { jsonResponse, mockLogger, textResponse } from '../../test-support/fixtures';

jest.mock('node-fetch', () => {
    const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
    return { __esModule: true, ...actual, default: jest.fn() };
});

const mockedFetch = jest.mocked(nodeFetch);

describe('HttpClient', () => {
    let logger: ReturnType<typeof mockLogger>;
    let client: HttpClient;

    beforeEach(() => {
        mockedFetch.mockReset();
        logger = mockLogger();
        client = new HttpClient(logger);
    });

    describe('get', () => {
        it('should append query parameters and decode JSON', async () => {
            mockedFetch.mockResolvedValueOnce(jsonResponse({ hits: [1, 2] }));

            const response = await client.get('https://api.example.com/items', {
                params: { q: 'cats dogs', page: 2, skip: undefined }
            });

            expect(response.data).toEqual({ hits: [1, 2] });
            expect(response.status).toBe(200);
            expect(response.headers['content-type']).toBe('application/json');
            expect(mockedFetch).toHaveBeenCalledWith(
                'https://api.example.com/items?q=cats+dogs&page=2',
                {
                    method: 'GET',
                    headers: { 'User-Agent': DEFAULT_USER_AGENT },
                    timeout: 30000
                }
            );
        });

        it('should prefix relative paths with the base URL and merge headers', async () => {
            client = new HttpClient(logger, { baseUrl: 'https://api.example.com', timeout: 500 });
            mockedFetch.mockResolvedValueOnce(jsonResponse({}));

            await client.get('/v1/search', { headers: { Authorization: 'test-key' } });

            expect(mockedFetch).toHaveBeenCalledWith('https://api.example.com/v1/search', {
                method: 'GET',
                headers: { 'User-Agent': DEFAULT_USER_AGENT, Authorization: 'test-key' },
                timeout: 500
            });
        });

        it('should return text bodies as strings', async () => {
            mockedFetch.mockResolvedValueOnce(textResponse('plain body', 200));

            const response = await client.get('https://api.example.com/text');

            expect(response.data).toBe('plain body');
        });

        it('should raise HttpError with the message from a JSON error body', async () => {
            mockedFetch.mockResolvedValueOnce(jsonResponse({ error: 'Invalid key' }, 401));

            await expect(client.get('https://api.example.com/items')).rejects.toMatchObject({
                status: 401,
                message: 'Invalid key'
            });
        });

        it('should raise HttpError with a plain-text error body', async () => {
            mockedFetch.mockResolvedValueOnce(textResponse('[ERROR 400] Invalid or missing API key', 400));

            const error = await client.get('https://api.example.com/items').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toHaveProperty('message', '[ERROR 400] Invalid or missing API key');
            expect(error).toHaveProperty('status', 400);
        });

        it('should raise ResponseParseError for malformed JSON on success', async () => {
            mockedFetch.mockResolvedValueOnce(new Response('{"hits": [', {
                status: 200,
                headers: { 'content-type': 'application/json' }
            }));

            await expect(client.get('https://api.example.com/items')).rejects.toBeInstanceOf(ResponseParseError);
        });

        it('should map request timeouts to TimeoutError', async () => {
            mockedFetch.mockRejectedValueOnce(new FetchError('network timeout', 'request-timeout'));

            const error = await client.get('https://api.example.com/slow', { timeout: 50 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(TimeoutError);
            expect(error).toHaveProperty('message', "Operation 'GET https://api.example.com/slow' timed out after 50ms");
        });

        it('should map other transport failures to NetworkError', async () => {
            mockedFetch.mockRejectedValueOnce(new FetchError('getaddrinfo ENOTFOUND api.example.com', 'system'));

            const error = await client.get('https://api.example.com/items').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(NetworkError);
            expect(error).toHaveProperty('message', 'getaddrinfo ENOTFOUND api.example.com');
        });

        it('should not retry by default', async () => {
            mockedFetch.mockResolvedValueOnce(textResponse('down', 503));

            await expect(client.get('https://api.example.com/items')).rejects.toMatchObject({ status: 503 });
            expect(mockedFetch).toHaveBeenCalledTimes(1);
        });

        it('should retry server errors when configured to', async () => {
            client = new HttpClient(logger, { retries: 2, retryDelay: 1 });
            mockedFetch
                .mockResolvedValueOnce(textResponse('down', 503))
                .mockResolvedValueOnce(jsonResponse({ ok: true }));
            const retries: Array<[AppError, number]> = [];

            const response = await client.get('https://api.example.com/items', {
                onRetry: (error, attempt) => retries.push([error, attempt])
            });

            expect(response.data).toEqual({ ok: true });
            expect(mockedFetch).toHaveBeenCalledTimes(2);
            expect(retries).toHaveLength(1);
            expect(retries[0][0]).toBeInstanceOf(HttpError);
            expect(retries[0][1]).toBe(1);
        });

        it('should not retry client errors', async () => {
            client = new HttpClient(logger, { retries: 2, retryDelay: 1 });
            mockedFetch.mockResolvedValueOnce(jsonResponse({ message: 'nope' }, 404));

            await expect(client.get('https://api.example.com/items')).rejects.toMatchObject({
                status: 404,
                message: 'nope'
            });
            expect(mockedFetch).toHaveBeenCalledTimes(1);
        });

        it('should redact API keys from logged URLs', async () => {
            mockedFetch.mockResolvedValueOnce(jsonResponse({}));

            await client.get('https://pixabay.com/api/', { params: { key: 'test-secret', q: 'cats' } });

            expect(logger.debug).toHaveBeenCalledWith('HTTP GET https://pixabay.com/api/?key=***&q=cats (attempt 1)');
        });
    });

    describe('open', () => {
        it('should hand out the body stream with its length and type', async () => {
            mockedFetch.mockResolvedValueOnce(new Response(Readable.from([Buffer.from('abcdef')]), {
                status: 200,
                headers: { 'content-type': 'image/jpeg', 'content-length': '6' }
            }));

            const stream = await client.open('https://cdn.example.com/a.jpg');

            expect(stream.contentLength).toBe(6);
            expect(stream.contentType).toBe('image/jpeg');

            const chunks: Buffer[] = [];
            for await (const chunk of stream.body) {
                chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
            }
            expect(Buffer.concat(chunks).toString()).toBe('abcdef');
        });

        it('should leave the length unknown when the header is missing', async () => {
            mockedFetch.mockResolvedValueOnce(new Response(Readable.from([Buffer.from('x')]), { status: 200 }));

            const stream = await client.open('https://cdn.example.com/a.jpg');

            expect(stream.contentLength).toBeUndefined();
            expect(stream.contentType).toBeUndefined();
        });

        it('should raise HttpError before handing out a failed body', async () => {
            mockedFetch.mockResolvedValueOnce(textResponse('Not Found', 404));

            await expect(client.open('https://cdn.example.com/missing.jpg')).rejects.toMatchObject({
                status: 404,
                message: 'Not Found'
            });
        });
    });

    it('should derive a client with updated configuration', () => {
        const derived = client.withConfig({ timeout: 1000 });

        expect(derived.getConfig().timeout).toBe(1000);
        expect(client.getConfig().timeout).toBe(30000);
        expect(derived.getConfig().headers['User-Agent']).toBe(DEFAULT_USER_AGENT);
    });
});
