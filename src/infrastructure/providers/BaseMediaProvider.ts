import { z } from 'zod';
import { IMediaProvider, MediaItem, MediaType, SearchResult } from '../../domain';
import {
    AppError,
    AuthenticationError,
    HttpError,
    ILogger,
    NotFoundError,
    RateLimitError,
    ResponseParseError,
    ValidationError
} from '../../shared';
import { HttpClient, RequestOptions } from '../http/HttpClient';

/**
 * Shared plumbing for HTTP-backed providers: one GET per call, status
 * translation and payload decoding.
 */
export abstract class BaseMediaProvider implements IMediaProvider {
    abstract readonly name: string;

    constructor(
        protected readonly http: HttpClient,
        protected readonly logger: ILogger
    ) {}

    abstract searchImages(query: string, limit: number, page: number): Promise<SearchResult>;

    abstract searchVideos(query: string, limit: number, page: number): Promise<SearchResult>;

    abstract getMedia(id: string, mediaType: MediaType): Promise<MediaItem>;

    /**
     * GET `url` and decode the body with `schema`
     */
    protected async fetchJson<T>(
        url: string,
        options: RequestOptions,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        context: string
    ): Promise<T> {
        let data: unknown;
        try {
            const response = await this.http.get(url, options);
            data = response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                throw this.translateHttpError(error, context);
            }
            throw error;
        }

        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            throw new ResponseParseError(`${this.name} returned an unexpected ${context} payload`, {
                provider: this.name,
                issues: parsed.error.issues
                    .slice(0, 5)
                    .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            });
        }

        return parsed.data;
    }

    /**
     * Map an upstream status to the error callers branch on
     */
    protected translateHttpError(error: HttpError, context: string): AppError {
        const details = { provider: this.name, status: error.status };

        switch (error.status) {
            case 401:
            case 403:
                return new AuthenticationError(`${this.name} rejected the API key`, details);
            case 404:
                return new NotFoundError(`${this.name} ${context}`, undefined, details);
            case 429:
                return new RateLimitError(`${this.name} rate limit exceeded`, details);
            default:
                return new HttpError(`${this.name} ${context} failed: ${error.message}`, error.status, {
                    provider: this.name
                });
        }
    }

    /**
     * Provider ids are positive integers
     */
    protected parseId(id: string): number {
        const trimmed = id.trim();
        if (!/^\d+$/.test(trimmed)) {
            throw new ValidationError(`Invalid ${this.name} id: ${id}`, { provider: this.name, id });
        }
        return Number(trimmed);
    }
}

/**
 * Split a query on separators and drop empty keywords
 */
export function splitKeywords(query: string, separators: RegExp): string[] {
    return query
        .split(separators)
        .map(keyword => keyword.trim())
        .filter(keyword => keyword.length > 0);
}
