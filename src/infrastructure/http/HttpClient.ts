import nodeFetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { IMediaTransport, MediaStream } from '../../domain/interfaces/IMediaTransport';
import { Logger } from '../../shared/logging/Logger';
import {
    AppError,
    HttpError,
    NetworkError,
    ResponseParseError,
    TimeoutError
} from '../../shared/errors/AppError';

export interface HttpClientConfig {
    baseUrl?: string;
    timeout?: number;
    retries?: number;
    retryDelay?: number;
    maxRetryDelay?: number;
    backoffFactor?: number;
    headers?: Record<string, string>;
}

export type QueryParams = Record<string, string | number | undefined>;

export interface RequestOptions {
    params?: QueryParams;
    headers?: Record<string, string>;
    timeout?: number;
    retries?: number;
    onRetry?: (error: AppError, attempt: number) => void;
}

export interface HttpResponse<T = unknown> {
    data: T;
    status: number;
    statusText: string;
    headers: Record<string, string>;
}

export const DEFAULT_USER_AGENT = 'polystock/1.0';

/**
 * GET-only client over node-fetch.
 *
 * Failures surface as AppErrors: HttpError for non-2xx statuses, TimeoutError
 * and NetworkError for transport problems, ResponseParseError for bodies that
 * claim to be JSON but are not. Retries are off unless configured.
 */
export class HttpClient implements IMediaTransport {
    private config: Required<HttpClientConfig>;

    constructor(
        private logger: Logger,
        config: HttpClientConfig = {}
    ) {
        this.config = {
            baseUrl: '',
            timeout: 30000,
            retries: 0,
            retryDelay: 1000,
            maxRetryDelay: 30000,
            backoffFactor: 2,
            ...config,
            headers: {
                'User-Agent': DEFAULT_USER_AGENT,
                ...config.headers
            }
        };
    }

    /**
     * GET a resource and decode the body by content type
     */
    async get(url: string, options: RequestOptions = {}): Promise<HttpResponse<unknown>> {
        const response = await this.send('GET', url, options);
        return this.processResponse(response, url);
    }

    /**
     * Open a download stream; the status is checked before the body is handed out
     */
    async open(url: string, options: RequestOptions = {}): Promise<MediaStream> {
        const response = await this.send('GET', url, options);

        if (!response.ok) {
            const text = await response.text().catch(() => '');
            throw new HttpError(
                this.extractErrorMessage(text, response),
                response.status,
                { url }
            );
        }

        const length = Number.parseInt(response.headers.get('content-length') ?? '', 10);
        return {
            body: response.body,
            contentLength: Number.isNaN(length) ? undefined : length,
            contentType: response.headers.get('content-type') ?? undefined
        };
    }

    private async send(method: string, url: string, options: RequestOptions): Promise<Response> {
        const fullUrl = this.buildUrl(url, options.params);
        const timeout = options.timeout ?? this.config.timeout;
        const retries = options.retries ?? this.config.retries;

        const init: RequestInit = {
            method,
            headers: {
                ...this.config.headers,
                ...options.headers
            },
            timeout
        };

        let lastError: AppError | undefined;
        let delay = this.config.retryDelay;

        for (let attempt = 0; attempt <= retries; attempt++) {
            if (attempt > 0) {
                await this.sleep(delay);
                delay = Math.min(delay * this.config.backoffFactor, this.config.maxRetryDelay);
            }

            this.logger.debug(`HTTP ${method} ${this.redact(fullUrl)} (attempt ${attempt + 1})`);

            let response: Response;
            try {
                response = await nodeFetch(fullUrl, init);
            } catch (error) {
                lastError = this.translateError(error, method, fullUrl, timeout);
                this.noteRetry(lastError, attempt, retries, delay, options.onRetry);
                continue;
            }

            if (attempt < retries && this.shouldRetryResponse(response)) {
                lastError = new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    { url: this.redact(fullUrl) }
                );
                this.noteRetry(lastError, attempt, retries, delay, options.onRetry);
                continue;
            }

            return response;
        }

        throw lastError ?? new NetworkError(`Request failed: ${this.redact(fullUrl)}`);
    }

    private noteRetry(
        error: AppError,
        attempt: number,
        retries: number,
        delay: number,
        onRetry?: (error: AppError, attempt: number) => void
    ): void {
        if (attempt >= retries) {
            return;
        }

        this.logger.warn(
            `Request failed, retrying in ${delay}ms (attempt ${attempt + 1}/${retries}): ${error.message}`
        );
        onRetry?.(error, attempt + 1);
    }

    private shouldRetryResponse(response: Response): boolean {
        return (
            response.status >= 500 ||
            response.status === 429 || // Too Many Requests
            response.status === 408    // Request Timeout
        );
    }

    private translateError(error: unknown, method: string, url: string, timeout: number): AppError {
        if (error instanceof AppError) {
            return error;
        }

        const redacted = this.redact(url);
        if (error instanceof FetchError) {
            if (error.type === 'request-timeout') {
                return new TimeoutError(`${method} ${redacted}`, timeout);
            }
            return new NetworkError(error.message, { url: redacted, code: error.code });
        }

        const message = error instanceof Error ? error.message : String(error);
        return new NetworkError(message, { url: redacted });
    }

    private async processResponse(response: Response, url: string): Promise<HttpResponse<unknown>> {
        const contentType = response.headers.get('content-type') || '';
        let data: unknown;

        if (contentType.includes('application/json')) {
            const text = await response.text();
            try {
                data = text.length > 0 ? JSON.parse(text) : null;
            } catch (error) {
                // error bodies are reported by status below, not as parse failures
                if (response.ok) {
                    throw new ResponseParseError(
                        `Failed to parse response: ${error instanceof Error ? error.message : String(error)}`,
                        { url: this.redact(url) }
                    );
                }
                data = text;
            }
        } else if (contentType.includes('text/') || !response.ok) {
            data = await response.text();
        } else {
            data = await response.buffer();
        }

        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            headers[key] = value;
        });

        if (!response.ok) {
            throw new HttpError(
                this.extractErrorMessage(data, response),
                response.status,
                { url: this.redact(url) }
            );
        }

        return {
            data,
            status: response.status,
            statusText: response.statusText,
            headers
        };
    }

    private buildUrl(url: string, params?: QueryParams): string {
        const fullUrl = url.startsWith('http')
            ? url
            : `${this.config.baseUrl}${url}`;

        if (!params) {
            return fullUrl;
        }

        const urlObj = new URL(fullUrl);
        Object.entries(params).forEach(([key, value]) => {
            if (value !== undefined) {
                urlObj.searchParams.append(key, String(value));
            }
        });

        return urlObj.toString();
    }

    /**
     * Strip credentials passed as query parameters before a URL is logged
     */
    private redact(url: string): string {
        return url.replace(/([?&]key=)[^&]*/g, '$1***');
    }

    private extractErrorMessage(data: unknown, response: Response): string {
        if (typeof data === 'object' && data !== null) {
            const fields = new Map<string, unknown>(Object.entries(data));
            for (const key of ['message', 'error', 'error_description', 'detail']) {
                const value = fields.get(key);
                if (typeof value === 'string' && value.length > 0) {
                    return value;
                }
            }
        }

        if (typeof data === 'string' && data.trim().length > 0) {
            return data.trim();
        }

        return response.statusText || `HTTP ${response.status}`;
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }

    /**
     * Create a new instance with updated configuration
     */
    withConfig(config: HttpClientConfig): HttpClient {
        return new HttpClient(this.logger, {
            ...this.config,
            ...config
        });
    }

    /**
     * Get current configuration
     */
    getConfig(): Readonly<Required<HttpClientConfig>> {
        return { ...this.config };
    }
}
