import { jest } from '@jest/globals';
import { Response } from 'node-fetch';
import { Readable } from 'stream';
import {
  IMediaProvider,
  IMediaTransport,
  MediaItem,
  MediaStream,
  MediaType,
  SearchResult,
  createSearchResult
} from '../domain';
import { NotFoundError } from '../shared/errors/AppError';
import { ILogger } from '../shared/logging/Logger';

/**
 * Logger whose methods are jest mocks
 */
export function mockLogger() {
  return {
    debug: jest.fn<ILogger['debug']>(),
    info: jest.fn<ILogger['info']>(),
    warn: jest.fn<ILogger['warn']>(),
    error: jest.fn<ILogger['error']>()
  };
}

/**
 * Media item with every URL filled in; override what a test cares about
 */
export function makeItem(overrides: Partial<MediaItem> = {}): MediaItem {
  const id = overrides.id ?? '1';
  return {
    id,
    mediaType: MediaType.IMAGE,
    title: `Item ${id}`,
    description: '',
    tags: [],
    author: 'someone',
    authorUrl: 'https://example.com/users/someone',
    sourceUrl: `https://example.com/photos/${id}`,
    provider: 'Pixabay',
    urls: {
      thumbnail: `https://cdn.example.com/${id}_thumb.jpg`,
      medium: `https://cdn.example.com/${id}_medium.jpg`,
      large: `https://cdn.example.com/${id}_large.jpg`
    },
    metadata: {},
    ...overrides
  };
}

type SearchBehaviour = SearchResult | Error;

/**
 * In-memory provider; search answers come from `results`, lookups from `items`
 */
export class FakeProvider implements IMediaProvider {
  readonly calls: Array<{ method: string; args: unknown[] }> = [];

  constructor(
    readonly name: string,
    private readonly results: SearchBehaviour = createSearchResult({
      total: 0,
      totalHits: 0,
      page: 1,
      perPage: 20,
      items: [],
      provider: name
    }),
    private readonly items: readonly MediaItem[] = []
  ) {}

  async searchImages(query: string, limit: number, page: number): Promise<SearchResult> {
    this.calls.push({ method: 'searchImages', args: [query, limit, page] });
    return this.answer();
  }

  async searchVideos(query: string, limit: number, page: number): Promise<SearchResult> {
    this.calls.push({ method: 'searchVideos', args: [query, limit, page] });
    return this.answer();
  }

  async getMedia(id: string, mediaType: MediaType): Promise<MediaItem> {
    this.calls.push({ method: 'getMedia', args: [id, mediaType] });
    const item = this.items.find(candidate => candidate.id === id && candidate.mediaType === mediaType);
    if (!item) {
      throw new NotFoundError(`${this.name} ${mediaType}`, id);
    }
    return item;
  }

  private answer(): SearchResult {
    if (this.results instanceof Error) {
      throw this.results;
    }
    return this.results;
  }
}

export function providerResult(provider: string, items: MediaItem[], total = items.length, perPage = 20): SearchResult {
  return createSearchResult({
    total,
    totalHits: items.length,
    page: 1,
    perPage,
    items,
    provider
  });
}

export interface FakeResponse {
  chunks?: string[];
  contentType?: string;
  contentLength?: number;
  /** Rejects `open` with this error */
  error?: Error;
  /** Stream emits this error after the chunks */
  streamError?: Error;
  /** Milliseconds before `open` resolves */
  delay?: number;
}

/**
 * Transport serving canned bodies by URL. `peak` is the highest number of
 * `open` calls that were waiting out their delay at the same time.
 */
export class FakeTransport implements IMediaTransport {
  readonly opened: string[] = [];
  peak = 0;
  private pendingOpens = 0;

  constructor(private readonly responses: Record<string, FakeResponse> = {}) {}

  async open(url: string): Promise<MediaStream> {
    this.opened.push(url);
    const response = this.responses[url] ?? { chunks: ['data'] };

    if (response.delay) {
      this.pendingOpens++;
      this.peak = Math.max(this.peak, this.pendingOpens);
      await new Promise(resolve => setTimeout(resolve, response.delay));
      this.pendingOpens--;
    }

    if (response.error) {
      throw response.error;
    }

    return {
      body: Readable.from(this.generate(response)),
      contentLength: response.contentLength,
      contentType: response.contentType
    };
  }

  private async *generate(response: FakeResponse): AsyncGenerator<Buffer> {
    for (const chunk of response.chunks ?? ['data']) {
      yield Buffer.from(chunk);
    }
    if (response.streamError) {
      throw response.streamError;
    }
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, {
    status,
    headers: { 'content-type': 'text/plain; charset=utf-8' }
  });
}
