import {
  AggregatedSearchResult,
  IMediaProvider,
  MediaType,
  SearchParams,
  SearchResult,
  aggregateResults
} from '../../domain';
import {
  AllProvidersFailedError,
  ILogger,
  LoggerFactory,
  NoProvidersError,
  UnknownProviderError
} from '../../shared';

/**
 * Fans a search out to every registered provider and merges what comes back.
 *
 * Registration order is significant: merged items keep it, and name lookups
 * return the first match when two providers share a name.
 */
export class MediaAggregator {
  private readonly providers: IMediaProvider[] = [];

  constructor(private readonly logger: ILogger = LoggerFactory.getLogger('MediaAggregator')) {}

  register(provider: IMediaProvider): this {
    this.providers.push(provider);
    this.logger.debug(`Registered provider ${provider.name}`, { count: this.providers.length });
    return this;
  }

  getProviders(): readonly IMediaProvider[] {
    return [...this.providers];
  }

  /**
   * Case-insensitive lookup by provider name
   */
  getProvider(name: string): IMediaProvider | undefined {
    const wanted = name.trim().toLowerCase();
    return this.providers.find(provider => provider.name.toLowerCase() === wanted);
  }

  /**
   * Query every provider concurrently. Fails only when none are registered
   * or every one of them fails; partial failures are logged and dropped.
   */
  async search(params: SearchParams): Promise<AggregatedSearchResult> {
    const providers = [...this.providers];
    if (providers.length === 0) {
      throw new NoProvidersError();
    }

    this.logger.debug(`Searching ${providers.length} provider(s)`, {
      query: params.query,
      mediaType: params.mediaType,
      page: params.page
    });

    const outcomes = await Promise.allSettled(
      providers.map(provider => this.searchOne(provider, params))
    );

    const results: SearchResult[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
        return;
      }

      const reason: unknown = outcome.reason;
      this.logger.warn(`Provider ${providers[index].name} failed`, {
        provider: providers[index].name,
        error: reason instanceof Error ? reason.message : String(reason)
      });
    });

    if (results.length === 0) {
      throw new AllProvidersFailedError(providers.length);
    }

    return aggregateResults(results, params.page, params.perPage);
  }

  /**
   * Query one provider by name; its errors propagate unchanged
   */
  async searchFromProvider(name: string, params: SearchParams): Promise<SearchResult> {
    const provider = this.getProvider(name);
    if (!provider) {
      throw new UnknownProviderError(name);
    }

    return this.searchOne(provider, params);
  }

  private async searchOne(provider: IMediaProvider, params: SearchParams): Promise<SearchResult> {
    if (params.mediaType === MediaType.VIDEO) {
      return provider.searchVideos(params.query, params.limit, params.page);
    }
    return provider.searchImages(params.query, params.limit, params.page);
  }
}
