import {
  AggregatedSearchResult,
  BatchProgressObserver,
  DownloadConfig,
  DownloadResult,
  IFileStorage,
  IMediaProvider,
  IMediaTransport,
  MediaItem,
  MediaType,
  SearchParams,
  SearchResult,
  createDownloadConfig
} from '../../domain';
import { HttpClient } from '../../infrastructure/http/HttpClient';
import { createProvider } from '../../infrastructure/providers/createProvider';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import {
  ILogger,
  LoggerFactory,
  NoProvidersError,
  NotFoundError,
  UnknownProviderError
} from '../../shared';
import { DownloadPipeline } from './DownloadPipeline';
import { MediaAggregator } from './MediaAggregator';

export interface MediaDownloaderOptions {
  config?: Partial<DownloadConfig>;
  http?: HttpClient;
  /** Defaults to the HTTP client */
  transport?: IMediaTransport;
  /** Defaults to local files under `config.outputDir` */
  storage?: IFileStorage;
  logger?: ILogger;
}

/**
 * Search and download across every registered provider
 */
export class MediaDownloader {
  private readonly aggregator: MediaAggregator;
  private readonly pipeline: DownloadPipeline;
  private readonly http: HttpClient;
  private readonly logger: ILogger;

  constructor(options: MediaDownloaderOptions = {}) {
    const config = createDownloadConfig(options.config);

    this.logger = options.logger ?? LoggerFactory.getLogger('MediaDownloader');
    this.http = options.http ?? new HttpClient(LoggerFactory.getLogger('HttpClient'));
    this.aggregator = new MediaAggregator(this.logger);
    this.pipeline = new DownloadPipeline(
      config,
      options.transport ?? this.http,
      options.storage ?? new LocalFileStorage(this.logger, config.outputDir),
      this.logger
    );
  }

  addProvider(provider: IMediaProvider): this {
    this.aggregator.register(provider);
    return this;
  }

  /**
   * Build and register a provider; a bad name or empty key is logged and
   * skipped. Returns whether the provider was added.
   */
  addProviderByName(name: string, apiKey: string): boolean {
    try {
      this.aggregator.register(createProvider(name, apiKey, this.http, this.logger));
      return true;
    } catch (error) {
      this.logger.warn(`Skipping provider ${name}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  providers(): readonly IMediaProvider[] {
    return this.aggregator.getProviders();
  }

  getConfig(): DownloadConfig {
    return this.pipeline.getConfig();
  }

  search(params: SearchParams): Promise<AggregatedSearchResult> {
    return this.aggregator.search(params);
  }

  searchFromProvider(name: string, params: SearchParams): Promise<SearchResult> {
    return this.aggregator.searchFromProvider(name, params);
  }

  downloadItem(item: MediaItem): Promise<string> {
    return this.pipeline.downloadItem(item);
  }

  downloadItems(items: readonly MediaItem[]): Promise<DownloadResult[]> {
    return this.pipeline.downloadItems(items);
  }

  downloadItemsWithBatchProgress(
    items: readonly MediaItem[],
    observer: BatchProgressObserver
  ): Promise<DownloadResult[]> {
    return this.pipeline.downloadItemsWithBatchProgress(items, observer);
  }

  downloadBatch(items: readonly MediaItem[], observer?: BatchProgressObserver): Promise<DownloadResult[]> {
    return this.pipeline.downloadBatch(items, observer);
  }

  /**
   * Download by provider id. Without a provider name each registered
   * provider is asked in turn and the first one that knows the id wins.
   */
  async downloadById(id: string, mediaType: MediaType, providerName?: string): Promise<string> {
    if (providerName !== undefined) {
      const provider = this.aggregator.getProvider(providerName);
      if (!provider) {
        throw new UnknownProviderError(providerName);
      }
      return this.pipeline.downloadById(id, mediaType, provider);
    }

    const providers = this.aggregator.getProviders();
    if (providers.length === 0) {
      throw new NoProvidersError();
    }

    for (const provider of providers) {
      let item: MediaItem;
      try {
        item = await provider.getMedia(id, mediaType);
      } catch (error) {
        this.logger.debug(`${provider.name} has no ${mediaType} ${id}`, {
          error: error instanceof Error ? error.message : String(error)
        });
        continue;
      }
      return this.pipeline.downloadItem(item);
    }

    throw new NotFoundError(`${mediaType} on any provider`, id, {
      providers: providers.map(provider => provider.name)
    });
  }
}
