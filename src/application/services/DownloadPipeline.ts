import {
  BatchDownloadProgress,
  BatchProgressObserver,
  DownloadConfig,
  DownloadProgress,
  DownloadResult,
  DownloadState,
  Filename,
  IFileStorage,
  IMediaProvider,
  IMediaTransport,
  MediaItem,
  MediaType,
  ProgressObserver,
  ProgressSample,
  SavedFile,
  createDownloadConfig,
  createProgress,
  defaultExtension,
  extensionForMimeType,
  extensionOf,
  isTerminalState,
  lastPathSegment,
  selectDownloadUrl,
  summarizeResults
} from '../../domain';
import { DownloadError, ILogger, LoggerFactory, Semaphore } from '../../shared';

/** Minimum gap between two `downloading` events of one item */
export const PROGRESS_INTERVAL_MS = 100;

interface SavedItem {
  path: string;
  bytes: number;
}

type ItemObserver = (index: number, progress: DownloadProgress) => void;

/**
 * Resolves, transfers and stores media items with bounded concurrency.
 *
 * Every batch operation returns one result per input item, in input order,
 * and never stops early because an item failed.
 */
export class DownloadPipeline {
  private readonly config: DownloadConfig;
  private readonly semaphore: Semaphore;

  constructor(
    config: Partial<DownloadConfig>,
    private readonly transport: IMediaTransport,
    private readonly storage: IFileStorage,
    private readonly logger: ILogger = LoggerFactory.getLogger('DownloadPipeline')
  ) {
    this.config = createDownloadConfig(config);
    this.semaphore = new Semaphore(this.config.maxConcurrent);
  }

  getConfig(): DownloadConfig {
    return this.config;
  }

  /**
   * Download one item and return the absolute path it was written to
   */
  async downloadItem(item: MediaItem): Promise<string> {
    const saved = await this.transfer(item);
    return saved.path;
  }

  /**
   * Download items with at most `maxConcurrent` transfers in flight
   */
  async downloadItems(items: readonly MediaItem[]): Promise<DownloadResult[]> {
    return this.runBatch(items);
  }

  /**
   * Like downloadItems, reporting batch progress each time an item finishes
   */
  async downloadItemsWithBatchProgress(
    items: readonly MediaItem[],
    observer: BatchProgressObserver
  ): Promise<DownloadResult[]> {
    const inFlight = new Map<number, DownloadProgress>();
    let completedItems = 0;
    let failedItems = 0;

    return this.runBatch(items, (index, progress) => {
      if (!isTerminalState(progress.state)) {
        inFlight.set(index, progress);
        return;
      }

      inFlight.delete(index);
      completedItems++;
      if (progress.state === DownloadState.FAILED) {
        failedItems++;
      }

      const active = [...inFlight.values()];
      const snapshot: BatchDownloadProgress = {
        totalItems: items.length,
        completedItems,
        failedItems,
        downloadingItems: active.filter(p => p.state === DownloadState.DOWNLOADING).length,
        overallPercentage: (completedItems / items.length) * 100,
        inFlight: active
      };
      observer(snapshot);
    });
  }

  /**
   * Batch entry point used by the CLI: optional batch progress plus a summary log line
   */
  async downloadBatch(
    items: readonly MediaItem[],
    observer?: BatchProgressObserver
  ): Promise<DownloadResult[]> {
    this.logger.info(`Downloading ${items.length} item(s)`, {
      outputDir: this.config.outputDir,
      maxConcurrent: this.config.maxConcurrent
    });

    const results = observer
      ? await this.downloadItemsWithBatchProgress(items, observer)
      : await this.downloadItems(items);

    const summary = summarizeResults(results);
    this.logger.info(`Batch finished: ${summary.succeeded} succeeded, ${summary.failed} failed`, {
      bytes: summary.totalBytes
    });

    return results;
  }

  /**
   * Look an item up on `provider` and download it
   */
  async downloadById(id: string, mediaType: MediaType, provider: IMediaProvider): Promise<string> {
    const item = await provider.getMedia(id, mediaType);
    return this.downloadItem(item);
  }

  private async runBatch(
    items: readonly MediaItem[],
    onProgress?: ItemObserver
  ): Promise<DownloadResult[]> {
    // Repeats of an item would race on the same target file, so they share the first transfer
    const transfers = new Map<string, Promise<DownloadResult>>();

    return Promise.all(
      items.map((item, index) => {
        const key = `${item.provider.toLowerCase()}:${item.mediaType}:${item.id}`;
        const first = transfers.get(key);
        if (first) {
          return this.settleRepeat(item, first, this.itemObserver(index, onProgress));
        }

        const transfer = this.semaphore.run(() =>
          this.settle(item, this.itemObserver(index, onProgress))
        );
        transfers.set(key, transfer);
        return transfer;
      })
    );
  }

  private itemObserver(index: number, onProgress?: ItemObserver): ProgressObserver | undefined {
    return onProgress ? progress => onProgress(index, progress) : undefined;
  }

  private async settle(item: MediaItem, observer?: ProgressObserver): Promise<DownloadResult> {
    try {
      const saved = await this.transfer(item, observer);
      return DownloadResult.success(item, saved.path, saved.bytes);
    } catch (error) {
      return DownloadResult.failure(item, this.toDownloadError(item, error));
    }
  }

  private async settleRepeat(
    item: MediaItem,
    first: Promise<DownloadResult>,
    observer?: ProgressObserver
  ): Promise<DownloadResult> {
    this.notify(createProgress(item, { state: DownloadState.PENDING, downloadedBytes: 0, elapsedSeconds: 0 }), observer);
    const result = await first;

    if (result.success) {
      this.notify(createProgress(item, {
        state: DownloadState.COMPLETED,
        downloadedBytes: result.bytes,
        totalBytes: result.bytes,
        elapsedSeconds: 0
      }), observer);
      return DownloadResult.success(item, result.path, result.bytes);
    }

    this.notify(createProgress(item, {
      state: DownloadState.FAILED,
      downloadedBytes: 0,
      elapsedSeconds: 0,
      error: result.error.message
    }), observer);
    return DownloadResult.failure(item, result.error);
  }

  private async transfer(item: MediaItem, observer?: ProgressObserver): Promise<SavedItem> {
    const startedAt = Date.now();
    const emit = (sample: Omit<ProgressSample, 'elapsedSeconds'>): void => {
      const progress = createProgress(item, {
        ...sample,
        elapsedSeconds: (Date.now() - startedAt) / 1000
      });
      this.notify(progress, observer);
    };

    emit({ state: DownloadState.PENDING, downloadedBytes: 0 });

    let downloadedBytes = 0;
    let totalBytes: number | undefined;
    let saved: SavedFile;

    try {
      const url = selectDownloadUrl(item, this.config.imageQuality, this.config.videoQuality);
      this.logger.debug(`Downloading ${item.provider}/${item.id}`, { url });

      await this.storage.createDirectory('.');
      const stream = await this.transport.open(url);
      const filename = this.filenameFor(item, url, stream.contentType);
      totalBytes = stream.contentLength;

      emit({ state: DownloadState.DOWNLOADING, downloadedBytes: 0, totalBytes });
      let lastEmit = Date.now();

      saved = await this.storage.save(filename, stream.body, {
        overwrite: true,
        progressCallback: ({ savedBytes }) => {
          downloadedBytes = savedBytes;
          const now = Date.now();
          if (now - lastEmit < PROGRESS_INTERVAL_MS) {
            return;
          }
          lastEmit = now;
          emit({ state: DownloadState.DOWNLOADING, downloadedBytes: savedBytes, totalBytes });
        }
      });
    } catch (error) {
      const failure = this.toDownloadError(item, error);
      emit({ state: DownloadState.FAILED, downloadedBytes, totalBytes, error: failure.message });
      this.logger.warn(failure.message, { provider: item.provider });
      throw failure;
    }

    emit({
      state: DownloadState.COMPLETED,
      downloadedBytes: saved.size,
      totalBytes: totalBytes ?? saved.size
    });
    this.logger.debug(`Saved ${item.provider}/${item.id} to ${saved.path}`, { bytes: saved.size });

    return { path: saved.path, bytes: saved.size };
  }

  /**
   * Observers never affect the transfer: a throwing one is logged and skipped
   */
  private notify(progress: DownloadProgress, observer?: ProgressObserver): void {
    [this.config.onProgress, observer].forEach(listener => {
      if (!listener) {
        return;
      }
      try {
        listener(progress);
      } catch (listenerError) {
        this.logger.warn(`Progress observer failed for ${progress.provider}/${progress.itemId}`, {
          state: progress.state,
          error: listenerError instanceof Error ? listenerError.message : String(listenerError)
        });
      }
    });
  }

  /**
   * `{provider}_{id}.{ext}`, or the URL's own file name when configured and usable
   */
  private filenameFor(item: MediaItem, url: string, contentType?: string): string {
    if (this.config.useOriginalNames) {
      const original = Filename.fromUrl(url);
      if (original) {
        return original.toString();
      }
    }

    const extension =
      extensionOf(lastPathSegment(url) ?? '') ||
      extensionForMimeType(contentType) ||
      defaultExtension(item.mediaType);

    return Filename.forItem(item.provider, item.id, extension).toString();
  }

  private toDownloadError(item: MediaItem, error: unknown): DownloadError {
    if (error instanceof DownloadError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new DownloadError(item.id, item.title, message, error);
  }
}
