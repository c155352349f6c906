import { MediaItem } from './Media';

/**
 * Lifecycle of one transfer. States only move forward:
 * pending -> downloading (any number of times) -> completed | failed
 */
export enum DownloadState {
  PENDING = 'pending',
  DOWNLOADING = 'downloading',
  COMPLETED = 'completed',
  FAILED = 'failed'
}

export function isTerminalState(state: DownloadState): boolean {
  return state === DownloadState.COMPLETED || state === DownloadState.FAILED;
}

/**
 * Progress of a single item
 */
export interface DownloadProgress {
  readonly itemId: string;
  readonly itemTitle: string;
  readonly provider: string;
  readonly state: DownloadState;
  readonly downloadedBytes: number;
  /** Unknown for responses without a content length */
  readonly totalBytes?: number;
  /** 0-100, stays 0 while the total is unknown */
  readonly percentage: number;
  readonly elapsedSeconds: number;
  /** Average bytes per second since the transfer started */
  readonly speedBps: number;
  readonly etaSeconds?: number;
  /** Failure message, only set in the failed state */
  readonly error?: string;
}

/**
 * Batch tick, emitted each time an item finishes
 */
export interface BatchDownloadProgress {
  readonly totalItems: number;
  /** Finished items, failures included */
  readonly completedItems: number;
  readonly failedItems: number;
  readonly downloadingItems: number;
  /** completedItems / totalItems * 100 */
  readonly overallPercentage: number;
  /** Latest progress of items still in flight */
  readonly inFlight: readonly DownloadProgress[];
}

export type ProgressObserver = (progress: DownloadProgress) => void;
export type BatchProgressObserver = (progress: BatchDownloadProgress) => void;

export interface ProgressSample {
  state: DownloadState;
  downloadedBytes: number;
  totalBytes?: number;
  elapsedSeconds: number;
  error?: string;
}

/**
 * Build a progress snapshot for an item, deriving percentage, speed and ETA
 */
export function createProgress(item: MediaItem, sample: ProgressSample): DownloadProgress {
  const { downloadedBytes, totalBytes, elapsedSeconds } = sample;
  const speedBps = elapsedSeconds > 0 ? Math.floor(downloadedBytes / elapsedSeconds) : 0;

  const percentage = totalBytes !== undefined && totalBytes > 0
    ? Math.min(100, (downloadedBytes / totalBytes) * 100)
    : 0;

  const etaSeconds = totalBytes !== undefined && speedBps > 0 && downloadedBytes < totalBytes
    ? (totalBytes - downloadedBytes) / speedBps
    : undefined;

  return {
    itemId: item.id,
    itemTitle: item.title,
    provider: item.provider,
    state: sample.state,
    downloadedBytes,
    totalBytes,
    percentage,
    elapsedSeconds,
    speedBps,
    etaSeconds,
    ...(sample.error !== undefined && { error: sample.error })
  };
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB'];

export function formatBytes(bytes: number): string {
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < BYTE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

export function formatSpeed(progress: DownloadProgress): string {
  return `${formatBytes(progress.speedBps)}/s`;
}

export function formatEta(progress: DownloadProgress): string {
  const secs = progress.etaSeconds;
  if (secs === undefined || !Number.isFinite(secs)) {
    return 'unknown';
  }

  if (secs < 60) {
    return `${Math.round(secs)}s`;
  }
  if (secs < 3600) {
    return `${Math.floor(secs / 60)}m ${Math.round(secs % 60)}s`;
  }
  return `${Math.floor(secs / 3600)}h ${Math.floor((secs % 3600) / 60)}m`;
}
