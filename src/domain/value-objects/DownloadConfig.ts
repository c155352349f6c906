import { ProgressObserver } from '../entities/DownloadProgress';
import { ImageQuality, VideoQuality } from './Quality';

/**
 * Download pipeline settings, fixed for the pipeline's lifetime
 */
export interface DownloadConfig {
  readonly imageQuality: ImageQuality;
  readonly videoQuality: VideoQuality;
  readonly outputDir: string;
  /** Name files after the URL's last path segment instead of `{provider}_{id}.{ext}` */
  readonly useOriginalNames: boolean;
  /** Maximum transfers in flight, always >= 1 */
  readonly maxConcurrent: number;
  readonly onProgress?: ProgressObserver;
}

export const DEFAULT_DOWNLOAD_CONFIG: DownloadConfig = {
  imageQuality: ImageQuality.LARGE,
  videoQuality: VideoQuality.LARGE,
  outputDir: './downloads',
  useOriginalNames: false,
  maxConcurrent: 5
};

/**
 * Zero, negative or non-numeric limits mean serial (1), never unbounded
 */
export function normalizeConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 1) {
    return 1;
  }
  return Math.floor(value);
}

export function createDownloadConfig(overrides: Partial<DownloadConfig> = {}): DownloadConfig {
  const merged = { ...DEFAULT_DOWNLOAD_CONFIG, ...overrides };
  return {
    ...merged,
    maxConcurrent: normalizeConcurrency(merged.maxConcurrent)
  };
}
