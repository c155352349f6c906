import { DownloadError } from '../../shared/errors/AppError';
import { MediaItem } from './Media';

/**
 * Outcome of one item in a batch; batches return one per input item, in
 * input order
 */
export type DownloadResult = DownloadSuccess | DownloadFailure;

export interface DownloadSuccess {
  readonly success: true;
  readonly itemId: string;
  readonly provider: string;
  readonly path: string;
  readonly bytes: number;
}

export interface DownloadFailure {
  readonly success: false;
  readonly itemId: string;
  readonly provider: string;
  readonly error: DownloadError;
}

export const DownloadResult = {
  success(item: MediaItem, path: string, bytes: number): DownloadSuccess {
    return { success: true, itemId: item.id, provider: item.provider, path, bytes };
  },

  failure(item: MediaItem, error: DownloadError): DownloadFailure {
    return { success: false, itemId: item.id, provider: item.provider, error };
  }
};

export interface DownloadSummary {
  succeeded: number;
  failed: number;
  paths: string[];
  totalBytes: number;
  /** Percentage of items that succeeded */
  successRate: number;
}

export function summarizeResults(results: readonly DownloadResult[]): DownloadSummary {
  const paths: string[] = [];
  let failed = 0;
  let totalBytes = 0;

  for (const result of results) {
    if (result.success) {
      paths.push(result.path);
      totalBytes += result.bytes;
    } else {
      failed++;
    }
  }

  return {
    succeeded: paths.length,
    failed,
    paths,
    totalBytes,
    successRate: results.length > 0 ? (paths.length / results.length) * 100 : 0
  };
}
