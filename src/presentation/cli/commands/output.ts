import {
    AggregatedSearchResult,
    BatchDownloadProgress,
    DownloadResult,
    MediaItem,
    SearchResult,
    formatBytes,
    summarizeResults
} from '../../../domain';

/**
 * Header and one block per item
 */
export function formatSearchResult(result: SearchResult | AggregatedSearchResult): string[] {
    const lines = [
        `Found ${result.total} result(s), showing ${result.items.length} ` +
        `(page ${result.page} of ${result.totalPages})`
    ];

    result.items.forEach((item, index) => {
        lines.push(...formatItem(item, index + 1));
    });

    return lines;
}

export function formatItem(item: MediaItem, position: number): string[] {
    const title = item.title.length > 0 ? item.title : '(untitled)';
    return [
        `${position}. [${item.provider}] ${item.id} ${title}`,
        `   by ${item.author} - ${item.sourceUrl}`
    ];
}

/**
 * Single-line batch status, e.g. `[3/10] 30.0% (1 failed, 2 downloading)`
 */
export function formatBatchProgress(progress: BatchDownloadProgress): string {
    const parts = [
        `[${progress.completedItems}/${progress.totalItems}]`,
        `${progress.overallPercentage.toFixed(1)}%`
    ];

    const notes: string[] = [];
    if (progress.failedItems > 0) {
        notes.push(`${progress.failedItems} failed`);
    }
    if (progress.downloadingItems > 0) {
        notes.push(`${progress.downloadingItems} downloading`);
    }
    if (notes.length > 0) {
        parts.push(`(${notes.join(', ')})`);
    }

    return parts.join(' ');
}

export function formatDownloadSummary(results: readonly DownloadResult[]): string[] {
    const summary = summarizeResults(results);
    const lines = [
        `Downloaded ${summary.succeeded} of ${results.length} item(s), ${formatBytes(summary.totalBytes)}`
    ];

    results.forEach(result => {
        if (result.success) {
            lines.push(`  ok   ${result.provider}/${result.itemId} -> ${result.path}`);
        } else {
            lines.push(`  fail ${result.provider}/${result.itemId}: ${result.error.message}`);
        }
    });

    return lines;
}
