export * from './services/MediaAggregator';
export * from './services/DownloadPipeline';
export * from './services/MediaDownloader';
