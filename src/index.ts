export * from './domain';
export * from './shared';
export * from './application';
export { HttpClient, HttpClientConfig, HttpResponse, RequestOptions } from './infrastructure/http/HttpClient';
export { LocalFileStorage } from './infrastructure/storage/LocalFileStorage';
export { BaseMediaProvider } from './infrastructure/providers/BaseMediaProvider';
export { PixabayProvider } from './infrastructure/providers/PixabayProvider';
export { PexelsProvider } from './infrastructure/providers/PexelsProvider';
export { createProvider, SUPPORTED_PROVIDERS, ProviderName, isSupportedProvider } from './infrastructure/providers/createProvider';
export { ConfigLoader, AppConfig, PartialConfig, toDownloadConfig } from './presentation/config/ConfigLoader';
