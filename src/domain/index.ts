// Entities
export * from './entities/Media';
export * from './entities/SearchResult';
export * from './entities/DownloadProgress';
export * from './entities/DownloadResult';

// Interfaces
export * from './interfaces/IMediaProvider';
export * from './interfaces/IMediaTransport';
export * from './interfaces/IFileStorage';

// Value Objects
export * from './value-objects/SearchParams';
export * from './value-objects/Quality';
export * from './value-objects/DownloadConfig';
export * from './value-objects/Filename';
