import { MediaItem, MediaType } from '../entities/Media';
import { SearchResult } from '../entities/SearchResult';

/**
 * Contract every media source implements.
 *
 * Each call makes exactly one upstream request; adapters neither retry nor
 * cache. Zero matches is an empty SearchResult with `total` 0, never an
 * error.
 */
export interface IMediaProvider {
  /**
   * Stable provider name, stamped on every MediaItem it returns.
   * Lookups by name are case-insensitive.
   */
  readonly name: string;

  searchImages(query: string, limit: number, page: number): Promise<SearchResult>;

  searchVideos(query: string, limit: number, page: number): Promise<SearchResult>;

  /**
   * Fetch one item; rejects with NotFoundError when the id does not resolve
   */
  getMedia(id: string, mediaType: MediaType): Promise<MediaItem>;
}
