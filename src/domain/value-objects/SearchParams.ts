import { ValidationError } from '../../shared/errors/AppError';
import { MediaType } from '../entities/Media';

export const DEFAULT_PER_PAGE = 20;

/**
 * Parameters of one logical search. Immutable: the `with*` setters return
 * a new instance.
 */
export class SearchParams {
  constructor(
    public readonly query: string,
    public readonly mediaType: MediaType = MediaType.IMAGE,
    public readonly limit: number = DEFAULT_PER_PAGE,
    public readonly page: number = 1
  ) {
    if (query.trim().length === 0) {
      throw new ValidationError('Search query cannot be empty');
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Per-page limit must be a positive integer, got ${limit}`);
    }
    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError(`Page must be a positive integer, got ${page}`);
    }
  }

  get perPage(): number {
    return this.limit;
  }

  withLimit(limit: number): SearchParams {
    return new SearchParams(this.query, this.mediaType, limit, this.page);
  }

  withPerPage(perPage: number): SearchParams {
    return this.withLimit(perPage);
  }

  withPage(page: number): SearchParams {
    return new SearchParams(this.query, this.mediaType, this.limit, page);
  }

  withMediaType(mediaType: MediaType): SearchParams {
    return new SearchParams(this.query, mediaType, this.limit, this.page);
  }
}
