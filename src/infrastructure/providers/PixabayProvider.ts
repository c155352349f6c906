import { MediaItem, MediaType, SearchResult, VideoFile, createSearchResult } from '../../domain';
import { AppError, AuthenticationError, HttpError, ILogger, LoggerFactory, NotFoundError } from '../../shared';
import { HttpClient, QueryParams } from '../http/HttpClient';
import { BaseMediaProvider, splitKeywords } from './BaseMediaProvider';
import {
    PixabayImageHit,
    PixabayVideoHit,
    PixabayVideoRendition,
    pixabayImageResponseSchema,
    pixabayVideoResponseSchema
} from './pixabaySchemas';

export const PIXABAY_IMAGE_ENDPOINT = 'https://pixabay.com/api/';
export const PIXABAY_VIDEO_ENDPOINT = 'https://pixabay.com/api/videos/';

const MIN_PER_PAGE = 3;
const MAX_PER_PAGE = 200;
const RENDITIONS = ['large', 'medium', 'small', 'tiny'] as const;

/**
 * Pixabay image and video search.
 *
 * Keywords are sent space-separated, which the query string encodes as `+`.
 * Pixabay only accepts 3-200 results per page, so the page size is clamped
 * on the wire while the result keeps the caller's `perPage`.
 */
export class PixabayProvider extends BaseMediaProvider {
    readonly name = 'Pixabay';

    constructor(
        private readonly apiKey: string,
        http: HttpClient,
        logger: ILogger = LoggerFactory.getLogger('PixabayProvider')
    ) {
        super(http, logger);
    }

    /**
     * "nature, landscape;mountain" -> ["nature", "landscape", "mountain"]
     */
    static keywords(query: string): string[] {
        return splitKeywords(query, /[\s,;|]+/);
    }

    async searchImages(query: string, limit: number, page: number): Promise<SearchResult> {
        const body = await this.fetchJson(
            PIXABAY_IMAGE_ENDPOINT,
            { params: this.searchParams(query, limit, page) },
            pixabayImageResponseSchema,
            'image search'
        );

        this.logger.debug(`Pixabay image search returned ${body.hits.length} of ${body.total}`, { query, page });

        return createSearchResult({
            total: body.total,
            totalHits: body.totalHits,
            page,
            perPage: limit,
            items: body.hits.map(hit => this.toImageItem(hit)),
            provider: this.name
        });
    }

    async searchVideos(query: string, limit: number, page: number): Promise<SearchResult> {
        const body = await this.fetchJson(
            PIXABAY_VIDEO_ENDPOINT,
            { params: this.searchParams(query, limit, page) },
            pixabayVideoResponseSchema,
            'video search'
        );

        this.logger.debug(`Pixabay video search returned ${body.hits.length} of ${body.total}`, { query, page });

        return createSearchResult({
            total: body.total,
            totalHits: body.totalHits,
            page,
            perPage: limit,
            items: body.hits.map(hit => this.toVideoItem(hit)),
            provider: this.name
        });
    }

    async getMedia(id: string, mediaType: MediaType): Promise<MediaItem> {
        const params = { key: this.apiKey, id: this.parseId(id) };

        if (mediaType === MediaType.VIDEO) {
            const body = await this.fetchJson(
                PIXABAY_VIDEO_ENDPOINT,
                { params },
                pixabayVideoResponseSchema,
                'video lookup'
            );
            const [hit] = body.hits;
            if (!hit) {
                throw new NotFoundError('Pixabay video', id);
            }
            return this.toVideoItem(hit);
        }

        const body = await this.fetchJson(
            PIXABAY_IMAGE_ENDPOINT,
            { params },
            pixabayImageResponseSchema,
            'image lookup'
        );
        const [hit] = body.hits;
        if (!hit) {
            throw new NotFoundError('Pixabay image', id);
        }
        return this.toImageItem(hit);
    }

    /**
     * Pixabay reports a missing or wrong key as a 400 with a plain-text body
     */
    protected translateHttpError(error: HttpError, context: string): AppError {
        if (error.status === 400 && /key/i.test(error.message)) {
            return new AuthenticationError('Pixabay rejected the API key', {
                provider: this.name,
                status: error.status
            });
        }
        return super.translateHttpError(error, context);
    }

    private searchParams(query: string, limit: number, page: number): QueryParams {
        return {
            key: this.apiKey,
            q: PixabayProvider.keywords(query).join(' '),
            per_page: Math.min(MAX_PER_PAGE, Math.max(MIN_PER_PAGE, limit)),
            page
        };
    }

    private toImageItem(hit: PixabayImageHit): MediaItem {
        return {
            id: String(hit.id),
            mediaType: MediaType.IMAGE,
            title: hit.tags,
            description: hit.tags,
            tags: splitTags(hit.tags),
            author: hit.user,
            authorUrl: authorUrl(hit.user, hit.user_id),
            sourceUrl: hit.pageURL,
            provider: this.name,
            urls: {
                thumbnail: hit.previewURL,
                medium: hit.webformatURL,
                large: hit.largeImageURL,
                original: hit.imageURL ?? undefined
            },
            metadata: {
                width: hit.imageWidth,
                height: hit.imageHeight,
                size: hit.imageSize,
                views: hit.views,
                downloads: hit.downloads,
                likes: hit.likes
            }
        };
    }

    private toVideoItem(hit: PixabayVideoHit): MediaItem {
        const videoFiles: VideoFile[] = [];
        for (const quality of RENDITIONS) {
            const rendition = hit.videos[quality];
            // Pixabay lists missing renditions with an empty url
            if (rendition && rendition.url.length > 0) {
                videoFiles.push(toVideoFile(quality, rendition));
            }
        }

        const large = hit.videos.large;

        return {
            id: String(hit.id),
            mediaType: MediaType.VIDEO,
            title: hit.tags,
            description: hit.tags,
            tags: splitTags(hit.tags),
            author: hit.user,
            authorUrl: authorUrl(hit.user, hit.user_id),
            sourceUrl: hit.pageURL,
            provider: this.name,
            urls: {
                thumbnail: videoFiles[0]?.thumbnail ?? '',
                medium: videoFiles.find(file => file.quality === 'medium')?.url,
                large: videoFiles.find(file => file.quality === 'large')?.url,
                videoFiles
            },
            metadata: {
                width: large?.width ?? 0,
                height: large?.height ?? 0,
                size: large?.size,
                duration: hit.duration,
                views: hit.views,
                downloads: hit.downloads,
                likes: hit.likes
            }
        };
    }
}

function toVideoFile(quality: string, rendition: PixabayVideoRendition): VideoFile {
    return {
        quality,
        url: rendition.url,
        width: rendition.width,
        height: rendition.height,
        size: rendition.size,
        thumbnail: rendition.thumbnail
    };
}

function splitTags(tags: string): string[] {
    return tags
        .split(',')
        .map(tag => tag.trim())
        .filter(tag => tag.length > 0);
}

function authorUrl(user: string, userId: number): string {
    return `https://pixabay.com/users/${user}-${userId}/`;
}
