import { MediaItem, MediaType, SearchResult, VideoFile, createSearchResult } from '../../domain';
import { ILogger, LoggerFactory } from '../../shared';
import { HttpClient, RequestOptions } from '../http/HttpClient';
import { BaseMediaProvider, splitKeywords } from './BaseMediaProvider';
import {
    PexelsPhoto,
    PexelsVideo,
    PexelsVideoFile,
    pexelsPhotoSchema,
    pexelsPhotoSearchSchema,
    pexelsVideoSchema,
    pexelsVideoSearchSchema
} from './pexelsSchemas';

export const PEXELS_BASE_URL = 'https://api.pexels.com';

/**
 * Pexels photo and video search. Authenticates with the bare key in the
 * Authorization header.
 */
export class PexelsProvider extends BaseMediaProvider {
    readonly name = 'Pexels';

    constructor(
        private readonly apiKey: string,
        http: HttpClient,
        logger: ILogger = LoggerFactory.getLogger('PexelsProvider')
    ) {
        super(http, logger);
    }

    /**
     * Pexels takes natural-language queries, so only list separators split
     */
    static normalizeQuery(query: string): string {
        return splitKeywords(query, /[,;|]/).join(' ');
    }

    async searchImages(query: string, limit: number, page: number): Promise<SearchResult> {
        const body = await this.fetchJson(
            `${PEXELS_BASE_URL}/v1/search`,
            this.request({ query: PexelsProvider.normalizeQuery(query), per_page: limit, page }),
            pexelsPhotoSearchSchema,
            'photo search'
        );

        const items = body.photos.map(photo => this.toImageItem(photo));
        this.logger.debug(`Pexels photo search returned ${items.length} of ${body.total_results}`, { query, page });

        return createSearchResult({
            total: body.total_results,
            totalHits: items.length,
            page,
            perPage: limit,
            items,
            provider: this.name
        });
    }

    async searchVideos(query: string, limit: number, page: number): Promise<SearchResult> {
        const body = await this.fetchJson(
            `${PEXELS_BASE_URL}/videos/search`,
            this.request({ query: PexelsProvider.normalizeQuery(query), per_page: limit, page }),
            pexelsVideoSearchSchema,
            'video search'
        );

        const items = body.videos.map(video => this.toVideoItem(video));
        this.logger.debug(`Pexels video search returned ${items.length} of ${body.total_results}`, { query, page });

        return createSearchResult({
            total: body.total_results,
            totalHits: items.length,
            page,
            perPage: limit,
            items,
            provider: this.name
        });
    }

    async getMedia(id: string, mediaType: MediaType): Promise<MediaItem> {
        const numericId = this.parseId(id);

        if (mediaType === MediaType.VIDEO) {
            const video = await this.fetchJson(
                `${PEXELS_BASE_URL}/videos/videos/${numericId}`,
                this.request(),
                pexelsVideoSchema,
                `video ${id}`
            );
            return this.toVideoItem(video);
        }

        const photo = await this.fetchJson(
            `${PEXELS_BASE_URL}/v1/photos/${numericId}`,
            this.request(),
            pexelsPhotoSchema,
            `photo ${id}`
        );
        return this.toImageItem(photo);
    }

    private request(params?: RequestOptions['params']): RequestOptions {
        return {
            params,
            headers: { Authorization: this.apiKey }
        };
    }

    private toImageItem(photo: PexelsPhoto): MediaItem {
        const alt = photo.alt ?? '';

        return {
            id: String(photo.id),
            mediaType: MediaType.IMAGE,
            title: alt || 'Photo',
            description: alt,
            tags: [],
            author: photo.photographer,
            authorUrl: photo.photographer_url,
            sourceUrl: photo.url,
            provider: this.name,
            urls: {
                thumbnail: photo.src.tiny,
                medium: photo.src.medium,
                large: photo.src.large,
                original: photo.src.original
            },
            metadata: {
                width: photo.width,
                height: photo.height
            }
        };
    }

    private toVideoItem(video: PexelsVideo): MediaItem {
        const videoFiles = video.video_files.map(toVideoFile);
        const hd = videoFiles.find(file => file.quality.toLowerCase().includes('hd'));

        return {
            id: String(video.id),
            mediaType: MediaType.VIDEO,
            title: 'Video',
            description: '',
            tags: [],
            author: video.user.name,
            authorUrl: video.user.url,
            sourceUrl: video.url,
            provider: this.name,
            urls: {
                thumbnail: video.image,
                medium: hd?.url,
                large: hd?.url,
                videoFiles
            },
            metadata: {
                width: video.width,
                height: video.height,
                duration: video.duration ?? undefined
            }
        };
    }
}

function toVideoFile(file: PexelsVideoFile): VideoFile {
    return {
        quality: file.quality ?? '',
        url: file.link,
        width: file.width ?? 0,
        height: file.height ?? 0,
        size: 0
    };
}
