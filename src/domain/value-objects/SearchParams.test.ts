import { describe, it, expect } from '@jest/globals';
import { DEFAULT_PER_PAGE, SearchParams } from './SearchParams';
import { DEFAULT_DOWNLOAD_CONFIG, createDownloadConfig, normalizeConcurrency } from './DownloadConfig';
import { ImageQuality, VideoQuality } from './Quality';
import { MediaType, defaultExtension, parseMediaType } from '../entities/Media';
import { ValidationError } from '../../shared/errors/AppError';

describe('SearchParams', () => {
    it('should default to one page of images', () => {
        const params = new SearchParams('cats');

        expect(params.mediaType).toBe(MediaType.IMAGE);
        expect(params.limit).toBe(DEFAULT_PER_PAGE);
        expect(params.perPage).toBe(DEFAULT_PER_PAGE);
        expect(params.page).toBe(1);
    });

    it('should reject an empty query and invalid paging', () => {
        expect(() => new SearchParams('  ')).toThrow(ValidationError);
        expect(() => new SearchParams('cats', MediaType.IMAGE, 0)).toThrow(ValidationError);
        expect(() => new SearchParams('cats', MediaType.IMAGE, 10, 0)).toThrow(ValidationError);
        expect(() => new SearchParams('cats', MediaType.IMAGE, 2.5)).toThrow(ValidationError);
    });

    it('should return new instances from the setters', () => {
        const params = new SearchParams('cats');
        const next = params.withPage(3).withPerPage(50).withMediaType(MediaType.VIDEO);

        expect(next).not.toBe(params);
        expect(params.page).toBe(1);
        expect(next.page).toBe(3);
        expect(next.limit).toBe(50);
        expect(next.mediaType).toBe(MediaType.VIDEO);
        expect(next.query).toBe('cats');
    });
});

describe('MediaType', () => {
    it('should parse names in any case', () => {
        expect(parseMediaType('Video')).toBe(MediaType.VIDEO);
        expect(parseMediaType(' image ')).toBe(MediaType.IMAGE);
        expect(() => parseMediaType('audio')).toThrow('Invalid media type: audio');
    });

    it('should default extensions per type', () => {
        expect(defaultExtension(MediaType.IMAGE)).toBe('jpg');
        expect(defaultExtension(MediaType.VIDEO)).toBe('mp4');
    });
});

describe('DownloadConfig', () => {
    it('should clamp concurrency to at least one', () => {
        expect(normalizeConcurrency(0)).toBe(1);
        expect(normalizeConcurrency(-3)).toBe(1);
        expect(normalizeConcurrency(Number.NaN)).toBe(1);
        expect(normalizeConcurrency(undefined)).toBe(1);
        expect(normalizeConcurrency(3.7)).toBe(3);
        expect(normalizeConcurrency(8)).toBe(8);
    });

    it('should fill unspecified settings from the defaults', () => {
        const config = createDownloadConfig({ maxConcurrent: 0, videoQuality: VideoQuality.SMALL });

        expect(config.maxConcurrent).toBe(1);
        expect(config.videoQuality).toBe(VideoQuality.SMALL);
        expect(config.imageQuality).toBe(ImageQuality.LARGE);
        expect(config.outputDir).toBe(DEFAULT_DOWNLOAD_CONFIG.outputDir);
        expect(config.useOriginalNames).toBe(false);
    });
});
