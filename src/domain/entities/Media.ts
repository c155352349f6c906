import { ValidationError } from '../../shared/errors/AppError';

/**
 * Media types a provider can be searched for
 */
export enum MediaType {
  IMAGE = 'image',
  VIDEO = 'video'
}

/**
 * Parse "image" / "video" (any case)
 */
export function parseMediaType(value: string): MediaType {
  switch (value.trim().toLowerCase()) {
    case MediaType.IMAGE:
      return MediaType.IMAGE;
    case MediaType.VIDEO:
      return MediaType.VIDEO;
    default:
      throw new ValidationError(`Invalid media type: ${value}`, {
        allowed: Object.values(MediaType)
      });
  }
}

/**
 * One rendition of a video
 */
export interface VideoFile {
  /** Provider quality tag, e.g. "large" (Pixabay) or "hd" (Pexels) */
  readonly quality: string;
  readonly url: string;
  readonly width: number;
  readonly height: number;
  /** Size in bytes, 0 when the provider does not say */
  readonly size: number;
  readonly thumbnail?: string;
}

/**
 * Available renditions of a media item
 */
export interface MediaUrls {
  /** Always present */
  readonly thumbnail: string;
  readonly medium?: string;
  readonly large?: string;
  /** Full-size file; some providers only expose it with full API access */
  readonly original?: string;
  /** Video renditions, present only for video items */
  readonly videoFiles?: readonly VideoFile[];
}

export interface MediaMetadata {
  readonly width?: number;
  readonly height?: number;
  /** Size in bytes */
  readonly size?: number;
  /** Seconds, video only */
  readonly duration?: number;
  readonly views?: number;
  readonly downloads?: number;
  readonly likes?: number;
}

/**
 * Provider-agnostic media item.
 *
 * `id` is only unique within `provider`, and `provider` is always the
 * `name` of the adapter that produced the item.
 */
export interface MediaItem {
  readonly id: string;
  readonly mediaType: MediaType;
  readonly title: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly author: string;
  readonly authorUrl: string;
  readonly sourceUrl: string;
  readonly provider: string;
  readonly urls: MediaUrls;
  readonly metadata: MediaMetadata;
}

/**
 * Extension used when neither the URL nor the response says otherwise
 */
export function defaultExtension(mediaType: MediaType): string {
  return mediaType === MediaType.VIDEO ? 'mp4' : 'jpg';
}
