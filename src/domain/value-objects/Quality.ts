import { MediaItem, MediaType, VideoFile } from '../entities/Media';

/**
 * Preferred image rendition
 */
export enum ImageQuality {
  THUMBNAIL = 'thumbnail',
  MEDIUM = 'medium',
  LARGE = 'large',
  ORIGINAL = 'original'
}

/**
 * Preferred video rendition
 */
export enum VideoQuality {
  TINY = 'tiny',
  SMALL = 'small',
  MEDIUM = 'medium',
  LARGE = 'large'
}

/** Most to least preferred */
const IMAGE_TIERS: readonly ImageQuality[] = [
  ImageQuality.ORIGINAL,
  ImageQuality.LARGE,
  ImageQuality.MEDIUM,
  ImageQuality.THUMBNAIL
];

/** Most to least preferred */
const VIDEO_TIERS: readonly VideoQuality[] = [
  VideoQuality.LARGE,
  VideoQuality.MEDIUM,
  VideoQuality.SMALL,
  VideoQuality.TINY
];

const VIDEO_MIN_WIDTH: Record<VideoQuality, number> = {
  [VideoQuality.TINY]: 640,
  [VideoQuality.SMALL]: 960,
  [VideoQuality.MEDIUM]: 1280,
  [VideoQuality.LARGE]: 1920
};

export function videoMinWidth(quality: VideoQuality): number {
  return VIDEO_MIN_WIDTH[quality];
}

export function isImageQuality(value: string): value is ImageQuality {
  return IMAGE_TIERS.some(tier => tier === value);
}

export function isVideoQuality(value: string): value is VideoQuality {
  return VIDEO_TIERS.some(tier => tier === value);
}

/**
 * Pick the image URL for the preferred tier, walking down
 * original -> large -> medium -> thumbnail when a tier is missing.
 * The thumbnail is always there, so this never fails.
 */
export function selectImageUrl(item: MediaItem, preferred: ImageQuality): string {
  const start = IMAGE_TIERS.indexOf(preferred);

  for (const tier of IMAGE_TIERS.slice(start)) {
    const url = imageTierUrl(item, tier);
    if (url) {
      return url;
    }
  }

  return item.urls.thumbnail;
}

function imageTierUrl(item: MediaItem, tier: ImageQuality): string | undefined {
  switch (tier) {
    case ImageQuality.ORIGINAL:
      return item.urls.original;
    case ImageQuality.LARGE:
      return item.urls.large;
    case ImageQuality.MEDIUM:
      return item.urls.medium;
    case ImageQuality.THUMBNAIL:
      return item.urls.thumbnail;
  }
}

/**
 * Pick the video file for the preferred tier:
 *  1. the first tier from `preferred` down to tiny whose tag matches a file
 *  2. the narrowest file at least as wide as the preferred tier's minimum
 *  3. the widest file
 */
export function selectVideoFile(
  files: readonly VideoFile[],
  preferred: VideoQuality
): VideoFile | undefined {
  if (files.length === 0) {
    return undefined;
  }

  const start = VIDEO_TIERS.indexOf(preferred);
  for (const tier of VIDEO_TIERS.slice(start)) {
    const match = files.find(file => file.quality.toLowerCase() === tier);
    if (match) {
      return match;
    }
  }

  const minWidth = videoMinWidth(preferred);
  const wideEnough = files
    .filter(file => file.width >= minWidth)
    .sort((a, b) => a.width - b.width);
  if (wideEnough.length > 0) {
    return wideEnough[0];
  }

  return files.reduce((widest, file) => (file.width > widest.width ? file : widest));
}

/**
 * Resolve the URL to download for an item under the given preferences
 */
export function selectDownloadUrl(
  item: MediaItem,
  imageQuality: ImageQuality,
  videoQuality: VideoQuality
): string {
  if (item.mediaType === MediaType.IMAGE) {
    return selectImageUrl(item, imageQuality);
  }

  const file = selectVideoFile(item.urls.videoFiles ?? [], videoQuality);
  if (file) {
    return file.url;
  }

  // no renditions listed: best still-image style URL the provider gave
  return item.urls.large ?? item.urls.medium ?? item.urls.thumbnail;
}
