import { ValidationError } from '../../shared/errors/AppError';

/**
 * Value object representing a safe filename
 */
export class Filename {
  private static readonly MAX_LENGTH = 255;
  private static readonly RESERVED_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;
  private static readonly RESERVED_NAMES = new Set([
    'CON', 'PRN', 'AUX', 'NUL',
    'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
    'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
  ]);

  private readonly value: string;

  constructor(filename: string) {
    if (filename.trim().length === 0) {
      throw new ValidationError('Filename cannot be empty');
    }

    this.value = Filename.sanitize(filename);
  }

  toString(): string {
    return this.value;
  }

  /**
   * Extension without the dot, lower-cased; empty when there is none
   */
  getExtension(): string {
    return extensionOf(this.value);
  }

  hasExtension(): boolean {
    return this.getExtension().length > 0;
  }

  equals(other: Filename): boolean {
    return this.value === other.value;
  }

  /**
   * `{provider}_{id}.{ext}` with the provider lower-cased
   */
  static forItem(provider: string, id: string, extension: string): Filename {
    return new Filename(`${provider.toLowerCase()}_${id}.${extension}`);
  }

  /**
   * The URL's last path segment, or undefined when it has no extension
   */
  static fromUrl(url: string): Filename | undefined {
    const segment = lastPathSegment(url);
    if (!segment || extensionOf(segment).length === 0) {
      return undefined;
    }

    try {
      return new Filename(decodeURIComponent(segment));
    } catch {
      return new Filename(segment);
    }
  }

  private static sanitize(filename: string): string {
    let sanitized = filename
      .replace(Filename.RESERVED_CHARS, '_')
      .trim()
      .replace(/^\.+|\.+$/g, '');

    const dot = sanitized.lastIndexOf('.');
    const stem = dot > 0 ? sanitized.substring(0, dot) : sanitized;
    if (Filename.RESERVED_NAMES.has(stem.toUpperCase())) {
      sanitized = `_${sanitized}`;
    }

    if (sanitized.length > Filename.MAX_LENGTH) {
      const extension = dot > 0 ? sanitized.substring(sanitized.lastIndexOf('.')) : '';
      sanitized = sanitized.substring(0, Filename.MAX_LENGTH - extension.length) + extension;
    }

    return sanitized.length > 0 ? sanitized : 'unnamed';
  }
}

/**
 * Extension of a file name or URL path, without the dot, lower-cased
 */
export function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) {
    return '';
  }

  const extension = name.substring(dot + 1).toLowerCase();
  return /^[a-z0-9]{1,5}$/.test(extension) ? extension : '';
}

/**
 * Last non-empty path segment of a URL, ignoring query and fragment
 */
export function lastPathSegment(url: string): string | undefined {
  try {
    return new URL(url).pathname.split('/').filter(Boolean).pop();
  } catch {
    return undefined;
  }
}

const MIME_EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/svg+xml': 'svg',
  'video/mp4': 'mp4',
  'video/webm': 'webm',
  'video/quicktime': 'mov'
};

/**
 * Extension for a Content-Type header value, ignoring parameters
 */
export function extensionForMimeType(contentType: string | undefined): string | undefined {
  if (!contentType) {
    return undefined;
  }
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return MIME_EXTENSIONS[mime];
}
