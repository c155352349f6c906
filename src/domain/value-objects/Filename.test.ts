import { describe, it, expect } from '@jest/globals';
import { Filename, extensionForMimeType, extensionOf, lastPathSegment } from './Filename';
import { ValidationError } from '../../shared/errors/AppError';

describe('Filename', () => {
    it('should replace reserved characters', () => {
        expect(new Filename('a<b>c:d.jpg').toString()).toBe('a_b_c_d.jpg');
        expect(new Filename('dir/name?.png').toString()).toBe('dir_name_.png');
    });

    it('should prefix reserved device names', () => {
        expect(new Filename('CON.txt').toString()).toBe('_CON.txt');
        expect(new Filename('lpt1').toString()).toBe('_lpt1');
    });

    it('should trim leading and trailing dots', () => {
        expect(new Filename('..hidden.jpg.').toString()).toBe('hidden.jpg');
    });

    it('should keep the extension when truncating long names', () => {
        const name = new Filename(`${'x'.repeat(300)}.jpg`).toString();

        expect(name).toHaveLength(255);
        expect(name.endsWith('.jpg')).toBe(true);
    });

    it('should reject empty names', () => {
        expect(() => new Filename('   ')).toThrow(ValidationError);
    });

    it('should build provider-scoped names', () => {
        expect(Filename.forItem('Pixabay', '123', 'jpg').toString()).toBe('pixabay_123.jpg');
        expect(Filename.forItem('Pexels', '9', 'mp4').getExtension()).toBe('mp4');
    });

    describe('fromUrl', () => {
        it('should take the last path segment, ignoring the query', () => {
            const name = Filename.fromUrl('https://cdn.pixabay.com/photo/2020/01/01/sunset-123_1280.jpg?attr=1');

            expect(name?.toString()).toBe('sunset-123_1280.jpg');
        });

        it('should decode percent-escapes', () => {
            expect(Filename.fromUrl('https://cdn.example.com/a%20b.png')?.toString()).toBe('a b.png');
        });

        it('should return undefined when the segment has no extension', () => {
            expect(Filename.fromUrl('https://player.example.com/videos/123')).toBeUndefined();
            expect(Filename.fromUrl('not a url')).toBeUndefined();
        });
    });

    it('should compare by value', () => {
        expect(new Filename('a.jpg').equals(new Filename('a.jpg'))).toBe(true);
        expect(new Filename('a.jpg').hasExtension()).toBe(true);
        expect(new Filename('README').hasExtension()).toBe(false);
    });
});

describe('extension helpers', () => {
    it('should extract short alphanumeric extensions in lower case', () => {
        expect(extensionOf('photo.JPG')).toBe('jpg');
        expect(extensionOf('noext')).toBe('');
        expect(extensionOf('.hidden')).toBe('');
        expect(extensionOf('trailing.')).toBe('');
        expect(extensionOf('archive.toolongext')).toBe('');
    });

    it('should find the last path segment of a URL', () => {
        expect(lastPathSegment('https://example.com/a/b/c.mp4/')).toBe('c.mp4');
        expect(lastPathSegment('https://example.com/')).toBeUndefined();
    });

    it('should map content types to extensions', () => {
        expect(extensionForMimeType('image/jpeg')).toBe('jpg');
        expect(extensionForMimeType('Video/MP4; codecs="avc1"')).toBe('mp4');
        expect(extensionForMimeType('image/svg+xml')).toBe('svg');
        expect(extensionForMimeType('application/json')).toBeUndefined();
        expect(extensionForMimeType(undefined)).toBeUndefined();
    });
});
