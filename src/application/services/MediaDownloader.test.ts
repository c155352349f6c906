import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MediaDownloader } from './MediaDownloader';
import { MediaType, SearchParams } from '../../domain';
import { LocalFileStorage } from '../../infrastructure/storage/LocalFileStorage';
import { NoProvidersError, NotFoundError, UnknownProviderError } from '../../shared';
import { FakeProvider, FakeTransport, makeItem, mockLogger, providerResult } from '../../test-support/fixtures';

describe('MediaDownloader', () => {
    let dir: string;
    let logger: ReturnType<typeof mockLogger>;
    let transport: FakeTransport;
    let downloader: MediaDownloader;

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'polystock-downloader-'));
        logger = mockLogger();
        transport = new FakeTransport();
        downloader = new MediaDownloader({
            config: { outputDir: dir, maxConcurrent: 2 },
            transport,
            storage: new LocalFileStorage(logger, dir),
            logger
        });
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    describe('addProviderByName', () => {
        it('should register supported providers', () => {
            expect(downloader.addProviderByName('pixabay', 'test-key')).toBe(true);
            expect(downloader.addProviderByName('Pexels', 'test-key')).toBe(true);

            expect(downloader.providers().map(provider => provider.name)).toEqual(['Pixabay', 'Pexels']);
        });

        it('should skip unknown names and empty keys with a warning', () => {
            expect(downloader.addProviderByName('unsplash', 'test-key')).toBe(false);
            expect(downloader.addProviderByName('pexels', '')).toBe(false);

            expect(downloader.providers()).toHaveLength(0);
            expect(logger.warn).toHaveBeenCalledWith('Skipping provider unsplash', {
                error: 'Unknown provider: unsplash'
            });
            expect(logger.warn).toHaveBeenCalledWith('Skipping provider pexels', {
                error: "API key for provider 'pexels' is empty"
            });
        });
    });

    it('should expose the effective pipeline config', () => {
        expect(downloader.getConfig()).toMatchObject({ outputDir: dir, maxConcurrent: 2 });
    });

    it('should search registered providers', async () => {
        downloader
            .addProvider(new FakeProvider('Pixabay', providerResult('Pixabay', [makeItem({ id: '1' })])))
            .addProvider(new FakeProvider('Pexels', providerResult('Pexels', [makeItem({ id: '2', provider: 'Pexels' })])));

        const all = await downloader.search(new SearchParams('cats'));
        const one = await downloader.searchFromProvider('pexels', new SearchParams('cats'));

        expect(all.items.map(item => item.id)).toEqual(['1', '2']);
        expect(one.items.map(item => item.id)).toEqual(['2']);
    });

    it('should download a batch into the output directory', async () => {
        const items = [makeItem({ id: '1' }), makeItem({ id: '2', provider: 'Pexels' })];

        const results = await downloader.downloadBatch(items);

        expect(results.map(result => (result.success ? path.basename(result.path) : 'failed')))
            .toEqual(['pixabay_1.jpg', 'pexels_2.jpg']);
    });

    describe('downloadById', () => {
        it('should fail without providers', async () => {
            await expect(downloader.downloadById('1', MediaType.IMAGE)).rejects.toBeInstanceOf(NoProvidersError);
        });

        it('should try providers in order until one knows the id', async () => {
            const first = new FakeProvider('Pixabay');
            const second = new FakeProvider('Pexels', undefined, [makeItem({ id: '77', provider: 'Pexels' })]);
            downloader.addProvider(first).addProvider(second);

            const saved = await downloader.downloadById('77', MediaType.IMAGE);

            expect(saved).toBe(path.join(dir, 'pexels_77.jpg'));
            expect(first.calls).toEqual([{ method: 'getMedia', args: ['77', MediaType.IMAGE] }]);
        });

        it('should fail with NotFoundError when no provider knows the id', async () => {
            downloader.addProvider(new FakeProvider('Pixabay')).addProvider(new FakeProvider('Pexels'));

            const error = await downloader.downloadById('5', MediaType.VIDEO).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(NotFoundError);
            expect(error).toHaveProperty('message', "video on any provider with identifier '5' not found");
        });

        it('should only ask the named provider', async () => {
            const pixabay = new FakeProvider('Pixabay', undefined, [makeItem({ id: '9' })]);
            const pexels = new FakeProvider('Pexels', undefined, [makeItem({ id: '9', provider: 'Pexels' })]);
            downloader.addProvider(pixabay).addProvider(pexels);

            const saved = await downloader.downloadById('9', MediaType.IMAGE, 'PEXELS');

            expect(path.basename(saved)).toBe('pexels_9.jpg');
            expect(pixabay.calls).toEqual([]);
        });

        it('should fail for an unknown provider name', async () => {
            downloader.addProvider(new FakeProvider('Pixabay'));

            await expect(downloader.downloadById('9', MediaType.IMAGE, 'flickr'))
                .rejects.toBeInstanceOf(UnknownProviderError);
        });
    });
});
