import { describe, it, expect } from '@jest/globals';
import { aggregateResults, calculateTotalPages, createSearchResult } from './SearchResult';
import { makeItem, providerResult } from '../../test-support/fixtures';

describe('SearchResult', () => {
    describe('calculateTotalPages', () => {
        it('should round partial pages up', () => {
            expect(calculateTotalPages(45, 20)).toBe(3);
            expect(calculateTotalPages(40, 20)).toBe(2);
            expect(calculateTotalPages(1, 20)).toBe(1);
        });

        it('should return zero for empty results or a non-positive page size', () => {
            expect(calculateTotalPages(0, 20)).toBe(0);
            expect(calculateTotalPages(5, 0)).toBe(0);
            expect(calculateTotalPages(5, -1)).toBe(0);
        });

        it('should stay exact for totals beyond 32-bit range', () => {
            expect(calculateTotalPages(2 ** 31 + 1, 20)).toBe(107374183);
            expect(calculateTotalPages(2 ** 53 - 1, 7)).toBe(1286742750677285);
        });
    });

    it('should derive totalPages when creating a result', () => {
        const result = createSearchResult({
            total: 500,
            totalHits: 3,
            page: 2,
            perPage: 3,
            items: [],
            provider: 'Pexels'
        });

        expect(result.totalPages).toBe(167);
        expect(result.page).toBe(2);
        expect(result.provider).toBe('Pexels');
    });

    describe('aggregateResults', () => {
        it('should concatenate items in the given order and sum the totals', () => {
            const pixabay = providerResult('Pixabay', [makeItem({ id: 'a' }), makeItem({ id: 'b' })], 100);
            const pexels = providerResult('Pexels', [makeItem({ id: 'c', provider: 'Pexels' })], 30);

            const merged = aggregateResults([pixabay, pexels], 1, 20);

            expect(merged.items.map(item => item.id)).toEqual(['a', 'b', 'c']);
            expect(merged.total).toBe(130);
            expect(merged.totalHits).toBe(3);
            expect(merged.totalPages).toBe(5 + 2);
            expect(merged.provider).toBe('Pixabay');
            expect(merged.providerResults).toEqual([pixabay, pexels]);
        });

        it('should name the provider "all" when nothing succeeded', () => {
            const merged = aggregateResults([], 3, 10);

            expect(merged.provider).toBe('all');
            expect(merged.total).toBe(0);
            expect(merged.page).toBe(3);
            expect(merged.perPage).toBe(10);
            expect(merged.items).toEqual([]);
        });
    });
});
