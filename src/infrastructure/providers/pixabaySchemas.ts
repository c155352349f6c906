import { z } from 'zod';

const count = z.number().nonnegative().optional();

export const pixabayImageHitSchema = z.object({
    id: z.number(),
    pageURL: z.string(),
    tags: z.string().default(''),
    previewURL: z.string(),
    webformatURL: z.string(),
    largeImageURL: z.string(),
    fullHDURL: z.string().nullish(),
    imageURL: z.string().nullish(),
    imageWidth: z.number(),
    imageHeight: z.number(),
    imageSize: z.number().optional(),
    views: count,
    downloads: count,
    likes: count,
    user_id: z.number(),
    user: z.string()
});

export type PixabayImageHit = z.infer<typeof pixabayImageHitSchema>;

const pixabayVideoRenditionSchema = z.object({
    url: z.string(),
    width: z.number(),
    height: z.number(),
    size: z.number().default(0),
    thumbnail: z.string().optional()
});

export type PixabayVideoRendition = z.infer<typeof pixabayVideoRenditionSchema>;

export const pixabayVideoHitSchema = z.object({
    id: z.number(),
    pageURL: z.string(),
    tags: z.string().default(''),
    duration: z.number().nonnegative(),
    videos: z.object({
        large: pixabayVideoRenditionSchema.optional(),
        medium: pixabayVideoRenditionSchema.optional(),
        small: pixabayVideoRenditionSchema.optional(),
        tiny: pixabayVideoRenditionSchema.optional()
    }),
    views: count,
    downloads: count,
    likes: count,
    user_id: z.number(),
    user: z.string()
});

export type PixabayVideoHit = z.infer<typeof pixabayVideoHitSchema>;

export const pixabayImageResponseSchema = z.object({
    total: z.number(),
    totalHits: z.number(),
    hits: z.array(pixabayImageHitSchema)
});

export const pixabayVideoResponseSchema = z.object({
    total: z.number(),
    totalHits: z.number(),
    hits: z.array(pixabayVideoHitSchema)
});
