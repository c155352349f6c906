import { z } from 'zod';

export const pexelsPhotoSchema = z.object({
    id: z.number(),
    width: z.number(),
    height: z.number(),
    url: z.string(),
    photographer: z.string().default(''),
    photographer_url: z.string().default(''),
    alt: z.string().nullish(),
    src: z.object({
        original: z.string(),
        large2x: z.string().optional(),
        large: z.string(),
        medium: z.string(),
        small: z.string().optional(),
        tiny: z.string()
    })
});

export type PexelsPhoto = z.infer<typeof pexelsPhotoSchema>;

const pexelsVideoFileSchema = z.object({
    id: z.number(),
    quality: z.string().nullish(),
    file_type: z.string().optional(),
    width: z.number().nullish(),
    height: z.number().nullish(),
    fps: z.number().nullish(),
    link: z.string()
});

export type PexelsVideoFile = z.infer<typeof pexelsVideoFileSchema>;

export const pexelsVideoSchema = z.object({
    id: z.number(),
    width: z.number(),
    height: z.number(),
    duration: z.number().nullish(),
    url: z.string(),
    image: z.string(),
    user: z.object({
        name: z.string(),
        url: z.string()
    }),
    video_files: z.array(pexelsVideoFileSchema)
});

export type PexelsVideo = z.infer<typeof pexelsVideoSchema>;

export const pexelsPhotoSearchSchema = z.object({
    total_results: z.number(),
    page: z.number().optional(),
    per_page: z.number().optional(),
    photos: z.array(pexelsPhotoSchema)
});

export const pexelsVideoSearchSchema = z.object({
    total_results: z.number(),
    page: z.number().optional(),
    per_page: z.number().optional(),
    videos: z.array(pexelsVideoSchema)
});
