import { z } from 'zod';

export const SearchImageHeadersSchema = z.object({
    'x-ai-api-key': z.string().min(1, 'AI API Key must not be empty').max(200, 'API Key too long').optional(),
});

export const SearchImageUrlBodySchema = z.object({
    image_url: z.string().trim().min(1, 'No image URL provided'),
});

export type SearchImageHeaders = z.infer<typeof SearchImageHeadersSchema>;
