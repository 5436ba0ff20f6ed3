import { z } from 'zod';

export const ListProductsQuerySchema = z.object({
    category: z.string().trim().optional(),
});

export const ProductParamsSchema = z.object({
    id: z.coerce.number().int().positive(),
});
