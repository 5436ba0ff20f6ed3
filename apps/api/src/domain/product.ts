import { z } from 'zod';

export const PRODUCT_CATEGORIES = [
    'Accessories',
    'Clothing',
    'Electronics',
    'Footwear',
    'Furniture',
    'Home',
] as const;

export const ProductSchema = z.object({
    id: z.number().int().positive(),
    name: z.string().min(1),
    category: z.enum(PRODUCT_CATEGORIES),
    price: z.number().nonnegative(),
    image_url: z.string().min(1),
    description: z.string(),
});

export type Product = Readonly<z.infer<typeof ProductSchema>>;

export interface ScoredMatch {
    product: Product;
    similarity: number;
}
