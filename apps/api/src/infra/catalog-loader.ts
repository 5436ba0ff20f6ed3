import { readFile } from 'fs/promises';
import { z } from 'zod';
import { Product, ProductSchema } from '../domain/product';
import { CatalogLoadError } from '../domain/errors';

const CatalogFileSchema = z.array(ProductSchema);

/**
 * Reads and validates the product catalog. Any problem is fatal: the service
 * does not start with a partial catalog.
 */
export async function loadCatalogFromFile(filePath: string): Promise<readonly Product[]> {
    let raw: string;
    try {
        raw = await readFile(filePath, 'utf8');
    } catch (error) {
        throw new CatalogLoadError(`Catalog file not found or unreadable: ${filePath}`, error);
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new CatalogLoadError(`Invalid JSON in catalog file ${filePath}`, error);
    }

    return parseCatalog(json);
}

export function parseCatalog(json: unknown): readonly Product[] {
    const result = CatalogFileSchema.safeParse(json);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new CatalogLoadError(
            `Invalid product record at ${issue.path.join('.') || 'root'}: ${issue.message}`,
            result.error.format()
        );
    }

    const seen = new Set<number>();
    for (const product of result.data) {
        if (seen.has(product.id)) {
            throw new CatalogLoadError(`Duplicate product id ${product.id}`);
        }
        seen.add(product.id);
    }

    return Object.freeze(result.data.map((product) => Object.freeze(product)));
}
