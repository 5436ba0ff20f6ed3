import { Product } from '../../domain/product';

/**
 * Read-only view over the catalog loaded at startup. Built once and passed to
 * whoever needs it; there is no write path.
 */
export class CatalogRepository {
    private readonly byId: ReadonlyMap<number, Product>;
    private readonly categories: readonly string[];

    constructor(private readonly products: readonly Product[]) {
        this.byId = new Map(products.map((product) => [product.id, product]));
        this.categories = [...new Set(products.map((product) => product.category))].sort();
    }

    get size(): number {
        return this.products.length;
    }

    getAll(): readonly Product[] {
        return this.products;
    }

    findById(id: number): Product | null {
        return this.byId.get(id) ?? null;
    }

    /**
     * Case-insensitive, unlike the ranker's category boost.
     */
    findByCategory(category: string): Product[] {
        const wanted = category.toLowerCase();
        return this.products.filter((product) => product.category.toLowerCase() === wanted);
    }

    listCategories(): readonly string[] {
        return this.categories;
    }
}
