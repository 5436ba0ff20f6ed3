import path from 'path';
import { loadCatalogFromFile } from '../src/infra/catalog-loader';
import { CatalogRepository } from '../src/infra/repositories/catalog.repository';

const MIN_PRODUCTS = 50;

/**
 * Catalog Validation Script (used in CI)
 * Run with: npx tsx scripts/validate-catalog.ts [path/to/products.json]
 */
async function validate() {
    const catalogPath = process.argv[2]
        ? path.resolve(process.argv[2])
        : path.join(__dirname, '../data/products.json');

    console.log(`🔍 Validating catalog: ${catalogPath}`);

    const catalog = new CatalogRepository(await loadCatalogFromFile(catalogPath));

    if (catalog.size < MIN_PRODUCTS) {
        console.error(`❌ Error: Expected >= ${MIN_PRODUCTS} products, got ${catalog.size}`);
        process.exit(1);
    }

    console.log(`✅ Product catalog validated: ${catalog.size} products`);
    for (const category of catalog.listCategories()) {
        console.log(`   ${category.padEnd(12)} ${catalog.findByCategory(category).length}`);
    }
}

validate().catch((error: unknown) => {
    console.error('❌ Error validating catalog:', error instanceof Error ? error.message : error);
    process.exit(1);
});
