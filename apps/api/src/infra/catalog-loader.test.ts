import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadCatalogFromFile, parseCatalog } from './catalog-loader';
import { CatalogLoadError } from '../domain/errors';
import { PRODUCT_CATEGORIES } from '../domain/product';

const validRecord = {
    id: 1,
    name: 'Canvas Sneakers',
    category: 'Footwear',
    price: 59,
    image_url: 'https://images.example.com/1.jpg',
    description: 'White canvas sneakers',
};

describe('parseCatalog', () => {
    it('should accept valid records and freeze them', () => {
        const catalog = parseCatalog([validRecord, { ...validRecord, id: 2 }]);

        expect(catalog).toHaveLength(2);
        expect(Object.isFrozen(catalog)).toBe(true);
        expect(Object.isFrozen(catalog[0])).toBe(true);
    });

    it('should reject a record with a missing key', () => {
        const { description: _omitted, ...incomplete } = validRecord;
        expect(() => parseCatalog([incomplete])).toThrow(/Invalid product record at 0\.description/);
    });

    it('should reject an unknown category', () => {
        expect(() => parseCatalog([{ ...validRecord, category: 'Toys' }])).toThrow(CatalogLoadError);
    });

    it('should reject a negative price', () => {
        expect(() => parseCatalog([{ ...validRecord, price: -1 }])).toThrow(/0\.price/);
    });

    it('should reject duplicate ids', () => {
        expect(() => parseCatalog([validRecord, validRecord])).toThrow('Duplicate product id 1');
    });

    it('should reject a non-array document', () => {
        expect(() => parseCatalog({ products: [] })).toThrow(/Invalid product record at root/);
    });
});

describe('loadCatalogFromFile', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'catalog-'));
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should load a catalog from disk', async () => {
        const file = path.join(dir, 'ok.json');
        await writeFile(file, JSON.stringify([validRecord]));

        const catalog = await loadCatalogFromFile(file);

        expect(catalog).toEqual([validRecord]);
    });

    it('should fail on a missing file', async () => {
        await expect(loadCatalogFromFile(path.join(dir, 'missing.json'))).rejects.toThrow(/not found or unreadable/);
    });

    it('should fail on invalid JSON', async () => {
        const file = path.join(dir, 'broken.json');
        await writeFile(file, '[{"id": 1,');

        await expect(loadCatalogFromFile(file)).rejects.toThrow(/Invalid JSON in catalog file/);
    });

    it('should load the bundled product catalog', async () => {
        const catalog = await loadCatalogFromFile(path.resolve(__dirname, '../../data/products.json'));

        expect(catalog.length).toBeGreaterThanOrEqual(50);
        expect(new Set(catalog.map((p) => p.category))).toEqual(new Set(PRODUCT_CATEGORIES));
    });
});
