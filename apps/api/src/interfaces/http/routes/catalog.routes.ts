import { FastifyInstance } from 'fastify';
import { CatalogController } from '../controllers/catalog.controller';
import { CatalogRepository } from '../../../infra/repositories/catalog.repository';

export type CatalogRoutesOptions = {
    catalog: CatalogRepository;
};

export async function catalogRoutes(server: FastifyInstance, opts: CatalogRoutesOptions) {
    const controller = new CatalogController(opts.catalog);

    server.get('/products', (req) => controller.listProducts(req));
    server.get('/products/:id', (req, res) => controller.getProduct(req, res));
    server.get('/categories', (req) => controller.listCategories(req));
}
