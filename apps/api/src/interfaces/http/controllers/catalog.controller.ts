import { FastifyReply, FastifyRequest } from 'fastify';
import { CatalogRepository } from '../../../infra/repositories/catalog.repository';
import { ListProductsQuerySchema, ProductParamsSchema } from '../schemas/catalog.schemas';
import { errorEnvelope } from '../error-handler';

/**
 * Plain pass-throughs of the catalog store; no ranking happens here.
 */
export class CatalogController {
    constructor(private readonly catalog: CatalogRepository) { }

    async listProducts(request: FastifyRequest) {
        const { category } = ListProductsQuerySchema.parse(request.query);
        const products = category ? this.catalog.findByCategory(category) : this.catalog.getAll();

        return {
            data: { products, count: products.length },
            error: null,
            meta: { requestId: request.id }
        };
    }

    async getProduct(request: FastifyRequest, reply: FastifyReply) {
        const { id } = ProductParamsSchema.parse(request.params);
        const product = this.catalog.findById(id);

        if (!product) {
            return reply.code(404).send(errorEnvelope(request, 'PRODUCT_NOT_FOUND', `Product ${id} not found`));
        }

        return {
            data: { product },
            error: null,
            meta: { requestId: request.id }
        };
    }

    async listCategories(request: FastifyRequest) {
        return {
            data: { categories: this.catalog.listCategories() },
            error: null,
            meta: { requestId: request.id }
        };
    }
}
