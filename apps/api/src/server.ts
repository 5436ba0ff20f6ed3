import { env } from './config/env';
import { buildServer } from './app';
import { loadCatalogFromFile } from './infra/catalog-loader';
import { CatalogRepository } from './infra/repositories/catalog.repository';

async function bootstrap() {
    let catalog: CatalogRepository;
    try {
        catalog = new CatalogRepository(await loadCatalogFromFile(env.CATALOG_PATH));
    } catch (err) {
        console.error('❌ Failed to load product catalog:', err);
        process.exit(1);
    }

    const server = await buildServer({ catalog });

    try {
        await server.listen({ port: env.PORT, host: '0.0.0.0' });

        server.log.info(
            { products: catalog.size, categories: catalog.listCategories(), geminiConfigured: Boolean(env.GEMINI_API_KEY) },
            `🚀 Visual product matcher listening on http://localhost:${env.PORT}`
        );
        if (!env.GEMINI_API_KEY) {
            server.log.warn({}, 'GEMINI_API_KEY not set: searches need an x-ai-api-key header');
        }

        // Graceful Shutdown
        const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
        signals.forEach((signal) => {
            process.on(signal, () => {
                server.log.info(`Received ${signal}, closing server...`);
                server.close()
                    .then(() => process.exit(0))
                    .catch((closeError: unknown) => {
                        server.log.error(closeError);
                        process.exit(1);
                    });
            });
        });
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
}

void bootstrap();
