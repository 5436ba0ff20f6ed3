import { FastifyInstance } from 'fastify';
import { SearchController } from '../controllers/search.controller';
import { ImageSearchService } from '../../../services/image-search.service';
import { GeminiVisionAnalyzer } from '../../../infra/ai/gemini/gemini-vision.service';
import { RemoteImageFetcher } from '../../../infra/http/image-fetcher';
import { CatalogRepository } from '../../../infra/repositories/catalog.repository';
import { AnalysisAdapter } from '../../../domain/ai/analysis-adapter';
import { SimilarityRanker } from '../../../domain/ranking/similarity-ranker';
import { VisionAnalyzer } from '../../../domain/ai/interfaces';
import { AppConfigService } from '../../../config/app-config.service';
import { TelemetryService } from '../../../services/telemetry.service';

export type SearchRoutesOptions = {
    catalog: CatalogRepository;
    configService: AppConfigService;
    telemetryService: TelemetryService;
    visionAnalyzer?: VisionAnalyzer;
    imageFetcher?: RemoteImageFetcher;
    visionModel: string;
    maxUploadBytes: number;
    /** Used when a request does not carry its own x-ai-api-key. */
    defaultApiKey?: string;
};

export async function searchRoutes(server: FastifyInstance, opts: SearchRoutesOptions) {
    // Composition Root for Search (manual DI)
    const vision = opts.visionAnalyzer ?? new GeminiVisionAnalyzer({ model: opts.visionModel, logger: server.log });
    const service = new ImageSearchService({
        visionAnalyzer: vision,
        catalog: opts.catalog,
        adapter: new AnalysisAdapter(server.log),
        ranker: new SimilarityRanker(),
        configService: opts.configService,
        telemetryService: opts.telemetryService,
        defaultApiKey: opts.defaultApiKey,
        logger: server.log
    });
    const controller = new SearchController(
        service,
        opts.imageFetcher ?? new RemoteImageFetcher(),
        opts.configService,
        opts.maxUploadBytes
    );

    server.post('/', (req, res) => controller.searchByImage(req, res));
}
