import fs from 'fs';
import path from 'path';
import { env } from '../src/config/env';
import { GeminiVisionAnalyzer } from '../src/infra/ai/gemini/gemini-vision.service';
import { loadCatalogFromFile } from '../src/infra/catalog-loader';
import { CatalogRepository } from '../src/infra/repositories/catalog.repository';
import { AnalysisAdapter } from '../src/domain/ai/analysis-adapter';
import { SimilarityRanker } from '../src/domain/ranking/similarity-ranker';
import { sniffImageMimeType } from '../src/domain/image';
import { AppConfigService } from '../src/config/app-config.service';
import { ImageSearchService } from '../src/services/image-search.service';
import { TelemetryService } from '../src/services/telemetry.service';

/**
 * Runs one search against a local image with the real Gemini analyzer.
 * Run with: npx tsx scripts/analyze-image.ts <path/to/image> [topN]
 */
async function main() {
    const imagePath = process.argv[2];
    const topN = Number(process.argv[3] ?? 5);

    if (!imagePath) {
        console.error('Please provide an image path: tsx scripts/analyze-image.ts <path> [topN]');
        process.exit(1);
    }

    if (!env.GEMINI_API_KEY) {
        console.error('Please set GEMINI_API_KEY in .env or as environment variable');
        process.exit(1);
    }

    const imageBytes = fs.readFileSync(path.resolve(imagePath));
    const mimeType = sniffImageMimeType(imageBytes);
    if (!mimeType) {
        console.error(`❌ ${imagePath} is not a PNG, JPEG, GIF or WEBP image`);
        process.exit(1);
    }

    const service = new ImageSearchService({
        visionAnalyzer: new GeminiVisionAnalyzer({ model: env.GEMINI_MODEL_VISION }),
        catalog: new CatalogRepository(await loadCatalogFromFile(env.CATALOG_PATH)),
        adapter: new AnalysisAdapter(),
        ranker: new SimilarityRanker(),
        configService: new AppConfigService(),
        telemetryService: new TelemetryService(),
        defaultApiKey: env.GEMINI_API_KEY,
    });

    console.log(`🔍 Analyzing ${imagePath} with ${env.GEMINI_MODEL_VISION}...`);

    const search = await service.searchByImage({ imageBytes, mimeType, requestId: 'cli' });

    console.log('✅ Analysis:');
    console.log(JSON.stringify(search.analysis, null, 2));
    for (const notice of search.meta.notices) {
        console.log(`⚠️  ${notice.code}: ${notice.message}`);
    }

    console.log(`\n🏆 Top ${topN} matches:`);
    for (const match of search.results.slice(0, topN)) {
        console.log(`   ${match.similarity.toFixed(4)}  #${match.product.id} ${match.product.name} (${match.product.category})`);
    }
    console.log(`\n⏱️ Duration: ${search.meta.timings.totalMs}ms (vision ${search.meta.timings.visionMs}ms)`);
}

main().catch((error: unknown) => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
});
