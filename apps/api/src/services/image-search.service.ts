import { VisionAnalyzer } from '../domain/ai/interfaces';
import { AiError, AiErrorCode, Analysis, AdaptedAnalysis, SearchNotice, SearchTimings } from '../domain/ai/schemas';
import { AnalysisAdapter } from '../domain/ai/analysis-adapter';
import { Logger } from '../domain/logger';
import { ScoredMatch } from '../domain/product';
import { SimilarityRanker } from '../domain/ranking/similarity-ranker';
import { buildQueryText, tokenize } from '../domain/ranking/tokenizer';
import { CatalogRepository } from '../infra/repositories/catalog.repository';
import { AppConfigService } from '../config/app-config.service';
import { TelemetryService } from './telemetry.service';

export interface SearchByImageInput {
    imageBytes: Buffer;
    mimeType: string;
    /** Request-scoped key; falls back to the service default when absent. */
    apiKey?: string;
    requestId: string;
}

export interface SearchResponse {
    analysis: Analysis;
    results: ScoredMatch[];
    totalResults: number;
    meta: {
        requestId: string;
        timings: SearchTimings;
        notices: SearchNotice[];
    };
}

export interface ImageSearchServiceDeps {
    visionAnalyzer: VisionAnalyzer;
    catalog: CatalogRepository;
    adapter: AnalysisAdapter;
    ranker: SimilarityRanker;
    configService: AppConfigService;
    telemetryService: TelemetryService;
    defaultApiKey?: string;
    logger?: Logger;
}

export class ImageSearchService {
    constructor(private readonly deps: ImageSearchServiceDeps) { }

    private async withTimeout<T>(promise: Promise<T>, timeoutMs: number, stageName: string): Promise<T> {
        let timeoutHandle: NodeJS.Timeout | undefined;
        const timeoutPromise = new Promise<never>((_, reject) => {
            timeoutHandle = setTimeout(
                () => reject(new AiError(AiErrorCode.PROVIDER_TIMEOUT, `${stageName} timed out after ${timeoutMs} ms`)),
                timeoutMs
            );
        });

        try {
            return await Promise.race([promise, timeoutPromise]);
        } finally {
            clearTimeout(timeoutHandle);
        }
    }

    /**
     * Complete search pipeline: analyze, adapt, tokenize, rank, truncate.
     */
    async searchByImage(input: SearchByImageInput): Promise<SearchResponse> {
        const { visionAnalyzer, catalog, adapter, ranker, configService, logger } = this.deps;
        const { imageBytes, mimeType, requestId } = input;

        const startTime = Date.now();
        const timings: SearchTimings = { totalMs: 0, visionMs: 0, rankingMs: 0 };
        const notices: SearchNotice[] = [];
        const config = configService.getConfig();

        let adapted: AdaptedAnalysis;
        const visionStart = Date.now();
        try {
            const apiKey = input.apiKey || this.deps.defaultApiKey;
            if (!apiKey) {
                throw new AiError(
                    AiErrorCode.PROVIDER_NOT_CONFIGURED,
                    'No AI API key configured. Set GEMINI_API_KEY or send the x-ai-api-key header.'
                );
            }

            const visionResult = await this.withTimeout(
                visionAnalyzer.analyze({
                    imageBytes,
                    mimeType,
                    apiKey,
                    requestId,
                    categories: catalog.listCategories(),
                    config: {
                        temperature: 0.1,
                        maxOutputTokens: 1000
                    }
                }),
                config.timeoutsMs.vision,
                'Vision analysis'
            );

            adapted = adapter.adaptWithOutcome(visionResult, {
                degradedSummaryChars: config.degradedSummaryChars
            });
        } catch (error) {
            timings.visionMs = Date.now() - visionStart;
            timings.totalMs = Date.now() - startTime;
            logger?.error({ requestId, err: error }, '[ImageSearchService] Vision stage failed');
            this.recordTelemetry(requestId, timings, { ranked: 0, returned: 0 }, null, error);
            throw error;
        }
        timings.visionMs = Date.now() - visionStart;

        if (adapted.outcome === 'degraded') {
            notices.push({
                code: 'ANALYSIS_DEGRADED',
                message: 'AI returned an unstructured description; results are based on its summary only.'
            });
        } else if (adapted.outcome === 'repaired') {
            notices.push({
                code: 'ANALYSIS_REPAIRED',
                message: 'AI output was not strict JSON and was repaired before matching.'
            });
        }

        const rankingStart = Date.now();
        const queryTokens = tokenize(buildQueryText(adapted.analysis));
        const ranked = ranker.rank(queryTokens, catalog.getAll(), adapted.analysis.category);
        const results = ranked
            .filter((match) => match.similarity >= config.minSimilarity)
            .slice(0, config.resultsLimit);
        timings.rankingMs = Date.now() - rankingStart;
        timings.totalMs = Date.now() - startTime;

        logger?.info({
            requestId,
            timings,
            counts: { catalog: catalog.size, ranked: ranked.length, returned: results.length },
            analysisOutcome: adapted.outcome,
            category: adapted.analysis.category
        }, '[Search Summary] Completed');

        this.recordTelemetry(
            requestId,
            timings,
            { ranked: ranked.length, returned: results.length },
            adapted,
            null
        );

        return {
            analysis: adapted.analysis,
            results,
            totalResults: results.length,
            meta: { requestId, timings, notices }
        };
    }

    private recordTelemetry(
        requestId: string,
        timings: SearchTimings,
        counts: { ranked: number; returned: number },
        adapted: AdaptedAnalysis | null,
        error: unknown
    ): void {
        let errorCode: string | null = null;
        if (error instanceof AiError) errorCode = error.code;
        else if (error instanceof Error) errorCode = error.name;
        else if (error !== null) errorCode = 'UNKNOWN_ERROR';

        this.deps.telemetryService.record({
            requestId,
            timings,
            counts: { catalog: this.deps.catalog.size, ...counts },
            analysisOutcome: adapted?.outcome ?? null,
            error: errorCode
        });
    }
}
