import Fastify, { FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import { env } from './config/env';
import { AppConfigService, appConfigService } from './config/app-config.service';
import { TelemetryService, telemetryService } from './services/telemetry.service';
import { CatalogRepository } from './infra/repositories/catalog.repository';
import { RemoteImageFetcher } from './infra/http/image-fetcher';
import { VisionAnalyzer } from './domain/ai/interfaces';
import { registerErrorHandler } from './interfaces/http/error-handler';
import { searchRoutes } from './interfaces/http/routes/search.routes';
import { catalogRoutes } from './interfaces/http/routes/catalog.routes';
import { adminRoutes } from './interfaces/http/routes/admin.routes';

const REDACTED_HEADERS = ['req.headers["x-ai-api-key"]', 'req.headers.authorization'];

export interface BuildServerOptions {
    catalog: CatalogRepository;
    logger?: FastifyServerOptions['logger'];
    configService?: AppConfigService;
    telemetryService?: TelemetryService;
    visionAnalyzer?: VisionAnalyzer;
    imageFetcher?: RemoteImageFetcher;
    geminiApiKey?: string;
    maxUploadBytes?: number;
}

function defaultLogger(): FastifyServerOptions['logger'] {
    if (env.NODE_ENV === 'test') return false;
    if (env.NODE_ENV === 'production') return { redact: REDACTED_HEADERS };
    return {
        transport: {
            target: 'pino-pretty',
            options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
            },
        },
        redact: REDACTED_HEADERS
    };
}

export async function buildServer(options: BuildServerOptions) {
    const configService = options.configService ?? appConfigService;
    const telemetry = options.telemetryService ?? telemetryService;
    const maxUploadBytes = options.maxUploadBytes ?? env.MAX_UPLOAD_BYTES;
    const geminiApiKey = 'geminiApiKey' in options ? options.geminiApiKey : env.GEMINI_API_KEY;

    const server = Fastify({
        logger: options.logger ?? defaultLogger(),
    });

    // Middleware
    await server.register(cors, {
        origin: env.CORS_ORIGIN,
    });

    await server.register(multipart, {
        limits: {
            fileSize: maxUploadBytes,
        },
    });

    await server.register(rateLimit, {
        max: env.RATE_LIMIT_MAX,
        timeWindow: '1 minute',
    });

    registerErrorHandler(server, { exposeInternals: env.NODE_ENV !== 'production' });

    // Routes
    server.get('/api/health', async (request) => {
        return {
            data: {
                status: 'OK',
                timestamp: new Date().toISOString(),
                productsCount: options.catalog.size,
                geminiConfigured: Boolean(geminiApiKey)
            },
            error: null,
            meta: { requestId: request.id, timings: null, notices: [] }
        };
    });

    await server.register(searchRoutes, {
        prefix: '/api/search',
        catalog: options.catalog,
        configService,
        telemetryService: telemetry,
        visionAnalyzer: options.visionAnalyzer,
        imageFetcher: options.imageFetcher,
        visionModel: env.GEMINI_MODEL_VISION,
        maxUploadBytes,
        defaultApiKey: geminiApiKey
    });
    await server.register(catalogRoutes, { prefix: '/api', catalog: options.catalog });
    await server.register(adminRoutes, { prefix: '/api/admin', configService, telemetryService: telemetry });

    return server;
}
