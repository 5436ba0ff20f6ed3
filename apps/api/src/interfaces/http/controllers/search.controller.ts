import { FastifyRequest, FastifyReply } from 'fastify';
import sharp from 'sharp';
import { ImageSearchService } from '../../../services/image-search.service';
import { AppConfigService } from '../../../config/app-config.service';
import { RemoteImageFetcher } from '../../../infra/http/image-fetcher';
import { ImageInputError, ImageInputErrorCode } from '../../../domain/errors';
import { ALLOWED_IMAGE_MIME_TYPES, isAllowedImageMimeType, sniffImageMimeType } from '../../../domain/image';
import { SearchImageHeadersSchema, SearchImageUrlBodySchema } from '../schemas/search.schemas';

interface IncomingImage {
    bytes: Buffer;
    mimeType: string;
}

function isFileTooLarge(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'FST_REQ_FILE_TOO_LARGE';
}

export class SearchController {
    constructor(
        private readonly imageSearchService: ImageSearchService,
        private readonly imageFetcher: RemoteImageFetcher,
        private readonly configService: AppConfigService,
        private readonly maxUploadBytes: number
    ) { }

    async searchByImage(request: FastifyRequest, reply: FastifyReply) {
        const requestId = request.id;

        // 1. Validate Headers
        const headerResult = SearchImageHeadersSchema.safeParse(request.headers);
        if (!headerResult.success) {
            throw new ImageInputError(
                ImageInputErrorCode.VALIDATION_HEADERS,
                'Invalid headers',
                { issues: headerResult.error.issues }
            );
        }

        // 2. Upload or URL
        const image = request.isMultipart()
            ? await this.readUpload(request)
            : await this.readUrl(request.body);

        // 3. Strip EXIF, apply orientation
        const bytes = await this.normalizeImage(image.bytes, request);

        // 4. Coordinate Service
        const search = await this.imageSearchService.searchByImage({
            imageBytes: bytes,
            mimeType: image.mimeType,
            apiKey: headerResult.data['x-ai-api-key'],
            requestId
        });

        return reply.code(200).send({
            data: {
                analysis: search.analysis,
                results: search.results,
                total_results: search.totalResults
            },
            error: null,
            meta: search.meta
        });
    }

    private async readUpload(request: FastifyRequest): Promise<IncomingImage> {
        let image: IncomingImage | null = null;

        for await (const part of request.parts()) {
            if (part.type !== 'file') continue;

            if (part.fieldname !== 'image' || image) {
                part.file.resume();
                continue;
            }

            if (!part.filename) {
                throw new ImageInputError(ImageInputErrorCode.VALIDATION_MISSING_IMAGE, 'No file selected');
            }

            if (!isAllowedImageMimeType(part.mimetype)) {
                throw new ImageInputError(
                    ImageInputErrorCode.VALIDATION_IMAGE_FORMAT,
                    `Invalid file type: ${part.mimetype}. Allowed types: ${ALLOWED_IMAGE_MIME_TYPES.join(', ')}`
                );
            }

            let bytes: Buffer;
            try {
                bytes = await part.toBuffer();
            } catch (error) {
                if (isFileTooLarge(error)) {
                    throw new ImageInputError(
                        ImageInputErrorCode.VALIDATION_IMAGE_TOO_LARGE,
                        `Image exceeds the ${this.maxUploadBytes} byte limit`,
                        { maxBytes: this.maxUploadBytes }
                    );
                }
                throw error;
            }

            // Magic byte validation to prevent spoofing
            const sniffed = sniffImageMimeType(bytes);
            if (!sniffed) {
                throw new ImageInputError(
                    ImageInputErrorCode.VALIDATION_IMAGE_CONTENT,
                    'Invalid image content: Magic bytes do not match expected format.'
                );
            }

            image = { bytes, mimeType: sniffed };
        }

        if (!image) {
            throw new ImageInputError(ImageInputErrorCode.VALIDATION_MISSING_IMAGE, 'Missing image file in multipart body');
        }
        return image;
    }

    private async readUrl(body: unknown): Promise<IncomingImage> {
        const parsed = SearchImageUrlBodySchema.safeParse(body ?? {});
        if (!parsed.success) {
            throw new ImageInputError(ImageInputErrorCode.VALIDATION_MISSING_IMAGE, 'No image file or URL provided');
        }

        const { timeoutsMs } = this.configService.getConfig();
        return this.imageFetcher.fetch(parsed.data.image_url, {
            timeoutMs: timeoutsMs.imageFetch,
            maxBytes: this.maxUploadBytes
        });
    }

    private async normalizeImage(bytes: Buffer, request: FastifyRequest): Promise<Buffer> {
        try {
            return await sharp(bytes).rotate().toBuffer();
        } catch (error) {
            // Continue with the original buffer; the vision model copes with raw bytes
            request.log.warn({ requestId: request.id, err: error }, 'Failed to normalize image orientation');
            return bytes;
        }
    }
}
