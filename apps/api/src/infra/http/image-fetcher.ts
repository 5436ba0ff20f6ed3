import { ImageInputError, ImageInputErrorCode } from '../../domain/errors';
import { ImageMimeType, sniffImageMimeType } from '../../domain/image';

export interface FetchedImage {
    bytes: Buffer;
    mimeType: ImageMimeType;
}

export interface ImageFetchOptions {
    timeoutMs: number;
    maxBytes: number;
}

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

function parseImageUrl(raw: string): URL {
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ImageInputError(ImageInputErrorCode.VALIDATION_IMAGE_URL, `Malformed image URL: ${raw}`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ImageInputError(
            ImageInputErrorCode.VALIDATION_IMAGE_URL,
            `Unsupported URL protocol: ${url.protocol}`
        );
    }
    return url;
}

function tooLarge(size: number, maxBytes: number): ImageInputError {
    return new ImageInputError(
        ImageInputErrorCode.VALIDATION_IMAGE_TOO_LARGE,
        `Image exceeds the ${maxBytes} byte limit`,
        { size, maxBytes }
    );
}

/**
 * Reads the body chunk by chunk and stops pulling from upstream once the
 * running total passes `maxBytes`.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<Buffer> {
    const reader = response.body?.getReader();
    if (!reader) {
        return Buffer.alloc(0);
    }

    const chunks: Uint8Array[] = [];
    let totalSize = 0;

    try {
        while (true) {
            const chunk = await reader.read().catch((error: unknown) => {
                throw new ImageInputError(
                    ImageInputErrorCode.IMAGE_FETCH_FAILED,
                    `Failed to read image body: ${error instanceof Error ? error.message : 'stream error'}`
                );
            });
            if (chunk.done) break;

            totalSize += chunk.value.length;
            if (totalSize > maxBytes) {
                await reader.cancel();
                throw tooLarge(totalSize, maxBytes);
            }

            chunks.push(chunk.value);
        }

        return Buffer.concat(chunks);
    } finally {
        reader.releaseLock();
    }
}

/**
 * Downloads an image for URL-based searches. The format is taken from the
 * bytes, not the remote Content-Type header.
 */
export class RemoteImageFetcher {
    constructor(private readonly fetchFn: FetchFn = (input, init) => fetch(input, init)) { }

    async fetch(rawUrl: string, options: ImageFetchOptions): Promise<FetchedImage> {
        const url = parseImageUrl(rawUrl);

        let response: Response;
        try {
            response = await this.fetchFn(url.toString(), {
                signal: AbortSignal.timeout(options.timeoutMs),
                redirect: 'follow',
            });
        } catch (error) {
            const reason = error instanceof Error && error.name === 'TimeoutError'
                ? `timed out after ${options.timeoutMs} ms`
                : error instanceof Error ? error.message : 'network error';
            throw new ImageInputError(
                ImageInputErrorCode.IMAGE_FETCH_FAILED,
                `Failed to fetch image from URL: ${reason}`
            );
        }

        if (!response.ok) {
            throw new ImageInputError(
                ImageInputErrorCode.IMAGE_FETCH_FAILED,
                `Failed to fetch image from URL: HTTP ${response.status}`,
                { status: response.status }
            );
        }

        const declaredLength = Number(response.headers.get('content-length'));
        if (Number.isFinite(declaredLength) && declaredLength > options.maxBytes) {
            throw tooLarge(declaredLength, options.maxBytes);
        }

        const bytes = await readBodyWithLimit(response, options.maxBytes);

        const mimeType = sniffImageMimeType(bytes);
        if (!mimeType) {
            throw new ImageInputError(
                ImageInputErrorCode.VALIDATION_IMAGE_CONTENT,
                'URL did not return a PNG, JPEG, GIF or WEBP image'
            );
        }

        return { bytes, mimeType };
    }
}
