export enum ImageInputErrorCode {
    VALIDATION_HEADERS = 'VALIDATION_HEADERS',
    VALIDATION_MISSING_IMAGE = 'VALIDATION_MISSING_IMAGE',
    VALIDATION_IMAGE_FORMAT = 'VALIDATION_IMAGE_FORMAT',
    VALIDATION_IMAGE_CONTENT = 'VALIDATION_IMAGE_CONTENT',
    VALIDATION_IMAGE_TOO_LARGE = 'VALIDATION_IMAGE_TOO_LARGE',
    VALIDATION_IMAGE_URL = 'VALIDATION_IMAGE_URL',
    IMAGE_FETCH_FAILED = 'IMAGE_FETCH_FAILED',
}

/**
 * The caller sent something we cannot search with. Always a client-side
 * rejection, never retried.
 */
export class ImageInputError extends Error {
    constructor(
        public readonly code: ImageInputErrorCode,
        message: string,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ImageInputError';
    }

    get statusCode(): number {
        return this.code === ImageInputErrorCode.VALIDATION_IMAGE_TOO_LARGE ? 413 : 400;
    }
}

export class CatalogLoadError extends Error {
    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
        this.name = 'CatalogLoadError';
    }
}
