import { GoogleGenerativeAI } from '@google/generative-ai';

/**
 * Creates a Gemini client session with the provided API key.
 * The key lives in memory only for the duration of the request.
 */
export function createGeminiClient(apiKey: string) {
    return new GoogleGenerativeAI(apiKey);
}

/**
 * HTTP status carried by an SDK error, if any.
 */
export function getErrorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('response' in error && typeof error.response === 'object' && error.response !== null &&
        'status' in error.response && typeof error.response.status === 'number') {
        return error.response.status;
    }
    return undefined;
}
