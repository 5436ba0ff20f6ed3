import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GeminiVisionAnalyzer } from './gemini-vision.service';
import { AiErrorCode } from '../../../domain/ai/schemas';
import { Logger } from '../../../domain/logger';

// Mock the Gemini SDK
const { mockGenerateContent, mockGetGenerativeModel, MockGoogleGenerativeAI } = vi.hoisted(() => {
    const mockGenerateContent = vi.fn();
    const mockGetGenerativeModel = vi.fn(() => ({ generateContent: mockGenerateContent }));
    const MockGoogleGenerativeAI = vi.fn(() => ({ getGenerativeModel: mockGetGenerativeModel }));
    return { mockGenerateContent, mockGetGenerativeModel, MockGoogleGenerativeAI };
});

vi.mock('@google/generative-ai', () => ({
    GoogleGenerativeAI: MockGoogleGenerativeAI,
}));

function respondWith(text: string) {
    mockGenerateContent.mockResolvedValue({ response: { text: () => text } });
}

function httpError(status: number, message: string) {
    return Object.assign(new Error(message), { status });
}

describe('GeminiVisionAnalyzer', () => {
    let logger: Logger;
    let analyzer: GeminiVisionAnalyzer;

    const input = {
        imageBytes: Buffer.from('fake-image'),
        mimeType: 'image/jpeg',
        apiKey: 'test-key',
        requestId: 'test-req',
        categories: ['Footwear', 'Home'],
    };

    const analysis = {
        summary: 'Blue running shoes.',
        category: 'Footwear',
        colors: ['blue'],
        materials: ['mesh'],
        style: ['sporty'],
        objects: ['shoes'],
        suggested_tags: ['running'],
    };

    beforeEach(() => {
        vi.clearAllMocks();
        logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        analyzer = new GeminiVisionAnalyzer({ model: 'gemini-test', logger });
    });

    it('should return a structured analysis for valid JSON', async () => {
        respondWith(JSON.stringify(analysis));

        const result = await analyzer.analyze(input);

        expect(result).toEqual({ kind: 'structured', analysis });
        expect(MockGoogleGenerativeAI).toHaveBeenCalledWith('test-key');
        expect(mockGetGenerativeModel).toHaveBeenCalledWith(expect.objectContaining({ model: 'gemini-test' }));
    });

    it('should send the image inline with a prompt naming the categories', async () => {
        respondWith(JSON.stringify(analysis));

        await analyzer.analyze(input);

        const request = mockGenerateContent.mock.calls[0][0];
        const [textPart, imagePart] = request.contents[0].parts;
        expect(textPart.text).toContain('Footwear, Home');
        expect(imagePart.inlineData).toEqual({
            mimeType: 'image/jpeg',
            data: Buffer.from('fake-image').toString('base64'),
        });
        expect(request.generationConfig).toEqual({
            temperature: 0.1,
            maxOutputTokens: 1000,
            responseMimeType: 'application/json',
        });
    });

    it('should honour a per-call generation config', async () => {
        respondWith(JSON.stringify(analysis));

        await analyzer.analyze({ ...input, config: { temperature: 0.5, maxOutputTokens: 200 } });

        const request = mockGenerateContent.mock.calls[0][0];
        expect(request.generationConfig.temperature).toBe(0.5);
        expect(request.generationConfig.maxOutputTokens).toBe(200);
    });

    it('should return raw text when the response is not JSON', async () => {
        respondWith('A pair of blue shoes.');

        const result = await analyzer.analyze(input);

        expect(result).toEqual({ kind: 'raw_text', text: 'A pair of blue shoes.' });
    });

    it('should return raw text when the JSON misses required keys', async () => {
        const text = JSON.stringify({ summary: 'Only a summary' });
        respondWith(text);

        const result = await analyzer.analyze(input);

        expect(result).toEqual({ kind: 'raw_text', text });
    });

    it('should map a 401 to PROVIDER_AUTH_ERROR', async () => {
        mockGenerateContent.mockRejectedValue(httpError(401, 'API key not valid'));

        const result = await analyzer.analyze(input);

        expect(result.kind).toBe('failed');
        if (result.kind === 'failed') {
            expect(result.error.code).toBe(AiErrorCode.PROVIDER_AUTH_ERROR);
            expect(result.error.message).toBe('Invalid API Key');
        }
        expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should map a 429 to PROVIDER_RATE_LIMIT', async () => {
        mockGenerateContent.mockRejectedValue(httpError(429, 'Resource exhausted'));

        const result = await analyzer.analyze(input);

        expect(result.kind === 'failed' && result.error.code).toBe(AiErrorCode.PROVIDER_RATE_LIMIT);
    });

    it('should map other statuses to PROVIDER_NETWORK_ERROR', async () => {
        mockGenerateContent.mockRejectedValue(httpError(500, 'Internal'));

        const result = await analyzer.analyze(input);

        expect(result.kind === 'failed' && result.error.code).toBe(AiErrorCode.PROVIDER_NETWORK_ERROR);
    });

    it('should map errors without a status to INTERNAL_ERROR', async () => {
        mockGenerateContent.mockRejectedValue(new Error('socket hang up'));

        const result = await analyzer.analyze(input);

        expect(result.kind).toBe('failed');
        if (result.kind === 'failed') {
            expect(result.error.code).toBe(AiErrorCode.INTERNAL_ERROR);
            expect(result.error.message).toBe('socket hang up');
        }
    });

    it('should call the provider once without retrying', async () => {
        mockGenerateContent.mockRejectedValue(httpError(503, 'Unavailable'));

        await analyzer.analyze(input);

        expect(mockGenerateContent).toHaveBeenCalledTimes(1);
    });
});
