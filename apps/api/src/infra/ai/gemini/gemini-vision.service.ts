import { GenerationConfig } from '@google/generative-ai';
import { VisionAnalyzer, VisionAnalyzerInput } from '../../../domain/ai/interfaces';
import { AiError, AiErrorCode, AnalysisSchema, VisionResult } from '../../../domain/ai/schemas';
import { Logger } from '../../../domain/logger';
import { VISION_SYSTEM_PROMPT, buildVisionUserPrompt } from './prompts/vision-v1';
import { createGeminiClient, getErrorStatus } from './client';

export interface GeminiVisionOptions {
    model: string;
    logger?: Logger;
}

function toAiError(error: unknown): AiError {
    if (error instanceof AiError) return error;

    const status = getErrorStatus(error);
    const message = error instanceof Error ? error.message : 'Unknown Vision error';

    if (status === 401 || status === 403) {
        return new AiError(AiErrorCode.PROVIDER_AUTH_ERROR, 'Invalid API Key', error);
    }
    if (status === 429) {
        return new AiError(AiErrorCode.PROVIDER_RATE_LIMIT, 'Vision provider quota exceeded', error);
    }
    if (status !== undefined) {
        return new AiError(AiErrorCode.PROVIDER_NETWORK_ERROR, `Vision provider returned ${status}: ${message}`, error);
    }
    return new AiError(AiErrorCode.INTERNAL_ERROR, message, error);
}

/**
 * Gemini-backed analyzer. Never throws: call failures come back as
 * `failed`, and text that does not validate comes back as `raw_text` for the
 * adapter to repair.
 */
export class GeminiVisionAnalyzer implements VisionAnalyzer {
    constructor(private readonly options: GeminiVisionOptions) { }

    async analyze(input: VisionAnalyzerInput): Promise<VisionResult> {
        const { imageBytes, mimeType, apiKey, config, requestId, categories } = input;
        const { model: modelName, logger } = this.options;

        const genAI = createGeminiClient(apiKey);
        const model = genAI.getGenerativeModel({
            model: modelName,
            systemInstruction: VISION_SYSTEM_PROMPT
        });

        const generationConfig: GenerationConfig = {
            temperature: config?.temperature ?? 0.1,
            maxOutputTokens: config?.maxOutputTokens ?? 1000,
            responseMimeType: 'application/json',
        };

        const userPrompt = buildVisionUserPrompt(categories);

        let responseText: string;
        try {
            const result = await model.generateContent({
                contents: [{
                    role: 'user',
                    parts: [
                        { text: userPrompt },
                        {
                            inlineData: {
                                mimeType,
                                data: imageBytes.toString('base64'),
                            },
                        },
                    ],
                }],
                generationConfig,
            });
            responseText = result.response.text();
        } catch (error) {
            const aiError = toAiError(error);
            logger?.error({ requestId, code: aiError.code, err: error }, '[Vision] Gemini call failed');
            return { kind: 'failed', error: aiError };
        }

        logger?.info({ requestId, model: modelName, chars: responseText.length }, '[Vision] Gemini responded');

        let json: unknown;
        try {
            json = JSON.parse(responseText);
        } catch {
            return { kind: 'raw_text', text: responseText };
        }

        const validated = AnalysisSchema.safeParse(json);
        if (!validated.success) {
            return { kind: 'raw_text', text: responseText };
        }
        return { kind: 'structured', analysis: validated.data };
    }
}
