import { VisionResult } from './schemas';

export interface AiConfig {
    temperature?: number;
    maxOutputTokens?: number;
}

export interface VisionAnalyzerInput {
    imageBytes: Buffer;
    mimeType: string;
    requestId: string;
    apiKey: string;
    /** Catalog categories the model should choose from. */
    categories: readonly string[];
    config?: AiConfig;
}

export interface VisionAnalyzer {
    analyze(input: VisionAnalyzerInput): Promise<VisionResult>;
}
