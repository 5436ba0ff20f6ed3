import { z } from 'zod';

export const AnalysisSchema = z.object({
    summary: z.string(),
    category: z.string().nullable(),
    colors: z.array(z.string()),
    materials: z.array(z.string()),
    style: z.array(z.string()),
    objects: z.array(z.string()),
    suggested_tags: z.array(z.string()),
});

export type Analysis = z.infer<typeof AnalysisSchema>;

export const ANALYSIS_LIST_FIELDS = ['colors', 'materials', 'style', 'objects', 'suggested_tags'] as const;

/**
 * Trimmed category label, or null when blank.
 */
export function normalizeCategory(category: string | null): string | null {
    const trimmed = category?.trim();
    return trimmed ? trimmed : null;
}

const StringListSchema = z
    .array(z.unknown())
    .catch([])
    .transform((items) => items.filter((item): item is string => typeof item === 'string'));

/**
 * Field-by-field normalization for model output that parsed but may be missing
 * keys or carry the wrong types. Every field falls back to its empty value.
 */
export const LooseAnalysisSchema = z.object({
    summary: z.string().catch(''),
    category: z.string().nullable().catch(null).transform(normalizeCategory),
    colors: StringListSchema,
    materials: StringListSchema,
    style: StringListSchema,
    objects: StringListSchema,
    suggested_tags: StringListSchema,
});

export enum AiErrorCode {
    PROVIDER_TIMEOUT = 'PROVIDER_TIMEOUT',
    PROVIDER_RATE_LIMIT = 'PROVIDER_RATE_LIMIT',
    PROVIDER_AUTH_ERROR = 'PROVIDER_AUTH_ERROR',
    PROVIDER_NETWORK_ERROR = 'PROVIDER_NETWORK_ERROR',
    PROVIDER_NOT_CONFIGURED = 'PROVIDER_NOT_CONFIGURED',
    INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class AiError extends Error {
    constructor(
        public readonly code: AiErrorCode,
        message: string,
        public readonly originalError?: unknown
    ) {
        super(message);
        this.name = 'AiError';
    }
}

/**
 * What the vision collaborator hands back. The adapter decides what to do with
 * each variant; nothing downstream probes raw strings.
 */
export type VisionResult =
    | { kind: 'structured'; analysis: Analysis }
    | { kind: 'raw_text'; text: string }
    | { kind: 'failed'; error: AiError };

export type AnalysisOutcome = 'structured' | 'parsed' | 'repaired' | 'degraded';

export interface AdaptedAnalysis {
    analysis: Analysis;
    outcome: AnalysisOutcome;
}

export interface SearchTimings {
    totalMs: number;
    visionMs: number;
    rankingMs: number;
}

export interface SearchNotice {
    code: string;
    message: string;
}
