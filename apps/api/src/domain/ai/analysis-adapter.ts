import { Logger } from '../logger';
import { AdaptedAnalysis, Analysis, LooseAnalysisSchema, VisionResult, normalizeCategory } from './schemas';
import { parseLooseJson } from './loose-json';

export const DEFAULT_DEGRADED_SUMMARY_CHARS = 600;
export const EMPTY_SUMMARY_FALLBACK = 'Unable to analyze image.';

export interface AnalysisAdapterOptions {
    degradedSummaryChars?: number;
}

/**
 * Turns whatever the vision model produced into a canonical Analysis.
 *
 * Malformed output never fails a search: a structured record is used as is,
 * JSON-like text is parsed (repairing quotes and trailing commas if needed),
 * and anything else degrades to a summary-only record. Only a failed call
 * is surfaced as an error.
 */
export class AnalysisAdapter {
    constructor(private readonly logger?: Logger) { }

    public adapt(result: VisionResult, options?: AnalysisAdapterOptions): Analysis {
        return this.adaptWithOutcome(result, options).analysis;
    }

    public adaptWithOutcome(result: VisionResult, options: AnalysisAdapterOptions = {}): AdaptedAnalysis {
        switch (result.kind) {
            case 'structured':
                return {
                    analysis: { ...result.analysis, category: normalizeCategory(result.analysis.category) },
                    outcome: 'structured'
                };
            case 'failed':
                throw result.error;
            case 'raw_text':
                return this.fromText(result.text, options.degradedSummaryChars ?? DEFAULT_DEGRADED_SUMMARY_CHARS);
        }
    }

    private fromText(rawText: string, degradedSummaryChars: number): AdaptedAnalysis {
        const text = rawText.trim();
        const parsed = parseLooseJson(text);

        if (parsed.ok && isPlainObject(parsed.value)) {
            return {
                analysis: LooseAnalysisSchema.parse(parsed.value),
                outcome: parsed.repaired ? 'repaired' : 'parsed',
            };
        }

        this.logger?.warn(
            { snippet: text.slice(0, 200), length: text.length },
            '[AnalysisAdapter] Model output is not JSON, degrading to summary-only analysis'
        );

        return {
            analysis: {
                summary: text ? Array.from(text).slice(0, degradedSummaryChars).join('') : EMPTY_SUMMARY_FALLBACK,
                category: null,
                colors: [],
                materials: [],
                style: [],
                objects: [],
                suggested_tags: [],
            },
            outcome: 'degraded',
        };
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
