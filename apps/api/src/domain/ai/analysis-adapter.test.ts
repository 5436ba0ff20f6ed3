import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AnalysisAdapter, EMPTY_SUMMARY_FALLBACK } from './analysis-adapter';
import { AiError, AiErrorCode, Analysis } from './schemas';
import { Logger } from '../logger';

describe('AnalysisAdapter', () => {
    let logger: Logger;
    let adapter: AnalysisAdapter;

    const strictAnalysis: Analysis = {
        summary: "A pair of blue running shoes with white soles. They're photographed on a wooden floor.",
        category: 'Footwear',
        colors: ['blue', 'white'],
        materials: ['mesh', 'rubber'],
        style: ['sporty'],
        objects: ['shoes'],
        suggested_tags: ['running', 'sneakers', 'athletic'],
    };

    beforeEach(() => {
        logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        adapter = new AnalysisAdapter(logger);
    });

    it('should return a structured analysis unchanged', () => {
        const result = adapter.adaptWithOutcome({ kind: 'structured', analysis: strictAnalysis });

        expect(result.analysis).toEqual(strictAnalysis);
        expect(result.outcome).toBe('structured');
    });

    it('should parse strict JSON text', () => {
        const result = adapter.adaptWithOutcome({ kind: 'raw_text', text: JSON.stringify(strictAnalysis) });

        expect(result.analysis).toEqual(strictAnalysis);
        expect(result.outcome).toBe('parsed');
    });

    it('should read fenced, single-quoted JSON with trailing commas as the strict record', () => {
        const loose = [
            '```json',
            '{',
            `  'summary': "A pair of blue running shoes with white soles. They're photographed on a wooden floor.",`,
            "  'category': 'Footwear',",
            "  'colors': ['blue', 'white',],",
            "  'materials': ['mesh', 'rubber'],",
            "  'style': ['sporty'],",
            "  'objects': ['shoes'],",
            "  'suggested_tags': ['running', 'sneakers', 'athletic',],",
            '}',
            '```',
        ].join('\n');

        const result = adapter.adaptWithOutcome({ kind: 'raw_text', text: loose });

        expect(result.analysis).toEqual(strictAnalysis);
        expect(result.outcome).toBe('repaired');
        expect(adapter.adapt({ kind: 'raw_text', text: loose })).toEqual(
            adapter.adapt({ kind: 'raw_text', text: JSON.stringify(strictAnalysis) })
        );
    });

    it('should normalize missing and mistyped fields', () => {
        const text = '{"summary": 42, "category": "   ", "colors": "blue", "style": ["modern", 3, null], "extra": true}';

        const result = adapter.adaptWithOutcome({ kind: 'raw_text', text });

        expect(result.analysis).toEqual({
            summary: '',
            category: null,
            colors: [],
            materials: [],
            style: ['modern'],
            objects: [],
            suggested_tags: [],
        });
        expect(result.outcome).toBe('parsed');
    });

    it('should trim the category', () => {
        const analysis = adapter.adapt({ kind: 'raw_text', text: '{"category": " Footwear "}' });

        expect(analysis.category).toBe('Footwear');
    });

    it('should degrade prose to a summary-only analysis without throwing', () => {
        const text = 'The image shows a red armchair next to a window.';

        const result = adapter.adaptWithOutcome({ kind: 'raw_text', text });

        expect(result).toEqual({
            analysis: {
                summary: text,
                category: null,
                colors: [],
                materials: [],
                style: [],
                objects: [],
                suggested_tags: [],
            },
            outcome: 'degraded',
        });
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should truncate a degraded summary', () => {
        const analysis = adapter.adapt({ kind: 'raw_text', text: 'x'.repeat(700) });
        expect(analysis.summary).toHaveLength(600);

        const short = adapter.adapt({ kind: 'raw_text', text: 'abcdefghijkl' }, { degradedSummaryChars: 5 });
        expect(short.summary).toBe('abcde');
    });

    it('should normalize the category the same way for structured and text results', () => {
        for (const category of [' Footwear ', '', '   ']) {
            const record = { ...strictAnalysis, category };

            const structured = adapter.adapt({ kind: 'structured', analysis: record });
            const fromText = adapter.adapt({ kind: 'raw_text', text: JSON.stringify(record) });

            expect(structured).toEqual(fromText);
        }
        expect(adapter.adapt({ kind: 'structured', analysis: { ...strictAnalysis, category: ' Footwear ' } }).category)
            .toBe('Footwear');
        expect(adapter.adapt({ kind: 'structured', analysis: { ...strictAnalysis, category: '' } }).category)
            .toBeNull();
    });

    it('should not split a surrogate pair when truncating', () => {
        const analysis = adapter.adapt({ kind: 'raw_text', text: '👟👟👟 shoes' }, { degradedSummaryChars: 2 });

        expect(analysis.summary).toBe('👟👟');
    });

    it('should use a fallback summary for empty text', () => {
        expect(adapter.adapt({ kind: 'raw_text', text: '   ' }).summary).toBe(EMPTY_SUMMARY_FALLBACK);
    });

    it('should rethrow the error of a failed call', () => {
        const error = new AiError(AiErrorCode.PROVIDER_RATE_LIMIT, 'quota');

        expect(() => adapter.adapt({ kind: 'failed', error })).toThrow(error);
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should work without a logger', () => {
        const silent = new AnalysisAdapter();
        expect(silent.adapt({ kind: 'raw_text', text: 'plain words' }).summary).toBe('plain words');
    });
});
