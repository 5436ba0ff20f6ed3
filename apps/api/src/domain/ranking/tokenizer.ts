import { Analysis, ANALYSIS_LIST_FIELDS } from '../ai/schemas';
import { Product } from '../product';

const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

/**
 * Lowercases and splits on anything that is not a letter or digit.
 * Exact-match tokens only: no stemming, no stop words.
 */
export function tokenize(text: string): Set<string> {
    const tokens = new Set<string>();
    for (const token of text.toLowerCase().split(TOKEN_SEPARATOR)) {
        if (token) tokens.add(token);
    }
    return tokens;
}

export function buildQueryText(analysis: Analysis): string {
    const parts = [
        analysis.summary,
        analysis.category ?? '',
        ...ANALYSIS_LIST_FIELDS.map((field) => analysis[field].join(' ')),
    ];
    return parts.filter(Boolean).join(' ').trim();
}

export function buildProductText(product: Product): string {
    return `${product.name} ${product.category} ${product.description}`;
}
