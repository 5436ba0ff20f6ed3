import { Product, ScoredMatch } from '../product';
import { buildProductText, tokenize } from './tokenizer';

export const CATEGORY_BOOST = 1.3;

export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
    let intersection = 0;
    for (const token of smaller) {
        if (larger.has(token)) intersection++;
    }
    const union = a.size + b.size - intersection;
    if (union === 0) return 0;
    return intersection / union;
}

/**
 * Category labels compare byte for byte; "footwear" does not boost "Footwear".
 */
export function applyCategoryBoost(
    score: number,
    queryCategory: string | null | undefined,
    itemCategory: string
): number {
    const boosted = queryCategory && itemCategory && queryCategory === itemCategory
        ? score * CATEGORY_BOOST
        : score;
    return Math.min(boosted, 1.0);
}

export class SimilarityRanker {
    private readonly tokenCache = new WeakMap<Product, ReadonlySet<string>>();

    /**
     * Scores every catalog item against the query and returns all of them,
     * best first. Items with equal scores keep their catalog order.
     */
    public rank(
        queryTokens: ReadonlySet<string>,
        catalog: readonly Product[],
        queryCategory?: string | null
    ): ScoredMatch[] {
        const matches: ScoredMatch[] = catalog.map((product) => {
            const base = jaccardSimilarity(queryTokens, this.tokensFor(product));
            const similarity = applyCategoryBoost(base, queryCategory, product.category);
            return { product, similarity: Number(similarity.toFixed(4)) };
        });

        // Array.prototype.sort is stable, so ties stay in catalog order
        return matches.sort((a, b) => b.similarity - a.similarity);
    }

    private tokensFor(product: Product): ReadonlySet<string> {
        let tokens = this.tokenCache.get(product);
        if (!tokens) {
            tokens = tokenize(buildProductText(product));
            this.tokenCache.set(product, tokens);
        }
        return tokens;
    }
}
