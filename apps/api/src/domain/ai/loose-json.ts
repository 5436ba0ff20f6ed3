export type LooseParseResult =
    | { ok: true; value: unknown; repaired: boolean }
    | { ok: false };

/**
 * Removes markdown fence markers such as ```json and ``` wherever they appear.
 */
export function stripCodeFences(text: string): string {
    return text.replace(/```[\w-]*/g, '').trim();
}

/**
 * First `{` through last `}`. Null when there is no such span.
 */
export function extractObjectSpan(text: string): string | null {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) return null;
    return text.slice(start, end + 1);
}

/**
 * Rewrites JSON-like text into JSON: single-quoted strings become
 * double-quoted, and commas directly before `}` or `]` are dropped.
 * Content inside string literals is never touched.
 */
export function repairLooseJson(text: string): string {
    let out = '';
    let i = 0;

    while (i < text.length) {
        const ch = text[i];

        if (ch === '"' || ch === "'") {
            const quote = ch;
            let value = '';
            i++;
            while (i < text.length && text[i] !== quote) {
                const current = text[i];
                if (current === '\\' && i + 1 < text.length) {
                    const next = text[i + 1];
                    // \' is not a JSON escape
                    value += next === "'" ? "'" : current + next;
                    i += 2;
                    continue;
                }
                if (current === '"') value += '\\"';
                else if (current === '\n') value += '\\n';
                else if (current === '\r') value += '\\r';
                else if (current === '\t') value += '\\t';
                else value += current;
                i++;
            }
            i++; // closing quote
            out += `"${value}"`;
            continue;
        }

        if (ch === ',') {
            let j = i + 1;
            while (j < text.length && /\s/.test(text[j])) j++;
            if (text[j] === '}' || text[j] === ']') {
                i++;
                continue;
            }
        }

        out += ch;
        i++;
    }

    return out;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
        const value: unknown = JSON.parse(text);
        return { ok: true, value };
    } catch {
        return { ok: false };
    }
}

/**
 * Pulls a JSON object out of model output: fences stripped, object span
 * located, strict parse first and a repaired parse second.
 */
export function parseLooseJson(text: string): LooseParseResult {
    const span = extractObjectSpan(stripCodeFences(text));
    if (span === null) return { ok: false };

    const strict = tryParse(span);
    if (strict.ok) return { ok: true, value: strict.value, repaired: false };

    const repaired = tryParse(repairLooseJson(span));
    if (repaired.ok) return { ok: true, value: repaired.value, repaired: true };

    return { ok: false };
}
