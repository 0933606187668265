import type { FilterRule } from '../types/relay.js';

/** Rule that lets every message through. */
export const PASS_ALL: FilterRule = Object.freeze({ keywords: Object.freeze([]) });

/**
 * Build an immutable filter rule from raw keywords.
 * Keywords are trimmed, lower-cased and de-duplicated; blanks are dropped.
 */
export function createFilterRule(keywords: Iterable<string>): FilterRule {
    const normalized = new Set<string>();
    for (const keyword of keywords) {
        const value = keyword.trim().toLowerCase();
        if (value.length > 0) {
            normalized.add(value);
        }
    }
    return Object.freeze({ keywords: Object.freeze([...normalized]) });
}

/** Split a comma-separated keyword list such as `"deal, sale,,promo"`. */
export function parseKeywordList(raw: string | undefined): string[] {
    if (!raw) return [];
    return raw
        .split(',')
        .map((keyword) => keyword.trim())
        .filter((keyword) => keyword.length > 0);
}

/**
 * Decide whether a message body qualifies for forwarding.
 *
 * An empty rule passes everything, including media-only messages with no body.
 * Otherwise the body must contain at least one keyword (case-insensitive
 * substring); a missing body never qualifies.
 */
export function qualifies(body: string | undefined, rule: FilterRule): boolean {
    if (rule.keywords.length === 0) return true;
    if (!body) return false;

    const haystack = body.toLowerCase();
    return rule.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

/** Keywords from `rule` found in `body`, in rule order. */
export function matchedKeywords(body: string | undefined, rule: FilterRule): string[] {
    if (!body || rule.keywords.length === 0) return [];

    const haystack = body.toLowerCase();
    return rule.keywords.filter((keyword) => haystack.includes(keyword.toLowerCase()));
}
