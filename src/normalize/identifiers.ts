/**
 * Canonical graph identifiers from free-form type strings.
 *
 * "research_paper", "Research-Paper" and "research paper" all become the
 * label `ResearchPaper`; "works-at" and "WORKS_AT" both become the
 * relationship type `WORKS_AT`. Both functions are idempotent.
 */

export const FALLBACK_LABEL = 'Entity';
export const FALLBACK_RELATIONSHIP_TYPE = 'RELATED_TO';

/** Longest uppercase run kept as an acronym in labels. */
export const MAX_ACRONYM_LENGTH = 4;

export interface IdentifierWord {
    text: string;
    /** Uppercase run split off a following capitalized word, e.g. `ML` in `MLModel`. */
    leadingAcronym: boolean;
}

const SEPARATORS = /[^\p{L}\p{N}]+/u;
const WORDS = /(\p{Lu}+)(?=\p{Lu}\p{Ll})|(\p{Lu}?\p{Ll}+|\p{Lu}+|\p{N}+|\p{L}+)/gu;
const LEADING_DIGIT = /^\p{N}/u;

/**
 * Split a raw string into words at separators, case boundaries and
 * letter/digit boundaries.
 */
export function tokenizeIdentifier(raw: string): IdentifierWord[] {
    const words: IdentifierWord[] = [];
    for (const segment of raw.split(SEPARATORS)) {
        if (!segment) continue;
        for (const match of segment.matchAll(WORDS)) {
            if (match[1] !== undefined) {
                words.push({ text: match[1], leadingAcronym: true });
            } else if (match[2] !== undefined) {
                words.push({ text: match[2], leadingAcronym: false });
            }
        }
    }
    return words;
}

function titleCase(word: string): string {
    const [first = '', ...rest] = Array.from(word);
    return first.toUpperCase() + rest.join('').toLowerCase();
}

function labelWord(word: IdentifierWord): string {
    if (word.leadingAcronym && Array.from(word.text).length <= MAX_ACRONYM_LENGTH) {
        return word.text;
    }
    return titleCase(word.text);
}

function labelPass(raw: string): string {
    const label = tokenizeIdentifier(raw).map(labelWord).join('');
    if (!label) return FALLBACK_LABEL;
    return LEADING_DIGIT.test(label) ? `${FALLBACK_LABEL}${label}` : label;
}

/**
 * Canonical node label: title-cased words concatenated.
 */
export function normalizeLabel(raw: string): string {
    let label = labelPass(raw);
    // Adjacent one-letter words ("a-b" → "AB") read back as a single word; settle them.
    for (let pass = 0; pass < 4; pass++) {
        const next = labelPass(label);
        if (next === label) break;
        label = next;
    }
    return label;
}

/**
 * Canonical relationship type: upper-cased words joined with underscores.
 */
export function normalizeRelationshipType(raw: string): string {
    const type = tokenizeIdentifier(raw)
        .map((word) => word.text.toUpperCase())
        .join('_');
    if (!type) return FALLBACK_RELATIONSHIP_TYPE;
    return LEADING_DIGIT.test(type) ? `${FALLBACK_RELATIONSHIP_TYPE}_${type}` : type;
}
