import { asArray, asNumber, asString, getPath } from '../sources/utils.js';

/**
 * Terms that mark a record as belonging to the research domain.
 * Matched as case-insensitive substrings, so the short abbreviations
 * also hit inside longer words.
 */
export const DOMAIN_VOCABULARY: readonly string[] = [
    'artificial intelligence',
    'machine learning',
    'deep learning',
    'neural network',
    'ai',
    'ml',
    'dl',
];

export const DOMAIN_RELEVANCE_SCORE = 0.5;

const DOMAIN_NAME = 'artificial intelligence';
const DOMAIN_ABBREVIATION = 'ai';
const KEYWORD_SUBFIELD_TERMS = [
    'machine learning',
    'deep learning',
    'neural network',
    'computer vision',
    'natural language',
    'reinforcement learning',
];
const CONCEPT_SUBFIELD_TERMS = ['machine learning', 'deep learning', 'neural network'];
const PARENT_FIELD = 'computer science';

export interface DomainRelevance {
    isDomainRelevant: boolean;
    score: number;
}

/**
 * Coarse vocabulary match over the title, concept names and keyword names.
 */
export function matchDomainVocabulary(
    title: string | null,
    conceptNames: readonly string[],
    keywordNames: readonly string[]
): DomainRelevance {
    const haystacks = [title ?? '', ...conceptNames, ...keywordNames].map((s) => s.toLowerCase());
    const isDomainRelevant = DOMAIN_VOCABULARY.some((term) =>
        haystacks.some((text) => text.includes(term))
    );
    return { isDomainRelevant, score: isDomainRelevant ? DOMAIN_RELEVANCE_SCORE : 0 };
}

/**
 * Continuous fetch-time relevance in [0, 1].
 *
 * Takes the best of several weighted signals: keyword and concept scores
 * (doubled for the domain itself, x1.5 for its subfields), the primary
 * topic's field, and every topic's field scaled by the topic score.
 */
export function scoreWorkRelevance(work: unknown): number {
    let score = 0;

    for (const keyword of asArray(getPath(work, 'keywords'))) {
        const name = lowerName(keyword);
        const weight = asNumber(getPath(keyword, 'score')) ?? 0;

        if (name.includes(DOMAIN_NAME) || name === DOMAIN_ABBREVIATION) {
            score = Math.max(score, weight * 2.0);
        } else if (KEYWORD_SUBFIELD_TERMS.some((term) => name.includes(term))) {
            score = Math.max(score, weight * 1.5);
        }
    }

    for (const concept of asArray(getPath(work, 'concepts'))) {
        const name = lowerName(concept);
        const weight = asNumber(getPath(concept, 'score')) ?? 0;

        if (name.includes(DOMAIN_NAME)) {
            score = Math.max(score, weight * 2.0);
        } else if (CONCEPT_SUBFIELD_TERMS.some((term) => name.includes(term))) {
            score = Math.max(score, weight * 1.5);
        }
    }

    const primaryTopic = getPath(work, 'primary_topic');
    if (primaryTopic) {
        const { field, subfield } = topicFields(primaryTopic);
        if (field.includes(DOMAIN_NAME) || subfield.includes(DOMAIN_NAME)) {
            score = Math.max(score, 0.9);
        } else if (field.includes(PARENT_FIELD)) {
            score = Math.max(score, 0.5);
        }
    }

    for (const topic of asArray(getPath(work, 'topics'))) {
        const { field, subfield } = topicFields(topic);
        const weight = asNumber(getPath(topic, 'score')) ?? 0;

        if (field.includes(DOMAIN_NAME) || subfield.includes(DOMAIN_NAME)) {
            score = Math.max(score, weight * 0.8);
        } else if (field.includes(PARENT_FIELD)) {
            score = Math.max(score, weight * 0.4);
        }
    }

    return Math.min(score, 1.0);
}

/**
 * Whether the primary topic or any topic names the domain as its field or subfield.
 */
export function hasDomainFieldOrSubfield(work: unknown): boolean {
    const terms = [DOMAIN_NAME, DOMAIN_ABBREVIATION];
    const topics = [getPath(work, 'primary_topic'), ...asArray(getPath(work, 'topics'))];

    return topics.some((topic) => {
        if (!topic) return false;
        const { field, subfield } = topicFields(topic);
        return terms.some((term) => field.includes(term) || subfield.includes(term));
    });
}

export interface FetchRelevance {
    score: number;
    hasDomainField: boolean;
    accepted: boolean;
}

/**
 * Accept a fetched work when its score reaches `minScore` or a topic puts it in the domain.
 */
export function assessFetchRelevance(work: unknown, minScore: number): FetchRelevance {
    const score = scoreWorkRelevance(work);
    const hasDomainField = hasDomainFieldOrSubfield(work);
    return { score, hasDomainField, accepted: score >= minScore || hasDomainField };
}

function lowerName(entry: unknown): string {
    return (asString(getPath(entry, 'display_name')) ?? '').toLowerCase();
}

function topicFields(topic: unknown): { field: string; subfield: string } {
    return {
        field: (asString(getPath(topic, 'field', 'display_name')) ?? '').toLowerCase(),
        subfield: (asString(getPath(topic, 'subfield', 'display_name')) ?? '').toLowerCase(),
    };
}
