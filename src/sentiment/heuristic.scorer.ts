/**
 * Lexicon-based sentiment for Polish and English chat messages.
 *
 * Weighted words are looked up after diacritic folding. Negations flip the
 * next two weighted words, intensifiers and dampeners scale the next one.
 * Emoticons, laughter and emoji add fixed amounts, punctuation and shouting
 * amplify the total, and the result is normalised by message length and
 * squashed into (-1, 1).
 */

import { z } from 'zod';
import type { SentimentScore } from '../types';
import { extractEmojis, sentimentTokens } from '../utils/text.utils';
import { labelForPolarity, type SentimentScorer } from './sentiment.scorer';
import lexiconData from './lexicon.json';

const LexiconSchema = z.object({
    weights: z.record(z.string(), z.number()),
    intensifiers: z.record(z.string(), z.number()),
    dampeners: z.record(z.string(), z.number()),
    negations: z.array(z.string()),
    positiveEmoji: z.array(z.string()),
    negativeEmoji: z.array(z.string())
});

export type SentimentLexicon = {
    weights: Map<string, number>;
    intensifiers: Map<string, number>;
    dampeners: Map<string, number>;
    negations: Set<string>;
    positiveEmoji: Set<string>;
    negativeEmoji: Set<string>;
};

export function loadLexicon(raw: unknown = lexiconData): SentimentLexicon {
    const data = LexiconSchema.parse(raw);
    return {
        weights: new Map(Object.entries(data.weights)),
        intensifiers: new Map(Object.entries(data.intensifiers)),
        dampeners: new Map(Object.entries(data.dampeners)),
        negations: new Set(data.negations),
        positiveEmoji: new Set(data.positiveEmoji),
        negativeEmoji: new Set(data.negativeEmoji)
    };
}

const NEGATED_WEIGHT_FACTOR = 0.85;
const NEGATION_SPAN = 2;
const EMOTICON_WEIGHT = 0.6;
const EMOJI_WEIGHT = 0.7;
const LAUGHTER_BONUS = 0.5;

const REPEAT_REGEX = /(.)\1{2,}/gu;
const POSITIVE_EMOTICON_REGEX = /(:\)+|:-\)+|:d+|x-?d+|;\)+|<3)/gi;
const NEGATIVE_EMOTICON_REGEX = /(:\(+|:-\(+|:'\(+|=\(+|d:|d=|>:\()/gi;
const LAUGHTER_REGEX = /\b(ha){2,}|(he){2,}|(ja){2,}|lol+\b/i;
const LETTER_REGEX = /\p{L}/u;
const UPPERCASE_REGEX = /\p{Lu}/u;

const countMatches = (text: string, regex: RegExp): number => (text.match(regex) ?? []).length;

/**
 * Polarity in (-1, 1); 0 for empty text
 */
export function heuristicPolarity(text: string, lexicon: SentimentLexicon): number {
    if (!text) return 0;

    // "suuuuper" -> "suuper"
    const tokens = sentimentTokens(text.replace(REPEAT_REGEX, '$1$1'));

    let score = 0;
    let intensify = 1;
    let negate = 0;
    for (const token of tokens) {
        if (lexicon.negations.has(token)) {
            negate = NEGATION_SPAN;
            continue;
        }
        const intensifier = lexicon.intensifiers.get(token);
        if (intensifier !== undefined) {
            intensify = Math.max(intensify, intensifier);
            continue;
        }
        const dampener = lexicon.dampeners.get(token);
        if (dampener !== undefined) {
            intensify *= dampener;
            continue;
        }
        let weight = lexicon.weights.get(token) ?? 0;
        if (weight === 0) continue;
        if (negate > 0) {
            weight = -weight * NEGATED_WEIGHT_FACTOR;
            negate -= 1;
        }
        score += weight * intensify;
        intensify = 1;
    }

    const positiveEmoticons = countMatches(text, POSITIVE_EMOTICON_REGEX);
    const negativeEmoticons = countMatches(text, NEGATIVE_EMOTICON_REGEX);
    score += EMOTICON_WEIGHT * (positiveEmoticons - negativeEmoticons);
    if (LAUGHTER_REGEX.test(text)) {
        score += LAUGHTER_BONUS;
    }

    const emojis = extractEmojis(text);
    const positiveEmojis = emojis.filter(emoji => lexicon.positiveEmoji.has(emoji)).length;
    const negativeEmojis = emojis.filter(emoji => lexicon.negativeEmoji.has(emoji)).length;
    score += EMOJI_WEIGHT * (positiveEmojis - negativeEmojis);

    const punctuation = countMatches(text, /[!?]/g);
    if (punctuation > 0) {
        score *= 1 + Math.min(0.3, 0.04 * punctuation);
    }

    const letters = Array.from(text).filter(char => LETTER_REGEX.test(char));
    if (letters.length >= 4) {
        const upperRatio = letters.filter(char => UPPERCASE_REGEX.test(char)).length / letters.length;
        if (upperRatio >= 0.6) {
            score *= 1.1;
        }
    }

    const signals = tokens.length + positiveEmoticons + negativeEmoticons + positiveEmojis + negativeEmojis;
    const norm = Math.max(1, Math.sqrt(signals));
    return Math.tanh(score / norm / 2);
}

export class HeuristicSentimentScorer implements SentimentScorer {
    readonly name = 'heuristic' as const;
    private readonly lexicon: SentimentLexicon;

    constructor(lexicon: SentimentLexicon = loadLexicon()) {
        this.lexicon = lexicon;
    }

    async scoreMessage(text: string): Promise<SentimentScore> {
        const polarity = heuristicPolarity(text, this.lexicon);
        return {
            polarity,
            label: labelForPolarity(polarity),
            confidence: Math.abs(polarity),
            source: this.name
        };
    }
}
