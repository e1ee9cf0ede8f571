/**
 * Text Processing Utilities
 */

import GraphemeSplitter from "grapheme-splitter";
import iconv from 'iconv-lite';
import {
    CONTROL_MARKS_REGEX,
    EMOJI_REGEX,
    LINK_REGEX,
    MIN_WORD_LENGTH,
    MOJIBAKE_MARKERS,
    STOPWORDS
} from './constants';

// ============================================================================
// TEXT PROCESSING
// ============================================================================

const GRAPHEME_SPLITTER = new GraphemeSplitter();

// Letters, digits and underscore survive; everything else splits words
const NON_WORD_REGEX = /[^\p{L}\p{N}_\s]/gu;
const SPACES_REGEX = /\s+/g;
const DIGITS_ONLY_REGEX = /^\p{N}+$/u;
const COMBINING_MARKS_REGEX = /\p{M}/gu;

/**
 * Removes control and direction marks from text
 */
export function stripControlMarks(text: string): string {
    return text.replace(CONTROL_MARKS_REGEX, "");
}

/**
 * Lowercases and strips diacritics so "Już" and "juz" compare equal.
 * `ł` has no decomposition and is mapped explicitly.
 */
export function foldDiacritics(text: string): string {
    return text
        .toLowerCase()
        .replace(/ł/g, 'l')
        .normalize('NFKD')
        .replace(COMBINING_MARKS_REGEX, '');
}

/**
 * Normalises participant display names by collapsing any run of whitespace
 * characters (including non-breaking/narrow no-break spaces) into a single
 * ASCII space and trimming leading/trailing spaces.
 */
export function normaliseParticipantName(name: string): string {
    return name
        .replace(/[\u{00A0}\u{202F}\u{2007}]/gu, ' ') // NBSP, NNBSP, figure space
        .replace(/\s+/g, ' ')
        .trim();
}

function countMojibakeMarkers(text: string): number {
    let count = 0;
    for (const marker of MOJIBAKE_MARKERS) {
        count += text.split(marker).length - 1;
    }
    return count;
}

/**
 * Repairs UTF-8 text that an exporter decoded as latin1 / windows-1252.
 * The re-decoded candidate is only taken when it carries fewer mojibake markers.
 */
export function repairMojibake(text: string): string {
    const before = countMojibakeMarkers(text);
    if (before === 0) {
        return text;
    }

    let best = text;
    let bestScore = before;
    for (const encoding of ['latin1', 'win1252']) {
        const bytes = iconv.encode(text, encoding);
        // Characters outside the code page would be lost, skip that encoding
        if (iconv.decode(bytes, encoding) !== text) {
            continue;
        }
        const candidate = iconv.decode(bytes, 'utf8');
        const score = countMojibakeMarkers(candidate);
        if (score < bestScore) {
            best = candidate;
            bestScore = score;
        }
    }
    return best;
}

/**
 * Lowercases, drops links and punctuation, and splits into raw tokens
 */
function rawTokens(text: string): string[] {
    const cleaned = text
        .toLowerCase()
        .replace(LINK_REGEX, ' ')
        .replace(/_/g, ' ')
        .replace(NON_WORD_REGEX, ' ')
        .replace(SPACES_REGEX, ' ')
        .trim();
    return cleaned ? cleaned.split(' ') : [];
}

/**
 * Tokenises text into content words: no stopwords, numbers or one-letter tokens
 */
export function tokeniseWords(text: string): string[] {
    return rawTokens(text).filter(token =>
        token.length >= MIN_WORD_LENGTH &&
        !DIGITS_ONLY_REGEX.test(token) &&
        !STOPWORDS.has(foldDiacritics(token))
    );
}

/**
 * Tokenises text for lexicon lookups: diacritics folded, stopwords kept
 */
export function sentimentTokens(text: string): string[] {
    return rawTokens(text)
        .filter(token => token.length >= MIN_WORD_LENGTH && !DIGITS_ONLY_REGEX.test(token))
        .map(foldDiacritics);
}

/**
 * Extracts emojis from text, one entry per grapheme cluster
 */
export function extractEmojis(text: string): string[] {
    if (!text) return [];
    return GRAPHEME_SPLITTER.splitGraphemes(text).filter(cluster => cluster.match(EMOJI_REGEX) !== null);
}

export function extractLinks(text: string): string[] {
    if (!text) return [];
    return text.match(LINK_REGEX) ?? [];
}
