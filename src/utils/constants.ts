/**
 * Constants and Configuration Values
 */

import emojiRegex from "emoji-regex";
import stopwords from './stopwords.json';

// ============================================================================
// TIME & ANALYSIS CONFIGURATION
// ============================================================================

// Default configuration values
export const DEFAULT_MIN_RESPONSE_SECONDS = 1;
export const DEFAULT_MAX_RESPONSE_SECONDS = 12 * 3600;   // 12 hours
export const DEFAULT_TIMEZONE = 'UTC';
export const DEFAULT_SENTIMENT_MODEL = 'Xenova/distilbert-base-multilingual-cased-sentiments-student';

export const CONVERSATION_GAP_SECONDS = 6 * 3600;        // silence that starts a new conversation
export const FAST_REPLY_SECONDS = 300;
export const NIGHT_START_HOUR = 0;
export const NIGHT_END_HOUR = 5;
export const LAST_SEEN_HOUR = 23;                        // a day's last message from this hour on counts as "last seen"

// Analysis limits
export const MAX_TOP_EMOJIS = 10;
export const MAX_TOP_EMOJIS_PER_PERSON = 5;
export const MAX_TOP_WORDS = 10;
export const MAX_TOP_WORDS_PER_PERSON = 5;
export const MIN_WORD_LENGTH = 2;

// Heuristic sentiment label thresholds
export const POSITIVE_THRESHOLD = 0.1;
export const NEGATIVE_THRESHOLD = -0.1;

// ============================================================================
// REGEX PATTERNS
// ============================================================================

export const EMOJI_REGEX = emojiRegex();
export const LINK_REGEX = /https?:\/\/\S+|www\.\S+/ig;

// Control & direction marks some exports inject (e.g., U+200E)
export const CONTROL_MARKS_REGEX = /[\u200E\u200F\u202A-\u202E\u2066-\u2069]/g;

// Byte sequences that show up when UTF-8 text was decoded as latin1
export const MOJIBAKE_MARKERS = ['\u00C3', '\u00C5', '\u00C2', '\u00D0', '\u00D1', '\u00E2', '\u201A', '\uFFFD'];

// ============================================================================
// STOPWORDS & EMOJI SETS
// ============================================================================

/**
 * Stopwords filtered out of word frequency analysis (English and Polish, diacritics folded)
 */
export const STOPWORDS = new Set<string>(stopwords);

export const HEART_EMOJIS = new Set<string>([
    "\u2764", "\u2764\uFE0F", "\u2763\uFE0F",
    "\u{1F90D}", "\u{1F9E1}", "\u{1F499}", "\u{1F49A}", "\u{1F49B}", "\u{1F49C}", "\u{1F5A4}", "\u{1F90E}",
    "\u{1F498}", "\u{1F49D}", "\u{1F496}", "\u{1F497}", "\u{1F493}", "\u{1F49E}", "\u{1F49F}",
]);

// ============================================================================
// EXPORT CLASSIFICATION
// ============================================================================

/**
 * Attachment extensions used to classify entries of the `media` list
 */
export const MEDIA_EXTENSIONS = {
    photos: new Set(['.jpg', '.jpeg', '.png', '.webp', '.heic', '.heif', '.bmp', '.tif', '.tiff']),
    videos: new Set(['.mp4', '.mov', '.m4v', '.avi', '.mkv', '.webm', '.3gp']),
    audio: new Set(['.mp3', '.m4a', '.aac', '.ogg', '.opus', '.wav', '.flac']),
};

/**
 * Markers of nickname-change entries (matched after diacritic folding)
 */
export const SYSTEM_NICK_MARKERS = ['ustawil', 'ustawila', 'ustawiono'];
export const SYSTEM_THEME_MARKER = 'motyw';
