/**
 * Message and Conversation Type Definitions
 */

/**
 * Display name of one of the two people in the conversation
 */
export type PersonId = string;

/**
 * Attachment counts carried by a single export entry
 */
export type MediaCounts = {
    readonly photos: number;
    readonly videos: number;
    readonly audio: number;
    readonly gifs: number;
    readonly files: number;
};

/**
 * Represents a single message of a direct-message export. Immutable once loaded.
 */
export type Message = {
    readonly sender: PersonId;
    readonly timestampMs: number;   // absolute instant, milliseconds since epoch
    readonly text?: string;
    readonly media: MediaCounts;
};

/**
 * Complete loaded conversation
 */
export type Conversation = {
    readonly messages: readonly Message[];
    readonly participants: readonly PersonId[]; // exactly two, sorted
    readonly title?: string;
    readonly skipped: number;                   // ignored system entries
};

/**
 * A reply: a message that immediately follows a message from the other person
 */
export type ResponseEvent = {
    readonly responder: PersonId;
    readonly deltaSeconds: number;
};
