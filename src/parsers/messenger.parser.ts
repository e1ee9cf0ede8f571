import path from "node:path";
import { z } from 'zod';
import type { Conversation, MediaCounts, Message } from '../types';
import { InputError } from '../utils/errors';
import {
    MEDIA_EXTENSIONS,
    SYSTEM_NICK_MARKERS,
    SYSTEM_THEME_MARKER
} from '../utils/constants';
import {
    foldDiacritics,
    normaliseParticipantName,
    repairMojibake
} from '../utils/text.utils';

// ============================================================================
// MESSENGER PARSER
// ============================================================================

/**
 * Top level of a Messenger / Instagram direct-message export. Older exports
 * use `Messages` instead of `messages`. People are taken from message
 * senders, so the export's own `participants` list is not read.
 */
const ExportSchema = z.object({
    title: z.string().optional(),
    messages: z.array(z.unknown()).optional(),
    Messages: z.array(z.unknown()).optional()
}).passthrough();

/**
 * A single export entry. Field names differ between export generations, so
 * every field is read leniently and checked below.
 */
const EntrySchema = z.record(z.string(), z.unknown());

type ExportEntry = z.infer<typeof EntrySchema>;

type ParsedEntry =
    | { kind: 'message'; message: Message }
    | { kind: 'ignored' };

function countList(value: unknown): number {
    return Array.isArray(value) ? value.length : 0;
}

/**
 * Classifies the `media` list of newer exports by file extension
 */
function countMediaItems(items: unknown): Pick<MediaCounts, 'photos' | 'videos' | 'audio'> {
    const counts = { photos: 0, videos: 0, audio: 0 };
    if (!Array.isArray(items)) {
        return counts;
    }
    for (const item of items) {
        let uri: unknown = item;
        const record = EntrySchema.safeParse(item);
        if (record.success) {
            uri = record.data.uri ?? record.data.URI;
        }
        if (typeof uri !== 'string') {
            continue;
        }
        const ext = path.extname(uri.toLowerCase());
        if (MEDIA_EXTENSIONS.photos.has(ext)) counts.photos += 1;
        else if (MEDIA_EXTENSIONS.videos.has(ext)) counts.videos += 1;
        else if (MEDIA_EXTENSIONS.audio.has(ext)) counts.audio += 1;
    }
    return counts;
}

/**
 * Theme and nickname changes are exported as ordinary messages
 */
export function isIgnoredSystemMessage(content: string): boolean {
    const normalized = foldDiacritics(content);
    if (normalized.includes(SYSTEM_THEME_MARKER)) {
        return true;
    }
    if (!normalized.includes('nick')) {
        return false;
    }
    return SYSTEM_NICK_MARKERS.some(marker => normalized.includes(marker));
}

function parseTimestamp(value: unknown): number | null {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return Math.trunc(value);
    }
    if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
        return Number.parseInt(value, 10);
    }
    return null;
}

function parseEntry(entry: ExportEntry, position: number): ParsedEntry {
    const timestampMs = parseTimestamp(entry.timestamp_ms ?? entry.timestamp);
    if (timestampMs === null) {
        throw new InputError(`Message #${position} has no valid timestamp`);
    }

    const rawSender = entry.sender_name ?? entry.senderName;
    const sender = typeof rawSender === 'string' ? normaliseParticipantName(repairMojibake(rawSender)) : '';
    if (!sender) {
        throw new InputError(`Message #${position} has no sender`);
    }

    const rawText = entry.content ?? entry.text;
    let text: string | undefined;
    if (typeof rawText === 'string') {
        text = repairMojibake(rawText);
        if (isIgnoredSystemMessage(text)) {
            return { kind: 'ignored' };
        }
    }

    const fromMedia = countMediaItems(entry.media);
    const media: MediaCounts = {
        photos: countList(entry.photos) + fromMedia.photos,
        videos: countList(entry.videos) + fromMedia.videos,
        audio: countList(entry.audio_files) + countList(entry.audioFiles) + fromMedia.audio,
        gifs: countList(entry.gifs),
        files: countList(entry.files)
    };

    return { kind: 'message', message: { sender, timestampMs, text, media } };
}

/**
 * Parses a direct-message export JSON into a validated two-person conversation
 */
export function parseMessengerExport(exportJson: string, fallbackTitle?: string): Conversation {
    let raw: unknown;
    try {
        raw = JSON.parse(exportJson);
    } catch (error) {
        throw new InputError("Export is not valid JSON", error instanceof Error ? error.message : String(error));
    }

    const parsed = ExportSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InputError("Export does not look like a conversation", parsed.error.issues[0]?.message);
    }
    const entries = parsed.data.messages ?? parsed.data.Messages;
    if (!entries) {
        throw new InputError("Input JSON must contain a 'messages' list");
    }

    const messages: Message[] = [];
    let skipped = 0;

    entries.forEach((value, index) => {
        const entry = EntrySchema.safeParse(value);
        if (!entry.success) {
            throw new InputError(`Message #${index + 1} is not an object`);
        }
        const result = parseEntry(entry.data, index + 1);
        if (result.kind === 'ignored') {
            skipped += 1;
        } else {
            messages.push(result.message);
        }
    });

    if (messages.length === 0) {
        throw new InputError("No valid messages found");
    }

    const senders = Array.from(new Set(messages.map(m => m.sender))).sort((a, b) => a.localeCompare(b, 'en'));
    if (senders.length !== 2) {
        throw new InputError(
            `A direct-message export needs exactly two people, found ${senders.length}`,
            `Senders: ${senders.join(', ')}`
        );
    }

    // Exports are usually newest-first; keep them chronological (stable for equal timestamps)
    messages.sort((a, b) => a.timestampMs - b.timestampMs);

    const title = parsed.data.title ? repairMojibake(parsed.data.title) : fallbackTitle;

    return {
        messages,
        participants: senders,
        title,
        skipped
    };
}
