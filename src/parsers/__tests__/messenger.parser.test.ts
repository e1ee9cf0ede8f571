import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { InputError } from '../../utils/errors';
import { isIgnoredSystemMessage, parseMessengerExport } from '../messenger.parser';

const fixture = (name: string): string =>
    readFileSync(new URL(`../../__fixtures__/${name}`, import.meta.url), 'utf8');

const exportOf = (messages: unknown[]): string => JSON.stringify({ messages });

const catchInputError = (run: () => unknown): InputError => {
    try {
        run();
    } catch (error) {
        if (error instanceof InputError) return error;
        throw error;
    }
    throw new Error('expected an InputError');
};

describe('parseMessengerExport', () => {
    it('loads a newest-first export in chronological order', () => {
        const conversation = parseMessengerExport(fixture('dm_sample.json'));

        expect(conversation.messages).toHaveLength(7);
        expect(conversation.skipped).toBe(1);
        expect(conversation.participants).toEqual(['Kuba', 'Ola']);
        expect(conversation.title).toBe('Pizza Crew');
        expect(conversation.messages[0]).toEqual({
            sender: 'Ola',
            timestampMs: 1704103200000,
            text: 'Hej! Idziemy dzisiaj na pizza?',
            media: { photos: 0, videos: 0, audio: 0, gifs: 0, files: 0 }
        });
        expect(conversation.messages[1].sender).toBe('Kuba');
        expect(conversation.messages[4].text).toBeUndefined();
        expect(conversation.messages[4].media.photos).toBe(1);
    });

    it('reads the alternate field names of older exports', () => {
        const conversation = parseMessengerExport(fixture('dm_sample_alt.json'));

        expect(conversation.messages).toHaveLength(3);
        expect(conversation.skipped).toBe(0);
        expect(conversation.participants).toEqual(['User A', 'User B']);
        expect(conversation.messages[1].timestampMs).toBe(1700000060000);
        expect(conversation.messages[1].media.audio).toBe(1);
        expect(conversation.messages[2].text).toBe('');
        expect(conversation.messages[2].media).toEqual({ photos: 1, videos: 1, audio: 1, gifs: 0, files: 0 });
    });

    it('uses the fallback title when the export has none', () => {
        const conversation = parseMessengerExport(fixture('dm_sample_alt.json'), 'message_1');
        expect(conversation.title).toBe('message_1');
    });

    it('takes people from senders whatever the participants list holds', () => {
        const conversation = parseMessengerExport(JSON.stringify({
            participants: ['Ola', { id: 7 }],
            messages: [
                { sender_name: 'Ola', timestamp_ms: 1000, content: 'hej' },
                { sender_name: 'Kuba', timestamp_ms: 2000, content: 'siema' }
            ]
        }));
        expect(conversation.participants).toEqual(['Kuba', 'Ola']);
        expect(conversation.messages).toHaveLength(2);
    });

    it('keeps input order for equal timestamps', () => {
        const conversation = parseMessengerExport(exportOf([
            { sender_name: 'A', timestamp_ms: 1000, content: 'first' },
            { sender_name: 'B', timestamp_ms: 1000, content: 'second' },
            { sender_name: 'A', timestamp_ms: 500, content: 'earliest' }
        ]));
        expect(conversation.messages.map(m => m.text)).toEqual(['earliest', 'first', 'second']);
    });

    it('repairs mis-encoded sender names and text', () => {
        const conversation = parseMessengerExport(exportOf([
            { sender_name: 'JuÅ¼ka', timestamp_ms: 1, content: 'JuÅ¼ jestem' },
            { sender_name: 'Bob', timestamp_ms: 2, content: 'ok' }
        ]));
        expect(conversation.participants).toEqual(['Bob', 'Jużka']);
        expect(conversation.messages[0].text).toBe('Już jestem');
    });

    it('rejects input that is not JSON', () => {
        const error = catchInputError(() => parseMessengerExport('{ not json'));
        expect(error.message).toBe('Export is not valid JSON');
        expect(error.code).toBe('input_error');
    });

    it('rejects an export without a messages list', () => {
        const error = catchInputError(() => parseMessengerExport(JSON.stringify({ participants: [] })));
        expect(error.message).toBe("Input JSON must contain a 'messages' list");
    });

    it('rejects entries that are not objects', () => {
        const error = catchInputError(() => parseMessengerExport(exportOf([
            { sender_name: 'A', timestamp_ms: 1, content: 'hi' },
            'oops'
        ])));
        expect(error.message).toBe('Message #2 is not an object');
    });

    it('rejects entries without a timestamp or sender', () => {
        expect(catchInputError(() => parseMessengerExport(exportOf([
            { sender_name: 'A', content: 'hi' }
        ]))).message).toBe('Message #1 has no valid timestamp');

        expect(catchInputError(() => parseMessengerExport(exportOf([
            { sender_name: 'A', timestamp_ms: 1, content: 'hi' },
            { timestamp_ms: 2, content: 'who?' }
        ]))).message).toBe('Message #2 has no sender');
    });

    it('rejects an empty conversation', () => {
        expect(catchInputError(() => parseMessengerExport(exportOf([]))).message).toBe('No valid messages found');
    });

    it('rejects conversations that are not between exactly two people', () => {
        const single = catchInputError(() => parseMessengerExport(exportOf([
            { sender_name: 'A', timestamp_ms: 1, content: 'talking to myself' }
        ])));
        expect(single.message).toBe('A direct-message export needs exactly two people, found 1');

        const group = catchInputError(() => parseMessengerExport(exportOf([
            { sender_name: 'A', timestamp_ms: 1, content: 'hi' },
            { sender_name: 'B', timestamp_ms: 2, content: 'hey' },
            { sender_name: 'C', timestamp_ms: 3, content: 'yo' }
        ])));
        expect(group.message).toBe('A direct-message export needs exactly two people, found 3');
        expect(group.details).toBe('Senders: A, B, C');
    });
});

describe('isIgnoredSystemMessage', () => {
    it('matches theme and nickname changes', () => {
        expect(isIgnoredSystemMessage('Ola zmieniła motyw na Miłość.')).toBe(true);
        expect(isIgnoredSystemMessage('Kuba ustawił nick Oli na Olcia.')).toBe(true);
        expect(isIgnoredSystemMessage('Ustawiono nick dla Kuby: Kubuś.')).toBe(true);
    });

    it('leaves ordinary messages alone', () => {
        expect(isIgnoredSystemMessage('jaki masz nick w grze?')).toBe(false);
        expect(isIgnoredSystemMessage('ustawiłem budzik')).toBe(false);
    });
});
