import { describe, expect, it } from 'vitest';
import {
    escapeHtml,
    formatDuration,
    formatHourlyHistogram,
    formatMinutes,
    formatPercent,
    formatPolarity,
    formatWeekdayHistogram
} from '../format.utils';

describe('escapeHtml', () => {
    it('escapes markup and quotes', () => {
        expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
        expect(escapeHtml('plain')).toBe('plain');
    });
});

describe('number formatting', () => {
    it('shows missing minutes as n/a', () => {
        expect(formatMinutes(null)).toBe('n/a');
        expect(formatMinutes(0)).toBe('0.0 min');
        expect(formatMinutes(8 / 3)).toBe('2.7 min');
    });

    it('signs polarity', () => {
        expect(formatPolarity(0.25)).toBe('+0.25');
        expect(formatPolarity(-0.5)).toBe('-0.50');
        expect(formatPolarity(0)).toBe('0.00');
    });

    it('formats percentages', () => {
        expect(formatPercent(200 / 3)).toBe('66.7%');
    });

    it('formats durations', () => {
        expect(formatDuration(45)).toBe('45 seconds');
        expect(formatDuration(60)).toBe('1 minute');
        expect(formatDuration(85860)).toBe('23 hours, 51 minutes');
        expect(formatDuration(90000)).toBe('1 day, 1 hour');
        expect(formatDuration(172800)).toBe('2 days');
    });
});

describe('histograms', () => {
    it('labels weekdays from Monday', () => {
        const days = formatWeekdayHistogram([6, 1, 0, 0, 0, 0, 0]);
        expect(days.map(day => day.label)).toEqual(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);
        expect(days[0].count).toBe(6);
        expect(days[0].percentage).toBeCloseTo(600 / 7, 10);
    });

    it('labels hours and handles empty histograms', () => {
        const hours = formatHourlyHistogram(Array<number>(24).fill(0));
        expect(hours[9]).toEqual({ label: '09', count: 0, percentage: 0 });
        expect(hours).toHaveLength(24);
    });
});
