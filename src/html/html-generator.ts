
// ============================================================================
// HTML REPORT GENERATOR
// ============================================================================
import type { Leader, PersonStats, ResponseStats, SentimentSummary, WrappedReport } from '../types';
import { formatDateTime } from '../utils/date.utils';
import {
    escapeHtml,
    formatDuration,
    formatHourlyHistogram,
    formatMinutes,
    formatNumber,
    formatPercent,
    formatPolarity,
    formatWeekdayHistogram
} from './format.utils';

const BACKEND_LABELS: Record<string, string> = {
    'heuristic': 'Heuristic',
    'model-backed': 'Model',
    'off': 'Off'
};

const backendBadge = (backend: string): string =>
    `<span class="badge badge-${escapeHtml(backend)}">${escapeHtml(BACKEND_LABELS[backend] ?? backend)}</span>`;

const statBox = (value: string, label: string): string => `
                        <div class="stat-box">
                            <div class="stat-value">${value}</div>
                            <div class="stat-label">${label}</div>
                        </div>`;

/**
 * Bar chart of labelled counts; bar heights are relative to the largest count
 */
function barChart(items: Array<{ label: string; count: number }>): string {
    const max = items.reduce((highest, item) => Math.max(highest, item.count), 1);
    return `
                        <div class="bar-chart">
                            ${items.map(item => `
                                <div class="bar-item">
                                    <div class="bar" style="height: ${(item.count / max * 100).toFixed(1)}%">
                                        <div class="bar-count">${formatNumber(item.count)}</div>
                                    </div>
                                    <div class="bar-label">${escapeHtml(item.label)}</div>
                                </div>
                            `).join('')}
                        </div>`;
}

function responseRows(stats: ResponseStats): string {
    const rows: Array<[string, string]> = [
        ['Replies', formatNumber(stats.count)],
        ['Average', formatMinutes(stats.avgMinutes)],
        ['Median', formatMinutes(stats.medianMinutes)],
        ['90th percentile', formatMinutes(stats.p90Minutes)],
        ['Fastest', formatMinutes(stats.minMinutes)],
        ['Slowest', formatMinutes(stats.maxMinutes)]
    ];
    return rows.map(([label, value]) => `
                                <tr><td>${label}</td><td class="number-col">${value}</td></tr>`).join('');
}

function sentimentBlock(sentiment: SentimentSummary): string {
    if (sentiment.status === 'not-computed') {
        return `<div class="muted">Sentiment not computed</div>`;
    }
    const { distribution } = sentiment;
    return `
                            <div class="sentiment-value">${formatPolarity(sentiment.meanPolarity)} ${backendBadge(sentiment.source)}</div>
                            <div class="muted">${formatNumber(sentiment.scoredMessages)} messages scored</div>
                            <div class="tags">
                                <span class="tag green">${formatNumber(distribution.positive)} positive</span>
                                <span class="tag gray">${formatNumber(distribution.neutral)} neutral</span>
                                <span class="tag red">${formatNumber(distribution.negative)} negative</span>
                            </div>`;
}

function personCard(entry: PersonStats, report: WrappedReport): string {
    const { metrics } = report;
    const person = entry.person;
    const topWords = metrics.topWordsByPerson[person] ?? [];
    const topEmojis = metrics.topEmojisByPerson[person] ?? [];
    return `
                <div class="section person-card">
                    <div class="section-title">${escapeHtml(person)}</div>
                    <div class="stats-row">
                        ${statBox(formatNumber(metrics.messageCounts[person] ?? 0), 'Messages')}
                        ${statBox(formatPercent(metrics.messageShares[person] ?? 0), 'Share')}
                        ${statBox(formatNumber(metrics.emojiTotals[person] ?? 0), 'Emojis')}
                        ${statBox((metrics.avgWordsPerMessage[person] ?? 0).toFixed(1), 'Words per Message')}
                    </div>
                    <div class="grid-split">
                        <div>
                            <div class="chart-label">Response time</div>
                            <table class="data-table">${responseRows(entry.response)}
                            </table>
                        </div>
                        <div>
                            <div class="chart-label">Sentiment</div>
                            ${sentimentBlock(entry.sentiment)}
                        </div>
                    </div>
                    ${topWords.length > 0 ? `
                    <div class="chart-label">Favourite words</div>
                    <div class="tags">
                        ${topWords.map(w => `<span class="tag">${escapeHtml(w.word)} (${formatNumber(w.count)})</span>`).join('')}
                    </div>` : ''}
                    ${topEmojis.length > 0 ? `
                    <div class="chart-label">Favourite emojis</div>
                    <div class="tags">
                        ${topEmojis.map(e => `<span class="tag">${escapeHtml(e.emoji)} ${formatNumber(e.count)}</span>`).join('')}
                    </div>` : ''}
                </div>`;
}

const leaderText = (leader: Leader | null, unit: string): string =>
    leader ? `${escapeHtml(leader.person)} (${formatNumber(leader.count)} ${unit})` : 'n/a';

function highlights(report: WrappedReport): string {
    const { metrics, responseExtremes, responseLeaders } = report;
    const items: Array<[string, string]> = [
        ['Top sender', metrics.topSender ? escapeHtml(metrics.topSender) : 'n/a'],
        ['Fastest responder', responseLeaders.fastest
            ? `${escapeHtml(responseLeaders.fastest.person)} (${formatMinutes(responseLeaders.fastest.avgMinutes)} avg)` : 'n/a'],
        ['Slowest responder', responseLeaders.slowest
            ? `${escapeHtml(responseLeaders.slowest.person)} (${formatMinutes(responseLeaders.slowest.avgMinutes)} avg)` : 'n/a'],
        ['Quickest reply', responseExtremes.fastest
            ? `${escapeHtml(responseExtremes.fastest.person)} (${formatMinutes(responseExtremes.fastest.minutes)})` : 'n/a'],
        ['Longest wait for a reply', responseExtremes.slowest
            ? `${escapeHtml(responseExtremes.slowest.person)} (${formatMinutes(responseExtremes.slowest.minutes)})` : 'n/a'],
        ['Most active day', metrics.mostActiveDay
            ? `${metrics.mostActiveDay.date} (${formatNumber(metrics.mostActiveDay.count)} messages)` : 'n/a'],
        ['Longest silence', metrics.longestGap ? formatDuration(metrics.longestGap.durationSeconds) : 'n/a'],
        ['Longest monologue', metrics.longestStreak.person
            ? `${escapeHtml(metrics.longestStreak.person)} (${formatNumber(metrics.longestStreak.length)} in a row)` : 'n/a'],
        ['Night owl', leaderText(metrics.night.winner, 'messages after midnight')],
        ['Last one awake', metrics.lastSeen.winner
            ? `${leaderText(metrics.lastSeen.winner, 'nights')}, ${formatPercent(metrics.lastSeen.pct[metrics.lastSeen.winner.person] ?? 0)} of late goodnights` : 'n/a'],
        ['Emoji champion', leaderText(metrics.emojiLeader, 'emojis')],
        ['Quick on the draw', metrics.fastReplies.winner
            ? `${escapeHtml(metrics.fastReplies.winner.person)} (${formatPercent(metrics.fastReplies.winner.pct)} answered within 5 min)` : 'n/a'],
        ['Most photos', leaderText(metrics.mediaLeaders.photos, 'photos')],
        ['Most videos', leaderText(metrics.mediaLeaders.videos, 'videos')],
        ['Most voice messages', leaderText(metrics.mediaLeaders.audio, 'audio')]
    ];
    return items.map(([label, value]) => `
                        <tr><td>${label}</td><td>${value}</td></tr>`).join('');
}

function sentimentTimeline(report: WrappedReport): string {
    if (report.sentimentByMonth.length === 0) {
        return `<div class="muted">Sentiment not computed</div>`;
    }
    return `
                    <div class="timeline">
                        ${report.sentimentByMonth.map(point => `
                        <div class="timeline-row">
                            <div class="timeline-label">${escapeHtml(point.month)}</div>
                            <div class="timeline-track">
                                <div class="timeline-bar ${point.meanPolarity >= 0 ? 'positive' : 'negative'}"
                                     style="width: ${(Math.min(1, Math.abs(point.meanPolarity)) * 50).toFixed(1)}%"></div>
                            </div>
                            <div class="timeline-value">${formatPolarity(point.meanPolarity)}</div>
                        </div>`).join('')}
                    </div>`;
}

/**
 * Renders the report as a single self-contained HTML page
 */
export function generateHTMLReport(report: WrappedReport): string {
    const { metadata, metrics } = report;
    const people = report.people.map(entry => escapeHtml(entry.person));
    const hourlyData = formatHourlyHistogram(metrics.hourlyCounts);
    const weekdayData = formatWeekdayHistogram(metrics.weekdayCounts);
    const title = metadata.title ? escapeHtml(metadata.title) : people.join(' & ');
    const range = metrics.dateRange
        ? `${formatDateTime(metrics.dateRange.startMs, metadata.timezone)} to ${formatDateTime(metrics.dateRange.endMs, metadata.timezone)}`
        : '';

    return `<!DOCTYPE html>
    <html lang="en">
    <head>
        <meta charset="UTF-8">
        <meta name="viewport" content="width=device-width, initial-scale=1.0">
        <title>DM Wrapped: ${title}</title>
        <style>
            * { margin: 0; padding: 0; box-sizing: border-box; }

            body {
                font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
                background: #f5f5f5;
                color: #333;
                line-height: 1.5;
            }

            .container { max-width: 1200px; margin: 0 auto; padding: 40px 20px; }

            .header {
                background: white;
                padding: 32px;
                margin-bottom: 32px;
                border-bottom: 3px solid #2563eb;
            }

            .header h1 { font-size: 28px; font-weight: 600; color: #111; margin-bottom: 8px; }
            .participants { color: #666; font-size: 16px; }

            .tabs {
                display: flex;
                gap: 4px;
                margin-bottom: 32px;
                border-bottom: 2px solid #e5e5e5;
                overflow-x: auto;
                white-space: nowrap;
            }

            .tabs button {
                background: none;
                border: none;
                padding: 12px 24px;
                font-size: 15px;
                font-weight: 500;
                color: #666;
                cursor: pointer;
                border-bottom: 2px solid transparent;
                margin-bottom: -2px;
            }

            .tabs button:hover, .tabs button.active { color: #2563eb; }
            .tabs button.active { border-bottom-color: #2563eb; }

            .page { display: none; }
            .page.active { display: block; }

            .section {
                background: white;
                padding: 28px;
                margin-bottom: 24px;
                border: 1px solid #e5e5e5;
            }

            .section-title {
                font-size: 20px;
                font-weight: 600;
                color: #111;
                margin-bottom: 24px;
                padding-bottom: 12px;
                border-bottom: 1px solid #e5e5e5;
            }

            .stats-row {
                display: grid;
                grid-template-columns: repeat(auto-fit, minmax(180px, 1fr));
                gap: 20px;
                margin-bottom: 24px;
            }

            .stat-box { padding: 20px; background: #fafafa; border: 1px solid #e5e5e5; }
            .stat-value { font-size: 32px; font-weight: 700; color: #2563eb; margin-bottom: 4px; }

            .stat-label {
                font-size: 13px;
                color: #666;
                text-transform: uppercase;
                letter-spacing: 0.5px;
                font-weight: 500;
            }

            .chart-wrapper { margin: 24px 0; }
            .chart-label { font-size: 15px; font-weight: 600; color: #333; margin: 16px 0; }

            .bar-chart {
                display: flex;
                align-items: flex-end;
                height: 200px;
                gap: 3px;
                background: #fafafa;
                padding: 16px;
                border: 1px solid #e5e5e5;
            }

            .bar-item {
                flex: 1;
                display: flex;
                flex-direction: column;
                align-items: center;
                justify-content: flex-end;
                position: relative;
                height: 100%;
            }

            .bar { width: 100%; background: #2563eb; position: relative; min-height: 3px; }
            .bar:hover { background: #1d4ed8; }

            .bar-count {
                position: absolute;
                bottom: 100%;
                left: 50%;
                transform: translateX(-50%);
                background: #111;
                color: white;
                padding: 4px 8px;
                font-size: 12px;
                white-space: nowrap;
                opacity: 0;
                pointer-events: none;
                margin-bottom: 4px;
            }

            .bar-item:hover .bar-count { opacity: 1; }
            .bar-label { margin-top: 8px; font-size: 11px; color: #666; font-weight: 500; }

            .grid-split { display: grid; grid-template-columns: repeat(auto-fit, minmax(280px, 1fr)); gap: 24px; }
            .grid-2 { display: grid; grid-template-columns: repeat(auto-fill, minmax(120px, 1fr)); gap: 12px; }

            .emoji-item { background: #fafafa; border: 1px solid #e5e5e5; padding: 16px; text-align: center; }
            .emoji-item .emoji { font-size: 28px; display: block; margin-bottom: 8px; }
            .emoji-item .count { font-weight: 600; color: #2563eb; font-size: 14px; }

            .tags { display: flex; flex-wrap: wrap; gap: 8px; margin-top: 8px; }

            .tag {
                background: #2563eb;
                color: white;
                padding: 6px 14px;
                font-size: 13px;
                font-weight: 500;
                border-radius: 3px;
            }

            .tag.green { background: #059669; }
            .tag.red { background: #dc2626; }
            .tag.gray { background: #6b7280; }

            .badge {
                display: inline-block;
                padding: 2px 8px;
                font-size: 11px;
                font-weight: 600;
                text-transform: uppercase;
                border-radius: 3px;
                vertical-align: middle;
                background: #e5e7eb;
                color: #374151;
            }

            .badge-model-backed { background: #ede9fe; color: #6b21a8; }
            .badge-heuristic { background: #dbeafe; color: #1e40af; }

            .sentiment-value { font-size: 28px; font-weight: 700; color: #111; }
            .muted { color: #888; font-size: 14px; }

            .data-table { width: 100%; border-collapse: collapse; }
            .data-table td { padding: 8px 4px; border-bottom: 1px solid #f0f0f0; }
            .number-col { text-align: right; font-variant-numeric: tabular-nums; }

            .timeline-row { display: grid; grid-template-columns: 90px 1fr 60px; gap: 12px; align-items: center; margin-bottom: 6px; }
            .timeline-label, .timeline-value { font-size: 13px; color: #666; font-variant-numeric: tabular-nums; }
            .timeline-track { position: relative; height: 14px; background: #fafafa; border: 1px solid #e5e5e5; }
            .timeline-bar { position: absolute; top: 0; bottom: 0; }
            .timeline-bar.positive { left: 50%; background: #059669; }
            .timeline-bar.negative { right: 50%; background: #dc2626; }

            .footer { color: #888; font-size: 13px; margin-top: 32px; }
            .footer li { margin-left: 20px; }
        </style>
    </head>
    <body>
        <div class="container">
            <div class="header">
                <h1>${title}</h1>
                <div class="participants">
                    ${people.join(', ')} • ${formatNumber(metrics.totals.messages)} messages${range ? ` • ${range}` : ''}
                </div>
            </div>

            <div class="tabs">
                <button onclick="showPage('overview', this)" class="active">Overview</button>
                <button onclick="showPage('people', this)">People</button>
                <button onclick="showPage('highlights', this)">Highlights</button>
            </div>

            <div id="overview" class="page active">
                <div class="section">
                    <div class="section-title">Overview</div>
                    <div class="stats-row">
                        ${statBox(formatNumber(metrics.totals.messages), 'Total Messages')}
                        ${statBox(formatNumber(metrics.totals.textMessages), 'Text Messages')}
                        ${statBox(formatNumber(metrics.totals.emojis), 'Emojis')}
                        ${statBox(formatNumber(metrics.totals.links), 'Links')}
                        ${statBox(formatNumber(metrics.totals.photos + metrics.totals.videos + metrics.totals.audio), 'Media')}
                    </div>
                    <div class="stats-row">
                        ${statBox(formatMinutes(report.overallResponse.avgMinutes), 'Average Reply')}
                        ${statBox(formatMinutes(report.overallResponse.medianMinutes), 'Median Reply')}
                        ${statBox(formatMinutes(report.overallResponse.p90Minutes), '90th Percentile Reply')}
                        ${statBox(formatPercent(metrics.night.pct), 'Sent at Night')}
                    </div>
                </div>

                <div class="section">
                    <div class="section-title">Activity</div>
                    <div class="chart-wrapper">
                        <div class="chart-label">By Hour (${escapeHtml(metadata.timezone)})</div>
                        ${barChart(hourlyData)}
                    </div>
                    <div class="chart-wrapper">
                        <div class="chart-label">By Day</div>
                        ${barChart(weekdayData)}
                    </div>
                    ${metrics.messagesPerMonth.length > 0 ? `
                    <div class="chart-wrapper">
                        <div class="chart-label">By Month</div>
                        ${barChart(metrics.messagesPerMonth.map(entry => ({ label: entry.month, count: entry.count })))}
                    </div>` : ''}
                </div>

                <div class="section">
                    <div class="section-title">Sentiment Over Time ${backendBadge(metadata.sentimentEffective)}</div>
                    ${sentimentTimeline(report)}
                </div>
            </div>

            <div id="people" class="page">
                ${report.people.map(entry => personCard(entry, report)).join('')}
            </div>

            <div id="highlights" class="page">
                <div class="section">
                    <div class="section-title">Highlights</div>
                    <table class="data-table">${highlights(report)}
                    </table>
                </div>

                ${metrics.topEmojis.length > 0 ? `
                <div class="section">
                    <div class="section-title">Top Emojis</div>
                    <div class="grid-2">
                        ${metrics.topEmojis.map(item => `
                        <div class="emoji-item">
                            <span class="emoji">${escapeHtml(item.emoji)}</span>
                            <span class="count">${formatNumber(item.count)}</span>
                        </div>`).join('')}
                    </div>
                </div>` : ''}

                ${metrics.topWords.length > 0 ? `
                <div class="section">
                    <div class="section-title">Top Words</div>
                    <div class="tags">
                        ${metrics.topWords.map(w => `<span class="tag">${escapeHtml(w.word)} (${formatNumber(w.count)})</span>`).join('')}
                    </div>
                </div>` : ''}
            </div>

            <div class="footer">
                <p>Generated ${escapeHtml(metadata.generatedAt)} • Timezone ${escapeHtml(metadata.timezone)}
                    • Replies counted between ${formatNumber(metadata.minResponseSeconds)} s and ${formatNumber(metadata.maxResponseSeconds)} s</p>
                <p>Sentiment requested: ${backendBadge(metadata.sentimentRequested)} • used: ${backendBadge(metadata.sentimentEffective)}
                    ${metadata.skippedEntries > 0 ? ` • ${formatNumber(metadata.skippedEntries)} system entries skipped` : ''}</p>
                ${metadata.degradations.length > 0 ? `
                <ul class="degradations">
                    ${metadata.degradations.map(d => `<li>${escapeHtml(BACKEND_LABELS[d.backend] ?? d.backend)} sentiment unavailable: ${escapeHtml(d.reason)}</li>`).join('')}
                </ul>` : ''}
            </div>
        </div>

        <script>
            function showPage(id, button) {
                document.querySelectorAll('.page').forEach(page => page.classList.remove('active'));
                document.querySelectorAll('.tabs button').forEach(tab => tab.classList.remove('active'));
                document.getElementById(id).classList.add('active');
                button.classList.add('active');
            }
        </script>
    </body>
    </html>`;
}
