/**
 * CLI Utilities for console output
 */

// ============================================================================
// ASCII ART & BRANDING
// ============================================================================

export const ASCII_LOGO = `
╔════════════════════════════════════════════════════════════╗
║                                                            ║
║   ██████╗ ███╗   ███╗    ██╗    ██╗██████╗  █████╗ ██████╗ ║
║   ██╔══██╗████╗ ████║    ██║    ██║██╔══██╗██╔══██╗██╔══██╗║
║   ██║  ██║██╔████╔██║    ██║ █╗ ██║██████╔╝███████║██████╔╝║
║   ██║  ██║██║╚██╔╝██║    ██║███╗██║██╔══██╗██╔══██║██╔═══╝ ║
║   ██████╔╝██║ ╚═╝ ██║    ╚███╔███╔╝██║  ██║██║  ██║██║     ║
║   ╚═════╝ ╚═╝     ╚═╝     ╚══╝╚══╝ ╚═╝  ╚═╝╚═╝  ╚═╝╚═╝     ║
║                                                            ║
║          Reply Times & Mood of a Direct Conversation       ║
║                                                            ║
╚════════════════════════════════════════════════════════════╝
`;

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m'
};

/**
 * Colour is off when NO_COLOR is set or stdout is not a terminal
 */
export function colorsEnabled(): boolean {
    return !process.env.NO_COLOR && process.stdout.isTTY === true;
}

export function colorize(text: string, color: keyof typeof colors): string {
    if (!colorsEnabled()) {
        return text;
    }
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

export function formatBytes(bytes: number): string {
    const sizes = ['Bytes', 'KB', 'MB', 'GB'];
    if (bytes === 0) return '0 Bytes';
    const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(1024)));
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

// ============================================================================
// LOADING INDICATORS
// ============================================================================

export class LoadingSpinner {
    private interval: NodeJS.Timeout | null = null;
    private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
    private currentFrame = 0;
    private message: string;

    constructor(message: string) {
        this.message = message;
    }

    /** No-op unless stdout is a terminal */
    start(): void {
        if (!process.stdout.isTTY || this.interval) {
            return;
        }
        process.stdout.write('\x1b[?25l'); // Hide cursor
        this.interval = setInterval(() => {
            process.stdout.write(`\r${colorize(this.frames[this.currentFrame], 'cyan')} ${this.message}`);
            this.currentFrame = (this.currentFrame + 1) % this.frames.length;
        }, 100);
    }

    stop(): void {
        if (!this.interval) {
            return;
        }
        clearInterval(this.interval);
        this.interval = null;
        process.stdout.write('\r' + ' '.repeat(process.stdout.columns ?? 80) + '\r'); // Clear line
        process.stdout.write('\x1b[?25h'); // Show cursor
    }

    updateMessage(message: string): void {
        this.message = message;
    }
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

function logError(message: string): void {
    console.log(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right' | 'center';
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    const headerRow = columns.map(col => col.header.padEnd(col.width)).join(' │ ');
    const separator = columns.map(col => '─'.repeat(col.width)).join('─┼─');

    console.log(`┌─${separator}─┐`);
    console.log(`│ ${colorize(headerRow, 'bright')} │`);
    console.log(`├─${separator}─┤`);

    data.forEach(row => {
        const formattedRow = columns.map((col, i) => {
            const cell = row[i] ?? '';
            const truncated = cell.length > col.width ? cell.substring(0, col.width - 3) + '...' : cell;

            switch (col.align) {
                case 'right':
                    return truncated.padStart(col.width);
                case 'center':
                    return truncated.padStart(Math.floor((col.width + truncated.length) / 2)).padEnd(col.width);
                default:
                    return truncated.padEnd(col.width);
            }
        }).join(' │ ');

        console.log(`│ ${formattedRow} │`);
    });

    console.log(`└─${separator}─┘`);
}

// ============================================================================
// USAGE HELPER
// ============================================================================

export function showUsage(): void {
    console.log(ASCII_LOGO);

    console.log(`${colorize('USAGE:', 'bright')}`);
    console.log(`  ${colorize('dm-wrapped', 'cyan')} ${colorize('<export.json>', 'yellow')} ${colorize('[options]', 'dim')}`);
    console.log();

    console.log(`${colorize('OPTIONS:', 'bright')}`);
    console.log(`  ${colorize('--out, -o <dir>', 'cyan')}                 Output directory (default: <export dir>/wrapped)`);
    console.log(`  ${colorize('--timezone <iana>', 'cyan')}               Timezone for hours, days and months (default: UTC)`);
    console.log(`  ${colorize('--min-response-seconds <n>', 'cyan')}      Shortest gap counted as a reply (default: 1)`);
    console.log(`  ${colorize('--max-response-seconds <n>', 'cyan')}      Longest gap counted as a reply (default: 43200)`);
    console.log(`  ${colorize('--sentiment <backend>', 'cyan')}           heuristic | model-backed | off (default: heuristic)`);
    console.log(`  ${colorize('--sentiment-model <name>', 'cyan')}        Model used by the model-backed backend`);
    console.log(`  ${colorize('--sentiment-fallback <list>', 'cyan')}     Comma-separated order tried by model-backed`);
    console.log(`  ${colorize('--json', 'cyan')}                          Also write report.json`);
    console.log(`  ${colorize('--help, -h', 'cyan')}                      Show this help message`);
    console.log();

    console.log(`${colorize('ENVIRONMENT:', 'bright')}`);
    console.log(`  ${colorize('DM_WRAPPED_SENTIMENT', 'yellow')}    Default sentiment backend`);
    console.log(`  ${colorize('NO_COLOR', 'yellow')}                Disable coloured output`);
    console.log();

    console.log(`${colorize('EXAMPLES:', 'bright')}`);
    console.log(`  ${colorize('dm-wrapped ./inbox/message_1.json', 'cyan')}`);
    console.log(`  ${colorize('dm-wrapped ./inbox/message_1.json --timezone Europe/Warsaw --json', 'cyan')}`);
    console.log(`  ${colorize('dm-wrapped ./inbox/message_1.json --sentiment model-backed -o ./report', 'cyan')}`);
    console.log();
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export function showError(message: string, details?: string): void {
    console.log();
    logError(message);
    if (details) {
        console.log(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.log();
    console.log(`${colorize('Run with --help to see usage information.', 'dim')}`);
    console.log();
}
