import path from "node:path";
import type { WrappedReport } from '../types';
import { analyzeConversation } from '../analysis/wrapped.analyzer';
import { createSentimentScorer } from '../sentiment/scorer.factory';
import type { ClassifierLoader } from '../sentiment/model.scorer';
import { ConfigError, WrappedError, describeError } from '../utils/errors';
import {
    ASCII_LOGO,
    colorize,
    createTable,
    formatBytes,
    formatNumber,
    LoadingSpinner,
    logHeader,
    logInfo,
    logSuccess,
    logWarning,
    showError,
    showUsage
} from './cli.utils';
import { parseArgs, type AppConfig } from './config';
import { loadConversation } from './file-processor';
import { writeReportFiles } from './output';

// ============================================================================
// EXIT CODES
// ============================================================================

export const EXIT_OK = 0;
export const EXIT_INPUT_ERROR = 1;
export const EXIT_CONFIG_ERROR = 2;

export type CLIOptions = {
    env?: NodeJS.ProcessEnv;
    loadClassifier?: ClassifierLoader;
    now?: () => Date;
};

const minutesCell = (value: number | null): string => value === null ? 'n/a' : value.toFixed(1);

function printSummary(report: WrappedReport): void {
    createTable(
        [
            { header: 'Person', width: 24, align: 'left' },
            { header: 'Replies', width: 8, align: 'right' },
            { header: 'Avg min', width: 8, align: 'right' },
            { header: 'Median', width: 8, align: 'right' },
            { header: 'P90', width: 8, align: 'right' },
            { header: 'Sentiment', width: 10, align: 'right' }
        ],
        report.people.map(entry => [
            entry.person,
            formatNumber(entry.response.count),
            minutesCell(entry.response.avgMinutes),
            minutesCell(entry.response.medianMinutes),
            minutesCell(entry.response.p90Minutes),
            entry.sentiment.status === 'computed' ? entry.sentiment.meanPolarity.toFixed(2) : 'n/a'
        ])
    );
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

async function run(config: AppConfig, options: CLIOptions): Promise<void> {
    console.log(ASCII_LOGO);

    // Step 1: Load the export
    logHeader("LOADING CONVERSATION");
    const loadSpinner = new LoadingSpinner(`Reading ${path.basename(config.inputPath)}...`);
    loadSpinner.start();
    const conversation = await loadConversation(config.inputPath).finally(() => loadSpinner.stop());

    logSuccess(`Loaded ${formatNumber(conversation.messages.length)} messages between ${conversation.participants.join(' and ')}`);
    if (conversation.skipped > 0) {
        logInfo(`Skipped ${formatNumber(conversation.skipped)} system entries`);
    }

    // Step 2: Analyse
    logHeader("COMPUTING ANALYSIS");
    const scorer = createSentimentScorer(
        {
            backend: config.sentimentBackend,
            model: config.sentimentModel,
            fallback: config.sentimentFallback
        },
        {
            loadClassifier: options.loadClassifier,
            onDegrade: degradation => logWarning(`Sentiment backend "${degradation.backend}" unavailable: ${degradation.reason}`)
        }
    );

    const analysisSpinner = new LoadingSpinner("Computing response times, sentiment and highlights...");
    analysisSpinner.start();
    const report = await analyzeConversation(conversation, scorer, {
        timezone: config.timezone,
        minResponseSeconds: config.minResponseSeconds,
        maxResponseSeconds: config.maxResponseSeconds,
        generatedAt: options.now?.()
    }).finally(() => analysisSpinner.stop());

    logSuccess(`Analysis complete (sentiment: ${report.metadata.sentimentEffective})`);
    printSummary(report);

    // Step 3: Write outputs
    logHeader("GENERATING OUTPUTS");
    const written = await writeReportFiles(config.outputDir, report, { json: config.writeJson });
    for (const file of written) {
        logSuccess(`Written: ${path.basename(file.path)} (${formatBytes(file.bytes)})`);
    }

    console.log();
    console.log(`${colorize('Output Directory:', 'bright')} ${config.outputDir}`);
    console.log(`${colorize('Open index.html in your browser to explore the report.', 'dim')}`);
}

/**
 * Main CLI execution function. Takes the full argv and resolves to the exit code.
 */
export async function runCLI(argv: string[], options: CLIOptions = {}): Promise<number> {
    let config: AppConfig;
    try {
        const parsed = parseArgs(argv.slice(2), options.env ?? process.env);
        if (parsed.kind === 'help') {
            showUsage();
            return EXIT_OK;
        }
        config = parsed.config;
    } catch (error) {
        if (error instanceof ConfigError) {
            showError(error.message, error.details);
            return EXIT_CONFIG_ERROR;
        }
        throw error;
    }

    try {
        await run(config, options);
        return EXIT_OK;
    } catch (error) {
        if (error instanceof WrappedError) {
            showError(error.message, error.details);
            return EXIT_INPUT_ERROR;
        }
        showError("Unexpected error while creating the report", describeError(error));
        return EXIT_INPUT_ERROR;
    }
}
