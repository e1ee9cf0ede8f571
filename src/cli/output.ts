import path from "node:path";
import type { WrappedReport } from '../types';
import { generateHTMLReport } from '../html/html-generator';
import { serializeReport } from '../analysis/report.aggregator';
import { writeTextFile } from '../utils/file.utils';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

export const HTML_FILE_NAME = 'index.html';
export const JSON_FILE_NAME = 'report.json';

export type WrittenFile = { path: string; bytes: number };

/**
 * Writes index.html (and report.json when asked) into the output directory
 */
export async function writeReportFiles(
    outputDir: string,
    report: WrappedReport,
    options: { json?: boolean } = {}
): Promise<WrittenFile[]> {
    const written: WrittenFile[] = [];

    const htmlPath = path.join(outputDir, HTML_FILE_NAME);
    written.push({ path: htmlPath, bytes: await writeTextFile(htmlPath, generateHTMLReport(report)) });

    if (options.json) {
        const jsonPath = path.join(outputDir, JSON_FILE_NAME);
        written.push({ path: jsonPath, bytes: await writeTextFile(jsonPath, serializeReport(report)) });
    }
    return written;
}
