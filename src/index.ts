/**
 * DM Wrapped - Main Entry Point
 *
 * Reads one exported direct-message conversation and writes an offline HTML
 * summary of how fast each person replies and how their messages feel.
 *
 * Usage:
 *  npx tsx src/index.ts path/to/message_1.json [--timezone Europe/Warsaw] [--json]
 */

import { fileURLToPath } from "node:url";
import path from "node:path";
import { runCLI } from './cli';

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Checks if this script is being run directly (not imported as a module)
 */
function isMainModule(): boolean {
    const thisFile = fileURLToPath(import.meta.url);
    return !!process.argv[1] && path.resolve(process.argv[1]) === thisFile;
}

// Run CLI if this is the main module
if (isMainModule()) {
  runCLI(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("❌ Unexpected error:", error);
      process.exitCode = 1;
    });
}

// ============================================================================
// LIBRARY EXPORTS
// ============================================================================

// Re-export everything for library usage
export * from './types';
export * from './parsers';
export * from './analysis';
export * from './sentiment';
export * from './html';
export * from './utils';
export * from './cli';
