/**
 * File Utilities
 */

import fs from "node:fs/promises";
import path from "node:path";
import { InputError } from './errors';

// ============================================================================
// READING & WRITING
// ============================================================================

/**
 * Reads a UTF-8 text file, reporting a missing file or a directory as an input error
 */
export async function readTextFile(filePath: string): Promise<string> {
    const stats = await fs.stat(filePath).catch(() => null);
    if (!stats) {
        throw new InputError("Input file does not exist", `Path: ${filePath}`);
    }
    if (!stats.isFile()) {
        throw new InputError("Input must be an exported conversation file", `Path: ${filePath}`);
    }
    return fs.readFile(filePath, "utf8");
}

/**
 * Writes a UTF-8 text file, creating parent directories. Returns its size in bytes.
 */
export async function writeTextFile(filePath: string, content: string): Promise<number> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf8");
    return Buffer.byteLength(content, "utf8");
}
