import path from "node:path";
import type { Conversation } from '../types';
import { parseMessengerExport } from '../parsers/messenger.parser';
import { readTextFile } from '../utils/file.utils';

// ============================================================================
// FILE PROCESSING
// ============================================================================

/**
 * Reads and parses a single exported conversation. The file name (without
 * extension) is the title when the export carries none.
 */
export async function loadConversation(filePath: string): Promise<Conversation> {
    const content = await readTextFile(filePath);
    const fileName = path.basename(filePath, path.extname(filePath));
    return parseMessengerExport(content, fileName);
}
