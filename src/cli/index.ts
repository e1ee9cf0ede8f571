export { runCLI, EXIT_OK, EXIT_INPUT_ERROR, EXIT_CONFIG_ERROR, type CLIOptions } from './main';
export { parseArgs, defaultOutputDir, AppConfigSchema, type AppConfig, type ParsedArgs } from './config';
export { loadConversation } from './file-processor';
export { writeReportFiles, HTML_FILE_NAME, JSON_FILE_NAME, type WrittenFile } from './output';
