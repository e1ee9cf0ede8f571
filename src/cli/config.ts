import path from "node:path";
import { z } from 'zod';
import { SENTIMENT_BACKENDS } from '../types';
import {
    DEFAULT_MAX_RESPONSE_SECONDS,
    DEFAULT_MIN_RESPONSE_SECONDS,
    DEFAULT_TIMEZONE
} from '../utils/constants';
import { isValidTimezone } from '../utils/date.utils';
import { ConfigError } from '../utils/errors';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

const BackendSchema = z.enum(SENTIMENT_BACKENDS, {
    errorMap: () => ({ message: `expected one of ${SENTIMENT_BACKENDS.join(', ')}` })
});

const SecondsSchema = z.coerce.number({ invalid_type_error: 'expected a number of seconds' }).finite();

export const AppConfigSchema = z.object({
    inputPath: z.string().min(1, 'an export file is required'),
    outputDir: z.string().min(1),
    minResponseSeconds: SecondsSchema.min(0, 'must not be negative'),
    maxResponseSeconds: SecondsSchema,
    sentimentBackend: BackendSchema,
    sentimentModel: z.string().min(1).optional(),
    sentimentFallback: z.array(BackendSchema).min(1),
    timezone: z.string().refine(isValidTimezone, value => ({ message: `unknown timezone "${value}"` })),
    writeJson: z.boolean()
}).refine(config => config.minResponseSeconds < config.maxResponseSeconds, {
    message: 'must be greater than --min-response-seconds',
    path: ['maxResponseSeconds']
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type ParsedArgs =
    | { kind: 'help' }
    | { kind: 'run'; config: AppConfig };

const FLAG_NAMES: Record<string, string> = {
    inputPath: 'input',
    outputDir: '--out',
    minResponseSeconds: '--min-response-seconds',
    maxResponseSeconds: '--max-response-seconds',
    sentimentBackend: '--sentiment',
    sentimentModel: '--sentiment-model',
    sentimentFallback: '--sentiment-fallback',
    timezone: '--timezone',
    writeJson: '--json'
};

const VALUE_FLAGS: Record<string, keyof AppConfig> = {
    '--out': 'outputDir',
    '-o': 'outputDir',
    '--min-response-seconds': 'minResponseSeconds',
    '--max-response-seconds': 'maxResponseSeconds',
    '--sentiment': 'sentimentBackend',
    '--sentiment-model': 'sentimentModel',
    '--sentiment-fallback': 'sentimentFallback',
    '--timezone': 'timezone',
    '--tz': 'timezone'
};

/**
 * Default output directory: "wrapped" beside the export file
 */
export function defaultOutputDir(inputPath: string): string {
    return path.join(path.dirname(path.resolve(inputPath)), 'wrapped');
}

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

/**
 * Reads command-line arguments (without the node and script entries) into a
 * validated configuration. Accepts `--flag value` and `--flag=value`.
 */
export function parseArgs(args: readonly string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
    const values = new Map<keyof AppConfig, string>();
    const positionals: string[] = [];
    let writeJson = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            return { kind: 'help' };
        }
        if (arg === '--json') {
            writeJson = true;
            continue;
        }
        if (!arg.startsWith('-') || arg === '-') {
            positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        const key = VALUE_FLAGS[flag];
        if (!key) {
            throw new ConfigError(`Unknown option ${flag}`);
        }
        let value: string | undefined;
        if (eq === -1) {
            value = args[i + 1];
            i++;
        } else {
            value = arg.slice(eq + 1);
        }
        if (value === undefined || value === '') {
            throw new ConfigError(`Option ${flag} needs a value`);
        }
        values.set(key, value);
    }

    if (positionals.length > 1) {
        throw new ConfigError('Only one export file can be analysed at a time', `Got: ${positionals.join(', ')}`);
    }

    const inputPath = positionals[0] ?? '';
    const fallback = values.get('sentimentFallback');
    const raw = {
        inputPath: inputPath ? path.resolve(inputPath) : '',
        outputDir: path.resolve(values.get('outputDir') ?? (inputPath ? defaultOutputDir(inputPath) : '.')),
        minResponseSeconds: values.get('minResponseSeconds') ?? DEFAULT_MIN_RESPONSE_SECONDS,
        maxResponseSeconds: values.get('maxResponseSeconds') ?? DEFAULT_MAX_RESPONSE_SECONDS,
        sentimentBackend: values.get('sentimentBackend') ?? env.DM_WRAPPED_SENTIMENT ?? 'heuristic',
        sentimentModel: values.get('sentimentModel'),
        sentimentFallback: fallback !== undefined
            ? fallback.split(',').map(part => part.trim()).filter(Boolean)
            : ['model-backed', 'heuristic'],
        timezone: values.get('timezone') ?? DEFAULT_TIMEZONE,
        writeJson
    };

    const result = AppConfigSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = String(issue?.path[0] ?? '');
        throw new ConfigError(
            `Invalid ${FLAG_NAMES[field] ?? 'configuration'}: ${issue?.message ?? 'invalid value'}`,
            result.error.issues.length > 1 ? `${result.error.issues.length} problems found` : undefined
        );
    }
    return { kind: 'run', config: result.data };
}
