import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type PipelineConfig } from '../types/index.js';
import { getLogger, parseEnvFlag } from './logger.js';
import { definedEntries } from './objects.js';

/**
 * Every key is optional: a layer only carries what it overrides.
 */
export const configOverridesSchema = z
    .object({
        db: z.string().min(1).optional(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).optional(),
        jsonLogs: z.boolean().optional(),
        scan: z
            .object({
                extensions: z.array(z.string().startsWith('.')).optional(),
                excludedFolders: z.array(z.string()).optional(),
                certificateKeywords: z.array(z.string().min(1)).optional(),
            })
            .strict()
            .optional(),
        thresholds: z
            .object({
                acceptConfidence: z.number().min(0).max(100).optional(),
                minTextLength: z.number().int().nonnegative().optional(),
                certificateMinTextLength: z.number().int().nonnegative().optional(),
                ocrRemedyMissingFields: z.number().int().positive().optional(),
                maxPages: z.number().int().positive().optional(),
                certificatePages: z.number().int().positive().optional(),
            })
            .strict()
            .optional(),
        catalog: z
            .object({
                crossrefUrl: z.string().url().optional(),
                openalexUrl: z.string().url().optional(),
                contactEmail: z.string().email().optional(),
                timeoutMs: z.number().int().positive().optional(),
                retries: z.number().int().nonnegative().optional(),
                backoffMs: z.number().int().nonnegative().optional(),
                maxCandidates: z.number().int().positive().optional(),
            })
            .strict()
            .optional(),
        ocr: z
            .object({
                url: z.string().url().optional(),
                key: z.string().optional(),
                timeoutMs: z.number().int().positive().optional(),
                renderScale: z.number().positive().optional(),
            })
            .strict()
            .optional(),
        llm: z
            .object({
                enabled: z.boolean().optional(),
                apiUrl: z.string().url().optional(),
                apiKey: z.string().optional(),
                model: z.string().min(1).optional(),
                maxTokens: z.number().int().positive().optional(),
                maxInputChars: z.number().int().positive().optional(),
                timeoutMs: z.number().int().positive().optional(),
            })
            .strict()
            .optional(),
        proxy: z
            .object({
                enabled: z.boolean().optional(),
                // undici's ProxyAgent only speaks HTTP CONNECT
                type: z.enum(['http', 'https']).optional(),
                host: z.string().min(1).optional(),
                port: z.number().int().min(1).max(65535).optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

/**
 * Invalid configuration, with the offending key paths in the message.
 */
export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigError';
    }
}

/**
 * Validate one configuration layer.
 * @param origin - Where the layer came from, for error messages
 */
export function parseOverrides(input: unknown, origin: string): ConfigOverrides {
    const result = configOverridesSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration in ${origin}`,
            result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
        );
    }
    return result.data;
}

/**
 * Load configuration from scholarscan.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine, defaults are used).
 */
async function loadConfigFile(options: { configPath?: string; searchFrom?: string }): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('scholarscan', {
        searchPlaces: ['scholarscan.config.json', '.scholarscanrc.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = options.configPath
            ? await explorer.load(options.configPath)
            : await explorer.search(options.searchFrom);
    } catch (error) {
        throw new ConfigError(
            `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    if (!result || result.isEmpty) return null;

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    const config: unknown = result.config;
    return parseOverrides(config, result.filepath);
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const raw = {
        db: env['SCHOLARSCAN_DB'],
        logLevel: env['SCHOLARSCAN_LOG_LEVEL'],
        jsonLogs: parseEnvFlag(env['SCHOLARSCAN_JSON_LOGS']),
        catalog: { contactEmail: env['SCHOLARSCAN_CONTACT_EMAIL'] },
        ocr: { url: env['SCHOLARSCAN_OCR_URL'], key: env['SCHOLARSCAN_OCR_KEY'] },
        llm: { apiUrl: env['SCHOLARSCAN_LLM_URL'], apiKey: env['SCHOLARSCAN_LLM_KEY'] },
    };
    return parseOverrides(raw, 'environment');
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { configPath?: string; searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PipelineConfig> {
    const fileConfig = (await loadConfigFile(options)) ?? {};
    const envConfig = loadEnvVars(options.env);
    const layers = [fileConfig, envConfig, cliFlags];

    // Deep merge with precedence
    const merged: PipelineConfig = {
        db: DEFAULT_CONFIG.db,
        logLevel: DEFAULT_CONFIG.logLevel,
        jsonLogs: DEFAULT_CONFIG.jsonLogs,
        scan: { ...DEFAULT_CONFIG.scan },
        thresholds: { ...DEFAULT_CONFIG.thresholds },
        catalog: { ...DEFAULT_CONFIG.catalog },
        ocr: { ...DEFAULT_CONFIG.ocr },
        llm: { ...DEFAULT_CONFIG.llm },
        proxy: { ...DEFAULT_CONFIG.proxy },
    };

    for (const layer of layers) {
        merged.db = layer.db ?? merged.db;
        merged.logLevel = layer.logLevel ?? merged.logLevel;
        merged.jsonLogs = layer.jsonLogs ?? merged.jsonLogs;
        merged.scan = { ...merged.scan, ...definedEntries(layer.scan) };
        merged.thresholds = { ...merged.thresholds, ...definedEntries(layer.thresholds) };
        merged.catalog = { ...merged.catalog, ...definedEntries(layer.catalog) };
        merged.ocr = { ...merged.ocr, ...definedEntries(layer.ocr) };
        merged.llm = { ...merged.llm, ...definedEntries(layer.llm) };
        merged.proxy = { ...merged.proxy, ...definedEntries(layer.proxy) };
    }

    return merged;
}
