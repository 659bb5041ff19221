import { z } from "zod";
import { ConfigError } from "./errors.js";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "disaster"]);

export const DatabaseConfigSchema = z.object({
    host: z.string().default("localhost"),
    port: z.coerce.number().int().positive().default(5432),
    user: z.string().default("postgres"),
    password: z.string().default(""),
    database: z.string().default("postgres"),
});

export const ReactorConfigSchema = z.object({
    waitCeilingMs: z.number().int().positive().default(60_000),
    shortenedWaitMs: z.number().int().positive().default(3_000),
});

export const ReclamationConfigSchema = z.object({
    reclaimIdleMs: z.number().int().positive().default(60_000),
    reclaimGrowthBytes: z.number().int().nonnegative().default(8 * 1024 * 1024),
    reclaimGrowthRatio: z.number().nonnegative().default(0.2),
    reclaimMinBytes: z.number().int().nonnegative().default(128 * 1024),
});

export const FetcherConfigSchema = z.object({
    defaultBatchSize: z.number().int().positive().default(1024),
    minBatchSize: z.number().int().positive().default(128),
    maxBatchSize: z.number().int().positive().default(32_768),
    roundBudgetMs: z.number().int().positive().default(30_000),
    maxGrowthFactor: z.number().positive().default(3),
    maxGrowthStep: z.number().int().nonnegative().default(2000),
    absorbRatio: z.number().min(1).default(1.25),
    simpleThreshold: z.number().int().nonnegative().default(1000),
    rangeThreshold: z.number().int().nonnegative().default(2000),
    bucketCount: z.number().int().positive().default(1800),
});

export const CoreConfigSchema = z.object({
    database: DatabaseConfigSchema.default({}),
    reactor: ReactorConfigSchema.default({}),
    reclamation: ReclamationConfigSchema.default({}),
    fetcher: FetcherConfigSchema.default({}),
    gaugeIntervalMs: z.number().int().positive().default(60_000),
    statusPort: z.coerce.number().int().min(0).max(65_535).optional(),
    logLevel: LogLevelSchema.default("info"),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type ReactorConfig = z.infer<typeof ReactorConfigSchema>;
export type ReclamationConfig = z.infer<typeof ReclamationConfigSchema>;
export type FetcherConfig = z.infer<typeof FetcherConfigSchema>;
export type CoreConfig = z.infer<typeof CoreConfigSchema>;
export type CoreConfigInput = z.input<typeof CoreConfigSchema>;

export function parseConfig(input: CoreConfigInput = {}): CoreConfig {
    const result = CoreConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
    }
    return result.data;
}

/**
 * Builds the configuration from environment variables. Unset variables fall
 * back to the schema defaults; tuning knobs that have no variable keep
 * their defaults too.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoreConfig {
    const database: Record<string, string> = {};
    const pairs: Array<[string, string]> = [
        ["PGHOST", "host"],
        ["PGPORT", "port"],
        ["PGUSER", "user"],
        ["PGPASSWORD", "password"],
        ["PGDATABASE", "database"],
    ];
    for (const [variable, key] of pairs) {
        const value = env[variable];
        if (value !== undefined && value !== "") {
            database[key] = value;
        }
    }

    const input: Record<string, unknown> = { database };
    if (env['STATUS_PORT']) input['statusPort'] = env['STATUS_PORT'];
    if (env['LOG_LEVEL']) input['logLevel'] = env['LOG_LEVEL'];
    if (env['GAUGE_INTERVAL_MS']) input['gaugeIntervalMs'] = Number(env['GAUGE_INTERVAL_MS']);

    const result = CoreConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
    }
    return result.data;
}
