import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../utils/Errors";

const DecorationRuleSchema = z.object({
    name: z.string().min(1),
    pattern: z.string().min(1).refine(isValidRegex, { message: "not a valid regular expression" }),
    modifiesTempo: z.boolean(),
    tempoRatio: z.number().positive().optional(),
});

const ResolverSettingsSchema = z.object({
    /** Absolute half-width of the duration tolerance band. */
    toleranceSeconds: z.number().nonnegative().default(15),
    /** Relative half-width of the band; the larger of the two applies. */
    toleranceFraction: z.number().nonnegative().default(0.1),
    /** live/original ratio assumed for modified titles without a rule-specific one. */
    assumedTempoRatio: z.number().positive().default(1.3),
    minTitleSimilarity: z.number().min(0).max(1).default(0.8),
    approximateArtistSimilarity: z.number().min(0).max(1).default(0.8),
});

const CacheSettingsSchema = z.object({
    bucketSeconds: z.number().positive().default(5),
});

const ScalerSettingsSchema = z.object({
    minConfidentFactor: z.number().positive().default(0.3),
    maxConfidentFactor: z.number().positive().default(3.0),
});

const AlignmentSettingsSchema = z.object({
    suppressLowConfidence: z.boolean().default(false),
    serviceRetrySeconds: z.number().nonnegative().default(30),
    ignoredTitles: z.array(z.string()).default(["youtube music", "youtube", ""]),
});

const cacheRoot = path.join(os.homedir(), ".cache", "stretch-lyrics");

export const AppConfigSchema = z.object({
    /** MPRIS players to follow, in priority order. */
    players: z.array(z.string().min(1)).default(["spotify", "edge", "chromium", "chrome", "firefox"]),
    tickIntervalMs: z.number().int().min(50).default(250),
    cacheDir: z.string().min(1).default(path.join(cacheRoot, "lyrics")),
    logFile: z.string().min(1).default(path.join(cacheRoot, "debug.log")),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    lyricsApiBase: z.string().url().default("https://lrclib.net/api"),
    requestTimeoutMs: z.number().int().positive().default(5000),
    resolver: ResolverSettingsSchema.default({}),
    cache: CacheSettingsSchema.default({}),
    scaler: ScalerSettingsSchema.default({}),
    alignment: AlignmentSettingsSchema.default({}),
    /** Appended after the built-in decoration rules. */
    extraDecorationRules: z.array(DecorationRuleSchema).default([]),
}).refine(cfg => cfg.scaler.minConfidentFactor < cfg.scaler.maxConfidentFactor, {
    message: "scaler.minConfidentFactor must be below scaler.maxConfidentFactor",
    path: ["scaler"],
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ResolverSettings = z.infer<typeof ResolverSettingsSchema>;
export type ScalerSettings = z.infer<typeof ScalerSettingsSchema>;
export type AlignmentSettings = z.infer<typeof AlignmentSettingsSchema>;

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".config", "stretch-lyrics", "config.json");

export interface LoadConfigOptions {
    /** Explicit file; must exist. Without it the default path is read if present. */
    configPath?: string;
    /** Applied on top of the file, e.g. from CLI flags. */
    overrides?: Record<string, unknown>;
}

/**
 * Defaults <- config file <- overrides, validated as a whole.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
    const fromFile = await readConfigFile(options.configPath);
    return parseConfig(mergeDeep(fromFile, options.overrides ?? {}));
}

export function parseConfig(input: unknown): AppConfig {
    const result = AppConfigSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, result.error.issues);
    }
    return result.data;
}

async function readConfigFile(configPath: string | undefined): Promise<Record<string, unknown>> {
    const file = configPath ?? DEFAULT_CONFIG_PATH;
    let raw: string;
    try {
        raw = await readFile(file, "utf8");
    } catch (error) {
        if (!configPath && isMissingFile(error)) return {};
        throw new ConfigError(`Cannot read config file ${file}`, error);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Config file ${file} is not valid JSON`, error);
    }
    if (!isPlainObject(parsed)) {
        throw new ConfigError(`Config file ${file} must contain a JSON object`);
    }
    return parsed;
}

function mergeDeep(base: Record<string, unknown>, extra: Record<string, unknown>): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(extra)) {
        if (value === undefined) continue;
        const existing = merged[key];
        merged[key] = isPlainObject(existing) && isPlainObject(value) ? mergeDeep(existing, value) : value;
    }
    return merged;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isValidRegex(source: string): boolean {
    try {
        new RegExp(source, "gi");
        return true;
    } catch {
        return false;
    }
}
