import fs from "node:fs";
import path from "node:path";

import JSON5 from "json5";
import { z } from "zod";

import { CONFIG_DIR } from "../utils.js";
import { resolveConfigPath } from "./path.js";

// Freshness gate over the externally written status file
const FreshnessConfigSchema = z.object({
	statusFile: z.string().optional(),
	staleAfterSeconds: z.number().positive().default(180),
	// "enforce": execution is suspended while stale. "advisory": only logged.
	mode: z.enum(["enforce", "advisory"]).default("enforce"),
});

const ConversationConfigSchema = z.object({
	maxRepliesPer24h: z.number().int().positive().default(2),
	cooldownSeconds: z.number().int().min(0).default(2 * 3600),
});

// Search-driven initiation replies (off unless queries are configured)
const InitiationConfigSchema = z.object({
	enabled: z.boolean().default(false),
	maxPerRun: z.number().int().min(0).default(2),
	minFollowers: z.number().int().min(0).default(100),
	maxResults: z.number().int().min(10).max(100).default(10),
	// label -> X search query
	queries: z.record(z.string(), z.string()).default({}),
});

const PlannerConfigSchema = z.object({
	dailyPostCooldownSeconds: z.number().int().positive().default(24 * 3600),
	maxRepliesPerRun: z.number().int().min(0).default(3),
	mentionsMaxResults: z.number().int().min(5).max(100).default(20),
	conversation: ConversationConfigSchema.default({}),
	initiation: InitiationConfigSchema.default({}),
});

const RateLimitConfigSchema = z.object({
	windowSeconds: z.number().int().positive().default(300),
	maxPerWindow: z.number().int().positive().default(5),
});

const EngagerConfigSchema = z.object({
	maxPerRun: z.number().int().positive().default(4),
	cooldownSeconds: z.number().min(0).default(30),
});

const StateConfigSchema = z.object({
	conversationTtlHours: z.number().positive().default(48),
	repliedIdTtlDays: z.number().positive().default(7),
});

const XChannelConfigSchema = z.object({
	enabled: z.boolean().default(true),
	// X_USER_ACCESS_TOKEN env var takes precedence
	bearerToken: z.string().optional(),
	baseUrl: z.string().optional(),
	// Resolved through /2/users/me and cached in state when unset
	userId: z.string().optional(),
});

const MoltbookChannelConfigSchema = z.object({
	enabled: z.boolean().default(true),
	// MOLTBOOK_APP_KEY env var takes precedence
	apiKey: z.string().optional(),
	baseUrl: z.string().optional(),
});

const ChannelsConfigSchema = z.object({
	x: XChannelConfigSchema.default({}),
	moltbook: MoltbookChannelConfigSchema.default({}),
});

// Logging configuration schema
const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

// Main config schema
const HeraldConfigSchema = z.object({
	runtimeDir: z.string().optional(),
	freshness: FreshnessConfigSchema.default({}),
	planner: PlannerConfigSchema.default({}),
	rateLimit: RateLimitConfigSchema.default({}),
	engager: EngagerConfigSchema.default({}),
	state: StateConfigSchema.default({}),
	channels: ChannelsConfigSchema.default({}),
	logging: LoggingConfigSchema.optional(),
});

export type HeraldConfig = z.infer<typeof HeraldConfigSchema>;
export type FreshnessConfig = z.infer<typeof FreshnessConfigSchema>;
export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type EngagerConfig = z.infer<typeof EngagerConfigSchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;
export type XChannelConfig = z.infer<typeof XChannelConfigSchema>;
export type MoltbookChannelConfig = z.infer<typeof MoltbookChannelConfigSchema>;

let cachedConfig: HeraldConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Parse a raw config object, filling every default.
 */
export function parseConfig(raw: unknown): HeraldConfig {
	return HeraldConfigSchema.parse(raw ?? {});
}

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): HeraldConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "EACCES") {
			return parseConfig({});
		}
		throw err;
	}
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}

/**
 * Runtime directory holding state.json, ledger.jsonl and the job queue.
 * HERALD_RUNTIME_DIR wins over the config file.
 */
export function resolveRuntimeDir(config: HeraldConfig): string {
	const fromEnv = process.env.HERALD_RUNTIME_DIR;
	if (fromEnv) {
		return path.resolve(fromEnv);
	}
	if (config.runtimeDir) {
		return path.resolve(config.runtimeDir);
	}
	return path.join(CONFIG_DIR, "runtime");
}

/**
 * Status file written by the external monitor. Defaults to
 * <runtime>/status.json.
 */
export function resolveStatusFile(config: HeraldConfig, runtimeDir: string): string {
	return config.freshness.statusFile
		? path.resolve(config.freshness.statusFile)
		: path.join(runtimeDir, "status.json");
}
