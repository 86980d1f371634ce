/**
 * Configuration File Support
 *
 * Loads configuration from .releasetrainrc (JSON format) to provide
 * defaults for the release run: branch names, timeouts, external commands
 * and the package table.
 *
 * Configuration is loaded from (in order of precedence, highest first):
 * 1. CLI flags (always override)
 * 2. .releasetrainrc in the release root
 * 3. .releasetrainrc in home directory
 * 4. Built-in defaults
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import {
	DEFAULT_POLL_INTERVAL_MS,
	DEFAULT_PR_TIMEOUT_MS,
	DEFAULT_SKIP_CI_MARKER,
	DEFAULT_WORKFLOW_TIMEOUT_MS,
	MIN_POLL_INTERVAL_MS,
	RC_FILE_NAME,
	TIMEOUT_BUILD_STEP_MS,
} from "./constants.js";
import { configLogger } from "./logger.js";

/**
 * Schema for one entry of the package table
 */
export const PackageDefinitionSchema = z.object({
	name: z.string().regex(/^[\w.-]+$/, "Package name may only contain letters, digits, '.', '_' and '-'"),
	strict: z.boolean().default(true),
	registryName: z.string().min(1).optional(),
	dependsOn: z.array(z.string()).default([]),
});

const commandSchema = z.array(z.string().min(1)).min(1, "Command must have at least one element");

/**
 * Schema for .releasetrainrc. Every key is optional; unknown keys are ignored.
 */
export const ReleaseTrainRcSchema = z
	.object({
		root: z.string().min(1),
		remote: z.string().min(1),
		devBranch: z.string().min(1),
		mainBranch: z.string().min(1),
		workflow: z.string().min(1),
		workflowTimeoutMs: z.number().int().positive(),
		prTimeoutMs: z.number().int().positive(),
		pollIntervalMs: z.number().int().min(MIN_POLL_INTERVAL_MS),
		buildTimeoutMs: z.number().int().positive(),
		registryUrl: z.string().url(),
		buildCommand: commandSchema,
		checkCommand: commandSchema,
		skipCiMarker: z.string(),
		packages: z.array(PackageDefinitionSchema).min(1),
	})
	.partial();

export type ReleaseTrainRc = z.infer<typeof ReleaseTrainRcSchema>;

export type ResolvedConfig = Required<ReleaseTrainRc>;

/**
 * Built-in package table: the canonical release chain, leaves first
 */
const DEFAULT_PACKAGES: ResolvedConfig["packages"] = [
	{ name: "pythontk", strict: true, dependsOn: [] },
	{ name: "uitk", strict: true, dependsOn: ["pythontk"] },
	{ name: "mayatk", strict: true, dependsOn: ["pythontk", "uitk"] },
	{ name: "tentacle", strict: true, registryName: "tentacletk", dependsOn: ["pythontk", "uitk", "mayatk"] },
];

/**
 * Default configuration values
 */
const DEFAULT_CONFIG: Omit<ResolvedConfig, "root"> = {
	remote: "origin",
	devBranch: "dev",
	mainBranch: "main",
	workflow: "publish.yml",
	workflowTimeoutMs: DEFAULT_WORKFLOW_TIMEOUT_MS,
	prTimeoutMs: DEFAULT_PR_TIMEOUT_MS,
	pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
	buildTimeoutMs: TIMEOUT_BUILD_STEP_MS,
	registryUrl: "https://pypi.org/pypi",
	buildCommand: ["python", "-m", "build"],
	checkCommand: ["python", "-m", "twine", "check", "dist/*"],
	skipCiMarker: DEFAULT_SKIP_CI_MARKER,
	packages: DEFAULT_PACKAGES,
};

/**
 * Cached configuration to avoid repeated file reads
 */
let cachedConfig: ReleaseTrainRc | null = null;
let cachedFor: string | null = null;
let configLoadedFrom: string | null = null;

/**
 * Validate a parsed config object.
 *
 * Invalid keys are reported and dropped; the remaining keys are kept.
 */
export function validateConfig(raw: unknown, filePath: string): ReleaseTrainRc | null {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		configLogger.warn({ filePath }, "Config is not an object, ignoring");
		return null;
	}

	const first = ReleaseTrainRcSchema.safeParse(raw);
	if (first.success) {
		return first.data;
	}

	const badKeys = new Set<string>();
	for (const issue of first.error.issues) {
		const key = String(issue.path[0] ?? "");
		badKeys.add(key);
		configLogger.warn({ filePath, key, problem: issue.message }, "Invalid config value, ignoring");
	}

	const cleaned = Object.fromEntries(Object.entries(raw).filter(([key]) => !badKeys.has(key)));
	const second = ReleaseTrainRcSchema.safeParse(cleaned);
	return second.success ? second.data : null;
}

/**
 * Try to read and parse a config file
 */
function tryReadConfig(filePath: string): ReleaseTrainRc | null {
	try {
		if (!fs.existsSync(filePath)) {
			return null;
		}
		const content = fs.readFileSync(filePath, "utf-8");
		return validateConfig(JSON.parse(content), filePath);
	} catch (error) {
		if (error instanceof SyntaxError) {
			configLogger.warn({ filePath, error: error.message }, "Invalid JSON in config file");
			return null;
		}
		throw error;
	}
}

/**
 * Load configuration from .releasetrainrc files
 *
 * Searches the home directory, then `searchDir` (the release root).
 * Returns merged config with defaults.
 */
export function loadConfig(searchDir: string = process.cwd(), forceReload = false): ResolvedConfig {
	if (!cachedConfig || forceReload || cachedFor !== searchDir) {
		let config: ReleaseTrainRc = {};
		configLoadedFrom = null;

		const homeConfigPath = path.join(os.homedir(), RC_FILE_NAME);
		const homeConfig = tryReadConfig(homeConfigPath);
		if (homeConfig) {
			config = { ...config, ...homeConfig };
			configLoadedFrom = homeConfigPath;
		}

		const localConfigPath = path.join(searchDir, RC_FILE_NAME);
		const localConfig = tryReadConfig(localConfigPath);
		if (localConfig) {
			config = { ...config, ...localConfig };
			configLoadedFrom = localConfigPath;
		}

		cachedConfig = config;
		cachedFor = searchDir;
	}

	return { ...DEFAULT_CONFIG, root: searchDir, ...cachedConfig };
}

/**
 * Get the path where config was loaded from (for debugging)
 */
export function getConfigSource(): string | null {
	return configLoadedFrom;
}

/**
 * Merge CLI options with config file values
 *
 * Options left undefined by the CLI fall through to the config file, then
 * to the defaults.
 */
export function mergeWithConfig(overrides: ReleaseTrainRc, searchDir?: string): ResolvedConfig {
	const config = loadConfig(searchDir);
	return {
		root: overrides.root ?? config.root,
		remote: overrides.remote ?? config.remote,
		devBranch: overrides.devBranch ?? config.devBranch,
		mainBranch: overrides.mainBranch ?? config.mainBranch,
		workflow: overrides.workflow ?? config.workflow,
		workflowTimeoutMs: overrides.workflowTimeoutMs ?? config.workflowTimeoutMs,
		prTimeoutMs: overrides.prTimeoutMs ?? config.prTimeoutMs,
		pollIntervalMs: overrides.pollIntervalMs ?? config.pollIntervalMs,
		buildTimeoutMs: overrides.buildTimeoutMs ?? config.buildTimeoutMs,
		registryUrl: overrides.registryUrl ?? config.registryUrl,
		buildCommand: overrides.buildCommand ?? config.buildCommand,
		checkCommand: overrides.checkCommand ?? config.checkCommand,
		skipCiMarker: overrides.skipCiMarker ?? config.skipCiMarker,
		packages: overrides.packages ?? config.packages,
	};
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
	cachedConfig = null;
	cachedFor = null;
	configLoadedFrom = null;
}

/**
 * Get default config values (for documentation)
 */
export function getDefaultConfig(): Omit<ResolvedConfig, "root"> {
	return { ...DEFAULT_CONFIG, packages: DEFAULT_PACKAGES.map((p) => ({ ...p, dependsOn: [...p.dependsOn] })) };
}
