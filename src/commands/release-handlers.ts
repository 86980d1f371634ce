/**
 * Release command handlers
 *
 * Turns CLI flags into a resolved configuration, a package selection and
 * ReleaseOptions, then runs the orchestrator.
 */

import { resolve } from "node:path";
import { getConfigSource, mergeWithConfig, type ReleaseTrainRc, type ResolvedConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import { enableVerboseLogging } from "../logger.js";
import { type ReleaseDependencies, runRelease } from "../orchestrator.js";
import * as output from "../output.js";
import { assertValidChain, type PackageSelection, selectPackages } from "../packages.js";
import type { ReleaseOptions } from "../types.js";

export interface ReleaseFlags {
	all?: boolean;
	current?: boolean;
	merge?: boolean;
	strict?: boolean;
	pr?: boolean;
	dryRun?: boolean;
	skipBuild?: boolean;
	skipWorkflowWait?: boolean;
	skipRegistryCheck?: boolean;
	workflowTimeout?: string;
	prTimeout?: string;
	pollInterval?: string;
	root?: string;
	human?: boolean;
	verbose?: boolean;
}

/**
 * Parse a positive number of units (minutes, seconds) into milliseconds
 *
 * @throws ValidationError for anything that is not a positive number
 */
export function parseDuration(value: string | undefined, unitMs: number, flag: string): number | undefined {
	if (value === undefined) return undefined;
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new ValidationError(`${flag} must be a positive number, got "${value}"`, flag);
	}
	return Math.round(parsed * unitMs);
}

/**
 * Explicit package names, accepting both `a b` and `a,b`
 */
export function splitPackageNames(args: string[]): string[] {
	return args
		.flatMap((arg) => arg.split(","))
		.map((name) => name.trim())
		.filter(Boolean);
}

/**
 * Decide which packages a run targets
 */
export function toSelection(args: string[], flags: Pick<ReleaseFlags, "all" | "current">, cwd: string): PackageSelection {
	const names = splitPackageNames(args);
	if (flags.current && (flags.all || names.length > 0)) {
		throw new ValidationError("--current cannot be combined with --all or package names", "current");
	}
	if (flags.all && names.length > 0) {
		throw new ValidationError("--all cannot be combined with package names", "all");
	}
	if (flags.current) {
		return { kind: "current", cwd };
	}
	if (names.length > 0) {
		return { kind: "list", names };
	}
	return { kind: "all" };
}

/**
 * CLI values that override the rc file
 */
export function toConfigOverrides(flags: ReleaseFlags): ReleaseTrainRc {
	const overrides: ReleaseTrainRc = {};
	const workflowTimeoutMs = parseDuration(flags.workflowTimeout, 60_000, "--workflow-timeout");
	const prTimeoutMs = parseDuration(flags.prTimeout, 60_000, "--pr-timeout");
	const pollIntervalMs = parseDuration(flags.pollInterval, 1_000, "--poll-interval");
	if (flags.root) overrides.root = resolve(flags.root);
	if (workflowTimeoutMs !== undefined) overrides.workflowTimeoutMs = workflowTimeoutMs;
	if (prTimeoutMs !== undefined) overrides.prTimeoutMs = prTimeoutMs;
	if (pollIntervalMs !== undefined) overrides.pollIntervalMs = pollIntervalMs;
	return overrides;
}

/**
 * Build ReleaseOptions from flags and the resolved configuration
 */
export function toReleaseOptions(flags: ReleaseFlags, config: ResolvedConfig): ReleaseOptions {
	return {
		merge: flags.merge ?? false,
		strict: flags.strict ?? false,
		mergeMode: flags.pr ? "pullRequest" : "direct",
		dryRun: flags.dryRun ?? false,
		skipBuild: flags.skipBuild ?? false,
		skipWorkflowWait: flags.skipWorkflowWait ?? false,
		skipRegistryCheck: flags.skipRegistryCheck ?? false,
		workflowTimeoutMs: config.workflowTimeoutMs,
		prTimeoutMs: config.prTimeoutMs,
		pollIntervalMs: config.pollIntervalMs,
	};
}

/**
 * Handle the release command
 *
 * @returns the process exit code
 */
export async function handleRelease(
	args: string[],
	flags: ReleaseFlags,
	cwd: string = process.cwd(),
	deps?: ReleaseDependencies,
): Promise<number> {
	if (flags.human) {
		output.configureOutput({ mode: "human" });
	}
	if (flags.verbose) {
		output.configureOutput({ verbose: true });
		enableVerboseLogging();
	}

	const overrides = toConfigOverrides(flags);
	const root = overrides.root ?? cwd;
	const config = mergeWithConfig(overrides, root);
	assertValidChain(config.packages);

	const selected = selectPackages(config.root, config.packages, toSelection(args, flags, cwd));
	if (selected.length === 0) {
		output.warning(`No packages found under ${config.root}`);
		return 0;
	}

	const options = toReleaseOptions(flags, config);
	if (options.dryRun) output.banner("[DRY RUN MODE]");
	if (options.strict) output.banner("[STRICT MODE ENABLED]");
	output.header("Release", `${selected.map((p) => p.name).join(", ")} from ${config.root}`);
	const source = getConfigSource();
	if (source) output.debug(`Config loaded from ${source}`);

	const report = await runRelease(selected, config, options, deps);
	return report.exitCode;
}
