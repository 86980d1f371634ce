/**
 * Unified Output System
 *
 * Provides consistent operator-facing output for a release run:
 * - Human mode: Concise, coloured progress lines and a final summary table
 * - Agent mode: Structured JSON for machine parsing (default)
 *
 * Auto-detects TTY to choose mode, but can be overridden with --human
 * or RELEASE_TRAIN_OUTPUT=human|agent.
 */

import chalk from "chalk";
import { NON_FAILING_OUTCOMES, type PackageOutcome, type PackageResult } from "./types.js";

export type OutputMode = "human" | "agent";

/**
 * Structured event for agent-mode JSON output
 */
export interface OutputEvent {
	type:
		| "info"
		| "error"
		| "warning"
		| "progress"
		| "status"
		| "debug"
		| "package_start"
		| "package_result"
		| "summary";
	message: string;
	timestamp: string;
	data?: Record<string, unknown>;
}

/**
 * Output configuration
 */
interface OutputConfig {
	mode: OutputMode;
	verbose: boolean;
}

// Global configuration - can be set once at startup
const globalConfig: OutputConfig = {
	mode: detectMode(),
	verbose: false,
};

/**
 * Auto-detect output mode based on environment
 * - TTY (interactive terminal) → human mode
 * - Non-TTY (piped, CI) → agent mode (JSON)
 */
function detectMode(): OutputMode {
	if (process.env.RELEASE_TRAIN_OUTPUT === "human") return "human";
	if (process.env.RELEASE_TRAIN_OUTPUT === "agent") return "agent";

	if (process.argv.includes("--human")) return "human";

	return process.stdout.isTTY ? "human" : "agent";
}

/**
 * Configure the output system
 */
export function configureOutput(config: Partial<OutputConfig>): void {
	if (config.mode !== undefined) {
		globalConfig.mode = config.mode;
	}
	if (config.verbose !== undefined) {
		globalConfig.verbose = config.verbose;
	}
}

/**
 * Output a structured event (JSON in agent mode, formatted in human mode)
 */
function outputEvent(event: OutputEvent): void {
	if (globalConfig.mode === "agent") {
		console.log(JSON.stringify(event));
	} else {
		const prefix = getHumanPrefix(event.type);
		if (event.data && globalConfig.verbose) {
			console.log(`${prefix} ${event.message}`, event.data);
		} else {
			console.log(`${prefix} ${event.message}`);
		}
	}
}

/**
 * Get human-readable prefix for event types
 */
function getHumanPrefix(type: OutputEvent["type"]): string {
	switch (type) {
		case "error":
			return chalk.red("✗");
		case "warning":
			return chalk.yellow("⚠");
		case "progress":
			return chalk.cyan("  →");
		case "package_start":
			return chalk.cyan("▶");
		case "debug":
			return chalk.dim("·");
		default:
			return chalk.dim("•");
	}
}

/**
 * Create timestamp for events
 */
function now(): string {
	return new Date().toISOString();
}

// =============================================================================
// Public API - Semantic output functions
// =============================================================================

/**
 * Output an error message
 */
export function error(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "error", message, timestamp: now(), data });
}

/**
 * Output a warning message
 */
export function warning(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "warning", message, timestamp: now(), data });
}

/**
 * Output a step inside the current package
 */
export function progress(message: string, data?: Record<string, unknown>): void {
	outputEvent({ type: "progress", message, timestamp: now(), data });
}

/**
 * Output debug information (only in verbose mode)
 */
export function debug(message: string, data?: Record<string, unknown>): void {
	if (globalConfig.verbose) {
		outputEvent({ type: "debug", message, timestamp: now(), data });
	}
}

// =============================================================================
// Release events
// =============================================================================

function isFailing(outcome: PackageOutcome): boolean {
	return !NON_FAILING_OUTCOMES.includes(outcome);
}

function colourOutcome(outcome: PackageOutcome): string {
	if (outcome === "success" || outcome === "dryRunOk") return chalk.green(outcome);
	if (outcome === "skipped") return chalk.dim(outcome);
	if (outcome === "unprocessed") return chalk.yellow(outcome);
	return chalk.red(outcome);
}

/**
 * Announce that a package's pipeline is starting
 */
export function packageStart(pkg: string, index: number, total: number): void {
	if (globalConfig.mode === "human") {
		console.log();
	}
	outputEvent({
		type: "package_start",
		message: `Processing ${pkg}...`,
		timestamp: now(),
		data: { pkg, index, total },
	});
}

/**
 * Per-package status line once its pipeline ends
 */
export function packageResult(result: PackageResult): void {
	if (globalConfig.mode === "human") {
		const prefix = isFailing(result.outcome) ? chalk.red("✗") : chalk.green("✓");
		const detail = result.detail ? chalk.dim(` ${result.detail}`) : "";
		console.log(`${prefix} ${result.pkg}: ${colourOutcome(result.outcome)}${detail}`);
	} else {
		outputEvent({
			type: "package_result",
			message: `${result.pkg}: ${result.outcome}`,
			timestamp: now(),
			data: { ...result },
		});
	}
}

/**
 * Render the summary table as plain text lines (no colour)
 */
export function formatSummaryTable(results: readonly PackageResult[]): string[] {
	const headers = ["Package", "Outcome", "Detail"];
	const rows = results.map((r) => [r.pkg, r.outcome, r.detail]);
	const pkgWidth = Math.max(headers[0].length, ...rows.map((r) => r[0].length));
	const outcomeWidth = Math.max(headers[1].length, ...rows.map((r) => r[1].length));

	const line = (cells: string[]): string =>
		`${cells[0].padEnd(pkgWidth)}  ${cells[1].padEnd(outcomeWidth)}  ${cells[2]}`.trimEnd();

	return [line(headers), line(["-".repeat(pkgWidth), "-".repeat(outcomeWidth), "------"]), ...rows.map(line)];
}

/**
 * Final summary mapping every selected package to its terminal outcome
 */
export function summary(results: readonly PackageResult[]): void {
	const failed = results.filter((r) => isFailing(r.outcome)).length;
	if (globalConfig.mode === "human") {
		console.log(chalk.bold("\nRelease summary"));
		for (const row of formatSummaryTable(results)) {
			console.log(`  ${row}`);
		}
		console.log();
	} else {
		outputEvent({
			type: "summary",
			message: failed > 0 ? `${failed} package(s) failed` : "All packages succeeded",
			timestamp: now(),
			data: { results: results.map((r) => ({ ...r })), failed },
		});
	}
}

// =============================================================================
// Human-only formatting helpers
// =============================================================================

/**
 * Print a header/banner (human mode only)
 */
export function header(title: string, subtitle?: string): void {
	if (globalConfig.mode === "human") {
		console.log();
		console.log(chalk.cyan.bold(title));
		if (subtitle) {
			console.log(chalk.dim(`  ${subtitle}`));
		}
		console.log();
	} else {
		outputEvent({
			type: "info",
			message: title,
			timestamp: now(),
			data: subtitle ? { subtitle } : undefined,
		});
	}
}

/**
 * Mode banner such as "[DRY RUN MODE]"
 */
export function banner(text: string): void {
	if (globalConfig.mode === "human") {
		console.log(chalk.yellow.bold(text));
	} else {
		outputEvent({ type: "status", message: text, timestamp: now() });
	}
}
