/**
 * Build Validator
 *
 * Clears previous build output, then runs the external build command and
 * the artifact check command, each under its own deadline. A command passes
 * only if it exited 0, did not time out, and its combined output carries no
 * failure token. Text classification supplements the exit status; it does
 * not replace it.
 *
 * The tools' output format is not a contract; classifyOutput is the only
 * place that knows about it.
 */

import { rmSync } from "node:fs";
import { isAbsolute, relative, resolve } from "node:path";
import { globSync } from "glob";
import { BUILD_ARTIFACT_GLOBS } from "./constants.js";
import { type CommandRunner, formatCommand, runCommand } from "./command.js";
import { buildLogger } from "./logger.js";
import type { BuildOutcome } from "./types.js";

/**
 * Lines that mark a failed build or check
 */
const FAILURE_PATTERNS: RegExp[] = [/\bERROR\b/, /\bFAILED\b/, /^Traceback \(most recent call last\)/, /\berror:/i];

/**
 * Output of the artifact checker when everything passed, e.g. "Checking dist/x.whl: PASSED"
 */
const PASS_LINE = /:\s*PASSED\b/;

export interface BuildValidationOptions {
	buildCommand: string[];
	checkCommand: string[];
	timeoutMs: number;
	runner?: CommandRunner;
}

/**
 * Classify combined tool output
 *
 * @returns the first line matching a failure pattern, or null when none does
 */
export function classifyOutput(output: string): string | null {
	for (const rawLine of output.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (!line || PASS_LINE.test(line)) continue;
		if (FAILURE_PATTERNS.some((pattern) => pattern.test(line))) {
			return line;
		}
	}
	return null;
}

/**
 * Remove dist/, build/ and *.egg-info from a package directory
 */
export function clearBuildArtifacts(packagePath: string): string[] {
	const targets = globSync(BUILD_ARTIFACT_GLOBS, { cwd: packagePath, dot: false, absolute: true });
	for (const target of targets) {
		const rel = relative(packagePath, target);
		if (rel.startsWith("..") || isAbsolute(rel)) continue;
		rmSync(target, { recursive: true, force: true });
	}
	if (targets.length > 0) {
		buildLogger.debug({ packagePath, removed: targets.length }, "Cleared build artifacts");
	}
	return targets;
}

/**
 * Expand glob arguments (e.g. `dist/*`) relative to the package directory.
 * Arguments without glob characters, or that match nothing, pass through unchanged.
 */
export function expandArgs(args: string[], cwd: string): string[] {
	return args.flatMap((arg) => {
		if (!/[*?[]/.test(arg)) return [arg];
		const matches = globSync(arg, { cwd, posix: true }).sort();
		return matches.length > 0 ? matches : [arg];
	});
}

/**
 * Run one command and turn its result into a BuildOutcome
 */
async function runStep(command: string[], cwd: string, timeoutMs: number, runner: CommandRunner): Promise<BuildOutcome> {
	const [program, ...rest] = command;
	if (!program) {
		return { passed: false, firstDiagnosticLine: "Empty command" };
	}
	const args = expandArgs(rest, cwd);
	const display = formatCommand(program, args);
	buildLogger.debug({ cwd, command: display }, "Running build step");

	const result = await runner(program, args, { cwd, timeoutMs });
	if (result.timedOut) {
		return { passed: false, firstDiagnosticLine: `${display} timed out after ${Math.round(timeoutMs / 1000)}s` };
	}

	const diagnostic = classifyOutput(`${result.stdout}\n${result.stderr}`);
	if (result.exitCode !== 0) {
		const firstLine = result.stderr.trim().split(/\r?\n/)[0] ?? "";
		return {
			passed: false,
			firstDiagnosticLine: diagnostic ?? (firstLine || `${display} exited with code ${result.exitCode ?? "null"}`),
		};
	}
	if (diagnostic) {
		return { passed: false, firstDiagnosticLine: diagnostic };
	}
	return { passed: true, firstDiagnosticLine: "" };
}

/**
 * Build and check a package
 */
export async function validateBuild(packagePath: string, options: BuildValidationOptions): Promise<BuildOutcome> {
	const cwd = resolve(packagePath);
	const runner = options.runner ?? runCommand;

	clearBuildArtifacts(cwd);

	const build = await runStep(options.buildCommand, cwd, options.timeoutMs, runner);
	if (!build.passed) {
		buildLogger.warn({ cwd, diagnostic: build.firstDiagnosticLine }, "Build failed");
		return build;
	}

	const check = await runStep(options.checkCommand, cwd, options.timeoutMs, runner);
	if (!check.passed) {
		buildLogger.warn({ cwd, diagnostic: check.firstDiagnosticLine }, "Artifact check failed");
		return check;
	}

	buildLogger.info({ cwd }, "Build validation passed");
	return check;
}
