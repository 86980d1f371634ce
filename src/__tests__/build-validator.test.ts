/**
 * Build Validator Tests
 *
 * Output classification, artifact clearing and the build/check sequence
 * against a fake command runner.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("glob", () => ({
	globSync: vi.fn(() => []),
}));

vi.mock("node:fs", () => ({
	rmSync: vi.fn(),
}));

import { rmSync } from "node:fs";
import { globSync } from "glob";
import { classifyOutput, clearBuildArtifacts, expandArgs, validateBuild } from "../build-validator.js";
import type { CommandResult, CommandRunner, RunCommandOptions } from "../command.js";

const PKG = "/work/pythontk";
const OPTIONS = {
	buildCommand: ["python", "-m", "build"],
	checkCommand: ["python", "-m", "twine", "check", "dist/*"],
	timeoutMs: 60_000,
};

interface RecordedCall {
	command: string;
	args: string[];
	options: RunCommandOptions;
}

/**
 * Fake runner answering calls in order
 */
function fakeRunner(results: Array<Partial<CommandResult>>): { runner: CommandRunner; calls: RecordedCall[] } {
	const calls: RecordedCall[] = [];
	const runner: CommandRunner = async (command, args, options) => {
		calls.push({ command, args, options });
		const result = results[calls.length - 1] ?? {};
		return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...result };
	};
	return { runner, calls };
}

describe("build-validator.ts", () => {
	beforeEach(() => {
		vi.clearAllMocks();
		vi.mocked(globSync).mockReturnValue([]);
	});

	describe("classifyOutput", () => {
		it("passes clean output and artifact check PASSED lines", () => {
			expect(classifyOutput("Successfully built pythontk-2.3.1.tar.gz\nChecking dist/pythontk-2.3.1.tar.gz: PASSED")).toBeNull();
		});

		it("returns the first failing line", () => {
			const output = "running build\nerror: invalid command 'bdist_wheel'\nERROR Backend subprocess exited";
			expect(classifyOutput(output)).toBe("error: invalid command 'bdist_wheel'");
		});

		it("flags a failed artifact check", () => {
			expect(classifyOutput("Checking dist/pythontk-2.3.1.tar.gz: FAILED")).toBe("Checking dist/pythontk-2.3.1.tar.gz: FAILED");
		});

		it("flags a traceback", () => {
			expect(classifyOutput("  \nTraceback (most recent call last):\n  File \"setup.py\"")).toBe(
				"Traceback (most recent call last):",
			);
		});

		it("ignores warnings", () => {
			expect(classifyOutput("warning: no files found matching '*.ui'")).toBeNull();
		});
	});

	describe("clearBuildArtifacts", () => {
		it("removes every matched artifact directory", () => {
			vi.mocked(globSync).mockReturnValueOnce([`${PKG}/dist`, `${PKG}/pythontk.egg-info`]);

			const removed = clearBuildArtifacts(PKG);

			expect(removed).toEqual([`${PKG}/dist`, `${PKG}/pythontk.egg-info`]);
			expect(rmSync).toHaveBeenCalledTimes(2);
			expect(rmSync).toHaveBeenCalledWith(`${PKG}/dist`, { recursive: true, force: true });
		});

		it("never removes a path outside the package", () => {
			vi.mocked(globSync).mockReturnValueOnce(["/work/other/dist"]);
			clearBuildArtifacts(PKG);
			expect(rmSync).not.toHaveBeenCalled();
		});
	});

	describe("expandArgs", () => {
		it("expands glob arguments in sorted order", () => {
			vi.mocked(globSync).mockReturnValueOnce(["dist/pythontk-2.3.1.whl", "dist/pythontk-2.3.1.tar.gz"]);
			expect(expandArgs(["check", "dist/*"], PKG)).toEqual([
				"check",
				"dist/pythontk-2.3.1.tar.gz",
				"dist/pythontk-2.3.1.whl",
			]);
		});

		it("keeps a glob that matches nothing", () => {
			expect(expandArgs(["dist/*"], PKG)).toEqual(["dist/*"]);
		});
	});

	describe("validateBuild", () => {
		it("runs build then check in the package directory", async () => {
			vi.mocked(globSync)
				.mockReturnValueOnce([])
				.mockReturnValueOnce(["dist/pythontk-2.3.1.tar.gz"]);
			const { runner, calls } = fakeRunner([
				{ stdout: "Successfully built pythontk-2.3.1.tar.gz" },
				{ stdout: "Checking dist/pythontk-2.3.1.tar.gz: PASSED" },
			]);

			const outcome = await validateBuild(PKG, { ...OPTIONS, runner });

			expect(outcome).toEqual({ passed: true, firstDiagnosticLine: "" });
			expect(calls.map((c) => [c.command, ...c.args].join(" "))).toEqual([
				"python -m build",
				"python -m twine check dist/pythontk-2.3.1.tar.gz",
			]);
			expect(calls[0].options).toEqual({ cwd: PKG, timeoutMs: 60_000 });
		});

		it("fails on a failure token even when the build exits 0", async () => {
			const { runner, calls } = fakeRunner([{ stdout: "ERROR Missing dependencies:\n\tsetuptools>=61" }]);

			const outcome = await validateBuild(PKG, { ...OPTIONS, runner });

			expect(outcome).toEqual({ passed: false, firstDiagnosticLine: "ERROR Missing dependencies:" });
			expect(calls).toHaveLength(1);
		});

		it("treats a timed-out build as failed", async () => {
			const { runner } = fakeRunner([{ exitCode: null, timedOut: true, stdout: "Successfully built" }]);

			const outcome = await validateBuild(PKG, { ...OPTIONS, runner });

			expect(outcome).toEqual({ passed: false, firstDiagnosticLine: "python -m build timed out after 60s" });
		});

		it("reports the first stderr line of a failing check", async () => {
			const { runner } = fakeRunner([{}, { exitCode: 1, stderr: "InvalidDistribution: Cannot find file (or expand pattern): 'dist/*'\n" }]);

			const outcome = await validateBuild(PKG, { ...OPTIONS, runner });

			expect(outcome).toEqual({
				passed: false,
				firstDiagnosticLine: "InvalidDistribution: Cannot find file (or expand pattern): 'dist/*'",
			});
		});

		it("falls back to the exit code when a failing command prints nothing", async () => {
			const { runner } = fakeRunner([{ exitCode: 2 }]);

			const outcome = await validateBuild(PKG, { ...OPTIONS, runner });

			expect(outcome).toEqual({ passed: false, firstDiagnosticLine: "python -m build exited with code 2" });
		});
	});
});
