/**
 * Release command handler tests
 *
 * Flag parsing is tested directly; handleRelease runs against a mocked
 * filesystem and fake pipeline collaborators.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

const mockDirs = new Set<string>();

vi.mock("node:os", () => ({
	homedir: vi.fn(() => "/home/user"),
}));

vi.mock("node:fs", () => ({
	existsSync: vi.fn((path: string): boolean => mockDirs.has(path)),
	readFileSync: vi.fn((path: string): string => {
		throw new Error(`ENOENT: no such file or directory, open '${path}'`);
	}),
}));

vi.mock("../output.js", () => ({
	banner: vi.fn(),
	configureOutput: vi.fn(),
	debug: vi.fn(),
	error: vi.fn(),
	header: vi.fn(),
	packageResult: vi.fn(),
	packageStart: vi.fn(),
	progress: vi.fn(),
	summary: vi.fn(),
	warning: vi.fn(),
}));

import {
	handleRelease,
	parseDuration,
	splitPackageNames,
	toConfigOverrides,
	toReleaseOptions,
	toSelection,
} from "../commands/release-handlers.js";
import { clearConfigCache, getDefaultConfig } from "../config.js";
import { ValidationError } from "../errors.js";
import type { ReleaseDependencies } from "../orchestrator.js";
import * as output from "../output.js";

function fakeDeps(overrides: Partial<ReleaseDependencies> = {}): ReleaseDependencies {
	return {
		checkRepoSafety: vi.fn(() => ({ safe: true as const })),
		syncRequirements: vi.fn(() => ({ status: "unchanged" as const })),
		checkVersionAvailable: vi.fn(async () => ({ available: true as const })),
		validateBuild: vi.fn(async () => ({ passed: true, firstDiagnosticLine: "" })),
		detectChanges: vi.fn(() => ({
			state: {
				hasUncommittedChanges: true,
				localAheadCount: 0,
				devAheadOfMainCount: 0,
				inProgressOperation: "none" as const,
				conflictMarkersPresent: false,
			},
			needsPush: true,
			needsMerge: false,
			devBumpOnly: false,
		})),
		pushDevBranch: vi.fn(),
		probeConflicts: vi.fn(() => ({ hasConflicts: false, conflictingFiles: [] })),
		mergeDirect: vi.fn(() => ({ headCommit: "abc1234def", detail: "merged" })),
		mergeViaPullRequest: vi.fn(async () => ({ headCommit: "abc1234def", detail: "merged via #42" })),
		waitForWorkflow: vi.fn(async () => "abc1234def"),
		readDeclaredVersion: vi.fn(() => "1.0.0"),
		...overrides,
	};
}

describe("release-handlers.ts", () => {
	beforeEach(() => {
		mockDirs.clear();
		clearConfigCache();
		vi.clearAllMocks();
	});

	describe("parseDuration", () => {
		it("converts units to milliseconds", () => {
			expect(parseDuration("20", 60_000, "--workflow-timeout")).toBe(1_200_000);
			expect(parseDuration("2.5", 1_000, "--poll-interval")).toBe(2_500);
			expect(parseDuration(undefined, 1_000, "--poll-interval")).toBeUndefined();
		});

		it("rejects zero, negatives and words", () => {
			expect(() => parseDuration("0", 60_000, "--pr-timeout")).toThrow('--pr-timeout must be a positive number, got "0"');
			expect(() => parseDuration("-5", 60_000, "--pr-timeout")).toThrow(ValidationError);
			expect(() => parseDuration("soon", 60_000, "--pr-timeout")).toThrow(ValidationError);
		});
	});

	describe("toSelection", () => {
		it("splits comma separated names", () => {
			expect(splitPackageNames(["uitk,mayatk", " tentacle ", ","])).toEqual(["uitk", "mayatk", "tentacle"]);
			expect(toSelection(["uitk,mayatk"], {}, "/work")).toEqual({ kind: "list", names: ["uitk", "mayatk"] });
		});

		it("defaults to every package", () => {
			expect(toSelection([], {}, "/work")).toEqual({ kind: "all" });
			expect(toSelection([], { all: true }, "/work")).toEqual({ kind: "all" });
		});

		it("selects the current directory", () => {
			expect(toSelection([], { current: true }, "/work/uitk")).toEqual({ kind: "current", cwd: "/work/uitk" });
		});

		it("rejects conflicting selectors", () => {
			expect(() => toSelection(["uitk"], { current: true }, "/work")).toThrow(
				"--current cannot be combined with --all or package names",
			);
			expect(() => toSelection(["uitk"], { all: true }, "/work")).toThrow("--all cannot be combined with package names");
		});
	});

	describe("options", () => {
		it("maps duration flags and the root into config overrides", () => {
			expect(toConfigOverrides({ workflowTimeout: "20", pollInterval: "5", root: "/srv/packages" })).toEqual({
				root: "/srv/packages",
				workflowTimeoutMs: 1_200_000,
				pollIntervalMs: 5_000,
			});
		});

		it("builds release options from flags and config", () => {
			const config = { ...getDefaultConfig(), root: "/work", prTimeoutMs: 120_000 };

			expect(toReleaseOptions({ merge: true, strict: true, pr: true, dryRun: true }, config)).toEqual({
				merge: true,
				strict: true,
				mergeMode: "pullRequest",
				dryRun: true,
				skipBuild: false,
				skipWorkflowWait: false,
				skipRegistryCheck: false,
				workflowTimeoutMs: 900_000,
				prTimeoutMs: 120_000,
				pollIntervalMs: 15_000,
			});
			expect(toReleaseOptions({}, config).mergeMode).toBe("direct");
		});
	});

	describe("handleRelease", () => {
		it("returns 0 when every selected package succeeds", async () => {
			mockDirs.add("/work/uitk");
			const deps = fakeDeps();

			await expect(handleRelease(["uitk"], { root: "/work" }, "/work", deps)).resolves.toBe(0);
			expect(deps.pushDevBranch).toHaveBeenCalledTimes(1);
			expect(output.summary).toHaveBeenCalledWith([{ pkg: "uitk", outcome: "success", detail: "pushed" }]);
		});

		it("returns 1 when a package fails", async () => {
			const deps = fakeDeps({
				checkRepoSafety: vi.fn(() => ({ safe: false as const, reason: "Rebase in progress" })),
			});

			await expect(handleRelease(["uitk"], { root: "/work" }, "/work", deps)).resolves.toBe(1);
		});

		it("prints the mode banners", async () => {
			await handleRelease(["uitk"], { root: "/work", dryRun: true, strict: true }, "/work", fakeDeps());

			expect(output.banner).toHaveBeenCalledWith("[DRY RUN MODE]");
			expect(output.banner).toHaveBeenCalledWith("[STRICT MODE ENABLED]");
		});

		it("warns and succeeds when no package is present", async () => {
			const deps = fakeDeps();

			await expect(handleRelease([], { root: "/work" }, "/work", deps)).resolves.toBe(0);
			expect(output.warning).toHaveBeenCalledWith("No packages found under /work");
			expect(deps.checkRepoSafety).not.toHaveBeenCalled();
		});
	});
});
