/**
 * Output module tests
 */

import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import {
	banner,
	configureOutput,
	debug,
	error,
	formatSummaryTable,
	header,
	type OutputEvent,
	packageResult,
	packageStart,
	progress,
	summary,
	warning,
} from "../output.js";
import type { PackageResult } from "../types.js";

const RESULTS: PackageResult[] = [
	{ pkg: "pythontk", outcome: "success", detail: "pushed, merged" },
	{ pkg: "uitk", outcome: "skipped", detail: "" },
];

describe("output", () => {
	let consoleSpy: MockInstance<typeof console.log>;

	function events(): OutputEvent[] {
		return consoleSpy.mock.calls.map(([line]) => JSON.parse(String(line)));
	}

	beforeEach(() => {
		consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
	});

	afterEach(() => {
		consoleSpy.mockRestore();
		// Reset to agent mode (default for testing)
		configureOutput({ mode: "agent", verbose: false });
	});

	describe("agent mode (JSON output)", () => {
		beforeEach(() => {
			configureOutput({ mode: "agent" });
		});

		it("should output one JSON event per call", () => {
			error("Push rejected");
			warning("No packages found under /work");
			progress("Rebasing onto origin/dev");

			expect(events().map((e) => [e.type, e.message])).toEqual([
				["error", "Push rejected"],
				["warning", "No packages found under /work"],
				["progress", "Rebasing onto origin/dev"],
			]);
			expect(events()[0]?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
		});

		it("should carry package events with their data", () => {
			packageStart("uitk", 2, 4);
			packageResult({ pkg: "uitk", outcome: "mergeConflict", detail: "Unexpected merge conflicts: setup.cfg" });

			const [start, result] = events();
			expect(start).toMatchObject({ type: "package_start", message: "Processing uitk...", data: { pkg: "uitk", index: 2, total: 4 } });
			expect(result).toMatchObject({
				type: "package_result",
				message: "uitk: mergeConflict",
				data: { pkg: "uitk", outcome: "mergeConflict", detail: "Unexpected merge conflicts: setup.cfg" },
			});
		});

		it("should summarise every result and count failures", () => {
			summary([...RESULTS, { pkg: "mayatk", outcome: "unprocessed", detail: "Not started: uitk failed" }]);

			expect(events()).toEqual([
				{
					type: "summary",
					message: "1 package(s) failed",
					timestamp: expect.any(String),
					data: {
						results: [...RESULTS, { pkg: "mayatk", outcome: "unprocessed", detail: "Not started: uitk failed" }],
						failed: 1,
					},
				},
			]);
		});

		it("should report success when nothing failed", () => {
			summary(RESULTS);

			expect(events()[0]?.message).toBe("All packages succeeded");
		});

		it("should emit banners and headers as events", () => {
			banner("[DRY RUN MODE]");
			header("Release", "uitk from /work");

			expect(events()).toMatchObject([
				{ type: "status", message: "[DRY RUN MODE]" },
				{ type: "info", message: "Release", data: { subtitle: "uitk from /work" } },
			]);
		});

		it("should only emit debug output when verbose", () => {
			debug("hidden");
			expect(consoleSpy).not.toHaveBeenCalled();

			configureOutput({ verbose: true });
			debug("shown");
			expect(events()).toMatchObject([{ type: "debug", message: "shown" }]);
		});
	});

	describe("human mode", () => {
		beforeEach(() => {
			configureOutput({ mode: "human" });
		});

		it("should print a status line per package", () => {
			packageResult({ pkg: "uitk", outcome: "pushFailed", detail: "Push dev failed: rejected" });

			expect(consoleSpy).toHaveBeenCalledTimes(1);
			expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining("uitk:"));
			expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining("Push dev failed: rejected"));
		});

		it("should print the summary table", () => {
			summary(RESULTS);

			expect(consoleSpy).toHaveBeenCalledWith("  pythontk  success  pushed, merged");
			expect(consoleSpy).toHaveBeenCalledWith("  uitk      skipped");
		});
	});

	describe("formatSummaryTable", () => {
		it("should align columns to the widest value", () => {
			expect(formatSummaryTable(RESULTS)).toEqual([
				"Package   Outcome  Detail",
				"--------  -------  ------",
				"pythontk  success  pushed, merged",
				"uitk      skipped",
			]);
		});

		it("should render only the header for no results", () => {
			expect(formatSummaryTable([])).toEqual(["Package  Outcome  Detail", "-------  -------  ------"]);
		});
	});
});
