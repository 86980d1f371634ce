/**
 * Conflict Probe
 *
 * Virtual merge of development into mainline: fetch both, compute the merge
 * base, run `git merge-tree` (no index or working tree changes) and scan its
 * output for conflict markers. Conflicts confined to the auto-resolve
 * allow-list are safe to settle by taking development's version; anything
 * else halts the package.
 */

import { fetch, mergeBase, mergeTree } from "./git.js";
import { gitLogger } from "./logger.js";
import type { BranchLayout, ConflictClassification, ConflictReport } from "./types.js";

/**
 * Files whose conflicts are always settled in favour of development:
 * CI workflow definitions, version/init files and dependency manifests.
 * Shared by the probe and the direct merge.
 */
export const AUTO_RESOLVE_PATTERNS: readonly RegExp[] = [
	/^\.github\/workflows\/[^/]+\.ya?ml$/,
	/(^|\/)__init__\.py$/,
	/^pyproject\.toml$/,
	/^setup\.py$/,
	/^requirements\.txt$/,
];

/** merge-tree entry header, e.g. "  our    100644 1a2b3c... path/to/file" */
const ENTRY_HEADER = /^ {2}(base|our|their)\s+\d{6}\s+([0-9a-f]{7,64})\s+(.+)$/;

/** Conflict opener inside a merge-tree diff hunk, with the hunk's leading +/space */
const CONFLICT_MARKER = /^[+ ]?<{7}(\s|$)/;

type EntryRole = "base" | "our" | "their";

interface MergeTreeSection {
	title: string;
	path: string | null;
	blobs: Partial<Record<EntryRole, string>>;
}

function isEntryRole(value: string | undefined): value is EntryRole {
	return value === "base" || value === "our" || value === "their";
}

/**
 * One side deleted the file while the other changed it. merge-tree prints no
 * markers for this; the surviving blob differing from the base gives it away.
 */
function isModifyDelete(section: MergeTreeSection): boolean {
	const { base, our, their } = section.blobs;
	if (base === undefined) return false;
	if (section.title === "removed in remote") return our !== undefined && our !== base;
	if (section.title === "removed in local") return their !== undefined && their !== base;
	return false;
}

export function isAutoResolvable(filePath: string): boolean {
	const normalized = filePath.replace(/\\/g, "/");
	return AUTO_RESOLVE_PATTERNS.some((pattern) => pattern.test(normalized));
}

/**
 * Extract the conflicting paths from `git merge-tree <base> <ours> <theirs>` output
 *
 * Content conflicts are found by their markers, modify/delete conflicts by
 * the blob ids in "removed in ..." sections.
 */
export function parseMergeTreeConflicts(output: string): string[] {
	const conflicting = new Set<string>();
	let section: MergeTreeSection | null = null;

	const closeSection = (): void => {
		if (section?.path && isModifyDelete(section)) {
			conflicting.add(section.path);
		}
	};

	for (const line of output.split(/\r?\n/)) {
		if (line.length > 0 && !line.startsWith(" ") && !line.startsWith("+") && !line.startsWith("-") && !line.startsWith("@")) {
			// Section title such as "changed in both"; entry headers follow
			closeSection();
			section = { title: line.trim(), path: null, blobs: {} };
			continue;
		}
		const header = ENTRY_HEADER.exec(line);
		if (header && section) {
			const [, role, blob, path] = header;
			if (isEntryRole(role) && blob !== undefined && path !== undefined) {
				section.blobs[role] = blob;
				section.path = path;
			}
			continue;
		}
		if (section?.path && CONFLICT_MARKER.test(line)) {
			conflicting.add(section.path);
		}
	}
	closeSection();

	return [...conflicting].sort();
}

/**
 * Build a ConflictReport from merge-tree output
 */
export function toConflictReport(output: string): ConflictReport {
	const conflictingFiles = parseMergeTreeConflicts(output);
	return { hasConflicts: conflictingFiles.length > 0, conflictingFiles };
}

/**
 * Decide whether a report blocks the merge
 */
export function classifyConflicts(report: ConflictReport): ConflictClassification {
	if (!report.hasConflicts) {
		return "clean";
	}
	return report.conflictingFiles.every(isAutoResolvable) ? "autoResolvable" : "unexpected";
}

/**
 * Files in a report that are not on the allow-list
 */
export function unexpectedConflicts(report: ConflictReport): string[] {
	return report.conflictingFiles.filter((file) => !isAutoResolvable(file));
}

/**
 * Simulate merging development into mainline
 *
 * @param devRef - ref holding development's tip; the remote branch unless the push was skipped
 */
export function probeConflicts(repoPath: string, layout: BranchLayout, devRef?: string): ConflictReport {
	fetch(repoPath, layout.remote, [layout.mainBranch, layout.devBranch]);

	const mainRef = `${layout.remote}/${layout.mainBranch}`;
	const theirs = devRef ?? `${layout.remote}/${layout.devBranch}`;
	const base = mergeBase(repoPath, mainRef, theirs);
	const report = toConflictReport(mergeTree(repoPath, base, mainRef, theirs));

	gitLogger.debug({ repoPath, base, ours: mainRef, theirs, conflicts: report.conflictingFiles }, "Virtual merge done");
	return report;
}
