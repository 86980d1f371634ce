/**
 * Repository Safety Gate
 *
 * Decides whether a working copy may be automated. A repository is unsafe
 * when it is not a git working copy, has an interrupted merge/rebase/
 * cherry-pick, or its pin manifest carries unresolved conflict markers
 * (locally, and in strict mode on the remote mainline and development refs).
 *
 * Read-only. An unsafe verdict is never retried.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { REQUIREMENTS_FILE } from "./constants.js";
import { errorMessage } from "./errors.js";
import { detectInProgressOperation, fetch, isGitRepository, showFile } from "./git.js";
import { gitLogger } from "./logger.js";
import type { BranchLayout, InProgressOperation } from "./types.js";

export type SafetyVerdict = { safe: true } | { safe: false; reason: string };

const OPERATION_LABELS: Record<Exclude<InProgressOperation, "none">, string> = {
	merge: "merge",
	rebase: "rebase",
	cherryPick: "cherry-pick",
};

/**
 * True when text contains a line that opens, splits or closes a conflict hunk
 */
export function hasConflictMarkers(content: string): boolean {
	return content.split(/\r?\n/).some((line) => /^(<{7}|={7}|>{7})(\s|$)/.test(line));
}

/**
 * Check a repository before any stage touches it
 *
 * @param strict - also inspect the pin manifest on the remote mainline and development refs
 */
export function checkRepoSafety(repoPath: string, layout: BranchLayout, strict: boolean): SafetyVerdict {
	if (!isGitRepository(repoPath)) {
		return { safe: false, reason: `Not a git repository: ${repoPath}` };
	}

	const operation = detectInProgressOperation(repoPath);
	if (operation !== "none") {
		return {
			safe: false,
			reason: `Interrupted ${OPERATION_LABELS[operation]} in progress; resolve it before releasing`,
		};
	}

	const localManifest = join(repoPath, REQUIREMENTS_FILE);
	if (existsSync(localManifest) && hasConflictMarkers(readFileSync(localManifest, "utf-8"))) {
		return { safe: false, reason: `Conflict markers found in ${REQUIREMENTS_FILE}` };
	}

	if (strict) {
		try {
			fetch(repoPath, layout.remote, []);
		} catch (error) {
			return { safe: false, reason: `Could not fetch ${layout.remote} to verify remote state: ${errorMessage(error)}` };
		}
		for (const branch of [layout.mainBranch, layout.devBranch]) {
			const ref = `${layout.remote}/${branch}`;
			const content = showFile(repoPath, ref, REQUIREMENTS_FILE);
			if (content !== null && hasConflictMarkers(content)) {
				return { safe: false, reason: `Conflict markers found in ${ref}:${REQUIREMENTS_FILE}` };
			}
		}
	}

	gitLogger.debug({ repoPath, strict }, "Repository passed safety gate");
	return { safe: true };
}
