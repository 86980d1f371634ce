/**
 * Change Detection
 *
 * Answers "does this package still need anything pushed or merged?".
 * The repository state is read fresh on every call; callers must invoke
 * this immediately before the push decision rather than reuse a result
 * from an earlier stage.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { PYPROJECT_FILE, REQUIREMENTS_FILE } from "./constants.js";
import {
	countCommits,
	countUnpushedCommits,
	detectInProgressOperation,
	diffNames,
	fetch,
	getStatusPorcelain,
	refExists,
} from "./git.js";
import { gitLogger } from "./logger.js";
import { hasConflictMarkers } from "./safety-gate.js";
import type { BranchLayout, Package, RepoState } from "./types.js";

/**
 * What the package still needs, derived from a fresh RepoState
 */
export interface ChangeStatus {
	state: RepoState;
	/** Uncommitted work or local commits not on the remote development branch */
	needsPush: boolean;
	/** Development is ahead of mainline and the run merges */
	needsMerge: boolean;
	/** Development is ahead of mainline only by version-file commits */
	devBumpOnly: boolean;
}

export interface ChangeDetectionOptions {
	merge: boolean;
	strict: boolean;
}

/**
 * Read the repository state now, after refreshing remote-tracking refs
 */
export function readRepoState(pkg: Package, layout: BranchLayout): RepoState {
	const repo = pkg.filesystemPath;
	fetch(repo, layout.remote, []);

	const status = getStatusPorcelain(repo);
	const unmerged = status
		.split("\n")
		.some((line) => line.startsWith("UU") || line.startsWith("AA") || line.startsWith("DU") || line.startsWith("UD"));
	const manifest = join(repo, REQUIREMENTS_FILE);
	const conflictMarkersPresent =
		unmerged || (existsSync(manifest) && hasConflictMarkers(readFileSync(manifest, "utf-8")));

	return {
		hasUncommittedChanges: status.length > 0,
		localAheadCount: countUnpushedCommits(repo, layout.remote, layout.devBranch),
		devAheadOfMainCount: countDevAheadOfMain(repo, layout),
		inProgressOperation: detectInProgressOperation(repo),
		conflictMarkersPresent,
	};
}

/**
 * Commits on development (local branch when present) not on the remote mainline
 */
function countDevAheadOfMain(repo: string, layout: BranchLayout): number {
	const mainRef = `${layout.remote}/${layout.mainBranch}`;
	const devRef = refExists(repo, layout.devBranch) ? layout.devBranch : `${layout.remote}/${layout.devBranch}`;
	if (!refExists(repo, mainRef) || !refExists(repo, devRef)) {
		return 0;
	}
	return countCommits(repo, mainRef, devRef);
}

/**
 * Files whose changes alone mean "automated version bump on dev"
 */
export function versionBumpFiles(pkg: Package): string[] {
	return [PYPROJECT_FILE, `${pkg.name}/__init__.py`];
}

/**
 * True when every file changed on development since mainline is a version file
 */
export function isDevBumpOnly(pkg: Package, layout: BranchLayout): boolean {
	const repo = pkg.filesystemPath;
	const devRef = refExists(repo, layout.devBranch) ? layout.devBranch : `${layout.remote}/${layout.devBranch}`;
	const changed = diffNames(repo, `${layout.remote}/${layout.mainBranch}`, devRef);
	const allowed = new Set(versionBumpFiles(pkg));
	return changed.length > 0 && changed.every((file) => allowed.has(file));
}

/**
 * True if there is anything this package still needs pushed or merged
 */
export function hasPendingChanges(state: RepoState): boolean {
	return state.hasUncommittedChanges || state.localAheadCount > 0 || state.devAheadOfMainCount > 0;
}

/**
 * Decide what the package needs for this run
 */
export function detectChanges(pkg: Package, layout: BranchLayout, options: ChangeDetectionOptions): ChangeStatus {
	const state = readRepoState(pkg, layout);
	const needsPush = state.hasUncommittedChanges || state.localAheadCount > 0;

	let devBumpOnly = false;
	if (options.merge && options.strict && !needsPush && state.devAheadOfMainCount > 0) {
		devBumpOnly = isDevBumpOnly(pkg, layout);
	}

	const status: ChangeStatus = {
		state,
		needsPush,
		needsMerge: options.merge && state.devAheadOfMainCount > 0 && !devBumpOnly,
		devBumpOnly,
	};
	gitLogger.debug({ pkg: pkg.name, ...state, needsPush, needsMerge: status.needsMerge, devBumpOnly }, "Change status");
	return status;
}
