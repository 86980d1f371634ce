/**
 * Publisher
 *
 * Push: put the development branch on the remote, rebasing onto the remote
 * tip first when someone (usually a CI bot bumping the version) pushed in
 * between. A failed rebase is aborted and reported; it is never resolved
 * automatically.
 *
 * Merge: promote development to mainline either directly (local merge with
 * conflicts settled only for allow-listed files) or through a pull request
 * with auto-merge, waited on under a deadline.
 *
 * With `dryRun` set, each operation performs its read-only checks and
 * returns before the first mutating command.
 */

import type { CommandRunner } from "./command.js";
import { AUTO_COMMIT_MESSAGE } from "./constants.js";
import { isAutoResolvable } from "./conflict-probe.js";
import { errorMessage, GitError, StageError } from "./errors.js";
import {
	abortMerge,
	checkoutBranch,
	commitAll,
	commitMerge,
	countCommits,
	fetch,
	getConflictFiles,
	getCurrentBranch,
	getRemoteUrl,
	isWorkingTreeClean,
	mergeNoCommit,
	pullFastForward,
	push,
	rebase,
	refExists,
	revParse,
	takeTheirs,
	tryGit,
} from "./git.js";
import { createPullRequest, enableAutoMerge, findOpenPullRequest, isGitHubUrl, viewPullRequest } from "./github.js";
import { gitLogger } from "./logger.js";
import { type Clock, NETWORK_READ_RETRY, pollUntil, withRetry } from "./polling.js";
import type { BranchLayout, Package, PullRequestState } from "./types.js";

/**
 * Receives operator-facing step messages ("Rebasing onto origin/dev")
 */
export type StepReporter = (message: string) => void;

const silent: StepReporter = () => {};

export interface PushOptions {
	layout: BranchLayout;
	dryRun: boolean;
	report?: StepReporter;
}

export interface MergeResult {
	/** Mainline commit after the merge; null in a dry run */
	headCommit: string | null;
	detail: string;
}

/**
 * Run a mutating git step, turning git failures into the given outcome
 */
function stage<T>(outcome: "pushFailed" | "mergeFailed", action: string, fn: () => T): T {
	try {
		return fn();
	} catch (error) {
		if (error instanceof GitError) {
			throw new StageError(outcome, `${action} failed: ${error.message}`);
		}
		throw error;
	}
}

/**
 * Push the development branch, rebasing onto the remote tip when behind
 */
export function pushDevBranch(pkg: Package, options: PushOptions): void {
	const repo = pkg.filesystemPath;
	const { remote, devBranch } = options.layout;
	const report = options.report ?? silent;
	const remoteDev = `${remote}/${devBranch}`;

	if (options.dryRun) {
		report(`Would push ${devBranch} to ${remote}`);
		return;
	}

	stage("pushFailed", `Checkout ${devBranch}`, () => {
		if (getCurrentBranch(repo) !== devBranch) {
			checkoutBranch(repo, devBranch);
		}
	});

	if (!isWorkingTreeClean(repo)) {
		report("Staging uncommitted changes");
		stage("pushFailed", "Commit", () => commitAll(repo, AUTO_COMMIT_MESSAGE));
	}

	stage("pushFailed", `Fetch ${remoteDev}`, () => fetch(repo, remote, [devBranch]));

	if (refExists(repo, remoteDev) && countCommits(repo, devBranch, remoteDev) > 0) {
		report(`Rebasing onto ${remoteDev}`);
		if (!rebase(repo, remoteDev)) {
			throw new StageError("pushFailed", `Rebase onto ${remoteDev} failed; resolve manually`);
		}
	}

	report(`Pushing ${devBranch} branch`);
	stage("pushFailed", `Push ${devBranch}`, () => push(repo, remote, devBranch));
	gitLogger.info({ repo, branch: devBranch }, "Pushed development branch");
}

/**
 * Run a step of an in-progress merge, aborting the merge when it throws
 */
function withinMerge<T>(repo: string, fn: () => T): T {
	try {
		return fn();
	} catch (error) {
		abortMerge(repo);
		throw error;
	}
}

/**
 * Return the working copy to the development branch after a merge attempt
 */
function returnToDev(repo: string, devBranch: string): void {
	const attempt = tryGit(["checkout", devBranch], repo);
	if (!attempt.ok) {
		gitLogger.warn({ repo, branch: devBranch, error: attempt.error.message }, "Could not switch back to development");
	}
}

export interface DirectMergeOptions {
	layout: BranchLayout;
	dryRun: boolean;
	report?: StepReporter;
}

/**
 * Merge development into mainline locally and push mainline
 *
 * Conflicts in allow-listed files take development's version; any other
 * conflict aborts the merge with `mergeConflict`.
 */
export function mergeDirect(pkg: Package, options: DirectMergeOptions): MergeResult {
	const repo = pkg.filesystemPath;
	const { remote, devBranch, mainBranch } = options.layout;
	const report = options.report ?? silent;

	if (options.dryRun) {
		report(`Would merge ${devBranch} into ${mainBranch}`);
		return { headCommit: null, detail: `would merge ${devBranch} into ${mainBranch}` };
	}

	try {
		report(`Merging ${devBranch} into ${mainBranch}`);
		stage("mergeFailed", `Checkout ${mainBranch}`, () => checkoutBranch(repo, mainBranch));
		stage("mergeFailed", `Pull ${remote}/${mainBranch}`, () => pullFastForward(repo, remote, mainBranch));

		let resolved: string[] = [];
		if (!mergeNoCommit(repo, devBranch)) {
			const conflicts = getConflictFiles(repo);
			if (conflicts.length === 0) {
				abortMerge(repo);
				throw new StageError("mergeFailed", `Merge of ${devBranch} into ${mainBranch} failed`);
			}
			const unexpected = conflicts.filter((file) => !isAutoResolvable(file));
			if (unexpected.length > 0) {
				abortMerge(repo);
				throw new StageError("mergeConflict", `Unexpected merge conflicts: ${unexpected.join(", ")}`);
			}
			stage("mergeFailed", "Conflict resolution", () =>
				withinMerge(repo, () => {
					for (const file of conflicts) {
						takeTheirs(repo, file);
					}
				}),
			);
			resolved = conflicts;
			report(`Auto-resolved ${conflicts.join(", ")} in favour of ${devBranch}`);
		}

		if (refExists(repo, "MERGE_HEAD")) {
			stage("mergeFailed", "Merge commit", () =>
				withinMerge(repo, () => commitMerge(repo, `Merge ${devBranch} into ${mainBranch}`)),
			);
		}

		report(`Pushing ${mainBranch} branch`);
		stage("mergeFailed", `Push ${mainBranch}`, () => push(repo, remote, mainBranch));

		const headCommit = revParse(repo, mainBranch);
		gitLogger.info({ repo, headCommit, resolved }, "Merged development into mainline");
		return {
			headCommit,
			detail: resolved.length > 0 ? `merged (auto-resolved ${resolved.length} file(s))` : "merged",
		};
	} finally {
		returnToDev(repo, devBranch);
	}
}

export interface PullRequestMergeOptions {
	layout: BranchLayout;
	dryRun: boolean;
	timeoutMs: number;
	pollIntervalMs: number;
	report?: StepReporter;
	clock?: Clock;
	runner?: CommandRunner;
}

/**
 * Merge development into mainline through a pull request with auto-merge
 *
 * Reuses an open pull request from development into mainline when one exists.
 */
export async function mergeViaPullRequest(pkg: Package, options: PullRequestMergeOptions): Promise<MergeResult> {
	const repo = pkg.filesystemPath;
	const { remote, devBranch, mainBranch } = options.layout;
	const report = options.report ?? silent;

	const url = getRemoteUrl(repo, remote);
	if (!url || !isGitHubUrl(url)) {
		throw new StageError("mergeFailed", `${remote === "origin" ? "Origin" : remote} remote is not a GitHub URL; cannot use PR mode`);
	}

	const ghFailure = (action: string) => (error: unknown) => {
		throw new StageError("mergeFailed", `${action}: ${errorMessage(error)}`);
	};

	const existing = await findOpenPullRequest(repo, mainBranch, devBranch, options.runner).catch(
		ghFailure("Could not list pull requests"),
	);

	if (options.dryRun) {
		const what = existing ? `reuse pull request #${existing}` : "open a pull request";
		report(`Would ${what} from ${devBranch} into ${mainBranch}`);
		return { headCommit: null, detail: `would ${what}` };
	}

	let number = existing;
	if (number) {
		report(`Reusing pull request #${number}`);
	} else {
		const version = pkg.declaredVersion ? ` ${pkg.declaredVersion}` : "";
		number = await createPullRequest(
			repo,
			{
				base: mainBranch,
				head: devBranch,
				title: `Release ${pkg.name}${version}`,
				body: `Merge ${devBranch} into ${mainBranch} for the ${pkg.name}${version} release.`,
			},
			options.runner,
		).catch(ghFailure("Could not create pull request"));
		report(`Opened pull request #${number}`);
	}

	const prNumber = number;
	await enableAutoMerge(repo, prNumber, options.runner).catch(ghFailure(`Could not enable auto-merge on #${prNumber}`));

	const result = await pollUntil<PullRequestState>(
		async () => {
			const pr = await withRetry(() => viewPullRequest(repo, prNumber, options.runner), {
				...NETWORK_READ_RETRY,
				clock: options.clock,
			});
			return pr.state === "open" ? { done: false, note: "open" } : { done: true, value: pr.state };
		},
		{
			timeoutMs: options.timeoutMs,
			intervalMs: options.pollIntervalMs,
			clock: options.clock,
			onWait: (attempt) => {
				if (attempt === 1) report(`Waiting for pull request #${prNumber} to merge`);
			},
		},
	).catch(ghFailure(`Could not read pull request #${prNumber}`));

	if (result.status === "timedOut") {
		throw new StageError(
			"mergeFailed",
			`Pull request #${prNumber} not merged within ${Math.round(options.timeoutMs / 60_000)}m`,
		);
	}
	if (result.value === "closed") {
		throw new StageError("mergeFailed", `Pull request #${prNumber} was closed without merging`);
	}

	stage("mergeFailed", `Fetch ${remote}/${mainBranch}`, () => fetch(repo, remote, [mainBranch]));
	const headCommit = revParse(repo, `${remote}/${mainBranch}`);
	gitLogger.info({ repo, number: prNumber, headCommit }, "Pull request merged");
	return { headCommit, detail: `merged via #${prNumber}` };
}
