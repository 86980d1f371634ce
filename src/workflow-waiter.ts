/**
 * Workflow Waiter
 *
 * After mainline moves, waits for the publish workflow run on the new
 * mainline commit to finish. Success needs positive evidence: every run on
 * that commit completed with conclusion "success". No run before the
 * deadline is a failure.
 */

import type { CommandRunner } from "./command.js";
import { StageError } from "./errors.js";
import { fetch, revParse } from "./git.js";
import { listWorkflowRuns } from "./github.js";
import { ciLogger } from "./logger.js";
import { type Clock, NETWORK_READ_RETRY, type PollStep, pollUntil, withRetry } from "./polling.js";
import type { BranchLayout, WorkflowRun } from "./types.js";

export interface WorkflowWaitOptions {
	layout: BranchLayout;
	workflow: string;
	timeoutMs: number;
	pollIntervalMs: number;
	/** Mainline commit to wait for; read from the remote mainline when omitted */
	headCommit?: string;
	clock?: Clock;
	runner?: CommandRunner;
	onWait?: (message: string) => void;
}

export type RunVerdict = { state: "pending"; reason: string } | { state: "success" } | { state: "failure"; reason: string };

/**
 * Judge the runs matching one commit
 */
export function judgeRuns(runs: WorkflowRun[], headCommit: string): RunVerdict {
	const matching = runs.filter((run) => run.headCommit === headCommit);
	if (matching.length === 0) {
		return { state: "pending", reason: `no run for ${headCommit.slice(0, 7)} yet` };
	}
	const running = matching.filter((run) => run.status !== "completed");
	if (running.length > 0) {
		return { state: "pending", reason: `${running.length} run(s) ${running[0].status}` };
	}
	const failed = matching.filter((run) => run.conclusion !== "success");
	if (failed.length > 0) {
		const conclusions = [...new Set(failed.map((run) => run.conclusion))].join(", ");
		return { state: "failure", reason: `conclusion ${conclusions}` };
	}
	return { state: "success" };
}

/**
 * Wait for the publish workflow on the mainline tip
 *
 * @returns the commit that was waited on
 * @throws StageError("workflowFailed") on a failed run or when the deadline passes
 */
export async function waitForWorkflow(repoPath: string, options: WorkflowWaitOptions): Promise<string> {
	const { layout, workflow } = options;
	let headCommit = options.headCommit;
	if (!headCommit) {
		fetch(repoPath, layout.remote, [layout.mainBranch]);
		headCommit = revParse(repoPath, `${layout.remote}/${layout.mainBranch}`);
	}
	const sha = headCommit;
	const short = sha.slice(0, 7);
	let lastReason = `no run for ${short} yet`;

	ciLogger.info({ repoPath, workflow, sha, timeoutMs: options.timeoutMs }, "Waiting for workflow");

	const result = await pollUntil<RunVerdict>(
		async (): Promise<PollStep<RunVerdict>> => {
			const runs = await withRetry(() => listWorkflowRuns(repoPath, workflow, layout.mainBranch, options.runner), {
				...NETWORK_READ_RETRY,
				clock: options.clock,
			});
			const verdict = judgeRuns(runs, sha);
			if (verdict.state === "pending") {
				lastReason = verdict.reason;
				return { done: false, note: verdict.reason };
			}
			return { done: true, value: verdict };
		},
		{
			timeoutMs: options.timeoutMs,
			intervalMs: options.pollIntervalMs,
			clock: options.clock,
			onWait: (attempt, note, remainingMs) => {
				ciLogger.debug({ workflow, sha, attempt, note, remainingMs }, "Workflow not finished");
				options.onWait?.(`${workflow} for ${short}: ${note ?? "waiting"}`);
			},
		},
	);

	if (result.status === "timedOut") {
		const minutes = Math.round(options.timeoutMs / 60_000);
		throw new StageError("workflowFailed", `${workflow} did not finish for ${short} within ${minutes}m (${lastReason})`);
	}
	if (result.value.state === "failure") {
		throw new StageError("workflowFailed", `${workflow} failed for ${short}: ${result.value.reason}`);
	}

	ciLogger.info({ workflow, sha, attempts: result.attempts }, "Workflow succeeded");
	return sha;
}
