/**
 * GitHub CLI Wrapper
 *
 * Pull requests and workflow runs are queried through `gh`, which carries
 * the operator's authentication. Every call runs in the package's working
 * copy so gh resolves the repository from its remote.
 *
 * JSON output is validated with zod; an unexpected shape is a CommandError,
 * never a guess.
 */

import { z } from "zod";
import { type CommandRunner, formatCommand, runCommand } from "./command.js";
import { TIMEOUT_GH_CMD_MS, WORKFLOW_RUN_LIST_LIMIT } from "./constants.js";
import { CommandError } from "./errors.js";
import { ciLogger } from "./logger.js";
import type { PullRequestHandle, PullRequestState, WorkflowRun, WorkflowRunConclusion, WorkflowRunStatus } from "./types.js";

const PullRequestListSchema = z.array(z.object({ number: z.number().int().positive() }));

const PullRequestViewSchema = z.object({
	state: z.string(),
	mergedAt: z.string().nullable().optional(),
});

const WorkflowRunListSchema = z.array(
	z.object({
		status: z.string(),
		conclusion: z.string().nullable().optional(),
		headSha: z.string(),
		createdAt: z.string().optional(),
		displayTitle: z.string().optional(),
	}),
);

/**
 * True for https and ssh GitHub remote URLs
 */
export function isGitHubUrl(url: string): boolean {
	return /^(?:https?:\/\/(?:[^@/]+@)?github\.com\/|git@github\.com:|ssh:\/\/git@github\.com\/)/i.test(url.trim());
}

/**
 * Run gh and return stdout
 *
 * @throws CommandError on a non-zero exit or timeout
 */
export async function runGh(args: string[], cwd: string, runner: CommandRunner = runCommand): Promise<string> {
	const display = formatCommand("gh", args);
	const result = await runner("gh", args, { cwd, timeoutMs: TIMEOUT_GH_CMD_MS });
	if (result.timedOut) {
		throw new CommandError(`${display} timed out`, display);
	}
	if (result.exitCode !== 0) {
		const reason = result.stderr.trim().split(/\r?\n/)[0] || `exited with code ${result.exitCode ?? "null"}`;
		ciLogger.debug({ command: display, exitCode: result.exitCode, stderr: result.stderr }, "gh failed");
		throw new CommandError(reason, display, result.exitCode ?? undefined, result.stderr);
	}
	return result.stdout.trim();
}

function parseJson<T>(schema: z.ZodType<T>, text: string, command: string): T {
	let raw: unknown;
	try {
		raw = JSON.parse(text || "null");
	} catch {
		throw new CommandError(`Unparseable JSON from ${command}`, command, 0, text);
	}
	const parsed = schema.safeParse(raw);
	if (!parsed.success) {
		throw new CommandError(`Unexpected JSON shape from ${command}`, command, 0, text);
	}
	return parsed.data;
}

/**
 * Number of the open pull request from head into base, or null
 */
export async function findOpenPullRequest(
	repoPath: string,
	base: string,
	head: string,
	runner?: CommandRunner,
): Promise<number | null> {
	const args = ["pr", "list", "--base", base, "--head", head, "--state", "open", "--json", "number"];
	const stdout = await runGh(args, repoPath, runner);
	const prs = parseJson(PullRequestListSchema, stdout, formatCommand("gh", args));
	return prs[0]?.number ?? null;
}

/**
 * Extract the pull-request number from the URL gh prints after `pr create`
 */
export function parsePullRequestNumber(output: string): number | null {
	const match = /\/pull\/(\d+)/.exec(output);
	return match ? Number.parseInt(match[1], 10) : null;
}

export interface CreatePullRequestOptions {
	base: string;
	head: string;
	title: string;
	body: string;
}

/**
 * Open a pull request and return its number
 */
export async function createPullRequest(
	repoPath: string,
	options: CreatePullRequestOptions,
	runner?: CommandRunner,
): Promise<number> {
	const args = [
		"pr",
		"create",
		"--base",
		options.base,
		"--head",
		options.head,
		"--title",
		options.title,
		"--body",
		options.body,
	];
	const stdout = await runGh(args, repoPath, runner);
	const number = parsePullRequestNumber(stdout);
	if (number === null) {
		throw new CommandError(`Could not read pull request number from: ${stdout}`, formatCommand("gh", args), 0, stdout);
	}
	ciLogger.info({ repoPath, number }, "Created pull request");
	return number;
}

/**
 * Turn on auto-merge (merge commit). Fails when the repository does not allow it.
 */
export async function enableAutoMerge(repoPath: string, number: number, runner?: CommandRunner): Promise<void> {
	await runGh(["pr", "merge", String(number), "--auto", "--merge"], repoPath, runner);
}

/**
 * Map gh's pull-request state; a merge timestamp wins over the state string
 */
export function toPullRequestState(state: string, mergedAt?: string | null): PullRequestState {
	if (mergedAt || state.toUpperCase() === "MERGED") return "merged";
	if (state.toUpperCase() === "CLOSED") return "closed";
	return "open";
}

/**
 * Current state of a pull request
 */
export async function viewPullRequest(repoPath: string, number: number, runner?: CommandRunner): Promise<PullRequestHandle> {
	const args = ["pr", "view", String(number), "--json", "state,mergedAt"];
	const stdout = await runGh(args, repoPath, runner);
	const view = parseJson(PullRequestViewSchema, stdout, formatCommand("gh", args));
	return { number, state: toPullRequestState(view.state, view.mergedAt) };
}

export function toRunStatus(status: string): WorkflowRunStatus {
	switch (status) {
		case "completed":
			return "completed";
		case "in_progress":
			return "in_progress";
		default:
			// queued, requested, waiting, pending
			return "queued";
	}
}

export function toRunConclusion(conclusion: string | null | undefined): WorkflowRunConclusion {
	switch (conclusion) {
		case "success":
			return "success";
		case "failure":
		case "timed_out":
		case "startup_failure":
			return "failure";
		case undefined:
		case null:
		case "":
			return "none";
		default:
			// cancelled, skipped, neutral, action_required, stale
			return "other";
	}
}

/**
 * Recent runs of a workflow on a branch, newest first
 */
export async function listWorkflowRuns(
	repoPath: string,
	workflow: string,
	branch: string,
	runner?: CommandRunner,
): Promise<WorkflowRun[]> {
	const args = [
		"run",
		"list",
		"--workflow",
		workflow,
		"--branch",
		branch,
		"--limit",
		String(WORKFLOW_RUN_LIST_LIMIT),
		"--json",
		"status,conclusion,headSha,createdAt,displayTitle",
	];
	const stdout = await runGh(args, repoPath, runner);
	return parseJson(WorkflowRunListSchema, stdout, formatCommand("gh", args)).map((run) => ({
		headCommit: run.headSha,
		status: toRunStatus(run.status),
		conclusion: toRunConclusion(run.conclusion),
		createdAt: run.createdAt,
		displayTitle: run.displayTitle,
	}));
}
