/**
 * Git Operations Module
 *
 * Thin wrappers over the git CLI used by every pipeline stage.
 * Every function takes the repository path explicitly; nothing here reads
 * or changes the process working directory.
 *
 * Commands run through execFileSync (no shell), so arguments are never
 * interpreted by a shell.
 */

import { execFileSync } from "node:child_process";
import { existsSync } from "node:fs";
import { isAbsolute, normalize, resolve } from "node:path";
import { GIT_MAX_BUFFER_BYTES, TIMEOUT_GIT_CMD_MS, TIMEOUT_GIT_NETWORK_MS } from "./constants.js";
import { GitError } from "./errors.js";
import { gitLogger } from "./logger.js";
import type { InProgressOperation } from "./types.js";

/**
 * Validate a directory path before executing commands in it
 *
 * Security: Rejects paths starting with '-' to prevent command-line
 * option injection (e.g., --upload-pack attacks in git commands).
 */
export function validateCwd(cwd: string): string {
	if (cwd.startsWith("-")) {
		throw new Error(`Invalid cwd: cannot start with dash: ${cwd}`);
	}
	const normalized = normalize(cwd);
	if (!isAbsolute(normalized)) {
		throw new Error(`Invalid cwd: must be absolute path, got ${cwd}`);
	}
	return normalized;
}

/**
 * Validate a git ref name (branch, remote, remote/branch) to prevent injection
 */
export function validateGitRef(ref: string): string {
	if (ref.startsWith("-")) {
		throw new Error(`Invalid git ref: cannot start with dash: ${ref}`);
	}
	// Only allow: word chars, dots, slashes, hyphens
	if (!/^[\w./-]+$/.test(ref)) {
		throw new Error(`Invalid git ref: ${ref}`);
	}
	return ref;
}

/**
 * Pull the exit status and stderr out of an execFileSync failure
 */
function describeExecFailure(error: unknown): { exitCode?: number; stderr: string; stdout: string } {
	if (typeof error !== "object" || error === null) {
		return { stderr: String(error), stdout: "" };
	}
	const exitCode = "status" in error && typeof error.status === "number" ? error.status : undefined;
	const readStream = (key: "stderr" | "stdout"): string => {
		const value: unknown = key in error ? Reflect.get(error, key) : undefined;
		if (typeof value === "string") return value;
		if (Buffer.isBuffer(value)) return value.toString("utf-8");
		return "";
	};
	const stderr = readStream("stderr") || (error instanceof Error ? error.message : "");
	return { exitCode, stderr, stdout: readStream("stdout") };
}

/**
 * Execute a git command in a repository and return trimmed stdout
 *
 * @throws GitError when git exits non-zero or times out
 */
export function execGit(args: string[], cwd: string, timeoutMs: number = TIMEOUT_GIT_CMD_MS): string {
	const validatedCwd = validateCwd(cwd);
	const command = `git ${args.join(" ")}`;
	try {
		const result = execFileSync("git", args, {
			cwd: validatedCwd,
			encoding: "utf-8",
			stdio: ["pipe", "pipe", "pipe"],
			timeout: timeoutMs,
			maxBuffer: GIT_MAX_BUFFER_BYTES,
		});
		return result.trim();
	} catch (error) {
		const { exitCode, stderr } = describeExecFailure(error);
		gitLogger.debug({ command, cwd: validatedCwd, exitCode }, "Git command failed");
		throw new GitError(stderr.trim() || "Git command failed", command, exitCode);
	}
}

/**
 * Result of a git command that is allowed to fail
 */
export type GitAttempt = { ok: true; stdout: string } | { ok: false; error: GitError };

/**
 * Execute a git command, returning failure as a value instead of throwing
 */
export function tryGit(args: string[], cwd: string, timeoutMs?: number): GitAttempt {
	try {
		return { ok: true, stdout: execGit(args, cwd, timeoutMs) };
	} catch (error) {
		if (error instanceof GitError) {
			return { ok: false, error };
		}
		throw error;
	}
}

/**
 * Check that a directory is inside a git working copy
 */
export function isGitRepository(repoPath: string): boolean {
	if (!existsSync(repoPath)) {
		return false;
	}
	const attempt = tryGit(["rev-parse", "--is-inside-work-tree"], repoPath);
	return attempt.ok && attempt.stdout === "true";
}

/**
 * Get the current branch name
 */
export function getCurrentBranch(repoPath: string): string {
	return execGit(["rev-parse", "--abbrev-ref", "HEAD"], repoPath);
}

/**
 * Resolve a ref to its commit hash
 */
export function revParse(repoPath: string, ref: string): string {
	return execGit(["rev-parse", validateGitRef(ref)], repoPath);
}

/**
 * Check if a ref (local branch, remote branch, pseudo-ref) resolves
 */
export function refExists(repoPath: string, ref: string): boolean {
	return tryGit(["rev-parse", "--verify", "--quiet", validateGitRef(ref)], repoPath).ok;
}

/**
 * Detect an interrupted merge, rebase or cherry-pick
 */
export function detectInProgressOperation(repoPath: string): InProgressOperation {
	if (refExists(repoPath, "MERGE_HEAD")) {
		return "merge";
	}
	if (refExists(repoPath, "REBASE_HEAD") || rebaseDirectoryExists(repoPath)) {
		return "rebase";
	}
	if (refExists(repoPath, "CHERRY_PICK_HEAD")) {
		return "cherryPick";
	}
	return "none";
}

function rebaseDirectoryExists(repoPath: string): boolean {
	for (const marker of ["rebase-merge", "rebase-apply"]) {
		const attempt = tryGit(["rev-parse", "--git-path", marker], repoPath);
		if (attempt.ok && existsSync(resolve(repoPath, attempt.stdout))) {
			return true;
		}
	}
	return false;
}

/**
 * Get the working tree status in porcelain format (empty when clean)
 */
export function getStatusPorcelain(repoPath: string): string {
	return execGit(["status", "--porcelain"], repoPath);
}

/**
 * Get the current git status (clean or dirty)
 */
export function isWorkingTreeClean(repoPath: string): boolean {
	return getStatusPorcelain(repoPath) === "";
}

/**
 * Fetch branches from a remote
 */
export function fetch(repoPath: string, remote: string, branches: string[]): void {
	execGit(["fetch", validateGitRef(remote), ...branches.map(validateGitRef)], repoPath, TIMEOUT_GIT_NETWORK_MS);
}

/**
 * Count commits in `to` that are not in `from`
 */
export function countCommits(repoPath: string, from: string, to: string): number {
	const output = execGit(["rev-list", "--count", `${validateGitRef(from)}..${validateGitRef(to)}`], repoPath);
	const count = Number.parseInt(output, 10);
	return Number.isNaN(count) ? 0 : count;
}

/**
 * Count commits on a local branch not yet on its upstream.
 *
 * Falls back to `<remote>/<branch>` when no upstream is configured. A branch
 * with no remote counterpart at all counts every commit as unpushed.
 */
export function countUnpushedCommits(repoPath: string, remote: string, branch: string): number {
	const local = validateGitRef(branch);
	if (!refExists(repoPath, local)) {
		return 0;
	}
	const upstream = tryGit(["rev-list", "--count", `${local}@{u}..${local}`], repoPath);
	if (upstream.ok) {
		return Number.parseInt(upstream.stdout, 10) || 0;
	}
	const remoteRef = `${remote}/${local}`;
	if (refExists(repoPath, remoteRef)) {
		return countCommits(repoPath, remoteRef, local);
	}
	const all = tryGit(["rev-list", "--count", local], repoPath);
	return all.ok ? Number.parseInt(all.stdout, 10) || 0 : 0;
}

/**
 * Compute the merge base of two refs
 */
export function mergeBase(repoPath: string, a: string, b: string): string {
	return execGit(["merge-base", validateGitRef(a), validateGitRef(b)], repoPath);
}

/**
 * Three-way merge simulation that never touches the index or working tree
 *
 * @returns raw merge-tree output; conflicts show up as marker lines
 */
export function mergeTree(repoPath: string, base: string, ours: string, theirs: string): string {
	return execGit(["merge-tree", base, validateGitRef(ours), validateGitRef(theirs)], repoPath);
}

/**
 * List files changed between two refs (three-dot: since their merge base)
 */
export function diffNames(repoPath: string, from: string, to: string): string[] {
	const output = execGit(["diff", "--name-only", `${validateGitRef(from)}...${validateGitRef(to)}`], repoPath);
	return output
		.split("\n")
		.map((f) => f.trim())
		.filter(Boolean);
}

/**
 * Read a file as it exists at a ref; null when the ref or the path is missing
 */
export function showFile(repoPath: string, ref: string, filePath: string): string | null {
	const attempt = tryGit(["show", `${validateGitRef(ref)}:${filePath}`], repoPath);
	return attempt.ok ? attempt.stdout : null;
}

/**
 * Switch to a branch
 */
export function checkoutBranch(repoPath: string, branch: string): void {
	execGit(["checkout", validateGitRef(branch)], repoPath);
}

/**
 * Stage everything and commit
 */
export function commitAll(repoPath: string, message: string): void {
	execGit(["add", "-A"], repoPath);
	execGit(["commit", "-m", message], repoPath);
}

/**
 * Stage specific files and commit them
 */
export function commitFiles(repoPath: string, files: string[], message: string): void {
	execGit(["add", "--", ...files], repoPath);
	execGit(["commit", "-m", message], repoPath);
}

/**
 * Rebase the current branch onto a ref, aborting on failure
 *
 * @returns true when the rebase completed
 */
export function rebase(repoPath: string, onto: string): boolean {
	const attempt = tryGit(["rebase", validateGitRef(onto)], repoPath, TIMEOUT_GIT_NETWORK_MS);
	if (attempt.ok) {
		return true;
	}
	gitLogger.warn({ repoPath, onto, error: attempt.error.message }, "Rebase failed, aborting");
	const abort = tryGit(["rebase", "--abort"], repoPath);
	if (!abort.ok) {
		gitLogger.debug({ repoPath, error: abort.error.message }, "Rebase abort reported an error");
	}
	return false;
}

/**
 * Fast-forward the current branch to the remote branch
 */
export function pullFastForward(repoPath: string, remote: string, branch: string): void {
	execGit(["pull", "--ff-only", validateGitRef(remote), validateGitRef(branch)], repoPath, TIMEOUT_GIT_NETWORK_MS);
}

/**
 * Push a branch to a remote
 */
export function push(repoPath: string, remote: string, branch: string): void {
	execGit(["push", validateGitRef(remote), validateGitRef(branch)], repoPath, TIMEOUT_GIT_NETWORK_MS);
}

/**
 * Start a non-fast-forward merge without committing
 *
 * @returns true when the merge applied without conflicts
 */
export function mergeNoCommit(repoPath: string, branch: string): boolean {
	return tryGit(["merge", "--no-ff", "--no-commit", validateGitRef(branch)], repoPath).ok;
}

/**
 * Get list of files with merge conflicts
 */
export function getConflictFiles(repoPath: string): string[] {
	const attempt = tryGit(["diff", "--name-only", "--diff-filter=U"], repoPath);
	if (!attempt.ok || !attempt.stdout) {
		return [];
	}
	return attempt.stdout.split("\n").filter((f) => f.trim().length > 0);
}

/**
 * Check whether the incoming side of a conflict still has the file
 * (index stage 3); it is missing when the incoming branch deleted it
 */
function hasTheirVersion(repoPath: string, filePath: string): boolean {
	const entries = execGit(["ls-files", "--unmerged", "--", filePath], repoPath);
	return entries.split("\n").some((line) => /^\d{6} [0-9a-f]+ 3\t/.test(line));
}

/**
 * Resolve a conflicted file by taking the incoming branch's version,
 * removing the file when the incoming branch deleted it
 */
export function takeTheirs(repoPath: string, filePath: string): void {
	if (!hasTheirVersion(repoPath, filePath)) {
		execGit(["rm", "--quiet", "--", filePath], repoPath);
		return;
	}
	execGit(["checkout", "--theirs", "--", filePath], repoPath);
	execGit(["add", "--", filePath], repoPath);
}

/**
 * Conclude a merge whose conflicts have been resolved
 */
export function commitMerge(repoPath: string, message: string): void {
	execGit(["commit", "--no-edit", "-m", message], repoPath);
}

/**
 * Abort an in-progress merge
 */
export function abortMerge(repoPath: string): void {
	const attempt = tryGit(["merge", "--abort"], repoPath);
	if (!attempt.ok) {
		gitLogger.debug({ repoPath, error: attempt.error.message }, "Merge abort reported an error");
	}
}

/**
 * Get the URL configured for a remote, or null
 */
export function getRemoteUrl(repoPath: string, remote: string): string | null {
	const attempt = tryGit(["remote", "get-url", validateGitRef(remote)], repoPath);
	return attempt.ok && attempt.stdout ? attempt.stdout : null;
}
