/**
 * Git Module Tests
 *
 * Tests for the git CLI wrappers: argument construction, error mapping,
 * ahead/behind counting and interrupted-operation detection.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

// Mock child_process module
vi.mock("node:child_process", () => ({
	execFileSync: vi.fn(),
	spawn: vi.fn(),
}));

// Import after mocking
import { execFileSync } from "node:child_process";
import { GitError } from "../errors.js";
import {
	countUnpushedCommits,
	detectInProgressOperation,
	diffNames,
	execGit,
	getConflictFiles,
	getCurrentBranch,
	getRemoteUrl,
	mergeNoCommit,
	mergeTree,
	rebase,
	showFile,
	takeTheirs,
	tryGit,
	validateCwd,
	validateGitRef,
} from "../git.js";

const REPO = "/work/release/pythontk";

/**
 * Answer git invocations by their space-joined arguments.
 * A handler that returns an Error makes that command fail.
 */
function respond(handler: (command: string) => string | Error): void {
	vi.mocked(execFileSync).mockImplementation((_cmd, args) => {
		const command = Array.isArray(args) ? args.join(" ") : "";
		const answer = handler(command);
		if (answer instanceof Error) {
			throw answer;
		}
		return answer;
	});
}

function gitFailure(stderr: string, status = 1): Error {
	return Object.assign(new Error("Command failed"), { status, stderr: Buffer.from(stderr) });
}

describe("Git Module", () => {
	beforeEach(() => {
		vi.clearAllMocks();
	});

	describe("getCurrentBranch", () => {
		it("returns the current branch name", () => {
			vi.mocked(execFileSync).mockReturnValue("dev\n");
			expect(getCurrentBranch(REPO)).toBe("dev");
		});

		it("runs git in the given repository", () => {
			vi.mocked(execFileSync).mockReturnValue("main\n");
			getCurrentBranch(REPO);
			expect(execFileSync).toHaveBeenCalledWith(
				"git",
				["rev-parse", "--abbrev-ref", "HEAD"],
				expect.objectContaining({ cwd: REPO, encoding: "utf-8" }),
			);
		});
	});

	describe("execGit error handling", () => {
		it("throws GitError carrying stderr, command and exit code", () => {
			vi.mocked(execFileSync).mockImplementation(() => {
				throw gitFailure("fatal: not a git repository\n", 128);
			});

			let caught: unknown;
			try {
				execGit(["status", "--porcelain"], REPO);
			} catch (error) {
				caught = error;
			}

			expect(caught).toBeInstanceOf(GitError);
			if (caught instanceof GitError) {
				expect(caught.message).toBe("fatal: not a git repository");
				expect(caught.command).toBe("git status --porcelain");
				expect(caught.exitCode).toBe(128);
			}
		});

		it("tryGit returns the failure as a value", () => {
			vi.mocked(execFileSync).mockImplementation(() => {
				throw gitFailure("error: pathspec 'x' did not match");
			});
			const attempt = tryGit(["checkout", "x"], REPO);
			expect(attempt.ok).toBe(false);
		});
	});

	describe("input validation", () => {
		it("rejects relative and dash-prefixed working directories", () => {
			expect(() => validateCwd("relative/path")).toThrow("must be absolute path");
			expect(() => validateCwd("--upload-pack=evil")).toThrow("cannot start with dash");
		});

		it("accepts remote-tracking refs and rejects option-like or shell-like refs", () => {
			expect(validateGitRef("origin/main")).toBe("origin/main");
			expect(() => validateGitRef("--output=/tmp/x")).toThrow("cannot start with dash");
			expect(() => validateGitRef("main;rm -rf")).toThrow("Invalid git ref");
		});
	});

	describe("countUnpushedCommits", () => {
		it("counts against the configured upstream", () => {
			respond((command) => {
				if (command === "rev-parse --verify --quiet dev") return "abc123\n";
				if (command === "rev-list --count dev@{u}..dev") return "3\n";
				return gitFailure("unexpected");
			});
			expect(countUnpushedCommits(REPO, "origin", "dev")).toBe(3);
		});

		it("falls back to the remote branch when no upstream is set", () => {
			respond((command) => {
				if (command === "rev-parse --verify --quiet dev") return "abc123\n";
				if (command === "rev-list --count dev@{u}..dev") return gitFailure("fatal: no upstream configured");
				if (command === "rev-parse --verify --quiet origin/dev") return "def456\n";
				if (command === "rev-list --count origin/dev..dev") return "2\n";
				return gitFailure("unexpected");
			});
			expect(countUnpushedCommits(REPO, "origin", "dev")).toBe(2);
		});

		it("returns 0 when the local branch does not exist", () => {
			respond(() => gitFailure("fatal: Needed a single revision"));
			expect(countUnpushedCommits(REPO, "origin", "dev")).toBe(0);
		});
	});

	describe("detectInProgressOperation", () => {
		it("reports an interrupted merge", () => {
			respond((command) => (command === "rev-parse --verify --quiet MERGE_HEAD" ? "abc\n" : gitFailure("")));
			expect(detectInProgressOperation(REPO)).toBe("merge");
		});

		it("reports an interrupted cherry-pick", () => {
			respond((command) => {
				if (command === "rev-parse --verify --quiet CHERRY_PICK_HEAD") return "abc\n";
				if (command.startsWith("rev-parse --git-path")) return ".git/none";
				return gitFailure("");
			});
			expect(detectInProgressOperation(REPO)).toBe("cherryPick");
		});

		it("reports none on a quiet repository", () => {
			respond((command) => (command.startsWith("rev-parse --git-path") ? ".git/rebase-merge" : gitFailure("")));
			expect(detectInProgressOperation(REPO)).toBe("none");
		});
	});

	describe("merge helpers", () => {
		it("mergeNoCommit returns false when git reports conflicts", () => {
			respond(() => gitFailure("CONFLICT (content): Merge conflict in pyproject.toml"));
			expect(mergeNoCommit(REPO, "dev")).toBe(false);
		});

		it("getConflictFiles lists unmerged paths", () => {
			respond((command) =>
				command === "diff --name-only --diff-filter=U" ? ".github/workflows/publish.yml\npythontk/__init__.py\n" : "",
			);
			expect(getConflictFiles(REPO)).toEqual([".github/workflows/publish.yml", "pythontk/__init__.py"]);
		});

		it("diffNames uses the three-dot range", () => {
			respond((command) => (command === "diff --name-only origin/main...dev" ? "pyproject.toml\n" : gitFailure("")));
			expect(diffNames(REPO, "origin/main", "dev")).toEqual(["pyproject.toml"]);
		});

		it("takeTheirs checks out and stages the incoming version", () => {
			const commands: string[] = [];
			respond((command) => {
				commands.push(command);
				return command === "ls-files --unmerged -- pyproject.toml"
					? "100644 1111111111111111111111111111111111111111 1\tpyproject.toml\n" +
							"100644 2222222222222222222222222222222222222222 2\tpyproject.toml\n" +
							"100644 3333333333333333333333333333333333333333 3\tpyproject.toml\n"
					: "";
			});

			takeTheirs(REPO, "pyproject.toml");

			expect(commands).toEqual([
				"ls-files --unmerged -- pyproject.toml",
				"checkout --theirs -- pyproject.toml",
				"add -- pyproject.toml",
			]);
		});

		it("takeTheirs removes a file the incoming branch deleted", () => {
			const commands: string[] = [];
			respond((command) => {
				commands.push(command);
				return command === "ls-files --unmerged -- pythontk/__init__.py"
					? "100644 1111111111111111111111111111111111111111 1\tpythontk/__init__.py\n" +
							"100644 2222222222222222222222222222222222222222 2\tpythontk/__init__.py\n"
					: "";
			});

			takeTheirs(REPO, "pythontk/__init__.py");

			expect(commands).toEqual(["ls-files --unmerged -- pythontk/__init__.py", "rm --quiet -- pythontk/__init__.py"]);
		});
	});

	describe("output buffer", () => {
		it("raises the output cap above the 1 MiB default", () => {
			vi.mocked(execFileSync).mockReturnValue("");

			mergeTree(REPO, "abc1234", "origin/main", "origin/dev");

			expect(execFileSync).toHaveBeenCalledWith(
				"git",
				["merge-tree", "abc1234", "origin/main", "origin/dev"],
				expect.objectContaining({ maxBuffer: 10 * 1024 * 1024 }),
			);
		});

		it("returns merge-tree output larger than 1 MiB", () => {
			const largeOutput = `changed in both\n${"+added line\n".repeat(120_000)}`;
			vi.mocked(execFileSync).mockImplementation((_cmd, _args, options) => {
				const cap: unknown = typeof options === "object" && options !== null ? Reflect.get(options, "maxBuffer") : undefined;
				if (typeof cap !== "number" || largeOutput.length > cap) {
					throw Object.assign(new Error("spawnSync git ENOBUFS"), { code: "ENOBUFS" });
				}
				return largeOutput;
			});

			expect(mergeTree(REPO, "abc1234", "origin/main", "origin/dev")).toHaveLength(largeOutput.trim().length);
		});
	});

	describe("rebase", () => {
		it("returns false and aborts when rebase fails", () => {
			let abortCalled = false;
			respond((command) => {
				if (command === "rebase origin/dev") return gitFailure("CONFLICT");
				if (command === "rebase --abort") {
					abortCalled = true;
					return "";
				}
				return "";
			});

			expect(rebase(REPO, "origin/dev")).toBe(false);
			expect(abortCalled).toBe(true);
		});

		it("returns false even when the abort itself fails", () => {
			respond(() => gitFailure("fatal"));
			expect(rebase(REPO, "origin/dev")).toBe(false);
		});
	});

	describe("showFile and getRemoteUrl", () => {
		it("returns file content at a ref", () => {
			respond((command) => (command === "show origin/main:requirements.txt" ? "pythontk==2.3.1\n" : gitFailure("")));
			expect(showFile(REPO, "origin/main", "requirements.txt")).toBe("pythontk==2.3.1");
		});

		it("returns null when the path is missing at the ref", () => {
			respond(() => gitFailure("fatal: path 'requirements.txt' does not exist in 'origin/main'"));
			expect(showFile(REPO, "origin/main", "requirements.txt")).toBeNull();
		});

		it("returns null for a missing remote", () => {
			respond(() => gitFailure("error: No such remote 'origin'", 2));
			expect(getRemoteUrl(REPO, "origin")).toBeNull();
		});
	});
});
