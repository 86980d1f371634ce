/**
 * Shared constants used across the codebase.
 *
 * Centralizes magic numbers and file names so they can be tuned in one place
 * and carry semantic meaning at every call site.
 */

// ---------------------------------------------------------------------------
// Command timeouts (milliseconds)
// ---------------------------------------------------------------------------

/** Standard git operations: status, rev-parse, rev-list, show */
export const TIMEOUT_GIT_CMD_MS = 30_000;

/** Network git operations: fetch, pull, push */
export const TIMEOUT_GIT_NETWORK_MS = 120_000;

/** Output cap for a git command; merge-tree over a large history exceeds the 1 MiB default */
export const GIT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;

/** Build or artifact check, per command */
export const TIMEOUT_BUILD_STEP_MS = 60_000;

/** gh CLI calls */
export const TIMEOUT_GH_CMD_MS = 30_000;

/** Registry metadata request */
export const TIMEOUT_REGISTRY_MS = 10_000;

// ---------------------------------------------------------------------------
// Polling
// ---------------------------------------------------------------------------

/** Workflow wait deadline */
export const DEFAULT_WORKFLOW_TIMEOUT_MS = 15 * 60_000;

/** Pull-request merge wait deadline */
export const DEFAULT_PR_TIMEOUT_MS = 30 * 60_000;

/** Interval between polls of CI runs and pull requests */
export const DEFAULT_POLL_INTERVAL_MS = 15_000;

/** Floor for the poll interval; remote services rate-limit tighter loops */
export const MIN_POLL_INTERVAL_MS = 1_000;

/** How many recent workflow runs are listed per poll */
export const WORKFLOW_RUN_LIST_LIMIT = 20;

// ---------------------------------------------------------------------------
// Package layout
// ---------------------------------------------------------------------------

/** Pin manifest, relative to the package root */
export const REQUIREMENTS_FILE = "requirements.txt";

/** Project metadata file that carries the version alongside the init file */
export const PYPROJECT_FILE = "pyproject.toml";

/** Build output directories cleared before validation */
export const BUILD_ARTIFACT_GLOBS = ["dist", "build", "*.egg-info"];

/** Appended to commits CI must not re-trigger on */
export const DEFAULT_SKIP_CI_MARKER = "[skip ci]";

/** Message used when staging leftover changes before a push */
export const AUTO_COMMIT_MESSAGE = "Update package files";

/** The rc file name looked up in the home directory and the release root */
export const RC_FILE_NAME = ".releasetrainrc";
