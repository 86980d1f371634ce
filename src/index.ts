/**
 * release-train - Centralized Export Module
 *
 * Single entry point for using the release pipeline as a library:
 * - Orchestrator and its policies
 * - Pipeline stages (safety gate, change detection, pin sync, build
 *   validation, conflict probe, publisher, workflow waiter, registry check)
 * - Configuration, package table and output
 * - Core type definitions
 */

// Pipeline stages
export { type BuildValidationOptions, classifyOutput, validateBuild } from "./build-validator.js";
export { type ChangeStatus, detectChanges, hasPendingChanges, readRepoState } from "./change-detector.js";
// Configuration
export {
	clearConfigCache,
	getDefaultConfig,
	loadConfig,
	mergeWithConfig,
	type ReleaseTrainRc,
	type ResolvedConfig,
} from "./config.js";
export {
	AUTO_RESOLVE_PATTERNS,
	classifyConflicts,
	isAutoResolvable,
	parseMergeTreeConflicts,
	probeConflicts,
} from "./conflict-probe.js";
// Errors
export {
	AppError,
	CommandError,
	GitError,
	StageError,
	ValidationError,
} from "./errors.js";
// Logging
export { logger } from "./logger.js";
// Orchestrator
export {
	applyReleaseOrder,
	defaultReleaseDependencies,
	exitCodeFor,
	type ReleaseDependencies,
	type ReleaseReport,
	runRelease,
	shouldStop,
} from "./orchestrator.js";
// Output
export { configureOutput, type OutputMode } from "./output.js";
export {
	assertValidChain,
	canonicalReleaseOrder,
	type PackageSelection,
	selectPackages,
	validateChain,
} from "./packages.js";
export { pollUntil, type PollResult, type PollStep } from "./polling.js";
export { type MergeResult, mergeDirect, mergeViaPullRequest, pushDevBranch } from "./publisher.js";
export { type Availability, checkVersionAvailable } from "./registry.js";
export { rewritePins, type SyncResult, syncRequirements } from "./requirements-sync.js";
export { checkRepoSafety, hasConflictMarkers, type SafetyVerdict } from "./safety-gate.js";
// Types
export type * from "./types.js";
export { NON_FAILING_OUTCOMES } from "./types.js";
export { judgeRuns, waitForWorkflow } from "./workflow-waiter.js";
