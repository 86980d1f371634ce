/**
 * Release Train Types
 *
 * Core type definitions for the multi-repository release orchestrator.
 */

/**
 * A managed package: one git working copy under the release root.
 * Immutable for the duration of a run.
 */
export interface Package {
	name: string;
	filesystemPath: string;
	/** Eligible for build validation, pin sync, registry check and workflow wait */
	isStrict: boolean;
	/** Version read from the package's version file, if any */
	declaredVersion?: string;
	/** Project name on the package registry (defaults to `name`) */
	registryName: string;
}

/**
 * Entry of the configured package table
 */
export interface PackageDefinition {
	name: string;
	strict: boolean;
	registryName?: string;
	/** Sibling packages whose exact version this package pins (its DependencyPinSet) */
	dependsOn: string[];
}

/**
 * Operation left half-finished in a working copy
 */
export type InProgressOperation = "none" | "merge" | "rebase" | "cherryPick";

/**
 * Snapshot of a repository, derived on demand and never cached between stages
 */
export interface RepoState {
	hasUncommittedChanges: boolean;
	/** Commits on the local branch not yet on its upstream */
	localAheadCount: number;
	/** Commits on development (the local branch when present, else the remote one) not yet on the remote mainline */
	devAheadOfMainCount: number;
	inProgressOperation: InProgressOperation;
	conflictMarkersPresent: boolean;
}

/**
 * Result of a virtual merge between mainline and development
 */
export interface ConflictReport {
	hasConflicts: boolean;
	conflictingFiles: string[];
}

/**
 * Classification of a conflict report against the auto-resolve allow-list
 */
export type ConflictClassification = "clean" | "autoResolvable" | "unexpected";

/**
 * Outcome of the external build + artifact check
 */
export interface BuildOutcome {
	passed: boolean;
	firstDiagnosticLine: string;
}

export type PullRequestState = "open" | "merged" | "closed";

export interface PullRequestHandle {
	number: number;
	state: PullRequestState;
}

export type WorkflowRunStatus = "queued" | "in_progress" | "completed";

export type WorkflowRunConclusion = "success" | "failure" | "other" | "none";

/**
 * One execution of the downstream CI publish workflow
 */
export interface WorkflowRun {
	headCommit: string;
	status: WorkflowRunStatus;
	conclusion: WorkflowRunConclusion;
	createdAt?: string;
	displayTitle?: string;
}

/**
 * Terminal outcome kinds a package can end in
 */
export type PackageOutcome =
	| "skipped"
	| "success"
	| "dryRunOk"
	| "unsafeRepo"
	| "requirementsInvalid"
	| "registryVersionMissing"
	| "buildFailed"
	| "pushFailed"
	| "mergeConflict"
	| "mergeFailed"
	| "workflowFailed"
	| "unprocessed";

/**
 * Outcomes that count as a failed package
 */
export type FailureOutcome = Exclude<PackageOutcome, "skipped" | "success" | "dryRunOk" | "unprocessed">;

export const NON_FAILING_OUTCOMES: readonly PackageOutcome[] = ["skipped", "success", "dryRunOk"];

/**
 * The single terminal result of one package's pipeline
 */
export interface PackageResult {
	readonly pkg: string;
	readonly outcome: PackageOutcome;
	readonly detail: string;
}

/**
 * Per-package pipeline states, in order
 */
export type PipelineStage =
	| "safetyCheck"
	| "requirementsSync"
	| "registryCheck"
	| "buildValidate"
	| "changeCheck"
	| "push"
	| "conflictProbe"
	| "merge"
	| "workflowWait";

export type MergeMode = "direct" | "pullRequest";

/**
 * Options for one orchestrator run, after CLI flags and rc file are merged
 */
export interface ReleaseOptions {
	merge: boolean;
	strict: boolean;
	mergeMode: MergeMode;
	dryRun: boolean;
	skipBuild: boolean;
	skipWorkflowWait: boolean;
	skipRegistryCheck: boolean;
	workflowTimeoutMs: number;
	prTimeoutMs: number;
	pollIntervalMs: number;
}

/**
 * Branch and remote names shared by every package
 */
export interface BranchLayout {
	remote: string;
	devBranch: string;
	mainBranch: string;
}
