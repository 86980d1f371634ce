/**
 * Release Orchestrator
 *
 * Runs each selected package through the release pipeline, one package at a
 * time and in dependency order:
 *
 *   safetyCheck → requirementsSync → registryCheck → buildValidate →
 *   changeCheck → push → conflictProbe → merge → workflowWait
 *
 * Every stage may end the package in a terminal failure; the stage that
 * failed decides which one. The orchestrator alone turns a package's
 * pipeline into its PackageResult and collects the results in order.
 *
 * Policies:
 * - Canonical release order is applied only when more than one package is
 *   selected and both merge and strict are on.
 * - Stop-on-failure is active only under merge + strict; packages after
 *   the failing one end as `unprocessed`.
 * - Dry run executes every read-only step and no-ops every mutating one.
 */

import { resolve } from "node:path";
import { type BuildValidationOptions, validateBuild } from "./build-validator.js";
import { type ChangeDetectionOptions, type ChangeStatus, detectChanges } from "./change-detector.js";
import type { ResolvedConfig } from "./config.js";
import { classifyConflicts, probeConflicts, unexpectedConflicts } from "./conflict-probe.js";
import { errorMessage, StageError } from "./errors.js";
import { releaseLogger } from "./logger.js";
import * as output from "./output.js";
import { buildPinSets, canonicalReleaseOrder, readDeclaredVersion } from "./packages.js";
import {
	type DirectMergeOptions,
	type MergeResult,
	mergeDirect,
	mergeViaPullRequest,
	type PullRequestMergeOptions,
	type PushOptions,
	pushDevBranch,
} from "./publisher.js";
import { type Availability, checkVersionAvailable, type RegistryCheckOptions } from "./registry.js";
import { type SyncOptions, type SyncResult, syncRequirements } from "./requirements-sync.js";
import { checkRepoSafety, type SafetyVerdict } from "./safety-gate.js";
import {
	type BranchLayout,
	type BuildOutcome,
	type ConflictReport,
	type FailureOutcome,
	NON_FAILING_OUTCOMES,
	type Package,
	type PackageOutcome,
	type PackageResult,
	type PipelineStage,
	type ReleaseOptions,
} from "./types.js";
import { type WorkflowWaitOptions, waitForWorkflow } from "./workflow-waiter.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Collaborators used by the pipeline. Production code uses
 * `defaultReleaseDependencies`; tests substitute fakes.
 */
export interface ReleaseDependencies {
	checkRepoSafety: (repoPath: string, layout: BranchLayout, strict: boolean) => SafetyVerdict;
	syncRequirements: (
		pkg: Package,
		pinSet: string[],
		resolveVersion: (dependency: string) => string | undefined,
		options: SyncOptions,
	) => SyncResult;
	checkVersionAvailable: (project: string, version: string, options: RegistryCheckOptions) => Promise<Availability>;
	validateBuild: (packagePath: string, options: BuildValidationOptions) => Promise<BuildOutcome>;
	detectChanges: (pkg: Package, layout: BranchLayout, options: ChangeDetectionOptions) => ChangeStatus;
	pushDevBranch: (pkg: Package, options: PushOptions) => void;
	probeConflicts: (repoPath: string, layout: BranchLayout, devRef?: string) => ConflictReport;
	mergeDirect: (pkg: Package, options: DirectMergeOptions) => MergeResult;
	mergeViaPullRequest: (pkg: Package, options: PullRequestMergeOptions) => Promise<MergeResult>;
	waitForWorkflow: (repoPath: string, options: WorkflowWaitOptions) => Promise<string>;
	readDeclaredVersion: (packagePath: string, name: string) => string | undefined;
}

export const defaultReleaseDependencies: ReleaseDependencies = {
	checkRepoSafety,
	syncRequirements,
	checkVersionAvailable,
	validateBuild,
	detectChanges,
	pushDevBranch,
	probeConflicts,
	mergeDirect,
	mergeViaPullRequest,
	waitForWorkflow,
	readDeclaredVersion,
};

export interface ReleaseReport {
	results: PackageResult[];
	/** Name of the package whose failure stopped the run, if any */
	stoppedAt: string | null;
	exitCode: number;
}

/**
 * Failure a stage ends in when it throws something other than a StageError
 */
const STAGE_FAILURE: Record<PipelineStage, FailureOutcome> = {
	safetyCheck: "unsafeRepo",
	requirementsSync: "requirementsInvalid",
	registryCheck: "registryVersionMissing",
	buildValidate: "buildFailed",
	changeCheck: "pushFailed",
	push: "pushFailed",
	conflictProbe: "mergeFailed",
	merge: "mergeFailed",
	workflowWait: "workflowFailed",
};

// =============================================================================
// Policies
// =============================================================================

/**
 * True when an outcome counts as a failed package
 */
export function isFailingOutcome(outcome: PackageOutcome): boolean {
	return !NON_FAILING_OUTCOMES.includes(outcome);
}

/**
 * Move packages of the canonical chain to the front, in chain order; all
 * others keep their relative order after them.
 */
export function orderByChain<T extends { name: string }>(selected: readonly T[], chain: readonly string[]): T[] {
	const position = new Map(chain.map((name, index) => [name, index]));
	const inChain = selected.filter((p) => position.has(p.name));
	const rest = selected.filter((p) => !position.has(p.name));
	inChain.sort((a, b) => (position.get(a.name) ?? 0) - (position.get(b.name) ?? 0));
	return [...inChain, ...rest];
}

/**
 * The effective processing order for a run
 */
export function applyReleaseOrder<T extends { name: string }>(
	selected: readonly T[],
	chain: readonly string[],
	options: Pick<ReleaseOptions, "merge" | "strict">,
): T[] {
	if (selected.length > 1 && options.merge && options.strict) {
		return orderByChain(selected, chain);
	}
	return [...selected];
}

/**
 * Stop-on-failure policy
 */
export function shouldStop(outcome: PackageOutcome, options: Pick<ReleaseOptions, "merge" | "strict">): boolean {
	return options.merge && options.strict && isFailingOutcome(outcome);
}

/**
 * 0 when every package ended in skipped, success or dryRunOk
 */
export function exitCodeFor(results: readonly PackageResult[]): number {
	return results.every((r) => !isFailingOutcome(r.outcome)) ? 0 : 1;
}

// =============================================================================
// Per-package pipeline
// =============================================================================

class ReleasePipeline {
	private readonly layout: BranchLayout;
	private readonly pinSets: Map<string, string[]>;
	private readonly registryNames: Map<string, string>;

	constructor(
		private readonly config: ResolvedConfig,
		private readonly options: ReleaseOptions,
		private readonly deps: ReleaseDependencies,
	) {
		this.layout = { remote: config.remote, devBranch: config.devBranch, mainBranch: config.mainBranch };
		this.pinSets = buildPinSets(config.packages);
		this.registryNames = new Map(config.packages.map((d) => [d.name, d.registryName ?? d.name]));
	}

	/**
	 * Exact local version of a sibling, read fresh from its version file
	 */
	private resolveVersion = (dependency: string): string | undefined => {
		return this.deps.readDeclaredVersion(resolve(this.config.root, dependency), dependency);
	};

	private step(message: string): void {
		output.progress(message);
	}

	async run(pkg: Package): Promise<PackageResult> {
		let stage: PipelineStage = "safetyCheck";
		const finish = (outcome: PackageOutcome, detail: string): PackageResult => {
			releaseLogger.info({ pkg: pkg.name, stage, outcome, detail }, "Package finished");
			return { pkg: pkg.name, outcome, detail };
		};

		try {
			const { options, layout, deps } = this;
			const repo = pkg.filesystemPath;
			const strictPackage = options.strict && pkg.isStrict;

			const verdict = deps.checkRepoSafety(repo, layout, options.strict);
			if (!verdict.safe) {
				return finish("unsafeRepo", verdict.reason);
			}

			const pinSet = this.pinSets.get(pkg.name) ?? [];
			// A dry run leaves pin updates uncommitted; they still count as work to release
			let syncPending = false;

			if (strictPackage && pinSet.length > 0) {
				stage = "requirementsSync";
				const sync = deps.syncRequirements(pkg, pinSet, this.resolveVersion, {
					layout,
					dryRun: options.dryRun,
					skipCiMarker: this.config.skipCiMarker,
				});
				if (sync.status === "updated") {
					const pins = sync.changes.map((c) => `${c.dependency}==${c.to}`).join(", ");
					this.step(sync.committed ? `Synced requirements.txt pins: ${pins}` : `Would sync requirements.txt pins: ${pins}`);
					syncPending = !sync.committed;
				}

				if (!options.skipRegistryCheck) {
					stage = "registryCheck";
					for (const dependency of pinSet) {
						const version = this.resolveVersion(dependency);
						if (!version) {
							throw new StageError("requirementsInvalid", `No local version found for ${dependency}`);
						}
						const project = this.registryNames.get(dependency) ?? dependency;
						const availability = await deps.checkVersionAvailable(project, version, {
							registryUrl: this.config.registryUrl,
						});
						if (!availability.available) {
							return finish("registryVersionMissing", `${project}==${version} not available: ${availability.reason}`);
						}
					}
				}
			}

			if (strictPackage && !options.skipBuild) {
				stage = "buildValidate";
				this.step("Validating build");
				const build = await deps.validateBuild(repo, {
					buildCommand: this.config.buildCommand,
					checkCommand: this.config.checkCommand,
					timeoutMs: this.config.buildTimeoutMs,
				});
				if (!build.passed) {
					return finish("buildFailed", build.firstDiagnosticLine);
				}
			}

			stage = "changeCheck";
			const changes = deps.detectChanges(pkg, layout, { merge: options.merge, strict: options.strict });
			if (changes.devBumpOnly) {
				this.step("Dev is ahead only due to dev bump (skipping merge)");
			}
			const needsPush = changes.needsPush || syncPending;
			const needsMerge = changes.needsMerge || (syncPending && options.merge);
			if (!needsPush && !needsMerge) {
				const detail = changes.devBumpOnly
					? "Dev is ahead only due to dev bump"
					: options.merge
						? "No changes to push and fully merged"
						: "No changes to push";
				return finish("skipped", detail);
			}

			const details: string[] = [];

			if (needsPush) {
				stage = "push";
				deps.pushDevBranch(pkg, { layout, dryRun: options.dryRun, report: (m) => this.step(m) });
				details.push(options.dryRun ? "would push" : "pushed");
			}

			if (options.merge && needsMerge) {
				stage = "conflictProbe";
				// Without a real push the remote development branch lacks the local commits
				const devRef = options.dryRun && needsPush ? layout.devBranch : undefined;
				const report = deps.probeConflicts(repo, layout, devRef);
				const classification = classifyConflicts(report);
				if (classification === "unexpected") {
					return finish("mergeConflict", `Unexpected merge conflicts: ${unexpectedConflicts(report).join(", ")}`);
				}
				if (classification === "autoResolvable") {
					this.step(`Auto-resolvable conflicts: ${report.conflictingFiles.join(", ")}`);
				}

				stage = "merge";
				const merged =
					options.mergeMode === "pullRequest"
						? await deps.mergeViaPullRequest(pkg, {
								layout,
								dryRun: options.dryRun,
								timeoutMs: options.prTimeoutMs,
								pollIntervalMs: options.pollIntervalMs,
								report: (m) => this.step(m),
							})
						: deps.mergeDirect(pkg, { layout, dryRun: options.dryRun, report: (m) => this.step(m) });
				details.push(merged.detail);

				if (strictPackage && !options.skipWorkflowWait && merged.headCommit) {
					stage = "workflowWait";
					this.step(`Waiting for ${this.config.workflow} on ${merged.headCommit.slice(0, 7)}`);
					await deps.waitForWorkflow(repo, {
						layout,
						workflow: this.config.workflow,
						timeoutMs: options.workflowTimeoutMs,
						pollIntervalMs: options.pollIntervalMs,
						headCommit: merged.headCommit,
						onWait: (m) => output.debug(m),
					});
					details.push("published");
				}
			}

			return finish(options.dryRun ? "dryRunOk" : "success", details.join(", "));
		} catch (error) {
			if (error instanceof StageError) {
				return finish(error.outcome, error.message);
			}
			releaseLogger.debug({ pkg: pkg.name, stage, error: errorMessage(error) }, "Stage threw");
			return finish(STAGE_FAILURE[stage], errorMessage(error));
		}
	}
}

// =============================================================================
// Run
// =============================================================================

/**
 * Release the selected packages and report a result for every one of them
 */
export async function runRelease(
	selected: readonly Package[],
	config: ResolvedConfig,
	options: ReleaseOptions,
	deps: ReleaseDependencies = defaultReleaseDependencies,
): Promise<ReleaseReport> {
	const ordered = applyReleaseOrder(selected, canonicalReleaseOrder(config.packages), options);
	const pipeline = new ReleasePipeline(config, options, deps);
	const results: PackageResult[] = [];
	let stoppedAt: string | null = null;

	releaseLogger.info({ packages: ordered.map((p) => p.name), ...options }, "Release run starting");

	for (const [index, pkg] of ordered.entries()) {
		if (stoppedAt) {
			results.push({ pkg: pkg.name, outcome: "unprocessed", detail: `Not started: ${stoppedAt} failed` });
			continue;
		}

		output.packageStart(pkg.name, index + 1, ordered.length);
		const result = await pipeline.run(pkg);
		output.packageResult(result);
		results.push(result);

		if (shouldStop(result.outcome, options)) {
			stoppedAt = pkg.name;
			output.error(`Stopping: ${pkg.name} ended in ${result.outcome}`);
		}
	}

	output.summary(results);
	const exitCode = exitCodeFor(results);
	releaseLogger.info({ exitCode, stoppedAt }, "Release run finished");
	return { results, stoppedAt, exitCode };
}
