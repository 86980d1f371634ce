/**
 * Requirements Synchronizer
 *
 * Rewrites a package's internal pins (`dep==X.Y.Z` lines in requirements.txt)
 * to the exact local version of each sibling it depends on, then commits the
 * change to the development branch with the skip-CI marker.
 *
 * The set of pinned siblings is fixed by the package table: a required pin
 * that is missing from the manifest is a configuration error, never added.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { REQUIREMENTS_FILE } from "./constants.js";
import { StageError } from "./errors.js";
import { checkoutBranch, commitFiles, getCurrentBranch } from "./git.js";
import { releaseLogger } from "./logger.js";
import type { BranchLayout, Package } from "./types.js";

export interface PinChange {
	dependency: string;
	from: string;
	to: string;
}

export interface PinRewrite {
	content: string;
	changes: PinChange[];
	/** Required dependencies with no pin line in the manifest */
	missing: string[];
}

export type SyncResult = { status: "unchanged" } | { status: "updated"; changes: PinChange[]; committed: boolean };

export interface SyncOptions {
	layout: BranchLayout;
	dryRun: boolean;
	skipCiMarker: string;
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Rewrite pin lines in manifest text. Pure: touches neither disk nor git.
 *
 * Only `name==version` lines are rewritten; the rest of each line (markers,
 * comments) is kept as is. Comment lines never count as pins.
 */
export function rewritePins(content: string, required: Map<string, string>): PinRewrite {
	const eol = content.includes("\r\n") ? "\r\n" : "\n";
	const lines = content.split(/\r?\n/);
	const changes: PinChange[] = [];
	const found = new Set<string>();

	const patterns = [...required.entries()].map(([dependency, version]) => ({
		dependency,
		version,
		regex: new RegExp(`^(\\s*${escapeRegExp(dependency)}\\s*==\\s*)([^\\s;#]+)(.*)$`, "i"),
	}));

	const rewritten = lines.map((line) => {
		if (line.trimStart().startsWith("#")) {
			return line;
		}
		for (const { dependency, version, regex } of patterns) {
			const match = regex.exec(line);
			if (!match) continue;
			found.add(dependency);
			const [, prefix, current, rest] = match;
			if (current === version) {
				return line;
			}
			changes.push({ dependency, from: current, to: version });
			return `${prefix}${version}${rest}`;
		}
		return line;
	});

	const missing = [...required.keys()].filter((dep) => !found.has(dep));
	return { content: rewritten.join(eol), changes, missing };
}

/**
 * Synchronize a package's pins with the given sibling versions
 *
 * @param pinSet - siblings this package must pin
 * @param resolveVersion - exact local version of a sibling, undefined when unknown
 * @throws StageError("requirementsInvalid") on an unresolvable version or missing pin
 */
export function syncRequirements(
	pkg: Package,
	pinSet: string[],
	resolveVersion: (dependency: string) => string | undefined,
	options: SyncOptions,
): SyncResult {
	if (pinSet.length === 0) {
		return { status: "unchanged" };
	}

	const required = new Map<string, string>();
	for (const dependency of pinSet) {
		const version = resolveVersion(dependency);
		if (!version) {
			throw new StageError("requirementsInvalid", `No local version found for ${dependency}`);
		}
		required.set(dependency, version);
	}

	const manifestPath = join(pkg.filesystemPath, REQUIREMENTS_FILE);
	if (!existsSync(manifestPath)) {
		throw new StageError("requirementsInvalid", `${REQUIREMENTS_FILE} not found in ${pkg.name}`);
	}

	const rewrite = rewritePins(readFileSync(manifestPath, "utf-8"), required);
	if (rewrite.missing.length > 0) {
		throw new StageError(
			"requirementsInvalid",
			`${REQUIREMENTS_FILE} has no pin for ${rewrite.missing.join(", ")} (expected ${rewrite.missing
				.map((dep) => `${dep}==${required.get(dep)}`)
				.join(", ")})`,
		);
	}

	if (rewrite.changes.length === 0) {
		releaseLogger.debug({ pkg: pkg.name }, "Pins already in sync");
		return { status: "unchanged" };
	}

	if (options.dryRun) {
		releaseLogger.info({ pkg: pkg.name, changes: rewrite.changes }, "Dry run: pins would be rewritten");
		return { status: "updated", changes: rewrite.changes, committed: false };
	}

	const repo = pkg.filesystemPath;
	if (getCurrentBranch(repo) !== options.layout.devBranch) {
		checkoutBranch(repo, options.layout.devBranch);
	}
	writeFileSync(manifestPath, rewrite.content, "utf-8");

	const summary = rewrite.changes.map((c) => `${c.dependency}==${c.to}`).join(", ");
	const message = `Sync internal requirement pins: ${summary}${options.skipCiMarker ? ` ${options.skipCiMarker}` : ""}`;
	commitFiles(repo, [REQUIREMENTS_FILE], message);

	releaseLogger.info({ pkg: pkg.name, changes: rewrite.changes }, "Committed pin sync");
	return { status: "updated", changes: rewrite.changes, committed: true };
}
