#!/usr/bin/env node

/**
 * release-train CLI
 *
 * Promotes a chain of interdependent packages from their development branch
 * to mainline, keeping internal pins in sync and waiting on CI publishing.
 *
 *   release-train                 push every package that has changes
 *   release-train uitk mayatk -m  push and merge two packages
 *   release-train --all -m -s     full strict release of the chain, in order
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { type ReleaseFlags, handleRelease } from "./commands/release-handlers.js";
import { errorMessage, ValidationError } from "./errors.js";
import * as output from "./output.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

// Get version from package.json
function getVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch (error) {
		output.debug(`Could not read package.json: ${errorMessage(error)}`);
	}
	return "0.0.0";
}

const program = new Command();

program
	.name("release-train")
	.description("Promote dev to main across a chain of dependent packages")
	.version(getVersion())
	.argument("[packages...]", "packages to release (names, space or comma separated)")
	.option("--all", "release every configured package found under the root (default)")
	.option("--current", "release the package containing the current directory")
	.option("-m, --merge", "merge dev into main after pushing")
	.option("-s, --strict", "sync pins, check the registry, validate builds, wait for CI; stop on first failure")
	.option("--pr", "merge through a pull request with auto-merge instead of a local merge")
	.option("-n, --dry-run", "run every check but change nothing")
	.option("--skip-build", "skip build validation")
	.option("--skip-workflow-wait", "do not wait for the publish workflow after merging")
	.option("--skip-registry-check", "do not check that pinned dependencies are published")
	.option("--workflow-timeout <minutes>", "how long to wait for the publish workflow")
	.option("--pr-timeout <minutes>", "how long to wait for a pull request to merge")
	.option("--poll-interval <seconds>", "interval between CI and pull-request polls")
	.option("--root <dir>", "directory holding the package working copies")
	.option("--human", "human-readable output instead of JSON events")
	.option("-v, --verbose", "debug logging")
	.action(async (packages: string[], flags: ReleaseFlags) => {
		try {
			process.exitCode = await handleRelease(packages, flags);
		} catch (error) {
			if (error instanceof ValidationError && error.validationErrors) {
				output.error(error.message, { field: error.field, problems: error.validationErrors });
			} else {
				output.error(errorMessage(error));
			}
			process.exitCode = 1;
		}
	});

program.parseAsync().catch((error: unknown) => {
	output.error(errorMessage(error));
	process.exitCode = 1;
});
