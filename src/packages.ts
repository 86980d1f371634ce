/**
 * Package Table
 *
 * Resolves the configured package table into Package values: validates the
 * dependency chain, reads declared versions from disk and selects the
 * working set for a run (all / explicit list / current directory).
 */

import { existsSync, readFileSync } from "node:fs";
import { join, relative, resolve, sep } from "node:path";
import { ValidationError } from "./errors.js";
import { releaseLogger } from "./logger.js";
import type { Package, PackageDefinition } from "./types.js";

const VERSION_PATTERN = /__version__\s*=\s*["']([^"']+)["']/;

/**
 * Check that every dependency is a known package listed earlier in the table.
 *
 * @returns list of problems (empty when the chain is consistent)
 */
export function validateChain(definitions: PackageDefinition[]): string[] {
	const errors: string[] = [];
	const seen = new Set<string>();
	const known = new Set(definitions.map((d) => d.name));

	for (const definition of definitions) {
		if (seen.has(definition.name)) {
			errors.push(`${definition.name} is listed more than once`);
		}
		for (const dep of definition.dependsOn) {
			if (!known.has(dep)) {
				errors.push(`${definition.name} depends on unknown package ${dep}`);
			} else if (!seen.has(dep)) {
				errors.push(`${definition.name} depends on ${dep} but ${dep} comes later in the package table`);
			}
		}
		seen.add(definition.name);
	}

	return errors;
}

/**
 * Throw when the package table is inconsistent
 */
export function assertValidChain(definitions: PackageDefinition[]): void {
	const errors = validateChain(definitions);
	if (errors.length > 0) {
		throw new ValidationError(`Package table is invalid: ${errors.join("; ")}`, "packages", errors);
	}
}

/**
 * The canonical release order: strict packages in table order
 */
export function canonicalReleaseOrder(definitions: PackageDefinition[]): string[] {
	return definitions.filter((d) => d.strict).map((d) => d.name);
}

/**
 * Build the DependencyPinSet table (package → siblings it pins)
 */
export function buildPinSets(definitions: PackageDefinition[]): Map<string, string[]> {
	return new Map(definitions.map((d) => [d.name, [...d.dependsOn]]));
}

/**
 * Relative path of a package's version file
 */
export function versionFilePath(name: string): string {
	return join(name, "__init__.py");
}

/**
 * Extract the version string from version-file content
 */
export function parseVersion(content: string): string | undefined {
	const match = VERSION_PATTERN.exec(content);
	return match?.[1];
}

/**
 * Read a package's declared version from disk, fresh on every call
 */
export function readDeclaredVersion(packagePath: string, name: string): string | undefined {
	const file = join(packagePath, versionFilePath(name));
	if (!existsSync(file)) {
		return undefined;
	}
	return parseVersion(readFileSync(file, "utf-8"));
}

/**
 * Turn a table entry into a Package rooted under `root`
 */
export function toPackage(root: string, definition: PackageDefinition): Package {
	const filesystemPath = resolve(root, definition.name);
	return {
		name: definition.name,
		filesystemPath,
		isStrict: definition.strict,
		declaredVersion: readDeclaredVersion(filesystemPath, definition.name),
		registryName: definition.registryName ?? definition.name,
	};
}

/**
 * How the working set is chosen
 */
export type PackageSelection = { kind: "all" } | { kind: "list"; names: string[] } | { kind: "current"; cwd: string };

/**
 * Resolve a selection into packages, in table order for "all" and in the
 * given order for an explicit list.
 *
 * @throws ValidationError for unknown names or a cwd outside every package
 */
export function selectPackages(root: string, definitions: PackageDefinition[], selection: PackageSelection): Package[] {
	const byName = new Map(definitions.map((d) => [d.name, d]));

	switch (selection.kind) {
		case "all": {
			const present = definitions.filter((d) => existsSync(resolve(root, d.name)));
			for (const missing of definitions.filter((d) => !present.includes(d))) {
				releaseLogger.debug({ pkg: missing.name, root }, "Package directory not found, not selected");
			}
			return present.map((d) => toPackage(root, d));
		}
		case "list": {
			const unknown = selection.names.filter((n) => !byName.has(n));
			if (unknown.length > 0) {
				throw new ValidationError(
					`Unknown package(s): ${unknown.join(", ")}. Available: ${[...byName.keys()].join(", ")}`,
					"packages",
					unknown,
				);
			}
			const unique = [...new Set(selection.names)];
			return unique.flatMap((name) => {
				const definition = byName.get(name);
				return definition ? [toPackage(root, definition)] : [];
			});
		}
		case "current": {
			const cwd = resolve(selection.cwd);
			const match = definitions.find((d) => {
				const rel = relative(resolve(root, d.name), cwd);
				return rel === "" || (!rel.startsWith("..") && !rel.startsWith(sep) && !rel.includes(`..${sep}`));
			});
			if (!match) {
				throw new ValidationError(`Current directory ${cwd} is not inside a configured package`, "current");
			}
			return [toPackage(root, match)];
		}
	}
}
