/**
 * Registry Availability Checker
 *
 * Confirms that a project's version is already published, by reading the
 * registry's JSON metadata (`<registryUrl>/<project>/json`, whose `releases`
 * field maps version strings to files). Fail-closed: a transport error, a
 * non-200 response or an unparseable body all count as "not available".
 */

import { z } from "zod";
import { TIMEOUT_REGISTRY_MS } from "./constants.js";
import { errorMessage } from "./errors.js";
import { registryLogger } from "./logger.js";

const ProjectMetadataSchema = z.object({
	releases: z.record(z.string(), z.unknown()),
});

export type FetchLike = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<Response>;

export interface RegistryCheckOptions {
	registryUrl: string;
	timeoutMs?: number;
	fetchImpl?: FetchLike;
}

export type Availability = { available: true } | { available: false; reason: string };

/**
 * Metadata URL of a project
 */
export function projectMetadataUrl(registryUrl: string, project: string): string {
	return `${registryUrl.replace(/\/+$/, "")}/${encodeURIComponent(project)}/json`;
}

/**
 * Check whether `project==version` is visible on the registry
 */
export async function checkVersionAvailable(
	project: string,
	version: string,
	options: RegistryCheckOptions,
): Promise<Availability> {
	const url = projectMetadataUrl(options.registryUrl, project);
	const timeoutMs = options.timeoutMs ?? TIMEOUT_REGISTRY_MS;
	const fetchImpl: FetchLike = options.fetchImpl ?? fetch;

	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
	try {
		const response = await fetchImpl(url, {
			signal: controller.signal,
			headers: { Accept: "application/json", "User-Agent": "release-train" },
		});
		if (!response.ok) {
			return { available: false, reason: `${url} returned HTTP ${response.status}` };
		}

		const parsed = ProjectMetadataSchema.safeParse(await response.json());
		if (!parsed.success) {
			return { available: false, reason: `${url} returned unexpected metadata` };
		}
		if (!Object.hasOwn(parsed.data.releases, version)) {
			return { available: false, reason: `${project}==${version} is not published` };
		}
		return { available: true };
	} catch (error) {
		const reason = controller.signal.aborted ? `${url} timed out after ${timeoutMs}ms` : errorMessage(error);
		registryLogger.debug({ url, reason }, "Registry query failed");
		return { available: false, reason };
	} finally {
		clearTimeout(timeoutId);
	}
}
