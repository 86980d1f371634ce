/**
 * Logger Module
 *
 * Pino-based structured logging for the release process.
 * Provides child loggers for the pipeline components (release, git, build, ci, registry, config).
 *
 * Operator-facing progress lines go through output.ts; these loggers carry
 * the structured detail behind them.
 */

import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";

export const logger = pino({
	level: process.env.LOG_LEVEL || (isDev ? "debug" : "info"),
	transport: isDev
		? {
				target: "pino-pretty",
				options: {
					colorize: true,
					ignore: "pid,hostname",
					translateTime: "HH:MM:ss",
				},
			}
		: undefined,
});

// Child loggers for different components
export const releaseLogger = logger.child({ module: "release" });
export const gitLogger = logger.child({ module: "git" });
export const buildLogger = logger.child({ module: "build" });
// ciLogger covers both workflow runs and pull requests
export const ciLogger = logger.child({ module: "ci" });
export const registryLogger = logger.child({ module: "registry" });
export const configLogger = logger.child({ module: "config" });

const childLoggers = [releaseLogger, gitLogger, buildLogger, ciLogger, registryLogger, configLogger];

/**
 * Raise every logger to debug (used by --verbose). Pino children copy the
 * level when created, so each one is set explicitly.
 */
export function enableVerboseLogging(): void {
	logger.level = "debug";
	for (const child of childLoggers) {
		child.level = "debug";
	}
}
