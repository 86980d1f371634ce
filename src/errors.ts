/**
 * Custom Error Classes
 *
 * Domain-specific error types with proper Error subclassing and context properties.
 * All custom error classes in the application extend the base AppError class.
 */

import type { FailureOutcome } from "./types.js";

/**
 * Base application error class
 *
 * Uses Object.setPrototypeOf() to ensure instanceof checks work correctly
 * after TypeScript transpilation.
 *
 * @param message - Error message
 * @param code - Error code for categorization (e.g., 'VALIDATION_ERROR')
 */
export class AppError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

/**
 * Validation error for invalid configuration or input
 *
 * @param field - The setting or argument that failed validation
 * @param validationErrors - Optional list of individual problems
 *
 * @example
 * ```typescript
 * throw new ValidationError('Unknown package: foo', 'packages', ['foo']);
 * ```
 */
export class ValidationError extends AppError {
	constructor(
		message: string,
		public readonly field: string,
		public readonly validationErrors?: string[],
	) {
		super(message, "VALIDATION_ERROR");
		this.name = "ValidationError";
		Object.setPrototypeOf(this, ValidationError.prototype);
	}
}

/**
 * A git command exited non-zero
 *
 * @param command - The git command line that failed
 * @param exitCode - Exit status, when git produced one
 */
export class GitError extends AppError {
	constructor(
		message: string,
		public readonly command: string,
		public readonly exitCode?: number,
	) {
		super(message, "GIT_ERROR");
		this.name = "GitError";
		Object.setPrototypeOf(this, GitError.prototype);
	}
}

/**
 * An external tool (gh, build, artifact check) failed to run or exited non-zero
 */
export class CommandError extends AppError {
	constructor(
		message: string,
		public readonly command: string,
		public readonly exitCode?: number,
		public readonly output?: string,
	) {
		super(message, "COMMAND_ERROR");
		this.name = "CommandError";
		Object.setPrototypeOf(this, CommandError.prototype);
	}
}

/**
 * A pipeline stage ended a package in a failure outcome
 *
 * Thrown by stages, converted into a PackageResult by the orchestrator only.
 *
 * @example
 * ```typescript
 * throw new StageError('pushFailed', 'Rebase onto origin/dev failed');
 * ```
 */
export class StageError extends AppError {
	constructor(
		public readonly outcome: FailureOutcome,
		message: string,
	) {
		super(message, "STAGE_ERROR");
		this.name = "StageError";
		Object.setPrototypeOf(this, StageError.prototype);
	}
}

/**
 * Render any thrown value as a single message string
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
