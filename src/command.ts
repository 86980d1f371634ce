/**
 * External Command Runner
 *
 * Runs an external tool as a child process under a wall-clock deadline.
 * On timeout the child's process group is terminated (SIGTERM, then SIGKILL
 * after a grace period) and the result is flagged `timedOut`; its output is
 * never used as a success signal.
 */

import { type ChildProcess, spawn } from "node:child_process";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

/** Grace period between SIGTERM and SIGKILL */
const KILL_GRACE_MS = 2_000;

export interface CommandResult {
	/** Exit status, or null when the process was killed or never started */
	exitCode: number | null;
	stdout: string;
	stderr: string;
	timedOut: boolean;
}

export interface RunCommandOptions {
	cwd: string;
	timeoutMs: number;
	env?: NodeJS.ProcessEnv;
}

/**
 * Signature shared by the real runner and test fakes
 */
export type CommandRunner = (command: string, args: string[], options: RunCommandOptions) => Promise<CommandResult>;

/**
 * Send a signal to the child's whole process group, so tools that fork
 * (build backends, compilers) are stopped together with the child
 */
function signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
	if (child.pid === undefined) {
		child.kill(signal);
		return;
	}
	try {
		process.kill(-child.pid, signal);
	} catch (error) {
		// ESRCH: every member of the group has already exited
		logger.debug({ pid: child.pid, signal, error: errorMessage(error) }, "Process group not signalled");
	}
}

/**
 * Run a command and collect its output
 *
 * The child leads its own process group. On timeout the group gets SIGTERM,
 * then SIGKILL after a grace period, and the promise settles as soon as the
 * child exits, without waiting for descendants still holding its pipes.
 *
 * Never rejects: spawn failures come back as `exitCode: null` with the
 * error text in stderr.
 */
export const runCommand: CommandRunner = (command, args, options) => {
	return new Promise((resolve) => {
		const child = spawn(command, args, {
			cwd: options.cwd,
			env: options.env ?? process.env,
			shell: false,
			detached: true,
		});

		let stdout = "";
		let stderr = "";
		let timedOut = false;
		let settled = false;

		const deadline = setTimeout(() => {
			timedOut = true;
			logger.warn({ command, args, timeoutMs: options.timeoutMs }, "Command timed out, terminating");
			signalGroup(child, "SIGTERM");
			// Left running after settling: descendants that ignored SIGTERM still get SIGKILL
			setTimeout(() => signalGroup(child, "SIGKILL"), KILL_GRACE_MS);
		}, options.timeoutMs);

		const finish = (result: CommandResult): void => {
			if (settled) return;
			settled = true;
			clearTimeout(deadline);
			if (timedOut) {
				child.stdout.destroy();
				child.stderr.destroy();
			}
			resolve(result);
		};

		child.stdout.on("data", (data: Buffer) => {
			stdout += data.toString();
		});

		child.stderr.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		child.on("exit", () => {
			if (timedOut) {
				finish({ exitCode: null, stdout, stderr, timedOut });
			}
		});

		child.on("close", (code) => {
			finish({ exitCode: timedOut ? null : code, stdout, stderr, timedOut });
		});

		child.on("error", (error) => {
			finish({ exitCode: null, stdout, stderr: stderr + error.message, timedOut });
		});
	});
};

/**
 * Render a command line for messages
 */
export function formatCommand(command: string, args: string[]): string {
	return [command, ...args].join(" ");
}
