// CHANGE: Narrow process-runner service for every external tool call
// WHY: Stages depend on a capability (command, args, cwd → stdout + exit status), tests swap in a fake
// PURITY: SHELL (spawns processes)
// EFFECT: Effect<ProcessResult, ExecError, ProcessRunner>
// INVARIANT: non-zero exit is a result, not an error; only a failed spawn or a signal is ExecError
// COMPLEXITY: O(n) space where n = captured output length

import { Context, Effect, Layer } from "effect";

import { ExecError } from "../../core/errors.js";
import { execFile } from "../../utils/node-mods.js";

export interface ProcessInvocation {
	readonly command: string;
	readonly args: readonly string[];
	/** Working directory of the child; the packager's own cwd never changes */
	readonly cwd: string;
}

export interface ProcessResult {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * External process capability.
 *
 * @effect Effect<ProcessResult, ExecError>
 */
export class ProcessRunner extends Context.Tag("ProcessRunner")<
	ProcessRunner,
	{
		readonly run: (
			invocation: ProcessInvocation,
		) => Effect.Effect<ProcessResult, ExecError>;
	}
>() {}

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

/**
 * Human-readable command line for logs and error messages.
 *
 * @pure true
 */
export const formatCommand = (invocation: ProcessInvocation): string =>
	[invocation.command, ...invocation.args].join(" ");

/**
 * Runs a command without a shell and captures its output as UTF-8 text.
 *
 * @pure false - spawns a child process and blocks the pipeline until it exits
 */
function runWithExecFile(
	invocation: ProcessInvocation,
): Effect.Effect<ProcessResult, ExecError> {
	return Effect.async<ProcessResult, ExecError>((resume) => {
		execFile(
			invocation.command,
			[...invocation.args],
			{ cwd: invocation.cwd, encoding: "utf8", maxBuffer: MAX_OUTPUT_BYTES },
			(error, stdout, stderr) => {
				if (error === null) {
					resume(Effect.succeed({ exitCode: 0, stdout, stderr }));
					return;
				}
				// numeric code = process ran and exited non-zero; string code = spawn failure (ENOENT, EACCES)
				if (typeof error.code === "number") {
					resume(Effect.succeed({ exitCode: error.code, stdout, stderr }));
					return;
				}
				resume(
					Effect.fail(
						new ExecError({
							command: formatCommand(invocation),
							detail:
								typeof error.signal === "string"
									? `killed by ${error.signal}`
									: error.message,
						}),
					),
				);
			},
		);
	});
}

/**
 * Live layer backed by `node:child_process.execFile`.
 */
export const ProcessRunnerLive: Layer.Layer<ProcessRunner> = Layer.succeed(
	ProcessRunner,
	{ run: runWithExecFile },
);

/**
 * Runs a command through the current ProcessRunner, logging it first
 * so the step can be repeated by hand.
 *
 * @effect Effect<ProcessResult, ExecError, ProcessRunner>
 */
export function runLogged(
	invocation: ProcessInvocation,
): Effect.Effect<ProcessResult, ExecError, ProcessRunner> {
	return Effect.gen(function* () {
		const runner = yield* ProcessRunner;
		console.log(`   ↳ Command: ${formatCommand(invocation)}`);
		return yield* runner.run(invocation);
	});
}
