// CHANGE: Platform prober (target architecture from dpkg)
// WHY: Architecture is part of the artifact name and of the control file
// PURITY: SHELL (runs an external tool)
// EFFECT: Effect<string, ProbeError, ProcessRunner>
// INVARIANT: result = trimEnd(stdout) ∧ result.length > 0
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { ProbeError } from "../../core/errors.js";
import { type ProcessRunner, runLogged } from "../process/runner.js";

export const ARCHITECTURE_PROBE = {
	command: "dpkg",
	args: ["--print-architecture"],
} as const;

/**
 * Asks dpkg for the architecture identifier (e.g. "amd64").
 *
 * @effect Effect<string, ProbeError, ProcessRunner>
 * @invariant one invocation per call, nothing cached
 */
export function probeArchitecture(): Effect.Effect<
	string,
	ProbeError,
	ProcessRunner
> {
	return Effect.gen(function* () {
		console.log("🔎 Detecting target architecture");
		const result = yield* runLogged({
			command: ARCHITECTURE_PROBE.command,
			args: ARCHITECTURE_PROBE.args,
			cwd: process.cwd(),
		}).pipe(
			Effect.mapError(
				(error) =>
					new ProbeError({ detail: `${error.command}: ${error.detail}` }),
			),
		);

		if (result.exitCode !== 0) {
			return yield* Effect.fail(
				new ProbeError({
					detail: `dpkg exited with ${result.exitCode}: ${result.stderr.trim()}`,
				}),
			);
		}

		const architecture = result.stdout.trimEnd();
		if (architecture.length === 0) {
			return yield* Effect.fail(
				new ProbeError({ detail: "dpkg printed no architecture" }),
			);
		}
		return architecture;
	});
}
