import type { SignalDirection, StateTransition } from "./state-machine.ts";

/**
 * A single problem found while validating configuration.
 * `index` is the position in the supplied transitions list, when applicable.
 */
export type ConfigurationIssue = {
	index?: number;
	transition?: StateTransition<number, number>;
	reason: string;
};

/** Base class of all errors thrown by this package. */
export class StateMachineError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Thrown when the machine is configured with values outside of its declared
 * universes (or with a malformed universe). This is a programming error in the
 * caller's static configuration, not a data-driven failure.
 */
export class ConfigurationError extends StateMachineError {
	readonly issues: ConfigurationIssue[];

	constructor(issues: ConfigurationIssue[]) {
		super(formatIssues(issues));
		this.issues = issues;
	}
}

/** Thrown by `step()` for an input outside of `[0, inputCount)`. */
export class InputRangeError extends StateMachineError {
	readonly input: number;

	constructor(input: number, inputCount: number) {
		super(`Input ${input} is out of range [0, ${inputCount})`);
		this.input = input;
	}
}

/**
 * Thrown when the machine meets a state ordinal outside of its own universe,
 * e.g. when notification dispatch is asked for a state it has no signal for.
 * Means the current-state invariant was broken; never recoverable.
 */
export class InternalConsistencyError extends StateMachineError {
	readonly state: number;
	readonly direction?: SignalDirection;

	constructor(state: number, direction?: SignalDirection) {
		super(
			direction
				? `No "${direction}" signal exists for state ${state}`
				: `State ${state} is outside of the state universe`
		);
		this.state = state;
		this.direction = direction;
	}
}

function formatIssues(issues: ConfigurationIssue[]): string {
	const lines = issues.map(({ index, transition, reason }) => {
		let line = reason;
		if (transition) {
			const { from, input, to } = transition;
			line += ` (from: ${from}, input: ${input}, to: ${to})`;
		}
		if (index !== undefined) line = `#${index}: ${line}`;
		return line;
	});
	return `Invalid state machine configuration: ${lines.join("; ")}`;
}
