import { createPubSub, type Unsubscriber } from "@marianmeres/pubsub";
import {
	ConfigurationError,
	type ConfigurationIssue,
	InputRangeError,
	InternalConsistencyError,
} from "./errors.ts";
import {
	describeUniverse,
	MAX_UNIVERSE_SIZE,
	type Universe,
	type UniverseDescriptor,
} from "./universe.ts";

/**
 * Logger interface compatible with console.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/**
 * Default console-based logger that wraps console methods.
 * Returns the first argument as a string (or empty string if no args).
 */
const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? "");
	},
	log: (...args: unknown[]) => {
		console.log(...args);
		return String(args[0] ?? "");
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? "");
	},
	error: (...args: unknown[]) => {
		console.error(...args);
		return String(args[0] ?? "");
	},
};

/**
 * One cell of the transition table: on `input` in state `from`, go to `to`.
 *
 * @template TState - State ordinal type (usually a numeric enum)
 * @template TInput - Input ordinal type (usually a numeric enum)
 */
export type StateTransition<TState extends number, TInput extends number> = {
	from: TState;
	input: TInput;
	to: TState;
};

/** Which side of a state change a signal is triggered on. */
export type SignalDirection = "entered" | "exited";

/**
 * Notification identity for "the machine entered `state`" or "the machine
 * exited `state`". Both the state and the direction are part of the type, so an
 * observer is bound to one specific transition side without runtime filtering.
 */
export type StateSignal<
	TState extends number = number,
	TDirection extends SignalDirection = SignalDirection
> = {
	readonly state: TState;
	readonly direction: TDirection;
	/** Event name the signal is published under */
	readonly event: string;
};

/** Observers receive no payload; the signal they subscribed to is the message. */
export type Observer = () => void;

/**
 * Constructor configuration
 *
 * @template TState - State ordinal type
 * @template TInput - Input ordinal type
 */
export type StateMachineConfig<TState extends number, TInput extends number> = {
	/** State universe: a count, or a numeric enum with members `0..n-1` */
	states: Universe;
	/** Input universe: a count, or a numeric enum with members `0..n-1` */
	inputs: Universe;
	/** Applied right after construction, exactly as `addTransitions()` would */
	transitions?: readonly StateTransition<TState, TInput>[];
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Factory function to create a state machine instance.
 * Equivalent to calling `new StateMachine(config)`.
 *
 * @example
 * ```typescript
 * enum Light { Off, On }
 * enum Switch { Toggle }
 *
 * const lamp = createStateMachine<Light, Switch>({
 *   states: Light,
 *   inputs: Switch,
 *   transitions: [
 *     { from: Light.Off, input: Switch.Toggle, to: Light.On },
 *     { from: Light.On, input: Switch.Toggle, to: Light.Off },
 *   ],
 * });
 * ```
 */
export function createStateMachine<
	TState extends number = number,
	TInput extends number = number
>(config: StateMachineConfig<TState, TInput>): StateMachine<TState, TInput> {
	return new StateMachine<TState, TInput>(config);
}

function isSignalOf<TState extends number, S extends TState, D extends SignalDirection>(
	signal: StateSignal<TState, D>,
	state: S
): signal is StateSignal<S, D> {
	return signal.state === state;
}

/**
 * A flat, deterministic, table-driven finite state machine.
 *
 * States and inputs are ordinals of two fixed universes. Every (state, input)
 * cell of the transition table starts as a no-op self-loop, so an unconfigured
 * machine accepts every input and never moves. The machine starts in state `0`.
 *
 * Whenever `step()` actually changes the current state, the "exited" signal of
 * the old state is triggered, then the state changes, then the "entered" signal
 * of the new state is triggered. Self-loops are silent.
 *
 * @template TState - State ordinal type (usually a numeric enum)
 * @template TInput - Input ordinal type (usually a numeric enum)
 *
 * @example
 * ```typescript
 * enum State { Ready, Printing, Finished }
 * enum Input { Operate, Remove }
 *
 * const printer = new StateMachine<State, Input>({ states: State, inputs: Input });
 * printer.addTransitions([
 *   { from: State.Ready, input: Input.Operate, to: State.Printing },
 *   { from: State.Printing, input: Input.Operate, to: State.Finished },
 *   { from: State.Finished, input: Input.Remove, to: State.Ready },
 * ]);
 *
 * printer.onEnter(State.Printing, () => console.log("Starting the print..."));
 * printer.step(Input.Operate).step(Input.Operate);
 * ```
 */
export class StateMachine<TState extends number = number, TInput extends number = number> {
	#states: UniverseDescriptor;

	#inputs: UniverseDescriptor;

	/** Dense row-major `stateCount × inputCount` table of next states */
	#table: TState[] = [];

	#current: TState;

	#entered: StateSignal<TState, "entered">[] = [];

	#exited: StateSignal<TState, "exited">[] = [];

	/** Internal pub sub */
	#pubsub: ReturnType<typeof createPubSub>;

	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	constructor(config: StateMachineConfig<TState, TInput>) {
		this.#debug = config.debug ?? false;
		this.#logger = config.logger ?? defaultLogger;
		this.#pubsub = createPubSub({
			onError: (e, topic) =>
				this.#logger.error("[StateMachine]", `observer of "${topic}" failed`, e),
		});
		this.#states = describeUniverse("state", config.states);
		this.#inputs = describeUniverse("input", config.inputs);

		const cells = this.#states.size * this.#inputs.size;
		if (cells > MAX_UNIVERSE_SIZE) {
			throw new ConfigurationError([
				{ reason: `transition table of ${cells} cells exceeds ${MAX_UNIVERSE_SIZE}` },
			]);
		}

		for (let s = 0; s < this.#states.size; s++) {
			const state = this.#asState(s);
			// every input is a no-op until configured otherwise
			for (let i = 0; i < this.#inputs.size; i++) this.#table.push(state);
			const entered: StateSignal<TState, "entered"> = {
				state,
				direction: "entered",
				event: `entered:${s}`,
			};
			const exited: StateSignal<TState, "exited"> = {
				state,
				direction: "exited",
				event: `exited:${s}`,
			};
			this.#entered.push(Object.freeze(entered));
			this.#exited.push(Object.freeze(exited));
		}

		this.#current = this.#asState(0);
		this.#debugLog(
			`created with ${this.#states.size} states and ${this.#inputs.size} inputs`
		);

		if (config.transitions) this.addTransitions(config.transitions);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[StateMachine]", ...args);
		}
	}

	#isState(value: number): value is TState {
		return Number.isInteger(value) && value >= 0 && value < this.#states.size;
	}

	#isInput(value: number): value is TInput {
		return Number.isInteger(value) && value >= 0 && value < this.#inputs.size;
	}

	#asState(value: number): TState {
		if (!this.#isState(value)) throw new InternalConsistencyError(value);
		return value;
	}

	#index(state: TState, input: TInput): number {
		return state * this.#inputs.size + input;
	}

	/** Returns whether debug mode is enabled. */
	get debug(): boolean {
		return this.#debug;
	}

	/** Returns the logger instance used by this machine. */
	get logger(): Logger {
		return this.#logger;
	}

	/** Count of states in the machine */
	get stateCount(): number {
		return this.#states.size;
	}

	/** Count of inputs of the machine */
	get inputCount(): number {
		return this.#inputs.size;
	}

	/**
	 * Returns the current state. Initially the state with ordinal `0`.
	 * This is a non-reactive getter; subscribe to signals for updates.
	 */
	get current(): TState {
		return this.#current;
	}

	/** Checks whether the machine is currently in the given state. */
	is(state: TState): boolean {
		return this.#current === state;
	}

	/** Display name of a state (its enum key, or its ordinal for counted universes). */
	stateName(state: TState): string {
		if (!this.#isState(state)) {
			throw new ConfigurationError([{ reason: `Unknown state ${state}` }]);
		}
		return this.#states.names[state];
	}

	/** Display name of an input (its enum key, or its ordinal for counted universes). */
	inputName(input: TInput): string {
		if (!this.#isInput(input)) {
			throw new ConfigurationError([{ reason: `Unknown input ${input}` }]);
		}
		return this.#inputs.names[input];
	}

	/**
	 * Returns the state the machine would go to on `input` from `state`,
	 * without stepping.
	 * @throws ConfigurationError if either value is out of its universe
	 */
	lookup(state: TState, input: TInput): TState {
		const issues: ConfigurationIssue[] = [];
		if (!this.#isState(state)) issues.push({ reason: `Unknown state ${state}` });
		if (!this.#isInput(input)) issues.push({ reason: `Unknown input ${input}` });
		if (issues.length) throw new ConfigurationError(issues);
		return this.#table[this.#index(state, input)];
	}

	/**
	 * Writes the given transitions into the table, in order. When the same
	 * (from, input) cell is listed more than once, the last entry wins. Cells not
	 * listed are left untouched.
	 *
	 * The whole list is validated first: if any transition refers to a state or
	 * input outside of the machine's universes, nothing is written.
	 *
	 * @returns The machine instance for chaining
	 * @throws ConfigurationError listing every offending transition
	 */
	addTransitions(transitions: readonly StateTransition<TState, TInput>[]): this {
		const issues: ConfigurationIssue[] = [];
		transitions.forEach((transition, index) => {
			const { from, input, to } = transition;
			if (!this.#isState(from) || !this.#isInput(input) || !this.#isState(to)) {
				issues.push({ index, transition, reason: "out-of-bounds transition" });
			}
		});
		if (issues.length) throw new ConfigurationError(issues);

		for (const { from, input, to } of transitions) {
			this.#table[this.#index(from, input)] = to;
		}
		this.#debugLog(`addTransitions() applied ${transitions.length} transitions`);

		return this;
	}

	/**
	 * Steps the machine.
	 *
	 * Looks up the next state for `input`. If it differs from the current one:
	 * 1. the "exited" signal of the current state is triggered (observers still
	 *    see the old state as `current`)
	 * 2. the current state changes
	 * 3. the "entered" signal of the new state is triggered
	 *
	 * Observers run synchronously. They may call `step()` again; nested steps
	 * run depth-first and nothing guards against endless cycles.
	 *
	 * @returns The machine instance for chaining
	 * @throws InputRangeError if `input` is outside of the input universe
	 */
	step(input: TInput): this {
		if (!this.#isInput(input)) {
			throw new InputRangeError(input, this.#inputs.size);
		}

		const previous = this.#current;
		const next = this.#table[this.#index(previous, input)];

		if (next === previous) {
			this.#debugLog(
				`step(${this.#inputs.names[input]}) no-op in "${this.#states.names[previous]}"`
			);
			return this;
		}

		this.#debugLog(
			`step(${this.#inputs.names[input]}): "${this.#states.names[previous]}" -> "${this.#states.names[next]}"`
		);

		this.#dispatch(this.#exited, "exited", previous);
		this.#current = next;
		this.#dispatch(this.#entered, "entered", next);

		return this;
	}

	#dispatch(
		signals: readonly StateSignal<TState>[],
		direction: SignalDirection,
		state: number
	): void {
		const signal = signals[state];
		if (signal === undefined) {
			throw new InternalConsistencyError(state, direction);
		}
		this.#debugLog(`triggering "${signal.event}"`);
		this.#pubsub.publish(signal.event, signal);
	}

	#signalOf<S extends TState, D extends SignalDirection>(
		signals: readonly StateSignal<TState, D>[],
		direction: D,
		state: S
	): StateSignal<S, D> {
		const signal: StateSignal<TState, D> | undefined = signals[state];
		// the state check also narrows the signal to the requested literal state
		if (signal !== undefined && isSignalOf(signal, state)) return signal;
		throw new ConfigurationError([
			{ reason: `Cannot get "${direction}" signal of unknown state ${state}` },
		]);
	}

	/**
	 * Returns the signal triggered when the machine enters `state` from a
	 * different one. The same object is returned on every call.
	 */
	entered<S extends TState>(state: S): StateSignal<S, "entered"> {
		return this.#signalOf(this.#entered, "entered", state);
	}

	/**
	 * Returns the signal triggered when the machine leaves `state` for a
	 * different one. The same object is returned on every call.
	 */
	exited<S extends TState>(state: S): StateSignal<S, "exited"> {
		return this.#signalOf(this.#exited, "exited", state);
	}

	/**
	 * Subscribes an observer to one signal of this machine.
	 *
	 * @returns Unsubscriber function to stop receiving notifications
	 * @throws ConfigurationError if the signal belongs to another machine
	 *
	 * @example
	 * ```typescript
	 * const unsub = printer.subscribe(printer.exited(State.Printing), () => {
	 *   console.log("Finishing the print...");
	 * });
	 * // Later: unsub() to stop listening
	 * ```
	 */
	subscribe(signal: StateSignal<TState>, observer: Observer): Unsubscriber {
		const signals: readonly StateSignal<TState>[] =
			signal.direction === "entered" ? this.#entered : this.#exited;
		if (signals[signal.state] !== signal) {
			throw new ConfigurationError([
				{ reason: `Signal "${signal.event}" does not belong to this machine` },
			]);
		}
		this.#debugLog(`subscribe("${signal.event}") called`);
		return this.#pubsub.subscribe(signal.event, () => observer());
	}

	/** Shortcut for `subscribe(entered(state), observer)`. */
	onEnter(state: TState, observer: Observer): Unsubscriber {
		return this.subscribe(this.entered(state), observer);
	}

	/** Shortcut for `subscribe(exited(state), observer)`. */
	onExit(state: TState, observer: Observer): Unsubscriber {
		return this.subscribe(this.exited(state), observer);
	}

	/**
	 * Generates a Mermaid stateDiagram-v2 notation from the transition table.
	 * Only cells that lead to a different state are drawn; self-loops are
	 * no-ops and therefore left out.
	 *
	 * @example
	 * ```typescript
	 * console.log(printer.toMermaid());
	 * // stateDiagram-v2
	 * //     [*] --> Ready
	 * //     Ready --> Printing: Operate
	 * ```
	 */
	toMermaid(): string {
		const { names: stateNames } = this.#states;
		const { names: inputNames } = this.#inputs;

		let mermaid = "stateDiagram-v2\n";
		mermaid += `    [*] --> ${stateNames[0]}\n`;

		for (let s = 0; s < this.#states.size; s++) {
			for (let i = 0; i < this.#inputs.size; i++) {
				const to = this.#table[s * this.#inputs.size + i];
				if (to === s) continue;
				mermaid += `    ${stateNames[s]} --> ${stateNames[to]}: ${inputNames[i]}\n`;
			}
		}

		return mermaid;
	}
}
