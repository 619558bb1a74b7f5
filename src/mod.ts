/**
 * @module
 *
 * A small, typed, table-driven Finite State Machine.
 *
 * States and inputs are ordinals of two fixed universes (usually numeric enums).
 * The transition table is dense and every cell starts as a no-op. Observers
 * subscribe to one specific "entered X" or "exited X" signal and are notified
 * synchronously whenever a step actually changes the current state.
 *
 * @example Basic usage
 * ```typescript
 * import { createStateMachine } from "table-fsm";
 *
 * enum State { Ready, Printing, Finished }
 * enum Input { Operate, Remove }
 *
 * const printer = createStateMachine<State, Input>({
 *   states: State,
 *   inputs: Input,
 *   transitions: [
 *     { from: State.Ready, input: Input.Operate, to: State.Printing },
 *     { from: State.Printing, input: Input.Operate, to: State.Finished },
 *     { from: State.Finished, input: Input.Remove, to: State.Ready },
 *   ],
 * });
 *
 * printer.onEnter(State.Finished, () => console.log("Please remove the document."));
 * printer.step(Input.Operate).step(Input.Operate);
 * ```
 */

export * from "./state-machine.ts";
export * from "./universe.ts";
export * from "./errors.ts";
