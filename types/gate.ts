/**
 * GATE TYPES
 *
 * A gate decides, per action, whether the inner middleware takes part in the
 * pipeline. It holds two predicates and nothing else the composite relies on.
 */

import type { GateState } from "../src/GateState.js"
import type { GateTracer } from "./trace.js"

/**
 * Gate strategy.
 *
 * shouldHandleAction: may the incoming action reach the inner middleware?
 * shouldDispatchAction: may an action emitted by the inner middleware reach the store?
 *
 * INVARIANT: both predicates are re-evaluated at every call; no result is cached.
 */
export type Gate<TInputAction, TOutputAction, TState> = {
    shouldHandleAction(action: TInputAction, state: TState): boolean
    shouldDispatchAction(action: TOutputAction, state: TState): boolean
    /** Snapshot of the strategy for introspection and tracing */
    describe(): GateDescription
}

export type GateDescription =
    | { strategy: "action"; current: GateState }
    | { strategy: "state" }

/** Comparator used to match control payloads against turnOn/turnOff. */
export type PayloadEquality<TControl> = (a: TControl, b: TControl) => boolean

/**
 * Configuration for the by-action strategy.
 *
 * controlAction returns undefined for ordinary actions, and a payload for
 * control actions. Any payload, matching or not, makes the action a control
 * action.
 */
export type GateByActionConfig<TInputAction, TControl> = {
    controlAction: (action: TInputAction) => TControl | undefined
    turnOn: TControl
    turnOff: TControl
    initial: GateState
    /** Defaults to Object.is */
    equals?: PayloadEquality<TControl>
    name?: string
    trace?: GateTracer
}

/** Configuration for the by-state strategy. */
export type GateByStateConfig<TState> = {
    project: (state: TState) => GateState
}
