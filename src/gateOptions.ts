/**
 * GATE OPTIONS
 *
 * Every way of describing a gate, and the one place they turn into a Gate.
 * Gates are built here and handed straight to a composite, which keeps them
 * private.
 */

import type { Gate, PayloadEquality } from "../types/gate.js"
import type { GateTracer } from "../types/trace.js"
import { gateByAction, gateByState } from "./gate.js"
import { GateState, gateStateFromBoolean, isGateState } from "./GateState.js"

type CommonOptions = {
    /** Label used in trace events */
    name?: string
    trace?: GateTracer
}

export type ControlActionOptions<TInputAction, TControl> = CommonOptions & {
    controlAction: (action: TInputAction) => TControl | undefined
    turnOn: TControl
    turnOff: TControl
    default: GateState
    equals?: PayloadEquality<TControl>
}

export type BooleanControlActionOptions<TInputAction> = CommonOptions & {
    controlAction: (action: TInputAction) => boolean | undefined
    default: GateState
}

export type GateStateControlActionOptions<TInputAction> = CommonOptions & {
    controlAction: (action: TInputAction) => GateState | undefined
    default: GateState
}

export type StateOptions<TState> = CommonOptions & {
    state: (state: TState) => GateState | boolean
}

/** Keys of TState whose value is a GateState or a boolean. */
export type GateKey<TState> = {
    [K in keyof TState]: TState[K] extends GateState | boolean ? K : never
}[keyof TState] & keyof TState

export type StateKeyOptions<TState> = CommonOptions & {
    stateKey: GateKey<TState>
}

export type GatedOptions<TInputAction, TState, TControl = unknown> =
    | ControlActionOptions<TInputAction, TControl>
    | BooleanControlActionOptions<TInputAction>
    | GateStateControlActionOptions<TInputAction>
    | StateOptions<TState>
    | StateKeyOptions<TState>

export type ResolvedGateOptions<TInputAction, TOutputAction, TState> = {
    gate: Gate<TInputAction, TOutputAction, TState>
    name: string
    trace?: GateTracer
}

const toGateState = (value: GateState | boolean): GateState =>
    typeof value === "boolean" ? gateStateFromBoolean(value) : value

/**
 * Turn any options form into a gate.
 * Boolean and GateState forms are normalised to GateState sentinels.
 */
export function resolveGateOptions<TInputAction, TOutputAction, TState, TControl>(
    options: GatedOptions<TInputAction, TState, TControl>,
    defaultName = "gated"
): ResolvedGateOptions<TInputAction, TOutputAction, TState> {
    const name = options.name ?? defaultName
    const trace = options.trace

    if ("stateKey" in options) {
        const key = options.stateKey
        return {
            name,
            trace,
            gate: gateByState<TInputAction, TOutputAction, TState>({
                project: (state: TState) => {
                    const value: unknown = state[key]
                    if (typeof value === "boolean") return gateStateFromBoolean(value)
                    return isGateState(value) ? value : GateState.bypass
                }
            })
        }
    }

    if ("state" in options) {
        const project = options.state
        return {
            name,
            trace,
            gate: gateByState<TInputAction, TOutputAction, TState>({ project: (state: TState) => toGateState(project(state)) })
        }
    }

    if ("turnOn" in options) {
        return {
            name,
            trace,
            gate: gateByAction<TInputAction, TOutputAction, TState, TControl>({
                controlAction: options.controlAction,
                turnOn: options.turnOn,
                turnOff: options.turnOff,
                initial: options.default,
                equals: options.equals,
                name,
                trace
            })
        }
    }

    const controlAction = options.controlAction
    return {
        name,
        trace,
        gate: gateByAction<TInputAction, TOutputAction, TState, GateState>({
            controlAction: (action: TInputAction) => {
                const payload = controlAction(action)
                return payload === undefined ? undefined : toGateState(payload)
            },
            turnOn: GateState.active,
            turnOff: GateState.bypass,
            initial: options.default,
            name,
            trace
        })
    }
}

/**
 * Anything that can wrap itself in a gate.
 * Each call yields a new composite with its own gate.
 */
export interface Gateable<TInputAction, TState, TGated> {
    gated<TControl>(options: ControlActionOptions<TInputAction, TControl>): TGated
    gated(options: BooleanControlActionOptions<TInputAction>): TGated
    gated(options: GateStateControlActionOptions<TInputAction>): TGated
    gated(options: StateOptions<TState>): TGated
    gated(options: StateKeyOptions<TState>): TGated
}
