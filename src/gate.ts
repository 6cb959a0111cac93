/**
 * GATE STRATEGIES
 *
 * by action: the gate value lives in the gate and is flipped by control actions.
 * by state:  the gate value is projected from the application state on every call.
 */

import type {
    Gate,
    GateByActionConfig,
    GateByStateConfig
} from "../types/gate.js"
import { GateState } from "./GateState.js"

/**
 * Gate driven by control actions.
 *
 * The cell `current` is the only mutable state of any gate and is written only
 * while evaluating shouldHandleAction. shouldDispatchAction reads it at call
 * time, so emissions made after a control action see the new value.
 *
 * INVARIANT: control actions are always handled, whatever the gate value.
 * INVARIANT: turnOn is compared before turnOff.
 */
export function gateByAction<TInputAction, TOutputAction, TState, TControl>(
    config: GateByActionConfig<TInputAction, TControl>
): Gate<TInputAction, TOutputAction, TState> {
    const equals = config.equals ?? Object.is
    const name = config.name ?? "gated"
    let current: GateState = config.initial

    const set = (next: GateState) => {
        if (next === current) return
        const from = current
        current = next
        config.trace?.append(name, { type: "gate:toggle", from, to: next })
    }

    return {
        shouldHandleAction(action) {
            const payload = config.controlAction(action)
            if (payload === undefined) {
                return current === GateState.active
            }

            if (equals(payload, config.turnOn)) {
                set(GateState.active)
            } else if (equals(payload, config.turnOff)) {
                set(GateState.bypass)
            }
            return true
        },

        shouldDispatchAction() {
            return current === GateState.active
        },

        describe() {
            return { strategy: "action", current }
        }
    }
}

/**
 * Gate driven by application state. Holds nothing; "control" is entirely the
 * reducer's business.
 */
export function gateByState<TInputAction, TOutputAction, TState>(
    config: GateByStateConfig<TState>
): Gate<TInputAction, TOutputAction, TState> {
    return {
        shouldHandleAction(_action, state) {
            return config.project(state) === GateState.active
        },

        shouldDispatchAction(_action, state) {
            return config.project(state) === GateState.active
        },

        describe() {
            return { strategy: "state" }
        }
    }
}
