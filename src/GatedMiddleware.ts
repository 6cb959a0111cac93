/**
 * GATED MIDDLEWARE (context-then-handle hosts)
 *
 * Owns one inner middleware and one gate. The gate decides whether an incoming
 * action reaches the inner middleware, and whether an action the inner
 * middleware emits reaches the store.
 *
 * Timing: handle() reads state before the reducer runs. When the inner
 * middleware is forwarded an action, its AfterReducer is returned untouched,
 * so its after-reducer logic runs even if the reducer closes the gate in
 * between. That is how it learns it is about to be bypassed. When the gate
 * is closed before the reducer, neither phase runs, even if the reducer
 * opens it; the next action is the first one the inner middleware sees.
 */

import type { ActionHandler, ActionSource, GetState } from "../types/action.js"
import type { GateDescription } from "../types/gate.js"
import type { Middleware } from "../types/middleware.js"
import { AfterReducer } from "./AfterReducer.js"
import { resolveGateOptions, type Gateable, type GatedOptions } from "./gateOptions.js"

export type GatedMiddlewareDef<TInputAction, TOutputAction, TState, TControl> = {
    middleware: Middleware<TInputAction, TOutputAction, TState>
    /** The gate is built from these and never leaves the composite. */
    options: GatedOptions<TInputAction, TState, TControl>
    /** Trace label when options carry no name. Defaults to "gated". */
    defaultName?: string
}

export interface GatedMiddlewareInstance<TInputAction, TOutputAction, TState>
    extends Middleware<TInputAction, TOutputAction, TState>,
        Gateable<TInputAction, TState, GatedMiddlewareInstance<TInputAction, TOutputAction, TState>> {
    readonly name: string
    readonly inner: Middleware<TInputAction, TOutputAction, TState>
    /** Read-only view of the gate */
    describeGate(): GateDescription
    /**
     * Tear the composite down. Emissions still in flight from the inner
     * middleware are dropped and later actions are not forwarded.
     * Idempotent.
     */
    dispose(): void
    readonly disposed: boolean
}

type HostContext<TOutputAction, TState> = {
    getState: GetState<TState>
    output: ActionHandler<TOutputAction>
}

export function GatedMiddleware<TInputAction, TOutputAction, TState, TControl>(
    def: GatedMiddlewareDef<TInputAction, TOutputAction, TState, TControl>
): GatedMiddlewareInstance<TInputAction, TOutputAction, TState> {
    const { middleware } = def
    const { gate, name, trace } = resolveGateOptions<TInputAction, TOutputAction, TState, TControl>(
        def.options,
        def.defaultName
    )

    // Cleared by dispose(). The output wrapper handed to the inner middleware
    // reaches the host only through this, never through its own capture.
    let context: HostContext<TOutputAction, TState> | undefined
    let disposed = false

    const gatedOutput: ActionHandler<TOutputAction> = {
        dispatch(action: TOutputAction, source: ActionSource) {
            if (context === undefined) {
                trace?.append(name, { type: "dispatch:dropped", action, reason: "disposed" })
                return
            }
            if (!gate.shouldDispatchAction(action, context.getState())) {
                trace?.append(name, { type: "dispatch:dropped", action, reason: "gate" })
                return
            }
            trace?.append(name, { type: "dispatch:forwarded", action })
            context.output.dispatch(action, source)
        }
    }

    const instance: GatedMiddlewareInstance<TInputAction, TOutputAction, TState> = {
        name,
        inner: middleware,

        get disposed() {
            return disposed
        },

        receiveContext(getState: GetState<TState>, output: ActionHandler<TOutputAction>): void {
            if (disposed) return
            context = { getState, output }
            middleware.receiveContext(getState, gatedOutput)
        },

        handle(action: TInputAction, source: ActionSource): AfterReducer {
            // No state reader yet: the gate counts as closed.
            if (context === undefined || !gate.shouldHandleAction(action, context.getState())) {
                trace?.append(name, { type: "action:bypassed", action })
                return AfterReducer.doNothing()
            }

            trace?.append(name, { type: "action:forwarded", action })
            return middleware.handle(action, source)
        },

        dispose(): void {
            if (disposed) return
            disposed = true
            context = undefined
            trace?.append(name, { type: "middleware:disposed" })
        },

        describeGate(): GateDescription {
            return gate.describe()
        },

        gated<TOuterControl>(options: GatedOptions<TInputAction, TState, TOuterControl>) {
            return GatedMiddleware({ middleware: instance, options, defaultName: name })
        }
    }
    return instance
}
