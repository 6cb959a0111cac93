/**
 * GATED IO MIDDLEWARE (request/response hosts)
 *
 * Same gating as GatedMiddleware for hosts that pass the state reader on
 * every handle() call and run the returned IO later.
 *
 * The IO may run after the reducer has mutated state, so both predicates are
 * evaluated again when each inner dispatch happens, against the state at
 * that moment. Nothing is queued: a dispatch that fails either check is
 * dropped.
 */

import type { ActionSource, GetState } from "../types/action.js"
import type { GateDescription } from "../types/gate.js"
import type { IOMiddleware } from "../types/middleware.js"
import { resolveGateOptions, type Gateable, type GatedOptions } from "./gateOptions.js"
import { IO } from "./IO.js"

export type GatedIOMiddlewareDef<TInputAction, TOutputAction, TState, TControl> = {
    middleware: IOMiddleware<TInputAction, TOutputAction, TState>
    options: GatedOptions<TInputAction, TState, TControl>
    defaultName?: string
}

export interface GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState>
    extends IOMiddleware<TInputAction, TOutputAction, TState>,
        Gateable<TInputAction, TState, GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState>> {
    readonly name: string
    readonly inner: IOMiddleware<TInputAction, TOutputAction, TState>
    describeGate(): GateDescription
    /** After this, pending IO effects dispatch nothing. Idempotent. */
    dispose(): void
    readonly disposed: boolean
}

export function GatedIOMiddleware<TInputAction, TOutputAction, TState, TControl>(
    def: GatedIOMiddlewareDef<TInputAction, TOutputAction, TState, TControl>
): GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState> {
    const { middleware } = def
    const { gate, name, trace } = resolveGateOptions<TInputAction, TOutputAction, TState, TControl>(
        def.options,
        def.defaultName
    )
    let disposed = false

    const instance: GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState> = {
        name,
        inner: middleware,

        get disposed() {
            return disposed
        },

        handle(action: TInputAction, source: ActionSource, getState: GetState<TState>): IO<TOutputAction> {
            if (disposed || !gate.shouldHandleAction(action, getState())) {
                trace?.append(name, { type: "action:bypassed", action })
                return IO.pure()
            }

            trace?.append(name, { type: "action:forwarded", action })
            return middleware.handle(action, source, getState).flatMap(dispatched => {
                if (disposed) {
                    trace?.append(name, { type: "dispatch:dropped", action: dispatched.action, reason: "disposed" })
                    return IO.pure<TOutputAction>()
                }

                const state = getState()
                if (!gate.shouldHandleAction(action, state) || !gate.shouldDispatchAction(dispatched.action, state)) {
                    trace?.append(name, { type: "dispatch:dropped", action: dispatched.action, reason: "gate" })
                    return IO.pure<TOutputAction>()
                }

                trace?.append(name, { type: "dispatch:forwarded", action: dispatched.action })
                return IO.dispatch(dispatched)
            })
        },

        dispose(): void {
            if (disposed) return
            disposed = true
            trace?.append(name, { type: "middleware:disposed" })
        },

        describeGate(): GateDescription {
            return gate.describe()
        },

        gated<TOuterControl>(options: GatedOptions<TInputAction, TState, TOuterControl>) {
            return GatedIOMiddleware({ middleware: instance, options, defaultName: name })
        }
    }
    return instance
}
