/**
 * GATED COMBINATORS
 *
 * Build a gated middleware from an existing one plus gating options.
 * Every call creates an independent composite with its own gate.
 *
 * By action:
 *   gated(mw, { controlAction, turnOn, turnOff, default })
 *   gated(mw, { controlAction: a => boolean | undefined, default })    true opens, false closes
 *   gated(mw, { controlAction: a => GateState | undefined, default })  "active" opens, "bypass" closes
 *
 * By state:
 *   gated(mw, { state: s => GateState })
 *   gated(mw, { state: s => boolean })
 *   gated(mw, { stateKey: "sampleEnabled" })
 */

import type { IOMiddleware, Middleware } from "../types/middleware.js"
import type {
    BooleanControlActionOptions,
    ControlActionOptions,
    GatedOptions,
    GateStateControlActionOptions,
    StateKeyOptions,
    StateOptions
} from "./gateOptions.js"
import { GatedIOMiddleware, type GatedIOMiddlewareInstance } from "./GatedIOMiddleware.js"
import { GatedMiddleware, type GatedMiddlewareInstance } from "./GatedMiddleware.js"

export function gated<TInputAction, TOutputAction, TState, TControl>(
    middleware: Middleware<TInputAction, TOutputAction, TState>,
    options: ControlActionOptions<TInputAction, TControl>
): GatedMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gated<TInputAction, TOutputAction, TState>(
    middleware: Middleware<TInputAction, TOutputAction, TState>,
    options: BooleanControlActionOptions<TInputAction>
): GatedMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gated<TInputAction, TOutputAction, TState>(
    middleware: Middleware<TInputAction, TOutputAction, TState>,
    options: GateStateControlActionOptions<TInputAction>
): GatedMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gated<TInputAction, TOutputAction, TState>(
    middleware: Middleware<TInputAction, TOutputAction, TState>,
    options: StateOptions<TState>
): GatedMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gated<TInputAction, TOutputAction, TState>(
    middleware: Middleware<TInputAction, TOutputAction, TState>,
    options: StateKeyOptions<TState>
): GatedMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gated<TInputAction, TOutputAction, TState, TControl>(
    middleware: Middleware<TInputAction, TOutputAction, TState>,
    options: GatedOptions<TInputAction, TState, TControl>
): GatedMiddlewareInstance<TInputAction, TOutputAction, TState> {
    return GatedMiddleware({ middleware, options })
}

export function gatedIO<TInputAction, TOutputAction, TState, TControl>(
    middleware: IOMiddleware<TInputAction, TOutputAction, TState>,
    options: ControlActionOptions<TInputAction, TControl>
): GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gatedIO<TInputAction, TOutputAction, TState>(
    middleware: IOMiddleware<TInputAction, TOutputAction, TState>,
    options: BooleanControlActionOptions<TInputAction>
): GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gatedIO<TInputAction, TOutputAction, TState>(
    middleware: IOMiddleware<TInputAction, TOutputAction, TState>,
    options: GateStateControlActionOptions<TInputAction>
): GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gatedIO<TInputAction, TOutputAction, TState>(
    middleware: IOMiddleware<TInputAction, TOutputAction, TState>,
    options: StateOptions<TState>
): GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gatedIO<TInputAction, TOutputAction, TState>(
    middleware: IOMiddleware<TInputAction, TOutputAction, TState>,
    options: StateKeyOptions<TState>
): GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState>
export function gatedIO<TInputAction, TOutputAction, TState, TControl>(
    middleware: IOMiddleware<TInputAction, TOutputAction, TState>,
    options: GatedOptions<TInputAction, TState, TControl>
): GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState> {
    return GatedIOMiddleware({ middleware, options })
}
