import type { ActionHandler, ActionSource, GetState } from "../types/action.js"
import type { IOMiddleware, Middleware } from "../types/middleware.js"
import type { AfterReducer } from "./AfterReducer.js"
import { GatedIOMiddleware, type GatedIOMiddlewareInstance } from "./GatedIOMiddleware.js"
import { GatedMiddleware, type GatedMiddlewareInstance } from "./GatedMiddleware.js"
import type { Gateable, GatedOptions } from "./gateOptions.js"
import type { IO } from "./IO.js"

export type MiddlewareDef<TInputAction, TOutputAction, TState> = {
    name: string
    docs?: string
    receiveContext?: (getState: GetState<TState>, output: ActionHandler<TOutputAction>) => void
    handle: (action: TInputAction, source: ActionSource) => AfterReducer
}

export type IOMiddlewareDef<TInputAction, TOutputAction, TState> = {
    name: string
    docs?: string
    handle: (action: TInputAction, source: ActionSource, getState: GetState<TState>) => IO<TOutputAction>
}

/**
 * A middleware that can gate itself.
 * `.gated()` takes the same options as gated(); the trace name defaults to the middleware name.
 */
export interface DefinedMiddleware<TInputAction, TOutputAction, TState>
    extends Middleware<TInputAction, TOutputAction, TState>,
        Gateable<TInputAction, TState, GatedMiddlewareInstance<TInputAction, TOutputAction, TState>> {
    readonly name: string
    readonly docs?: string
}

export interface DefinedIOMiddleware<TInputAction, TOutputAction, TState>
    extends IOMiddleware<TInputAction, TOutputAction, TState>,
        Gateable<TInputAction, TState, GatedIOMiddlewareInstance<TInputAction, TOutputAction, TState>> {
    readonly name: string
    readonly docs?: string
}

/**
 * Helper to define a context-then-handle middleware.
 * receiveContext is optional for middlewares that never read state nor emit.
 */
export function defineMiddleware<TInputAction, TOutputAction, TState>(
    input: MiddlewareDef<TInputAction, TOutputAction, TState>
): DefinedMiddleware<TInputAction, TOutputAction, TState> {
    const defined: DefinedMiddleware<TInputAction, TOutputAction, TState> = {
        name: input.name,
        docs: input.docs,

        receiveContext(getState, output) {
            input.receiveContext?.(getState, output)
        },

        handle(action, source) {
            return input.handle(action, source)
        },

        gated<TControl>(options: GatedOptions<TInputAction, TState, TControl>) {
            return GatedMiddleware({ middleware: defined, options, defaultName: input.name })
        }
    }
    return defined
}

/** Helper to define a request/response middleware. */
export function defineIOMiddleware<TInputAction, TOutputAction, TState>(
    input: IOMiddlewareDef<TInputAction, TOutputAction, TState>
): DefinedIOMiddleware<TInputAction, TOutputAction, TState> {
    const defined: DefinedIOMiddleware<TInputAction, TOutputAction, TState> = {
        name: input.name,
        docs: input.docs,

        handle(action, source, getState) {
            return input.handle(action, source, getState)
        },

        gated<TControl>(options: GatedOptions<TInputAction, TState, TControl>) {
            return GatedIOMiddleware({ middleware: defined, options, defaultName: input.name })
        }
    }
    return defined
}
