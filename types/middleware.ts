/**
 * MIDDLEWARE TYPES
 *
 * The two host lifecycles a gated middleware can plug into.
 *
 * Shape A (context-then-handle): the store hands over a state reader and an
 * output sink once, then calls handle() per action. Work after the reducer is
 * returned as an AfterReducer continuation.
 *
 * Shape B (request/response): handle() receives the state reader on every
 * call and returns a deferred IO effect the store runs later against a real
 * output sink.
 */

import type { ActionHandler, ActionSource, GetState } from "./action.js"
import type { AfterReducer } from "../src/AfterReducer.js"
import type { IO } from "../src/IO.js"

/**
 * Shape A middleware.
 *
 * INVARIANT: receiveContext() is called before the first handle().
 * INVARIANT: the returned AfterReducer runs once the reducer has processed the action.
 */
export interface Middleware<TInputAction, TOutputAction, TState> {
    receiveContext(getState: GetState<TState>, output: ActionHandler<TOutputAction>): void
    handle(action: TInputAction, source: ActionSource): AfterReducer
}

/**
 * Shape B middleware.
 *
 * INVARIANT: the returned IO does nothing until run() is called with an output sink.
 */
export interface IOMiddleware<TInputAction, TOutputAction, TState> {
    handle(action: TInputAction, source: ActionSource, getState: GetState<TState>): IO<TOutputAction>
}
