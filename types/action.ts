/**
 * ACTION TYPES
 *
 * Describes how actions travel between the host store and a middleware.
 * None of these are implemented by the gate; they are the narrow surface
 * consumed from the host.
 */

/** Zero-argument reader returning the current application state snapshot. */
export type GetState<TState> = () => TState

/**
 * Where an action was dispatched from.
 * Opaque to gating: passed through unmodified.
 */
export type ActionSource = {
    file: string
    func: string
    line: number
    info?: string
}

/**
 * An action paired with its source.
 * Carried by deferred effects until they reach an output sink.
 */
export type DispatchedAction<TAction> = {
    action: TAction
    dispatcher: ActionSource
}

/**
 * Output sink toward the store's dispatch/reducer pipeline.
 */
export type ActionHandler<TAction> = {
    dispatch(action: TAction, source: ActionSource): void
}
