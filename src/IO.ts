/**
 * IO
 *
 * Deferred effect returned by Shape B middlewares. Nothing happens until the
 * store calls run() with a real output sink; by then the state may already
 * reflect the reducer's mutation.
 */

import type { ActionHandler, DispatchedAction } from "../types/action.js"

export class IO<TOutputAction> {
    private readonly effect: (output: ActionHandler<TOutputAction>) => void

    constructor(effect: (output: ActionHandler<TOutputAction>) => void) {
        this.effect = effect
    }

    /** Inert effect: nothing scheduled, nothing dispatched. */
    static pure<TOutputAction>(): IO<TOutputAction> {
        return new IO<TOutputAction>(() => {})
    }

    static of<TOutputAction>(effect: (output: ActionHandler<TOutputAction>) => void): IO<TOutputAction> {
        return new IO(effect)
    }

    static dispatch<TOutputAction>(dispatched: DispatchedAction<TOutputAction>): IO<TOutputAction> {
        return new IO<TOutputAction>(output => output.dispatch(dispatched.action, dispatched.dispatcher))
    }

    run(output: ActionHandler<TOutputAction>): void {
        this.effect(output)
    }

    /**
     * Feeds every action this effect dispatches into `transform`, and runs the
     * resulting effect against the same output. The transform is evaluated when
     * the dispatch happens, not when flatMap is called.
     */
    flatMap<TNext>(transform: (dispatched: DispatchedAction<TOutputAction>) => IO<TNext>): IO<TNext> {
        return new IO<TNext>(output => {
            this.run({
                dispatch(action, source) {
                    transform({ action, dispatcher: source }).run(output)
                }
            })
        })
    }
}
