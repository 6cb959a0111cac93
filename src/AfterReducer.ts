/**
 * AFTER REDUCER
 *
 * Continuation a Shape A middleware hands back from handle(). The store calls
 * reducerIsDone() once the reducer has processed the action, so the
 * middleware can observe the mutated state.
 */
export type AfterReducer = {
    reducerIsDone(): void
}

export const AfterReducer = {
    /** Continuation with no work. Returned whenever the inner middleware is skipped. */
    doNothing(): AfterReducer {
        return { reducerIsDone() {} }
    },

    do(work: () => void): AfterReducer {
        return { reducerIsDone: work }
    },
}
