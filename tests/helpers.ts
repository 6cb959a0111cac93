/**
 * Test utilities for gated middleware testing.
 *
 * - A minimal store: state the test mutates directly, plus an output that records dispatches
 * - Sample middlewares for both host shapes that count every phase they go through
 */

import {
    AfterReducer,
    GateState,
    IO,
    actionSource,
    defineIOMiddleware,
    defineMiddleware,
    type ActionHandler,
    type GetState
} from "../src/exports.js"

export type AppState = {
    sampleEnabled: GateState
    featureOn: boolean
}

export type AppAction =
    | { type: "somethingElse" }
    | { type: "oneMore" }
    | { type: "toggleSampleMiddleware"; enabled: boolean }

export const somethingElse: AppAction = { type: "somethingElse" }
export const oneMore: AppAction = { type: "oneMore" }
export const toggleSample = (enabled: boolean): AppAction => ({ type: "toggleSampleMiddleware", enabled })

/** Control payload of an action, if it toggles the sample middleware. */
export const enableSample = (action: AppAction): boolean | undefined =>
    action.type === "toggleSampleMiddleware" ? action.enabled : undefined

export const here = actionSource("test")

/**
 * Stand-in for the host store. The reducer is the test itself: it mutates
 * `state` between handle() and reducerIsDone().
 */
export type TestStore = {
    state: AppState
    actionsReceived: AppAction[]
    getState: GetState<AppState>
    output: ActionHandler<AppAction>
}

export function createTestStore(initial: Partial<AppState> = {}): TestStore {
    const store: TestStore = {
        state: { sampleEnabled: GateState.active, featureOn: true, ...initial },
        actionsReceived: [],
        getState: () => store.state,
        output: {
            dispatch(action) {
                store.actionsReceived.push(action)
            }
        }
    }
    return store
}

export type PhaseCounts = {
    receiveContext: number
    handle: number
    afterReducer: number
}

/**
 * Context-then-handle middleware that counts its phases.
 * `send` emits through whatever output the middleware was given.
 */
export function createSampleMiddleware(options: {
    name?: string
    /** Action to emit from the after-reducer phase */
    emitAfterReducer?: (action: AppAction) => AppAction | undefined
} = {}) {
    const counts: PhaseCounts = { receiveContext: 0, handle: 0, afterReducer: 0 }
    let output: ActionHandler<AppAction> | undefined

    const middleware = defineMiddleware<AppAction, AppAction, AppState>({
        name: options.name ?? "sample",
        docs: "Counts its phases",
        receiveContext(_getState, nextOutput) {
            output = nextOutput
            counts.receiveContext += 1
        },
        handle(action) {
            counts.handle += 1
            return AfterReducer.do(() => {
                counts.afterReducer += 1
                const emitted = options.emitAfterReducer?.(action)
                if (emitted !== undefined) {
                    output?.dispatch(emitted, here)
                }
            })
        }
    })

    return {
        middleware,
        counts,
        send(action: AppAction) {
            output?.dispatch(action, here)
        }
    }
}

/**
 * Request/response middleware that counts handle() calls and how many of its
 * IO effects actually ran. Every effect dispatches `oneMore`.
 */
export function createSampleIOMiddleware(name = "sample-io") {
    const counts = { handle: 0, effectRuns: 0 }

    const middleware = defineIOMiddleware<AppAction, AppAction, AppState>({
        name,
        handle() {
            counts.handle += 1
            return IO.of<AppAction>(output => {
                counts.effectRuns += 1
                output.dispatch(oneMore, here)
            })
        }
    })

    return { middleware, counts }
}
