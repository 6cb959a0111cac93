/**
 * GATED MIDDLEWARE TYPE SYSTEM
 *
 * Barrel export for all type modules.
 */

// Host contract
export type {
    GetState,
    ActionSource,
    DispatchedAction,
    ActionHandler
} from "./action.js"

// Middleware shapes
export type {
    Middleware,
    IOMiddleware
} from "./middleware.js"

// Gate strategies
export type {
    Gate,
    GateDescription,
    PayloadEquality,
    GateByActionConfig,
    GateByStateConfig
} from "./gate.js"

// Tracing
export type {
    EventTimestamp,
    GateEventBody,
    GateEvent,
    GateEventHandler,
    GateTracer
} from "./trace.js"
