// Public API
export { GateState, GateStateParseError, isGateState, encodeGateState, parseGateState, gateStateFromBoolean } from "./GateState.js"
export { gated, gatedIO } from "./gated.js"
export type {
    ControlActionOptions,
    BooleanControlActionOptions,
    GateStateControlActionOptions,
    StateOptions,
    StateKeyOptions,
    GateKey,
    GatedOptions,
    Gateable
} from "./gateOptions.js"
export * from "./defineMiddleware.js"

export type { GatedMiddlewareInstance } from "./GatedMiddleware.js"
export type { GatedIOMiddlewareInstance } from "./GatedIOMiddleware.js"

// Host contract helpers
export { AfterReducer } from "./AfterReducer.js"
export { IO } from "./IO.js"
export { actionSource } from "./actionSource.js"

// Tracing
export { createTracer } from "./trace.js"
export { formatEvent, printEvents } from "./print.js"

export type * from "../types/mod.js"
