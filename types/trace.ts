/**
 * TRACE TYPES
 *
 * Events recorded while a gated middleware makes its decisions.
 */

import type { GateState } from "../src/GateState.js"

export type EventTimestamp = {
    ms: number
    seq: number
}

export type GateEventBody =
    | { type: "gate:toggle"; from: GateState; to: GateState }
    | { type: "action:forwarded"; action: unknown }
    | { type: "action:bypassed"; action: unknown }
    | { type: "dispatch:forwarded"; action: unknown }
    | { type: "dispatch:dropped"; action: unknown; reason: "gate" | "disposed" }
    | { type: "middleware:disposed" }

/** A recorded gate event. `name` identifies the gated middleware. */
export type GateEvent = GateEventBody & {
    name: string
    time: EventTimestamp
}

export type GateEventHandler = (event: GateEvent) => void

/**
 * Event log shared by any number of gated middlewares.
 * onEvent returns its unsubscribe function.
 */
export type GateTracer = {
    append(name: string, event: GateEventBody): void
    get(): GateEvent[]
    clear(): void
    onEvent(handler: GateEventHandler): () => void
}
