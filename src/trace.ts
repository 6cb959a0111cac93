import type { GateEvent, GateEventBody, GateEventHandler, GateTracer } from "../types/trace.js"

/**
 * Trace
 *
 * In-memory gate event log. One tracer can be shared by several gated
 * middlewares; events are told apart by name.
 */
export function createTracer(): GateTracer {
    const log: GateEvent[] = []
    const callbacks = new Set<GateEventHandler>()
    let seq = 0

    return {
        get(): GateEvent[] {
            return [...log]
        },

        append(name: string, event: GateEventBody) {
            const eventWithTime: GateEvent = {
                ...event,
                name,
                time: { ms: Date.now(), seq: seq++ },
            }

            log.push(eventWithTime)
            callbacks.forEach(cb => cb(eventWithTime))
        },

        clear() {
            log.length = 0
        },

        onEvent(cb: GateEventHandler) {
            callbacks.add(cb)
            return () => {
                callbacks.delete(cb)
            }
        },
    }
}
