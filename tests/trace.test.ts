/**
 * Trace Tests
 *
 * Validates the gate event log and its console formatting.
 */

import { describe, test, expect, beforeAll } from "vitest"
import chalk from "chalk"
import { GateState, createTracer, formatEvent, gated, printEvents } from "../src/exports.js"
import {
    createSampleMiddleware,
    createTestStore,
    enableSample,
    here,
    oneMore,
    somethingElse,
    toggleSample
} from "./helpers.js"

beforeAll(() => {
    chalk.level = 0
})

function traceScenario() {
    const tracer = createTracer()
    const store = createTestStore()
    const sample = createSampleMiddleware()
    const gatedMiddleware = gated(sample.middleware, {
        controlAction: enableSample,
        default: GateState.active,
        name: "sampler",
        trace: tracer
    })
    gatedMiddleware.receiveContext(store.getState, store.output)

    return { tracer, store, sample, gatedMiddleware }
}

describe("createTracer", () => {
    test("records decisions in order", () => {
        const { tracer, sample, gatedMiddleware } = traceScenario()

        gatedMiddleware.handle(somethingElse, here)
        sample.send(oneMore)
        gatedMiddleware.handle(toggleSample(false), here)
        sample.send(oneMore)
        gatedMiddleware.handle(somethingElse, here)
        gatedMiddleware.dispose()
        sample.send(oneMore)

        const events = tracer.get().map(event => [event.time.seq, event.name, event.type])
        expect(events).toEqual([
            [0, "sampler", "action:forwarded"],
            [1, "sampler", "dispatch:forwarded"],
            [2, "sampler", "gate:toggle"],
            [3, "sampler", "action:forwarded"],
            [4, "sampler", "dispatch:dropped"],
            [5, "sampler", "action:bypassed"],
            [6, "sampler", "middleware:disposed"],
            [7, "sampler", "dispatch:dropped"],
        ])
    })

    test("toggle events carry both values, and repeats are not recorded", () => {
        const { tracer, gatedMiddleware } = traceScenario()

        gatedMiddleware.handle(toggleSample(false), here)
        gatedMiddleware.handle(toggleSample(false), here)

        const toggles = tracer.get().filter(event => event.type === "gate:toggle")
        expect(toggles).toHaveLength(1)
        expect(toggles[0]).toMatchObject({ type: "gate:toggle", from: "active", to: "bypass" })
    })

    test("onEvent subscribers can unsubscribe; clear() empties the log", () => {
        const tracer = createTracer()
        const seen: string[] = []
        const unsubscribe = tracer.onEvent(event => seen.push(event.type))

        tracer.append("a", { type: "middleware:disposed" })
        unsubscribe()
        tracer.append("a", { type: "middleware:disposed" })

        expect(seen).toEqual(["middleware:disposed"])
        expect(tracer.get()).toHaveLength(2)

        tracer.clear()
        expect(tracer.get()).toEqual([])
    })
})

describe("printEvents", () => {
    test("writes one formatted line per event", () => {
        const { tracer, sample, gatedMiddleware } = traceScenario()
        const lines: string[] = []
        const unsubscribe = printEvents(tracer, line => lines.push(line))

        gatedMiddleware.handle(somethingElse, here)
        gatedMiddleware.handle(toggleSample(false), here)
        sample.send(oneMore)
        gatedMiddleware.dispose()
        unsubscribe()
        gatedMiddleware.handle(somethingElse, here)

        expect(lines).toEqual([
            '✓ sampler handles {"type":"somethingElse"}',
            "→ sampler gate active -> bypass",
            '✓ sampler handles {"type":"toggleSampleMiddleware","enabled":false}',
            '✗ sampler dropped {"type":"oneMore"} (gate)',
            "· sampler disposed",
        ])
    })

    test("string actions are printed as-is", () => {
        expect(formatEvent({
            type: "action:bypassed",
            action: "tick",
            name: "timer",
            time: { ms: 0, seq: 0 }
        })).toBe("· timer bypassed tick")
    })
})
