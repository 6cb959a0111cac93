/**
 * GateState Tests
 *
 * Validates the textual encoding and the boolean mapping.
 */

import { describe, test, expect } from "vitest"
import {
    GateState,
    GateStateParseError,
    encodeGateState,
    gateStateFromBoolean,
    isGateState,
    parseGateState
} from "../src/exports.js"

describe("GateState", () => {
    test("encodes as the lowercase member name", () => {
        expect(encodeGateState(GateState.active)).toBe("active")
        expect(encodeGateState(GateState.bypass)).toBe("bypass")
    })

    test("parses its own encoding back", () => {
        expect(parseGateState("active")).toBe(GateState.active)
        expect(parseGateState("bypass")).toBe(GateState.bypass)
    })

    test("round-trips through JSON state", () => {
        const json = JSON.stringify({ sampleEnabled: GateState.bypass })
        expect(json).toBe('{"sampleEnabled":"bypass"}')

        const parsed: unknown = JSON.parse(json)
        const value = typeof parsed === "object" && parsed !== null && "sampleEnabled" in parsed
            ? parsed.sampleEnabled
            : undefined
        expect(isGateState(value)).toBe(true)
    })

    test("rejects unknown text, case-sensitively", () => {
        expect.assertions(4)

        expect(() => parseGateState("Active")).toThrow(GateStateParseError)
        expect(() => parseGateState("on")).toThrow('Invalid gate state: "on" (expected "active" or "bypass")')

        try {
            parseGateState("")
        } catch (error) {
            expect(error).toBeInstanceOf(GateStateParseError)
            expect(error instanceof GateStateParseError && error.text).toBe("")
        }
    })

    test("isGateState only accepts the two members", () => {
        expect(isGateState("active")).toBe(true)
        expect(isGateState("bypass")).toBe(true)
        expect(isGateState(true)).toBe(false)
        expect(isGateState(undefined)).toBe(false)
    })

    test("true maps to active, false to bypass", () => {
        expect(gateStateFromBoolean(true)).toBe(GateState.active)
        expect(gateStateFromBoolean(false)).toBe(GateState.bypass)
    })
})
