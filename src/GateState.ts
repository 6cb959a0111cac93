/**
 * Defines if the gate is active or bypassing actions.
 *
 * While active, the inner middleware handles every action it receives.
 * While bypassed, it receives only control actions, so it still gets the
 * chance to stop timers or other async side-effects.
 *
 * The textual form is the lowercase member name, which is also what
 * JSON.stringify produces for state holding a GateState.
 */
export const GateState = {
    active: "active",
    bypass: "bypass",
} as const

export type GateState = typeof GateState[keyof typeof GateState]

export class GateStateParseError extends Error {
    readonly text: string

    constructor(text: string) {
        super(`Invalid gate state: "${text}" (expected "active" or "bypass")`)
        this.name = "GateStateParseError"
        this.text = text
    }
}

export function isGateState(value: unknown): value is GateState {
    return value === GateState.active || value === GateState.bypass
}

export function encodeGateState(state: GateState): string {
    return state
}

/** Case-sensitive. Throws GateStateParseError for anything else. */
export function parseGateState(text: string): GateState {
    if (!isGateState(text)) {
        throw new GateStateParseError(text)
    }
    return text
}

export function gateStateFromBoolean(flag: boolean): GateState {
    return flag ? GateState.active : GateState.bypass
}
