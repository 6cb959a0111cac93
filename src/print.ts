import chalk from "chalk"
import type { GateEvent, GateTracer } from "../types/trace.js"

function describeAction(action: unknown): string {
    if (typeof action === "string") return action
    const json = JSON.stringify(action)
    return json === undefined ? String(action) : json
}

/** One console line per gate event. Colour follows chalk's detected level. */
export function formatEvent(event: GateEvent): string {
    const name = chalk.bold(event.name)

    switch (event.type) {
        case "gate:toggle":
            return `${chalk.cyan("→")} ${name} gate ${event.from} -> ${event.to}`
        case "action:forwarded":
            return `${chalk.green("✓")} ${name} handles ${chalk.dim(describeAction(event.action))}`
        case "action:bypassed":
            return `${chalk.dim("·")} ${name} bypassed ${chalk.dim(describeAction(event.action))}`
        case "dispatch:forwarded":
            return `${chalk.green("✓")} ${name} dispatched ${chalk.dim(describeAction(event.action))}`
        case "dispatch:dropped":
            return `${chalk.red("✗")} ${name} dropped ${chalk.dim(describeAction(event.action))} (${event.reason})`
        case "middleware:disposed":
            return `${chalk.dim("·")} ${name} disposed`
    }
}

/**
 * Print every event the tracer records from now on.
 * Returns the unsubscribe function.
 */
export function printEvents(
    tracer: GateTracer,
    write: (line: string) => void = line => console.log(line)
): () => void {
    return tracer.onEvent(event => write(formatEvent(event)))
}
