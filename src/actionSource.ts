import type { ActionSource } from "../types/action.js"

/**
 * Build an ActionSource descriptor.
 * Gating never reads it; hosts and tests use it to label dispatches.
 */
export function actionSource(
    func: string,
    info?: string,
    file = "unknown",
    line = 0
): ActionSource {
    return info === undefined ? { file, func, line } : { file, func, line, info }
}
