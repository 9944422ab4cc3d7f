import Debug from "debug"

export const log = {
    trace: Debug("grolink:trace"),
    debug: Debug("grolink:debug"),
    info: Debug("grolink:info"),
    warn: Debug("grolink:warn"),
    error: Debug("grolink:error"),
}

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

/** Namespaces enabled for `level`, e.g. "warn" turns on warn and error. */
export function namespacesFor(level: LogLevel): string {
    return LOG_LEVELS.slice(LOG_LEVELS.indexOf(level))
        .map((l) => `grolink:${l}`)
        .join(",")
}

/** An explicit DEBUG environment variable always wins over the configured level. */
export function enableLogLevel(level: LogLevel, env: NodeJS.ProcessEnv = process.env) {
    if (env.DEBUG) return
    Debug.enable(namespacesFor(level))
}
