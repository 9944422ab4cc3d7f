export * from "./errors"
export * from "./growatt"
export * from "./registers"
export * from "./tlv"
export * from "./modbus"
export * from "./commands"
export * from "./classifier"
export * from "./replay"
export * from "./bridge"
export * from "./homeassistant"
export * from "./mqtt"
export * from "./settings"
export { log, enableLogLevel, LOG_LEVELS } from "./log"
export type { LogLevel } from "./log"
