import * as fs from "fs"
import * as path from "path"
import { z } from "zod"
import { log, LOG_LEVELS } from "./log"

/* Settings come from an optional JSON file, then the environment:
 *
 *   GROLINK_CONFIG                 settings file, default ~/grolink.config.json
 *   SOURCE_MQTT_HOST/PORT/TLS/USER/PASS   broker the devices talk to
 *   TARGET_MQTT_*                  Home Assistant broker, defaults to the source
 *   HA_BASE_TOPIC                  discovery prefix, default homeassistant
 *   DEVICE_TIMEOUT                 seconds until a silent device goes offline
 *   CRC_POLICY                     lenient or strict
 *   LOG_LEVEL                      trace .. error
 * */

const flag = z.union([
    z.boolean(),
    z
        .string()
        .toLowerCase()
        .pipe(z.enum(["true", "false", "1", "0"]))
        .transform((v) => v === "true" || v === "1"),
])

const brokerSchema = z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535),
    tls: flag,
    username: z.string().optional(),
    password: z.string().optional(),
})

const settingsSchema = z.object({
    source: brokerSchema,
    target: brokerSchema,
    haBaseTopic: z.string().min(1),
    deviceTimeout: z.coerce.number().int().min(0),
    crcPolicy: z.enum(["lenient", "strict"]),
    logLevel: z.enum(LOG_LEVELS),
})

export type Settings = z.infer<typeof settingsSchema>

const brokerFileSchema = z
    .object({
        host: z.string(),
        port: z.number(),
        tls: z.boolean(),
        username: z.string(),
        password: z.string(),
    })
    .partial()
    .strict()

const settingsFileSchema = z
    .object({
        source: brokerFileSchema,
        target: brokerFileSchema,
        haBaseTopic: z.string(),
        deviceTimeout: z.number(),
        crcPolicy: z.string(),
        logLevel: z.string(),
    })
    .partial()
    .strict()

type SettingsFile = z.infer<typeof settingsFileSchema>

export const DEFAULT_SOURCE = { host: "localhost", port: 1883, tls: false } as const

export function settingsFile(env: NodeJS.ProcessEnv): string {
    return env.GROLINK_CONFIG || path.join(env.HOME || "/home/homeassistant", "grolink.config.json")
}

function readSettingsFile(env: NodeJS.ProcessEnv): SettingsFile {
    const file = settingsFile(env)
    // only an explicitly named file has to exist
    if (!env.GROLINK_CONFIG && !fs.existsSync(file)) return {}
    log.info("reading settings from %s", file)
    return settingsFileSchema.parse(JSON.parse(fs.readFileSync(file, { encoding: "utf8" })))
}

/** Throws a ZodError naming every invalid setting. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const file = readSettingsFile(env)

    const source = brokerSchema.parse({
        host: env.SOURCE_MQTT_HOST ?? file.source?.host ?? DEFAULT_SOURCE.host,
        port: env.SOURCE_MQTT_PORT ?? file.source?.port ?? DEFAULT_SOURCE.port,
        tls: env.SOURCE_MQTT_TLS ?? file.source?.tls ?? DEFAULT_SOURCE.tls,
        username: env.SOURCE_MQTT_USER ?? file.source?.username,
        password: env.SOURCE_MQTT_PASS ?? file.source?.password,
    })

    return settingsSchema.parse({
        source,
        target: {
            host: env.TARGET_MQTT_HOST ?? file.target?.host ?? source.host,
            port: env.TARGET_MQTT_PORT ?? file.target?.port ?? source.port,
            tls: env.TARGET_MQTT_TLS ?? file.target?.tls ?? source.tls,
            username: env.TARGET_MQTT_USER ?? file.target?.username ?? source.username,
            password: env.TARGET_MQTT_PASS ?? file.target?.password ?? source.password,
        },
        haBaseTopic: env.HA_BASE_TOPIC ?? file.haBaseTopic ?? "homeassistant",
        deviceTimeout: env.DEVICE_TIMEOUT ?? file.deviceTimeout ?? 0,
        crcPolicy: env.CRC_POLICY ?? file.crcPolicy ?? "lenient",
        logLevel: (env.LOG_LEVEL ?? file.logLevel ?? "error").toLowerCase(),
    })
}
