import type { Command } from "./commands"
import { UnknownCommandError } from "./errors"
import { log } from "./log"
import type { Broker } from "./mqtt"
import type { RegisterCatalog, RegisterCatalogs, RegisterValue } from "./registers"
import { catalogFor } from "./registers"
import type { DeviceConfig } from "./tlv"

/* Home Assistant side of the bridge. Topics, all under the discovery prefix:
 *
 *   device/<id>/config                     discovery, retained
 *   grolink/<id>/state                     input registers as one JSON object
 *   grolink/<id>/availability              online / offline
 *   <type>/grolink/<id>/<name>/get         holding register value
 *   <type>/grolink/<id>/<name>/set|read    commands from Home Assistant
 * */

const SECONDS = 1000

export interface HomeAssistantOptions {
    readonly baseTopic: string
    /** Seconds without data before a device is marked offline, 0 disables. */
    readonly deviceTimeout: number
}

export interface HoldingValue {
    readonly name: string
    /** Home Assistant platform of the register, part of its topic. */
    readonly type: string
    readonly value: RegisterValue
}

export type CommandHandler = (command: Command) => void

const MODELS: Readonly<Record<string, string>> = {
    "55": "NEO-series",
    "61": "NOAH-series",
    "72": "NEXA-series",
}

function parseNumber(payload: string): number | undefined {
    const text = payload.trim()
    if (text === "") return undefined
    const value = Number(text)
    return Number.isInteger(value) ? value : undefined
}

export class HomeAssistant {
    private readonly configs = new Map<string, DeviceConfig>()
    private readonly discovered = new Set<string>()
    private readonly timers = new Map<string, NodeJS.Timeout>()

    constructor(
        private readonly broker: Broker,
        private readonly catalogs: RegisterCatalogs,
        private readonly options: HomeAssistantOptions,
    ) {}

    get baseTopic(): string {
        return this.options.baseTopic
    }

    start(onCommand: CommandHandler) {
        this.broker.subscribe([`${this.baseTopic}/+/grolink/+/+/set`, `${this.baseTopic}/+/grolink/+/+/read`])
        this.broker.onMessage((topic, payload) => {
            try {
                const command = this.commandFromTopic(topic, payload.toString("utf8"))
                if (command) onCommand(command)
            } catch (e) {
                log.error("ha: command on %s: %s", topic, e instanceof Error ? e.message : e)
            }
        })
    }

    async stop() {
        for (const timer of this.timers.values()) clearTimeout(timer)
        this.timers.clear()
        await this.broker.close()
    }

    setConfig(deviceId: string, config: DeviceConfig) {
        this.configs.set(deviceId, config)
        log.info("ha: received config for %s", deviceId)
    }

    publishInputRegisters(deviceId: string, values: Readonly<Record<string, RegisterValue>>) {
        log.debug("ha: publish state of %s: %o", deviceId, values)
        this.publishDiscovery(deviceId)
        this.publishAvailability(deviceId, true)
        if (this.options.deviceTimeout > 0) this.resetDeviceTimer(deviceId)
        this.broker.publish(`${this.baseTopic}/grolink/${deviceId}/state`, JSON.stringify(values))
    }

    publishHoldingRegisters(deviceId: string, values: ReadonlyArray<HoldingValue>) {
        for (const { name, type, value } of values) {
            this.broker.publish(`${this.baseTopic}/${type}/grolink/${deviceId}/${name}/get`, String(value))
        }
    }

    /**
     * Map a Home Assistant command topic to a device command. Undefined for
     * topics that are not ours or payloads that are not a value; throws
     * UnknownCommandError for register names the device does not have.
     */
    commandFromTopic(topic: string, payload: string): Command | undefined {
        const prefix = `${this.baseTopic}/`
        if (!topic.startsWith(prefix)) return undefined
        const parts = topic.slice(prefix.length).split("/")
        if (parts.length !== 5 || parts[1] !== "grolink") return undefined
        const [type, , deviceId, name, action] = parts

        const catalog = catalogFor(this.catalogs, deviceId)
        if (!catalog) {
            log.info("ha: command for unknown device type: %s", deviceId)
            return undefined
        }
        log.debug("ha: received %s %s command %s for %s", type, action, name, deviceId)

        if (action === "read") return this.readCommand(catalog, deviceId, name)
        if (action !== "set") return undefined

        const value = type === "switch" ? switchValue(payload) : parseNumber(payload)
        if (value === undefined) {
            log.warn("ha: ignoring %s for %s/%s, not a value: %s", action, deviceId, name, payload)
            return undefined
        }
        return this.setCommand(catalog, deviceId, name, value)
    }

    private readCommand(catalog: RegisterCatalog, deviceId: string, name: string): Command {
        if (catalog.family === "neo" && name === "output_power_limit") {
            return { kind: "neo-read-output-power-limit", deviceId }
        }
        const register = catalog.holdingRegisters.get(name)?.growatt
        if (!register) throw new UnknownCommandError(deviceId, name)
        return { kind: "read-single-register", deviceId, register: register.position.registerNo }
    }

    private setCommand(catalog: RegisterCatalog, deviceId: string, name: string, value: number): Command {
        if (catalog.family === "neo" && name === "output_power_limit") {
            return { kind: "neo-set-output-power-limit", deviceId, value }
        }
        if (catalog.family === "noah") {
            switch (name) {
                case "smart_power":
                    return { kind: "noah-smart-power", deviceId, powerDiff: value }
                case "output_power":
                    return { kind: "noah-output-limit", deviceId, power: value }
                case "slot1_power":
                    // time slot 1 spans the whole day
                    return { kind: "noah-slot", deviceId, slot: 1, window: { start: "00:00", end: "23:59", power: value } }
            }
        }
        const register = catalog.holdingRegisters.get(name)?.growatt
        if (!register) throw new UnknownCommandError(deviceId, name)
        return { kind: "preset-single-register", deviceId, register: register.position.registerNo, value }
    }

    private resetDeviceTimer(deviceId: string) {
        clearTimeout(this.timers.get(deviceId))
        const timer = setTimeout(() => {
            log.warn("ha: device %s timed out, marking it unavailable", deviceId)
            this.timers.delete(deviceId)
            this.publishAvailability(deviceId, false)
        }, this.options.deviceTimeout * SECONDS)
        this.timers.set(deviceId, timer)
    }

    private publishAvailability(deviceId: string, online: boolean) {
        this.broker.publish(`${this.baseTopic}/grolink/${deviceId}/availability`, online ? "online" : "offline")
    }

    private publishDiscovery(deviceId: string) {
        if (this.discovered.has(deviceId)) return
        const payload = this.discoveryPayload(deviceId)
        if (!payload) return

        const topic = `${this.baseTopic}/device/${deviceId}/config`
        // clear first, so entities removed from the catalog disappear
        this.broker.publish(topic, "", { retain: true })
        this.broker.publish(topic, JSON.stringify(payload), { retain: true })
        this.discovered.add(deviceId)
        log.info("ha: announced device %s", deviceId)
    }

    deviceInfo(deviceId: string): Record<string, unknown> {
        const config: DeviceConfig = this.configs.get(deviceId) ?? {}
        const info: Record<string, unknown> = {
            identifiers: [deviceId],
            name: `Growatt ${deviceId}`,
            manufacturer: "Growatt",
            serial_number: deviceId,
        }
        const model = (config.device_type && MODELS[config.device_type]) || config.model_id
        if (model) info.model = model
        if (config.sw_version) info.sw_version = config.sw_version
        if (config.hw_version) info.hw_version = config.hw_version
        if (config.mac_address) info.connections = [["mac", config.mac_address]]
        return info
    }

    discoveryPayload(deviceId: string): Record<string, unknown> | undefined {
        const catalog = catalogFor(this.catalogs, deviceId)
        if (!catalog) {
            log.info("ha: no discovery for unknown device type: %s", deviceId)
            return undefined
        }
        const base = this.baseTopic
        const cmps: Record<string, Record<string, unknown>> = {}

        for (const [name, register] of catalog.holdingRegisters) {
            const ha = register.homeassistant
            if (!ha.publish) continue
            const uniqueId = `grolink_${deviceId}_cmd_${name}`
            cmps[uniqueId] = {
                platform: ha.type,
                unique_id: uniqueId,
                name: ha.name,
                command_topic: `${base}/${ha.type}/grolink/${deviceId}/${name}/set`,
                state_topic: `${base}/${ha.type}/grolink/${deviceId}/${name}/get`,
                device_class: ha.deviceClass,
                unit_of_measurement: ha.unit,
                icon: ha.icon,
                min: ha.min,
                max: ha.max,
                step: ha.step,
            }
            if (register.growatt) {
                cmps[`${uniqueId}_read`] = {
                    platform: "button",
                    unique_id: `${uniqueId}_read`,
                    name: `${ha.name} Read`,
                    command_topic: `${base}/button/grolink/${deviceId}/${name}/read`,
                }
            }
        }

        for (const [name, register] of catalog.inputRegisters) {
            const ha = register.homeassistant
            if (!ha.publish) continue
            const uniqueId = `grolink_${deviceId}_${name}`
            cmps[uniqueId] = {
                platform: "sensor",
                unique_id: uniqueId,
                object_id: `${deviceId}_${name}`,
                name: ha.name,
                state_topic: `${base}/grolink/${deviceId}/state`,
                value_template: `{{ value_json['${name}'] }}`,
                device_class: ha.deviceClass,
                state_class: ha.stateClass,
                unit_of_measurement: ha.unit,
                icon: ha.icon,
            }
        }

        return {
            dev: this.deviceInfo(deviceId),
            avty_t: `${base}/grolink/${deviceId}/availability`,
            o: { name: "grolink" },
            cmps,
        }
    }
}

function switchValue(payload: string): number | undefined {
    switch (payload.trim().toUpperCase()) {
        case "ON":
            return 1
        case "OFF":
            return 0
        default:
            return undefined
    }
}
