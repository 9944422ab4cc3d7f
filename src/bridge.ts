import { classifyClientMessage } from "./classifier"
import type { Command } from "./commands"
import { buildCommand } from "./commands"
import type { CrcPolicy } from "./growatt"
import { openFrame, sealFrame } from "./growatt"
import type { HoldingValue, HomeAssistant } from "./homeassistant"
import { log } from "./log"
import type { ModbusMessage } from "./modbus"
import { decodeRegisters, ModbusFunction, registerData } from "./modbus"
import type { Broker, UserProperties } from "./mqtt"
import type { RegisterCatalog, RegisterCatalogs, RegisterValue } from "./registers"
import { catalogFor, decodeRegisterValue } from "./registers"
import type { DeviceConfig } from "./tlv"

export const DEVICE_TOPICS = "c/#"
export const FORWARDED_FOR = "forwarded-for"
// NEO inverters report absurd PV power at night, nobody has a megawatt balcony plant
export const MAX_PLAUSIBLE_PPV = 1_000_000

export function commandTopic(deviceId: string): string {
    return `s/33/${deviceId}`
}

export type DeviceOutcome =
    | { readonly kind: "input-registers"; readonly deviceId: string; readonly values: Readonly<Record<string, RegisterValue>> }
    | { readonly kind: "holding-registers"; readonly deviceId: string; readonly values: ReadonlyArray<HoldingValue> }
    | { readonly kind: "config"; readonly deviceId: string; readonly config: DeviceConfig }
    | { readonly kind: "output-power-limit"; readonly deviceId: string; readonly value: number }
    | { readonly kind: "ignored"; readonly deviceId: string; readonly reason: string }

export interface DecodeOptions {
    readonly crcPolicy?: CrcPolicy
}

function holdingValues(message: ModbusMessage, catalog: RegisterCatalog): HoldingValue[] {
    const values: HoldingValue[] = []
    for (const [name, register] of catalog.holdingRegisters) {
        if (!register.growatt) continue
        const raw = registerData(message.blocks, register.growatt.position)
        if (!raw) continue
        const value = decodeRegisterValue(register.growatt.dataType, raw)
        if (value === undefined) continue
        const type = register.homeassistant.type
        values.push({ name, type, value: type === "switch" ? (value === 1 ? "ON" : "OFF") : value })
    }
    return values
}

function decodeRegisterMessage(deviceId: string, message: ModbusMessage, catalogs: RegisterCatalogs): DeviceOutcome {
    const catalog = catalogFor(catalogs, deviceId)
    if (!catalog) {
        log.warn("register message from unknown device type: %s", deviceId)
        return { kind: "ignored", deviceId, reason: "unknown device type" }
    }

    switch (message.function) {
        case ModbusFunction.READ_SINGLE_REGISTER:
            return { kind: "holding-registers", deviceId, values: holdingValues(message, catalog) }
        case ModbusFunction.READ_INPUT_REGISTER: {
            const values = decodeRegisters(message.blocks, catalog.inputRegisters)
            const ppv = values.Ppv
            if (typeof ppv === "number" && ppv > MAX_PLAUSIBLE_PPV) {
                log.debug("dropping implausible report from %s: Ppv=%d", deviceId, ppv)
                return { kind: "ignored", deviceId, reason: "implausible Ppv" }
            }
            return { kind: "input-registers", deviceId, values }
        }
        default:
            return { kind: "ignored", deviceId, reason: `register function ${message.function}` }
    }
}

/**
 * Receive path for one payload from `c/<device id>`. Throws for frames that
 * cannot be decoded; everything else, unknown types included, is an outcome.
 */
export function decodeDeviceMessage(
    topic: string,
    payload: Buffer,
    catalogs: RegisterCatalogs,
    options: DecodeOptions = {},
): DeviceOutcome {
    const topicDeviceId = topic.split("/").pop() ?? topic
    const { body } = openFrame(payload, { crcPolicy: options.crcPolicy })
    log.trace("received %s: %s", topic, body.toString("hex"))

    const message = classifyClientMessage(body)
    switch (message.kind) {
        case "config":
            return { kind: "config", deviceId: message.config.serial_number || topicDeviceId, config: message.config }
        case "neo-output-power-limit":
            return { kind: "output-power-limit", deviceId: message.report.deviceId || topicDeviceId, value: message.report.value }
        case "modbus":
            return decodeRegisterMessage(message.message.deviceId || topicDeviceId, message.message, catalogs)
        case "unknown":
            log.debug("unknown message type %d from %s: %s", message.msgType, topicDeviceId, body.toString("hex"))
            return { kind: "ignored", deviceId: topicDeviceId, reason: `unknown message type ${message.msgType}` }
    }
}

export interface BridgeOptions {
    readonly crcPolicy: CrcPolicy
}

/** Devices on one broker, Home Assistant on another (or the same). */
export class Bridge {
    constructor(
        private readonly devices: Broker,
        private readonly homeassistant: HomeAssistant,
        private readonly catalogs: RegisterCatalogs,
        private readonly options: BridgeOptions,
    ) {}

    start() {
        this.devices.onMessage((topic, payload, userProperties) => this.handleDeviceMessage(topic, payload, userProperties))
        this.devices.subscribe(DEVICE_TOPICS)
        this.homeassistant.start((command) => this.sendCommand(command))
    }

    async stop() {
        await this.homeassistant.stop()
        await this.devices.close()
    }

    handleDeviceMessage(topic: string, payload: Buffer, userProperties: UserProperties = {}) {
        if (!topic.startsWith("c/")) return
        const forwardedFor = userProperties[FORWARDED_FOR]
        if (forwardedFor === "ha" || forwardedFor === "growatt") {
            log.trace("message forwarded for %s, skipping", forwardedFor)
            return
        }

        let outcome: DeviceOutcome
        try {
            outcome = decodeDeviceMessage(topic, payload, this.catalogs, { crcPolicy: this.options.crcPolicy })
        } catch (e) {
            log.error("decoding message on %s: %s", topic, e instanceof Error ? e.message : e)
            return
        }

        switch (outcome.kind) {
            case "input-registers":
                this.homeassistant.publishInputRegisters(outcome.deviceId, outcome.values)
                break
            case "holding-registers":
                this.homeassistant.publishHoldingRegisters(outcome.deviceId, outcome.values)
                break
            case "config":
                this.homeassistant.setConfig(outcome.deviceId, outcome.config)
                break
            case "output-power-limit":
                this.homeassistant.publishHoldingRegisters(outcome.deviceId, [
                    { name: "output_power_limit", type: "number", value: outcome.value },
                ])
                break
            case "ignored":
                log.debug("ignored message from %s: %s", outcome.deviceId, outcome.reason)
                break
        }
    }

    sendCommand(command: Command) {
        const topic = commandTopic(command.deviceId)
        log.debug("send command %s to %s: %o", command.kind, topic, command)
        this.devices.publish(topic, sealFrame(buildCommand(command)), { userProperties: { [FORWARDED_FOR]: "ha" } })
    }
}
