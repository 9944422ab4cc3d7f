import { classifyReplayMessage } from "./classifier"
import { asciiText, descramble, verifyCrc } from "./growatt"
import { log } from "./log"
import type { ModbusReport } from "./modbus"
import type { InputRegister, RegisterCatalogs } from "./registers"
import { catalogFor } from "./registers"
import type { DeviceConfig } from "./tlv"

export interface ReplayResult {
    readonly counter: number
    readonly msgType: number
    readonly deviceId: string
    readonly crcValid: boolean
    readonly config?: DeviceConfig
    readonly report?: ModbusReport
}

const NO_REGISTERS: ReadonlyMap<string, InputRegister> = new Map()

/**
 * Decode a payload captured from the broker, as stored by message dumps. The
 * whole file is descrambled, trailer included; the parsers stop before it.
 * A CRC mismatch is only reported, captures are decoded anyway.
 */
export function parseGrowattFile(raw: Buffer, catalogs: RegisterCatalogs): ReplayResult {
    const crcValid = verifyCrc(raw)
    if (!crcValid) log.warn("crc mismatch in captured frame, decoding anyway")
    const data = descramble(raw)
    const deviceId = asciiText(data.subarray(8, 24))
    const registers = catalogFor(catalogs, deviceId)?.inputRegisters ?? NO_REGISTERS

    const message = classifyReplayMessage(data, registers)
    const result = { counter: message.counter, msgType: message.msgType, deviceId: message.deviceId, crcValid }
    switch (message.kind) {
        case "config":
            return { ...result, config: message.config }
        case "modbus":
            return { ...result, report: message.report }
        case "unknown":
            return result
    }
}
