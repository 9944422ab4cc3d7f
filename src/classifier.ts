import type { NeoOutputPowerLimit } from "./commands"
import { parseNeoOutputPowerLimit } from "./commands"
import { MalformedFrameError } from "./errors"
import { asciiText } from "./growatt"
import type { ModbusMessage, ModbusReport } from "./modbus"
import { parseModbusMessage, parseModbusReport } from "./modbus"
import type { InputRegister } from "./registers"
import type { DeviceConfig } from "./tlv"
import { findConfigOffset, parseDeviceConfig } from "./tlv"

/* Two firmware generations put the message type in different places. Frames
 * from the live broker (c/<device id>) carry it at offset 4, captured dump files
 * at offset 6. Callers pick the entry point by where the frame came from.
 * */

// NOAH=387 NEO=340,341
export const CLIENT_CONFIG_TYPES: ReadonlySet<number> = new Set([387, 340, 341])
// input register reports, also recognised structurally
export const CLIENT_REPORT_TYPES: ReadonlySet<number> = new Set([323, 577])

// NEO=281, NOAH sends its config as message 0
export const REPLAY_CONFIG_TYPES: ReadonlySet<number> = new Set([281])
// NOAH=259,260 NEO=259,260,336
export const REPLAY_REPORT_TYPES: ReadonlySet<number> = new Set([259, 260, 336])

export type ClientMessage =
    | { readonly kind: "config"; readonly msgType: number; readonly config: DeviceConfig }
    | { readonly kind: "modbus"; readonly msgType: number; readonly message: ModbusMessage }
    | { readonly kind: "neo-output-power-limit"; readonly msgType: number; readonly report: NeoOutputPowerLimit }
    | { readonly kind: "unknown"; readonly msgType: number }

function messageType(frame: Buffer, offset: number): number {
    if (frame.length < offset + 2) {
        throw new MalformedFrameError(`frame too short for a message type: ${frame.length} bytes`)
    }
    return frame.readUInt16BE(offset)
}

/**
 * Register message, if the frame validates as one. A frame whose header fits
 * but whose blocks are broken is no register message, unless its type says
 * it has to be one.
 */
function registerMessage(body: Buffer, msgType: number): ModbusMessage | undefined {
    let message: ModbusMessage | undefined
    try {
        message = parseModbusMessage(body)
    } catch (e) {
        if (!(e instanceof MalformedFrameError) || CLIENT_REPORT_TYPES.has(msgType)) throw e
        return undefined
    }
    if (!message && CLIENT_REPORT_TYPES.has(msgType)) {
        throw new MalformedFrameError(`register report type ${msgType} does not match its length of ${body.length} bytes`)
    }
    return message
}

/**
 * Route a descrambled, CRC-stripped frame from the live broker. The field at
 * offset 4 doubles as the message length, so the structural register check
 * goes before the config codes. Unknown types are an outcome, not an error;
 * broken register reports throw MalformedFrameError.
 */
export function classifyClientMessage(body: Buffer): ClientMessage {
    const msgType = messageType(body, 4)

    // checked before the register messages, it would validate as an empty READ_SINGLE_REGISTER
    const report = parseNeoOutputPowerLimit(body)
    if (report) return { kind: "neo-output-power-limit", msgType, report }

    const message = registerMessage(body, msgType)
    if (message) return { kind: "modbus", msgType, message }

    if (CLIENT_CONFIG_TYPES.has(msgType)) {
        return { kind: "config", msgType, config: parseDeviceConfig(body, findConfigOffset(body)) }
    }
    return { kind: "unknown", msgType }
}

export type ReplayMessage =
    | { readonly kind: "config"; readonly counter: number; readonly msgType: number; readonly deviceId: string; readonly config: DeviceConfig }
    | { readonly kind: "modbus"; readonly counter: number; readonly msgType: number; readonly deviceId: string; readonly report: ModbusReport }
    | { readonly kind: "unknown"; readonly counter: number; readonly msgType: number; readonly deviceId: string }

/** Route a descrambled frame read back from a dump file. */
export function classifyReplayMessage(data: Buffer, registers: ReadonlyMap<string, InputRegister>): ReplayMessage {
    const msgType = messageType(data, 6)
    const counter = data.readUInt16BE(0)
    const deviceId = asciiText(data.subarray(8, 24))

    if (REPLAY_CONFIG_TYPES.has(msgType) || counter === 0) {
        return { kind: "config", counter, msgType, deviceId, config: parseDeviceConfig(data, findConfigOffset(data)) }
    }
    if (REPLAY_REPORT_TYPES.has(msgType)) {
        return { kind: "modbus", counter, msgType, deviceId, report: parseModbusReport(data, registers) }
    }
    // NOAH=272 is still unknown
    return { kind: "unknown", counter, msgType, deviceId }
}
