import { Parser } from "binary-parser"
import { MalformedFrameError } from "./errors"
import { asciiField, asciiText } from "./growatt"
import { log } from "./log"
import type { InputRegister, RegisterPosition, RegisterValue } from "./registers"
import { decodeRegisterValue } from "./registers"

export enum ModbusFunction {
    READ_HOLDING_REGISTER = 3,
    READ_INPUT_REGISTER = 4,
    READ_SINGLE_REGISTER = 5,
    PRESET_SINGLE_REGISTER = 6,
    PRESET_MULTIPLE_REGISTER = 16,
}

export function isModbusFunction(value: number): value is ModbusFunction {
    return value in ModbusFunction
}

/* A register block on the wire:
 *
 *   u16 start | u16 end | (end - start + 1) x u16 values
 *
 * start and end are both inclusive register numbers.
 * */

export const MAX_REGISTER_COUNT = 512

export interface ModbusBlock {
    readonly start: number
    readonly end: number
    readonly values: Buffer
}

export interface RegisterReading {
    readonly registerNo: number
    readonly name: string
    readonly unit?: string
    readonly value: RegisterValue
}

export function parseModbusBlock(data: Buffer, offset: number): { block: ModbusBlock; offset: number } {
    if (offset + 4 > data.length) {
        throw new MalformedFrameError(`register block header past end of frame at ${offset}`)
    }
    const start = data.readUInt16BE(offset)
    const end = data.readUInt16BE(offset + 2)
    const count = end - start + 1
    if (count < 1 || count > MAX_REGISTER_COUNT) {
        throw new MalformedFrameError(`wrong register count: start=${start}, end=${end}, qty=${count}`)
    }
    const valuesStart = offset + 4
    const valuesEnd = valuesStart + count * 2
    if (valuesEnd > data.length) {
        throw new MalformedFrameError(`register block ${start}..${end} truncated: ${data.length - valuesStart} of ${count * 2} bytes`)
    }
    return {
        block: { start, end, values: Buffer.from(data.subarray(valuesStart, valuesEnd)) },
        offset: valuesEnd,
    }
}

export function buildModbusBlock(block: ModbusBlock): Buffer {
    const header = Buffer.allocUnsafe(4)
    header.writeUInt16BE(block.start, 0)
    header.writeUInt16BE(block.end, 2)
    return Buffer.concat([header, block.values])
}

/** Raw bytes for a position, from the first block that contains its register. */
export function registerData(blocks: ReadonlyArray<ModbusBlock>, position: RegisterPosition): Buffer | undefined {
    for (const block of blocks) {
        if (position.registerNo < block.start || position.registerNo > block.end) continue
        const at = (position.registerNo - block.start) * 2 + position.offset
        return block.values.subarray(at, at + position.size)
    }
    return undefined
}

function readBlockRegisters(block: ModbusBlock, registers: Iterable<[string, InputRegister]>): RegisterReading[] {
    const readings: RegisterReading[] = []
    for (const [name, register] of registers) {
        const { position, dataType } = register.growatt
        const raw = registerData([block], position)
        if (!raw) continue
        const value = decodeRegisterValue(dataType, raw)
        if (value === undefined) continue
        readings.push({ registerNo: position.registerNo, name, unit: register.homeassistant.unit, value })
    }
    return readings
}

export interface RegisterBlockResult {
    readonly block: ModbusBlock
    readonly registers: ReadonlyArray<RegisterReading>
    readonly offset: number
}

/** Parse one block and decode every known register that falls inside it. */
export function parseRegisterBlock(
    data: Buffer,
    offset: number,
    registers: ReadonlyMap<string, InputRegister>,
): RegisterBlockResult {
    const parsed = parseModbusBlock(data, offset)
    return { block: parsed.block, registers: readBlockRegisters(parsed.block, registers), offset: parsed.offset }
}

/** Register name to decoded value, for every register found in one of the blocks. */
export function decodeRegisters(
    blocks: ReadonlyArray<ModbusBlock>,
    registers: ReadonlyMap<string, InputRegister>,
): Record<string, RegisterValue> {
    const values: Record<string, RegisterValue> = {}
    for (const [name, register] of registers) {
        const raw = registerData(blocks, register.growatt.position)
        if (!raw) continue
        const value = decodeRegisterValue(register.growatt.dataType, raw)
        if (value !== undefined) values[name] = value
    }
    return values
}

/* Register report as captured in dump files, type field at offset 6:
 *
 *   counter(2) constant(2) length(2) type(2) device id(16) reserved(14)
 *   device serial(10) reserved(20) timestamp(7) | modbus1 [| modbus2]
 * */

interface ReportPreamble {
    counter: number
    constant: number
    length: number
    msgType: number
    deviceId: Uint8Array
    deviceSerial: Uint8Array
    timestamp: Uint8Array
}

const ReportPreambleParser = new Parser()
    .uint16("counter")
    .uint16("constant")
    .uint16("length")
    .uint16("msgType")
    .buffer("deviceId", { length: 16 })
    .skip(14)
    .buffer("deviceSerial", { length: 10 })
    .skip(20)
    .buffer("timestamp", { length: 7 })

export const REPORT_PREAMBLE_SIZE = 75

export interface ModbusReport {
    readonly counter: number
    readonly msgType: number
    readonly deviceId: string
    readonly deviceSerial: string
    /** `20YY-MM-DDTHH:MM:SS`, undefined when the device clock bytes are out of range. */
    readonly timestamp: string | undefined
    readonly modbus1: RegisterBlockResult
    readonly modbus2?: RegisterBlockResult
}

function pad2(n: number): string {
    return String(n).padStart(2, "0")
}

export function parseReportTimestamp(raw: Uint8Array): string | undefined {
    if (raw.length < 6) return undefined
    const [year, month, day, hour, minute, second] = raw
    if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) return undefined
    return `20${pad2(year)}-${pad2(month)}-${pad2(day)}T${pad2(hour)}:${pad2(minute)}:${pad2(second)}`
}

export function parseModbusReport(data: Buffer, registers: ReadonlyMap<string, InputRegister>): ModbusReport {
    if (data.length < REPORT_PREAMBLE_SIZE) {
        throw new MalformedFrameError(`register report too short: ${data.length} bytes`)
    }
    const preamble: ReportPreamble = ReportPreambleParser.parse(data)
    const modbus1 = parseRegisterBlock(data, REPORT_PREAMBLE_SIZE, registers)

    let modbus2: RegisterBlockResult | undefined
    if (modbus1.offset < data.length) {
        try {
            modbus2 = parseRegisterBlock(data, modbus1.offset, registers)
        } catch (e) {
            // the second block is best effort, the first one stands on its own
            log.debug("dropping second register block: %s", e instanceof Error ? e.message : e)
        }
    }

    return {
        counter: preamble.counter,
        msgType: preamble.msgType,
        deviceId: asciiText(preamble.deviceId),
        deviceSerial: asciiText(preamble.deviceSerial),
        timestamp: parseReportTimestamp(preamble.timestamp),
        modbus1,
        modbus2,
    }
}

/* Register message as sent live by the devices on c/<device id>:
 *
 *   counter(2) constant 7(2) msg length(2) unit id(1) function(1) device id(30)
 *   [device serial(30) timestamp(7)]   only for READ_INPUT_REGISTER
 *   register blocks...
 *
 * msg length counts everything from the unit id on.
 * */

interface MessageHeader {
    counter: number
    constant: number
    msgLen: number
    unitId: number
    fn: number
    deviceId: Uint8Array
}

const MessageHeaderParser = new Parser()
    .uint16("counter")
    .uint16("constant")
    .uint16("msgLen")
    .uint8("unitId")
    .uint8("fn")
    .buffer("deviceId", { length: 30 })

interface MessageMetadata {
    deviceSerial: Uint8Array
    clock: Uint8Array
}

const MessageMetadataParser = new Parser().buffer("deviceSerial", { length: 30 }).buffer("clock", { length: 7 })

export const MESSAGE_HEADER_SIZE = 38
export const METADATA_SIZE = 37

export interface ModbusMetadata {
    readonly deviceSerial: string
    readonly timestamp: Date | undefined
}

export interface ModbusMessage {
    readonly counter: number
    readonly deviceId: string
    readonly function: ModbusFunction
    readonly metadata?: ModbusMetadata
    readonly blocks: ReadonlyArray<ModbusBlock>
}

function parseClock(raw: Uint8Array): Date | undefined {
    const [year, month, day, hour, minute, second, millis] = raw
    const date = new Date(Date.UTC(2000 + year, month - 1, day, hour, minute, second, millis))
    // Date.UTC rolls over out of range fields instead of failing
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day || date.getUTCHours() !== hour) return undefined
    if (date.getUTCMinutes() !== minute || date.getUTCSeconds() !== second || millis > 999) return undefined
    return date
}

function buildClock(date: Date | undefined): Buffer {
    if (!date) return Buffer.alloc(7)
    return Buffer.from([
        date.getUTCFullYear() - 2000,
        date.getUTCMonth() + 1,
        date.getUTCDate(),
        date.getUTCHours(),
        date.getUTCMinutes(),
        date.getUTCSeconds(),
        date.getUTCMilliseconds(),
    ])
}

/**
 * Parse a descrambled, CRC-stripped register message. Returns undefined when
 * the frame is not a register message at all (length field or function do not
 * fit); throws MalformedFrameError when it is one but its blocks are broken.
 */
export function parseModbusMessage(body: Buffer): ModbusMessage | undefined {
    if (body.length < MESSAGE_HEADER_SIZE) return undefined
    const header: MessageHeader = MessageHeaderParser.parse(body)
    if (header.msgLen !== body.length - 6) return undefined
    if (!isModbusFunction(header.fn)) return undefined

    let offset = MESSAGE_HEADER_SIZE
    let metadata: ModbusMetadata | undefined
    if (header.fn === ModbusFunction.READ_INPUT_REGISTER) {
        if (body.length < offset + METADATA_SIZE) {
            throw new MalformedFrameError(`register message metadata truncated: ${body.length} bytes`)
        }
        const meta: MessageMetadata = MessageMetadataParser.parse(body.subarray(offset))
        metadata = { deviceSerial: asciiText(meta.deviceSerial), timestamp: parseClock(meta.clock) }
        offset += METADATA_SIZE
    }

    const blocks: ModbusBlock[] = []
    while (body.length - offset > 4) {
        const parsed = parseModbusBlock(body, offset)
        blocks.push(parsed.block)
        offset = parsed.offset
    }

    return {
        counter: header.counter,
        deviceId: asciiText(header.deviceId),
        function: header.fn,
        metadata,
        blocks,
    }
}

export function buildModbusMessage(message: ModbusMessage): Buffer {
    const parts: Buffer[] = []
    if (message.metadata) {
        parts.push(asciiField(message.metadata.deviceSerial, 30), buildClock(message.metadata.timestamp))
    }
    for (const block of message.blocks) {
        parts.push(buildModbusBlock(block))
    }
    const payload = Buffer.concat(parts)

    const header = Buffer.alloc(MESSAGE_HEADER_SIZE)
    header.writeUInt16BE(message.counter, 0)
    header.writeUInt16BE(7, 2)
    header.writeUInt16BE(MESSAGE_HEADER_SIZE - 6 + payload.length, 4)
    header.writeUInt8(1, 6)
    header.writeUInt8(message.function, 7)
    asciiField(message.deviceId, 30).copy(header, 8)
    return Buffer.concat([header, payload])
}
