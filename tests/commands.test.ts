import { describe, it, expect } from "vitest"
import {
    buildCommand,
    parseCommand,
    parseCommandAs,
    parseNeoOutputPowerLimit,
    parseNoahOutputLimit,
    parseNoahSlot,
    SINGLE_COMMAND_SIZE,
} from "../src/commands"
import type { Command } from "../src/commands"
import { MalformedFrameError } from "../src/errors"
import { openFrame, sealFrame } from "../src/growatt"
import { ModbusFunction } from "../src/modbus"

const NEO = "QMN000ABC1D2E3FG"
const NOAH = "0PVPTEST00000001"

function hex(id: string, length: number): string {
    return Buffer.from(id, "ascii").toString("hex").padEnd(length * 2, "0")
}

describe("buildCommand", () => {
    it("lays out a single register frame", () => {
        const frame = buildCommand({ kind: "preset-single-register", deviceId: NEO, register: 3, value: 42 })
        expect(frame.length).toBe(SINGLE_COMMAND_SIZE)
        expect(frame.toString("hex")).toBe("0001" + "0007" + "0024" + "01" + "06" + hex(NEO, 30) + "0003" + "002a")
    })

    it("echoes the register for single reads", () => {
        const frame = buildCommand({ kind: "read-single-register", deviceId: NEO, register: 23 })
        expect(frame.subarray(38).toString("hex")).toBe("00170017")
        expect(frame[7]).toBe(ModbusFunction.READ_SINGLE_REGISTER)
    })

    it("grows the length field with the values of a multiple register frame", () => {
        const frame = buildCommand({ kind: "preset-multiple-register", deviceId: NOAH, start: 250, values: [95, 10] })
        expect(frame.length).toBe(46)
        expect(frame.readUInt16BE(4)).toBe(40)
        expect(frame[7]).toBe(ModbusFunction.PRESET_MULTIPLE_REGISTER)
        expect(frame.subarray(38).toString("hex")).toBe("00fa00fb" + "005f000a")
    })

    it("refuses multiple register frames without values", () => {
        expect(() => buildCommand({ kind: "preset-multiple-register", deviceId: NOAH, start: 250, values: [] })).toThrow(RangeError)
    })

    it("writes the NEO output power limit set as a preset of register 3", () => {
        const frame = buildCommand({ kind: "neo-set-output-power-limit", deviceId: NEO, value: 42 })
        expect(frame).toEqual(buildCommand({ kind: "preset-single-register", deviceId: NEO, register: 3, value: 42 }))
    })

    it("writes the NEO report two bytes longer than the read", () => {
        const report = buildCommand({ kind: "neo-output-power-limit", deviceId: NEO, value: 80 })
        const read = buildCommand({ kind: "neo-read-output-power-limit", deviceId: NEO })
        expect(report.length).toBe(44)
        expect(read.length).toBe(42)
        expect(report.subarray(0, 8).toString("hex")).toBe("0001000700260105")
        expect(read.subarray(0, 8).toString("hex")).toBe("0001000700240105")
        expect(report.subarray(38).toString("hex")).toBe("000300030050")
    })

    it("splits the NOAH smart power difference into up and down", () => {
        const up = buildCommand({ kind: "noah-smart-power", deviceId: NOAH, powerDiff: 150 })
        const down = buildCommand({ kind: "noah-smart-power", deviceId: NOAH, powerDiff: -200 })
        expect(up.readUInt16BE(4)).toBe(42)
        expect(up.subarray(38).toString("hex")).toBe("01360138" + "0000" + "0096" + "0001")
        expect(down.subarray(38).toString("hex")).toBe("01360138" + "00c8" + "0000" + "0001")
    })

    it("clamps the NOAH output limit", () => {
        const frame = buildCommand({ kind: "noah-output-limit", deviceId: NOAH, power: 900 })
        expect(frame.subarray(38).toString("hex")).toBe("00fc0320")
        expect(parseNoahOutputLimit(frame)).toEqual({ kind: "noah-output-limit", deviceId: NOAH, power: 800 })
    })

    it("writes NOAH time slot 1 as registers 254 to 258", () => {
        const frame = buildCommand({
            kind: "noah-slot",
            deviceId: NOAH,
            slot: 1,
            window: { start: "00:00", end: "23:59", power: 300 },
        })
        expect(frame.length).toBe(52)
        expect(frame.subarray(0, 8).toString("hex")).toBe("00010007002e0110")
        expect(frame.subarray(38).toString("hex")).toBe("00fe0102" + "0000" + "173b" + "0000" + "012c" + "0001")
    })

    it("places later time slots five registers apart and clamps their power", () => {
        const frame = buildCommand({
            kind: "noah-slot",
            deviceId: NOAH,
            slot: 3,
            window: { start: "6:00", end: "12:30", power: 900 },
        })
        expect(frame.subarray(38).toString("hex")).toBe("0108010c" + "0600" + "0c1e" + "0000" + "0320" + "0001")
    })

    it("clears a deleted time slot", () => {
        const frame = buildCommand({ kind: "noah-slot", deviceId: NOAH, slot: 2 })
        expect(frame.subarray(38).toString("hex")).toBe("01030107" + "00".repeat(10))
    })

    it("refuses time slots and times out of range", () => {
        expect(() => buildCommand({ kind: "noah-slot", deviceId: NOAH, slot: 6 })).toThrow(RangeError)
        expect(() => buildCommand({ kind: "noah-slot", deviceId: NOAH, slot: 0 })).toThrow(RangeError)
        const window = { start: "24:00", end: "12:00", power: 100 }
        expect(() => buildCommand({ kind: "noah-slot", deviceId: NOAH, slot: 1, window })).toThrow(RangeError)
        const malformed = { start: "6h", end: "12:00", power: 100 }
        expect(() => buildCommand({ kind: "noah-slot", deviceId: NOAH, slot: 1, window: malformed })).toThrow(RangeError)
    })

    it("presets the NOAH inverter model in register 300", () => {
        const frame = buildCommand({ kind: "noah-inverter-config", deviceId: NOAH, modelId: 0x0204 })
        expect(frame.length).toBe(SINGLE_COMMAND_SIZE)
        expect(frame.subarray(0, 8).toString("hex")).toBe("0001000700240106")
        expect(frame.subarray(38).toString("hex")).toBe("012c0204")
    })
})

describe("round trips", () => {
    const commands: Command[] = [
        { kind: "read-registers", deviceId: NEO, function: ModbusFunction.READ_INPUT_REGISTER, start: 3000, end: 3124 },
        { kind: "read-registers", deviceId: NOAH, function: ModbusFunction.READ_HOLDING_REGISTER, start: 0, end: 124 },
        { kind: "read-single-register", deviceId: NEO, register: 0 },
        { kind: "preset-single-register", deviceId: NEO, register: 0, value: 1 },
        { kind: "preset-multiple-register", deviceId: NOAH, start: 254, values: [0, 5947, 0, 300, 1] },
        { kind: "neo-output-power-limit", deviceId: NEO, value: 100 },
        { kind: "neo-read-output-power-limit", deviceId: NEO },
        { kind: "neo-set-output-power-limit", deviceId: NEO, value: 42 },
        { kind: "noah-smart-power", deviceId: NOAH, powerDiff: 150 },
        { kind: "noah-smart-power", deviceId: NOAH, powerDiff: -200 },
        { kind: "noah-smart-power", deviceId: NOAH, powerDiff: 0 },
        { kind: "noah-charge-limit", deviceId: NOAH, upper: 95, lower: 10 },
        { kind: "noah-output-limit", deviceId: NOAH, power: 400 },
        { kind: "noah-slot", deviceId: NOAH, slot: 4, window: { start: "06:00", end: "12:30", power: 500 } },
        { kind: "noah-slot", deviceId: NOAH, slot: 5 },
        { kind: "noah-inverter-config", deviceId: NOAH, modelId: 0x0401 },
    ]

    commands.forEach((command, i) => {
        it(`parses back ${command.kind} #${i}`, () => {
            expect(parseCommandAs(command.kind, buildCommand(command))).toEqual(command)
        })
    })

    it("rebuilds the exact bytes of a parsed frame", () => {
        const raw = buildCommand({ kind: "preset-multiple-register", deviceId: NOAH, start: 310, values: [0, 150, 1] })
        expect(buildCommand(parseCommand(raw))).toEqual(raw)
    })

    it("survives sealing and opening", () => {
        const command: Command = { kind: "neo-set-output-power-limit", deviceId: NEO, value: 42 }
        const opened = openFrame(sealFrame(buildCommand(command)))

        expect(opened.crcValid).toBe(true)
        expect(parseCommandAs("neo-set-output-power-limit", opened.body)).toEqual(command)
    })
})

describe("parseCommand", () => {
    const frame = () => buildCommand({ kind: "preset-single-register", deviceId: NEO, register: 3, value: 42 })

    it("reads the generic register commands", () => {
        expect(parseCommand(frame())).toEqual({ kind: "preset-single-register", deviceId: NEO, register: 3, value: 42 })
    })

    it("rejects frames shorter than a single register frame", () => {
        expect(() => parseCommand(frame().subarray(0, 41))).toThrow(MalformedFrameError)
    })

    it("rejects wrong header constants", () => {
        const broken = frame()
        broken.writeUInt16BE(8, 2)
        expect(() => parseCommand(broken)).toThrow(MalformedFrameError)
    })

    it("rejects a length field that does not match", () => {
        const broken = frame()
        broken.writeUInt16BE(40, 4)
        expect(() => parseCommand(broken)).toThrow(MalformedFrameError)
    })

    it("rejects unknown functions", () => {
        const broken = frame()
        broken[7] = 9
        expect(() => parseCommand(broken)).toThrow(MalformedFrameError)
    })

    it("rejects single reads that do not echo the register", () => {
        const broken = buildCommand({ kind: "read-single-register", deviceId: NEO, register: 3 })
        broken.writeUInt16BE(4, 40)
        expect(() => parseCommand(broken)).toThrow(MalformedFrameError)
    })

    it("rejects multiple register frames whose range disagrees with the values", () => {
        const broken = buildCommand({ kind: "preset-multiple-register", deviceId: NOAH, start: 250, values: [1, 2] })
        broken.writeUInt16BE(252, 40)
        expect(() => parseCommand(broken)).toThrow(MalformedFrameError)
    })
})

describe("device specific parsers", () => {
    it("only take a NEO report with the marker set", () => {
        const report = buildCommand({ kind: "neo-output-power-limit", deviceId: NEO, value: 80 })
        expect(parseNeoOutputPowerLimit(report)).toEqual({ kind: "neo-output-power-limit", deviceId: NEO, value: 80 })

        report.writeUInt16BE(4, 38)
        expect(parseNeoOutputPowerLimit(report)).toBeUndefined()
    })

    it("only take NOAH time slots on a slot boundary with a valid window", () => {
        const slot = (start: number, values: number[]) =>
            parseNoahSlot(buildCommand({ kind: "preset-multiple-register", deviceId: NOAH, start, values }))

        expect(slot(259, [0x0600, 0x0c00, 0, 200, 1])).toEqual({
            kind: "noah-slot",
            deviceId: NOAH,
            slot: 2,
            window: { start: "06:00", end: "12:00", power: 200 },
        })
        expect(slot(255, [0x0600, 0x0c00, 0, 200, 1])).toBeUndefined()
        expect(slot(279, [0x0600, 0x0c00, 0, 200, 1])).toBeUndefined()
        expect(slot(254, [0x0600, 0x0c00, 0, 200, 0])).toBeUndefined()
        expect(slot(254, [0x1800, 0x0c00, 0, 200, 1])).toBeUndefined()
        expect(slot(254, [0, 0, 0, 0])).toBeUndefined()
        expect(parseNoahSlot(buildCommand({ kind: "noah-charge-limit", deviceId: NOAH, upper: 95, lower: 10 }))).toBeUndefined()
    })

    it("say no match instead of throwing", () => {
        const other = buildCommand({ kind: "preset-single-register", deviceId: NOAH, register: 251, value: 10 })
        expect(parseNoahOutputLimit(other)).toBeUndefined()
        expect(parseCommandAs("noah-charge-limit", other)).toBeUndefined()
        expect(parseCommandAs("neo-output-power-limit", Buffer.alloc(10))).toBeUndefined()
        expect(parseCommandAs("noah-smart-power", Buffer.alloc(10))).toBeUndefined()
    })
})
