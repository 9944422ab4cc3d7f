#!/usr/bin/env node

/**
 * grolink-decode: decode Growatt payloads captured from the device broker,
 * one file per message.
 */

import * as fs from "fs"
import { program } from "commander"
import { descramble, hexdump } from "./growatt"
import type { ModbusBlock, RegisterBlockResult } from "./modbus"
import { loadRegisterCatalogs, REGISTERS_DIR } from "./registers"
import type { ReplayResult } from "./replay"
import { parseGrowattFile } from "./replay"

function blockJson({ block, registers }: RegisterBlockResult) {
    return { ...blockSummary(block), registers }
}

function blockSummary(block: ModbusBlock) {
    return { start: block.start, end: block.end, values: block.values.toString("hex") }
}

/** Plain JSON view of a decoded file, register values as hex. */
export function resultJson(file: string, result: ReplayResult): Record<string, unknown> {
    const json: Record<string, unknown> = {
        file,
        counter: result.counter,
        msgType: result.msgType,
        deviceId: result.deviceId,
        crcValid: result.crcValid,
    }
    if (result.config) json.config = result.config
    if (result.report) {
        const { modbus1, modbus2, ...report } = result.report
        json.report = { ...report, modbus1: blockJson(modbus1), modbus2: modbus2 && blockJson(modbus2) }
    }
    return json
}

interface DecodeOptions {
    hex: boolean
    registers: string
}

function decodeFiles(files: string[], options: DecodeOptions) {
    const catalogs = loadRegisterCatalogs(options.registers)
    for (const file of files) {
        try {
            const raw = fs.readFileSync(file)
            console.log(JSON.stringify(resultJson(file, parseGrowattFile(raw, catalogs)), null, 2))
            if (options.hex) console.log(hexdump(descramble(raw)))
        } catch (e) {
            console.error(`${file}: ${e instanceof Error ? e.message : e}`)
            process.exitCode = 1
        }
    }
}

if (require.main === module) {
    program
        .name("grolink-decode")
        .description("Decode captured Growatt MQTT payloads to JSON")
        .argument("<files...>", "captured payload files")
        .option("-x, --hex", "also print a hex dump of the descrambled frame", false)
        .option("-r, --registers <dir>", "directory with the register catalogs", REGISTERS_DIR)
        .action(decodeFiles)
        .parse()
}
