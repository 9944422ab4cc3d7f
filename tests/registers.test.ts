import { describe, it, expect } from "vitest"
import {
    catalogFor,
    decodeRegisterValue,
    deviceFamilyOf,
    loadRegisterCatalogs,
    parseRegisterCatalog,
} from "../src/registers"
import type { RegisterDataType } from "../src/registers"

const tenths: RegisterDataType = { kind: "float", multiplier: 0.1, delta: 0 }
const status: RegisterDataType = {
    kind: "enum",
    enumType: "INT_MAP",
    values: new Map([
        [0, "Waiting"],
        [1, "Normal"],
    ]),
}

describe("decodeRegisterValue", () => {
    it("scales floats and rounds to three decimals", () => {
        expect(decodeRegisterValue(tenths, Buffer.from([0x00, 0xfa]))).toBe(25)
        expect(decodeRegisterValue({ kind: "float", multiplier: 0.1, delta: -50 }, Buffer.from([0x02, 0x58]))).toBe(10)
        expect(decodeRegisterValue({ kind: "float", multiplier: 1 / 3, delta: 0 }, Buffer.from([0x01]))).toBe(0.333)
    })

    it("reads 1, 2 and 4 byte big endian values", () => {
        const identity: RegisterDataType = { kind: "float", multiplier: 1, delta: 0 }
        expect(decodeRegisterValue(identity, Buffer.from([0x7f]))).toBe(127)
        expect(decodeRegisterValue(identity, Buffer.from([0x01, 0x00]))).toBe(256)
        expect(decodeRegisterValue(identity, Buffer.from([0x00, 0x01, 0x00, 0x00]))).toBe(65536)
    })

    it("skips widths other than 1, 2 or 4", () => {
        expect(decodeRegisterValue(tenths, Buffer.from([0, 0, 1]))).toBeUndefined()
    })

    it("skips empty input", () => {
        expect(decodeRegisterValue(tenths, Buffer.alloc(0))).toBeUndefined()
        expect(decodeRegisterValue({ kind: "string" }, Buffer.alloc(0))).toBeUndefined()
    })

    it("keeps known enum codes numeric", () => {
        expect(decodeRegisterValue(status, Buffer.from([0x00, 0x01]))).toBe(1)
    })

    it("skips unknown enum codes", () => {
        expect(decodeRegisterValue(status, Buffer.from([0x00, 0x02]))).toBeUndefined()
    })

    it("does not decode bitfields", () => {
        const flags: RegisterDataType = { kind: "enum", enumType: "BITFIELD", values: new Map([[0, "Heating"]]) }
        expect(decodeRegisterValue(flags, Buffer.from([0x00, 0x01]))).toBeUndefined()
    })

    it("decodes strings up to the first trailing NUL", () => {
        expect(decodeRegisterValue({ kind: "string" }, Buffer.from("QMN0\x00\x00", "latin1"))).toBe("QMN0")
    })
})

describe("deviceFamilyOf", () => {
    it("tells families apart by serial prefix", () => {
        expect(deviceFamilyOf("QMN000ABC1D2E3FG")).toBe("neo")
        expect(deviceFamilyOf("0PVPTEST00000001")).toBe("noah")
        expect(deviceFamilyOf("0HVRTEST00000001")).toBe("nexa")
        expect(deviceFamilyOf("XYZTEST")).toBeUndefined()
    })
})

describe("parseRegisterCatalog", () => {
    const json = {
        input_registers: {
            power: {
                growatt: { position: { register_no: 10 }, data: { data_type: "FLOAT" } },
                homeassistant: { name: "Power", publish: true, unit_of_measurement: "W" },
            },
        },
        holding_registers: {
            limit: {
                growatt: {
                    position: { register_no: 3, offset: 1, size: 1 },
                    data: { data_type: "ENUM", enum_options: { enum_type: "INT_MAP", values: { "0": "Off", "1": "On" } } },
                },
                homeassistant: { name: "Limit", publish: true, type: "switch" },
            },
            virtual: {
                homeassistant: { name: "Virtual", publish: false, type: "number", min: -5, max: 5 },
            },
        },
    }

    it("fills in position and float defaults", () => {
        const catalog = parseRegisterCatalog("neo", json)
        const power = catalog.inputRegisters.get("power")

        expect(power?.growatt.position).toEqual({ registerNo: 10, offset: 0, size: 2 })
        expect(power?.growatt.dataType).toEqual({ kind: "float", multiplier: 1, delta: 0 })
        expect(power?.homeassistant.unit).toBe("W")
    })

    it("turns enum labels into a numeric map", () => {
        const limit = parseRegisterCatalog("neo", json).holdingRegisters.get("limit")

        expect(limit?.growatt?.position).toEqual({ registerNo: 3, offset: 1, size: 1 })
        expect(limit?.growatt?.dataType).toEqual({
            kind: "enum",
            enumType: "INT_MAP",
            values: new Map([
                [0, "Off"],
                [1, "On"],
            ]),
        })
        expect(limit?.homeassistant.type).toBe("switch")
    })

    it("allows holding registers without a wire position", () => {
        const virtual = parseRegisterCatalog("noah", json).holdingRegisters.get("virtual")
        expect(virtual?.growatt).toBeUndefined()
        expect(virtual?.homeassistant.min).toBe(-5)
    })

    it("freezes the result", () => {
        expect(Object.isFrozen(parseRegisterCatalog("neo", json))).toBe(true)
    })

    it("rejects unknown metadata fields", () => {
        const broken = {
            input_registers: {
                power: {
                    growatt: { position: { register_no: 10 }, data: { data_type: "FLOAT" } },
                    homeassistant: { name: "Power", publish: true, colour: "red" },
                },
            },
            holding_registers: {},
        }
        expect(() => parseRegisterCatalog("neo", broken)).toThrow()
    })

    it("rejects register sizes other than 1, 2 or 4", () => {
        const broken = {
            input_registers: {
                power: {
                    growatt: { position: { register_no: 10, size: 3 }, data: { data_type: "FLOAT" } },
                    homeassistant: { name: "Power", publish: true },
                },
            },
            holding_registers: {},
        }
        expect(() => parseRegisterCatalog("neo", broken)).toThrow()
    })
})

describe("shipped catalogs", () => {
    const catalogs = loadRegisterCatalogs()

    it("loads every family", () => {
        expect(catalogs.neo.family).toBe("neo")
        expect(catalogs.noah.family).toBe("noah")
        expect(catalogs.nexa.family).toBe("nexa")
    })

    it("is read once and shared", () => {
        expect(loadRegisterCatalogs().neo).toBe(catalogs.neo)
    })

    it("knows the PV power of every family", () => {
        expect(catalogs.neo.inputRegisters.get("Ppv")?.growatt.position.registerNo).toBe(3001)
        expect(catalogs.noah.inputRegisters.get("Ppv")?.growatt.position.registerNo).toBe(1)
        expect(catalogs.nexa.inputRegisters.get("Ppv")?.growatt.position.registerNo).toBe(1)
    })

    it("picks the catalog by device id", () => {
        expect(catalogFor(catalogs, "0PVPTEST00000001")).toBe(catalogs.noah)
        expect(catalogFor(catalogs, "ABC")).toBeUndefined()
    })
})
