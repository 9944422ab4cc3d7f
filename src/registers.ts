import * as fs from "fs"
import * as path from "path"
import { z } from "zod"
import { asciiText } from "./growatt"

/* Register catalogs map a symbolic register name to where its value lives in a
 * modbus block and how to turn the raw bytes into a value. One catalog per
 * device family, read from registers/<family>.json once and shared read-only.
 * */

export const DEVICE_FAMILIES = ["neo", "noah", "nexa"] as const
export type DeviceFamily = (typeof DEVICE_FAMILIES)[number]

const DEVICE_PREFIXES: ReadonlyArray<[string, DeviceFamily]> = [
    ["QMN", "neo"],
    ["0PVP", "noah"],
    ["0HVR", "nexa"],
]

export function deviceFamilyOf(deviceId: string): DeviceFamily | undefined {
    for (const [prefix, family] of DEVICE_PREFIXES) {
        if (deviceId.startsWith(prefix)) return family
    }
    return undefined
}

export interface RegisterPosition {
    readonly registerNo: number
    /** Byte offset from the start of the register. */
    readonly offset: number
    readonly size: 1 | 2 | 4
}

export type EnumType = "INT_MAP" | "BITFIELD"

export type RegisterDataType =
    | { readonly kind: "float"; readonly multiplier: number; readonly delta: number }
    | { readonly kind: "enum"; readonly enumType: EnumType; readonly values: ReadonlyMap<number, string> }
    | { readonly kind: "string" }

export interface RegisterDescriptor {
    readonly position: RegisterPosition
    readonly dataType: RegisterDataType
}

export type RegisterValue = number | string

export interface SensorMetadata {
    readonly name: string
    readonly publish: boolean
    readonly stateClass?: string
    readonly deviceClass?: string
    readonly unit?: string
    readonly icon?: string
}

export interface ControlMetadata extends SensorMetadata {
    /** Home Assistant platform: number, switch, button, ... */
    readonly type: string
    readonly min?: number
    readonly max?: number
    readonly step?: number
}

export interface InputRegister {
    readonly growatt: RegisterDescriptor
    readonly homeassistant: SensorMetadata
}

export interface HoldingRegister {
    /** Absent for commands that have no single register behind them. */
    readonly growatt?: RegisterDescriptor
    readonly homeassistant: ControlMetadata
}

export interface RegisterCatalog {
    readonly family: DeviceFamily
    readonly inputRegisters: ReadonlyMap<string, InputRegister>
    readonly holdingRegisters: ReadonlyMap<string, HoldingRegister>
}

export type RegisterCatalogs = Readonly<Record<DeviceFamily, RegisterCatalog>>

function readUnsigned(raw: Uint8Array): number | undefined {
    const view = Buffer.from(raw.buffer, raw.byteOffset, raw.length)
    switch (raw.length) {
        case 1:
            return view.readUInt8(0)
        case 2:
            return view.readUInt16BE(0)
        case 4:
            return view.readUInt32BE(0)
        default:
            return undefined
    }
}

/**
 * Decode the raw bytes of one register. `undefined` means "skip this field":
 * empty input, an enum code without label, or a bitfield, which is not
 * supported yet.
 */
export function decodeRegisterValue(dataType: RegisterDataType, raw: Uint8Array): RegisterValue | undefined {
    if (raw.length === 0) return undefined
    switch (dataType.kind) {
        case "float": {
            const value = readUnsigned(raw)
            if (value === undefined) return undefined
            return Math.round((value * dataType.multiplier + dataType.delta) * 1000) / 1000
        }
        case "enum": {
            if (dataType.enumType === "BITFIELD") return undefined
            const value = readUnsigned(raw)
            if (value === undefined || !dataType.values.get(value)) return undefined
            // the label is for display only, the published value stays numeric
            return value
        }
        case "string":
            return asciiText(raw)
    }
}

const positionSchema = z
    .object({
        register_no: z.number().int().min(0).max(0xffff),
        offset: z.number().int().min(0).default(0),
        size: z.union([z.literal(1), z.literal(2), z.literal(4)]).default(2),
    })
    .transform(
        (p): RegisterPosition => ({
            registerNo: p.register_no,
            offset: p.offset,
            size: p.size,
        }),
    )

const dataTypeSchema = z
    .discriminatedUnion("data_type", [
        z.object({
            data_type: z.literal("FLOAT"),
            float_options: z
                .object({
                    multiplier: z.number().default(1),
                    delta: z.number().default(0),
                })
                .default({}),
        }),
        z.object({
            data_type: z.literal("ENUM"),
            enum_options: z.object({
                enum_type: z.enum(["INT_MAP", "BITFIELD"]),
                values: z.record(z.string().regex(/^\d+$/), z.string()),
            }),
        }),
        z.object({ data_type: z.literal("STRING") }),
    ])
    .transform((d): RegisterDataType => {
        switch (d.data_type) {
            case "FLOAT":
                return { kind: "float", multiplier: d.float_options.multiplier, delta: d.float_options.delta }
            case "ENUM":
                return {
                    kind: "enum",
                    enumType: d.enum_options.enum_type,
                    values: new Map(Object.entries(d.enum_options.values).map(([k, v]): [number, string] => [Number(k), v])),
                }
            case "STRING":
                return { kind: "string" }
        }
    })

const descriptorSchema = z
    .object({ position: positionSchema, data: dataTypeSchema })
    .transform((d): RegisterDescriptor => ({ position: d.position, dataType: d.data }))

const sensorFields = {
    name: z.string(),
    publish: z.boolean(),
    state_class: z.string().optional(),
    device_class: z.string().optional(),
    unit_of_measurement: z.string().optional(),
    icon: z.string().optional(),
}

const sensorSchema = z.object(sensorFields).strict()
const controlSchema = z
    .object({
        ...sensorFields,
        type: z.string(),
        min: z.number().optional(),
        max: z.number().optional(),
        step: z.number().optional(),
    })
    .strict()

function sensorMetadata(s: z.infer<typeof sensorSchema>): SensorMetadata {
    return {
        name: s.name,
        publish: s.publish,
        stateClass: s.state_class,
        deviceClass: s.device_class,
        unit: s.unit_of_measurement,
        icon: s.icon,
    }
}

const catalogSchema = z.object({
    input_registers: z.record(z.object({ growatt: descriptorSchema, homeassistant: sensorSchema })),
    holding_registers: z.record(z.object({ growatt: descriptorSchema.optional(), homeassistant: controlSchema })),
})

/** Validate catalog JSON and freeze it into the in-memory model. */
export function parseRegisterCatalog(family: DeviceFamily, json: unknown): RegisterCatalog {
    const parsed = catalogSchema.parse(json)
    const inputRegisters = new Map<string, InputRegister>()
    for (const [name, r] of Object.entries(parsed.input_registers)) {
        inputRegisters.set(name, Object.freeze({ growatt: r.growatt, homeassistant: sensorMetadata(r.homeassistant) }))
    }
    const holdingRegisters = new Map<string, HoldingRegister>()
    for (const [name, r] of Object.entries(parsed.holding_registers)) {
        const { type, min, max, step } = r.homeassistant
        holdingRegisters.set(
            name,
            Object.freeze({
                growatt: r.growatt,
                homeassistant: { ...sensorMetadata(r.homeassistant), type, min, max, step },
            }),
        )
    }
    return Object.freeze({ family, inputRegisters, holdingRegisters })
}

export const REGISTERS_DIR = path.join(__dirname, "..", "registers")

// keyed by file, catalogs never change once read
const loaded = new Map<string, RegisterCatalog>()

export function loadRegisterCatalog(family: DeviceFamily, dir = REGISTERS_DIR): RegisterCatalog {
    const file = path.join(dir, `${family}.json`)
    let catalog = loaded.get(file)
    if (!catalog) {
        catalog = parseRegisterCatalog(family, JSON.parse(fs.readFileSync(file, { encoding: "utf8" })))
        loaded.set(file, catalog)
    }
    return catalog
}

export function loadRegisterCatalogs(dir = REGISTERS_DIR): RegisterCatalogs {
    return Object.freeze({
        neo: loadRegisterCatalog("neo", dir),
        noah: loadRegisterCatalog("noah", dir),
        nexa: loadRegisterCatalog("nexa", dir),
    })
}

export function catalogFor(catalogs: RegisterCatalogs, deviceId: string): RegisterCatalog | undefined {
    const family = deviceFamilyOf(deviceId)
    return family ? catalogs[family] : undefined
}
