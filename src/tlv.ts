/* Device configuration arrives as a run of TLV parameters:
 *
 *   u16 key id | u16 length | length bytes value
 *
 * A zero or oversized length, or one running past the buffer, ends the run.
 * Firmware puts a variable preamble in front of the parameters, see
 * findConfigOffset().
 * */

export const MAX_PARAMETER_LENGTH = 512
export const CONFIG_SCAN_START = 0x1c

const CONFIG_FIELDS: ReadonlyMap<number, string> = new Map([
    [4, "data_interval"],
    [5, "unknown_5"],
    [6, "unknown_6"],
    [7, "password"],
    [8, "serial_number"],
    [9, "protocol_version"],
    [10, "unknown_10"],
    [11, "unknown_11"],
    [12, "dns_address"],
    [13, "device_type"],
    [14, "local_ip"],
    [15, "unknown_port"],
    [16, "mac_address"],
    [17, "remote_ip"],
    [18, "remote_port"],
    [19, "remote_url"],
    [20, "model_id"],
    [21, "sw_version"],
    [22, "hw_version"],
    [23, "unknown_23"],
    [24, "unknown_24"],
    [25, "subnet_mask"],
    [26, "default_gateway"],
    [27, "unknown_27"],
    [28, "unknown_28"],
    [29, "unknown_29"],
    [30, "timezone"],
    [31, "datetime"],
    [76, "wifi_signal"],
])

const CONFIG_KEY_IDS: ReadonlyMap<string, number> = new Map(Array.from(CONFIG_FIELDS, ([id, name]): [string, number] => [name, id]))

/**
 * Field name to value, in wire order. Known ids get a name, others are
 * `param_<id>`. `raw` holds the hex of the whole block when nothing parsed.
 */
export interface DeviceConfig {
    readonly [field: string]: string | undefined
}

export interface ConfigParameter {
    readonly keyId: number
    readonly value: string | Uint8Array
}

export function configFieldName(keyId: number): string {
    return CONFIG_FIELDS.get(keyId) ?? `param_${keyId}`
}

export function configKeyId(field: string): number | undefined {
    const known = CONFIG_KEY_IDS.get(field)
    if (known !== undefined) return known
    const match = /^param_(\d+)$/.exec(field)
    return match ? Number(match[1]) : undefined
}

function isPrintable(text: string): boolean {
    for (let i = 0; i < text.length; i++) {
        const c = text.charCodeAt(i)
        if (c < 0x20 || c > 0x7e) return false
    }
    return true
}

function decodeValue(raw: Buffer): string {
    if (raw.some((b) => b > 0x7f)) return raw.toString("hex")
    const text = raw.toString("ascii").replace(/^\x00+|\x00+$/g, "")
    return isPrintable(text) ? text : raw.toString("hex")
}

export function parseDeviceConfig(data: Buffer, offset: number): DeviceConfig {
    const config: Record<string, string> = {}
    const end = data.length
    const start = offset
    let found = false

    while (offset + 4 <= end) {
        const keyId = data.readUInt16BE(offset)
        const length = data.readUInt16BE(offset + 2)
        offset += 4
        if (length === 0 || length > MAX_PARAMETER_LENGTH || offset + length > end) break

        config[configFieldName(keyId)] = decodeValue(data.subarray(offset, offset + length))
        offset += length
        found = true
    }

    if (!found) {
        config.raw = data.subarray(Math.min(start, end)).toString("hex")
    }
    return config
}

/**
 * The first position from 0x1c on that looks like a TLV header
 * (0 < key < 1000, 0 < length < 256), or 0x1c when there is none.
 */
export function findConfigOffset(data: Buffer): number {
    for (let i = CONFIG_SCAN_START; i < data.length - 4; i++) {
        const key = data.readUInt16BE(i)
        const length = data.readUInt16BE(i + 2)
        if (key > 0 && key < 1000 && length > 0 && length < 256) return i
    }
    return CONFIG_SCAN_START
}

export function encodeConfigParameters(params: Iterable<ConfigParameter>): Buffer {
    const parts: Buffer[] = []
    for (const { keyId, value } of params) {
        const raw = typeof value === "string" ? Buffer.from(value, "ascii") : Buffer.from(value)
        if (raw.length === 0 || raw.length > MAX_PARAMETER_LENGTH) {
            throw new RangeError(`config parameter ${keyId} must be 1..${MAX_PARAMETER_LENGTH} bytes, got ${raw.length}`)
        }
        const header = Buffer.allocUnsafe(4)
        header.writeUInt16BE(keyId, 0)
        header.writeUInt16BE(raw.length, 2)
        parts.push(header, raw)
    }
    return Buffer.concat(parts)
}
