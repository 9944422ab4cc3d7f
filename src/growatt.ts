import { ChecksumMismatchError, MalformedFrameError } from "./errors"
import { log } from "./log"

/* Framing shared by every Growatt MQTT message:
 *
 * | bytes      | meaning                                              |
 * |------------|------------------------------------------------------|
 * | 0..7       | cleartext header: counter, constant 7, length, type  |
 * | 8..len-2   | body, xor'ed with the repeating key "Growatt"        |
 * | last 2     | CRC-16/MODBUS (big endian) over all preceding bytes  |
 *
 * The scrambling is not encryption, just a fixed mask.
 * */

export const HEADER_SIZE = 8
export const CRC_SIZE = 2
export const SCRAMBLE_KEY = Buffer.from("Growatt", "ascii")

export type CrcPolicy = "lenient" | "strict"

export function modbusCrc(data: Uint8Array): number {
    let crc = 0xffff
    for (let i = 0; i < data.length; i++) {
        crc ^= data[i]
        for (let b = 0; b < 8; b++) {
            if ((crc & 0x0001) != 0) {
                crc >>= 1
                crc ^= 0xa001
            } else {
                crc >>= 1
            }
        }
    }
    return crc
}

function xor(data: Uint8Array, key: Uint8Array): Buffer {
    const result = Buffer.allocUnsafe(data.length)
    const keylength = key.length
    let k = 0
    for (let i = 0; i < data.length; i++) {
        result[i] = data[i] ^ key[k]
        if (++k >= keylength) {
            k = 0
        }
    }
    return result
}

/** Mask everything past the 8 byte header. Its own inverse. */
export function scramble(frame: Uint8Array): Buffer {
    if (frame.length < HEADER_SIZE) {
        throw new MalformedFrameError(`frame too short to scramble: ${frame.length} bytes`)
    }
    return Buffer.concat([frame.subarray(0, HEADER_SIZE), xor(frame.subarray(HEADER_SIZE), SCRAMBLE_KEY)])
}

export const descramble = scramble

export function appendCrc(frame: Uint8Array): Buffer {
    const result = Buffer.alloc(frame.length + CRC_SIZE)
    result.set(frame, 0)
    result.writeUInt16BE(modbusCrc(frame), frame.length)
    return result
}

export function verifyCrc(frame: Uint8Array): boolean {
    if (frame.length <= CRC_SIZE) return false
    const end = frame.length - CRC_SIZE
    const crc = (frame[end] << 8) | frame[end + 1]
    return modbusCrc(frame.subarray(0, end)) === crc
}

export interface OpenedFrame {
    /** Descrambled frame without the CRC trailer. */
    readonly body: Buffer
    readonly crcValid: boolean
}

export interface OpenFrameOptions {
    crcPolicy?: CrcPolicy
}

/** Receive path: check the CRC of a raw payload, then strip it and descramble. */
export function openFrame(payload: Uint8Array, options: OpenFrameOptions = {}): OpenedFrame {
    if (payload.length < HEADER_SIZE + CRC_SIZE) {
        throw new MalformedFrameError(`frame too short: ${payload.length} bytes`)
    }
    const end = payload.length - CRC_SIZE
    const expected = modbusCrc(payload.subarray(0, end))
    const actual = (payload[end] << 8) | payload[end + 1]
    const crcValid = expected === actual
    if (!crcValid) {
        if (options.crcPolicy === "strict") throw new ChecksumMismatchError(expected, actual)
        log.warn("crc mismatch (expected %s, got %s), decoding anyway", expected.toString(16), actual.toString(16))
    }
    return { body: descramble(payload.subarray(0, end)), crcValid }
}

/** Send path: scramble a cleartext frame and append its CRC. */
export function sealFrame(frame: Uint8Array): Buffer {
    return appendCrc(scramble(frame))
}

/** Classic 16 bytes per line dump, used when inspecting captured frames. */
export function hexdump(data: Uint8Array, width = 16): string {
    const lines: string[] = []
    for (let i = 0; i < data.length; i += width) {
        const chunk = data.subarray(i, i + width)
        const hex = Array.from(chunk, (b) => b.toString(16).padStart(2, "0").toUpperCase()).join(" ")
        const ascii = Array.from(chunk, (b) => (b >= 0x20 && b <= 0x7e ? String.fromCharCode(b) : ".")).join("")
        lines.push(`${i.toString(16).padStart(8, "0").toUpperCase()}  ${hex.padEnd(width * 3)} |${ascii}|`)
    }
    return lines.join("\n")
}

/** Lossy ASCII: bytes above 0x7f are dropped, trailing NULs trimmed. */
export function asciiText(data: Uint8Array): string {
    let text = ""
    for (const b of data) {
        if (b < 0x80) text += String.fromCharCode(b)
    }
    return text.replace(/\x00+$/, "")
}

/** NUL padded fixed width ASCII field, as used for device ids. */
export function asciiField(text: string, length: number): Buffer {
    const field = Buffer.alloc(length)
    field.write(text, 0, length, "ascii")
    return field
}
