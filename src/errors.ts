/**
 * Errors raised while decoding or encoding Growatt frames. Every one of them is
 * scoped to a single message: callers log it and carry on with the next one.
 */

export class GrowattFrameError extends Error {
    constructor(message: string) {
        super(message)
        this.name = "GrowattFrameError"
    }
}

/** Length or bounds violation: truncated buffer, bad register count, wrong constant. */
export class MalformedFrameError extends GrowattFrameError {
    constructor(message: string) {
        super(message)
        this.name = "MalformedFrameError"
    }
}

/** Only raised when the CRC policy is "strict". */
export class ChecksumMismatchError extends GrowattFrameError {
    public readonly expected: number
    public readonly actual: number

    constructor(expected: number, actual: number) {
        super(`crc mismatch: expected ${hex16(expected)}, got ${hex16(actual)}`)
        this.name = "ChecksumMismatchError"
        this.expected = expected
        this.actual = actual
    }
}

/** A Home Assistant command that maps to no register of the device. */
export class UnknownCommandError extends Error {
    public readonly deviceId: string
    public readonly command: string

    constructor(deviceId: string, command: string) {
        super(`unknown command "${command}" for device ${deviceId}`)
        this.name = "UnknownCommandError"
        this.deviceId = deviceId
        this.command = command
    }
}

function hex16(value: number): string {
    return "0x" + value.toString(16).padStart(4, "0")
}
