import Debug from "debug"
import { describe, it, expect, afterEach } from "vitest"
import { enableLogLevel, namespacesFor } from "../src/log"

describe("namespacesFor", () => {
    it("enables the level and everything above it", () => {
        expect(namespacesFor("warn")).toBe("grolink:warn,grolink:error")
        expect(namespacesFor("error")).toBe("grolink:error")
        expect(namespacesFor("trace")).toBe("grolink:trace,grolink:debug,grolink:info,grolink:warn,grolink:error")
    })
})

describe("enableLogLevel", () => {
    afterEach(() => {
        Debug.disable()
    })

    it("turns on the namespaces of the level", () => {
        enableLogLevel("info", {})
        expect(Debug.enabled("grolink:debug")).toBe(false)
        expect(Debug.enabled("grolink:info")).toBe(true)
        expect(Debug.enabled("grolink:error")).toBe(true)
    })

    it("leaves an explicit DEBUG alone", () => {
        Debug.disable()
        enableLogLevel("trace", { DEBUG: "other:*" })
        expect(Debug.enabled("grolink:trace")).toBe(false)
    })
})
