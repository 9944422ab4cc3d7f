#!/usr/bin/env node

/* Bridge between the MQTT broker Growatt NEO, NOAH and NEXA devices are pointed
 * at and Home Assistant.
 *
 * - Point the device's server setting at the source broker, it publishes on
 *   c/<device id> and listens on s/33/<device id>.
 * - Run `grolink`, optionally with a ~/grolink.config.json or the environment
 *   variables listed in settings.ts.
 * - Devices show up through MQTT discovery once they send their first report.
 * */

import { Bridge } from "./bridge"
import { HomeAssistant } from "./homeassistant"
import { enableLogLevel, log } from "./log"
import { connectBroker } from "./mqtt"
import { loadRegisterCatalogs } from "./registers"
import { loadSettings } from "./settings"

export function startBridge(): Bridge {
    const settings = loadSettings()
    enableLogLevel(settings.logLevel)

    const catalogs = loadRegisterCatalogs()
    const devices = connectBroker("devices", settings.source)
    const homeassistant = new HomeAssistant(connectBroker("homeassistant", settings.target), catalogs, {
        baseTopic: settings.haBaseTopic,
        deviceTimeout: settings.deviceTimeout,
    })
    const bridge = new Bridge(devices, homeassistant, catalogs, { crcPolicy: settings.crcPolicy })
    bridge.start()
    return bridge
}

if (require.main === module) {
    const bridge = startBridge()

    const shutdown = (signal: string) => {
        log.info("%s received, shutting down", signal)
        bridge.stop().then(
            () => process.exit(0),
            (e) => {
                log.error("shutdown:", e)
                process.exit(1)
            },
        )
    }
    process.on("SIGINT", shutdown)
    process.on("SIGTERM", shutdown)

    process.on("uncaughtException", (err) => {
        log.error("uncaughtException:", err)
    })
}
