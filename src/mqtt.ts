import { connect } from "mqtt"
import type { IClientOptions, MqttClient } from "mqtt"
import { log } from "./log"

export interface BrokerSettings {
    readonly host: string
    readonly port: number
    readonly tls: boolean
    readonly username?: string
    readonly password?: string
}

export type UserProperties = Readonly<Record<string, string>>

export interface PublishOptions {
    readonly retain?: boolean
    readonly userProperties?: UserProperties
}

export type MessageHandler = (topic: string, payload: Buffer, userProperties: UserProperties) => void

/** The part of an MQTT connection the bridge needs. */
export interface Broker {
    subscribe(topics: string | ReadonlyArray<string>): void
    publish(topic: string, payload: string | Buffer, options?: PublishOptions): void
    onMessage(handler: MessageHandler): void
    close(): Promise<void>
}

export function brokerUrl(settings: BrokerSettings): string {
    return `${settings.tls ? "mqtts" : "mqtt"}://${settings.host}:${settings.port}`
}

function flattenUserProperties(properties: Readonly<Record<string, string | string[]>> | undefined): UserProperties {
    const result: Record<string, string> = {}
    if (!properties) return result
    for (const [key, value] of Object.entries(properties)) {
        result[key] = Array.isArray(value) ? value.join(",") : value
    }
    return result
}

export class MqttBroker implements Broker {
    constructor(
        private readonly name: string,
        private readonly client: MqttClient,
    ) {}

    subscribe(topics: string | ReadonlyArray<string>) {
        const list = typeof topics === "string" ? [topics] : [...topics]
        this.client.subscribe(list, (error) => {
            if (error) {
                log.error("%s: subscribe to %o failed: %s", this.name, list, error.message)
            } else {
                log.debug("%s: subscribed to %o", this.name, list)
            }
        })
    }

    publish(topic: string, payload: string | Buffer, options: PublishOptions = {}) {
        const properties = options.userProperties ? { userProperties: { ...options.userProperties } } : undefined
        this.client.publish(topic, payload, { retain: options.retain ?? false, properties }, (error) => {
            if (error) log.warn("%s: publish to %s failed: %s", this.name, topic, error.message)
        })
    }

    onMessage(handler: MessageHandler) {
        this.client.on("message", (topic, payload, packet) => {
            handler(topic, payload, flattenUserProperties(packet.properties?.userProperties))
        })
    }

    async close() {
        await this.client.endAsync()
    }
}

/** Connect to a broker over MQTT v5, the devices flag forwarded messages with user properties. */
export function connectBroker(name: string, settings: BrokerSettings): MqttBroker {
    const url = brokerUrl(settings)
    log.info("%s: connecting to %s", name, url)

    const options: IClientOptions = {
        clientId: `grolink_${name}_` + Math.random().toString(16).slice(3),
        clean: true,
        protocolVersion: 5,
        username: settings.username,
        password: settings.password,
        // device brokers run with self signed certificates
        rejectUnauthorized: false,
    }
    const client = connect(url, options)

    client.on("error", (error) => {
        log.error("%s: mqtt error: %s", name, error.message)
    })
    client.on("connect", () => {
        log.info("%s: connected", name)
    })
    client.on("reconnect", () => {
        log.debug("%s: reconnecting", name)
    })

    return new MqttBroker(name, client)
}
