import { connect } from "mqtt";
import { debug } from "./debug";
import { error } from "./error";
import { log } from "./log";
import { readFileSync } from "fs";
import { topicMatches } from "./topicMatches";
import { verbose } from "./verbose";
import type { IClientOptions, MqttClient } from "mqtt";
import type { MessageBus } from "./MessageBus";
import type { MessageHandler } from "./MessageHandler";
import type { MqttBusOptions } from "./MqttBusOptions";

export class MqttMessageBus implements MessageBus {
    #client: MqttClient;
    #handlers = new Map<string, MessageHandler>();

    constructor(client: MqttClient) {
        this.#client = client;

        this.#client.on("connect", () => {
            log("Connected to MQTT broker");
        });
        this.#client.on("reconnect", () => {
            debug("Reconnecting to MQTT broker...");
        });
        this.#client.on("offline", () => {
            log("MQTT broker connection lost");
        });
        this.#client.on("error", (err: Error) => {
            error("MQTT error:", err.message);
        });
        this.#client.on("message", (topic: string, payload: Buffer) => {
            this.#dispatch(topic, payload);
        });
    }

    static connect(options: MqttBusOptions): MqttMessageBus {
        const clientOptions: IClientOptions = {
            clientId: options.clientId,
            clean: true,
            reconnectPeriod: 5000
        };
        if (options.username !== null) {
            clientOptions.username = options.username;
        }
        if (options.password !== null) {
            clientOptions.password = options.password;
        }
        if (options.caFile !== null) {
            clientOptions.ca = readFileSync(options.caFile);
            clientOptions.rejectUnauthorized = true;
        }

        debug(`Connecting to MQTT broker at ${options.url} as ${options.clientId}`);
        return new MqttMessageBus(connect(options.url, clientOptions));
    }

    get connected(): boolean {
        return this.#client.connected;
    }

    async subscribe(topicFilter: string, handler: MessageHandler): Promise<void> {
        this.#handlers.set(topicFilter, handler);
        await this.#client.subscribeAsync(topicFilter, { qos: 1 });
        debug(`Subscribed to ${topicFilter}`);
    }

    async unsubscribe(topicFilter: string): Promise<void> {
        this.#handlers.delete(topicFilter);
        if (this.#client.connected) {
            await this.#client.unsubscribeAsync(topicFilter);
        }
    }

    async publish(topic: string, payload: string): Promise<void> {
        verbose(`Publishing ${topic}: ${payload}`);
        await this.#client.publishAsync(topic, payload, { qos: 1, retain: false });
    }

    /** Unacknowledged publishes are dropped when the broker is unreachable. */
    async close(): Promise<void> {
        this.#handlers.clear();
        await this.#client.endAsync(!this.#client.connected);
    }

    #dispatch(topic: string, payload: Buffer): void {
        for (const [filter, handler] of this.#handlers) {
            if (topicMatches(filter, topic)) {
                handler(topic, payload);
            }
        }
    }
}
