import { BusPublishError } from "./BusPublishError";
import { debug } from "./debug";
import { replyTopic } from "./replyTopic";
import { warn } from "./warn";
import type { MessageBus } from "./MessageBus";

export class InstanceAnnouncer {
    #bus: MessageBus;
    #inFlight = new Set<Promise<void>>();

    constructor(bus: MessageBus) {
        this.#bus = bus;
    }

    /** Replies that have been handed to the bus and not yet acknowledged. */
    get pending(): number {
        return this.#inFlight.size;
    }

    /**
     * Sends the serviceKey -> device instance map of one announcement to
     * the device, as a single message. Returns once the publish is started;
     * a failed publish is logged as a BusPublishError and the registration
     * stays in place until the device announces again.
     */
    announce(clientId: string, instances: Record<string, number>): void {
        const topic = replyTopic(clientId);
        const payload = JSON.stringify(instances);
        const sent: Promise<void> = this.#bus.publish(topic, payload).then(
            () => {
                this.#inFlight.delete(sent);
                debug(`Announced ${payload} on ${topic}`);
            },
            (err: unknown) => {
                this.#inFlight.delete(sent);
                warn(
                    `Registration of ${clientId} stays in place until the device announces again:`,
                    new BusPublishError(`Failed to publish ${topic}`, clientId, topic, { cause: err })
                );
            }
        );
        this.#inFlight.add(sent);
    }
}
