import { MalformedAnnouncementError } from "./MalformedAnnouncementError";
import { StatusTopicFilter } from "./StatusTopicFilter";
import { debug } from "./debug";
import { decodeAnnouncement } from "./decodeAnnouncement";
import { error } from "./error";
import { warn } from "./warn";
import type { AnnouncementEvent } from "./AnnouncementEvent";
import type { EventChannel } from "./EventChannel";
import type { MessageBus } from "./MessageBus";

/** Feeds decoded status messages into the device manager's channel. */
export class AnnouncementListener {
    #bus: MessageBus;
    #channel: EventChannel<AnnouncementEvent> | undefined;
    #dropped = 0;

    constructor(bus: MessageBus) {
        this.#bus = bus;
    }

    /** Messages dropped as malformed since start. */
    get dropped(): number {
        return this.#dropped;
    }

    async start(channel: EventChannel<AnnouncementEvent>): Promise<void> {
        this.#channel = channel;
        await this.#bus.subscribe(StatusTopicFilter, (topic: string, payload: Buffer) => {
            this.onMessage(topic, payload);
        });
    }

    async stop(): Promise<void> {
        this.#channel = undefined;
        await this.#bus.unsubscribe(StatusTopicFilter);
    }

    onMessage(topic: string, payload: Buffer | string): void {
        let event: AnnouncementEvent;
        try {
            event = decodeAnnouncement(topic, payload);
        } catch (err) {
            ++this.#dropped;
            if (err instanceof MalformedAnnouncementError) {
                warn(`Dropping status message: ${err.message}`);
            } else {
                error(`Failed to decode status message on ${topic}:`, err);
            }
            return;
        }

        debug(`Received ${event.type} from ${event.clientId}`);
        if (!this.#channel?.push(event)) {
            debug(`Ignoring ${event.type} from ${event.clientId}, not running`);
        }
    }
}
