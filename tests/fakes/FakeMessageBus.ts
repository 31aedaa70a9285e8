import { topicMatches } from "../../src/topicMatches";
import type { MessageBus } from "../../src/MessageBus";
import type { MessageHandler } from "../../src/MessageHandler";

export interface PublishedMessage {
    topic: string;
    payload: string;
}

export class FakeMessageBus implements MessageBus {
    readonly published: PublishedMessage[] = [];
    readonly handlers = new Map<string, MessageHandler>();
    failPublish = false;
    /** Publishes are recorded but never acknowledged, like a stalled broker. */
    holdPublishes = false;

    async subscribe(topicFilter: string, handler: MessageHandler): Promise<void> {
        this.handlers.set(topicFilter, handler);
    }

    async unsubscribe(topicFilter: string): Promise<void> {
        this.handlers.delete(topicFilter);
    }

    publish(topic: string, payload: string): Promise<void> {
        if (this.failPublish) {
            return Promise.reject(new Error("broker unavailable"));
        }
        this.published.push({ topic, payload });
        return this.holdPublishes ? new Promise<void>(() => {}) : Promise.resolve();
    }

    deliver(topic: string, payload: unknown): void {
        const text = typeof payload === "string" ? payload : JSON.stringify(payload);
        for (const [filter, handler] of this.handlers) {
            if (topicMatches(filter, topic)) {
                handler(topic, Buffer.from(text, "utf-8"));
            }
        }
    }
}
