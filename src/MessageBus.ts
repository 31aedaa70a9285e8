import type { MessageHandler } from "./MessageHandler";

/** Publish/subscribe connection the device manager talks to devices over. */
export interface MessageBus {
    subscribe(topicFilter: string, handler: MessageHandler): Promise<void>;
    unsubscribe(topicFilter: string): Promise<void>;
    publish(topic: string, payload: string): Promise<void>;
}
