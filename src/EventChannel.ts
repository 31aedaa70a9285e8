import { createPromise } from "./createPromise";
import type { Deferred } from "./Deferred";

/**
 * Ordered single-consumer queue. Producers push synchronously, one
 * `for await` loop drains it, so items are handled strictly one at a time
 * in arrival order.
 */
export class EventChannel<T> implements AsyncIterable<T> {
    #items: T[] = [];
    #wake: Deferred<void> | undefined;
    #closed = false;
    #iterating = false;

    get size(): number {
        return this.#items.length;
    }

    get closed(): boolean {
        return this.#closed;
    }

    /** Returns false once the channel is closed; the item is dropped. */
    push(item: T): boolean {
        if (this.#closed) {
            return false;
        }
        this.#items.push(item);
        this.#wake?.resolve();
        return true;
    }

    /** Items already queued are still delivered, then iteration ends. */
    close(): void {
        this.#closed = true;
        this.#wake?.resolve();
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
        if (this.#iterating) {
            throw new Error("EventChannel supports a single consumer");
        }
        this.#iterating = true;
        try {
            while (true) {
                if (this.#items.length > 0) {
                    const [next] = this.#items.splice(0, 1);
                    yield next;
                    continue;
                }
                if (this.#closed) {
                    return;
                }
                this.#wake = createPromise();
                await this.#wake.promise;
                this.#wake = undefined;
            }
        } finally {
            this.#iterating = false;
        }
    }
}
