import { InstanceTableSchema } from "./InstanceTableSchema";
import { StorageUnavailableError } from "./StorageUnavailableError";
import { debug } from "./debug";
import { describeZodError } from "./describeZodError";
import { log } from "./log";
import { serviceId } from "./serviceId";
import { smallestUnusedInstance } from "./smallestUnusedInstance";
import type { ServiceInstance } from "./ServiceInstance";
import type { SettingsStore } from "./SettingsStore";

/**
 * Owns the (clientId, serviceKey, serviceType) -> device instance mapping.
 *
 * Each service type's allocations are stored under a single settings key,
 * so committing a new instance is one atomic write. Allocations for the same
 * service type run one after another. Mappings are never removed; a device
 * that comes back gets the number it had before.
 */
export class IdentityRegistry {
    #store: SettingsStore;
    #tables = new Map<string, Map<string, number>>();
    #instances = new Map<string, ServiceInstance>();
    #queues = new Map<string, Promise<void>>();

    constructor(store: SettingsStore) {
        this.#store = store;
    }

    static storeKey(serviceType: string): string {
        return `registry/${serviceType}`;
    }

    /**
     * Returns the device instance for the service, allocating and persisting
     * the smallest free number of its service type the first time.
     *
     * @throws StorageUnavailableError when the mapping cannot be read or committed
     */
    allocate(clientId: string, serviceKey: string, serviceType: string): Promise<number> {
        return this.#serialize(serviceType, async (): Promise<number> => {
            const id = serviceId(clientId, serviceKey);
            const table = await this.#table(serviceType, clientId);

            let deviceInstance = table.get(id);
            if (deviceInstance === undefined) {
                deviceInstance = smallestUnusedInstance(table.values());
                const next = new Map(table);
                next.set(id, deviceInstance);
                try {
                    await this.#store.set(IdentityRegistry.storeKey(serviceType), Object.fromEntries(next));
                } catch (err) {
                    throw new StorageUnavailableError(
                        `Failed to persist ${serviceType} instance for ${id}`,
                        clientId,
                        { cause: err }
                    );
                }
                this.#tables.set(serviceType, next);
                log(`Allocated ${serviceType} instance ${deviceInstance} to ${id}`);
            } else {
                debug(`Reusing ${serviceType} instance ${deviceInstance} for ${id}`);
            }
            return deviceInstance;
        });
    }

    /** The persisted instance, without allocating one. */
    async lookup(clientId: string, serviceKey: string, serviceType: string): Promise<number | undefined> {
        const table = await this.#table(serviceType, clientId);
        return table.get(serviceId(clientId, serviceKey));
    }

    /**
     * Marks a service active under the type it was allocated for.
     * Allocating alone never changes what instances() reports.
     *
     * @throws Error if the service was never allocated for serviceType
     */
    activate(clientId: string, serviceKey: string, serviceType: string): ServiceInstance {
        const id = serviceId(clientId, serviceKey);
        const deviceInstance = this.#tables.get(serviceType)?.get(id);
        if (deviceInstance === undefined) {
            throw new Error(`No ${serviceType} instance allocated for ${id}`);
        }
        const instance: ServiceInstance = { clientId, serviceKey, serviceType, deviceInstance, active: true };
        this.#instances.set(id, instance);
        return { ...instance };
    }

    /** Marks the service inactive. The persisted number stays reserved. */
    release(clientId: string, serviceKey: string): void {
        const instance = this.#instances.get(serviceId(clientId, serviceKey));
        if (instance) {
            instance.active = false;
        }
    }

    instance(clientId: string, serviceKey: string): ServiceInstance | undefined {
        const instance = this.#instances.get(serviceId(clientId, serviceKey));
        return instance ? { ...instance } : undefined;
    }

    instances(): ServiceInstance[] {
        return Array.from(this.#instances.values(), (instance: ServiceInstance) => ({ ...instance }));
    }

    activeInstances(clientId?: string): ServiceInstance[] {
        return this.instances().filter(
            (instance: ServiceInstance) => instance.active && (clientId === undefined || instance.clientId === clientId)
        );
    }

    async #table(serviceType: string, clientId: string): Promise<Map<string, number>> {
        const cached = this.#tables.get(serviceType);
        if (cached) {
            return cached;
        }

        const key = IdentityRegistry.storeKey(serviceType);
        let stored: unknown;
        try {
            stored = await this.#store.get(key);
        } catch (err) {
            throw new StorageUnavailableError(`Failed to read ${key}`, clientId, { cause: err });
        }

        let table: Map<string, number>;
        if (stored === undefined) {
            table = new Map();
        } else {
            const parsed = InstanceTableSchema.safeParse(stored);
            if (!parsed.success) {
                throw new StorageUnavailableError(
                    `Stored ${key} is invalid: ${describeZodError(parsed.error)}`,
                    clientId
                );
            }
            table = new Map(Object.entries(parsed.data));
        }
        this.#tables.set(serviceType, table);
        return table;
    }

    #serialize<T>(serviceType: string, task: () => Promise<T>): Promise<T> {
        const previous = this.#queues.get(serviceType) ?? Promise.resolve();
        const run = previous.then(task);
        this.#queues.set(
            serviceType,
            run.then(
                () => undefined,
                () => undefined
            )
        );
        return run;
    }
}
