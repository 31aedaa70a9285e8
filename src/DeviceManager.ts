import { AnnouncementListener } from "./AnnouncementListener";
import { EventChannel } from "./EventChannel";
import { IdentityRegistry } from "./IdentityRegistry";
import { InstanceAnnouncer } from "./InstanceAnnouncer";
import { ServiceExposer } from "./ServiceExposer";
import { StorageUnavailableError } from "./StorageUnavailableError";
import { VERSION } from "./version";
import { debug } from "./debug";
import { error } from "./error";
import { log } from "./log";
import { telemetryTopic } from "./telemetryTopic";
import { warn } from "./warn";
import type { AnnouncementEvent } from "./AnnouncementEvent";
import type { ClientSummary } from "./ClientSummary";
import type { ConnectEvent } from "./ConnectEvent";
import type { DisconnectEvent } from "./DisconnectEvent";
import type { ExposedService } from "./ExposedService";
import type { IpcBus } from "./IpcBus";
import type { MessageBus } from "./MessageBus";
import type { ServiceInstance } from "./ServiceInstance";
import type { ServiceSummary } from "./ServiceSummary";
import type { SettingsStore } from "./SettingsStore";

export interface DeviceManagerOptions {
    store: SettingsStore;
    ipcBus: IpcBus;
    messageBus: MessageBus;
    pathPrefix?: string;
    processName?: string;
}

/**
 * Registration state machine. Every status message becomes one event on a
 * single channel, and events are applied one at a time to completion:
 *
 *   UNREGISTERED -> ACTIVE -> INACTIVE -> ACTIVE ...
 *
 * A failure is logged and ends only the event that caused it.
 */
export class DeviceManager {
    #registry: IdentityRegistry;
    #exposer: ServiceExposer;
    #announcer: InstanceAnnouncer;
    #listener: AnnouncementListener;
    #channel: EventChannel<AnnouncementEvent> | undefined;
    #ipcBus: IpcBus;
    #loop: Promise<void> | undefined;

    constructor(options: DeviceManagerOptions) {
        this.#ipcBus = options.ipcBus;
        this.#registry = new IdentityRegistry(options.store);
        this.#exposer = new ServiceExposer({
            ipcBus: options.ipcBus,
            store: options.store,
            pathPrefix: options.pathPrefix ?? "mqttdevices",
            processName: options.processName ?? "mqtt-devices",
            version: VERSION
        });
        this.#announcer = new InstanceAnnouncer(options.messageBus);
        this.#listener = new AnnouncementListener(options.messageBus);
    }

    get registry(): IdentityRegistry {
        return this.#registry;
    }

    get exposer(): ServiceExposer {
        return this.#exposer;
    }

    get announcer(): InstanceAnnouncer {
        return this.#announcer;
    }

    get listener(): AnnouncementListener {
        return this.#listener;
    }

    get running(): boolean {
        return this.#loop !== undefined;
    }

    async start(): Promise<void> {
        if (this.#loop) {
            throw new Error("Device manager is already running");
        }
        // A stopped channel stays closed, so every start gets its own.
        const channel = new EventChannel<AnnouncementEvent>();
        await this.#listener.start(channel);
        this.#channel = channel;
        this.#loop = this.#run(channel);
        log("Device manager started");
    }

    /**
     * Finishes queued events, then takes every exposed service off the IPC
     * bus. Replies still waiting for the broker are not waited for.
     */
    async stop(): Promise<void> {
        const loop = this.#loop;
        if (!loop) {
            return;
        }
        try {
            await this.#listener.stop();
        } catch (err) {
            warn("Failed to unsubscribe from status messages:", err);
        }
        this.#channel?.close();
        await loop;
        this.#loop = undefined;
        this.#channel = undefined;

        const count = this.#exposer.retractAll();
        for (const instance of this.#registry.activeInstances()) {
            this.#registry.release(instance.clientId, instance.serviceKey);
        }
        log(`Device manager stopped, retracted ${count} service(s)`);
    }

    /** Applies one event. Never rejects. */
    async handle(event: AnnouncementEvent): Promise<void> {
        try {
            if (event.type === "connect") {
                await this.#connect(event);
            } else {
                this.#disconnect(event);
            }
        } catch (err) {
            if (err instanceof StorageUnavailableError) {
                error(`Registration of ${event.clientId} failed, waiting for the device to retry: ${err.message}`, err.cause);
            } else {
                error(`Failed to handle ${event.type} from ${event.clientId}:`, err);
            }
        }
    }

    setCustomName(serviceType: string, deviceInstance: number, name: string): Promise<void> {
        return this.#exposer.setCustomName(serviceType, deviceInstance, name);
    }

    clients(): ClientSummary[] {
        const clients = new Map<string, ServiceSummary[]>();
        for (const exposed of this.#exposer.exposed()) {
            const { clientId } = exposed.instance;
            let services = clients.get(clientId);
            if (!services) {
                services = [];
                clients.set(clientId, services);
            }
            services.push(this.#summarize(exposed));
        }

        return Array.from(clients, ([clientId, services]: [string, ServiceSummary[]]) => ({
            clientId,
            services: services.sort((a: ServiceSummary, b: ServiceSummary) => a.serviceKey.localeCompare(b.serviceKey))
        })).sort((a: ClientSummary, b: ClientSummary) => a.clientId.localeCompare(b.clientId));
    }

    async #run(channel: EventChannel<AnnouncementEvent>): Promise<void> {
        for await (const event of channel) {
            await this.handle(event);
        }
    }

    async #connect(event: ConnectEvent): Promise<void> {
        const { clientId } = event;
        const declared = new Map(Object.entries(event.services));
        const previous = this.#registry.activeInstances(clientId);

        // Every number is committed before anything on the IPC bus changes.
        const allocated: Array<[string, number]> = [];
        for (const [serviceKey, serviceType] of declared) {
            allocated.push([serviceKey, await this.#registry.allocate(clientId, serviceKey, serviceType)]);
        }

        for (const instance of previous) {
            if (declared.get(instance.serviceKey) !== instance.serviceType) {
                this.#deactivate(instance);
            }
        }

        for (const [serviceKey, serviceType] of declared) {
            const current = previous.find((instance: ServiceInstance) => instance.serviceKey === serviceKey);
            if (current && current.serviceType === serviceType && this.#exposer.isExposed(clientId, serviceKey)) {
                continue;
            }

            const instance = this.#registry.activate(clientId, serviceKey, serviceType);
            try {
                await this.#exposer.expose(instance);
            } catch (err) {
                this.#registry.release(clientId, serviceKey);
                error(`Failed to expose ${clientId}/${serviceKey}:`, err);
            }
        }

        // Returns before the broker acknowledges the reply
        this.#announcer.announce(clientId, Object.fromEntries(allocated));
    }

    #disconnect(event: DisconnectEvent): void {
        const retracted = this.#exposer.retractClient(event.clientId);
        for (const instance of this.#registry.activeInstances(event.clientId)) {
            this.#registry.release(instance.clientId, instance.serviceKey);
        }
        debug(`${event.clientId} disconnected, ${retracted} service(s) retracted`);
    }

    #deactivate(instance: ServiceInstance): void {
        this.#exposer.retract(instance.clientId, instance.serviceKey);
        this.#registry.release(instance.clientId, instance.serviceKey);
    }

    #summarize(exposed: ExposedService): ServiceSummary {
        const { serviceKey, serviceType, deviceInstance } = exposed.instance;
        return {
            serviceKey,
            serviceType,
            deviceInstance,
            path: exposed.handle.path,
            telemetryTopics: exposed.definition.attributes.map((attribute: string) =>
                telemetryTopic(this.#ipcBus.portalId, serviceType, deviceInstance, attribute)
            )
        };
    }
}
