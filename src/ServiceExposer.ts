import { StorageUnavailableError } from "./StorageUnavailableError";
import { customNameKey } from "./customNameKey";
import { debug } from "./debug";
import { genericServiceDefinition, serviceCatalog } from "./serviceCatalog";
import { isKnownServiceType } from "./isKnownServiceType";
import { log } from "./log";
import { serviceId } from "./serviceId";
import { servicePath } from "./servicePath";
import { warn } from "./warn";
import type { ExposedService } from "./ExposedService";
import type { IpcAttributes } from "./IpcAttributes";
import type { IpcBus } from "./IpcBus";
import type { ServiceDefinition } from "./ServiceDefinition";
import type { ServiceInstance } from "./ServiceInstance";
import type { SettingsStore } from "./SettingsStore";

export interface ServiceExposerOptions {
    ipcBus: IpcBus;
    store: SettingsStore;
    pathPrefix: string;
    processName: string;
    version: string;
}

/**
 * Keeps one IPC object per active service. Objects are always built from
 * scratch, so a service that comes back starts with unknown readings.
 */
export class ServiceExposer {
    #ipcBus: IpcBus;
    #store: SettingsStore;
    #pathPrefix: string;
    #processName: string;
    #version: string;
    #exposed = new Map<string, ExposedService>();

    constructor(options: ServiceExposerOptions) {
        this.#ipcBus = options.ipcBus;
        this.#store = options.store;
        this.#pathPrefix = options.pathPrefix;
        this.#processName = options.processName;
        this.#version = options.version;
    }

    static definitionFor(serviceType: string): ServiceDefinition | undefined {
        return isKnownServiceType(serviceType) ? serviceCatalog[serviceType] : undefined;
    }

    get size(): number {
        return this.#exposed.size;
    }

    async expose(instance: ServiceInstance): Promise<ExposedService> {
        const { clientId, serviceKey, serviceType, deviceInstance } = instance;
        const id = serviceId(clientId, serviceKey);
        this.retract(clientId, serviceKey);

        let definition = ServiceExposer.definitionFor(serviceType);
        if (!definition) {
            warn(`Unknown service type '${serviceType}' for ${id}, exposing a generic placeholder`);
            definition = genericServiceDefinition;
        }

        const attributes: IpcAttributes = {
            "Mgmt/ProcessName": this.#processName,
            "Mgmt/ProcessVersion": this.#version,
            "Mgmt/Connection": `MQTT ${id}`,
            DeviceInstance: deviceInstance,
            ProductName: definition.productName,
            CustomName: await this.#customName(serviceType, deviceInstance),
            Connected: 1
        };
        for (const attribute of definition.attributes) {
            attributes[attribute] = null;
        }

        const path = servicePath(this.#pathPrefix, serviceType, deviceInstance);
        const handle = this.#ipcBus.register(path, attributes);
        const exposed: ExposedService = { instance: { ...instance }, definition, handle };
        this.#exposed.set(id, exposed);
        log(`Exposed ${id} as ${path}`);
        return exposed;
    }

    /** Returns false when nothing was exposed for the service. */
    retract(clientId: string, serviceKey: string): boolean {
        const id = serviceId(clientId, serviceKey);
        const exposed = this.#exposed.get(id);
        if (!exposed) {
            return false;
        }
        this.#exposed.delete(id);
        this.#ipcBus.unregister(exposed.handle);
        log(`Retracted ${id} from ${exposed.handle.path}`);
        return true;
    }

    retractClient(clientId: string): number {
        let count = 0;
        for (const exposed of this.exposed(clientId)) {
            if (this.retract(exposed.instance.clientId, exposed.instance.serviceKey)) {
                ++count;
            }
        }
        return count;
    }

    retractAll(): number {
        let count = 0;
        for (const exposed of this.exposed()) {
            if (this.retract(exposed.instance.clientId, exposed.instance.serviceKey)) {
                ++count;
            }
        }
        return count;
    }

    isExposed(clientId: string, serviceKey: string): boolean {
        return this.#exposed.has(serviceId(clientId, serviceKey));
    }

    exposed(clientId?: string): ExposedService[] {
        return Array.from(this.#exposed.values()).filter(
            (exposed: ExposedService) => clientId === undefined || exposed.instance.clientId === clientId
        );
    }

    find(serviceType: string, deviceInstance: number): ExposedService | undefined {
        return Array.from(this.#exposed.values()).find(
            (exposed: ExposedService) =>
                exposed.instance.serviceType === serviceType && exposed.instance.deviceInstance === deviceInstance
        );
    }

    /**
     * Persists the display name of a service instance and shows it on the
     * live object, if there is one.
     *
     * @throws StorageUnavailableError when the name cannot be stored
     */
    async setCustomName(serviceType: string, deviceInstance: number, name: string): Promise<void> {
        try {
            await this.#store.set(customNameKey(serviceType, deviceInstance), name);
        } catch (err) {
            throw new StorageUnavailableError(
                `Failed to store custom name for ${serviceType} instance ${deviceInstance}`,
                null,
                { cause: err }
            );
        }

        const exposed = this.find(serviceType, deviceInstance);
        if (exposed) {
            this.#ipcBus.update(exposed.handle, "CustomName", name);
        }
        debug(`Custom name of ${serviceType} instance ${deviceInstance} set to '${name}'`);
    }

    async #customName(serviceType: string, deviceInstance: number): Promise<string> {
        let stored: unknown;
        try {
            stored = await this.#store.get(customNameKey(serviceType, deviceInstance));
        } catch (err) {
            warn(`Could not read custom name of ${serviceType} instance ${deviceInstance}:`, err);
            return "";
        }
        return typeof stored === "string" ? stored : "";
    }
}
