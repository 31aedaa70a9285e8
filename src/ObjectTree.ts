import { EventEmitter } from "events";
import { verbose } from "./verbose";
import type { IpcAttributes } from "./IpcAttributes";
import type { IpcBus } from "./IpcBus";
import type { IpcHandle } from "./IpcHandle";
import type { IpcObjectSnapshot } from "./IpcObjectSnapshot";
import type { IpcValue } from "./IpcValue";

interface ObjectTreeEvents {
    object_added: [object: IpcObjectSnapshot];
    attribute_changed: [path: string, attribute: string, value: IpcValue];
    object_removed: [path: string];
}

interface TreeEntry {
    id: number;
    attributes: IpcAttributes;
}

/**
 * In-process IPC bus: a flat tree of objects keyed by path. Observers (the
 * monitor server) follow it through events.
 */
export class ObjectTree extends EventEmitter<ObjectTreeEvents> implements IpcBus {
    readonly portalId: string;
    #objects = new Map<string, TreeEntry>();
    #nextId = 1;

    constructor(portalId: string) {
        super();
        this.portalId = portalId;
    }

    get size(): number {
        return this.#objects.size;
    }

    register(path: string, attributes: IpcAttributes): IpcHandle {
        if (this.#objects.has(path)) {
            throw new Error(`IPC object ${path} is already registered`);
        }
        const entry: TreeEntry = { id: this.#nextId++, attributes: { ...attributes } };
        this.#objects.set(path, entry);
        verbose(`IPC object registered: ${path}`);
        this.emit("object_added", { path, attributes: { ...entry.attributes } });
        return { id: entry.id, path };
    }

    update(handle: IpcHandle, attribute: string, value: IpcValue): void {
        const entry = this.#entry(handle);
        if (!Object.hasOwn(entry.attributes, attribute)) {
            throw new Error(`IPC object ${handle.path} has no attribute ${attribute}`);
        }
        if (entry.attributes[attribute] === value) {
            return;
        }
        entry.attributes[attribute] = value;
        this.emit("attribute_changed", handle.path, attribute, value);
    }

    unregister(handle: IpcHandle): void {
        const entry = this.#objects.get(handle.path);
        if (!entry || entry.id !== handle.id) {
            return;
        }
        this.#objects.delete(handle.path);
        verbose(`IPC object removed: ${handle.path}`);
        this.emit("object_removed", handle.path);
    }

    get(path: string): IpcObjectSnapshot | undefined {
        const entry = this.#objects.get(path);
        return entry ? { path, attributes: { ...entry.attributes } } : undefined;
    }

    snapshot(): IpcObjectSnapshot[] {
        return Array.from(this.#objects, ([path, entry]: [string, TreeEntry]) => ({
            path,
            attributes: { ...entry.attributes }
        })).sort((a: IpcObjectSnapshot, b: IpcObjectSnapshot) => a.path.localeCompare(b.path));
    }

    #entry(handle: IpcHandle): TreeEntry {
        const entry = this.#objects.get(handle.path);
        if (!entry || entry.id !== handle.id) {
            throw new Error(`IPC object ${handle.path} is not registered`);
        }
        return entry;
    }
}
