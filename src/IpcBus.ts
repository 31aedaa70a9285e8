import type { IpcAttributes } from "./IpcAttributes";
import type { IpcHandle } from "./IpcHandle";
import type { IpcValue } from "./IpcValue";

/** Local bus that monitoring software reads service objects from. */
export interface IpcBus {
    /** Stable identifier of this gateway, used in telemetry topics. */
    readonly portalId: string;
    register(path: string, attributes: IpcAttributes): IpcHandle;
    update(handle: IpcHandle, attribute: string, value: IpcValue): void;
    unregister(handle: IpcHandle): void;
}
