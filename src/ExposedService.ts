import type { IpcHandle } from "./IpcHandle";
import type { ServiceDefinition } from "./ServiceDefinition";
import type { ServiceInstance } from "./ServiceInstance";

export interface ExposedService {
    instance: ServiceInstance;
    definition: ServiceDefinition;
    handle: IpcHandle;
}
