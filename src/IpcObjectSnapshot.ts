import type { IpcAttributes } from "./IpcAttributes";

export interface IpcObjectSnapshot {
    path: string;
    attributes: IpcAttributes;
}
