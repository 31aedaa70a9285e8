import type { IpcObjectSnapshot } from "./IpcObjectSnapshot";
import type { IpcValue } from "./IpcValue";

export interface SnapshotMessage {
    type: "snapshot";
    portalId: string;
    objects: IpcObjectSnapshot[];
}

export interface ObjectAddedMessage {
    type: "object_added";
    object: IpcObjectSnapshot;
}

export interface AttributeChangedMessage {
    type: "attribute_changed";
    path: string;
    attribute: string;
    value: IpcValue;
}

export interface ObjectRemovedMessage {
    type: "object_removed";
    path: string;
}

export type MonitorMessage = SnapshotMessage | ObjectAddedMessage | AttributeChangedMessage | ObjectRemovedMessage;
