import type { ServiceMap } from "./ServiceMap";

export interface ConnectEvent {
    type: "connect";
    clientId: string;
    services: ServiceMap;
}
