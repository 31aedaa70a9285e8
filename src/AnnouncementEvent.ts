import type { ConnectEvent } from "./ConnectEvent";
import type { DisconnectEvent } from "./DisconnectEvent";

export type AnnouncementEvent = ConnectEvent | DisconnectEvent;
