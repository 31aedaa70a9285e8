export interface DisconnectEvent {
    type: "disconnect";
    clientId: string;
}
