export interface MqttBusOptions {
    url: string;
    clientId: string;
    username: string | null;
    password: string | null;
    caFile: string | null;
}
