export interface ServiceInstance {
    clientId: string;
    serviceKey: string;
    serviceType: string;
    deviceInstance: number;
    active: boolean;
}
