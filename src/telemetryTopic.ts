/** Topic a device writes readings to; relayed by the gateway, never by this process. */
export function telemetryTopic(portalId: string, serviceType: string, deviceInstance: number, attribute: string): string {
    return `W/${portalId}/${serviceType}/${deviceInstance}/${attribute}`;
}
