export function customNameKey(serviceType: string, deviceInstance: number): string {
    return `customname/${serviceType}/${deviceInstance}`;
}
