export function servicePath(prefix: string, serviceType: string, deviceInstance: number): string {
    return `${prefix}.${serviceType}.${deviceInstance}`;
}
