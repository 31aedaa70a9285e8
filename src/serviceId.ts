/**
 * Identifies a client's service. Client ids come from a single topic level
 * and never contain a slash, so the first slash always separates the two.
 */
export function serviceId(clientId: string, serviceKey: string): string {
    return `${clientId}/${serviceKey}`;
}
