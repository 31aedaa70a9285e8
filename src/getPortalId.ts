import { createHash } from "crypto";
import { hostname, networkInterfaces } from "os";
import type { NetworkInterfaceInfo } from "os";

/**
 * The MAC address of the first external interface without separators, like
 * the portal ids devices already use in telemetry topics. Hosts without one
 * get a stable hash of their identity instead.
 */
export function getPortalId(configured: string | null): string {
    if (configured) {
        return configured;
    }

    const interfaces = networkInterfaces();
    for (const name of Object.keys(interfaces).sort()) {
        const mac = (interfaces[name] ?? []).find(
            (info: NetworkInterfaceInfo) => !info.internal && info.mac !== "00:00:00:00:00:00"
        )?.mac;
        if (mac) {
            return mac.replace(/:/g, "").toLowerCase();
        }
    }

    const hostInfo = `${hostname()}-${process.platform}`;
    return createHash("sha256").update(hostInfo).digest("hex").substring(0, 12);
}
