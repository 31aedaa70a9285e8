import type { CommandLineArg } from "./CommandLineArg";

// Long option name -> config path
export const CommandLineArgs: Record<string, CommandLineArg> = {
    "mqtt-server": { path: "mqtt.url", short: "q" },
    "mqtt-user": { path: "mqtt.username", short: "u" },
    "mqtt-password": { path: "mqtt.password", short: "P" },
    "mqtt-certificate": { path: "mqtt.caFile", short: "c" },
    "mqtt-client-id": { path: "mqtt.clientId" },
    "storage-file": { path: "storage.file", short: "s" },
    "path-prefix": { path: "ipc.pathPrefix" },
    "portal-id": { path: "ipc.portalId" },
    monitor: { path: "monitor.enabled" },
    "monitor-host": { path: "monitor.host", short: "H" },
    "monitor-port": { path: "monitor.port", short: "p" },
    "log-level": { path: "logging.level", short: "l" },
    "log-file": { path: "logging.file", short: "f" }
};
