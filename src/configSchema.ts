import { argForPath } from "./argForPath";
import { defaultStorageFile } from "./defaultStorageFile";
import convict from "convict";
import type { ConfigType } from "./ConfigType";

/**
 * Builds the configuration. Precedence, lowest first: defaults, a loaded
 * config file, environment, command line.
 */
export function createConfigSchema(options?: convict.Options): convict.Config<ConfigType> {
    return convict<ConfigType>(
        {
            mqtt: {
                url: {
                    doc: "MQTT broker URL, or a bare host name",
                    format: String,
                    default: "mqtt://localhost:1883",
                    env: "MQTT_DEVICES_MQTT_URL",
                    arg: argForPath("mqtt.url")
                },
                username: {
                    doc: "MQTT user name",
                    format: String,
                    nullable: true,
                    default: null,
                    env: "MQTT_DEVICES_MQTT_USERNAME",
                    arg: argForPath("mqtt.username")
                },
                password: {
                    doc: "MQTT password",
                    format: String,
                    nullable: true,
                    default: null,
                    sensitive: true,
                    env: "MQTT_DEVICES_MQTT_PASSWORD",
                    arg: argForPath("mqtt.password")
                },
                caFile: {
                    doc: "Path to the CA certificate used for TLS to the broker",
                    format: String,
                    nullable: true,
                    default: null,
                    env: "MQTT_DEVICES_MQTT_CA_FILE",
                    arg: argForPath("mqtt.caFile")
                },
                clientId: {
                    doc: "MQTT client id of this process (generated if not set)",
                    format: String,
                    nullable: true,
                    default: null,
                    env: "MQTT_DEVICES_MQTT_CLIENT_ID",
                    arg: argForPath("mqtt.clientId")
                }
            },

            storage: {
                file: {
                    doc: "JSON file holding device instance allocations and custom names",
                    format: String,
                    default: defaultStorageFile(),
                    env: "MQTT_DEVICES_STORAGE_FILE",
                    arg: argForPath("storage.file")
                }
            },

            ipc: {
                pathPrefix: {
                    doc: "Prefix of every exposed IPC object path",
                    format: String,
                    default: "mqttdevices",
                    env: "MQTT_DEVICES_PATH_PREFIX",
                    arg: argForPath("ipc.pathPrefix")
                },
                portalId: {
                    doc: "Portal id used in telemetry topics (derived from the host if not set)",
                    format: String,
                    nullable: true,
                    default: null,
                    env: "MQTT_DEVICES_PORTAL_ID",
                    arg: argForPath("ipc.portalId")
                }
            },

            monitor: {
                enabled: {
                    doc: "Serve the HTTP/WebSocket monitor",
                    format: Boolean,
                    default: true,
                    env: "MQTT_DEVICES_MONITOR",
                    arg: argForPath("monitor.enabled")
                },
                host: {
                    doc: "Host the monitor binds to",
                    format: String,
                    default: "127.0.0.1",
                    env: "MQTT_DEVICES_MONITOR_HOST",
                    arg: argForPath("monitor.host")
                },
                port: {
                    doc: "Monitor port",
                    format: "port",
                    default: 8326,
                    env: "MQTT_DEVICES_MONITOR_PORT",
                    arg: argForPath("monitor.port")
                }
            },

            logging: {
                level: {
                    doc: "Log level",
                    format: ["silent", "error", "log", "debug", "verbose"],
                    default: "log",
                    env: "MQTT_DEVICES_LOG_LEVEL",
                    arg: argForPath("logging.level")
                },
                file: {
                    doc: "Log file path",
                    format: String,
                    nullable: true,
                    default: null,
                    env: "MQTT_DEVICES_LOG_FILE",
                    arg: argForPath("logging.file")
                }
            }
        },
        options
    );
}
