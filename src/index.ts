#!/usr/bin/env node

import { Config } from "./Config";
import { VERSION } from "./version";
import { closeLogger } from "./closeLogger";
import { logLevelFromName } from "./logLevelFromName";
import { main } from "./main";
import { parseCommandLine } from "./parseCommandLine";
import { setConsoleLevel } from "./consoleLevel";
import { setLogFile } from "./logFile";

const commandLine = parseCommandLine(process.argv.slice(2));

if (commandLine.help) {
    console.log(`Usage: mqtt-devices [options]
Registers devices announcing themselves on device/<clientId>/Status as services
on the local monitoring bus.

Options:
  --help, -h                Show this help message
  --version                 Show version number
  --config                  Path to a JSON config file
  --debug, -d               Set logging level to debug
  --verbose, -v             More logging (-v debug, -vv verbose)
  --log-level, -l           Log level (silent, error, log, debug, verbose)
  --log-file, -f            Path to log file
  --mqtt-server, -q         MQTT broker URL or host name
  --mqtt-user, -u           MQTT user name
  --mqtt-password, -P       MQTT password
  --mqtt-certificate, -c    CA certificate for TLS to the broker
  --mqtt-client-id          MQTT client id of this process
  --storage-file, -s        Settings file for device instances
  --path-prefix             Prefix of exposed IPC object paths
  --portal-id               Portal id used in telemetry topics
  --monitor                 Serve the monitor API (true/false)
  --monitor-host, -H        Host the monitor binds to
  --monitor-port, -p        Monitor port
`);
    process.exit(0);
}

if (commandLine.version) {
    console.log(`mqtt-devices version ${VERSION}`);
    process.exit(0);
}

let config: Config;
try {
    config = Config.findAndLoadConfig();
} catch (err) {
    console.error("Failed to load configuration:", err);
    process.exit(1);
}

setConsoleLevel(logLevelFromName(config.logLevel));
if (config.logFile) {
    setLogFile(config.logFile);
}

(async (): Promise<void> => {
    try {
        await main(config);
        closeLogger();
        process.exit(0);
    } catch (err: unknown) {
        console.error("Fatal error:", err);
        closeLogger();
        process.exit(1);
    }
})();
